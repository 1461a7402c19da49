import { Buffer } from 'node:buffer'

import {
  CLOCK_ACK_BUTTON,
  CLOCK_ACK_MARKER,
  CLOCK_ACK_OK,
  CLOCK_BUTTONS,
  PayloadSize,
} from './constants.js'

export interface ClockSide {
  /** Time remaining, whole seconds. */
  readonly seconds: number
  readonly flagFallen: boolean
  readonly flagDisplayed: boolean
  /** Bronstein/Fischer increment indicator. */
  readonly timePerMove: boolean
}

export interface ClockState {
  readonly left: ClockSide
  readonly right: ClockSide
  /** Clock not paused by start/stop. */
  readonly running: boolean
  readonly leftRunning: boolean
  readonly rightRunning: boolean
  readonly tumblerLeftHigh: boolean
  readonly batteryLow: boolean
  readonly at: number
}

/** Decoded clock acknowledgement bytes. */
export interface ClockAck {
  readonly ack0: number
  readonly ack1: number
  readonly ack2: number
  readonly ack3: number
}

export type ClockPayload =
  | { kind: 'ack'; ack: ClockAck }
  | { kind: 'time'; clock: ClockState }
  | { kind: 'ignored'; reason: string }

const STATUS_RUNNING = 0x01
const STATUS_TUMBLER_LEFT_HIGH = 0x02
const STATUS_BATTERY_LOW = 0x04
const STATUS_LEFT_TO_MOVE = 0x08
const STATUS_RIGHT_TO_MOVE = 0x10
const STATUS_NO_CLOCK = 0x20

const HOURS_FLAG_FALLEN = 0x10
const HOURS_TIME_PER_MOVE = 0x20
const HOURS_FLAG_DISPLAYED = 0x40

export function isClockAck(payload: Buffer): boolean {
  return (payload[0] & 0x0f) === CLOCK_ACK_MARKER || (payload[3] & 0x0f) === CLOCK_ACK_MARKER
}

export function decodeClockPayload(payload: Buffer, at: number = Date.now()): ClockPayload {
  if (payload.length !== PayloadSize.BWTIME) {
    return { kind: 'ignored', reason: `unexpected length=${payload.length}` }
  }

  if (isClockAck(payload)) {
    const ack: ClockAck = {
      ack0: (payload[1] & 0x7f) | ((payload[3] << 3) & 0x80),
      ack1: (payload[2] & 0x7f) | ((payload[3] << 2) & 0x80),
      ack2: (payload[4] & 0x7f) | ((payload[0] << 3) & 0x80),
      ack3: (payload[5] & 0x7f) | ((payload[0] << 2) & 0x80),
    }
    if (ack.ack0 !== CLOCK_ACK_OK) {
      return { kind: 'ignored', reason: `ack error ack0=0x${ack.ack0.toString(16)}` }
    }
    return { kind: 'ack', ack }
  }

  if (payload.every((b) => b === 0)) return { kind: 'ignored', reason: 'empty' }

  const status = payload[6]
  if (status & STATUS_NO_CLOCK) return { kind: 'ignored', reason: 'no clock connected' }

  const running = (status & STATUS_RUNNING) !== 0
  const clock: ClockState = Object.freeze({
    right: decodeSide(payload[0], payload[1], payload[2]),
    left: decodeSide(payload[3], payload[4], payload[5]),
    running,
    leftRunning: running && (status & STATUS_LEFT_TO_MOVE) !== 0,
    rightRunning: running && (status & STATUS_RIGHT_TO_MOVE) !== 0,
    tumblerLeftHigh: (status & STATUS_TUMBLER_LEFT_HIGH) !== 0,
    batteryLow: (status & STATUS_BATTERY_LOW) !== 0,
    at,
  })
  return { kind: 'time', clock }
}

/** Button number 0..4 for a button-press ack, or null when the ack is not a press. */
export function buttonFromAck(ack: ClockAck): number | null {
  if (ack.ack1 !== CLOCK_ACK_BUTTON) return null
  return CLOCK_BUTTONS[ack.ack3] ?? null
}

/** Clock firmware version from a VERSION ack: `major.minor`. */
export function clockVersionFromAck(ack: ClockAck): string {
  return `${ack.ack2 >> 4}.${ack.ack2 & 0x0f}`
}

function decodeSide(hours: number, minutes: number, seconds: number): ClockSide {
  return Object.freeze({
    seconds: (hours & 0x0f) * 3600 + fromBcd(minutes) * 60 + fromBcd(seconds),
    flagFallen: (hours & HOURS_FLAG_FALLEN) !== 0,
    flagDisplayed: (hours & HOURS_FLAG_DISPLAYED) !== 0,
    timePerMove: (hours & HOURS_TIME_PER_MOVE) !== 0,
  })
}

export function fromBcd(b: number): number {
  return (b >> 4) * 10 + (b & 0x0f)
}

export function toBcd(n: number): number {
  const v = Math.max(0, Math.min(99, Math.floor(n)))
  return (Math.floor(v / 10) << 4) | (v % 10)
}

/* -------------------------------------------------------------------------- */
/*  Encoders (the board side of the link; used by the in-process device)       */
/* -------------------------------------------------------------------------- */

/** Inverse of the ack decoding above, with ack0 fixed to OK. */
export function encodeClockAck(ack1: number, ack2 = 0, ack3 = 0): Buffer {
  const ack0 = CLOCK_ACK_OK
  return Buffer.from([
    CLOCK_ACK_MARKER | ((ack2 & 0x80) >> 3) | ((ack3 & 0x80) >> 2),
    ack0 & 0x7f,
    ack1 & 0x7f,
    CLOCK_ACK_MARKER | ((ack0 & 0x80) >> 3) | ((ack1 & 0x80) >> 2),
    ack2 & 0x7f,
    ack3 & 0x7f,
    0x00,
  ])
}

export interface ClockTimeInput {
  leftSeconds: number
  rightSeconds: number
  running?: boolean
  leftToMove?: boolean
  rightToMove?: boolean
  batteryLow?: boolean
}

export function encodeClockTime(input: ClockTimeInput): Buffer {
  let status = 0
  if (input.running) status |= STATUS_RUNNING
  if (input.batteryLow) status |= STATUS_BATTERY_LOW
  if (input.leftToMove) status |= STATUS_LEFT_TO_MOVE
  if (input.rightToMove) status |= STATUS_RIGHT_TO_MOVE
  return Buffer.from([
    ...encodeSide(input.rightSeconds),
    ...encodeSide(input.leftSeconds),
    status,
  ])
}

function encodeSide(totalSeconds: number): number[] {
  const [h, m, s] = splitTime(totalSeconds)
  return [h, toBcd(m), toBcd(s)]
}

/** Split seconds into [hours (0..9), minutes, seconds]. */
export function splitTime(totalSeconds: number): [number, number, number] {
  const t = Math.max(0, Math.min(9 * 3600 + 59 * 60 + 59, Math.floor(totalSeconds)))
  return [Math.floor(t / 3600), Math.floor((t % 3600) / 60), t % 60]
}
