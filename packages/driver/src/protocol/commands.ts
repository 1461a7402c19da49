import { Buffer } from 'node:buffer'

import {
  CLOCK_ACK_BUTTON,
  CLOCK_BEEP_UNIT_MS,
  CLOCK_END_MESSAGE,
  CLOCK_START_MESSAGE,
  CLOCK_TEXT_WIDTH,
  ClockCommand,
  type ClockCommandCode,
  Command,
  Message,
} from './constants.js'
import { decodeClockPayload, splitTime } from './clock.js'
import type { CorrelationKey, DgtCommand, Frame } from './frame.js'

export function messageKey(tag: number): CorrelationKey {
  return `msg:${tag}`
}

export function clockKey(sub: ClockCommandCode): CorrelationKey {
  return `clock:${sub}`
}

/**
 * Correlation key a frame would satisfy. Board replies are keyed by tag,
 * clock acks by the acknowledged sub-command. Button presses and clock time
 * reports are never replies.
 */
export function replyKeyForFrame(frame: Frame): CorrelationKey | null {
  if (frame.tag !== Message.BWTIME) return messageKey(frame.tag)
  const decoded = decodeClockPayload(frame.payload)
  if (decoded.kind !== 'ack' || decoded.ack.ack1 === CLOCK_ACK_BUTTON) return null
  return `clock:${decoded.ack.ack1}`
}

/* -------------------------------------------------------------------------- */
/*  Board commands                                                            */
/* -------------------------------------------------------------------------- */

export const versionCommand = (): DgtCommand => ({
  tag: Command.SEND_VERSION,
  reply: messageKey(Message.VERSION),
})

export const serialNumberCommand = (): DgtCommand => ({
  tag: Command.RETURN_SERIALNR,
  reply: messageKey(Message.SERIALNR),
})

export const longSerialNumberCommand = (): DgtCommand => ({
  tag: Command.RETURN_LONG_SERIALNR,
  reply: messageKey(Message.LONG_SERIALNR),
})

export const boardCommand = (): DgtCommand => ({
  tag: Command.SEND_BRD,
  reply: messageKey(Message.BOARD_DUMP),
})

/** Turns on field updates and clock reports. */
export const updateNiceCommand = (): DgtCommand => ({ tag: Command.SEND_UPDATE_NICE })

/** Board dump without a pending reply; the dump surfaces as a `board` event. */
export const requestBoardCommand = (): DgtCommand => ({ tag: Command.SEND_BRD })

/* -------------------------------------------------------------------------- */
/*  Clock commands                                                            */
/* -------------------------------------------------------------------------- */

function clockMessage(sub: ClockCommandCode, args: readonly number[] = []): DgtCommand {
  return {
    tag: Command.CLOCK_MESSAGE,
    payload: Buffer.from([CLOCK_START_MESSAGE, sub, ...args, CLOCK_END_MESSAGE]),
    reply: clockKey(sub),
  }
}

export function beepUnits(ms: number): number {
  if (!Number.isFinite(ms) || ms <= 0) return 0
  return Math.max(1, Math.min(0xff, Math.round(ms / CLOCK_BEEP_UNIT_MS)))
}

export const clockVersionCommand = (): DgtCommand => clockMessage(ClockCommand.VERSION)

export const clockBeepCommand = (durationMs: number): DgtCommand =>
  clockMessage(ClockCommand.BEEP, [beepUnits(durationMs)])

export function clockSetCommand(
  leftSeconds: number,
  rightSeconds: number,
  leftRunning: boolean,
  rightRunning: boolean
): DgtCommand {
  const status = (leftRunning ? 0x01 : 0) | (rightRunning ? 0x02 : 0)
  return clockMessage(ClockCommand.SETNRUN, [...splitTime(leftSeconds), ...splitTime(rightSeconds), status])
}

/** Printable ASCII, padded or cut to the display width. */
export function clockDisplayText(text: string): string {
  const ascii = text.replace(/[^\x20-\x7e]/g, '?')
  return ascii.slice(0, CLOCK_TEXT_WIDTH).padEnd(CLOCK_TEXT_WIDTH, ' ')
}

export function clockTextCommand(text: string, beepMs = 0): DgtCommand {
  const chars = [...clockDisplayText(text)].map((c) => c.charCodeAt(0))
  return clockMessage(ClockCommand.ASCII, [...chars, beepUnits(beepMs)])
}
