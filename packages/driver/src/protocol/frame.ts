import { Buffer } from 'node:buffer'

import { DgtError } from '../errors.js'
import { HEADER_SIZE, MAX_FRAME_SIZE, MESSAGE_BIT } from './constants.js'

/** One board -> PC message. `length` always equals `payload.length`. */
export interface Frame {
  tag: number
  length: number
  payload: Buffer
}

/** Correlation key of a reply, e.g. `msg:147` or `clock:9`. */
export type CorrelationKey = string

/**
 * A PC -> board command. `reply` names the correlation key of the expected
 * reply frame; commands without one are fire-and-forget.
 */
export interface DgtCommand {
  tag: number
  payload?: Buffer
  reply?: CorrelationKey
}

export type DecodeResult =
  | { kind: 'frame'; frame: Frame; consumed: number }
  | { kind: 'need-more' }
  | { kind: 'malformed'; reason: string }

export function makeFrame(tag: number, payload: Buffer | readonly number[]): Frame {
  const bytes = Buffer.isBuffer(payload) ? payload : Buffer.from(payload)
  return { tag, length: bytes.length, payload: bytes }
}

/**
 * Decode the frame at the start of `buf`.
 *
 * Never consumes a partial frame: on `need-more` the caller keeps the bytes
 * and retries once more data arrived.
 */
export function decodeNext(buf: Buffer): DecodeResult {
  if (buf.length === 0) return { kind: 'need-more' }

  const tag = buf[0]
  if ((tag & MESSAGE_BIT) === 0) {
    return { kind: 'malformed', reason: `sync lost tag=0x${hex(tag)}` }
  }
  if (buf.length < HEADER_SIZE) return { kind: 'need-more' }

  const hi = buf[1]
  const lo = buf[2]
  if ((hi & MESSAGE_BIT) !== 0 || (lo & MESSAGE_BIT) !== 0) {
    return { kind: 'malformed', reason: `bad size bytes tag=0x${hex(tag)} size=0x${hex(hi)}${hex(lo)}` }
  }

  const size = (hi << 7) | lo
  if (size < HEADER_SIZE) {
    return { kind: 'malformed', reason: `size too small tag=0x${hex(tag)} size=${size}` }
  }
  if (buf.length < size) return { kind: 'need-more' }

  // Copy so the frame does not pin the reader's accumulation buffer.
  const payload = Buffer.from(buf.subarray(HEADER_SIZE, size))
  return {
    kind: 'frame',
    frame: { tag, length: payload.length, payload },
    consumed: size,
  }
}

export function encodeFrame(frame: Frame): Buffer {
  if (frame.length !== frame.payload.length) {
    throw new RangeError(`frame length ${frame.length} != payload length ${frame.payload.length}`)
  }
  const size = frame.length + HEADER_SIZE
  if (size > MAX_FRAME_SIZE) throw new RangeError(`frame too large size=${size}`)

  const out = Buffer.alloc(size)
  out[0] = frame.tag | MESSAGE_BIT
  out[1] = (size >> 7) & 0x7f
  out[2] = size & 0x7f
  frame.payload.copy(out, HEADER_SIZE)
  return out
}

/** Bare command byte, or `[tag][payloadLength][payload]` when a payload is present. */
export function encodeCommand(cmd: DgtCommand): Buffer {
  if (!cmd.payload || cmd.payload.length === 0) return Buffer.from([cmd.tag])
  if (cmd.payload.length > 0xff) throw new RangeError(`command payload too large len=${cmd.payload.length}`)
  return Buffer.concat([Buffer.from([cmd.tag, cmd.payload.length]), cmd.payload])
}

/**
 * Streaming accumulator over decodeNext. Yields frames strictly in arrival
 * order; a malformed header poisons the reader (the protocol has no resync).
 */
export class FrameReader {
  private pending: Buffer = Buffer.alloc(0)
  private poisoned: string | null = null

  get buffered(): number {
    return this.pending.length
  }

  push(chunk: Buffer): void {
    if (chunk.length === 0) return
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk])
  }

  /** Next complete frame, or null when more bytes are needed. Throws a `malformed` DgtError. */
  next(): Frame | null {
    if (this.poisoned) throw malformed(this.poisoned)

    const res = decodeNext(this.pending)
    switch (res.kind) {
      case 'need-more':
        return null
      case 'malformed':
        this.poisoned = res.reason
        throw malformed(res.reason)
      case 'frame':
        this.pending = this.pending.subarray(res.consumed)
        return res.frame
    }
  }

  /** Drain every complete frame currently buffered. */
  drain(): Frame[] {
    const out: Frame[] = []
    for (let f = this.next(); f; f = this.next()) out.push(f)
    return out
  }
}

function malformed(reason: string): DgtError {
  return new DgtError('malformed', `malformed frame: ${reason}`, { reason })
}

export function hex(n: number): string {
  return n.toString(16).padStart(2, '0')
}
