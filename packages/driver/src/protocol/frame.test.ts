import { Buffer } from 'node:buffer'
import { describe, expect, it } from 'vitest'

import { DgtError, isDgtError } from '../errors.js'
import { clockBeepCommand, versionCommand } from './commands.js'
import { Message } from './constants.js'
import { decodeNext, encodeCommand, encodeFrame, FrameReader, makeFrame, type Frame } from './frame.js'

const bytes = (...b: number[]) => Buffer.from(b)

describe('decodeNext', () => {
  it('decodes a complete frame and reports bytes consumed', () => {
    const res = decodeNext(bytes(0x93, 0x00, 0x05, 1, 7, 0xff))
    expect(res).toEqual({
      kind: 'frame',
      frame: { tag: Message.VERSION, length: 2, payload: bytes(1, 7) },
      consumed: 5,
    })
  })

  it('asks for more data on partial input', () => {
    expect(decodeNext(bytes())).toEqual({ kind: 'need-more' })
    expect(decodeNext(bytes(0x93))).toEqual({ kind: 'need-more' })
    expect(decodeNext(bytes(0x93, 0x00))).toEqual({ kind: 'need-more' })
    expect(decodeNext(bytes(0x93, 0x00, 0x05, 1))).toEqual({ kind: 'need-more' })
  })

  it('flags sync loss, bad size bytes and undersized frames', () => {
    expect(decodeNext(bytes(0x13, 0x00, 0x05))).toEqual({ kind: 'malformed', reason: 'sync lost tag=0x13' })
    expect(decodeNext(bytes(0x93, 0x80, 0x05))).toEqual({
      kind: 'malformed',
      reason: 'bad size bytes tag=0x93 size=0x8005',
    })
    expect(decodeNext(bytes(0x93, 0x00, 0x02))).toEqual({
      kind: 'malformed',
      reason: 'size too small tag=0x93 size=2',
    })
  })

  it('keeps unknown tags as opaque frames', () => {
    const res = decodeNext(bytes(0xff, 0x00, 0x04, 0x42))
    expect(res).toEqual({ kind: 'frame', frame: { tag: 0xff, length: 1, payload: bytes(0x42) }, consumed: 4 })
  })

  it('accepts an empty payload', () => {
    const res = decodeNext(bytes(0x93, 0x00, 0x03))
    expect(res).toEqual({ kind: 'frame', frame: { tag: 0x93, length: 0, payload: bytes() }, consumed: 3 })
  })
})

describe('encodeFrame', () => {
  it('splits the total size over two 7-bit bytes', () => {
    const payload = Buffer.alloc(200, 0x01)
    const out = encodeFrame(makeFrame(Message.BOARD_DUMP, payload))
    expect(out.length).toBe(203)
    expect([...out.subarray(0, 3)]).toEqual([0x86, 1, 75])
  })

  it('is the inverse of decodeNext', () => {
    const wire = bytes(0x86, 0x00, 0x07, 0, 1, 2, 3)
    const res = decodeNext(wire)
    expect(res.kind).toBe('frame')
    if (res.kind !== 'frame') return
    expect(encodeFrame(res.frame)).toEqual(wire)
  })

  it('rejects a length that disagrees with the payload', () => {
    expect(() => encodeFrame({ tag: 0x93, length: 3, payload: bytes(1) })).toThrow(RangeError)
  })
})

describe('encodeCommand', () => {
  it('sends bare command bytes', () => {
    expect(encodeCommand(versionCommand())).toEqual(bytes(0x4d))
  })

  it('prefixes payload-carrying commands with their length', () => {
    expect(encodeCommand(clockBeepCommand(640))).toEqual(bytes(0x2b, 4, 0x03, 0x0b, 10, 0x00))
  })
})

describe('FrameReader', () => {
  const stream = Buffer.concat([
    encodeFrame(makeFrame(Message.VERSION, [1, 7])),
    encodeFrame(makeFrame(Message.FIELD_UPDATE, [12, 7])),
    encodeFrame(makeFrame(0xc4, [])),
    encodeFrame(makeFrame(Message.BOARD_DUMP, Buffer.alloc(64, 0))),
  ])

  it('yields the same frames whether fed at once or a byte at a time', () => {
    const whole = new FrameReader()
    whole.push(stream)
    const expected = whole.drain()
    expect(expected.map((f) => f.tag)).toEqual([0x93, 0x8e, 0xc4, 0x86])

    const trickle = new FrameReader()
    const got: Frame[] = []
    for (const b of stream) {
      trickle.push(bytes(b))
      got.push(...trickle.drain())
    }
    expect(got).toEqual(expected)
    expect(trickle.buffered).toBe(0)
  })

  it('holds a partial frame until the rest arrives', () => {
    const reader = new FrameReader()
    reader.push(bytes(0x93, 0x00))
    expect(reader.next()).toBeNull()
    expect(reader.buffered).toBe(2)
    reader.push(bytes(0x05, 2, 0))
    expect(reader.next()).toEqual({ tag: 0x93, length: 2, payload: bytes(2, 0) })
  })

  it('stays poisoned after a malformed header', () => {
    const reader = new FrameReader()
    reader.push(bytes(0x01, 0x93, 0x00, 0x05, 1, 7))

    let first: unknown
    try {
      reader.next()
    } catch (err) {
      first = err
    }
    expect(isDgtError(first, 'malformed')).toBe(true)
    expect(() => reader.next()).toThrow(DgtError)
  })
})
