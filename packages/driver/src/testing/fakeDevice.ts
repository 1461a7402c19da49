import { Buffer } from 'node:buffer'

import { DgtError } from '../errors.js'
import type { PortLister, SystemPortInfo } from '../core/serial/PortScanner.js'
import type { DgtTransport, TransportFactory } from '../core/serial/SerialTransport.js'
import { emptySquares, encodeBoardDump, type PieceCode } from '../protocol/board.js'
import { encodeClockAck, encodeClockTime, type ClockTimeInput } from '../protocol/clock.js'
import { CLOCK_ACK_BUTTON, ClockCommand, Command, Message } from '../protocol/constants.js'
import { encodeFrame, makeFrame } from '../protocol/frame.js'

/* -------------------------------------------------------------------------- */
/*  In-process stand-ins for a serial port and a DGT board (tests only)        */
/* -------------------------------------------------------------------------- */

interface Reader {
  resolve: (chunk: Buffer | null) => void
  reject: (err: DgtError) => void
}

/** Transport whose far end is driven by the test. */
export class FakeTransport implements DgtTransport {
  /** Every write from the host, in order. */
  readonly written: Buffer[] = []
  failWrites = false

  private readonly chunks: Buffer[] = []
  private readonly readers: Reader[] = []
  private closedValue = false
  private failure: DgtError | null = null

  constructor(
    readonly path: string,
    private readonly onWrite: (bytes: Buffer) => void = () => undefined
  ) {}

  get closed(): boolean {
    return this.closedValue
  }

  /** Bytes arriving from the device. */
  feed(bytes: Buffer | readonly number[]): void {
    if (this.closedValue || this.failure) return
    const chunk = Buffer.from(bytes)
    const reader = this.readers.shift()
    if (reader) reader.resolve(chunk)
    else this.chunks.push(chunk)
  }

  /** Cable pulled: reads end with null. */
  unplug(): void {
    this.finish()
  }

  /** Port error: pending and later reads reject with `io-lost`. */
  fail(message = 'device reports an error'): void {
    if (this.closedValue) return
    this.failure = new DgtError('io-lost', message, { path: this.path })
    for (const r of this.readers.splice(0)) r.reject(this.failure)
  }

  readChunk(): Promise<Buffer | null> {
    const chunk = this.chunks.shift()
    if (chunk) return Promise.resolve(chunk)
    if (this.failure) return Promise.reject(this.failure)
    if (this.closedValue) return Promise.resolve(null)
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject })
    })
  }

  async write(bytes: Buffer): Promise<void> {
    if (this.failWrites || this.failure || this.closedValue) {
      throw new DgtError('io-lost', `write failed path=${this.path}`, { path: this.path })
    }
    this.written.push(Buffer.from(bytes))
    this.onWrite(bytes)
  }

  async close(): Promise<void> {
    this.finish()
  }

  private finish(): void {
    if (this.closedValue) return
    this.closedValue = true
    for (const r of this.readers.splice(0)) r.resolve(null)
  }
}

export interface FakeDeviceOptions {
  version?: readonly [number, number]
  /** 5 ASCII characters. */
  serialNumber?: string
  /** 10 ASCII characters. */
  longSerialNumber?: string
  squares?: readonly PieceCode[]
  clockVersion?: readonly [number, number]
  /** Reported by the port listing. */
  manufacturer?: string
  /** Never answer: a port that is not a board. */
  mute?: boolean
  /** Command bytes to leave unanswered. */
  ignore?: readonly number[]
  /** Extra bytes sent in the same chunk as every VERSION reply. */
  versionTrailer?: readonly number[]
}

export interface ReceivedCommand {
  tag: number
  payload: Buffer
}

/** Answers host commands the way a board with a clock attached does. */
export class FakeDgtDevice {
  readonly received: ReceivedCommand[] = []
  readonly squares: PieceCode[]
  updatesEnabled = false
  /** Raw payload for board dumps in place of `squares`. */
  dumpOverride: Buffer | null = null

  private current: FakeTransport | null = null

  constructor(
    readonly path: string,
    private readonly opts: FakeDeviceOptions = {}
  ) {
    this.squares = [...(opts.squares ?? emptySquares())]
  }

  get manufacturer(): string | undefined {
    return this.opts.manufacturer
  }

  /** Transport of the most recent open, if any. */
  get transport(): FakeTransport | null {
    return this.current
  }

  connect(): FakeTransport {
    const t = new FakeTransport(this.path, (bytes) => this.onHostBytes(bytes))
    this.current = t
    return t
  }

  sendFrame(tag: number, payload: Buffer | readonly number[]): void {
    this.current?.feed(encodeFrame(makeFrame(tag, payload)))
  }

  /** Move a piece on the board; reported when update mode is on. */
  setSquare(square: number, piece: PieceCode): void {
    this.squares[square] = piece
    if (this.updatesEnabled) this.sendFrame(Message.FIELD_UPDATE, [square, piece])
  }

  pressButton(button: number): void {
    this.sendFrame(Message.BWTIME, encodeClockAck(CLOCK_ACK_BUTTON, 0, 0x31 + button))
  }

  reportClock(input: ClockTimeInput): void {
    this.sendFrame(Message.BWTIME, encodeClockTime(input))
  }

  private onHostBytes(bytes: Buffer): void {
    for (const cmd of parseCommands(bytes)) {
      this.received.push(cmd)
      if (this.opts.mute || this.opts.ignore?.includes(cmd.tag)) continue
      // Reply after the host's write has returned.
      queueMicrotask(() => this.answer(cmd))
    }
  }

  private answer(cmd: ReceivedCommand): void {
    const o = this.opts
    switch (cmd.tag) {
      case Command.SEND_VERSION: {
        const reply = encodeFrame(makeFrame(Message.VERSION, [...(o.version ?? [1, 7])]))
        this.current?.feed(Buffer.concat([reply, Buffer.from(o.versionTrailer ?? [])]))
        return
      }
      case Command.RETURN_SERIALNR:
        this.sendFrame(Message.SERIALNR, Buffer.from(o.serialNumber ?? '12345', 'ascii'))
        return
      case Command.RETURN_LONG_SERIALNR:
        this.sendFrame(Message.LONG_SERIALNR, Buffer.from(o.longSerialNumber ?? '1234567890', 'ascii'))
        return
      case Command.SEND_BRD:
        this.sendFrame(Message.BOARD_DUMP, this.dumpOverride ?? encodeBoardDump(this.squares))
        return
      case Command.SEND_UPDATE_NICE:
        this.updatesEnabled = true
        return
      case Command.CLOCK_MESSAGE: {
        const sub = cmd.payload[1]
        if (sub === undefined) return
        const [major, minor] = o.clockVersion ?? [1, 0]
        const ack2 = sub === ClockCommand.VERSION ? (major << 4) | minor : 0
        this.sendFrame(Message.BWTIME, encodeClockAck(sub, ack2))
        return
      }
    }
  }
}

/** Split host bytes into commands: bare bytes, or `[tag][len][payload]` clock messages. */
function parseCommands(bytes: Buffer): ReceivedCommand[] {
  const out: ReceivedCommand[] = []
  let i = 0
  while (i < bytes.length) {
    const tag = bytes[i]
    if (tag === Command.CLOCK_MESSAGE) {
      const len = bytes[i + 1] ?? 0
      out.push({ tag, payload: Buffer.from(bytes.subarray(i + 2, i + 2 + len)) })
      i += 2 + len
    } else {
      out.push({ tag, payload: Buffer.alloc(0) })
      i += 1
    }
  }
  return out
}

/** Port listing plus transport factory over a set of fake devices. */
export class FakeSerialBus implements PortLister, TransportFactory {
  /** Paths the driver tried to open, in order. */
  readonly opened: string[] = []
  private readonly devices = new Map<string, FakeDgtDevice>()

  plug(device: FakeDgtDevice): FakeDgtDevice {
    this.devices.set(device.path, device)
    return device
  }

  unplug(path: string): void {
    this.devices.get(path)?.transport?.unplug()
    this.devices.delete(path)
  }

  async list(): Promise<SystemPortInfo[]> {
    return [...this.devices.values()].map((d) => ({ path: d.path, manufacturer: d.manufacturer }))
  }

  async open(path: string): Promise<DgtTransport> {
    this.opened.push(path)
    const device = this.devices.get(path)
    if (!device) throw new DgtError('unavailable', `no such port path=${path}`, { path })
    return device.connect()
  }
}
