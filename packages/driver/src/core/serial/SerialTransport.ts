import { Buffer } from 'node:buffer'
import { SerialPort } from 'serialport'
import type { ChannelLogger } from '@dgtlink/logging'

import { DgtError, errorMessage } from '../../errors.js'

/**
 * Byte pipe to one board. `readChunk()` resolving to null (port closed) or
 * rejecting with `io-lost` is the only disconnect signal. No retries here.
 */
export interface DgtTransport {
  readonly path: string
  readChunk(): Promise<Buffer | null>
  write(bytes: Buffer): Promise<void>
  close(): Promise<void>
}

export interface TransportFactory {
  /** Rejects with an `unavailable` DgtError when the port cannot be opened. */
  open(path: string): Promise<DgtTransport>
}

/** The slice of serialport's stream API the transport drives. */
export type SerialPortLike = Pick<SerialPort, 'open' | 'write' | 'drain' | 'close' | 'on' | 'off' | 'isOpen'>

export interface SerialTransportOptions {
  baudRate: number
  openTimeoutMs?: number
  createPort?: (path: string, baudRate: number) => SerialPortLike
  log?: ChannelLogger
}

interface Reader {
  resolve: (chunk: Buffer | null) => void
  reject: (err: DgtError) => void
}

function defaultCreatePort(path: string, baudRate: number): SerialPortLike {
  return new SerialPort({
    path,
    baudRate,
    autoOpen: false,
    dataBits: 8,
    parity: 'none',
    stopBits: 1,
  })
}

/**
 * Pull-style adapter over a serialport stream. The native binding performs
 * the blocking reads and writes off the JS thread; incoming chunks queue here
 * until the session asks for them.
 */
export class SerialTransport implements DgtTransport {
  private readonly chunks: Buffer[] = []
  private readonly readers: Reader[] = []
  private ended = false
  private failure: DgtError | null = null

  private constructor(
    public readonly path: string,
    private readonly port: SerialPortLike,
    private readonly log?: ChannelLogger
  ) {
    port.on('data', this.onData)
    port.on('error', this.onError)
    port.on('close', this.onClose)
  }

  static async open(path: string, opts: SerialTransportOptions): Promise<SerialTransport> {
    const create = opts.createPort ?? defaultCreatePort
    const timeoutMs = opts.openTimeoutMs ?? 3000

    let port: SerialPortLike
    try {
      port = create(path, opts.baudRate)
    } catch (err) {
      throw new DgtError('unavailable', `cannot create port path=${path} err="${errorMessage(err)}"`, { path }, { cause: err })
    }

    await new Promise<void>((resolve, reject) => {
      let settled = false
      const timer = setTimeout(() => {
        settled = true
        reject(new DgtError('unavailable', `timeout opening path=${path} baud=${opts.baudRate}`, { path }))
      }, timeoutMs)

      port.open((err) => {
        if (settled) {
          // Opened after we gave up on it.
          if (!err) port.close(() => undefined)
          return
        }
        settled = true
        clearTimeout(timer)
        if (err) {
          reject(new DgtError('unavailable', `cannot open path=${path} err="${err.message}"`, { path }, { cause: err }))
        } else {
          resolve()
        }
      })
    })

    opts.log?.debug(`port open path=${path} baud=${opts.baudRate}`)
    return new SerialTransport(path, port, opts.log)
  }

  readChunk(): Promise<Buffer | null> {
    const chunk = this.chunks.shift()
    if (chunk) return Promise.resolve(chunk)
    if (this.failure) return Promise.reject(this.failure)
    if (this.ended) return Promise.resolve(null)

    return new Promise<Buffer | null>((resolve, reject) => {
      this.readers.push({ resolve, reject })
    })
  }

  async write(bytes: Buffer): Promise<void> {
    if (this.failure) throw this.failure
    if (this.ended || !this.port.isOpen) {
      throw new DgtError('io-lost', `port not open path=${this.path}`, { path: this.path })
    }

    try {
      await new Promise<void>((resolve, reject) => {
        this.port.write(bytes, (err) => (err ? reject(err) : resolve()))
      })
      await new Promise<void>((resolve, reject) => {
        this.port.drain((err) => (err ? reject(err) : resolve()))
      })
    } catch (err) {
      throw new DgtError('io-lost', `write failed path=${this.path} err="${errorMessage(err)}"`, { path: this.path }, { cause: err })
    }
  }

  async close(): Promise<void> {
    if (this.port.isOpen) {
      await new Promise<void>((resolve) => {
        this.port.close((err) => {
          if (err) this.log?.debug(`close error path=${this.path} err="${err.message}"`)
          resolve()
        })
      })
    }
    this.finish()
  }

  /* ---------------------------------------------------------------------- */
  /*  Port events                                                            */
  /* ---------------------------------------------------------------------- */

  private readonly onData = (data: Buffer): void => {
    const reader = this.readers.shift()
    if (reader) reader.resolve(data)
    else this.chunks.push(data)
  }

  private readonly onError = (err: Error): void => {
    if (this.ended) return
    this.log?.warn(`port error path=${this.path} err="${err.message}"`)
    this.failure = new DgtError('io-lost', `port error path=${this.path} err="${err.message}"`, { path: this.path }, { cause: err })
    const waiting = this.readers.splice(0)
    for (const r of waiting) r.reject(this.failure)
  }

  private readonly onClose = (): void => {
    this.finish()
  }

  private finish(): void {
    if (this.ended) return
    this.ended = true
    this.port.off('data', this.onData)
    const waiting = this.readers.splice(0)
    for (const r of waiting) r.resolve(null)
  }
}

export class SerialTransportFactory implements TransportFactory {
  constructor(private readonly opts: SerialTransportOptions) {}

  open(path: string): Promise<DgtTransport> {
    return SerialTransport.open(path, this.opts)
  }
}
