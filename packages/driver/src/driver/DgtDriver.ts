import { createLogger, LogChannel, type ChannelLogger, type LoggerBundle } from '@dgtlink/logging'

import { DgtError, errorMessage, isDgtError } from '../errors.js'
import { EventBus, type Disposable } from '../core/events/EventBus.js'
import { ReadySignal } from '../core/requests/ReadySignal.js'
import { PortScanner, type PortCandidate } from '../core/serial/PortScanner.js'
import { SerialTransportFactory, type TransportFactory } from '../core/serial/SerialTransport.js'
import { decodeBoardDump, type BoardState } from '../protocol/board.js'
import { clockVersionFromAck, decodeClockPayload } from '../protocol/clock.js'
import {
  boardCommand,
  clockBeepCommand,
  clockSetCommand,
  clockTextCommand,
  clockVersionCommand,
  longSerialNumberCommand,
  requestBoardCommand,
  serialNumberCommand,
  updateNiceCommand,
  versionCommand,
} from '../protocol/commands.js'
import type { DgtCommand, Frame } from '../protocol/frame.js'
import { DgtSession } from './DgtSession.js'
import type {
  ClockTextOptions,
  CommandOptions,
  DgtDriverConfig,
  DgtDriverDeps,
  DgtDriverOptions,
  DgtEvents,
  DriverState,
} from './types.js'
import { backoffDelay, DEFAULT_CONFIG, now, sleep } from './utils.js'

function resolveConfig(options: DgtDriverOptions): DgtDriverConfig {
  const d = DEFAULT_CONFIG
  return {
    portGlobs: [...(options.portGlobs ?? d.portGlobs)],
    baudRate: options.baudRate ?? d.baudRate,
    scan: {
      baseDelayMs: options.scan?.baseDelayMs ?? d.scan.baseDelayMs,
      maxDelayMs: options.scan?.maxDelayMs ?? d.scan.maxDelayMs,
    },
    probeTimeoutMs: options.probeTimeoutMs ?? d.probeTimeoutMs,
    replyTimeoutMs: options.replyTimeoutMs ?? d.replyTimeoutMs,
  }
}

function versionString(frame: Frame): string {
  if (frame.payload.length < 2) {
    throw new DgtError('malformed', `short version reply len=${frame.payload.length}`)
  }
  return `${frame.payload[0]}.${frame.payload[1]}`
}

/**
 * Connection handle for one DGT board.
 *
 * Keeps searching for a matching port, validates it with a version query,
 * and swaps in a fresh session after every disconnect until `close()`.
 * Public commands wait for a connection (bounded only by the caller's
 * `timeoutMs` / `signal`) and then correlate the reply.
 */
export class DgtDriver {
  readonly config: DgtDriverConfig

  private readonly bus: EventBus<DgtEvents>
  private readonly ready = new ReadySignal()
  private readonly stop = new AbortController()
  private readonly scanner: PortScanner
  private readonly transports: TransportFactory
  private readonly logger: LoggerBundle
  private readonly log: ChannelLogger

  private stateValue: DriverState = 'idle'
  private session: DgtSession | null = null
  private loop: Promise<void> | null = null

  constructor(options: DgtDriverOptions = {}, deps: DgtDriverDeps = {}) {
    this.config = resolveConfig(options)
    this.logger = deps.logger ?? createLogger('dgt-driver')
    this.log = this.logger.channel(LogChannel.driver)
    this.bus = new EventBus<DgtEvents>(this.logger.channel(LogChannel.events))
    this.scanner = deps.scanner ?? new PortScanner()
    this.transports =
      deps.transportFactory ??
      new SerialTransportFactory({
        baudRate: this.config.baudRate,
        log: this.logger.channel(LogChannel.serial),
      })
  }

  /** Construct and start searching right away. */
  static autoConnect(options: DgtDriverOptions = {}, deps: DgtDriverDeps = {}): DgtDriver {
    const driver = new DgtDriver(options, deps)
    driver.start()
    return driver
  }

  get state(): DriverState {
    return this.stateValue
  }

  /** Path of the connected port, or null. */
  get port(): string | null {
    return this.session?.path ?? null
  }

  get isConnected(): boolean {
    return this.ready.ready
  }

  on<K extends keyof DgtEvents>(kind: K, handler: DgtEvents[K]): Disposable {
    return this.bus.on(kind, handler)
  }

  start(): void {
    if (this.stateValue !== 'idle') return
    this.log.info(`driver start globs=${this.config.portGlobs.join(',') || '-'} baud=${this.config.baudRate}`)
    this.loop = this.run()
  }

  /** Terminal. Tears down the session and stops searching; later commands fail with `closed`. */
  async close(): Promise<void> {
    if (this.isClosed) {
      if (this.loop) await this.loop
      return
    }
    this.setState('closed')
    this.stop.abort()
    this.ready.fail(new DgtError('closed', 'driver closed'))

    const session = this.session
    this.session = null
    if (session) await session.close()
    if (this.loop) await this.loop

    this.bus.removeAll()
    this.log.info('driver closed')
  }

  /* ---------------------------------------------------------------------- */
  /*  Public commands                                                        */
  /* ---------------------------------------------------------------------- */

  /** Board firmware version, `major.minor`. */
  async getVersion(opts: CommandOptions = {}): Promise<string> {
    const { frame } = await this.request(versionCommand(), opts)
    return versionString(frame)
  }

  async getSerialNumber(opts: CommandOptions = {}): Promise<string> {
    const { frame } = await this.request(serialNumberCommand(), opts)
    return frame.payload.toString('ascii')
  }

  async getLongSerialNumber(opts: CommandOptions = {}): Promise<string> {
    const { frame } = await this.request(longSerialNumberCommand(), opts)
    return frame.payload.toString('ascii')
  }

  /** Fresh board dump. Does not emit a `board` event. */
  async getBoard(opts: CommandOptions = {}): Promise<BoardState> {
    const { frame, session } = await this.request(boardCommand(), opts)
    const board = decodeBoardDump(frame.payload, session.board?.sequence ?? 0)
    if (!board) throw new DgtError('malformed', `bad board dump len=${frame.length}`)
    return board
  }

  /** Clock firmware version, `major.minor`. */
  async getClockVersion(opts: CommandOptions = {}): Promise<string> {
    const { frame } = await this.request(clockVersionCommand(), opts)
    const decoded = decodeClockPayload(frame.payload)
    if (decoded.kind !== 'ack') throw new DgtError('malformed', 'clock version reply is not an ack')
    return clockVersionFromAck(decoded.ack)
  }

  async clockBeep(durationMs: number, opts: CommandOptions = {}): Promise<void> {
    await this.request(clockBeepCommand(durationMs), opts)
  }

  async clockSet(
    leftSeconds: number,
    rightSeconds: number,
    leftRunning: boolean,
    rightRunning = false,
    opts: CommandOptions = {}
  ): Promise<void> {
    await this.request(clockSetCommand(leftSeconds, rightSeconds, leftRunning, rightRunning), opts)
  }

  /** Show up to 8 characters on the clock, optionally with a beep. */
  async clockText(text: string, opts: ClockTextOptions = {}): Promise<void> {
    await this.request(clockTextCommand(text, opts.beepMs ?? 0), opts)
  }

  private async request(command: DgtCommand, opts: CommandOptions): Promise<{ frame: Frame; session: DgtSession }> {
    if (this.isClosed) throw new DgtError('closed', 'driver closed')

    const deadline = opts.timeoutMs === undefined ? undefined : now() + opts.timeoutMs
    await this.ready.wait({ deadline, signal: opts.signal })

    const session = this.session
    if (!session) throw new DgtError('connection-lost', 'no active session')

    let timeoutMs: number | undefined
    if (deadline !== undefined) {
      timeoutMs = deadline - now()
      if (timeoutMs <= 0) {
        throw new DgtError('timeout', `deadline passed before send timeoutMs=${opts.timeoutMs}`)
      }
    }

    try {
      const frame = await session.request(command, { timeoutMs, signal: opts.signal })
      return { frame, session }
    } catch (err) {
      if (isDgtError(err, 'session-dead')) {
        throw new DgtError('connection-lost', err.message, err.context, { cause: err })
      }
      throw err
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Supervisor loop                                                        */
  /* ---------------------------------------------------------------------- */

  private get isClosed(): boolean {
    return this.stop.signal.aborted
  }

  private setState(next: DriverState): void {
    if (this.stateValue === next) return
    this.log.debug(`state ${this.stateValue} -> ${next}`)
    this.stateValue = next
  }

  private async run(): Promise<void> {
    let attempt = 0

    while (!this.isClosed) {
      this.setState('searching')

      let candidates: PortCandidate[] = []
      try {
        candidates = await this.scanner.listCandidates(this.config.portGlobs)
      } catch (err) {
        this.log.warn(`port scan failed err="${errorMessage(err)}"`)
      }
      if (this.isClosed) break

      const session = candidates.length > 0 ? await this.connectFirst(candidates) : null
      if (this.isClosed) {
        if (session) await session.close()
        break
      }

      const adopted = session !== null && (await this.adopt(session))
      if (!session || !adopted) {
        attempt += 1
        const delay = backoffDelay(attempt, this.config.scan.baseDelayMs, this.config.scan.maxDelayMs)
        this.log.debug(`no board found attempt=${attempt} retry_in_ms=${delay}`)
        try {
          await sleep(delay, this.stop.signal)
        } catch (err) {
          this.log.debug(`search stopped err="${errorMessage(err)}"`)
          break
        }
        continue
      }

      attempt = 0
      const reason = await session.whenDead()
      if (!this.isClosed) {
        this.log.warn(`board lost path=${session.path} reason=${reason.code}`)
      }
    }

    this.setState('closed')
  }

  /** Open candidates in path order; first one that answers the probe wins. */
  private async connectFirst(candidates: PortCandidate[]): Promise<DgtSession | null> {
    this.setState('connecting')

    for (const candidate of candidates) {
      if (this.isClosed) return null

      let session: DgtSession
      try {
        const transport = await this.transports.open(candidate.path)
        session = new DgtSession(transport, {
          bus: this.bus,
          logger: this.logger,
          replyTimeoutMs: this.config.replyTimeoutMs,
          onDeath: () => this.onSessionDeath(session),
        })
      } catch (err) {
        this.log.warn(`open failed path=${candidate.path} err="${errorMessage(err)}"`)
        continue
      }

      session.start()
      try {
        const reply = await session.request(versionCommand(), {
          timeoutMs: this.config.probeTimeoutMs,
          signal: this.stop.signal,
        })
        if (session.phase === 'dead') {
          this.log.warn(`session lost after probe path=${candidate.path}`)
          continue
        }
        this.log.info(`identified path=${candidate.path} name="${candidate.name}" version=${versionString(reply)}`)
        return session
      } catch (err) {
        this.log.warn(`probe failed path=${candidate.path} err="${errorMessage(err)}"`)
        await session.close()
      }
    }

    return null
  }

  /** Returns false when the session died before it could be promoted. */
  private async adopt(session: DgtSession): Promise<boolean> {
    if (session.phase === 'dead') {
      this.log.warn(`session lost before connect path=${session.path}`)
      return false
    }
    this.session = session
    session.activate()
    this.setState('connected')
    this.bus.emit('connected', session.path)
    this.ready.set()

    try {
      await session.send(updateNiceCommand())
      await session.send(requestBoardCommand())
    } catch (err) {
      // Write failures kill the session; the loop sees it through whenDead().
      this.log.warn(`initial setup failed path=${session.path} err="${errorMessage(err)}"`)
    }
    return true
  }

  private onSessionDeath(session: DgtSession): void {
    if (this.session !== session) return
    this.session = null
    this.ready.clear()
    if (!this.isClosed) this.setState('searching')
  }
}
