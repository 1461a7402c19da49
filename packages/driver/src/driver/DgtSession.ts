import type { Buffer } from 'node:buffer'
import { LogChannel, type ChannelLogger, type LoggerBundle } from '@dgtlink/logging'

import { DgtError, errorMessage, toDgtError } from '../errors.js'
import type { EventBus } from '../core/events/EventBus.js'
import { PendingRequestTable, type PendingHandle } from '../core/requests/PendingRequestTable.js'
import type { DgtTransport } from '../core/serial/SerialTransport.js'
import { applyFieldUpdate, decodeBoardDump, decodeFieldUpdate, emptySquares, makeBoardState, type BoardState } from '../protocol/board.js'
import { buttonFromAck, decodeClockPayload } from '../protocol/clock.js'
import { replyKeyForFrame } from '../protocol/commands.js'
import { Message } from '../protocol/constants.js'
import { encodeCommand, FrameReader, hex, type DgtCommand, type Frame } from '../protocol/frame.js'
import type { CommandOptions, DgtEvents } from './types.js'

export type SessionPhase = 'starting' | 'running' | 'dead'

export interface SessionDeps {
  bus: EventBus<DgtEvents>
  logger: LoggerBundle
  /** Reply timeout for commands sent without one. */
  replyTimeoutMs: number
  /** Called synchronously when the session dies, before any cleanup. */
  onDeath?: (reason: DgtError) => void
}

/**
 * Owns one transport and its read loop.
 *
 * `starting` sessions route replies but publish no events; `activate()`
 * moves to `running`. Any transport or codec failure, or `close()`, ends in
 * `dead`: pending requests fail with `connection-lost`, the transport is
 * closed and, for a session that was running, `disconnected` is emitted once.
 */
export class DgtSession {
  private phaseValue: SessionPhase = 'starting'
  private readonly reader = new FrameReader()
  private readonly pending = new PendingRequestTable()
  private boardState: BoardState | null = null
  private boardSeq = 0
  private loop: Promise<void> | null = null

  private readonly died: Promise<DgtError>
  private readonly markDied: (reason: DgtError) => void

  private readonly log: ChannelLogger
  private readonly boardLog: ChannelLogger
  private readonly clockLog: ChannelLogger

  constructor(
    private readonly transport: DgtTransport,
    private readonly deps: SessionDeps
  ) {
    let markDied: (reason: DgtError) => void = () => undefined
    this.died = new Promise<DgtError>((resolve) => {
      markDied = resolve
    })
    this.markDied = markDied
    this.log = deps.logger.channel(LogChannel.session)
    this.boardLog = deps.logger.channel(LogChannel.board)
    this.clockLog = deps.logger.channel(LogChannel.clock)
  }

  get phase(): SessionPhase {
    return this.phaseValue
  }

  get path(): string {
    return this.transport.path
  }

  /** Latest board snapshot seen on this session, from dumps and field updates. */
  get board(): BoardState | null {
    return this.boardState
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** Launch the read loop. Idempotent. */
  start(): void {
    if (this.loop || this.phaseValue === 'dead') return
    this.log.debug(`session start path=${this.path}`)
    this.loop = this.readLoop()
  }

  activate(): void {
    if (this.phaseValue === 'dead') {
      throw new DgtError('session-dead', `session is dead path=${this.path}`, { path: this.path })
    }
    this.phaseValue = 'running'
  }

  /** Resolves with the reason once the session is dead. Never rejects. */
  whenDead(): Promise<DgtError> {
    return this.died
  }

  /**
   * Write a command. When it expects a reply, the pending entry is
   * registered before the bytes go out so a fast reply cannot be missed.
   * Resolves to null for fire-and-forget commands.
   */
  async send(command: DgtCommand, opts: CommandOptions = {}): Promise<PendingHandle | null> {
    if (this.phaseValue === 'dead') {
      throw new DgtError('session-dead', `session is dead path=${this.path}`, { path: this.path })
    }

    const handle = command.reply
      ? this.pending.register(command.reply, {
          timeoutMs: opts.timeoutMs ?? this.deps.replyTimeoutMs,
          signal: opts.signal,
        })
      : null

    try {
      await this.transport.write(encodeCommand(command))
    } catch (err) {
      const e = toDgtError(err, 'io-lost')
      if (handle) {
        // The caller gets the write error, not the reply rejection.
        handle.reply.catch(() => undefined)
        handle.cancel(e)
      }
      await this.die(e)
      throw e
    }

    this.log.debug(`sent cmd=0x${hex(command.tag)} reply=${command.reply ?? '-'}`)
    return handle
  }

  /** Send a command that expects a reply and wait for it. */
  async request(command: DgtCommand, opts: CommandOptions = {}): Promise<Frame> {
    if (!command.reply) {
      throw new RangeError(`command 0x${hex(command.tag)} expects no reply`)
    }
    const handle = await this.send(command, opts)
    if (!handle) throw new RangeError(`command 0x${hex(command.tag)} expects no reply`)
    return handle.reply
  }

  async close(): Promise<void> {
    await this.die(new DgtError('closed', `session closed path=${this.path}`, { path: this.path }))
    if (this.loop) await this.loop
  }

  /* ---------------------------------------------------------------------- */
  /*  Read loop                                                              */
  /* ---------------------------------------------------------------------- */

  private async readLoop(): Promise<void> {
    while (this.phaseValue !== 'dead') {
      let chunk: Buffer | null
      try {
        chunk = await this.transport.readChunk()
      } catch (err) {
        await this.die(toDgtError(err, 'io-lost'))
        return
      }

      if (this.phaseValue === 'dead') return
      if (chunk === null) {
        await this.die(new DgtError('io-lost', `port closed path=${this.path}`, { path: this.path }))
        return
      }

      this.reader.push(chunk)
      try {
        for (let frame = this.reader.next(); frame; frame = this.reader.next()) {
          this.dispatch(frame)
          if (this.phaseValue === 'dead') return
        }
      } catch (err) {
        await this.die(toDgtError(err, 'malformed'))
        return
      }
    }
  }

  private dispatch(frame: Frame): void {
    // Dumps refresh the snapshot whether or not someone asked for them.
    const dump = frame.tag === Message.BOARD_DUMP ? this.refreshBoard(frame) : null

    const key = replyKeyForFrame(frame)
    if (key !== null && this.pending.resolve(key, frame)) {
      this.log.debug(`reply key=${key} len=${frame.length}`)
      return
    }

    switch (frame.tag) {
      case Message.BOARD_DUMP:
        if (dump) this.publish('board', dump)
        return
      case Message.FIELD_UPDATE:
        this.onFieldUpdate(frame)
        return
      case Message.BWTIME:
        this.onClockFrame(frame)
        return
      default:
        this.log.debug(`unsolicited frame tag=0x${hex(frame.tag)} len=${frame.length}`)
    }
  }

  private refreshBoard(frame: Frame): BoardState | null {
    const board = decodeBoardDump(frame.payload, this.boardSeq + 1)
    if (!board) {
      this.boardLog.warn(`bad board dump len=${frame.length}`)
      return null
    }
    this.boardSeq = board.sequence
    this.boardState = board
    return board
  }

  private onFieldUpdate(frame: Frame): void {
    const update = decodeFieldUpdate(frame.payload)
    if (!update) {
      this.boardLog.warn(`bad field update len=${frame.length}`)
      return
    }
    const base = this.boardState ?? makeBoardState(emptySquares(), this.boardSeq)
    this.boardSeq += 1
    this.boardState = applyFieldUpdate(base, update, this.boardSeq)
    this.boardLog.debug(`field square=${update.square} piece=${update.piece} seq=${this.boardSeq}`)
    this.publish('board', this.boardState)
  }

  private onClockFrame(frame: Frame): void {
    const decoded = decodeClockPayload(frame.payload)
    switch (decoded.kind) {
      case 'time':
        this.publish('clock', decoded.clock)
        return
      case 'ack': {
        const button = buttonFromAck(decoded.ack)
        if (button !== null) {
          this.clockLog.debug(`button pressed button=${button}`)
          this.publish('button_pressed', button)
        } else {
          this.clockLog.debug(`unmatched clock ack ack1=0x${hex(decoded.ack.ack1)}`)
        }
        return
      }
      case 'ignored':
        this.clockLog.debug(`clock frame ignored reason="${decoded.reason}"`)
    }
  }

  private publish<K extends keyof DgtEvents>(kind: K, ...args: Parameters<DgtEvents[K]>): void {
    if (this.phaseValue !== 'running') return
    this.deps.bus.emit(kind, ...args)
  }

  /* ---------------------------------------------------------------------- */
  /*  Death                                                                  */
  /* ---------------------------------------------------------------------- */

  private async die(reason: DgtError): Promise<void> {
    if (this.phaseValue === 'dead') return
    const wasRunning = this.phaseValue === 'running'
    this.phaseValue = 'dead'
    this.deps.onDeath?.(reason)

    const lost = new DgtError('connection-lost', `connection lost path=${this.path}`, { path: this.path }, { cause: reason })
    const failed = this.pending.failAll(lost)

    const level = reason.code === 'closed' ? 'info' : 'warn'
    this.log[level](`session dead path=${this.path} reason=${reason.code} failed_requests=${failed} msg="${reason.message}"`)

    try {
      await this.transport.close()
    } catch (err) {
      this.log.debug(`transport close failed path=${this.path} err="${errorMessage(err)}"`)
    }

    if (wasRunning) this.deps.bus.emit('disconnected')
    this.markDied(reason)
  }
}
