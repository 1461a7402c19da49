import type { LoggerBundle } from '@dgtlink/logging'

import type { PortScanner } from '../core/serial/PortScanner.js'
import type { TransportFactory } from '../core/serial/SerialTransport.js'
import type { BoardState } from '../protocol/board.js'
import type { ClockState } from '../protocol/clock.js'

/* -------------------------------------------------------------------------- */
/*  Events                                                                     */
/* -------------------------------------------------------------------------- */

export interface DgtEvents {
  connected: (port: string) => void
  disconnected: () => void
  board: (board: BoardState) => void
  /** Clock lever buttons 0..4, left to right. */
  button_pressed: (button: number) => void
  clock: (clock: ClockState) => void
}

export type DgtEventKind = keyof DgtEvents

/* -------------------------------------------------------------------------- */
/*  Config                                                                     */
/* -------------------------------------------------------------------------- */

export interface DgtScanConfig {
  baseDelayMs: number
  maxDelayMs: number
}

export interface DgtDriverConfig {
  /** Globs matched case-insensitively against port path or device name. */
  portGlobs: string[]
  baudRate: number
  scan: DgtScanConfig
  /** Budget for the version query that validates a freshly opened port. */
  probeTimeoutMs: number
  /** Reply timeout when the caller gives no deadline of their own. */
  replyTimeoutMs: number
}

export interface DgtDriverDeps {
  scanner?: PortScanner
  transportFactory?: TransportFactory
  logger?: LoggerBundle
}

export interface CommandOptions {
  /** Total deadline: readiness wait plus reply. */
  timeoutMs?: number
  signal?: AbortSignal
}

export interface ClockTextOptions extends CommandOptions {
  beepMs?: number
}

export type DriverState = 'idle' | 'searching' | 'connecting' | 'connected' | 'closed'

/** Constructor options: any subset of the config, merged over the defaults. */
export interface DgtDriverOptions extends Partial<Omit<DgtDriverConfig, 'scan'>> {
  scan?: Partial<DgtScanConfig>
}
