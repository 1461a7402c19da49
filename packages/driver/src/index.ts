export { DgtDriver } from './driver/DgtDriver.js'
export { DgtSession, type SessionDeps, type SessionPhase } from './driver/DgtSession.js'
export type {
  ClockTextOptions,
  CommandOptions,
  DgtDriverConfig,
  DgtDriverDeps,
  DgtDriverOptions,
  DgtEventKind,
  DgtEvents,
  DgtScanConfig,
  DriverState,
} from './driver/types.js'
export { backoffDelay, buildDgtConfigFromEnv, DEFAULT_CONFIG } from './driver/utils.js'

export { DgtError, isDgtError, toDgtError, type DgtErrorCode } from './errors.js'

export { EventBus, type Disposable, type EventMap } from './core/events/EventBus.js'
export { PendingRequestTable, type PendingHandle, type RegisterOptions } from './core/requests/PendingRequestTable.js'
export { ReadySignal, type WaitOptions } from './core/requests/ReadySignal.js'
export {
  PortScanner,
  serialPortLister,
  type PortCandidate,
  type PortLister,
  type SystemPortInfo,
} from './core/serial/PortScanner.js'
export {
  SerialTransport,
  SerialTransportFactory,
  type DgtTransport,
  type SerialPortLike,
  type SerialTransportOptions,
  type TransportFactory,
} from './core/serial/SerialTransport.js'

export * from './protocol/board.js'
export * from './protocol/clock.js'
export * from './protocol/commands.js'
export * from './protocol/constants.js'
export * from './protocol/frame.js'
