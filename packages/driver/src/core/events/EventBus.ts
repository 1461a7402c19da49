import type { ChannelLogger } from '@dgtlink/logging'

import { errorMessage } from '../../errors.js'

export interface Disposable {
  dispose(): void
}

/** Event name -> handler signature, e.g. `{ board: (b: BoardState) => void }`. */
export type EventMap<E> = { [K in keyof E]: (...args: never[]) => void }

/**
 * Synchronous typed publish/subscribe.
 *
 * Handlers run in registration order. A handler that throws (or returns a
 * rejected promise) is logged and skipped; dispatch to the rest continues.
 */
export class EventBus<E extends EventMap<E>> {
  private readonly handlers = new Map<keyof E, Array<E[keyof E]>>()

  constructor(private readonly log?: ChannelLogger) {}

  on<K extends keyof E>(kind: K, handler: E[K]): Disposable {
    const list = this.handlers.get(kind) ?? []
    list.push(handler)
    this.handlers.set(kind, list)

    let disposed = false
    return {
      dispose: () => {
        if (disposed) return
        disposed = true
        const current = this.handlers.get(kind)
        if (!current) return
        const idx = current.indexOf(handler)
        if (idx >= 0) current.splice(idx, 1)
        if (current.length === 0) this.handlers.delete(kind)
      },
    }
  }

  emit<K extends keyof E>(kind: K, ...args: Parameters<E[K]>): void {
    const list = this.handlers.get(kind)
    if (!list || list.length === 0) return

    // Snapshot: handlers added or disposed during dispatch take effect next emit.
    for (const handler of [...list]) {
      try {
        const result: unknown = Reflect.apply(handler, undefined, args)
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.handlerFailed(kind, err))
        }
      } catch (err) {
        this.handlerFailed(kind, err)
      }
    }
  }

  listenerCount(kind: keyof E): number {
    return this.handlers.get(kind)?.length ?? 0
  }

  removeAll(): void {
    this.handlers.clear()
  }

  private handlerFailed(kind: keyof E, err: unknown): void {
    this.log?.warn(`event handler threw kind=${String(kind)} err="${errorMessage(err)}"`)
  }
}
