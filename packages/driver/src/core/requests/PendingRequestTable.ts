import { DgtError } from '../../errors.js'
import type { CorrelationKey, Frame } from '../../protocol/frame.js'

export interface PendingHandle {
  readonly key: CorrelationKey
  /** Absolute deadline, ms since epoch. */
  readonly deadline: number
  /** Settles with the reply frame, or a `timeout` / `cancelled` / `connection-lost` DgtError. */
  readonly reply: Promise<Frame>
  /** Drop the entry and reject its reply. No effect once settled. */
  cancel(reason?: DgtError): void
}

export interface RegisterOptions {
  timeoutMs: number
  signal?: AbortSignal
}

interface Entry {
  key: CorrelationKey
  resolve: (frame: Frame) => void
  reject: (err: DgtError) => void
  timer: NodeJS.Timeout
  detachAbort: () => void
}

/**
 * Correlates outstanding commands with their replies.
 *
 * Keys are unique at any instant; registering a live key fails fast.
 * Every entry leaves the table exactly once: on reply, timeout, cancel or
 * the final sweep when the owning session dies.
 */
export class PendingRequestTable {
  private readonly entries = new Map<CorrelationKey, Entry>()

  get size(): number {
    return this.entries.size
  }

  has(key: CorrelationKey): boolean {
    return this.entries.has(key)
  }

  keys(): CorrelationKey[] {
    return [...this.entries.keys()]
  }

  register(key: CorrelationKey, opts: RegisterOptions): PendingHandle {
    if (this.entries.has(key)) {
      throw new DgtError('duplicate-request', `request already pending key=${key}`, { key })
    }
    if (opts.signal?.aborted) {
      throw new DgtError('cancelled', `request cancelled key=${key}`, { key })
    }

    const timeoutMs = Math.max(0, opts.timeoutMs)
    const deadline = Date.now() + timeoutMs

    let resolve!: (frame: Frame) => void
    let reject!: (err: DgtError) => void
    const reply = new Promise<Frame>((res, rej) => {
      resolve = res
      reject = rej
    })

    const timer = setTimeout(() => {
      this.settle(key, new DgtError('timeout', `no reply within ${timeoutMs} ms key=${key}`, { key, timeoutMs }))
    }, timeoutMs)

    const signal = opts.signal
    const onAbort = () => {
      this.settle(key, new DgtError('cancelled', `request cancelled key=${key}`, { key }))
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    const entry: Entry = {
      key,
      resolve,
      reject,
      timer,
      detachAbort: () => signal?.removeEventListener('abort', onAbort),
    }
    this.entries.set(key, entry)

    return {
      key,
      deadline,
      reply,
      cancel: (reason?: DgtError) => {
        this.settle(key, reason ?? new DgtError('cancelled', `request cancelled key=${key}`, { key }), entry)
      },
    }
  }

  /** Fulfil the entry for `key`. Returns false when nothing was waiting. */
  resolve(key: CorrelationKey, frame: Frame): boolean {
    const entry = this.take(key)
    if (!entry) return false
    entry.resolve(frame)
    return true
  }

  /** Reject every outstanding entry; returns how many were failed. */
  failAll(err: DgtError): number {
    const all = [...this.entries.values()]
    for (const entry of all) {
      this.take(entry.key)
      entry.reject(err)
    }
    return all.length
  }

  private settle(key: CorrelationKey, err: DgtError, expected?: Entry): void {
    // A handle only cancels its own entry, never a later one reusing the key.
    if (expected && this.entries.get(key) !== expected) return
    const entry = this.take(key)
    if (entry) entry.reject(err)
  }

  private take(key: CorrelationKey): Entry | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    this.entries.delete(key)
    clearTimeout(entry.timer)
    entry.detachAbort()
    return entry
  }
}
