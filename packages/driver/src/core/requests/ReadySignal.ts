import { DgtError } from '../../errors.js'

export interface WaitOptions {
  /** Absolute deadline, ms since epoch. */
  deadline?: number
  signal?: AbortSignal
}

interface Waiter {
  resolve: () => void
  reject: (err: DgtError) => void
}

/**
 * Level-triggered readiness flag. `wait()` resolves immediately while set,
 * otherwise on the next `set()`. `fail()` is terminal: current and future
 * waiters reject with the given error.
 */
export class ReadySignal {
  private isSet = false
  private failure: DgtError | null = null
  private readonly waiters = new Set<Waiter>()

  get ready(): boolean {
    return this.isSet
  }

  set(): void {
    if (this.failure) return
    this.isSet = true
    const waiting = [...this.waiters]
    this.waiters.clear()
    for (const w of waiting) w.resolve()
  }

  clear(): void {
    this.isSet = false
  }

  fail(err: DgtError): void {
    this.failure = err
    this.isSet = false
    const waiting = [...this.waiters]
    this.waiters.clear()
    for (const w of waiting) w.reject(err)
  }

  wait(opts: WaitOptions = {}): Promise<void> {
    if (this.failure) return Promise.reject(this.failure)
    if (this.isSet) return Promise.resolve()
    if (opts.signal?.aborted) return Promise.reject(new DgtError('cancelled', 'wait for connection cancelled'))

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null

      const cleanup = () => {
        this.waiters.delete(waiter)
        if (timer) clearTimeout(timer)
        opts.signal?.removeEventListener('abort', onAbort)
      }
      const waiter: Waiter = {
        resolve: () => { cleanup(); resolve() },
        reject: (err) => { cleanup(); reject(err) },
      }
      const onAbort = () => waiter.reject(new DgtError('cancelled', 'wait for connection cancelled'))

      if (opts.deadline !== undefined) {
        const ms = Math.max(0, opts.deadline - Date.now())
        timer = setTimeout(() => {
          waiter.reject(new DgtError('timeout', `not connected within ${ms} ms`, { timeoutMs: ms }))
        }, ms)
      }
      opts.signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.add(waiter)
    })
  }
}
