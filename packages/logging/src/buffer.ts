import type { ClientLog, ClientLogBuffer, ClientLogListener } from './types.js'

const DEFAULT_LIMIT = 500

/**
 * Bounded tail of recent log entries. Subscribers see every push as it
 * happens; `getLatest` serves late joiners.
 */
export function makeClientBuffer(limit: number = Number(process.env.DGT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)): ClientLogBuffer {
    const capacity = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_LIMIT
    const entries: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    return {
        push(log: ClientLog): void {
            entries.push(log)
            if (entries.length > capacity) entries.splice(0, entries.length - capacity)
            for (const listener of [...listeners]) listener(log)
        },
        getLatest(n: number): ClientLog[] {
            return n > 0 ? entries.slice(-n) : []
        },
        subscribe(listener: ClientLogListener): () => void {
            listeners.add(listener)
            return () => {
                listeners.delete(listener)
            }
        },
    }
}
