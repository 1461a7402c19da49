import { DgtError } from '../errors.js'
import type { DgtDriverConfig } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers (strict + predictable)                                 */
/* -------------------------------------------------------------------------- */

export function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw == null || raw === '') return fallback
  const n = Number.parseInt(String(raw), 10)
  return Number.isFinite(n) ? n : fallback
}

export function envList(env: NodeJS.ProcessEnv, name: string, fallback: string[] = []): string[] {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return fallback
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

export function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  return Math.max(min, Math.min(max, Math.trunc(n)))
}

/* -------------------------------------------------------------------------- */
/*  Driver config builder                                                      */
/* -------------------------------------------------------------------------- */

export const DEFAULT_CONFIG: DgtDriverConfig = {
  portGlobs: [],
  baudRate: 9600,
  scan: { baseDelayMs: 500, maxDelayMs: 5_000 },
  probeTimeoutMs: 2_000,
  replyTimeoutMs: 5_000,
}

export function buildDgtConfigFromEnv(env: NodeJS.ProcessEnv): DgtDriverConfig {
  const d = DEFAULT_CONFIG
  return {
    portGlobs: envList(env, 'DGT_PORT_GLOBS', d.portGlobs),
    baudRate: clampInt(envInt(env, 'DGT_BAUD', d.baudRate), 300, 2_000_000),
    scan: {
      baseDelayMs: clampInt(envInt(env, 'DGT_SCAN_BASE_DELAY_MS', d.scan.baseDelayMs), 10, 60_000),
      maxDelayMs: clampInt(envInt(env, 'DGT_SCAN_MAX_DELAY_MS', d.scan.maxDelayMs), 10, 300_000),
    },
    probeTimeoutMs: clampInt(envInt(env, 'DGT_PROBE_TIMEOUT_MS', d.probeTimeoutMs), 50, 60_000),
    replyTimeoutMs: clampInt(envInt(env, 'DGT_REPLY_TIMEOUT_MS', d.replyTimeoutMs), 50, 300_000),
  }
}

/* -------------------------------------------------------------------------- */
/*  Misc helpers                                                               */
/* -------------------------------------------------------------------------- */

/** Resolves after `ms`, or rejects with `cancelled` when the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const n = Number.isFinite(ms) ? Math.max(0, ms) : 0
  if (signal?.aborted) return Promise.reject(new DgtError('cancelled', 'sleep cancelled'))

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer)
      reject(new DgtError('cancelled', 'sleep cancelled'))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, n)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export function now(): number {
  return Date.now()
}

/** `min(base * 2^(attempt-1), max)`; attempt counts from 1. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exp = Math.max(0, attempt - 1)
  return Math.min(baseDelayMs * Math.pow(2, exp), maxDelayMs)
}
