import { minimatch } from 'minimatch'
import { SerialPort } from 'serialport'

/** One attached serial device, as seen during a scan. */
export interface PortCandidate {
  path: string
  /** Manufacturer string when the OS reports one, else the path. */
  name: string
  vendor: {
    manufacturer?: string
    vendorId?: string
    productId?: string
    serialNumber?: string
  }
}

/** Raw enumeration entry; mirrors what serialport's list() returns. */
export interface SystemPortInfo {
  path: string
  manufacturer?: string
  vendorId?: string
  productId?: string
  serialNumber?: string
}

/** Enumerates attached serial devices. Knows nothing about DGT. */
export interface PortLister {
  list(): Promise<SystemPortInfo[]>
}

export const serialPortLister: PortLister = {
  list: () => SerialPort.list(),
}

/**
 * Filters attached devices by glob patterns (case-insensitive) against the
 * device path or its descriptive name. An empty pattern list matches nothing.
 */
export class PortScanner {
  constructor(private readonly lister: PortLister = serialPortLister) {}

  async listCandidates(patterns: readonly string[]): Promise<PortCandidate[]> {
    if (patterns.length === 0) return []

    const ports = await this.lister.list()
    return ports
      .filter((p) => typeof p.path === 'string' && p.path.length > 0)
      .map(toCandidate)
      .filter((c) => matchesAny(c, patterns))
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
  }
}

// A pattern without a slash is matched against the last path segment, so
// `*ttyUSB*` selects `/dev/ttyUSB0`.
const GLOB_OPTIONS = { nocase: true, matchBase: true } as const

export function matchesAny(candidate: Pick<PortCandidate, 'path' | 'name'>, patterns: readonly string[]): boolean {
  return patterns.some(
    (pattern) =>
      minimatch(candidate.path, pattern, GLOB_OPTIONS) ||
      minimatch(candidate.name, pattern, GLOB_OPTIONS)
  )
}

function toCandidate(info: SystemPortInfo): PortCandidate {
  const manufacturer = info.manufacturer || undefined
  return {
    path: info.path,
    name: manufacturer ?? info.path,
    vendor: {
      manufacturer,
      vendorId: normalizeHex(info.vendorId),
      productId: normalizeHex(info.productId),
      serialNumber: info.serialNumber || undefined,
    },
  }
}

function normalizeHex(v?: string): string | undefined {
  if (!v) return undefined
  return v.replace(/^0x/i, '').toLowerCase()
}
