import { Buffer } from 'node:buffer'

import { EMPTY, PIECE_CHARS, PayloadSize } from './constants.js'

export type PieceCode = number

/**
 * Immutable occupancy snapshot. `squares[0]` is a8, `squares[7]` h8,
 * `squares[63]` h1 (rank 8 first, files a..h within a rank).
 */
export interface BoardState {
  readonly squares: readonly PieceCode[]
  /** Per-session monotonic counter; the device does not number its updates. */
  readonly sequence: number
  /** Decode time, ms since epoch. */
  readonly at: number
  /** Occupancy-only FEN placement field, e.g. `rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR`. */
  readonly fen: string
}

export const SQUARE_COUNT = 64

export function emptySquares(): PieceCode[] {
  return new Array<PieceCode>(SQUARE_COUNT).fill(EMPTY)
}

export function makeBoardState(squares: readonly PieceCode[], sequence: number, at: number = Date.now()): BoardState {
  if (squares.length !== SQUARE_COUNT) {
    throw new RangeError(`board needs ${SQUARE_COUNT} squares, got ${squares.length}`)
  }
  const copy = Object.freeze([...squares])
  return Object.freeze({ squares: copy, sequence, at, fen: boardFen(copy) })
}

/** Decode a BOARD_DUMP payload. Returns null when the payload is not 64 bytes. */
export function decodeBoardDump(payload: Buffer, sequence: number, at?: number): BoardState | null {
  if (payload.length !== PayloadSize.BOARD_DUMP) return null
  return makeBoardState([...payload], sequence, at)
}

export interface FieldUpdate {
  square: number
  piece: PieceCode
}

/** Decode a FIELD_UPDATE payload: `[square, piece]`. */
export function decodeFieldUpdate(payload: Buffer): FieldUpdate | null {
  if (payload.length !== PayloadSize.FIELD_UPDATE) return null
  const square = payload[0]
  if (square >= SQUARE_COUNT) return null
  return { square, piece: payload[1] }
}

export function applyFieldUpdate(board: BoardState, update: FieldUpdate, sequence: number, at?: number): BoardState {
  const next = [...board.squares]
  next[update.square] = update.piece
  return makeBoardState(next, sequence, at)
}

export function pieceChar(code: PieceCode): string | null {
  if (code === EMPTY) return null
  return PIECE_CHARS[code] ?? '?'
}

/** FEN placement field built from occupancy alone, rank 8 to rank 1. */
export function boardFen(squares: readonly PieceCode[]): string {
  const ranks: string[] = []
  for (let rank = 0; rank < 8; rank++) {
    let row = ''
    let empty = 0
    for (let file = 0; file < 8; file++) {
      const ch = pieceChar(squares[rank * 8 + file] ?? EMPTY)
      if (ch === null) {
        empty++
        continue
      }
      if (empty > 0) {
        row += String(empty)
        empty = 0
      }
      row += ch
    }
    if (empty > 0) row += String(empty)
    ranks.push(row)
  }
  return ranks.join('/')
}

/** Eight text rows, `.` for empty squares, rank 8 first. */
export function renderBoard(board: BoardState): string {
  const rows: string[] = []
  for (let rank = 0; rank < 8; rank++) {
    const cells: string[] = []
    for (let file = 0; file < 8; file++) {
      cells.push(pieceChar(board.squares[rank * 8 + file] ?? EMPTY) ?? '.')
    }
    rows.push(cells.join(' '))
  }
  return rows.join('\n')
}

export function encodeBoardDump(squares: readonly PieceCode[]): Buffer {
  return Buffer.from(squares)
}
