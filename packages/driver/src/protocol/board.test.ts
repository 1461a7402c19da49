import { Buffer } from 'node:buffer'
import { describe, expect, it } from 'vitest'

import {
  applyFieldUpdate,
  boardFen,
  decodeBoardDump,
  decodeFieldUpdate,
  emptySquares,
  makeBoardState,
  pieceChar,
  renderBoard,
} from './board.js'

// r n b q k b n r / pawns / 4 empty ranks / pawns / R N B Q K B N R
const START = [
  8, 9, 10, 12, 11, 10, 9, 8,
  7, 7, 7, 7, 7, 7, 7, 7,
  ...new Array<number>(32).fill(0),
  1, 1, 1, 1, 1, 1, 1, 1,
  2, 3, 4, 6, 5, 4, 3, 2,
]

describe('board decoding', () => {
  it('decodes a full dump with square 0 as a8', () => {
    const board = decodeBoardDump(Buffer.from(START), 1, 1000)
    expect(board).not.toBeNull()
    expect(board?.squares[0]).toBe(8)
    expect(board?.squares[63]).toBe(2)
    expect(board?.sequence).toBe(1)
    expect(board?.at).toBe(1000)
    expect(board?.fen).toBe('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR')
  })

  it('rejects dumps that are not 64 bytes', () => {
    expect(decodeBoardDump(Buffer.alloc(63), 1)).toBeNull()
  })

  it('produces frozen snapshots', () => {
    const board = makeBoardState(emptySquares(), 0)
    expect(Object.isFrozen(board)).toBe(true)
    expect(Object.isFrozen(board.squares)).toBe(true)
    expect(board.fen).toBe('8/8/8/8/8/8/8/8')
  })

  it('applies a field update without touching the original', () => {
    const before = makeBoardState(START, 1)
    // e2 (square 52) lifted, then the pawn lands on e4 (square 36).
    const lifted = applyFieldUpdate(before, { square: 52, piece: 0 }, 2)
    const placed = applyFieldUpdate(lifted, { square: 36, piece: 1 }, 3)

    expect(before.squares[52]).toBe(1)
    expect(placed.sequence).toBe(3)
    expect(placed.fen).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR')
  })

  it('validates field update payloads', () => {
    expect(decodeFieldUpdate(Buffer.from([36, 1]))).toEqual({ square: 36, piece: 1 })
    expect(decodeFieldUpdate(Buffer.from([64, 1]))).toBeNull()
    expect(decodeFieldUpdate(Buffer.from([36]))).toBeNull()
  })

  it('keeps unknown piece codes opaque', () => {
    const squares = emptySquares()
    squares[0] = 14
    squares[7] = 200
    expect(pieceChar(14)).toBe('?')
    expect(pieceChar(200)).toBe('?')
    expect(boardFen(squares)).toBe('?6?/8/8/8/8/8/8/8')
  })

  it('renders one text row per rank', () => {
    const squares = emptySquares()
    squares[4] = 11
    squares[60] = 5
    const rows = renderBoard(makeBoardState(squares, 0)).split('\n')
    expect(rows).toHaveLength(8)
    expect(rows[0]).toBe('. . . . k . . .')
    expect(rows[7]).toBe('. . . . K . . .')
  })
})
