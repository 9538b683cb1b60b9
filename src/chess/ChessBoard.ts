/**
 * ChessBoard - 8x8 grid helpers
 *
 * Row 0 is rank 8 (Black's back rank), row 7 is rank 1. Every accessor
 * checks its coordinates and throws a ContractViolation when they fall off
 * the board.
 */

import { ContractViolation } from './ChessErrors.js';
import { FILES } from './types.js';
import type {
  Board,
  Cell,
  Color,
  Coord,
  Piece,
  PieceOnBoard,
  PieceType,
  Square,
  SquareRef,
} from './types.js';

export const BOARD_SIZE = 8;

const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

export function inBounds(x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE;
}

export function assertInBounds(coord: Coord): void {
  if (!inBounds(coord.x, coord.y)) {
    throw new ContractViolation(`Coordinate (${coord.x}, ${coord.y}) is outside the board`);
  }
}

export function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

/**
 * Convert algebraic notation to board coordinates
 */
export function squareToCoord(square: string): Coord {
  if (!isSquare(square)) {
    throw new ContractViolation(`Invalid square: ${square}`);
  }
  return {
    x: square.charCodeAt(0) - 97,
    y: 8 - parseInt(square[1], 10),
  };
}

/**
 * Convert board coordinates to algebraic notation
 */
export function coordToSquare(coord: Coord): Square {
  assertInBounds(coord);
  const name = `${FILES[coord.x]}${8 - coord.y}`;
  if (!isSquare(name)) {
    throw new ContractViolation(`Invalid square: ${name}`);
  }
  return name;
}

/** Normalise either notation to a checked coordinate */
export function toCoord(ref: SquareRef): Coord {
  if (typeof ref === 'string') return squareToCoord(ref);
  assertInBounds(ref);
  return { x: ref.x, y: ref.y };
}

export function sameCoord(a: Coord | null, b: Coord | null): boolean {
  if (!a || !b) return false;
  return a.x === b.x && a.y === b.y;
}

// =============================================================================
// Construction
// =============================================================================

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, (): Cell => null));
}

export function createStartingBoard(): Board {
  const board = createEmptyBoard();
  for (let x = 0; x < BOARD_SIZE; x++) {
    board[0][x] = { type: BACK_RANK[x], color: 'b' };
    board[1][x] = { type: 'p', color: 'b' };
    board[6][x] = { type: 'p', color: 'w' };
    board[7][x] = { type: BACK_RANK[x], color: 'w' };
  }
  return board;
}

export function cloneBoard(board: Board): Board {
  return board.map(row => row.map(cell => (cell ? { ...cell } : null)));
}

// =============================================================================
// Access
// =============================================================================

export function pieceAt(board: Board, coord: Coord): Cell {
  assertInBounds(coord);
  return board[coord.y][coord.x];
}

export function setPiece(board: Board, coord: Coord, piece: Piece): void {
  assertInBounds(coord);
  board[coord.y][coord.x] = { type: piece.type, color: piece.color };
}

export function clearCell(board: Board, coord: Coord): void {
  assertInBounds(coord);
  board[coord.y][coord.x] = null;
}

/** Visit every occupied square, rank 8 first */
export function forEachPiece(board: Board, visit: (piece: Piece, coord: Coord) => void): void {
  for (let y = 0; y < BOARD_SIZE; y++) {
    for (let x = 0; x < BOARD_SIZE; x++) {
      const cell = board[y][x];
      if (cell) visit(cell, { x, y });
    }
  }
}

export function piecesOf(board: Board, color: Color): PieceOnBoard[] {
  const pieces: PieceOnBoard[] = [];
  forEachPiece(board, (piece, coord) => {
    if (piece.color === color) {
      pieces.push({ ...piece, square: coordToSquare(coord) });
    }
  });
  return pieces;
}

/** Row of a color's back rank */
export function homeRow(color: Color): number {
  return color === 'w' ? 7 : 0;
}

/** Row a color's pawns start on */
export function pawnStartRow(color: Color): number {
  return color === 'w' ? 6 : 1;
}

/** Row a color's pawns promote on */
export function promotionRow(color: Color): number {
  return color === 'w' ? 0 : 7;
}
