/**
 * Direction Catalog
 *
 * The 16 step vectors shared by move generation, attack detection and pin
 * detection. `dy` grows toward rank 1, so White pawns step `U`.
 */

import type {
  Color,
  Coord,
  Direction,
  KnightDirection,
  LineDirection,
  Piece,
  PieceType,
} from './types.js';

export interface Step {
  readonly dx: number;
  readonly dy: number;
}

const STEPS: Readonly<Record<Direction, Step>> = {
  U: { dx: 0, dy: -1 },
  D: { dx: 0, dy: 1 },
  R: { dx: 1, dy: 0 },
  L: { dx: -1, dy: 0 },
  UR: { dx: 1, dy: -1 },
  UL: { dx: -1, dy: -1 },
  DR: { dx: 1, dy: 1 },
  DL: { dx: -1, dy: 1 },
  RRU: { dx: 2, dy: -1 },
  RUU: { dx: 1, dy: -2 },
  RRD: { dx: 2, dy: 1 },
  RDD: { dx: 1, dy: 2 },
  LLU: { dx: -2, dy: -1 },
  LUU: { dx: -1, dy: -2 },
  LLD: { dx: -2, dy: 1 },
  LDD: { dx: -1, dy: 2 },
};

export const ORTHOGONAL: readonly LineDirection[] = ['U', 'D', 'L', 'R'];
export const DIAGONAL: readonly LineDirection[] = ['UL', 'UR', 'DL', 'DR'];
export const LINE_DIRECTIONS: readonly LineDirection[] = [...ORTHOGONAL, ...DIAGONAL];
export const KNIGHT_DIRECTIONS: readonly KnightDirection[] = [
  'RRU', 'RUU', 'RRD', 'RDD', 'LLU', 'LUU', 'LLD', 'LDD',
];

/** All 16 directions; every ray query visits each exactly once */
export const DIRECTIONS: readonly Direction[] = [...LINE_DIRECTIONS, ...KNIGHT_DIRECTIONS];

const OPPOSITE: Readonly<Record<LineDirection, LineDirection>> = {
  U: 'D',
  D: 'U',
  L: 'R',
  R: 'L',
  UL: 'DR',
  DR: 'UL',
  UR: 'DL',
  DL: 'UR',
};

export function stepOf(direction: Direction): Step {
  return STEPS[direction];
}

export function opposite(direction: LineDirection): LineDirection {
  return OPPOSITE[direction];
}

/**
 * Line direction leading from `from` to `to`, or null when the two squares
 * do not share a rank, file or diagonal (or are the same square).
 */
export function directionBetween(from: Coord, to: Coord): LineDirection | null {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (dx === 0 && dy === 0) return null;
  if (dx !== 0 && dy !== 0 && Math.abs(dx) !== Math.abs(dy)) return null;

  const sx = Math.sign(dx);
  const sy = Math.sign(dy);
  return LINE_DIRECTIONS.find(d => STEPS[d].dx === sx && STEPS[d].dy === sy) ?? null;
}

// =============================================================================
// Move sets
// =============================================================================

const WHITE_PAWN: readonly Direction[] = ['U', 'UL', 'UR'];
const BLACK_PAWN: readonly Direction[] = ['D', 'DL', 'DR'];

const MOVE_SETS: Readonly<Record<Exclude<PieceType, 'p'>, readonly Direction[]>> = {
  k: LINE_DIRECTIONS,
  q: LINE_DIRECTIONS,
  r: ORTHOGONAL,
  b: DIAGONAL,
  n: KNIGHT_DIRECTIONS,
};

/** Directions a piece may step along; the pawn's set depends on its color */
export function moveSetOf(piece: Piece): readonly Direction[] {
  switch (piece.type) {
    case 'p':
      return pawnMoveSet(piece.color);
    case 'k':
    case 'q':
    case 'r':
    case 'b':
    case 'n':
      return MOVE_SETS[piece.type];
  }
}

export function pawnMoveSet(color: Color): readonly Direction[] {
  return color === 'w' ? WHITE_PAWN : BLACK_PAWN;
}

export function hasMove(piece: Piece, direction: Direction): boolean {
  return moveSetOf(piece).includes(direction);
}
