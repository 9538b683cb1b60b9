/**
 * Move Generator
 *
 * Produces the destination squares for the piece on a square. Pseudo-legal
 * candidates are narrowed by the pin detector first; the legality filter
 * runs when the mover is in check, for every king move, and for en-passant
 * captures (which clear two squares of one rank at once).
 */

import { checkForPin, isAttacked } from './ChessAttacks.js';
import { homeRow, inBounds, pawnStartRow, pieceAt } from './ChessBoard.js';
import { moveSetOf, pawnMoveSet, stepOf } from './ChessDirections.js';
import { enPassantVictim, filterLegalMoves, leavesKingAttacked } from './ChessLegality.js';
import { opponentOf } from './types.js';
import type { Board, Color, Coord, Direction, Piece, PinAxis, Position } from './types.js';

export interface MoveGenOptions {
  /** Allow castling while the king stands in check */
  castleOutOfCheck?: boolean;
}

const MAX_RAY = 7;

/**
 * Legal destinations for the piece on `from`, generated for that piece's color
 */
export function generateMoves(position: Position, from: Coord, options: MoveGenOptions = {}): Coord[] {
  const piece = pieceAt(position.board, from);
  if (!piece) return [];

  const inCheck = isKingInCheck(position, piece.color);

  switch (piece.type) {
    case 'p':
      return pawnMoves(position, from, piece, inCheck);
    case 'n':
      return knightMoves(position, from, piece, inCheck);
    case 'k':
      return kingMoves(position, from, piece, inCheck, options);
    case 'q':
    case 'r':
    case 'b':
      return slidingMoves(position, from, piece, inCheck);
  }
}

export function isKingInCheck(position: Position, color: Color): boolean {
  const king = position.kingCoords[color];
  return king !== null && isAttacked(position.board, king, opponentOf(color));
}

function restrictToPin(directions: readonly Direction[], pin: PinAxis | null): readonly Direction[] {
  if (!pin) return directions;
  return directions.filter(d => pin.some(p => p === d));
}

function pawnMoves(position: Position, from: Coord, pawn: Piece, inCheck: boolean): Coord[] {
  const { board } = position;
  const pin = checkForPin(board, from, position.kingCoords[pawn.color]);
  const directions = restrictToPin(pawnMoveSet(pawn.color), pin);

  const moves: Coord[] = [];
  const enPassant: Coord[] = [];

  for (const direction of directions) {
    const { dx, dy } = stepOf(direction);
    const x = from.x + dx;
    const y = from.y + dy;
    if (!inBounds(x, y)) continue;
    const target = board[y][x];

    if (dx === 0) {
      if (target) continue;
      moves.push({ x, y });
      // Double step from the starting rank, both squares empty
      const y2 = y + dy;
      if (from.y === pawnStartRow(pawn.color) && inBounds(x, y2) && !board[y2][x]) {
        moves.push({ x, y: y2 });
      }
      continue;
    }

    if (target) {
      if (target.color !== pawn.color) moves.push({ x, y });
    } else if (enPassantVictim(position, from, { x, y })) {
      enPassant.push({ x, y });
    }
  }

  if (inCheck) {
    return filterLegalMoves(position, from, [...moves, ...enPassant]);
  }
  return [...moves, ...enPassant.filter(to => !leavesKingAttacked(position, from, to))];
}

function knightMoves(position: Position, from: Coord, knight: Piece, inCheck: boolean): Coord[] {
  // A knight never moves along the line through its king
  if (checkForPin(position.board, from, position.kingCoords[knight.color])) return [];

  const moves = steppingMoves(position.board, from, knight);
  return inCheck ? filterLegalMoves(position, from, moves) : moves;
}

function kingMoves(
  position: Position,
  from: Coord,
  king: Piece,
  inCheck: boolean,
  options: MoveGenOptions,
): Coord[] {
  const moves = filterLegalMoves(position, from, steppingMoves(position.board, from, king));
  return [...moves, ...castlingMoves(position, from, king.color, inCheck, options)];
}

function slidingMoves(position: Position, from: Coord, piece: Piece, inCheck: boolean): Coord[] {
  const { board } = position;
  const pin = checkForPin(board, from, position.kingCoords[piece.color]);
  const moves: Coord[] = [];

  for (const direction of restrictToPin(moveSetOf(piece), pin)) {
    const { dx, dy } = stepOf(direction);
    let x = from.x;
    let y = from.y;
    for (let i = 0; i < MAX_RAY; i++) {
      x += dx;
      y += dy;
      if (!inBounds(x, y)) break;
      const target = board[y][x];
      if (target && target.color === piece.color) break;
      moves.push({ x, y });
      if (target) break;
    }
  }

  return inCheck ? filterLegalMoves(position, from, moves) : moves;
}

/** One step along each direction of the move set (king and knight) */
function steppingMoves(board: Board, from: Coord, piece: Piece): Coord[] {
  const moves: Coord[] = [];
  for (const direction of moveSetOf(piece)) {
    const { dx, dy } = stepOf(direction);
    const x = from.x + dx;
    const y = from.y + dy;
    if (!inBounds(x, y)) continue;
    const target = board[y][x];
    if (target && target.color === piece.color) continue;
    moves.push({ x, y });
  }
  return moves;
}

// =============================================================================
// Castling
// =============================================================================

/** King and rook files for the two castlings */
export const CASTLING_FILES = {
  king: 4,
  kingSide: { rook: 7, kingTo: 6, rookTo: 5, between: [5, 6] },
  queenSide: { rook: 0, kingTo: 2, rookTo: 3, between: [3, 2, 1] },
} as const;

function castlingMoves(
  position: Position,
  from: Coord,
  color: Color,
  inCheck: boolean,
  options: MoveGenOptions,
): Coord[] {
  if (inCheck && !options.castleOutOfCheck) return [];

  const row = homeRow(color);
  if (from.y !== row || from.x !== CASTLING_FILES.king) return [];

  const rights = position.castling[color];
  const moves: Coord[] = [];

  if (rights.kingSide && canCastleThrough(position.board, row, color, CASTLING_FILES.kingSide)) {
    moves.push({ x: CASTLING_FILES.kingSide.kingTo, y: row });
  }
  if (rights.queenSide && canCastleThrough(position.board, row, color, CASTLING_FILES.queenSide)) {
    moves.push({ x: CASTLING_FILES.queenSide.kingTo, y: row });
  }
  return moves;
}

function canCastleThrough(
  board: Board,
  row: number,
  color: Color,
  side: { rook: number; between: readonly number[] },
): boolean {
  const rook = board[row][side.rook];
  if (!rook || rook.type !== 'r' || rook.color !== color) return false;

  const enemy = opponentOf(color);
  return side.between.every(x => !board[row][x] && !isAttacked(board, { x, y: row }, enemy));
}
