/**
 * Attack and pin detection by ray-casting along the Direction Catalog.
 *
 * Both functions only read the board. Each direction's ray is independent
 * of the others, so the attack query stops at the first direction that
 * finds an attacker.
 */

import { inBounds, sameCoord } from './ChessBoard.js';
import { DIRECTIONS, directionBetween, hasMove, opposite, stepOf } from './ChessDirections.js';
import type { Board, Color, Coord, Direction, PinAxis } from './types.js';

/** Longest ray on an 8x8 board */
const MAX_RAY = 7;

/**
 * Check if a square is attacked by a color
 * @param board - Board to read
 * @param target - Square under test
 * @param bySide - Attacking color
 */
export function isAttacked(board: Board, target: Coord, bySide: Color): boolean {
  return DIRECTIONS.some(direction => rayFindsAttacker(board, target, direction, bySide));
}

function rayFindsAttacker(board: Board, target: Coord, direction: Direction, bySide: Color): boolean {
  const { dx, dy } = stepOf(direction);
  let x = target.x;
  let y = target.y;

  for (let i = 0; i < MAX_RAY; i++) {
    x += dx;
    y += dy;
    if (!inBounds(x, y)) return false;

    const cell = board[y][x];
    if (!cell) continue;
    // A defender blocks the ray
    if (cell.color !== bySide) return false;

    switch (cell.type) {
      case 'k':
      case 'n':
        return i === 0 && hasMove(cell, direction);
      case 'p':
        // Seen from the target, a white pawn sits below it and a black pawn above
        if (i > 0) return false;
        return bySide === 'w'
          ? direction === 'DL' || direction === 'DR'
          : direction === 'UL' || direction === 'UR';
      case 'q':
      case 'r':
      case 'b':
        return hasMove(cell, direction);
    }
  }
  return false;
}

/**
 * Determine whether the piece on `pieceSquare` is pinned to its own king.
 *
 * @returns The two-direction axis the piece is restricted to, or null
 */
export function checkForPin(board: Board, pieceSquare: Coord, kingSquare: Coord | null): PinAxis | null {
  if (!kingSquare || !inBounds(pieceSquare.x, pieceSquare.y)) return null;

  const piece = board[pieceSquare.y][pieceSquare.x];
  if (!piece || piece.type === 'k') return null;

  const towardKing = directionBetween(pieceSquare, kingSquare);
  if (!towardKing) return null;

  // Only empty squares may separate the piece from its king
  let step = stepOf(towardKing);
  let x = pieceSquare.x;
  let y = pieceSquare.y;
  for (;;) {
    x += step.dx;
    y += step.dy;
    if (!inBounds(x, y)) return null;
    const cell = board[y][x];
    if (!cell) continue;
    if (sameCoord({ x, y }, kingSquare) && cell.type === 'k' && cell.color === piece.color) break;
    return null;
  }

  // Behind the piece, the first occupant must be an enemy slider on this line
  const awayFromKing = opposite(towardKing);
  step = stepOf(awayFromKing);
  x = pieceSquare.x;
  y = pieceSquare.y;
  for (;;) {
    x += step.dx;
    y += step.dy;
    if (!inBounds(x, y)) return null;
    const cell = board[y][x];
    if (!cell) continue;
    if (cell.color === piece.color) return null;
    if ((cell.type === 'q' || cell.type === 'r' || cell.type === 'b') && hasMove(cell, awayFromKing)) {
      return [towardKing, awayFromKing];
    }
    return null;
  }
}
