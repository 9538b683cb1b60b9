/**
 * Terminal-State Detector
 */

import { forEachPiece } from './ChessBoard.js';
import { generateMoves, isKingInCheck } from './ChessMoveGen.js';
import type { MoveGenOptions } from './ChessMoveGen.js';
import type { Color, Coord, Position, TerminalState } from './types.js';

/**
 * Whether any piece of `color` has at least one legal move
 */
export function hasLegalMove(position: Position, color: Color, options: MoveGenOptions = {}): boolean {
  const owned: Coord[] = [];
  forEachPiece(position.board, (piece, coord) => {
    if (piece.color === color) owned.push(coord);
  });
  return owned.some(coord => generateMoves(position, coord, options).length > 0);
}

/**
 * Checkmate or stalemate when the side to move has no legal move at all
 */
export function classifyPosition(position: Position, options: MoveGenOptions = {}): TerminalState {
  if (hasLegalMove(position, position.turn, options)) return 'none';
  return isKingInCheck(position, position.turn) ? 'checkmate' : 'stalemate';
}
