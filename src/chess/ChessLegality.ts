/**
 * Legality Filter
 *
 * Apply a candidate on the owned board, ask the attack detector about the
 * mover's king, then undo from a small record. Candidates are processed one
 * at a time: the board is restored before the next one is tried.
 */

import { sameCoord } from './ChessBoard.js';
import { ContractViolation } from './ChessErrors.js';
import { isAttacked } from './ChessAttacks.js';
import { opponentOf } from './types.js';
import type { Cell, Coord, Piece, Position } from './types.js';

/** What a simulated move changed */
export interface UndoRecord {
  from: Coord;
  to: Coord;
  moved: Piece;
  replaced: Cell;
  /** Pawn removed by an en-passant capture */
  epVictim: { at: Coord; piece: Piece } | null;
  kingBefore: Coord | null;
}

/**
 * Square of the pawn an en-passant capture from `from` to `to` would remove,
 * or null when the move is not an en-passant capture in this position.
 */
export function enPassantVictim(position: Position, from: Coord, to: Coord): Coord | null {
  const mover = position.board[from.y][from.x];
  if (!mover || mover.type !== 'p') return null;
  if (from.x === to.x || !sameCoord(to, position.enPassant)) return null;
  if (position.board[to.y][to.x]) return null;

  const victim = position.board[from.y][to.x];
  if (!victim || victim.type !== 'p' || victim.color === mover.color) return null;
  return { x: to.x, y: from.y };
}

/**
 * Move the piece on `from` to `to` in place (no rights, clocks or turn)
 */
export function simulateMove(position: Position, from: Coord, to: Coord): UndoRecord {
  const { board } = position;
  const moved = board[from.y][from.x];
  if (!moved) {
    throw new ContractViolation(`simulateMove: no piece at (${from.x}, ${from.y})`);
  }

  const kingBefore = position.kingCoords[moved.color];
  if (moved.type === 'k') {
    position.kingCoords[moved.color] = { x: to.x, y: to.y };
  }

  let epVictim: UndoRecord['epVictim'] = null;
  const victimAt = enPassantVictim(position, from, to);
  if (victimAt) {
    const piece = board[victimAt.y][victimAt.x];
    if (piece) {
      epVictim = { at: victimAt, piece };
      board[victimAt.y][victimAt.x] = null;
    }
  }

  const replaced = board[to.y][to.x];
  board[to.y][to.x] = moved;
  board[from.y][from.x] = null;

  return { from, to, moved, replaced, epVictim, kingBefore };
}

/** Restore exactly what `simulateMove` changed */
export function revertMove(position: Position, undo: UndoRecord): void {
  const { board } = position;
  board[undo.from.y][undo.from.x] = undo.moved;
  board[undo.to.y][undo.to.x] = undo.replaced;
  if (undo.epVictim) {
    board[undo.epVictim.at.y][undo.epVictim.at.x] = undo.epVictim.piece;
  }
  position.kingCoords[undo.moved.color] = undo.kingBefore;
}

/**
 * Would the mover's king be attacked after moving `from` to `to`?
 */
export function leavesKingAttacked(position: Position, from: Coord, to: Coord): boolean {
  const undo = simulateMove(position, from, to);
  try {
    const king = position.kingCoords[undo.moved.color];
    return king !== null && isAttacked(position.board, king, opponentOf(undo.moved.color));
  } finally {
    revertMove(position, undo);
  }
}

/**
 * Keep only the candidates that do not leave the mover's own king attacked
 */
export function filterLegalMoves(position: Position, from: Coord, candidates: Coord[]): Coord[] {
  const legal: Coord[] = [];
  for (const to of candidates) {
    if (!leavesKingAttacked(position, from, to)) legal.push(to);
  }
  return legal;
}
