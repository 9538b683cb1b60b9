/**
 * Perft - leaf-node counting over the legal move tree
 */

import { ChessEngine } from './ChessEngine.js';
import type { ChessEngineConfig } from './ChessConfig.js';
import type { MoveInput } from './types.js';

type PerftOptions = Pick<ChessEngineConfig, 'castleOutOfCheck'>;

/** Long algebraic key for a move, e.g. e2e4 or a7a8q */
export function moveKey(move: MoveInput): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

function countNodes(engine: ChessEngine, depth: number): number {
  if (depth <= 0) return 1;

  const moves = engine.allLegalMoves();
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) {
    engine.applyMove(move.from, move.to, move.promotion);
    nodes += countNodes(engine, depth - 1);
    engine.undo();
  }
  return nodes;
}

/**
 * Count leaf nodes of the legal move tree
 */
export function perft(fen: string, depth: number, options: PerftOptions = {}): number {
  const engine = new ChessEngine({ ...options, initialFen: fen, trackHistory: true });
  return countNodes(engine, depth);
}

/**
 * Divide - Perft with per-move breakdown (empty below depth 1)
 */
export function divide(fen: string, depth: number, options: PerftOptions = {}): Map<string, number> {
  const engine = new ChessEngine({ ...options, initialFen: fen, trackHistory: true });
  const result = new Map<string, number>();
  if (depth <= 0) return result;

  for (const move of engine.allLegalMoves()) {
    engine.applyMove(move.from, move.to, move.promotion);
    result.set(moveKey(move), countNodes(engine, depth - 1));
    engine.undo();
  }

  return result;
}
