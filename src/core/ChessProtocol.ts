/**
 * ChessProtocol - GameProtocol implementation for chess
 *
 * Wraps a ChessEngine so agents and front ends can drive a game through
 * the generic action interface. A pawn that reaches its last rank without a
 * promotion piece leaves the game waiting for a 'promote' action.
 *
 * @module core/ChessProtocol
 */

import { z } from 'zod';
import { ChessEngine } from '../chess/ChessEngine.js';
import type { ChessEngineConfig } from '../chess/ChessConfig.js';
import { isChessRulesError } from '../chess/ChessErrors.js';
import { PROMOTION_TYPES, opponentOf } from '../chess/types.js';
import type { ChessState, Color, MoveOutcome, PromotionType, Square } from '../chess/types.js';
import { renderBoard } from '../ui/BoardRenderer.js';
import { BaseGameProtocol, registerProtocol } from './GameProtocol.js';
import type { ActionResult, GameAction, GameMeta } from './GameProtocol.js';

// =============================================================================
// Types
// =============================================================================

export interface ChessMoveAction extends GameAction {
  type: 'move';
  payload: { from: Square; to: Square; promotion?: PromotionType };
}

export interface ChessPromoteAction extends GameAction {
  type: 'promote';
  payload: { piece: PromotionType };
}

export type ChessAction = ChessMoveAction | ChessPromoteAction;

const SerializedChessSchema = z.object({
  fen: z.string().min(1),
});

// =============================================================================
// ChessProtocol Implementation
// =============================================================================

export class ChessProtocol extends BaseGameProtocol<ChessState, ChessAction> {
  readonly gameType = 'chess';
  readonly displayName = 'Chess';
  readonly playerCount = 2;

  private engine: ChessEngine;
  private readonly config: ChessEngineConfig;

  constructor(config: ChessEngineConfig = {}) {
    super();
    this.config = config;
    this.engine = new ChessEngine(config);
  }

  // ---------------------------------------------------------------------------
  // State Management
  // ---------------------------------------------------------------------------

  getState(): ChessState {
    return this.engine.getState();
  }

  getMeta(): GameMeta {
    const over = this.engine.isGameOver();
    return {
      gameType: this.gameType,
      turnNumber: this.engine.moveNumber(),
      currentPlayer: over ? null : this.engine.turn(),
      isTerminal: over,
      winner: this.getWinner(),
      lastUpdate: Date.now(),
    };
  }

  serialize(): string {
    return JSON.stringify({ fen: this.engine.toFen() });
  }

  /**
   * @throws MalformedFenError or a zod error when the data is not a serialized game
   */
  deserialize(data: string): void {
    const { fen } = SerializedChessSchema.parse(JSON.parse(data));
    this.engine.load(fen);
    this.notifyStateChange();
  }

  /** Direct access for front ends that need board-level queries */
  getEngine(): ChessEngine {
    return this.engine;
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  getLegalActions(): ChessAction[] {
    if (this.engine.getPendingPromotion()) {
      return PROMOTION_TYPES.map((piece): ChessPromoteAction => ({ type: 'promote', payload: { piece } }));
    }
    return this.engine.allLegalMoves().map((move): ChessMoveAction => ({ type: 'move', payload: move }));
  }

  isLegalAction(action: ChessAction): boolean {
    if (action.type === 'promote') {
      return this.engine.getPendingPromotion() !== null &&
        PROMOTION_TYPES.includes(action.payload.piece);
    }
    return this.engine.isLegalMove(action.payload);
  }

  applyAction(action: ChessAction): ActionResult {
    let outcome: MoveOutcome;
    try {
      outcome = action.type === 'promote'
        ? this.engine.promote(action.payload.piece)
        : this.engine.applyMove(action.payload.from, action.payload.to, action.payload.promotion);
    } catch (err) {
      if (isChessRulesError(err)) {
        return { valid: false, error: err.message };
      }
      throw err;
    }

    this.notifyStateChange();

    const gameEnded = outcome.terminal !== 'none';
    return {
      valid: true,
      gameEnded,
      winner: gameEnded ? this.getWinner() : null,
    };
  }

  // ---------------------------------------------------------------------------
  // Game Flow
  // ---------------------------------------------------------------------------

  isGameOver(): boolean {
    return this.engine.isGameOver();
  }

  getWinner(): Color | 'draw' | null {
    switch (this.engine.status()) {
      case 'checkmate':
        return opponentOf(this.engine.turn());
      case 'stalemate':
        return 'draw';
      case 'none':
        return null;
    }
  }

  getCurrentPlayer(): Color | null {
    return this.engine.isGameOver() ? null : this.engine.turn();
  }

  reset(): void {
    this.engine = new ChessEngine(this.config);
    this.notifyStateChange();
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  renderAscii(): string {
    const last = this.engine.getLastMove();
    const lines = [
      renderBoard(this.engine.board(), {
        color: false,
        lastMove: last ? { from: last.from, to: last.to } : null,
      }),
    ];

    const status = this.engine.status();
    const pending = this.engine.getPendingPromotion();
    const side = this.engine.turn() === 'w' ? 'White' : 'Black';
    if (status === 'checkmate') {
      lines.push(`Checkmate! ${this.engine.turn() === 'w' ? 'Black' : 'White'} wins`);
    } else if (status === 'stalemate') {
      lines.push('Stalemate');
    } else if (pending) {
      lines.push(`Promotion pending on ${pending}`);
    } else {
      lines.push(`Turn: ${side}${this.engine.isInCheck() ? ' (check)' : ''}`);
    }

    return lines.join('\n');
  }
}

// =============================================================================
// Register Protocol
// =============================================================================

registerProtocol('chess', () => new ChessProtocol());

// =============================================================================
// Convenience Export
// =============================================================================

export function createChessGame(config?: ChessEngineConfig): ChessProtocol {
  return new ChessProtocol(config);
}
