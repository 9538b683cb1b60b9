/**
 * GameProtocol - Turn-based game contract
 *
 * What a front end or an agent needs to drive a two-sided board game
 * without knowing its rules: the legal actions, a way to apply one, the
 * outcome, and a JSON form of the position.
 *
 * @module core/GameProtocol
 */

// =============================================================================
// Core Types
// =============================================================================

/** Side identifier; chess uses 'w' and 'b' */
export type PlayerId = string;

/** Outcome of a finished game */
export type GameWinner = PlayerId | 'draw' | null;

/**
 * Action sent to a game; `type` selects how `payload` is read
 */
export interface GameAction {
  type: string;
  payload: unknown;
}

export interface ActionResult {
  /** False when the action was refused; nothing changed in that case */
  valid: boolean;
  error?: string;
  gameEnded?: boolean;
  winner?: GameWinner;
}

/**
 * Summary shared by every game
 */
export interface GameMeta {
  gameType: string;
  /** Full-move number for chess */
  turnNumber: number;
  /** Null once the game is over */
  currentPlayer: PlayerId | null;
  isTerminal: boolean;
  winner: GameWinner;
  lastUpdate: number;
}

export type StateListener<TState> = (state: TState, meta: GameMeta) => void;

// =============================================================================
// Protocol Interface
// =============================================================================

/**
 * @example
 * ```typescript
 * const game: GameProtocol<ChessState, ChessAction> = new ChessProtocol();
 * game.applyAction({ type: 'move', payload: { from: 'e2', to: 'e4' } });
 * ```
 */
export interface GameProtocol<
  TState = unknown,
  TAction extends GameAction = GameAction
> {
  readonly gameType: string;
  readonly displayName: string;
  readonly playerCount: number;

  getState(): TState;
  getMeta(): GameMeta;

  /** JSON text that `deserialize` accepts */
  serialize(): string;
  /** Replace the current position; throws on data it cannot read */
  deserialize(data: string): void;

  getLegalActions(): TAction[];
  isLegalAction(action: TAction): boolean;
  applyAction(action: TAction): ActionResult;

  isGameOver(): boolean;
  getWinner(): GameWinner;
  getCurrentPlayer(): PlayerId | null;
  reset(): void;

  /** Plain-text view for terminals and logs */
  renderAscii(): string;

  onStateChange?(callback: StateListener<TState>): () => void;
}

// =============================================================================
// Registry
// =============================================================================

const protocolRegistry = new Map<string, () => GameProtocol>();

export function registerProtocol(
  gameType: string,
  factory: () => GameProtocol
): void {
  protocolRegistry.set(gameType, factory);
}

/**
 * New game of a registered type, or null for an unknown type
 */
export function createProtocol(gameType: string): GameProtocol | null {
  const factory = protocolRegistry.get(gameType);
  return factory ? factory() : null;
}

export function getRegisteredGameTypes(): string[] {
  return Array.from(protocolRegistry.keys());
}

// =============================================================================
// Base Class
// =============================================================================

/**
 * Listener bookkeeping and a payload-comparing `isLegalAction`;
 * subclasses call `notifyStateChange()` after every accepted change
 */
export abstract class BaseGameProtocol<
  TState = unknown,
  TAction extends GameAction = GameAction
> implements GameProtocol<TState, TAction> {
  abstract readonly gameType: string;
  abstract readonly displayName: string;
  abstract readonly playerCount: number;

  protected stateListeners = new Set<StateListener<TState>>();

  abstract getState(): TState;
  abstract getMeta(): GameMeta;
  abstract serialize(): string;
  abstract deserialize(data: string): void;
  abstract getLegalActions(): TAction[];
  abstract applyAction(action: TAction): ActionResult;
  abstract isGameOver(): boolean;
  abstract getWinner(): GameWinner;
  abstract getCurrentPlayer(): PlayerId | null;
  abstract reset(): void;
  abstract renderAscii(): string;

  isLegalAction(action: TAction): boolean {
    const wanted = JSON.stringify(action.payload);
    return this.getLegalActions().some(
      a => a.type === action.type && JSON.stringify(a.payload) === wanted
    );
  }

  onStateChange(callback: StateListener<TState>): () => void {
    this.stateListeners.add(callback);
    return () => {
      this.stateListeners.delete(callback);
    };
  }

  protected notifyStateChange(): void {
    const state = this.getState();
    const meta = this.getMeta();
    for (const listener of this.stateListeners) {
      listener(state, meta);
    }
  }
}
