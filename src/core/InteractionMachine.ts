/**
 * InteractionMachine - Front-end mode transitions
 *
 * Pure state machine for a board front end: selecting pieces, answering a
 * promotion prompt and editing the board. Events are built from engine
 * results (legal targets, MoveOutcome), so the machine itself never touches
 * a game. Event/state pairs with no transition return the state unchanged.
 *
 * @module core/InteractionMachine
 */

import type { MoveOutcome, PieceType, Square } from '../chess/types.js';

// =============================================================================
// Types
// =============================================================================

export type InteractionState =
  | { mode: 'gameplay'; selected: Square | null; targets: Square[] }
  | { mode: 'editBoard' }
  | { mode: 'chooseColour'; piece: PieceType }
  | { mode: 'promotePawn'; square: Square }
  | { mode: 'exitGame' };

export type InteractionMode = InteractionState['mode'];

export type InteractionEvent =
  | { type: 'select'; square: Square; targets: Square[] }
  | { type: 'deselect' }
  | { type: 'moveApplied'; to: Square; outcome: MoveOutcome }
  | { type: 'promoted'; outcome: MoveOutcome }
  | { type: 'enterEdit' }
  | { type: 'leaveEdit' }
  | { type: 'pickPiece'; piece: PieceType }
  | { type: 'piecePlaced' }
  | { type: 'quit' };

// =============================================================================
// Transitions
// =============================================================================

export function initialInteractionState(): InteractionState {
  return { mode: 'gameplay', selected: null, targets: [] };
}

export function transition(state: InteractionState, event: InteractionEvent): InteractionState {
  if (event.type === 'quit') {
    return state.mode === 'exitGame' ? state : { mode: 'exitGame' };
  }

  switch (state.mode) {
    case 'gameplay':
      switch (event.type) {
        case 'select':
          return { mode: 'gameplay', selected: event.square, targets: [...event.targets] };
        case 'deselect':
          return initialInteractionState();
        case 'moveApplied':
          return event.outcome.pendingPromotion
            ? { mode: 'promotePawn', square: event.to }
            : initialInteractionState();
        case 'enterEdit':
          return { mode: 'editBoard' };
        default:
          return state;
      }

    case 'promotePawn':
      return event.type === 'promoted' ? initialInteractionState() : state;

    case 'editBoard':
      switch (event.type) {
        case 'pickPiece':
          return { mode: 'chooseColour', piece: event.piece };
        case 'leaveEdit':
          return initialInteractionState();
        default:
          return state;
      }

    case 'chooseColour':
      // Leaving the colour prompt goes back to the edit palette
      if (event.type === 'piecePlaced' || event.type === 'leaveEdit') {
        return { mode: 'editBoard' };
      }
      return state;

    case 'exitGame':
      return state;
  }
}

/**
 * Fold a sequence of events from the initial state
 */
export function replay(events: readonly InteractionEvent[], from: InteractionState = initialInteractionState()): InteractionState {
  return events.reduce(transition, from);
}
