/**
 * Chess Engine Tests
 *
 * Game-level behavior of ChessEngine:
 * - Move application and the FEN it produces
 * - En passant, castling and castling rights
 * - Promotion hand-off
 * - Check, checkmate and stalemate reporting
 * - Selection errors, board editing, history and undo
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { resolveConfig } from '../src/chess/ChessConfig.js';
import { ChessEngine, createChessEngine } from '../src/chess/ChessEngine.js';
import {
  ChessConfigError,
  ContractViolation,
  IllegalSelectionError,
  MalformedFenError,
} from '../src/chess/ChessErrors.js';
import { STARTING_FEN } from '../src/chess/types.js';

const sorted = (squares: string[]): string[] => [...squares].sort();

// =============================================================================
// Move Application
// =============================================================================

describe('ChessEngine', () => {
  let engine: ChessEngine;

  beforeEach(() => {
    engine = createChessEngine();
  });

  describe('Opening moves', () => {
    it('should start from the standard position', () => {
      expect(engine.toFen()).toBe(STARTING_FEN);
      expect(engine.turn()).toBe('w');
      expect(engine.allLegalMoves()).toHaveLength(20);
      expect(engine.getKingSquare('w')).toBe('e1');
      expect(engine.getKingSquare('b')).toBe('e8');
    });

    it('should list destinations for a selected piece', () => {
      expect(engine.legalTargets('e2')).toEqual(['e3', 'e4']);
      expect(engine.legalMoves('g1')).toEqual(expect.arrayContaining([{ x: 5, y: 5 }, { x: 7, y: 5 }]));
    });

    it('should apply a double step and record the en-passant square', () => {
      const outcome = engine.applyMove('e2', 'e4');
      expect(outcome).toEqual({ checkFlag: false, terminal: 'none', pendingPromotion: false });
      expect(engine.toFen()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
      expect(engine.getEnPassantSquare()).toBe('e3');
    });

    it('should track both clocks', () => {
      engine.applyMove('e2', 'e4');
      engine.applyMove('e7', 'e5');
      expect(engine.toFen()).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq e6 0 2');

      engine.applyMove('g1', 'f3');
      expect(engine.toFen()).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2');

      engine.applyMove('b8', 'c6');
      expect(engine.toFen()).toBe('r1bqkbnr/pppp1ppp/2n5/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R w KQkq - 2 3');
      expect(engine.halfMoveClock()).toBe(2);
      expect(engine.moveNumber()).toBe(3);
    });

    it('should accept coordinates as well as square names', () => {
      engine.applyMove({ x: 4, y: 6 }, { x: 4, y: 4 });
      expect(engine.getSquare('e4')).toEqual({ type: 'p', color: 'w' });
      expect(engine.getSquare({ x: 4, y: 6 })).toBeNull();
    });
  });

  // ===========================================================================
  // Selection Errors
  // ===========================================================================

  describe('Selection errors', () => {
    it('should reject an empty square', () => {
      expect(() => engine.legalMoves('e4')).toThrowError(IllegalSelectionError);
      expect(() => engine.legalMoves('e4')).toThrowError('No piece on e4');
    });

    it('should reject the side not to move', () => {
      expect(() => engine.legalMoves('e7')).toThrowError(IllegalSelectionError);
    });

    it('should reject an illegal destination without changing anything', () => {
      expect(() => engine.applyMove('e2', 'e5')).toThrowError('e2-e5 is not a legal move');
      expect(engine.toFen()).toBe(STARTING_FEN);
    });

    it('should treat off-board coordinates as a contract violation', () => {
      expect(() => engine.legalMoves({ x: 8, y: 0 })).toThrowError(ContractViolation);
      expect(() => engine.getSquare({ x: 0, y: -1 })).toThrowError(ContractViolation);
    });

    it('should report legality without throwing', () => {
      expect(engine.isLegalMove({ from: 'e2', to: 'e4' })).toBe(true);
      expect(engine.isLegalMove({ from: 'e2', to: 'e5' })).toBe(false);
      expect(engine.isLegalMove({ from: 'e4', to: 'e5' })).toBe(false);
      expect(engine.isLegalMove({ from: 'e7', to: 'e5' })).toBe(false);
    });
  });

  // ===========================================================================
  // En Passant
  // ===========================================================================

  describe('En passant', () => {
    it('should capture the pawn beside the capturing pawn', () => {
      engine.load('4k3/3p4/8/4P3/8/8/8/4K3 b - - 0 1');
      engine.applyMove('d7', 'd5');
      expect(engine.toFen()).toBe('4k3/8/8/3pP3/8/8/8/4K3 w - d6 0 2');
      expect(sorted(engine.legalTargets('e5'))).toEqual(['d6', 'e6']);

      engine.applyMove('e5', 'd6');
      expect(engine.toFen()).toBe('4k3/8/3P4/8/8/8/8/4K3 b - - 0 2');
      expect(engine.getSquare('d5')).toBeNull();

      const last = engine.getLastMove();
      expect(last?.enPassant).toBe(true);
      expect(last?.captured).toBe('p');
    });

    it('should expire the en-passant square after one move', () => {
      engine.load('4k3/3p4/8/4P3/8/8/8/4K3 b - - 0 1');
      engine.applyMove('d7', 'd5');
      engine.applyMove('e1', 'e2');
      engine.applyMove('e8', 'e7');
      expect(engine.getEnPassantSquare()).toBeNull();
      expect(engine.legalTargets('e5')).toEqual(['e6']);
    });
  });

  // ===========================================================================
  // Castling
  // ===========================================================================

  describe('Castling', () => {
    const CASTLING_FEN = 'r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1';

    it('should offer both castlings when the path is clear', () => {
      engine.load(CASTLING_FEN);
      expect(sorted(engine.legalTargets('e1'))).toEqual(['c1', 'd1', 'd2', 'e2', 'f1', 'f2', 'g1']);
    });

    it('should move the rook with the king and clear both rights', () => {
      engine.load(CASTLING_FEN);
      engine.applyMove('e1', 'g1');
      expect(engine.toFen()).toBe('r3k2r/8/8/8/8/8/8/R4RK1 b kq - 1 1');
      expect(engine.getLastMove()?.castle).toBe('k');

      engine.applyMove('e8', 'c8');
      expect(engine.toFen()).toBe('2kr3r/8/8/8/8/8/8/R4RK1 w - - 2 2');
      expect(engine.getLastMove()?.castle).toBe('q');
    });

    it('should not castle through an attacked square', () => {
      engine.load('r3kr2/8/8/8/8/8/8/R3K2R w KQq - 0 1');
      expect(sorted(engine.legalTargets('e1'))).toEqual(['c1', 'd1', 'd2', 'e2']);
    });

    it('should need the b-file square unattacked for queenside castling as well', () => {
      engine.load('1r2k3/8/8/8/8/8/8/R3K3 w Q - 0 1');
      expect(engine.legalTargets('e1')).not.toContain('c1');
    });

    it('should not castle without the rook on its corner', () => {
      engine.load('4k3/8/8/8/8/8/8/4K3 w KQ - 0 1');
      expect(sorted(engine.legalTargets('e1'))).toEqual(['d1', 'd2', 'e2', 'f1', 'f2']);
    });

    it('should clear a right when its rook moves', () => {
      engine.load(CASTLING_FEN);
      engine.applyMove('h1', 'h5');
      expect(engine.getCastlingRights()).toEqual({
        w: { kingSide: false, queenSide: true },
        b: { kingSide: true, queenSide: true },
      });
    });

    it('should clear the opponent\'s right when its rook is captured on the corner', () => {
      engine.load(CASTLING_FEN);
      const outcome = engine.applyMove('a1', 'a8');
      expect(outcome).toEqual({ checkFlag: true, terminal: 'none', pendingPromotion: false });
      expect(engine.toFen()).toBe('R3k2r/8/8/8/8/8/8/4K2R b Kk - 0 1');
    });

    describe('while in check', () => {
      const CHECKED_FEN = 'k3r3/8/8/8/8/8/8/4K2R w K - 0 1';

      it('should refuse to castle out of check by default', () => {
        engine.load(CHECKED_FEN);
        expect(engine.isInCheck()).toBe(true);
        expect(sorted(engine.legalTargets('e1'))).toEqual(['d1', 'd2', 'f1', 'f2']);
      });

      it('should castle out of check when configured to', () => {
        const lenient = new ChessEngine({ initialFen: CHECKED_FEN, castleOutOfCheck: true });
        expect(sorted(lenient.legalTargets('e1'))).toEqual(['d1', 'd2', 'f1', 'f2', 'g1']);

        lenient.applyMove('e1', 'g1');
        expect(lenient.toFen()).toBe('k3r3/8/8/8/8/8/8/5RK1 b - - 1 1');
      });
    });
  });

  // ===========================================================================
  // Promotion
  // ===========================================================================

  describe('Promotion', () => {
    const PROMOTION_FEN = '8/4P3/8/8/k7/8/8/4K3 w - - 0 1';

    beforeEach(() => {
      engine.load(PROMOTION_FEN);
    });

    it('should hold the turn until a piece is chosen', () => {
      const outcome = engine.applyMove('e7', 'e8');
      expect(outcome).toEqual({ checkFlag: false, terminal: 'none', pendingPromotion: true });
      expect(engine.turn()).toBe('w');
      expect(engine.getPendingPromotion()).toBe('e8');
      expect(engine.allLegalMoves()).toEqual([]);
      expect(() => engine.legalMoves('e1')).toThrowError('Promotion on e8 is pending');
    });

    it('should finish the move with the chosen piece', () => {
      engine.applyMove('e7', 'e8');
      const outcome = engine.promote('q');
      expect(outcome).toEqual({ checkFlag: true, terminal: 'none', pendingPromotion: false });
      expect(engine.toFen()).toBe('4Q3/8/8/8/k7/8/8/4K3 b - - 0 1');
      expect(engine.getLastMove()?.promotion).toBe('q');
    });

    it('should promote in one call when the piece is given', () => {
      const outcome = engine.applyMove('e7', 'e8', 'n');
      expect(outcome.checkFlag).toBe(false);
      expect(engine.toFen()).toBe('4N3/8/8/8/k7/8/8/4K3 b - - 0 1');
    });

    it('should list one move per promotion piece', () => {
      const moves = engine.allLegalMoves().filter(m => m.from === 'e7');
      expect(moves.map(m => m.promotion)).toEqual(['q', 'r', 'b', 'n']);
    });

    it('should reject an unknown promotion piece', () => {
      const choice = JSON.parse('"x"');
      expect(() => engine.applyMove('e7', 'e8', choice)).toThrowError(IllegalSelectionError);
      expect(engine.toFen()).toBe(PROMOTION_FEN);

      engine.applyMove('e7', 'e8');
      expect(() => engine.promote(choice)).toThrowError('Invalid promotion piece: x');
      expect(engine.getPendingPromotion()).toBe('e8');
    });

    it('should reject a promotion piece on a move that does not promote', () => {
      expect(() => engine.applyMove('e1', 'e2', 'q')).toThrowError('e1-e2 does not promote a pawn');
      expect(engine.isLegalMove({ from: 'e1', to: 'e2', promotion: 'q' })).toBe(false);
      expect(engine.isLegalMove({ from: 'e7', to: 'e8', promotion: 'q' })).toBe(true);
      expect(engine.toFen()).toBe(PROMOTION_FEN);
    });

    it('should reject promote() when nothing is pending', () => {
      expect(() => engine.promote('q')).toThrowError('No promotion is pending');
    });

    it('should abandon a pending promotion on undo', () => {
      engine.applyMove('e7', 'e8');
      expect(engine.undo()).toBeNull();
      expect(engine.toFen()).toBe(PROMOTION_FEN);
      expect(engine.getPendingPromotion()).toBeNull();
    });
  });

  // ===========================================================================
  // Game End
  // ===========================================================================

  describe('Game end', () => {
    it('should report checkmate', () => {
      engine.applyMove('f2', 'f3');
      engine.applyMove('e7', 'e5');
      engine.applyMove('g2', 'g4');
      const outcome = engine.applyMove('d8', 'h4');

      expect(outcome).toEqual({ checkFlag: true, terminal: 'checkmate', pendingPromotion: false });
      expect(engine.isCheckmate()).toBe(true);
      expect(engine.isGameOver()).toBe(true);
      expect(engine.legalTargets('e1')).toEqual([]);
      expect(engine.allLegalMoves()).toEqual([]);
    });

    it('should report stalemate', () => {
      engine.load('7k/5Q2/8/6K1/8/8/8/8 w - - 0 1');
      const outcome = engine.applyMove('g5', 'g6');
      expect(outcome).toEqual({ checkFlag: false, terminal: 'stalemate', pendingPromotion: false });
      expect(engine.isStalemate()).toBe(true);
      expect(engine.isInCheck()).toBe(false);
    });

    it('should report check without ending the game', () => {
      engine.load('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
      const outcome = engine.applyMove('a1', 'a8');
      expect(outcome).toEqual({ checkFlag: true, terminal: 'none', pendingPromotion: false });
      expect(engine.isInCheck('b')).toBe(true);
      expect(engine.isInCheck('w')).toBe(false);
    });
  });

  // ===========================================================================
  // Board Editing
  // ===========================================================================

  describe('Board editing', () => {
    it('should place a piece without a legality check', () => {
      engine.placePiece('q', 'b', 'e2');
      expect(engine.toFen()).toBe('rnbqkbnr/pppppppp/8/8/8/8/PPPPqPPP/RNBQKBNR w KQkq - 0 1');
      expect(engine.isInCheck()).toBe(true);
    });

    it('should keep a single king per color', () => {
      engine.placePiece('k', 'w', 'a3');
      expect(engine.getKingSquare('w')).toBe('a3');
      expect(engine.getSquare('e1')).toBeNull();
      expect(engine.getCastlingRights().w).toEqual({ kingSide: false, queenSide: false });
    });

    it('should drop the other king when it is overwritten', () => {
      engine.placePiece('k', 'w', 'e8');
      expect(engine.toFen()).toBe('rnbqKbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQ1BNR w - - 0 1');
      expect(engine.getKingSquare('b')).toBeNull();
      expect(engine.getKingSquare('w')).toBe('e8');
    });

    it('should forget a removed king and its castling rights', () => {
      engine.clearSquare('e1');
      expect(engine.getKingSquare('w')).toBeNull();
      expect(engine.toFen()).toBe('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQ1BNR w kq - 0 1');
      expect(engine.isInCheck('w')).toBe(false);
    });

    it('should clear the whole board', () => {
      engine.applyMove('e2', 'e4');
      engine.clearBoard();
      expect(engine.toFen()).toBe('8/8/8/8/8/8/8/8 b - - 0 1');
      expect(engine.history()).toEqual([]);
    });

    it('should play on from an edited board', () => {
      engine.clearBoard();
      engine.placePiece('k', 'w', 'e1');
      engine.placePiece('k', 'b', 'e8');
      engine.placePiece('r', 'w', 'a1');
      expect(engine.toFen()).toBe('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
      expect(engine.legalTargets('a1')).toHaveLength(10);
    });
  });

  // ===========================================================================
  // History
  // ===========================================================================

  describe('History and undo', () => {
    it('should record moves with before and after FEN', () => {
      engine.applyMove('e2', 'e4');
      const [record] = engine.history();
      expect(record).toMatchObject({
        from: 'e2',
        to: 'e4',
        piece: 'p',
        color: 'w',
        enPassant: false,
        before: STARTING_FEN,
        after: 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1',
      });
    });

    it('should undo moves in reverse order', () => {
      engine.applyMove('e2', 'e4');
      engine.applyMove('e7', 'e5');

      expect(engine.undo()?.to).toBe('e5');
      expect(engine.toFen()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
      expect(engine.undo()?.to).toBe('e4');
      expect(engine.toFen()).toBe(STARTING_FEN);
      expect(engine.undo()).toBeNull();
    });

    it('should keep no records when history tracking is off', () => {
      const untracked = new ChessEngine({ trackHistory: false });
      untracked.applyMove('e2', 'e4');
      expect(untracked.history()).toEqual([]);
      expect(untracked.undo()).toBeNull();
      expect(untracked.turn()).toBe('b');
    });
  });

  // ===========================================================================
  // Loading and State
  // ===========================================================================

  describe('Loading and state', () => {
    it('should build an engine from FEN without throwing', () => {
      const good = ChessEngine.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 0 1');
      expect(good.ok).toBe(true);
      if (good.ok) {
        expect(good.value.toFen()).toBe('4k3/8/8/8/8/8/8/4K3 w - - 0 1');
      }

      const bad = ChessEngine.fromFen('4k3/8 w - - 0 1');
      expect(bad.ok).toBe(false);
      if (!bad.ok) {
        expect(bad.error).toBeInstanceOf(MalformedFenError);
      }
    });

    it('should throw for a malformed initial FEN', () => {
      expect(() => new ChessEngine({ initialFen: 'nonsense' })).toThrowError(MalformedFenError);
    });

    it('should reset to the start or a given position', () => {
      engine.applyMove('e2', 'e4');
      engine.reset();
      expect(engine.toFen()).toBe(STARTING_FEN);
      expect(engine.history()).toEqual([]);

      engine.reset('4k3/8/8/8/8/8/8/4K3 b - - 5 9');
      expect(engine.turn()).toBe('b');
      expect(engine.moveNumber()).toBe(9);
    });

    it('should clone an independent game', () => {
      engine.applyMove('e2', 'e4');
      const copy = engine.clone();
      copy.applyMove('e7', 'e5');

      expect(engine.turn()).toBe('b');
      expect(copy.turn()).toBe('w');
      expect(copy.history()).toHaveLength(2);
      expect(engine.history()).toHaveLength(1);
    });

    it('should clone the position rather than its starting FEN', () => {
      const custom = new ChessEngine({ initialFen: '4k3/8/8/8/8/8/4P3/4K3 w - - 0 1' });
      custom.applyMove('e2', 'e4');
      const copy = custom.clone();

      expect(copy.toFen()).toBe('4k3/8/8/8/4P3/8/8/4K3 b - e3 0 1');
      expect(copy.history()).toHaveLength(1);

      copy.applyMove('e8', 'd8');
      expect(custom.toFen()).toBe('4k3/8/8/8/4P3/8/8/4K3 b - e3 0 1');
      expect(copy.undo()?.before).toBe('4k3/8/8/8/4P3/8/8/4K3 b - e3 0 1');
    });

    it('should clone a pending promotion', () => {
      const custom = new ChessEngine({ initialFen: '8/4P3/8/8/k7/8/8/4K3 w - - 0 1' });
      custom.applyMove('e7', 'e8');
      const copy = custom.clone();
      copy.promote('r');

      expect(custom.getPendingPromotion()).toBe('e8');
      expect(copy.getPendingPromotion()).toBeNull();
      expect(copy.getSquare('e8')).toEqual({ type: 'r', color: 'w' });
    });

    it('should snapshot the full state', () => {
      const state = engine.getState();
      expect(state).toMatchObject({
        fen: STARTING_FEN,
        turn: 'w',
        moveNumber: 1,
        halfMoveClock: 0,
        isCheck: false,
        isCheckmate: false,
        isStalemate: false,
        isGameOver: false,
        pendingPromotion: null,
        enPassant: null,
        lastMove: null,
      });
      expect(state.legalMoves).toHaveLength(20);
    });

    it('should return copies of the board', () => {
      const board = engine.board();
      board[6][4] = null;
      expect(engine.getSquare('e2')).toEqual({ type: 'p', color: 'w' });
    });

    it('should answer attack queries for either side', () => {
      expect(engine.isAttacked('f3', 'w')).toBe(true);
      expect(engine.isAttacked('f3', 'b')).toBe(false);
    });
  });

  // ===========================================================================
  // Configuration and Logging
  // ===========================================================================

  describe('Configuration', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should fill in defaults', () => {
      expect(resolveConfig({})).toEqual({
        trackHistory: true,
        castleOutOfCheck: false,
        verbose: false,
      });
    });

    it('should reject wrong types and unknown keys', () => {
      expect(() => resolveConfig(JSON.parse('{"verbose":"yes"}'))).toThrowError(ChessConfigError);
      expect(() => resolveConfig(JSON.parse('{"depth":3}'))).toThrowError(ChessConfigError);
    });

    it('should log applied moves when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const verbose = new ChessEngine({ verbose: true });
      verbose.applyMove('e2', 'e4');
      expect(log).toHaveBeenCalledWith('[Chess] e2-e4');
    });

    it('should stay quiet by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      engine.applyMove('e2', 'e4');
      expect(log).not.toHaveBeenCalled();
    });
  });
});
