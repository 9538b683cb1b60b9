/**
 * ChessEngine - Game state owner and move application
 *
 * Holds the single mutable Position (board, turn, castling rights, en-passant
 * target, king squares, clocks) and exposes the surface front ends use:
 * legal-move queries, move application with promotion hand-off, check and
 * terminal-state flags, FEN import/export and direct board editing.
 */

import {
  clearCell,
  cloneBoard,
  coordToSquare,
  createEmptyBoard,
  homeRow,
  pieceAt,
  piecesOf,
  promotionRow,
  sameCoord,
  setPiece,
  toCoord,
} from './ChessBoard.js';
import { isAttacked as isSquareAttacked } from './ChessAttacks.js';
import { resolveConfig } from './ChessConfig.js';
import type { ChessEngineConfig, ResolvedChessEngineConfig } from './ChessConfig.js';
import { IllegalSelectionError } from './ChessErrors.js';
import { decodeFen, encodeFen, parseFen } from './ChessFen.js';
import type { FenResult } from './ChessFen.js';
import { enPassantVictim } from './ChessLegality.js';
import { CASTLING_FILES, generateMoves, isKingInCheck } from './ChessMoveGen.js';
import { classifyPosition } from './ChessTerminal.js';
import { PROMOTION_TYPES, STARTING_FEN, opponentOf } from './types.js';
import type {
  Board,
  CastlingRights,
  ChessState,
  Color,
  Coord,
  MoveInput,
  MoveOutcome,
  MoveRecord,
  Piece,
  PieceOnBoard,
  PieceType,
  Position,
  PromotionType,
  Square,
  SquareRef,
  TerminalState,
} from './types.js';

/** A pawn that reached its last rank and waits for a piece choice */
interface PendingPromotion {
  at: Coord;
  color: Color;
  record: Omit<MoveRecord, 'after'>;
}

function clonePosition(position: Position): Position {
  return {
    board: cloneBoard(position.board),
    turn: position.turn,
    castling: {
      w: { ...position.castling.w },
      b: { ...position.castling.b },
    },
    enPassant: position.enPassant ? { ...position.enPassant } : null,
    kingCoords: {
      w: position.kingCoords.w ? { ...position.kingCoords.w } : null,
      b: position.kingCoords.b ? { ...position.kingCoords.b } : null,
    },
    halfMoveClock: position.halfMoveClock,
    fullMoveNumber: position.fullMoveNumber,
  };
}

export function isPromotionType(value: string): value is PromotionType {
  return PROMOTION_TYPES.some(t => t === value);
}

/**
 * ChessEngine owns one game and applies moves to it
 */
export class ChessEngine {
  private position: Position;
  private readonly config: ResolvedChessEngineConfig;
  private moveHistory: MoveRecord[] = [];
  private pending: PendingPromotion | null = null;

  /**
   * @param position - Start from this decoded position instead of
   *   `initialFen`; the engine takes ownership of it
   */
  constructor(config: ChessEngineConfig = {}, position?: Position) {
    this.config = resolveConfig(config);
    this.position = position ?? decodeFen(this.config.initialFen ?? STARTING_FEN);
  }

  /**
   * Build an engine from FEN without throwing
   */
  static fromFen(fen: string, config: Omit<ChessEngineConfig, 'initialFen'> = {}): FenResult<ChessEngine> {
    const parsed = parseFen(fen);
    if (!parsed.ok) return parsed;
    return { ok: true, value: new ChessEngine({ ...config, initialFen: fen }) };
  }

  // ===========================================================================
  // Move Generation
  // ===========================================================================

  /**
   * Legal destinations for the side-to-move's piece on a square
   * @throws IllegalSelectionError for an empty square, an opponent's piece
   *         or while a promotion choice is pending
   */
  legalMoves(square: SquareRef): Coord[] {
    const from = toCoord(square);
    this.assertNoPendingPromotion();

    const piece = pieceAt(this.position.board, from);
    if (!piece) {
      throw new IllegalSelectionError(`No piece on ${coordToSquare(from)}`);
    }
    if (piece.color !== this.position.turn) {
      throw new IllegalSelectionError(`${coordToSquare(from)} does not hold a piece of the side to move`);
    }

    return generateMoves(this.position, from, { castleOutOfCheck: this.config.castleOutOfCheck });
  }

  /** Legal destinations as square names */
  legalTargets(square: SquareRef): Square[] {
    return this.legalMoves(square).map(coordToSquare);
  }

  /**
   * Every legal move of the side to move; promotions appear once per piece choice
   */
  allLegalMoves(): MoveInput[] {
    if (this.pending) return [];

    const moves: MoveInput[] = [];
    for (const piece of piecesOf(this.position.board, this.position.turn)) {
      const from = toCoord(piece.square);
      const targets = generateMoves(this.position, from, { castleOutOfCheck: this.config.castleOutOfCheck });
      for (const to of targets) {
        if (piece.type === 'p' && to.y === promotionRow(piece.color)) {
          for (const promotion of PROMOTION_TYPES) {
            moves.push({ from: piece.square, to: coordToSquare(to), promotion });
          }
        } else {
          moves.push({ from: piece.square, to: coordToSquare(to) });
        }
      }
    }
    return moves;
  }

  /**
   * Check if a move is legal
   */
  isLegalMove(move: MoveInput): boolean {
    if (this.pending) return false;
    const piece = pieceAt(this.position.board, toCoord(move.from));
    if (!piece || piece.color !== this.position.turn) return false;
    const to = toCoord(move.to);
    if (move.promotion !== undefined && !(piece.type === 'p' && to.y === promotionRow(piece.color))) {
      return false;
    }
    return this.legalMoves(move.from).some(c => sameCoord(c, to));
  }

  // ===========================================================================
  // Move Application
  // ===========================================================================

  /**
   * Apply a legal move. When a pawn reaches its last rank without a
   * `promotion` choice, the turn is held until `promote()` is called.
   *
   * @throws IllegalSelectionError when the destination is not legal
   */
  applyMove(from: SquareRef, to: SquareRef, promotion?: PromotionType): MoveOutcome {
    const fromC = toCoord(from);
    const toC = toCoord(to);

    const legal = this.legalMoves(fromC);
    if (!legal.some(c => sameCoord(c, toC))) {
      throw new IllegalSelectionError(`${coordToSquare(fromC)}-${coordToSquare(toC)} is not a legal move`);
    }
    if (promotion !== undefined && !isPromotionType(promotion)) {
      throw new IllegalSelectionError(`Invalid promotion piece: ${String(promotion)}`);
    }

    const { board } = this.position;
    const piece = pieceAt(board, fromC);
    if (!piece) {
      throw new IllegalSelectionError(`No piece on ${coordToSquare(fromC)}`);
    }
    if (promotion !== undefined && !(piece.type === 'p' && toC.y === promotionRow(piece.color))) {
      throw new IllegalSelectionError(`${coordToSquare(fromC)}-${coordToSquare(toC)} does not promote a pawn`);
    }
    const mover = piece.color;
    const target = pieceAt(board, toC);
    const before = this.toFen();

    // 1. Halfmove clock
    if (piece.type === 'p' || target) {
      this.position.halfMoveClock = 0;
    } else {
      this.position.halfMoveClock++;
    }

    // 2. En-passant capture
    const victim = enPassantVictim(this.position, fromC, toC);
    if (victim) clearCell(board, victim);

    // 3. En-passant field
    this.position.enPassant = null;
    if (piece.type === 'p' && Math.abs(toC.y - fromC.y) === 2) {
      this.position.enPassant = { x: fromC.x, y: (fromC.y + toC.y) / 2 };
    }

    // 4. Castling rights
    this.updateCastlingRights(piece, fromC, target, toC);

    // 5. Castle rook relocation
    let castle: MoveRecord['castle'];
    if (piece.type === 'k' && Math.abs(toC.x - fromC.x) === 2) {
      castle = toC.x > fromC.x ? 'k' : 'q';
      const side = castle === 'k' ? CASTLING_FILES.kingSide : CASTLING_FILES.queenSide;
      setPiece(board, { x: side.rookTo, y: fromC.y }, { type: 'r', color: mover });
      clearCell(board, { x: side.rook, y: fromC.y });
    }

    // 6. King coordinate
    if (piece.type === 'k') {
      this.position.kingCoords[mover] = { x: toC.x, y: toC.y };
    }

    // 7. Board mutation
    setPiece(board, toC, piece);
    clearCell(board, fromC);

    const record: Omit<MoveRecord, 'after'> = {
      from: coordToSquare(fromC),
      to: coordToSquare(toC),
      piece: piece.type,
      color: mover,
      captured: target?.type ?? (victim ? 'p' : undefined),
      castle,
      enPassant: victim !== null,
      before,
    };

    // 8. Promotion
    if (piece.type === 'p' && toC.y === promotionRow(mover)) {
      if (promotion === undefined) {
        this.pending = { at: toC, color: mover, record };
        this.log(`${record.from}-${record.to} waits for a promotion choice`);
        return { checkFlag: false, terminal: 'none', pendingPromotion: true };
      }
      setPiece(board, toC, { type: promotion, color: mover });
      return this.finishMove({ ...record, promotion });
    }

    return this.finishMove(record);
  }

  /**
   * Complete a pending promotion with the chosen piece
   */
  promote(choice: PromotionType): MoveOutcome {
    const pending = this.pending;
    if (!pending) {
      throw new IllegalSelectionError('No promotion is pending');
    }
    if (!isPromotionType(choice)) {
      throw new IllegalSelectionError(`Invalid promotion piece: ${String(choice)}`);
    }

    setPiece(this.position.board, pending.at, { type: choice, color: pending.color });
    this.pending = null;
    return this.finishMove({ ...pending.record, promotion: choice });
  }

  /** Steps 9-11: turn toggle, check flag, terminal state */
  private finishMove(record: Omit<MoveRecord, 'after'>): MoveOutcome {
    const mover = this.position.turn;
    this.position.turn = opponentOf(mover);
    if (mover === 'b') this.position.fullMoveNumber++;

    const checkFlag = isKingInCheck(this.position, this.position.turn);
    const terminal = classifyPosition(this.position, { castleOutOfCheck: this.config.castleOutOfCheck });

    if (this.config.trackHistory) {
      this.moveHistory.push({ ...record, after: this.toFen() });
    }
    this.log(
      `${record.from}-${record.to}${record.promotion ? `=${record.promotion}` : ''}` +
      `${checkFlag ? ' check' : ''}${terminal !== 'none' ? ` ${terminal}` : ''}`,
    );

    return { checkFlag, terminal, pendingPromotion: false };
  }

  private updateCastlingRights(piece: Piece, from: Coord, captured: Piece | null, to: Coord): void {
    const rights = this.position.castling;

    if (piece.type === 'k') {
      rights[piece.color].kingSide = false;
      rights[piece.color].queenSide = false;
    }

    if (piece.type === 'r' && from.y === homeRow(piece.color)) {
      if (from.x === CASTLING_FILES.kingSide.rook) rights[piece.color].kingSide = false;
      if (from.x === CASTLING_FILES.queenSide.rook) rights[piece.color].queenSide = false;
    }

    // A rook captured on its corner takes its side's right with it
    if (captured && captured.type === 'r' && to.y === homeRow(captured.color)) {
      if (to.x === CASTLING_FILES.kingSide.rook) rights[captured.color].kingSide = false;
      if (to.x === CASTLING_FILES.queenSide.rook) rights[captured.color].queenSide = false;
    }
  }

  private assertNoPendingPromotion(): void {
    if (this.pending) {
      throw new IllegalSelectionError(`Promotion on ${coordToSquare(this.pending.at)} is pending`);
    }
  }

  // ===========================================================================
  // History
  // ===========================================================================

  /** Get detailed move history */
  history(): MoveRecord[] {
    return [...this.moveHistory];
  }

  /** Get last move */
  getLastMove(): MoveRecord | null {
    return this.moveHistory.length > 0 ? this.moveHistory[this.moveHistory.length - 1] : null;
  }

  /**
   * Undo the last move (or abandon a pending promotion)
   * @returns The undone move, or null if there was nothing recorded to undo
   */
  undo(): MoveRecord | null {
    if (this.pending) {
      this.position = decodeFen(this.pending.record.before);
      this.pending = null;
      return null;
    }

    const last = this.moveHistory.pop();
    if (!last) return null;
    this.position = decodeFen(last.before);
    this.log(`undo ${last.from}-${last.to}`);
    return last;
  }

  // ===========================================================================
  // Game State Queries
  // ===========================================================================

  /** Get FEN string */
  toFen(): string {
    return encodeFen(this.position);
  }

  /** Get current turn */
  turn(): Color {
    return this.position.turn;
  }

  /** Get full move number */
  moveNumber(): number {
    return this.position.fullMoveNumber;
  }

  /** Get half-move clock */
  halfMoveClock(): number {
    return this.position.halfMoveClock;
  }

  /** Get the board as 2D array (a copy) */
  board(): Board {
    return cloneBoard(this.position.board);
  }

  /** Get castling rights */
  getCastlingRights(): CastlingRights {
    return {
      w: { ...this.position.castling.w },
      b: { ...this.position.castling.b },
    };
  }

  /** Get en passant square */
  getEnPassantSquare(): Square | null {
    return this.position.enPassant ? coordToSquare(this.position.enPassant) : null;
  }

  /** Square of the pawn waiting for a promotion choice */
  getPendingPromotion(): Square | null {
    return this.pending ? coordToSquare(this.pending.at) : null;
  }

  /**
   * Get piece at a square
   */
  getSquare(square: SquareRef): Piece | null {
    const cell = pieceAt(this.position.board, toCoord(square));
    return cell ? { ...cell } : null;
  }

  /**
   * Get king square for a color
   */
  getKingSquare(color: Color): Square | null {
    const king = this.position.kingCoords[color];
    return king ? coordToSquare(king) : null;
  }

  /**
   * Get pieces for a specific color
   */
  getPieces(color: Color): PieceOnBoard[] {
    return piecesOf(this.position.board, color);
  }

  // ===========================================================================
  // Game Status
  // ===========================================================================

  /**
   * Check if a square is attacked by a color
   */
  isAttacked(square: SquareRef, byColor: Color): boolean {
    return isSquareAttacked(this.position.board, toCoord(square), byColor);
  }

  /** Is the given side (default: side to move) in check */
  isInCheck(side: Color = this.position.turn): boolean {
    return isKingInCheck(this.position, side);
  }

  /** Terminal classification of the current position */
  status(): TerminalState {
    if (this.pending) return 'none';
    return classifyPosition(this.position, { castleOutOfCheck: this.config.castleOutOfCheck });
  }

  isCheckmate(): boolean {
    return this.status() === 'checkmate';
  }

  isStalemate(): boolean {
    return this.status() === 'stalemate';
  }

  isGameOver(): boolean {
    return this.status() !== 'none';
  }

  // ===========================================================================
  // Loading
  // ===========================================================================

  /**
   * Load a position from FEN. The current game is untouched when the FEN
   * is rejected.
   * @throws MalformedFenError
   */
  load(fen: string): void {
    const position = decodeFen(fen);
    this.position = position;
    this.pending = null;
    this.moveHistory = [];
    this.log(`loaded ${fen}`);
  }

  /**
   * Reset the board to starting position or specified FEN
   */
  reset(fen?: string): void {
    this.load(fen ?? STARTING_FEN);
  }

  // ===========================================================================
  // Board Editing
  // ===========================================================================

  /**
   * Put a piece on a square, bypassing move legality. A king replaces its
   * color's previous king; placing or removing a king clears that color's
   * castling rights.
   */
  placePiece(type: PieceType, color: Color, square: SquareRef): void {
    const at = toCoord(square);
    this.assertNoPendingPromotion();
    this.forgetKingOn(at);

    if (type === 'k') {
      const previous = this.position.kingCoords[color];
      if (previous && !sameCoord(previous, at)) clearCell(this.position.board, previous);
      this.position.kingCoords[color] = { x: at.x, y: at.y };
      this.clearCastling(color);
    }

    setPiece(this.position.board, at, { type, color });
    this.moveHistory = [];
  }

  /** Empty a square, bypassing move legality */
  clearSquare(square: SquareRef): void {
    const at = toCoord(square);
    this.assertNoPendingPromotion();
    this.forgetKingOn(at);
    clearCell(this.position.board, at);
    this.moveHistory = [];
  }

  /** Remove every piece */
  clearBoard(): void {
    this.assertNoPendingPromotion();
    this.position.board = createEmptyBoard();
    this.position.kingCoords = { w: null, b: null };
    this.position.enPassant = null;
    this.clearCastling('w');
    this.clearCastling('b');
    this.moveHistory = [];
  }

  private forgetKingOn(at: Coord): void {
    const existing = pieceAt(this.position.board, at);
    if (existing && existing.type === 'k') {
      this.position.kingCoords[existing.color] = null;
      this.clearCastling(existing.color);
    }
  }

  private clearCastling(color: Color): void {
    this.position.castling[color] = { kingSide: false, queenSide: false };
  }

  // ===========================================================================
  // State Export
  // ===========================================================================

  /**
   * Get complete game state snapshot
   */
  getState(): ChessState {
    const terminal = this.status();
    return {
      fen: this.toFen(),
      turn: this.turn(),
      moveNumber: this.moveNumber(),
      halfMoveClock: this.halfMoveClock(),
      isCheck: this.isInCheck(),
      isCheckmate: terminal === 'checkmate',
      isStalemate: terminal === 'stalemate',
      isGameOver: terminal !== 'none',
      pendingPromotion: this.getPendingPromotion(),
      castling: this.getCastlingRights(),
      enPassant: this.getEnPassantSquare(),
      legalMoves: this.allLegalMoves(),
      lastMove: this.getLastMove(),
    };
  }

  /**
   * Clone the engine
   */
  clone(): ChessEngine {
    const copy = new ChessEngine(this.config, clonePosition(this.position));
    copy.moveHistory = [...this.moveHistory];
    copy.pending = this.pending
      ? { ...this.pending, at: { ...this.pending.at }, record: { ...this.pending.record } }
      : null;
    return copy;
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[Chess] ${message}`);
    }
  }
}

/**
 * Create a new chess engine instance
 */
export function createChessEngine(config?: ChessEngineConfig): ChessEngine {
  return new ChessEngine(config);
}
