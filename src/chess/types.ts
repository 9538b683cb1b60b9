/**
 * Chess Module Type Definitions
 *
 * Shared types for the rules core: pieces, squares, directions, game state
 * snapshots and the outcome records handed to front ends.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Piece types a pawn may promote to */
export type PromotionType = 'q' | 'r' | 'b' | 'n';

/** Piece symbol (uppercase = white, lowercase = black) */
export type PieceSymbol = 'P' | 'N' | 'B' | 'R' | 'Q' | 'K' | 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

/**
 * Board coordinate. `x` is the file (0 = a), `y` the row with 0 = rank 8
 * and 7 = rank 1.
 */
export interface Coord {
  x: number;
  y: number;
}

/** Either notation accepted by the engine's public methods */
export type SquareRef = Square | Coord;

// =============================================================================
// Directions
// =============================================================================

/** Orthogonal and diagonal step directions (sliders and king) */
export type LineDirection = 'U' | 'D' | 'L' | 'R' | 'UL' | 'UR' | 'DL' | 'DR';

/** Knight L-shaped steps, named by their two legs */
export type KnightDirection = 'RRU' | 'RUU' | 'RRD' | 'RDD' | 'LLU' | 'LUU' | 'LLD' | 'LDD';

/** One of the 16 step vectors used by movement and attack logic */
export type Direction = LineDirection | KnightDirection;

/** A pinned piece's line: direction toward its king, then away from it */
export type PinAxis = readonly [towardKing: LineDirection, awayFromKing: LineDirection];

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** A piece with its position */
export interface PieceOnBoard extends Piece {
  square: Square;
}

/** A board cell; `null` is an empty square */
export type Cell = Piece | null;

/** 8x8 board array (rank 8 to rank 1, file a to file h) */
export type Board = Cell[][];

// =============================================================================
// Game State
// =============================================================================

/** Castling rights for one color */
export interface SideCastling {
  kingSide: boolean;
  queenSide: boolean;
}

/** Castling rights for both colors */
export type CastlingRights = Record<Color, SideCastling>;

/** Tracked king squares (null when that king is not on the board) */
export type KingCoords = Record<Color, Coord | null>;

/**
 * Everything FEN describes. The FEN codec produces and consumes this;
 * the engine owns one and mutates it in place.
 */
export interface Position {
  board: Board;
  turn: Color;
  castling: CastlingRights;
  enPassant: Coord | null;
  kingCoords: KingCoords;
  halfMoveClock: number;
  fullMoveNumber: number;
}

/** Terminal classification of the side to move */
export type TerminalState = 'none' | 'checkmate' | 'stalemate';

/** Result of applying a move or completing a promotion */
export interface MoveOutcome {
  /** Side to move is in check after the move */
  checkFlag: boolean;
  terminal: TerminalState;
  /** The pawn reached its last rank and waits for a promotion choice */
  pendingPromotion: boolean;
}

// =============================================================================
// Move Representation
// =============================================================================

/** Input format for making moves */
export interface MoveInput {
  from: Square;
  to: Square;
  promotion?: PromotionType;
}

/** Record of an applied move, kept when history tracking is on */
export interface MoveRecord extends MoveInput {
  piece: PieceType;
  color: Color;
  captured?: PieceType;
  /** Castling side when the king moved two files */
  castle?: 'k' | 'q';
  enPassant: boolean;
  /** FEN before the move */
  before: string;
  /** FEN after the move (after promotion, when one was pending) */
  after: string;
}

/** Structured snapshot for logging and protocol consumers */
export interface ChessState {
  fen: string;
  turn: Color;
  moveNumber: number;
  halfMoveClock: number;
  isCheck: boolean;
  isCheckmate: boolean;
  isStalemate: boolean;
  isGameOver: boolean;
  pendingPromotion: Square | null;
  castling: CastlingRights;
  enPassant: Square | null;
  legalMoves: MoveInput[];
  lastMove: MoveRecord | null;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Unicode chess piece symbols */
export const PIECE_UNICODE: Record<PieceSymbol, string> = {
  K: '♔', Q: '♕', R: '♖', B: '♗', N: '♘', P: '♙',
  k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟',
};

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** Promotion choices in the order front ends offer them */
export const PROMOTION_TYPES: readonly PromotionType[] = ['q', 'r', 'b', 'n'];

/** The other side */
export function opponentOf(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
