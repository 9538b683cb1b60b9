/**
 * Chess Module
 *
 * Rules engine with:
 * - Direction-catalog move generation with pin detection
 * - Check, checkmate and stalemate detection
 * - Castling, en passant and promotion hand-off
 * - FEN import/export and free board editing
 * - Perft move-tree counting
 *
 * @module chess
 */

// Core Engine
export {
  ChessEngine,
  createChessEngine,
  isPromotionType,
} from './ChessEngine.js';

// Configuration
export {
  ChessEngineConfigSchema,
  resolveConfig,
} from './ChessConfig.js';
export type {
  ChessEngineConfig,
  ResolvedChessEngineConfig,
} from './ChessConfig.js';

// Errors
export {
  ChessRulesError,
  ContractViolation,
  MalformedFenError,
  IllegalSelectionError,
  ChessConfigError,
  isChessRulesError,
} from './ChessErrors.js';
export type { ChessErrorCode } from './ChessErrors.js';

// FEN
export {
  encodeFen,
  decodeFen,
  parseFen,
  isValidFen,
} from './ChessFen.js';
export type { FenResult } from './ChessFen.js';

// Board helpers
export {
  squareToCoord,
  coordToSquare,
  isSquare,
} from './ChessBoard.js';

// Rules
export { isAttacked, checkForPin } from './ChessAttacks.js';
export { generateMoves, isKingInCheck } from './ChessMoveGen.js';
export type { MoveGenOptions } from './ChessMoveGen.js';
export { classifyPosition, hasLegalMove } from './ChessTerminal.js';
export { DIRECTIONS, moveSetOf, stepOf } from './ChessDirections.js';

// Perft
export { perft, divide, moveKey } from './ChessPerft.js';

// Types
export type {
  Color,
  PieceType,
  PromotionType,
  PieceSymbol,
  Square,
  SquareRef,
  Coord,
  Direction,
  LineDirection,
  KnightDirection,
  PinAxis,
  Piece,
  PieceOnBoard,
  Cell,
  Board,
  SideCastling,
  CastlingRights,
  KingCoords,
  Position,
  TerminalState,
  MoveOutcome,
  MoveInput,
  MoveRecord,
  ChessState,
} from './types.js';

// Constants
export {
  STARTING_FEN,
  PIECE_UNICODE,
  FILES,
  RANKS,
  PROMOTION_TYPES,
  opponentOf,
} from './types.js';
