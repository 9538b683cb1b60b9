/**
 * Error taxonomy for the rules core.
 *
 * Contract violations are programmer errors and are thrown as soon as they
 * are seen. Malformed FEN and illegal selections are caller input problems;
 * both are raised before any state is touched.
 */

export type ChessErrorCode =
  | 'CONTRACT_VIOLATION'
  | 'MALFORMED_FEN'
  | 'ILLEGAL_SELECTION'
  | 'INVALID_CONFIG';

export class ChessRulesError extends Error {
  readonly code: ChessErrorCode;

  constructor(code: ChessErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Coordinates or square names outside the 8x8 board */
export class ContractViolation extends ChessRulesError {
  constructor(message: string) {
    super('CONTRACT_VIOLATION', message);
  }
}

export class MalformedFenError extends ChessRulesError {
  readonly fen: string;

  constructor(fen: string, reason: string) {
    super('MALFORMED_FEN', `Malformed FEN "${fen}": ${reason}`);
    this.fen = fen;
  }
}

/** Moves asked for an empty/foreign square, or a destination outside the legal set */
export class IllegalSelectionError extends ChessRulesError {
  constructor(message: string) {
    super('ILLEGAL_SELECTION', message);
  }
}

export class ChessConfigError extends ChessRulesError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/**
 * Narrow an unknown thrown value to a rules error
 */
export function isChessRulesError(err: unknown): err is ChessRulesError {
  return err instanceof ChessRulesError;
}
