/**
 * FEN Codec
 *
 * Bidirectional mapping between a Position and the six-field FEN text.
 * Decoding builds a fresh Position and never touches an engine's state, so
 * a rejected string leaves the caller's game exactly as it was.
 */

import { z } from 'zod';
import { BOARD_SIZE, coordToSquare, createEmptyBoard } from './ChessBoard.js';
import { MalformedFenError } from './ChessErrors.js';
import type { Board, CastlingRights, Color, Coord, KingCoords, PieceType, Position } from './types.js';

const FIELD_NAMES = [
  'piece placement',
  'active color',
  'castling',
  'en passant',
  'halfmove clock',
  'fullmove number',
] as const;

const counter = z.string().regex(/^\d+$/, 'must be a non-negative integer');

const FenFieldsSchema = z.tuple([
  z.string().regex(/^[1-8kqrbnpKQRBNP/]+$/, 'contains characters other than piece letters, digits 1-8 and /'),
  z.string().regex(/^[wb]$/, 'must be w or b'),
  z.string().regex(/^(-|[KQkq]{1,4})$/, 'must be - or letters from KQkq'),
  z.string().regex(/^(-|[a-hA-H][1-8])$/, 'must be - or a square such as e3'),
  counter,
  counter,
]);

const PIECE_LETTERS: Readonly<Record<string, PieceType>> = {
  k: 'k',
  q: 'q',
  r: 'r',
  b: 'b',
  n: 'n',
  p: 'p',
};

export type FenResult<T = Position> =
  | { ok: true; value: T }
  | { ok: false; error: MalformedFenError };

// =============================================================================
// Encode
// =============================================================================

function pieceLetter(type: PieceType, color: Color): string {
  return color === 'w' ? type.toUpperCase() : type;
}

export function encodePlacement(board: Board): string {
  const rows: string[] = [];
  for (let y = 0; y < BOARD_SIZE; y++) {
    let row = '';
    let empties = 0;
    for (let x = 0; x < BOARD_SIZE; x++) {
      const cell = board[y][x];
      if (!cell) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += pieceLetter(cell.type, cell.color);
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }
  return rows.join('/');
}

export function encodeCastling(castling: CastlingRights): string {
  let s = '';
  if (castling.w.kingSide) s += 'K';
  if (castling.w.queenSide) s += 'Q';
  if (castling.b.kingSide) s += 'k';
  if (castling.b.queenSide) s += 'q';
  return s.length > 0 ? s : '-';
}

/**
 * Serialize a position as FEN
 */
export function encodeFen(position: Position): string {
  const ep = position.enPassant ? coordToSquare(position.enPassant) : '-';
  return [
    encodePlacement(position.board),
    position.turn,
    encodeCastling(position.castling),
    ep,
    String(position.halfMoveClock),
    String(position.fullMoveNumber),
  ].join(' ');
}

// =============================================================================
// Decode
// =============================================================================

function decodePlacement(fen: string, placement: string): { board: Board; kingCoords: KingCoords } {
  const ranks = placement.split('/');
  if (ranks.length !== BOARD_SIZE) {
    throw new MalformedFenError(fen, `expected 8 ranks, got ${ranks.length}`);
  }

  const board = createEmptyBoard();
  const kingCoords: KingCoords = { w: null, b: null };

  ranks.forEach((rank, y) => {
    let x = 0;
    for (const ch of rank) {
      if (/[1-8]/.test(ch)) {
        x += parseInt(ch, 10);
        if (x > BOARD_SIZE) break;
        continue;
      }
      if (x >= BOARD_SIZE) {
        x++;
        break;
      }
      const type = PIECE_LETTERS[ch.toLowerCase()];
      if (!type) {
        throw new MalformedFenError(fen, `unknown piece letter "${ch}"`);
      }
      const color: Color = ch === ch.toUpperCase() ? 'w' : 'b';
      if (type === 'k') {
        if (kingCoords[color]) {
          throw new MalformedFenError(fen, `more than one ${color === 'w' ? 'white' : 'black'} king`);
        }
        kingCoords[color] = { x, y };
      }
      board[y][x] = { type, color };
      x++;
    }
    if (x !== BOARD_SIZE) {
      throw new MalformedFenError(fen, `rank ${8 - y} ("${rank}") does not cover 8 files`);
    }
  });

  return { board, kingCoords };
}

function decodeCastling(field: string): CastlingRights {
  return {
    w: { kingSide: field.includes('K'), queenSide: field.includes('Q') },
    b: { kingSide: field.includes('k'), queenSide: field.includes('q') },
  };
}

function decodeEnPassant(field: string): Coord | null {
  if (field === '-') return null;
  return {
    x: field.toLowerCase().charCodeAt(0) - 97,
    y: 8 - parseInt(field[1], 10),
  };
}

function decodeCounter(fen: string, name: string, field: string): number {
  const value = Number(field);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedFenError(fen, `${name} is out of range`);
  }
  return value;
}

/**
 * Parse FEN into a new Position
 * @throws MalformedFenError when any field is missing or invalid
 */
export function decodeFen(fen: string): Position {
  const fields = fen.trim().split(/\s+/);
  if (fields.length !== FIELD_NAMES.length) {
    throw new MalformedFenError(fen, `expected 6 fields, got ${fields.length}`);
  }

  const parsed = FenFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const index = typeof issue.path[0] === 'number' ? issue.path[0] : 0;
    throw new MalformedFenError(fen, `${FIELD_NAMES[index] ?? 'field'} ${issue.message}`);
  }

  const [placement, turn, castling, enPassant, halfMove, fullMove] = parsed.data;
  const { board, kingCoords } = decodePlacement(fen, placement);

  return {
    board,
    kingCoords,
    turn: turn === 'w' ? 'w' : 'b',
    castling: decodeCastling(castling),
    enPassant: decodeEnPassant(enPassant),
    halfMoveClock: decodeCounter(fen, 'halfmove clock', halfMove),
    fullMoveNumber: decodeCounter(fen, 'fullmove number', fullMove),
  };
}

/**
 * Result-style decode for callers that prefer not to catch
 */
export function parseFen(fen: string): FenResult {
  try {
    return { ok: true, value: decodeFen(fen) };
  } catch (err) {
    if (err instanceof MalformedFenError) return { ok: false, error: err };
    throw err;
  }
}

/**
 * Validate a FEN string
 */
export function isValidFen(fen: string): boolean {
  return parseFen(fen).ok;
}
