/**
 * BoardRenderer - Terminal rendering of a chess board
 *
 * Builds each rank as a single styled string. With colors off the output
 * is plain text (FEN letters, '.' for empty squares, '*' for highlighted
 * targets), which is what the protocol's ASCII view and the CLI's
 * --no-color mode print.
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { coordToSquare } from '../chess/ChessBoard.js';
import { FILES, PIECE_UNICODE } from '../chess/types.js';
import type { Board, Color, Piece, PieceSymbol, Square } from '../chess/types.js';

export interface RenderOptions {
  /** ANSI colors (default: true) */
  color?: boolean;
  /** Unicode piece glyphs instead of FEN letters (default: false) */
  unicode?: boolean;
  /** Side shown at the bottom (default: white) */
  orientation?: Color;
  /** Selected square */
  selected?: Square | null;
  /** Legal destinations of the selected piece */
  targets?: readonly Square[];
  /** From and to squares of the last move */
  lastMove?: { from: Square; to: Square } | null;
}

// Board colors
const LIGHT_SQUARE = 'white';
const DARK_SQUARE = 'gray';
const SELECTED_COLOR = 'yellow';
const LEGAL_COLOR = 'green';
const LAST_MOVE_COLOR = 'cyan';

type SquareColor =
  | typeof LIGHT_SQUARE
  | typeof DARK_SQUARE
  | typeof SELECTED_COLOR
  | typeof LEGAL_COLOR
  | typeof LAST_MOVE_COLOR;

function symbolOf(piece: Piece): PieceSymbol {
  switch (piece.type) {
    case 'k': return piece.color === 'w' ? 'K' : 'k';
    case 'q': return piece.color === 'w' ? 'Q' : 'q';
    case 'r': return piece.color === 'w' ? 'R' : 'r';
    case 'b': return piece.color === 'w' ? 'B' : 'b';
    case 'n': return piece.color === 'w' ? 'N' : 'n';
    case 'p': return piece.color === 'w' ? 'P' : 'p';
  }
}

/**
 * Render a board, one string per line joined with newlines
 */
export function renderBoard(board: Board, options: RenderOptions = {}): string {
  const colored = options.color ?? true;
  const chalk: ChalkInstance = new Chalk({ level: colored ? 1 : 0 });
  const targets = new Set(options.targets ?? []);
  const lastMove = options.lastMove ?? null;

  const bgChalk: Record<SquareColor, (s: string) => string> = {
    white: chalk.bgWhite,
    gray: chalk.bgGray,
    yellow: chalk.bgYellow,
    green: chalk.bgGreen,
    cyan: chalk.bgCyan,
  };

  const squareColor = (square: Square, x: number, y: number): SquareColor => {
    if (options.selected === square) return SELECTED_COLOR;
    if (targets.has(square)) return LEGAL_COLOR;
    if (lastMove && (lastMove.from === square || lastMove.to === square)) return LAST_MOVE_COLOR;
    return (x + y) % 2 === 0 ? LIGHT_SQUARE : DARK_SQUARE;
  };

  const cellContent = (piece: Piece | null, square: Square): string => {
    if (piece) {
      const symbol = symbolOf(piece);
      return options.unicode ? PIECE_UNICODE[symbol] : symbol;
    }
    if (targets.has(square)) return '*';
    return colored ? ' ' : '.';
  };

  // White pieces blue, black pieces red on every background
  const pieceChalk = (piece: Piece | null): ((s: string) => string) => {
    if (!piece) return chalk.blackBright;
    return piece.color === 'w' ? chalk.blueBright.bold : chalk.red.bold;
  };

  const flipped = options.orientation === 'b';
  const order = flipped ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  const fileLabels = chalk.cyan('   ' + order.map(x => ` ${FILES[x]} `).join(''));
  const lines: string[] = [fileLabels];

  for (const y of order) {
    const rank = 8 - y;
    let row = chalk.cyan.bold(` ${rank} `);
    for (const x of order) {
      const piece = board[y][x];
      const square = coordToSquare({ x, y });
      const bg = bgChalk[squareColor(square, x, y)];
      const fg = pieceChalk(piece);
      row += colored
        ? bg(fg(` ${cellContent(piece, square)} `))
        : ` ${cellContent(piece, square)} `;
    }
    row += chalk.cyan.bold(` ${rank}`);
    lines.push(row);
  }

  lines.push(fileLabels);
  return lines.join('\n');
}
