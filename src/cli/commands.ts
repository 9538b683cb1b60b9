/**
 * CLI command handlers
 *
 * Each command builds an engine from the shared options, runs, and returns
 * its text output and exit code; printing is left to the entry point.
 *
 * @module cli/commands
 */

import { z } from 'zod';
import { isSquare } from '../chess/ChessBoard.js';
import { ChessEngine, isPromotionType } from '../chess/ChessEngine.js';
import { IllegalSelectionError, isChessRulesError } from '../chess/ChessErrors.js';
import { divide } from '../chess/ChessPerft.js';
import type { PromotionType, Square } from '../chess/types.js';
import { logGameState, setStateFilePath } from '../core/GameStateLogger.js';
import { initialInteractionState, transition } from '../core/InteractionMachine.js';
import type { InteractionState } from '../core/InteractionMachine.js';
import { renderBoard } from '../ui/BoardRenderer.js';

export interface CommandOptions {
  fen?: string;
  color?: boolean;
  unicode?: boolean;
  stateFile?: string;
  castleOutOfCheck?: boolean;
  verbose?: boolean;
}

export interface CommandResult {
  output: string;
  exitCode: number;
}

export const COMMANDS = ['fen', 'board', 'moves', 'play', 'perft'] as const;
export type CommandName = typeof COMMANDS[number];

const MAX_PERFT_DEPTH = 6;

const DepthSchema = z.coerce.number().int().min(0).max(MAX_PERFT_DEPTH);

interface ParsedMove {
  from: Square;
  to: Square;
  promotion?: PromotionType;
}

// =============================================================================
// Helpers
// =============================================================================

function createEngine(options: CommandOptions): ChessEngine {
  return new ChessEngine({
    initialFen: options.fen,
    castleOutOfCheck: options.castleOutOfCheck ?? false,
    verbose: options.verbose ?? false,
  });
}

/**
 * Read a move written as from+to squares with an optional promotion letter
 * (e2e4, e7e8q)
 */
export function parseMoveToken(token: string): ParsedMove {
  const match = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/.exec(token.trim().toLowerCase());
  if (!match) {
    throw new IllegalSelectionError(`Cannot read move "${token}" (expected e.g. e2e4 or e7e8q)`);
  }
  const [, from, to, promotion] = match;
  if (!isSquare(from) || !isSquare(to)) {
    throw new IllegalSelectionError(`Cannot read move "${token}"`);
  }
  if (promotion !== undefined && isPromotionType(promotion)) {
    return { from, to, promotion };
  }
  return { from, to };
}

export function describeStatus(engine: ChessEngine): string {
  const side = engine.turn() === 'w' ? 'White' : 'Black';
  const other = engine.turn() === 'w' ? 'Black' : 'White';
  const pending = engine.getPendingPromotion();

  if (pending) return `Promotion pending on ${pending}`;
  switch (engine.status()) {
    case 'checkmate':
      return `Checkmate, ${other} wins`;
    case 'stalemate':
      return 'Stalemate';
    case 'none':
      return `${side} to move${engine.isInCheck() ? ' (check)' : ''}`;
  }
}

function writeStateFile(engine: ChessEngine, options: CommandOptions): void {
  if (!options.stateFile) return;
  setStateFilePath(options.stateFile);
  logGameState(
    'Chess CLI',
    describeStatus(engine),
    renderBoard(engine.board(), { color: false }),
    undefined,
    engine.getState(),
  );
}

// =============================================================================
// Commands
// =============================================================================

export function fenCommand(options: CommandOptions): string {
  return createEngine(options).toFen();
}

export function boardCommand(options: CommandOptions): string {
  const engine = createEngine(options);
  writeStateFile(engine, options);
  return [
    renderBoard(engine.board(), { color: options.color ?? true, unicode: options.unicode }),
    describeStatus(engine),
  ].join('\n');
}

export function movesCommand(square: string | undefined, options: CommandOptions): string {
  if (!square) {
    throw new IllegalSelectionError('moves needs a square, e.g. moves e2');
  }
  const name = square.toLowerCase();
  if (!isSquare(name)) {
    throw new IllegalSelectionError(`Invalid square: ${square}`);
  }
  const targets = createEngine(options).legalTargets(name);
  return targets.length > 0 ? targets.join(' ') : '(no legal moves)';
}

/**
 * Apply moves in order, driving the same select/move/promote steps a board
 * front end goes through
 */
export function playCommand(tokens: readonly string[], options: CommandOptions): string {
  const engine = createEngine(options);
  let ui: InteractionState = initialInteractionState();

  for (const token of tokens) {
    const move = parseMoveToken(token);

    ui = transition(ui, { type: 'select', square: move.from, targets: engine.legalTargets(move.from) });
    if (ui.mode === 'gameplay' && !ui.targets.includes(move.to)) {
      throw new IllegalSelectionError(`${move.from}${move.to} is not a legal move`);
    }

    const outcome = engine.applyMove(move.from, move.to);
    ui = transition(ui, { type: 'moveApplied', to: move.to, outcome });

    if (ui.mode === 'promotePawn' && move.promotion) {
      ui = transition(ui, { type: 'promoted', outcome: engine.promote(move.promotion) });
    }
    if (ui.mode === 'promotePawn') break;
  }

  writeStateFile(engine, options);
  return [engine.toFen(), describeStatus(engine)].join('\n');
}

export function perftCommand(depthArg: string | undefined, options: CommandOptions): string {
  const parsed = DepthSchema.safeParse(depthArg ?? '');
  if (!depthArg || !parsed.success) {
    throw new IllegalSelectionError(`perft needs a depth between 0 and ${MAX_PERFT_DEPTH}`);
  }

  const fen = createEngine(options).toFen();
  const breakdown = divide(fen, parsed.data, { castleOutOfCheck: options.castleOutOfCheck ?? false });
  const lines = Array.from(breakdown, ([move, nodes]) => `${move}: ${nodes}`);
  const total = parsed.data === 0 ? 1 : Array.from(breakdown.values()).reduce((a, b) => a + b, 0);

  if (lines.length > 0) lines.push('');
  lines.push(`Nodes: ${total}`);
  return lines.join('\n');
}

// =============================================================================
// Dispatch
// =============================================================================

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some(c => c === value);
}

/**
 * Run one command; rules errors become exit code 1 with the message as output
 */
export function runCommand(input: readonly string[], options: CommandOptions): CommandResult {
  const [command = 'board', ...args] = input;

  if (!isCommandName(command)) {
    return { output: `Unknown command: ${command}. Try one of: ${COMMANDS.join(', ')}`, exitCode: 1 };
  }

  try {
    switch (command) {
      case 'fen':
        return { output: fenCommand(options), exitCode: 0 };
      case 'board':
        return { output: boardCommand(options), exitCode: 0 };
      case 'moves':
        return { output: movesCommand(args[0], options), exitCode: 0 };
      case 'play':
        return { output: playCommand(args, options), exitCode: 0 };
      case 'perft':
        return { output: perftCommand(args[0], options), exitCode: 0 };
    }
  } catch (err) {
    if (isChessRulesError(err)) {
      return { output: `Error: ${err.message}`, exitCode: 1 };
    }
    throw err;
  }
}
