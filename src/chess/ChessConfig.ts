import { z } from 'zod';
import { ChessConfigError } from './ChessErrors.js';

// Zod schema for type-safe validation of engine options
export const ChessEngineConfigSchema = z.object({
  /** Initial FEN position (default: standard start) */
  initialFen: z.string().min(1).optional(),
  /** Keep move records for history() and undo() */
  trackHistory: z.boolean().default(true),
  /**
   * Allow castling while the king is in check. Off by default, which is
   * the standard rule; on reproduces engines that only test the squares the
   * king crosses.
   */
  castleOutOfCheck: z.boolean().default(false),
  /** Log applied moves and loads with a [Chess] tag */
  verbose: z.boolean().default(false),
}).strict();

/** Options accepted by the engine constructor */
export type ChessEngineConfig = z.input<typeof ChessEngineConfigSchema>;

/** Options after defaults are applied */
export type ResolvedChessEngineConfig = z.output<typeof ChessEngineConfigSchema>;

export function resolveConfig(config: ChessEngineConfig = {}): ResolvedChessEngineConfig {
  const parsed = ChessEngineConfigSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ChessConfigError(`Invalid chess engine config: ${details}`);
  }
  return parsed.data;
}
