#!/usr/bin/env node
import meow from 'meow';
import { runCommand } from './cli/commands.js';

const cli = meow(`
	Usage
	  $ chess-rules <command> [args] [options]

	Commands
	  board                 Draw the board (default)
	  fen                   Print the position as FEN
	  moves <square>        List legal destinations of a piece
	  play <move...>        Apply moves such as e2e4 or e7e8q
	  perft <depth>         Count legal move-tree leaves (per-move breakdown)

	Options
	  --fen <fen>           Start from this position instead of the initial one
	  --state-file <path>   Write the resulting state snapshot to a file
	  --castle-out-of-check Allow castling while the king is in check
	  --unicode             Draw pieces with Unicode glyphs
	  --no-color            Plain text board
	  --verbose             Log every applied move

	Examples
	  $ chess-rules moves e2
	  $ chess-rules play e2e4 e7e5 g1f3
	  $ chess-rules perft 3 --fen "r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1"
`, {
	importMeta: import.meta,
	flags: {
		fen: {
			type: 'string',
		},
		stateFile: {
			type: 'string',
		},
		castleOutOfCheck: {
			type: 'boolean',
			default: false,
		},
		unicode: {
			type: 'boolean',
			default: false,
		},
		color: {
			type: 'boolean',
			default: true,
		},
		verbose: {
			type: 'boolean',
			default: false,
		},
	}
});

const result = runCommand(cli.input, {
	fen: cli.flags.fen,
	stateFile: cli.flags.stateFile,
	castleOutOfCheck: cli.flags.castleOutOfCheck,
	unicode: cli.flags.unicode,
	color: cli.flags.color,
	verbose: cli.flags.verbose,
});

if (result.exitCode === 0) {
	console.log(result.output);
} else {
	console.error(result.output);
}
process.exitCode = result.exitCode;
