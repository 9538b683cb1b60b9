import fs from 'node:fs';
import path from 'node:path';
import type { ChessState } from '../chess/types.js';

/**
 * One logged snapshot, as kept in memory and written to the state file
 */
export interface LoggedGameState {
    timestamp: number;
    pid: number;
    screen: string;
    status: string;
    game?: ChessState;
}

const DEFAULT_STATE_FILE = 'chess-state.txt';

// Configuration flags
let fileLoggingEnabled = true;
let stateFile: string | null = null;

let currentState: LoggedGameState | null = null;
const subscribers = new Set<(state: LoggedGameState) => void>();

/**
 * Enable or disable file logging
 */
export const setFileLoggingEnabled = (enabled: boolean): void => {
    fileLoggingEnabled = enabled;
};

/**
 * Set where snapshots are written (null restores ./chess-state.txt)
 */
export const setStateFilePath = (filePath: string | null): void => {
    stateFile = filePath;
};

export const getStateFilePath = (): string => {
    return stateFile ?? path.join(process.cwd(), DEFAULT_STATE_FILE);
};

/**
 * Render a snapshot as the plain-text state file body
 */
export const formatGameState = (
    state: LoggedGameState,
    visualContent: string,
    controls: string,
): string => {
    let content = `PROCESS ID: ${state.pid}\n`;
    content += `TIMESTAMP: ${state.timestamp}\n`;
    content += `CURRENT SCREEN: ${state.screen}\n`;
    content += `STATUS: ${state.status}\n`;
    content += `\nVISUAL STATE:\n`;
    content += `${visualContent}\n`;
    content += `\nCONTROLS: ${controls}\n`;

    // Add structured state info if available
    if (state.game) {
        content += `\n--- STRUCTURED STATE (JSON) ---\n`;
        content += JSON.stringify(state.game, null, 2);
        content += `\n--- END STRUCTURED STATE ---\n`;
    }
    return content;
};

/**
 * Logs the current game state to a file for agent visibility and notifies
 * in-process subscribers.
 *
 * @param screenName - The name of the current screen (e.g., "Playing Chess")
 * @param status - A short status string (e.g., "White to move", "Checkmate")
 * @param visualContent - The ASCII representation of the board
 * @param controls - Instructions on how to control the game
 * @param structuredState - Optional structured chess state
 * @returns Whether the state file was written
 */
export const logGameState = (
    screenName: string,
    status: string,
    visualContent: string,
    controls: string = "Enter moves as e2e4, e7e8q to promote.",
    structuredState?: ChessState
): boolean => {
    const state: LoggedGameState = {
        timestamp: Date.now(),
        pid: process.pid,
        screen: screenName,
        status,
        game: structuredState,
    };

    currentState = state;
    for (const callback of subscribers) {
        callback(state);
    }

    if (!fileLoggingEnabled) return false;

    const target = getStateFilePath();
    try {
        fs.writeFileSync(target, formatGameState(state, visualContent, controls), 'utf-8');
        return true;
    } catch (err) {
        // A failed write never interrupts the game
        console.warn(`[StateLogger] Could not write ${target}: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
};

/**
 * Get the most recently logged state
 */
export const getCurrentState = (): LoggedGameState | null => {
    return currentState;
};

/**
 * Subscribe to state updates
 * Returns an unsubscribe function
 */
export const subscribeToState = (callback: (state: LoggedGameState) => void): () => void => {
    subscribers.add(callback);
    return () => {
        subscribers.delete(callback);
    };
};
