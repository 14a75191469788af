// Controller-owned application state
// Tracks the active screen, input mode, dirty flag and the pending command queue

import type { Command, ScreenName } from './command.js';

/**
 * How key presses are interpreted
 * - normal: keys are shortcuts mapped to commands
 * - command-entry: keys edit the command line text
 */
export type AppMode = 'normal' | 'command-entry';

/**
 * Main application state interface
 */
export interface AppState {
  currentScreen: ScreenName;
  currentMode: AppMode;
  /** Whether the active screen must be re-rendered this tick */
  dirty: boolean;
  /** Pending commands, oldest first */
  commandQueue: Command[];
}

/**
 * Creates the initial application state
 * dirty starts true so the first frame is always rendered
 */
export function createInitialState(): AppState {
  return {
    currentScreen: 'main',
    currentMode: 'normal',
    dirty: true,
    commandQueue: [],
  };
}

/**
 * Appends a command to the back of the queue
 */
export function enqueueCommand(state: AppState, command: Command): void {
  state.commandQueue.push(command);
}

/**
 * Removes and returns the oldest queued command, or null when the queue is empty
 */
export function dequeueCommand(state: AppState): Command | null {
  return state.commandQueue.shift() ?? null;
}

export function setMode(state: AppState, mode: AppMode): void {
  state.currentMode = mode;
}

export function setScreen(state: AppState, screen: ScreenName): void {
  state.currentScreen = screen;
}
