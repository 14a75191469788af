// Configuration
// Merges the optional config file with command-line flags (flags win)

import * as fs from 'node:fs';
import { z } from 'zod';
import { CONFIG_PATH, DEBUG_LOG_PATH, DEFAULT_LIBRARY_PATH } from './tui/constants.js';

/** Tick length when no key arrives, in ms */
export const DEFAULT_TICK_MS = 200;

const TickSchema = z.number().int().min(20).max(5000);

export const ConfigFileSchema = z
  .object({
    libraryPath: z.string().min(1).optional(),
    tickMs: TickSchema.optional(),
    logPath: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AppConfig {
  libraryPath: string;
  tickMs: number;
  logPath: string;
}

export interface CliOptions {
  help: boolean;
  version: boolean;
  libraryPath: string | null;
  tickMs: number | null;
}

/**
 * Parse process arguments (without node and script path)
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, version: false, libraryPath: null, tickMs: null };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (arg === '--tick') {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error('--tick requires a value in milliseconds');
      }
      const parsed = TickSchema.safeParse(Number(value));
      if (!parsed.success) {
        throw new Error(`--tick must be an integer between 20 and 5000, got "${value}"`);
      }
      options.tickMs = parsed.data;
      i++;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (options.libraryPath === null) {
      // First positional argument is the library file
      options.libraryPath = arg;
    }
  }

  return options;
}

/**
 * Read the config file. A missing file yields an empty config;
 * invalid JSON or unknown keys throw.
 */
export function loadConfigFile(filePath: string = CONFIG_PATH): ConfigFile {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return ConfigFileSchema.parse(JSON.parse(content));
}

export function resolveConfig(cli: CliOptions, file: ConfigFile): AppConfig {
  return {
    libraryPath: cli.libraryPath ?? file.libraryPath ?? DEFAULT_LIBRARY_PATH,
    tickMs: cli.tickMs ?? file.tickMs ?? DEFAULT_TICK_MS,
    logPath: file.logPath ?? DEBUG_LOG_PATH,
  };
}
