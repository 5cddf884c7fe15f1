/**
 * Program configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 */

import { isLogLevel, type LogLevel } from './logger.js';
import { NodeTerminal, type TerminalSession } from './terminal.js';
import type { ProgramOptions } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ProgramConfig {
  altScreen: boolean;
  handleSignals: boolean;
  logLevel: LogLevel;
  logFile: string | null;
  terminal: TerminalSession;
}

export type Environment = Record<string, string | undefined>;

// ============================================================================
// Defaults
// ============================================================================

const DEFAULTS: Omit<ProgramConfig, 'terminal'> = {
  altScreen: false,
  handleSignals: true,
  logLevel: 'info',
  logFile: null
};

export const ENV_LOG_LEVEL = 'LOG_LEVEL';
export const ENV_LOG_FILE = 'LOOPKIT_LOG_FILE';

function envLogLevel(env: Environment): LogLevel | undefined {
  const value = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  return isLogLevel(value) ? value : undefined;
}

function envLogFile(env: Environment): string | undefined {
  const value = env[ENV_LOG_FILE]?.trim();
  return value ? value : undefined;
}

export function resolveConfig(options: ProgramOptions = {}, env: Environment = process.env): ProgramConfig {
  return {
    altScreen: options.altScreen ?? DEFAULTS.altScreen,
    handleSignals: options.handleSignals ?? DEFAULTS.handleSignals,
    logLevel: options.logLevel ?? envLogLevel(env) ?? DEFAULTS.logLevel,
    logFile: options.logFile ?? envLogFile(env) ?? DEFAULTS.logFile,
    terminal: options.terminal ?? new NodeTerminal()
  };
}
