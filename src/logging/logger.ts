import type { LogLevel } from '../types/config.types.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'Debug: ',
  info: '',
  warn: 'Warning: ',
  error: 'Error: ',
};

export type LineWriter = (line: string) => void;

// stdout is reserved for command output and the MCP stdio transport
const writeStderr: LineWriter = (line) => {
  process.stderr.write(line);
};

/**
 * Level-filtered logger emitting `[ragbase] ...` lines.
 */
export function createLogger(level: LogLevel = 'info', write: LineWriter = writeStderr): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (at: LogLevel, message: string): void => {
    if (LEVEL_RANK[at] < threshold) return;
    write(`[ragbase] ${LEVEL_LABEL[at]}${message}\n`);
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
