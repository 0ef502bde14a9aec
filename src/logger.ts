/**
 * Console logger with an explicit level.
 *
 * Everything goes to stderr so stdout carries only the report, which keeps
 * `--format json` and `--format csv` output pipeable.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  colors?: boolean;
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

// ANSI colors for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

export function paint(text: string, color: keyof typeof colors, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const useColors = options.colors ?? true;
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (messageLevel: Exclude<LogLevel, 'silent'>, prefix: string, message: string) => {
    if (LEVEL_RANK[messageLevel] <= LEVEL_RANK[level]) {
      write(`${prefix} ${message}`);
    }
  };

  return {
    level,
    error: (message) => emit('error', paint('✗', 'red', useColors), message),
    warn: (message) => emit('warn', paint('⚠', 'yellow', useColors), message),
    info: (message) => emit('info', paint('ℹ', 'blue', useColors), message),
    debug: (message) => emit('debug', paint('·', 'dim', useColors), message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
