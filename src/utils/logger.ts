import type { Logger } from '../types/logger.js';

export type ConsoleLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface ConsoleLoggerOptions {
  level?: ConsoleLogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Sink for formatted lines (defaults to console.log / console.error) */
  write?: (line: string, level: ConsoleLogLevel) => void;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const levels: Record<ConsoleLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Built-in logger used when no Pino/Winston instance is supplied.
 * Level comes from options, then DEBUG (`DEBUG=coaplink` or `DEBUG=*`).
 */
export class ConsoleLogger implements Logger {
  private level: ConsoleLogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;
  private write: (line: string, level: ConsoleLogLevel) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level || detectLogLevel(process.env.DEBUG);
    this.prefix = options.prefix || 'coaplink';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && this.supportsColors();
    this.write = options.write || defaultWrite;
  }

  private supportsColors(): boolean {
    return (
      process.stdout.isTTY === true &&
      !process.env.NO_COLOR &&
      process.env.TERM !== 'dumb'
    );
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colorize(`[${time}]`, 'gray') + ' ';
  }

  private shouldLog(level: ConsoleLogLevel): boolean {
    return levels[level] >= levels[this.level];
  }

  private log(level: ConsoleLogLevel, message: string, args: unknown[]) {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = this.colorize(`[${this.prefix}]`, 'cyan');
    const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    this.write(`${timestamp}${prefix} ${message}${extra}`, level);
  }

  debug(message: string, ...args: unknown[]) {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log('warn', this.colorize(message, 'yellow'), args);
  }

  error(message: string, ...args: unknown[]) {
    this.log('error', this.colorize(message, 'red'), args);
  }
}

export function detectLogLevel(debugEnv: string | undefined): ConsoleLogLevel {
  const env = debugEnv || '';
  if (env.includes('*') || env.split(',').some((name) => name.trim() === 'coaplink')) {
    return 'debug';
  }
  return 'none';
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

function defaultWrite(line: string, level: ConsoleLogLevel): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new ConsoleLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger) {
  globalLogger = logger;
}
