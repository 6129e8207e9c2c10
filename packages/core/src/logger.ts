/**
 * Structured, level-based logging with context.
 *
 * The default handler writes one JSON object per line. The CLI swaps in the
 * human-readable handler from `createPrettyLogHandler()`.
 */

import chalk from 'chalk';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const jsonLogHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error) {
    console.error(line);
  } else if (entry.level === LogLevel.Warn) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const LEVEL_COLOURS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.Debug]: chalk.gray,
  [LogLevel.Info]: chalk.cyan,
  [LogLevel.Warn]: chalk.yellow,
  [LogLevel.Error]: chalk.red,
};

function formatContextValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Single-line, coloured output for interactive terminals. */
export function createPrettyLogHandler(): LogHandler {
  return (entry) => {
    const { component, ...rest } = entry.context ?? {};
    const prefix = typeof component === 'string' ? `[${component}]` : '[stagecraft]';
    const fields = Object.entries(rest)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => chalk.dim(`${key}=${formatContextValue(value)}`))
      .join(' ');
    const line = `${LEVEL_COLOURS[entry.level](prefix)} ${entry.message}${fields ? ` ${fields}` : ''}`;
    if (entry.level === LogLevel.Error || entry.level === LogLevel.Warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

let currentHandler: LogHandler = jsonLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the active log handler (tests, CLI output, external sinks). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Messages below this level are dropped. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  return Object.values(LogLevel).find((level) => level === value.toLowerCase());
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

/** Create a logger whose entries always carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export const logger = createLogger({ component: 'stagecraft' });
