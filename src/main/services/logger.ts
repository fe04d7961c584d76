/**
 * Tagged logger with a global level and a swappable sink.
 *
 * Output goes to the console until the dashboard takes over the screen;
 * from then on main.ts routes it to a log file or drops it.
 */

import * as fs from 'fs';
import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = (level: LogLevel, prefix: string, message: string, args: unknown[]) => void;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = (level, prefix, message, args) => {
  switch (level) {
    case 'debug':
      console.debug(prefix, message, ...args);
      break;
    case 'info':
      console.log(prefix, message, ...args);
      break;
    case 'warn':
      console.warn(prefix, message, ...args);
      break;
    case 'error':
      console.error(prefix, message, ...args);
      break;
  }
};

export const silentSink: LogSink = () => undefined;

/**
 * Append one line per entry to `filePath`. The first failed write disables
 * the sink; the screen is owned by the dashboard, so there is nowhere else
 * to report it.
 */
export function createFileSink(filePath: string): LogSink {
  let disabled = false;
  return (level, prefix, message, args) => {
    if (disabled) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${prefix} ${format(message, ...args)}\n`;
    try {
      fs.appendFileSync(filePath, line, 'utf8');
    } catch {
      disabled = true;
    }
  };
}

/** Global log level, adjustable at runtime */
let globalLogLevel: LogLevel = 'info';
let globalSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Route all loggers to `sink`; null restores the console. */
export function setLogSink(sink: LogSink | null): void {
  globalSink = sink ?? consoleSink;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'EventLoop', 'MetricsProvider')
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel]) {
      globalSink(level, prefix, message, args);
    }
  };

  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', message, args);
    },
    info(message: string, ...args: unknown[]) {
      write('info', message, args);
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', message, args);
    },
    error(message: string, ...args: unknown[]) {
      write('error', message, args);
    },
  };
}
