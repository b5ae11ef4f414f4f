/**
 * Levelled console logger.
 *
 * Every module logs through a scoped instance, e.g. `createLogger('pairing')`:
 *
 *   [2026-01-01T00:00:00.000Z] INFO  [pairing] Pairing request accepted
 *
 * Never pass secrets, tokens or bundles; public keys go through fingerprint().
 */

import { bytesToHex } from '@keybridge/crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  return String(arg);
}

export function formatMessage(
  level: LogLevel,
  scope: string,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const formattedArgs = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  return `[${timestamp}] ${levelStr} [${scope}] ${message}${formattedArgs}`;
}

export type Logger = {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
};

export function createLogger(scope: string): Logger {
  return {
    debug(message, ...args) {
      if (shouldLog('debug')) {
        console.log(formatMessage('debug', scope, message, ...args));
      }
    },

    info(message, ...args) {
      if (shouldLog('info')) {
        console.log(formatMessage('info', scope, message, ...args));
      }
    },

    warn(message, ...args) {
      if (shouldLog('warn')) {
        console.warn(formatMessage('warn', scope, message, ...args));
      }
    },

    error(message, ...args) {
      if (shouldLog('error')) {
        console.error(formatMessage('error', scope, message, ...args));
      }
    },
  };
}

/** First 8 bytes of a public key as hex, for log lines */
export function fingerprint(publicKey: Uint8Array): string {
  return bytesToHex(publicKey.subarray(0, 8));
}
