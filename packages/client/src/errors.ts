/**
 * Client error types.
 *
 * Protocol outcomes (rejected, expired, ...) are values, not errors; these
 * classes cover programming mistakes, bad configuration and the approving
 * side's single request.
 */

function captureStack(target: Error, constructor: Function): void {
  // Maintain proper stack trace for V8 (Node.js-specific)
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(target, constructor);
  }
}

export type PairingErrorCode =
  | 'SESSION_ALREADY_STARTED'
  | 'NOT_SIGNED_IN'
  | 'INVALID_LINK'
  | 'RESPONSE_REJECTED'
  | 'RESPONSE_FAILED';

export class PairingError extends Error {
  readonly code: PairingErrorCode;

  constructor(message: string, code: PairingErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PairingError';
    this.code = code;
    captureStack(this, PairingError);
  }
}

export function isPairingError(error: unknown, code?: PairingErrorCode): error is PairingError {
  return error instanceof PairingError && (code === undefined || error.code === code);
}

/**
 * Thrown by loadConfig for a value it cannot use.
 */
export class ConfigError extends Error {
  /** Environment variable or option that was rejected */
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(`Invalid configuration for ${setting}: ${message}`);
    this.name = 'ConfigError';
    this.setting = setting;
    captureStack(this, ConfigError);
  }
}
