/**
 * Error hierarchy for the history ledger.
 */

import { ErrorCode } from "./codes.js";

export class HistoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "HistoryError";
  }
}

/**
 * Caller contract violation: negative token cost, out-of-range position,
 * negative ceiling and the like.
 */
export class InvalidArgumentError extends HistoryError {
  constructor(
    public readonly argument: string,
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(`Invalid argument "${argument}": ${message}`, options?.code ?? ErrorCode.INVALID_ARGUMENT, options);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Persisted ledger state that fails validation on load.
 */
export class MalformedStateError extends InvalidArgumentError {
  constructor(
    message: string,
    options?: { cause?: Error },
  ) {
    super("state", message, { ...options, code: ErrorCode.MALFORMED_STATE });
    this.name = "MalformedStateError";
  }
}

export class ConfigError extends HistoryError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
