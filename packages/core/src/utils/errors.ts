/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Extracts a string error message from an unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * An error that should end the process with a specific exit code.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
    this.name = 'FatalError';
  }
}

/**
 * Raised when hook input cannot be read or does not match the protocol.
 * Exit code 1 is reported by the host as a non-blocking hook error.
 */
export class FatalInputError extends FatalError {
  constructor(message: string) {
    super(message, 1);
    this.name = 'FatalInputError';
  }
}

/**
 * Raised when rule files cannot be loaded.
 */
export class FatalConfigError extends FatalError {
  constructor(message: string) {
    super(message, 1);
    this.name = 'FatalConfigError';
  }
}
