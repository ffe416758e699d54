// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Error classes for machine-readable error handling.
 * @module
 */

const MAX_LOGGED_MESSAGE_LENGTH = 256;

/**
 * A raw string could not be split into a structurally valid URI.
 * `cause` carries the filter or validation error when one triggered it.
 */
export class MalformedUriError extends SyntaxError {
  public readonly code = "ERR_MALFORMED_URI";

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(`[uri-kit] ${message}`, options);
    this.name = "MalformedUriError";
  }
}

export class InvalidArgumentError extends RangeError {
  public readonly code = "ERR_INVALID_ARGUMENT";

  constructor(message: string) {
    super(`[uri-kit] ${message}`);
    this.name = "InvalidArgumentError";
  }
}

export class InvalidStateError extends Error {
  public readonly code = "ERR_INVALID_STATE";

  constructor(message: string) {
    super(`[uri-kit] ${message}`);
    this.name = "InvalidStateError";
  }
}

export class InvalidConfigurationError extends Error {
  public readonly code = "ERR_INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`[uri-kit] ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

export type UriKitErrorCode =
  | MalformedUriError["code"]
  | InvalidArgumentError["code"]
  | InvalidStateError["code"]
  | InvalidConfigurationError["code"];

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Sanitizes error objects for safe logging by truncating messages
 * and extracting only name, code and message.
 */
export function sanitizeErrorForLogs(error: unknown): {
  readonly name?: string;
  readonly code?: string;
  readonly message?: string;
} {
  if (error instanceof Error) {
    const code = readCode(error);
    return {
      name: error.name,
      message: error.message.slice(0, MAX_LOGGED_MESSAGE_LENGTH),
      ...(code ? { code } : {}),
    };
  }
  return { message: String(error).slice(0, MAX_LOGGED_MESSAGE_LENGTH) };
}
