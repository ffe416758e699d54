// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Non-fatal diagnostics for deprecated behaviour, such as the automatic
 * leading-slash correction of a path under an authority.
 * Notices go to the handler installed with `setDeprecationHandler`, or to
 * the dev log when none is installed. Emitting never throws.
 * @module
 */

import {
  getDeprecationHandler,
  type DeprecationNotice,
} from "./config";
import { sanitizeErrorForLogs } from "./errors";
import { createLogger } from "./logger";
import { _redact, validateNumericParameter } from "./utils";

const log = createLogger("deprecation");

// Integer arithmetic for token refill avoids floating-point drift.
const TOKEN_PRECISION = 1000; // millitokens
const _deprecationRateState = {
  tokens: 20 * TOKEN_PRECISION,
  maxTokens: 20 * TOKEN_PRECISION,
  refillRatePerSec: 5,
  lastRefillTs: 0,
};

/**
 * Configures how many notices may be emitted in a burst and how fast the
 * allowance refills.
 */
export function configureDeprecationRateLimit(config: {
  readonly burst: number;
  readonly refillRatePerSec: number;
}): void {
  validateNumericParameter(config.burst, "burst", 1, 1000);
  validateNumericParameter(
    config.refillRatePerSec,
    "refillRatePerSec",
    0,
    1000,
  );
  _deprecationRateState.maxTokens = config.burst * TOKEN_PRECISION;
  _deprecationRateState.tokens = config.burst * TOKEN_PRECISION;
  _deprecationRateState.refillRatePerSec = config.refillRatePerSec;
  _deprecationRateState.lastRefillTs = 0;
}

function takeToken(now: number): boolean {
  if (_deprecationRateState.lastRefillTs === 0) {
    _deprecationRateState.lastRefillTs = now;
  }
  const elapsedMs = Math.max(0, now - _deprecationRateState.lastRefillTs);
  _deprecationRateState.lastRefillTs = now;
  const tokensToAdd = Math.floor(
    (elapsedMs * _deprecationRateState.refillRatePerSec * TOKEN_PRECISION) /
      1000,
  );
  if (tokensToAdd > 0) {
    _deprecationRateState.tokens = Math.min(
      _deprecationRateState.maxTokens,
      _deprecationRateState.tokens + tokensToAdd,
    );
  }
  if (_deprecationRateState.tokens < TOKEN_PRECISION) return false;
  _deprecationRateState.tokens -= TOKEN_PRECISION;
  return true;
}

/**
 * Emits one deprecation notice. Returns whether it was delivered (false when
 * rate limited).
 */
export function emitDeprecation(
  id: string,
  message: string,
  context: Record<string, unknown> = {},
): boolean {
  if (!takeToken(Date.now())) return false;

  const redacted = _redact(context);
  const notice: DeprecationNotice = Object.freeze({
    id,
    message,
    context: Object.freeze(
      typeof redacted === "object" && redacted !== null ? { ...redacted } : {},
    ),
  });

  const handler = getDeprecationHandler();
  if (handler === undefined) {
    log.warn(`${id}: ${message}`, notice.context);
    return true;
  }
  try {
    handler(notice);
  } catch (error) {
    // The handler is caller code; its failure must not fail the URI operation.
    log.error("Deprecation handler threw", {
      id,
      error: sanitizeErrorForLogs(error),
    });
  }
  return true;
}

// Test helper: restore the default rate limit and refill clock.
export function __test_resetDeprecationRateLimit(): void {
  _deprecationRateState.maxTokens = 20 * TOKEN_PRECISION;
  _deprecationRateState.tokens = 20 * TOKEN_PRECISION;
  _deprecationRateState.refillRatePerSec = 5;
  _deprecationRateState.lastRefillTs = 0;
}
