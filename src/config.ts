// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Public API for configuring uri-kit.
 * @module
 */

import { InvalidArgumentError } from "./errors";
import {
  assertConfigurable,
  _markConfigured,
  _sealConfig,
  getConfigState,
  ConfigState,
} from "./state";
import { environment, type AppEnvironment } from "./environment";
import {
  DEFAULT_HTTP_HOST,
  DEFAULT_MAX_URI_LENGTH,
  DEFAULT_SCHEME_PORTS,
  MAX_PORT,
  MIN_PORT,
  SCHEME_PATTERN,
} from "./constants";

// ====================== URI configuration =======================

export type UriConfig = {
  /** Host forced onto http(s) URIs that have none. */
  readonly defaultHost: string;
  /** Well-known port per lower-case scheme; matching ports are elided. */
  readonly defaultPorts: Readonly<Record<string, number>>;
  /** Raw strings longer than this are rejected by the parser. */
  readonly maxUriLength: number;
};

const DEFAULT_URI_CONFIG: UriConfig = Object.freeze({
  defaultHost: DEFAULT_HTTP_HOST,
  defaultPorts: DEFAULT_SCHEME_PORTS,
  maxUriLength: DEFAULT_MAX_URI_LENGTH,
});

let _uriConfig: UriConfig = DEFAULT_URI_CONFIG;

export function getUriConfig(): UriConfig {
  return _uriConfig;
}

function validateDefaultHost(value: unknown): string {
  if (typeof value !== "string" || !/^[a-z0-9.-]+$/.test(value)) {
    throw new InvalidArgumentError(
      "UriConfig.defaultHost must be a non-empty lower-case host name.",
    );
  }
  return value;
}

function validateDefaultPorts(
  value: unknown,
): Readonly<Record<string, number>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(
      "UriConfig.defaultPorts must be a plain object of scheme to port.",
    );
  }
  const entries = Object.entries(value).map(
    ([scheme, port]: [string, unknown]): [string, number] => {
      if (!SCHEME_PATTERN.test(scheme) || scheme !== scheme.toLowerCase()) {
        throw new InvalidArgumentError(
          `UriConfig.defaultPorts key '${scheme}' is not a lower-case scheme.`,
        );
      }
      if (
        typeof port !== "number" ||
        !Number.isInteger(port) ||
        port < MIN_PORT ||
        port > MAX_PORT
      ) {
        throw new InvalidArgumentError(
          `UriConfig.defaultPorts.${scheme} must be an integer between ${String(MIN_PORT)} and ${String(MAX_PORT)}.`,
        );
      }
      return [scheme, port];
    },
  );
  return Object.freeze(Object.fromEntries(entries));
}

function validateMaxUriLength(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(
      "UriConfig.maxUriLength must be a positive integer.",
    );
  }
  return value;
}

export function setUriConfig(cfg: Partial<UriConfig>): void {
  assertConfigurable();
  const next: UriConfig = Object.freeze({
    defaultHost:
      cfg.defaultHost === undefined
        ? _uriConfig.defaultHost
        : validateDefaultHost(cfg.defaultHost),
    defaultPorts:
      cfg.defaultPorts === undefined
        ? _uriConfig.defaultPorts
        : validateDefaultPorts(cfg.defaultPorts),
    maxUriLength:
      cfg.maxUriLength === undefined
        ? _uriConfig.maxUriLength
        : validateMaxUriLength(cfg.maxUriLength),
  });
  _markConfigured();
  _uriConfig = next;
}

// Test-only helper to reset the URI configuration
export function _resetUriConfigForTests(): void {
  _uriConfig = DEFAULT_URI_CONFIG;
}

// ====================== Logging configuration =======================

export type LoggingConfig = {
  /** Dev-only: maximum number of dev log lines per minute. Defaults to 200. */
  readonly rateLimitTokensPerMinute: number;
};

const DEFAULT_LOGGING_CONFIG: LoggingConfig = Object.freeze({
  rateLimitTokensPerMinute: 200,
});

let _loggingConfig: LoggingConfig = DEFAULT_LOGGING_CONFIG;

export function getLoggingConfig(): LoggingConfig {
  return _loggingConfig;
}

export function setLoggingConfig(cfg: Partial<LoggingConfig>): void {
  assertConfigurable();
  const rate = cfg.rateLimitTokensPerMinute;
  if (rate !== undefined && (!Number.isInteger(rate) || rate <= 0)) {
    throw new InvalidArgumentError(
      "rateLimitTokensPerMinute must be a positive integer.",
    );
  }
  _markConfigured();
  _loggingConfig = Object.freeze({
    rateLimitTokensPerMinute: rate ?? _loggingConfig.rateLimitTokensPerMinute,
  });
}

export function _resetLoggingConfigForTests(): void {
  _loggingConfig = DEFAULT_LOGGING_CONFIG;
}

// ====================== Deprecation handler =======================

export type DeprecationNotice = {
  /** Stable identifier of the deprecated behaviour. */
  readonly id: string;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
};

export type DeprecationHandler = (notice: DeprecationNotice) => void;

let _deprecationHandler: DeprecationHandler | undefined;

export function getDeprecationHandler(): DeprecationHandler | undefined {
  return _deprecationHandler;
}

/**
 * Installs the receiver of non-fatal deprecation notices, replacing the
 * default dev-log sink. `null` uninstalls it.
 */
export function setDeprecationHandler(
  handler: DeprecationHandler | null,
): void {
  assertConfigurable();
  if (handler !== null && typeof handler !== "function") {
    throw new InvalidArgumentError(
      "Deprecation handler must be a function or null.",
    );
  }
  _markConfigured();
  _deprecationHandler = handler ?? undefined;
}

// ====================== Lifecycle =======================

/**
 * Explicitly sets the application's environment.
 */
export function setAppEnvironment(environment_: AppEnvironment): void {
  assertConfigurable();
  const allowed = new Set<string>(["development", "production"]);
  if (!allowed.has(environment_)) {
    throw new InvalidArgumentError(
      'Environment must be either "development" or "production".',
    );
  }
  _markConfigured();
  environment.setExplicitEnv(environment_);
}

/**
 * Seals the configuration. Call once at startup after all setters ran.
 */
export function sealUriKit(): void {
  if (getConfigState() === ConfigState.Sealed) return;
  _sealConfig();
}

/** Alias of {@link sealUriKit}. */
export function freezeConfig(): void {
  sealUriKit();
}
