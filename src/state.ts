// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Lifecycle of the runtime configuration.
 * @module
 */

import { environment } from "./environment";
import { InvalidConfigurationError } from "./errors";

// --- State Machine ---
export const ConfigState = Object.freeze({
  Unconfigured: "unconfigured",
  Configured: "configured",
  Sealed: "sealed",
} as const);
export type ConfigState = (typeof ConfigState)[keyof typeof ConfigState];

let _configState: ConfigState = ConfigState.Unconfigured;

export function getConfigState(): ConfigState {
  return _configState;
}

/**
 * Throws when configuration has been sealed. Every setter calls this first.
 */
export function assertConfigurable(): void {
  if (_configState === ConfigState.Sealed) {
    throw new InvalidConfigurationError(
      "Configuration is sealed and cannot be changed.",
    );
  }
}

/** Records that a setter changed configuration. */
export function _markConfigured(): void {
  assertConfigurable();
  _configState = ConfigState.Configured;
}

export function _sealConfig(): void {
  _configState = ConfigState.Sealed;
}

/**
 * Test-only: return to the unconfigured state. Refused in production so a
 * sealed configuration cannot be reopened by application code.
 */
export function __test_resetConfigStateForUnitTests(): void {
  if (environment.isProduction) {
    throw new InvalidConfigurationError(
      "Test-only state reset is unavailable in production.",
    );
  }
  _configState = ConfigState.Unconfigured;
}
