// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Detects whether the library runs in development or production.
 * `NODE_ENV` of "development" or "test" means development; anything else,
 * including an unset variable, means production.
 * @module
 */

export type AppEnvironment = "development" | "production";

export const environment = (() => {
  const cache = new Map<string, boolean>();
  let explicitEnvironment: AppEnvironment | undefined;

  function readNodeEnvironment(): string | undefined {
    if (typeof process === "undefined") return undefined;
    const value = process.env["NODE_ENV"];
    return typeof value === "string" ? value.trim().toLowerCase() : undefined;
  }

  return {
    setExplicitEnv(environment_: AppEnvironment) {
      explicitEnvironment = environment_;
      cache.clear();
    },
    get isDevelopment() {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "development";
      const cached = cache.get("isDevelopment");
      if (cached !== undefined) return cached;

      const nodeEnvironment = readNodeEnvironment();
      const result =
        nodeEnvironment === "development" || nodeEnvironment === "test";
      cache.set("isDevelopment", result);
      return result;
    },
    get isProduction() {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "production";
      // Reference the exported object so the getter survives extraction.
      return !environment.isDevelopment;
    },
    clearCache() {
      explicitEnvironment = undefined;
      cache.clear();
    },
  };
})();

/**
 * Returns `true` if the current environment is determined to be 'development'.
 */
export function isDevelopment(): boolean {
  return environment.isDevelopment;
}
