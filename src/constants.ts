// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Project-wide immutable constants and accessors.
 * Collections stay private; callers get read-only views.
 */

const _FORBIDDEN_KEYS = new Set([
  "__proto__",
  "prototype",
  "constructor",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__",
]);
Object.freeze(_FORBIDDEN_KEYS);

/**
 * Returns true if the key must never become an object property
 * (auxiliary URI params, header names).
 */
export function isForbiddenKey(key: string): boolean {
  return _FORBIDDEN_KEYS.has(key);
}

// --- URI character classes (RFC 3986 §2.2, §2.3) ---

/** unreserved = ALPHA / DIGIT / "-" / "." / "_" / "~" */
export const UNRESERVED_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";

/** sub-delims = "!" / "$" / "&" / "'" / "(" / ")" / "*" / "+" / "," / ";" / "=" */
export const SUB_DELIM_CHARS = "!$&'()*+,;=";

/** Extra literals each encoded component keeps as-is. */
export const USERINFO_EXTRA_CHARS = "";
export const PASSWORD_EXTRA_CHARS = ":";
export const PATH_EXTRA_CHARS = ":@/";
export const QUERY_EXTRA_CHARS = ":@/?";

/** scheme = ALPHA *( ALPHA / DIGIT / "+" / "-" / "." ) */
export const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;

/** Schemes whose URIs require a host (RFC 7230 §2.7). */
export const HOST_REQUIRED_SCHEMES: readonly string[] = Object.freeze([
  "http",
  "https",
]);

/** Scheme that keeps the `//` separator even with an empty authority. */
export const FILE_SCHEME = "file";

export const DEFAULT_HTTP_HOST = "localhost";

export const DEFAULT_SCHEME_PORTS: Readonly<Record<string, number>> =
  Object.freeze({
    http: 80,
    https: 443,
    ws: 80,
    wss: 443,
    ftp: 21,
    gopher: 70,
    nntp: 119,
    news: 119,
    telnet: 23,
    tn3270: 23,
    imap: 143,
    pop: 110,
    ldap: 389,
  });

export const MIN_PORT = 1;
export const MAX_PORT = 0xffff;

/** Default cap on raw URI input accepted by the parser. */
export const DEFAULT_MAX_URI_LENGTH = 10_000;

/** Query separators escaped inside keys and values by the query helpers. */
export const QUERY_SEPARATOR_REPLACEMENTS: Readonly<Record<string, string>> =
  Object.freeze({
    "=": "%3D",
    "&": "%26",
  });

export const DEFAULT_PROTOCOL_VERSION = "1.1";
