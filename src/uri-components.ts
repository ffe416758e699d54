// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Per-field filters and whole-record validation for URI components.
 *
 * Everything here is pure: filters either return the normalized value or
 * throw {@link InvalidArgumentError}, and {@link validateComponents} returns
 * the corrected record together with the notices the caller should emit.
 * @module
 */

import { InvalidArgumentError, InvalidStateError } from "./errors";
import { getUriConfig } from "./config";
import {
  FILE_SCHEME,
  HOST_REQUIRED_SCHEMES,
  MAX_PORT,
  MIN_PORT,
  SCHEME_PATTERN,
} from "./constants";
import {
  encodeComponent,
  PASSWORD_CHARS,
  PATH_CHARS,
  QUERY_CHARS,
  USERINFO_CHARS,
  type CharacterClass,
} from "./encoding";
import { isValidHostSyntax, type UriParts } from "./uri-parser";

/** Filtered components of a URI. Empty strings mean "absent". */
export type UriComponents = {
  readonly scheme: string;
  readonly userInfo: string;
  readonly host: string;
  readonly port: number | null;
  readonly path: string;
  readonly query: string;
  readonly fragment: string;
};

export const EMPTY_COMPONENTS: UriComponents = Object.freeze({
  scheme: "",
  userInfo: "",
  host: "",
  port: null,
  path: "",
  query: "",
  fragment: "",
});

export type ValidationNotice = {
  readonly id: string;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
};

export type ValidationResult = {
  readonly components: UriComponents;
  readonly notices: readonly ValidationNotice[];
};

export const PATH_WITHOUT_LEADING_SLASH = "uri.path-without-leading-slash";

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`${name} must be a string.`);
  }
  return value;
}

export function filterScheme(scheme: string): string {
  const value = assertString(scheme, "Scheme");
  if (value === "") return "";
  if (!SCHEME_PATTERN.test(value)) {
    throw new InvalidArgumentError(`Scheme "${value}" is not valid.`);
  }
  return value.toLowerCase();
}

export function filterHost(host: string): string {
  const value = assertString(host, "Host");
  if (value === "") return "";
  if (!isValidHostSyntax(value)) {
    throw new InvalidArgumentError(
      "Host must be a registered name or a bracketed IP literal.",
    );
  }
  return value.toLowerCase();
}

/**
 * `null` and `undefined` unset the port.
 * @throws {InvalidArgumentError} Unless an integer in [1, 65535].
 */
export function filterPort(port: number | null | undefined): number | null {
  if (port === null || port === undefined) return null;
  if (
    typeof port !== "number" ||
    !Number.isInteger(port) ||
    port < MIN_PORT ||
    port > MAX_PORT
  ) {
    throw new InvalidArgumentError(
      `Invalid port: ${String(port)}. Must be between ${String(MIN_PORT)} and ${String(MAX_PORT)}.`,
    );
  }
  return port;
}

export function filterUserInfoComponent(
  component: string,
  allowed: CharacterClass = USERINFO_CHARS,
): string {
  return encodeComponent(assertString(component, "User info"), allowed);
}

/**
 * Builds `user[:password]`. An empty password adds no colon; a password
 * with an empty user gives `:password`.
 */
export function composeUserInfo(
  user: string,
  password?: string | null,
): string {
  const encodedUser = filterUserInfoComponent(user);
  if (password === undefined || password === null) return encodedUser;
  const encodedPassword = filterUserInfoComponent(password, PASSWORD_CHARS);
  return encodedPassword === ""
    ? encodedUser
    : `${encodedUser}:${encodedPassword}`;
}

export function filterPath(path: string): string {
  return encodeComponent(assertString(path, "Path"), PATH_CHARS);
}

export function filterQueryOrFragment(value: string): string {
  return encodeComponent(assertString(value, "Query or fragment"), QUERY_CHARS);
}

/** Configured well-known port of `scheme`, if any. */
export function defaultPortFor(scheme: string): number | undefined {
  if (scheme === "") return undefined;
  const ports = getUriConfig().defaultPorts;
  return Object.hasOwn(ports, scheme) ? ports[scheme] : undefined;
}

export function removeDefaultPort(components: UriComponents): UriComponents {
  if (
    components.port === null ||
    components.port !== defaultPortFor(components.scheme)
  ) {
    return components;
  }
  return { ...components, port: null };
}

/** `[userinfo@]host[:port]`, or `""` without a host. */
export function composeAuthority(
  components: Pick<UriComponents, "userInfo" | "host" | "port">,
): string {
  if (components.host === "") return "";
  const userInfo = components.userInfo === "" ? "" : `${components.userInfo}@`;
  const port = components.port === null ? "" : `:${String(components.port)}`;
  return `${userInfo}${components.host}${port}`;
}

function pathNotice(
  original: string,
  corrected: string,
  scheme: string,
): ValidationNotice {
  return {
    id: PATH_WITHOUT_LEADING_SLASH,
    message:
      "A path under an authority must start with '/'; a leading slash was added.",
    context: { path: original, corrected, scheme },
  };
}

/**
 * Checks the cross-component invariants of a candidate record.
 * Corrections that do not throw are reported in `notices`.
 * @throws {InvalidStateError} When the record cannot form a valid URI.
 */
export function validateComponents(
  candidate: UriComponents,
): ValidationResult {
  let components = candidate;
  const notices: ValidationNotice[] = [];

  if (
    HOST_REQUIRED_SCHEMES.includes(components.scheme) &&
    components.host === ""
  ) {
    components = { ...components, host: getUriConfig().defaultHost };
  }

  if (
    components.host === "" &&
    (components.userInfo !== "" || components.port !== null)
  ) {
    throw new InvalidStateError(
      "A URI with user info or a port must have a host.",
    );
  }

  const { path, scheme } = components;
  const hasAuthority = composeAuthority(components) !== "";

  if (!hasAuthority) {
    if (path.startsWith("//")) {
      throw new InvalidStateError(
        'The path of a URI without an authority must not start with "//".',
      );
    }
    if (scheme === "" && (path.split("/", 1)[0] ?? "").includes(":")) {
      throw new InvalidStateError(
        "A relative URI must not have a path beginning with a segment containing a colon.",
      );
    }
  }

  const needsLeadingSlash = hasAuthority || scheme === FILE_SCHEME;
  if (needsLeadingSlash && path !== "" && !path.startsWith("/")) {
    const corrected = `/${path}`;
    notices.push(pathNotice(path, corrected, scheme));
    components = { ...components, path: corrected };
  }

  return { components: Object.freeze({ ...components }), notices };
}

/** Applies every field filter to `parts` and elides the default port. */
export function componentsFromParts(parts: UriParts): UriComponents {
  if (typeof parts !== "object" || parts === null) {
    throw new InvalidArgumentError("URI parts must be an object.");
  }
  return removeDefaultPort({
    scheme: filterScheme(parts.scheme ?? ""),
    userInfo: composeUserInfo(parts.user ?? "", parts.pass),
    host: filterHost(parts.host ?? ""),
    port: filterPort(parts.port),
    path: filterPath(parts.path ?? ""),
    query: filterQueryOrFragment(parts.query ?? ""),
    fragment: filterQueryOrFragment(parts.fragment ?? ""),
  });
}
