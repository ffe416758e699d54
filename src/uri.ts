// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Immutable URI value type.
 *
 * A `Uri` is a frozen snapshot of filtered, validated components. Every
 * `with*` method returns a new snapshot, or the same instance when the
 * filtered value is unchanged:
 *
 * ```ts
 * const uri = Uri.parse("https://example.com:443/a b?x=1");
 * uri.getPort(); // null, 443 is the https default
 * uri.getPath(); // "/a%20b"
 * withQueryValue(uri, "y", "2").toString();
 * // "https://example.com/a%20b?x=1&y=2"
 * ```
 * @module
 */

import {
  InvalidArgumentError,
  InvalidStateError,
  MalformedUriError,
} from "./errors";
import { isForbiddenKey, QUERY_SEPARATOR_REPLACEMENTS } from "./constants";
import { emitDeprecation } from "./deprecation";
import { percentDecode } from "./encoding";
import { createLogger } from "./logger";
import {
  composeAuthority,
  composeUserInfo,
  componentsFromParts,
  defaultPortFor,
  EMPTY_COMPONENTS,
  filterHost,
  filterPath,
  filterPort,
  filterQueryOrFragment,
  filterScheme,
  validateComponents,
  type UriComponents,
} from "./uri-components";
import { previewUri, splitUri, type UriParts } from "./uri-parser";

const log = createLogger("uri");

/** Auxiliary values carried by a `Uri`, such as a proxied path. */
export type UriParams = Readonly<Record<string, string>>;

const EMPTY_PARAMS: UriParams = Object.freeze({});

function filterParams(
  params: Readonly<Record<string, unknown>> | undefined,
): UriParams {
  if (params === undefined) return EMPTY_PARAMS;
  if (typeof params !== "object" || params === null || Array.isArray(params)) {
    throw new InvalidArgumentError("URI params must be a plain object.");
  }
  const entries = Object.entries(params).map(
    ([key, value]: [string, unknown]): [string, string] => {
      if (isForbiddenKey(key)) {
        throw new InvalidArgumentError(
          `URI param key '${key}' is not allowed.`,
        );
      }
      if (typeof value !== "string") {
        throw new InvalidArgumentError(`URI param '${key}' must be a string.`);
      }
      return [key, value];
    },
  );
  return Object.freeze(Object.fromEntries(entries));
}

function paramValue(params: UriParams, key: string): string {
  return Object.hasOwn(params, key) ? (params[key] ?? "") : "";
}

/**
 * Joins already-encoded components into a URI reference. `//` is written
 * when there is an authority or the scheme is `file`.
 */
export function composeComponents(
  scheme: string,
  authority: string,
  path: string,
  query: string,
  fragment: string,
): string {
  let uri = "";
  if (scheme !== "") uri += `${scheme}:`;
  if (authority !== "" || scheme === "file") uri += `//${authority}`;
  uri += path;
  if (query !== "") uri += `?${query}`;
  if (fragment !== "") uri += `#${fragment}`;
  return uri;
}

export class Uri {
  readonly #components: UriComponents;
  readonly #params: UriParams;
  readonly #serialized: string;

  private constructor(components: UriComponents, params: UriParams) {
    this.#components = components;
    this.#params = params;
    this.#serialized = composeComponents(
      components.scheme,
      composeAuthority(components),
      components.path,
      components.query,
      components.fragment,
    );
    Object.freeze(this);
  }

  static #create(candidate: UriComponents, params: UriParams): Uri {
    const { components, notices } = validateComponents(candidate);
    for (const notice of notices) {
      emitDeprecation(notice.id, notice.message, notice.context);
    }
    return new Uri(components, params);
  }

  /**
   * Parses a URI reference. An empty string gives an empty URI whose path
   * and query are taken from `params.path` and `params.query`.
   * @throws {MalformedUriError} When `raw` is not a valid URI reference.
   * @throws {InvalidArgumentError} When `params` has a forbidden key or a
   *   non-string value.
   */
  static parse(raw = "", params?: Readonly<Record<string, unknown>>): Uri {
    const safeParams = filterParams(params);
    try {
      if (raw === "") {
        return Uri.#create(
          {
            ...EMPTY_COMPONENTS,
            path: filterPath(paramValue(safeParams, "path")),
            query: filterQueryOrFragment(paramValue(safeParams, "query")),
          },
          safeParams,
        );
      }
      return Uri.#create(componentsFromParts(splitUri(raw)), safeParams);
    } catch (error) {
      if (
        error instanceof InvalidArgumentError ||
        error instanceof InvalidStateError
      ) {
        log.debug("Rejected URI", { reason: error.message });
        throw new MalformedUriError(
          `Unable to parse URI "${previewUri(String(raw))}".`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  /**
   * Builds a URI from pre-split components.
   * @throws {InvalidArgumentError} When a component fails its filter.
   * @throws {InvalidStateError} When the components do not form a valid URI.
   */
  static fromParts(
    parts: UriParts,
    params?: Readonly<Record<string, unknown>>,
  ): Uri {
    return Uri.#create(componentsFromParts(parts), filterParams(params));
  }

  static composeComponents(
    scheme: string,
    authority: string,
    path: string,
    query: string,
    fragment: string,
  ): string {
    return composeComponents(scheme, authority, path, query, fragment);
  }

  getScheme(): string {
    return this.#components.scheme;
  }

  getAuthority(): string {
    return composeAuthority(this.#components);
  }

  getUserInfo(): string {
    return this.#components.userInfo;
  }

  getHost(): string {
    return this.#components.host;
  }

  /** `null` when unset or equal to the scheme's default port. */
  getPort(): number | null {
    return this.#components.port;
  }

  getPath(): string {
    return this.#components.path;
  }

  getQuery(): string {
    return this.#components.query;
  }

  getFragment(): string {
    return this.#components.fragment;
  }

  getParams(): UriParams {
    return this.#params;
  }

  #with(candidate: UriComponents): Uri {
    return Uri.#create(candidate, this.#params);
  }

  withScheme(scheme: string): Uri {
    const next = filterScheme(scheme);
    if (next === this.#components.scheme) return this;
    const port = this.#components.port;
    return this.#with({
      ...this.#components,
      scheme: next,
      port: port !== null && port === defaultPortFor(next) ? null : port,
    });
  }

  withUserInfo(user: string, password?: string | null): Uri {
    const next = composeUserInfo(user, password);
    if (next === this.#components.userInfo) return this;
    return this.#with({ ...this.#components, userInfo: next });
  }

  withHost(host: string): Uri {
    const next = filterHost(host);
    if (next === this.#components.host) return this;
    return this.#with({ ...this.#components, host: next });
  }

  withPort(port: number | null): Uri {
    const filtered = filterPort(port);
    const next =
      filtered !== null && filtered === defaultPortFor(this.#components.scheme)
        ? null
        : filtered;
    if (next === this.#components.port) return this;
    return this.#with({ ...this.#components, port: next });
  }

  withPath(path: string): Uri {
    const next = filterPath(path);
    if (next === this.#components.path) return this;
    return this.#with({ ...this.#components, path: next });
  }

  withQuery(query: string): Uri {
    const next = filterQueryOrFragment(query);
    if (next === this.#components.query) return this;
    return this.#with({ ...this.#components, query: next });
  }

  withFragment(fragment: string): Uri {
    const next = filterQueryOrFragment(fragment);
    if (next === this.#components.fragment) return this;
    return this.#with({ ...this.#components, fragment: next });
  }

  /** True when no port is set or it equals the scheme's default. */
  isDefaultPort(): boolean {
    const { port, scheme } = this.#components;
    return port === null || port === defaultPortFor(scheme);
  }

  /** Default port of the scheme, or 0 when it has none. */
  getDefaultPort(): number {
    return defaultPortFor(this.#components.scheme) ?? 0;
  }

  /** Compares the composed strings; params are ignored. */
  equals(other: unknown): boolean {
    return other instanceof Uri && other.toString() === this.#serialized;
  }

  toJSON(): string {
    return this.#serialized;
  }

  toString(): string {
    return this.#serialized;
  }
}

/** Functional alias of {@link Uri.parse}. */
export function parseUri(
  raw = "",
  params?: Readonly<Record<string, unknown>>,
): Uri {
  return Uri.parse(raw, params);
}

function escapeQuerySeparators(value: string): string {
  return value.replace(/[=&]/g, (ch) => QUERY_SEPARATOR_REPLACEMENTS[ch] ?? ch);
}

function remainingPairs(uri: Uri, keys: readonly string[]): string[] {
  const current = uri.getQuery();
  if (current === "") return [];
  const decodedKeys = new Set(keys.map((key) => percentDecode(key)));
  return current.split("&").filter((pair) => {
    const pairKey = pair.split("=", 1)[0] ?? "";
    return !decodedKeys.has(percentDecode(pairKey));
  });
}

/**
 * Removes every `key` pair from the query. Keys compare after
 * percent-decoding.
 */
export function withoutQueryValue(uri: Uri, key: string): Uri {
  return uri.withQuery(remainingPairs(uri, [key]).join("&"));
}

/**
 * Replaces every `key` pair with `key=value`, or a bare `key` when `value`
 * is `null`. `=` and `&` inside key and value are escaped.
 */
export function withQueryValue(
  uri: Uri,
  key: string,
  value: string | null,
): Uri {
  const pair =
    value === null
      ? escapeQuerySeparators(key)
      : `${escapeQuerySeparators(key)}=${escapeQuerySeparators(value)}`;
  return uri.withQuery([...remainingPairs(uri, [key]), pair].join("&"));
}

export function withQueryValues(
  uri: Uri,
  values: Readonly<Record<string, string | null>>,
): Uri {
  return Object.entries(values).reduce<Uri>(
    (current, [key, value]) => withQueryValue(current, key, value),
    uri,
  );
}

/**
 * Returns `value` when it is already a `Uri`, otherwise parses it.
 * @throws {InvalidArgumentError} For anything but a string or a `Uri`.
 */
export function uriFor(value: string | Uri): Uri {
  if (value instanceof Uri) return value;
  if (typeof value === "string") return Uri.parse(value);
  throw new InvalidArgumentError("URI must be a string or a Uri.");
}
