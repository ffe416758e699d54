// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Immutable, insertion-ordered header collection with case-insensitive
 * lookup. Names keep the case they were first given with.
 * @module
 */

import { InvalidArgumentError } from "./errors";
import { isForbiddenKey } from "./constants";

export type HeaderValue = string | number | readonly (string | number)[];
export type HeaderRecord = Readonly<Record<string, HeaderValue>>;

// RFC 7230 §3.2.6 token
const TOKEN_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const EDGE_WHITESPACE = /^[ \t]+|[ \t]+$/g;
const FORBIDDEN_VALUE_CHARS = /[\r\n\0]/;

export function isHeaderToken(value: string): boolean {
  return TOKEN_PATTERN.test(value);
}

function assertHeaderName(name: string): void {
  if (typeof name !== "string" || !isHeaderToken(name)) {
    throw new InvalidArgumentError(
      "Header name must be an RFC 7230 compatible string.",
    );
  }
  if (isForbiddenKey(name)) {
    throw new InvalidArgumentError(`Header name '${name}' is not allowed.`);
  }
}

function normalizeValues(name: string, value: HeaderValue): readonly string[] {
  const list: readonly (string | number)[] =
    typeof value === "string" || typeof value === "number" ? [value] : value;
  if (list.length === 0) {
    throw new InvalidArgumentError(
      `Header '${name}' must have at least one value.`,
    );
  }
  return Object.freeze(
    list.map((item) => {
      if (typeof item !== "string" && typeof item !== "number") {
        throw new InvalidArgumentError(
          `Header '${name}' values must be strings or numbers.`,
        );
      }
      const text = String(item).replace(EDGE_WHITESPACE, "");
      if (FORBIDDEN_VALUE_CHARS.test(text)) {
        throw new InvalidArgumentError(
          `Header '${name}' value contains CR, LF or NUL.`,
        );
      }
      return text;
    }),
  );
}

export class HeaderMap {
  static readonly EMPTY = new HeaderMap(new Map(), new Map());

  readonly #entries: ReadonlyMap<string, readonly string[]>;
  readonly #index: ReadonlyMap<string, string>;

  private constructor(
    entries: ReadonlyMap<string, readonly string[]>,
    index: ReadonlyMap<string, string>,
  ) {
    this.#entries = entries;
    this.#index = index;
    Object.freeze(this);
  }

  /** Builds a map; repeated names (in any case) append their values. */
  static from(record: HeaderRecord | HeaderMap = {}): HeaderMap {
    if (record instanceof HeaderMap) return record;
    return HeaderMap.EMPTY.merge(record);
  }

  get size(): number {
    return this.#entries.size;
  }

  has(name: string): boolean {
    return this.#index.has(name.toLowerCase());
  }

  /** Values of `name`, or an empty list. */
  get(name: string): readonly string[] {
    const original = this.#index.get(name.toLowerCase());
    return original === undefined ? [] : (this.#entries.get(original) ?? []);
  }

  /** Values of `name` joined with `", "`. */
  line(name: string): string {
    return this.get(name).join(", ");
  }

  names(): readonly string[] {
    return Array.from(this.#entries.keys());
  }

  toRecord(): Readonly<Record<string, readonly string[]>> {
    return Object.freeze(Object.fromEntries(this.#entries));
  }

  /** Replaces `name`; the entry moves to the end under the given case. */
  with(name: string, value: HeaderValue): HeaderMap {
    assertHeaderName(name);
    const values = normalizeValues(name, value);
    const { entries, index } = this.#copyWithout(name);
    entries.set(name, values);
    index.set(name.toLowerCase(), name);
    return new HeaderMap(entries, index);
  }

  /** Appends to `name`, keeping its position and original case. */
  withAdded(name: string, value: HeaderValue): HeaderMap {
    assertHeaderName(name);
    const values = normalizeValues(name, value);
    const entries = new Map(this.#entries);
    const index = new Map(this.#index);
    const original = index.get(name.toLowerCase());
    if (original === undefined) {
      entries.set(name, values);
      index.set(name.toLowerCase(), name);
    } else {
      const merged = [...(entries.get(original) ?? []), ...values];
      entries.set(original, Object.freeze(merged));
    }
    return new HeaderMap(entries, index);
  }

  without(name: string): HeaderMap {
    if (!this.has(name)) return this;
    const { entries, index } = this.#copyWithout(name);
    return new HeaderMap(entries, index);
  }

  /** `withAdded` for every entry of `record`, in order. */
  merge(record: HeaderRecord): HeaderMap {
    if (typeof record !== "object" || record === null) {
      throw new InvalidArgumentError("Headers must be an object.");
    }
    return Object.entries(record).reduce<HeaderMap>(
      (headers, [name, value]) => headers.withAdded(name, value),
      this,
    );
  }

  /**
   * Sets `name` as the first entry. An existing entry keeps its original
   * case.
   */
  withFirst(name: string, value: HeaderValue): HeaderMap {
    assertHeaderName(name);
    const values = normalizeValues(name, value);
    const key = this.#index.get(name.toLowerCase()) ?? name;
    const { entries: rest, index } = this.#copyWithout(name);
    index.set(key.toLowerCase(), key);
    const entries = new Map<string, readonly string[]>([[key, values]]);
    for (const [restName, restValues] of rest) {
      entries.set(restName, restValues);
    }
    return new HeaderMap(entries, index);
  }

  #copyWithout(name: string): {
    entries: Map<string, readonly string[]>;
    index: Map<string, string>;
  } {
    const entries = new Map(this.#entries);
    const index = new Map(this.#index);
    const lower = name.toLowerCase();
    const original = index.get(lower);
    if (original !== undefined) {
      entries.delete(original);
      index.delete(lower);
    }
    return { entries, index };
  }
}
