// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Percent-encoding shared by every encoded URI component.
 * @module
 */

import { InvalidArgumentError } from "./errors";
import {
  PASSWORD_EXTRA_CHARS,
  PATH_EXTRA_CHARS,
  QUERY_EXTRA_CHARS,
  SUB_DELIM_CHARS,
  UNRESERVED_CHARS,
  USERINFO_EXTRA_CHARS,
} from "./constants";

/**
 * Shared TextEncoder instance for UTF-8 encoding.
 */
export const SHARED_ENCODER = new TextEncoder();

/**
 * Shared TextDecoder instance for UTF-8 decoding. Not fatal: invalid
 * sequences decode to U+FFFD.
 */
export const SHARED_DECODER = new TextDecoder("utf-8");

/** Characters a component keeps literally; everything else is escaped. */
export type CharacterClass = ReadonlySet<string>;

function characterClass(extra: string): CharacterClass {
  return Object.freeze(
    new Set([...UNRESERVED_CHARS, ...SUB_DELIM_CHARS, ...extra]),
  );
}

export const USERINFO_CHARS = characterClass(USERINFO_EXTRA_CHARS);
export const PASSWORD_CHARS = characterClass(PASSWORD_EXTRA_CHARS);
export const PATH_CHARS = characterClass(PATH_EXTRA_CHARS);
export const QUERY_CHARS = characterClass(QUERY_EXTRA_CHARS);
export const FRAGMENT_CHARS = QUERY_CHARS;

export function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9A-Fa-f]$/.test(ch);
}

export function hasControlCharacters(value: string): boolean {
  for (const ch of value) {
    const code = ch.charCodeAt(0);
    if (code <= 0x1f || code === 0x7f) return true;
  }
  return false;
}

function isLoneSurrogate(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0xd800 && code <= 0xdfff;
}

function percentEncodeCharacter(ch: string): string {
  let out = "";
  for (const byte of SHARED_ENCODER.encode(ch)) {
    out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return out;
}

/**
 * Percent-encodes every character of `value` outside `allowed`.
 * A `%` that already starts a `%XX` triplet is kept, so encoding an encoded
 * value returns it unchanged; any other `%` becomes `%25`.
 * @throws {InvalidArgumentError} On a lone UTF-16 surrogate.
 */
export function encodeComponent(
  value: string,
  allowed: CharacterClass,
): string {
  const chars = Array.from(value);
  let out = "";
  for (const [index, ch] of chars.entries()) {
    if (ch === "%") {
      out +=
        isHexDigit(chars[index + 1]) && isHexDigit(chars[index + 2])
          ? "%"
          : "%25";
    } else if (allowed.has(ch)) {
      out += ch;
    } else if (isLoneSurrogate(ch)) {
      throw new InvalidArgumentError(
        "URI component contains a lone UTF-16 surrogate.",
      );
    } else {
      out += percentEncodeCharacter(ch);
    }
  }
  return out;
}

/**
 * Decodes `%XX` triplets as UTF-8. Malformed triplets stay literal and
 * invalid byte sequences decode to U+FFFD; this never throws.
 */
export function percentDecode(value: string): string {
  if (!value.includes("%")) return value;
  const bytes: number[] = [];
  const chars = Array.from(value);
  for (let index = 0; index < chars.length; index++) {
    const ch = chars[index] ?? "";
    const high = chars[index + 1];
    const low = chars[index + 2];
    if (ch === "%" && isHexDigit(high) && isHexDigit(low)) {
      bytes.push(Number.parseInt(`${high ?? ""}${low ?? ""}`, 16));
      index += 2;
    } else {
      bytes.push(...SHARED_ENCODER.encode(ch));
    }
  }
  return SHARED_DECODER.decode(Uint8Array.from(bytes));
}
