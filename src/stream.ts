// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Message body holders.
 *
 * `ByteStream` is the capability a request needs from its body; the only
 * implementation shipped here is the in-memory {@link MemoryStream}.
 * @module
 */

import { Buffer } from "node:buffer";
import { InvalidArgumentError, InvalidStateError } from "./errors";
import { SHARED_DECODER, SHARED_ENCODER } from "./encoding";

export const SeekWhence = Object.freeze({
  Set: 0,
  Current: 1,
  End: 2,
} as const);

export type SeekWhence = (typeof SeekWhence)[keyof typeof SeekWhence];

export type StreamMetadata = Readonly<Record<string, unknown>>;

export interface ByteStream {
  read(maxBytes: number): Uint8Array;
  /** Returns the number of bytes written. */
  write(data: Uint8Array | string): number;
  seek(offset: number, whence?: SeekWhence): void;
  rewind(): void;
  tell(): number;
  eof(): boolean;
  isReadable(): boolean;
  isWritable(): boolean;
  isSeekable(): boolean;
  /** `undefined` when unknown or detached. */
  getSize(): number | undefined;
  /** Remaining content from the cursor, decoded as UTF-8. */
  getContents(): string;
  getMetadata(): StreamMetadata;
  getMetadata(key: string): unknown;
  close(): void;
  /** Releases the underlying storage; the stream is unusable afterwards. */
  detach(): Uint8Array | undefined;
  /** Whole content as UTF-8, or `""` when it cannot be read. */
  toString(): string;
}

export type StreamOptions = {
  /** fopen-style mode; defaults to `"r+"`. */
  readonly mode?: string;
  /** Reported by `getSize()` until the next write. */
  readonly size?: number;
  readonly metadata?: StreamMetadata;
};

const MODE_PATTERN = /^[rwaxc](?:\+b?|b\+?)?$/;
const INITIAL_CAPACITY = 64;

function assertMode(mode: string): string {
  if (typeof mode !== "string" || !MODE_PATTERN.test(mode)) {
    throw new InvalidArgumentError(`Invalid stream mode "${String(mode)}".`);
  }
  return mode;
}

export class MemoryStream implements ByteStream {
  #buffer: Buffer;
  #length: number;
  #position = 0;
  #detached = false;
  #sizeOverride: number | undefined;
  readonly #mode: string;
  readonly #readable: boolean;
  readonly #writable: boolean;
  readonly #append: boolean;
  readonly #metadata: StreamMetadata;

  constructor(initial: Uint8Array | string = "", options: StreamOptions = {}) {
    this.#mode = assertMode(options.mode ?? "r+");
    const kind = this.#mode.charAt(0);
    const plus = this.#mode.includes("+");
    this.#readable = kind === "r" || plus;
    this.#writable = kind !== "r" || plus;
    this.#append = kind === "a";

    const bytes =
      typeof initial === "string" ? SHARED_ENCODER.encode(initial) : initial;
    this.#buffer = Buffer.alloc(Math.max(INITIAL_CAPACITY, bytes.length));
    this.#buffer.set(bytes);
    this.#length = bytes.length;

    if (options.size !== undefined) {
      if (!Number.isInteger(options.size) || options.size < 0) {
        throw new InvalidArgumentError(
          "Stream size must be a non-negative integer.",
        );
      }
      this.#sizeOverride = options.size;
    }
    this.#metadata = Object.freeze({ ...(options.metadata ?? {}) });
  }

  #assertAttached(): void {
    if (this.#detached) throw new InvalidStateError("Stream is detached.");
  }

  isReadable(): boolean {
    return !this.#detached && this.#readable;
  }

  isWritable(): boolean {
    return !this.#detached && this.#writable;
  }

  isSeekable(): boolean {
    return !this.#detached;
  }

  getSize(): number | undefined {
    if (this.#sizeOverride !== undefined) return this.#sizeOverride;
    return this.#detached ? undefined : this.#length;
  }

  tell(): number {
    this.#assertAttached();
    return this.#position;
  }

  eof(): boolean {
    this.#assertAttached();
    return this.#position >= this.#length;
  }

  seek(offset: number, whence: SeekWhence = SeekWhence.Set): void {
    this.#assertAttached();
    let base: number;
    switch (whence) {
      case SeekWhence.Set:
        base = 0;
        break;
      case SeekWhence.Current:
        base = this.#position;
        break;
      case SeekWhence.End:
        base = this.#length;
        break;
      default:
        throw new InvalidStateError(`Invalid seek whence ${String(whence)}.`);
    }
    const target = base + offset;
    if (!Number.isInteger(target) || target < 0 || target > this.#length) {
      throw new InvalidStateError(
        `Unable to seek to stream position ${String(offset)} with whence ${String(whence)}.`,
      );
    }
    this.#position = target;
  }

  rewind(): void {
    this.seek(0);
  }

  read(maxBytes: number): Uint8Array {
    this.#assertAttached();
    if (!this.#readable) {
      throw new InvalidStateError("Cannot read from non-readable stream.");
    }
    if (!Number.isInteger(maxBytes) || maxBytes < 0) {
      throw new InvalidStateError("Length parameter cannot be negative.");
    }
    const end = Math.min(this.#length, this.#position + maxBytes);
    const chunk = Uint8Array.from(this.#buffer.subarray(this.#position, end));
    this.#position = end;
    return chunk;
  }

  write(data: Uint8Array | string): number {
    this.#assertAttached();
    if (!this.#writable) {
      throw new InvalidStateError("Cannot write to a non-writable stream.");
    }
    const bytes = typeof data === "string" ? SHARED_ENCODER.encode(data) : data;
    if (this.#append) this.#position = this.#length;
    const end = this.#position + bytes.length;
    if (end > this.#buffer.length) {
      const grown = Buffer.alloc(Math.max(end, this.#buffer.length * 2));
      this.#buffer.copy(grown, 0, 0, this.#length);
      this.#buffer = grown;
    }
    this.#buffer.set(bytes, this.#position);
    this.#position = end;
    this.#length = Math.max(this.#length, end);
    this.#sizeOverride = undefined;
    return bytes.length;
  }

  getContents(): string {
    this.#assertAttached();
    if (!this.#readable) {
      throw new InvalidStateError("Unable to read stream contents.");
    }
    const contents = this.#buffer.subarray(this.#position, this.#length);
    this.#position = this.#length;
    return SHARED_DECODER.decode(contents);
  }

  getMetadata(): StreamMetadata;
  getMetadata(key: string): unknown;
  getMetadata(key?: string): unknown {
    if (this.#detached) return key === undefined ? {} : undefined;
    const builtIn: StreamMetadata = {
      mode: this.#mode,
      seekable: true,
      uri: "memory:",
    };
    if (key === undefined) {
      return Object.freeze({ ...builtIn, ...this.#metadata });
    }
    if (Object.hasOwn(this.#metadata, key)) return this.#metadata[key];
    return Object.hasOwn(builtIn, key) ? builtIn[key] : undefined;
  }

  close(): void {
    this.detach();
  }

  detach(): Uint8Array | undefined {
    if (this.#detached) return undefined;
    const contents = Uint8Array.from(this.#buffer.subarray(0, this.#length));
    this.#detached = true;
    this.#buffer = Buffer.alloc(0);
    this.#length = 0;
    this.#position = 0;
    this.#sizeOverride = undefined;
    return contents;
  }

  toString(): string {
    if (this.#detached || !this.#readable) return "";
    this.#position = 0;
    return this.getContents();
  }
}

export type StreamSource =
  | string
  | number
  | boolean
  | Uint8Array
  | ByteStream
  | Iterable<string | Uint8Array>
  | null
  | undefined;

/** Structural check for a {@link ByteStream} from any implementation. */
export function isByteStream(value: unknown): value is ByteStream {
  if (typeof value !== "object" || value === null) return false;
  return ["read", "write", "seek", "tell", "getMetadata", "detach"].every(
    (method) => typeof Reflect.get(value, method) === "function",
  );
}

function isIterable(value: object): value is Iterable<unknown> {
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

/**
 * Wraps `resource` in a stream positioned at its start. An existing
 * `ByteStream` is returned as-is; iterables of chunks are drained.
 * @throws {InvalidArgumentError} For any other kind of value.
 */
export function streamFor(
  resource?: StreamSource,
  options: StreamOptions = {},
): ByteStream {
  if (resource === undefined || resource === null) {
    return new MemoryStream("", options);
  }
  if (
    typeof resource === "string" ||
    typeof resource === "number" ||
    typeof resource === "boolean"
  ) {
    return new MemoryStream(String(resource), options);
  }
  if (resource instanceof Uint8Array) {
    return new MemoryStream(resource, options);
  }
  if (isByteStream(resource)) return resource;
  if (typeof resource === "object" && isIterable(resource)) {
    const chunks: Uint8Array[] = [];
    for (const chunk of resource) {
      if (typeof chunk === "string") {
        chunks.push(SHARED_ENCODER.encode(chunk));
      } else if (chunk instanceof Uint8Array) {
        chunks.push(chunk);
      } else {
        throw new InvalidArgumentError(
          "Stream chunks must be strings or byte arrays.",
        );
      }
    }
    return new MemoryStream(Buffer.concat(chunks), options);
  }
  throw new InvalidArgumentError(`Invalid resource type: ${typeof resource}.`);
}
