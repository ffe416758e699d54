// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * HTTP request message holding a {@link Uri}, headers and a body.
 *
 * Requests are immutable. The `Host` header follows the URI: it is written
 * as the first header on construction (unless one was given) and rewritten
 * by `withUri` unless the caller asks to preserve it.
 * @module
 */

import { InvalidArgumentError } from "./errors";
import { DEFAULT_PROTOCOL_VERSION } from "./constants";
import {
  HeaderMap,
  isHeaderToken,
  type HeaderRecord,
  type HeaderValue,
} from "./headers";
import { streamFor, type ByteStream, type StreamSource } from "./stream";
import { uriFor, type Uri } from "./uri";

export type AcceptedLanguage = {
  readonly language: string;
  readonly quality: number;
};

type RequestChanges = {
  readonly method?: string;
  readonly uri?: Uri;
  readonly headers?: HeaderMap;
  readonly body?: ByteStream;
  readonly version?: string;
  readonly requestTarget?: string;
};

const PROTOCOL_VERSION_PATTERN = /^\d+(?:\.\d+)?$/;

function filterMethod(method: string): string {
  if (typeof method !== "string" || !isHeaderToken(method)) {
    throw new InvalidArgumentError("Method must be a non-empty token.");
  }
  return method.toUpperCase();
}

function filterProtocolVersion(version: string): string {
  if (typeof version !== "string" || !PROTOCOL_VERSION_PATTERN.test(version)) {
    throw new InvalidArgumentError(
      `Invalid HTTP protocol version "${String(version)}".`,
    );
  }
  return version;
}

/** Writes `host[:port]` of `uri` as the first header. */
function withHostFrom(headers: HeaderMap, uri: Uri): HeaderMap {
  const host = uri.getHost();
  if (host === "") return headers;
  const port = uri.getPort();
  return headers.withFirst(
    "Host",
    port === null ? host : `${host}:${String(port)}`,
  );
}

function qualityOf(params: readonly string[]): number {
  const q = params.find((param) => param.toLowerCase().startsWith("q="));
  if (q === undefined) return 1;
  const quality = Number.parseFloat(q.slice(2));
  return Number.isNaN(quality) ? 0 : quality;
}

export class Request {
  readonly #method: string;
  readonly #uri: Uri;
  readonly #body: ByteStream;
  readonly #version: string;
  #headers: HeaderMap;
  #requestTarget: string | undefined;

  constructor(
    method: string,
    uri: string | Uri,
    headers: HeaderRecord | HeaderMap = {},
    body?: StreamSource,
    version: string = DEFAULT_PROTOCOL_VERSION,
  ) {
    this.#method = filterMethod(method);
    this.#uri = uriFor(uri);
    this.#version = filterProtocolVersion(version);
    const initial = HeaderMap.from(headers);
    this.#headers = initial.has("host")
      ? initial
      : withHostFrom(initial, this.#uri);
    this.#body = streamFor(body);
    Object.freeze(this);
  }

  #with(changes: RequestChanges): Request {
    const copy = new Request(
      changes.method ?? this.#method,
      changes.uri ?? this.#uri,
      HeaderMap.EMPTY,
      changes.body ?? this.#body,
      changes.version ?? this.#version,
    );
    copy.#headers = changes.headers ?? this.#headers;
    copy.#requestTarget = changes.requestTarget ?? this.#requestTarget;
    return copy;
  }

  getMethod(): string {
    return this.#method;
  }

  withMethod(method: string): Request {
    const next = filterMethod(method);
    return next === this.#method ? this : this.#with({ method: next });
  }

  isGet(): boolean {
    return this.#method === "GET";
  }

  isPost(): boolean {
    return this.#method === "POST";
  }

  isPut(): boolean {
    return this.#method === "PUT";
  }

  isPatch(): boolean {
    return this.#method === "PATCH";
  }

  isDelete(): boolean {
    return this.#method === "DELETE";
  }

  getUri(): Uri {
    return this.#uri;
  }

  /**
   * Replaces the URI. Unless `preserveHost` is set, the `Host` header is
   * rewritten from the new URI when it has a host.
   */
  withUri(uri: Uri, preserveHost = false): Request {
    if (uri === this.#uri) return this;
    const next = uriFor(uri);
    return this.#with({
      uri: next,
      headers: preserveHost ? this.#headers : withHostFrom(this.#headers, next),
    });
  }

  /** Explicit target, or the URI's path (`/` when empty) and query. */
  getRequestTarget(): string {
    if (this.#requestTarget !== undefined) return this.#requestTarget;
    const path = this.#uri.getPath() === "" ? "/" : this.#uri.getPath();
    const query = this.#uri.getQuery();
    return query === "" ? path : `${path}?${query}`;
  }

  withRequestTarget(requestTarget: string): Request {
    if (typeof requestTarget !== "string" || /\s/.test(requestTarget)) {
      throw new InvalidArgumentError(
        "Invalid request target provided; cannot contain whitespace.",
      );
    }
    return this.#with({ requestTarget });
  }

  getProtocolVersion(): string {
    return this.#version;
  }

  withProtocolVersion(version: string): Request {
    const next = filterProtocolVersion(version);
    return next === this.#version ? this : this.#with({ version: next });
  }

  getHeaders(): Readonly<Record<string, readonly string[]>> {
    return this.#headers.toRecord();
  }

  hasHeader(name: string): boolean {
    return this.#headers.has(name);
  }

  getHeader(name: string): readonly string[] {
    return this.#headers.get(name);
  }

  getHeaderLine(name: string): string {
    return this.#headers.line(name);
  }

  withHeader(name: string, value: HeaderValue): Request {
    return this.#with({ headers: this.#headers.with(name, value) });
  }

  withAddedHeader(name: string, value: HeaderValue): Request {
    return this.#with({ headers: this.#headers.withAdded(name, value) });
  }

  withoutHeader(name: string): Request {
    const next = this.#headers.without(name);
    return next === this.#headers ? this : this.#with({ headers: next });
  }

  /** Appends every entry of `headers`. */
  withHeaders(headers: HeaderRecord): Request {
    return this.#with({ headers: this.#headers.merge(headers) });
  }

  getBody(): ByteStream {
    return this.#body;
  }

  withBody(body: ByteStream): Request {
    return body === this.#body ? this : this.#with({ body });
  }

  /** Entries of `Accept-Language` in header order; quality defaults to 1. */
  getAcceptLanguages(): readonly AcceptedLanguage[] {
    const line = this.getHeaderLine("Accept-Language").replace(/\s+/g, "");
    if (line === "") return [];
    return line
      .split(",")
      .filter((node) => node !== "")
      .map((node) => {
        const [language = "", ...params] = node.split(";");
        return { language, quality: qualityOf(params) };
      });
  }

  /** Content codings of `Accept-Encoding`, parameters removed. */
  getAcceptEncodings(): readonly string[] {
    const line = this.getHeaderLine("Accept-Encoding").replace(/\s+/g, "");
    if (line === "") return [];
    return line
      .split(",")
      .map((node) => node.split(";", 1)[0] ?? "")
      .filter((coding) => coding !== "");
  }
}
