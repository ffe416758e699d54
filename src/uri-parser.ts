// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Splits a raw URI reference into its components.
 *
 * The reference is decomposed with the regular expression of RFC 3986
 * Appendix B, then the authority is split into userinfo, host and port.
 * No normalization or encoding happens here; see `uri-components.ts`.
 *
 * Structural failures throw {@link MalformedUriError}:
 * - control characters, or input longer than `UriConfig.maxUriLength`;
 * - a scheme that does not match `ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )`;
 * - `//` followed by no host (`"http://"`), unless the whole authority is
 *   empty under the `file` scheme (`"file:///etc/hosts"`);
 * - a port that is not all digits or is above 65535;
 * - host characters outside reg-name or IP-literal syntax.
 * @module
 */

import { MalformedUriError } from "./errors";
import { getUriConfig } from "./config";
import { FILE_SCHEME, MAX_PORT, SCHEME_PATTERN } from "./constants";
import { hasControlCharacters } from "./encoding";
import { redactUriCredentials } from "./utils";

/**
 * Components of a URI reference before filtering. An absent component is
 * `undefined`; an empty one (`"?"` with nothing after it) is `""`.
 */
export type UriParts = {
  readonly scheme?: string | undefined;
  readonly user?: string | undefined;
  readonly pass?: string | undefined;
  readonly host?: string | undefined;
  readonly port?: number | undefined;
  readonly path?: string | undefined;
  readonly query?: string | undefined;
  readonly fragment?: string | undefined;
};

// RFC 3986 Appendix B.
const URI_REFERENCE_PATTERN =
  /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

const REG_NAME_PATTERN = /^(?:[A-Za-z0-9\-._~!$&'()*+,;=]|%[0-9A-Fa-f]{2})+$/;
const IP_LITERAL_PATTERN =
  /^\[(?:[0-9A-Fa-f:.]+|[vV][0-9A-Fa-f]+\.[A-Za-z0-9\-._~!$&'()*+,;=:]+)\]$/;
const PORT_PATTERN = /^[0-9]+$/;

const MAX_PREVIEW_LENGTH = 128;

/**
 * Shortened, credential-free rendering of user input for error messages.
 */
export function previewUri(raw: string): string {
  const clipped =
    raw.length > MAX_PREVIEW_LENGTH
      ? `${raw.slice(0, MAX_PREVIEW_LENGTH)}...`
      : raw;
  return redactUriCredentials(clipped);
}

/** `host` is a bracketed IP literal or a non-empty reg-name. */
export function isValidHostSyntax(host: string): boolean {
  return host.startsWith("[")
    ? IP_LITERAL_PATTERN.test(host)
    : REG_NAME_PATTERN.test(host);
}

function malformed(raw: string, detail: string): MalformedUriError {
  return new MalformedUriError(
    `Unable to parse URI "${previewUri(raw)}": ${detail}`,
  );
}

function parsePort(raw: string, portText: string): number | undefined {
  if (portText === "") return undefined;
  if (!PORT_PATTERN.test(portText)) {
    throw malformed(raw, "port must be numeric");
  }
  const port = Number(portText);
  if (port > MAX_PORT) {
    throw malformed(raw, `port ${portText} is out of range`);
  }
  return port;
}

type SplitAuthority = Pick<UriParts, "user" | "pass" | "host" | "port">;

function splitAuthority(raw: string, authority: string): SplitAuthority {
  const at = authority.lastIndexOf("@");
  const userInfo = at === -1 ? undefined : authority.slice(0, at);
  const hostPort = at === -1 ? authority : authority.slice(at + 1);

  const colon = userInfo?.indexOf(":") ?? -1;
  const user =
    userInfo === undefined || colon === -1
      ? userInfo
      : userInfo.slice(0, colon);
  const pass =
    userInfo === undefined || colon === -1
      ? undefined
      : userInfo.slice(colon + 1);

  let host: string;
  let portText: string;
  if (hostPort.startsWith("[")) {
    const close = hostPort.indexOf("]");
    if (close === -1) throw malformed(raw, "unterminated IP literal");
    host = hostPort.slice(0, close + 1);
    const rest = hostPort.slice(close + 1);
    if (rest !== "" && !rest.startsWith(":")) {
      throw malformed(raw, "unexpected characters after IP literal");
    }
    portText = rest.slice(1);
  } else {
    const portColon = hostPort.indexOf(":");
    host = portColon === -1 ? hostPort : hostPort.slice(0, portColon);
    portText = portColon === -1 ? "" : hostPort.slice(portColon + 1);
  }

  if (host === "") throw malformed(raw, "authority has no host");
  if (!isValidHostSyntax(host)) {
    throw malformed(raw, "host contains characters that are not allowed");
  }
  return { user, pass, host, port: parsePort(raw, portText) };
}

/**
 * Splits `raw` into {@link UriParts}. An empty string yields an empty record.
 */
export function splitUri(raw: string): UriParts {
  if (typeof raw !== "string") {
    throw new MalformedUriError("URI must be a string.");
  }
  if (raw.length > getUriConfig().maxUriLength) {
    throw new MalformedUriError(
      `URI exceeds the maximum length of ${String(getUriConfig().maxUriLength)} characters.`,
    );
  }
  if (hasControlCharacters(raw)) {
    throw malformed(raw, "control characters are not allowed");
  }

  const match = URI_REFERENCE_PATTERN.exec(raw);
  if (match === null) throw malformed(raw, "not a URI reference");
  const [, scheme, authority, path = "", query, fragment] = match;

  if (scheme !== undefined && !SCHEME_PATTERN.test(scheme)) {
    throw malformed(raw, "scheme is not valid");
  }

  let authorityParts: SplitAuthority = {};
  if (authority !== undefined) {
    if (authority !== "") {
      authorityParts = splitAuthority(raw, authority);
    } else if (scheme?.toLowerCase() !== FILE_SCHEME) {
      throw malformed(raw, "authority has no host");
    }
  }

  return Object.freeze({
    scheme,
    ...authorityParts,
    path,
    query,
    fragment,
  });
}
