// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Immutable, validated URI values and the request/stream types that carry
 * them.
 * @module uri-kit
 * @version 0.1.0
 */

// --- Re-export all public APIs ---

// Errors
export {
  MalformedUriError,
  InvalidArgumentError,
  InvalidStateError,
  InvalidConfigurationError,
  sanitizeErrorForLogs,
} from "./errors";
export type { UriKitErrorCode } from "./errors";

// Configuration
export {
  getUriConfig,
  setUriConfig,
  getLoggingConfig,
  setLoggingConfig,
  setDeprecationHandler,
  setAppEnvironment,
  sealUriKit,
  freezeConfig,
} from "./config";
export type {
  UriConfig,
  LoggingConfig,
  DeprecationNotice,
  DeprecationHandler,
} from "./config";

// State
export { ConfigState, getConfigState } from "./state";

// Environment
export { environment, isDevelopment } from "./environment";
export type { AppEnvironment } from "./environment";

// Logging and diagnostics
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { configureDeprecationRateLimit } from "./deprecation";

// Encoding
export { encodeComponent, percentDecode } from "./encoding";

// URI
export { splitUri } from "./uri-parser";
export type { UriParts } from "./uri-parser";
export {
  filterPath,
  filterQueryOrFragment,
  filterUserInfoComponent,
} from "./uri-components";
export {
  Uri,
  parseUri,
  composeComponents,
  withQueryValue,
  withoutQueryValue,
  withQueryValues,
  uriFor,
} from "./uri";
export type { UriParams } from "./uri";

// Messages
export { HeaderMap } from "./headers";
export type { HeaderRecord, HeaderValue } from "./headers";
export { MemoryStream, SeekWhence, isByteStream, streamFor } from "./stream";
export type {
  ByteStream,
  StreamMetadata,
  StreamOptions,
  StreamSource,
} from "./stream";
export { Request } from "./request";
export type { AcceptedLanguage } from "./request";
