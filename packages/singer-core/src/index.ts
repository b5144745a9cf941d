// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core`
 * Purpose: Pure domain types, port interfaces, and transformation/buffering logic for the Singer target pipeline.
 * Scope: Shared by the target service. Does not contain HTTP clients, stdout writers, or framework code.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: Only types, pure functions, and in-memory state here. Implementations in services/.
 * - No imports from services/. Pure domain package.
 * Side-effects: none
 * Links: services/oic-target/src/bootstrap/container.ts
 * @public
 */

export { type BackoffPolicy, computeBackoffMs } from "./backoff.js";
export { StreamBuffer, type StreamBufferOptions } from "./buffer.js";
export {
  AuthenticationError,
  type AuthenticationErrorDetails,
  DataValidationError,
  DeliveryError,
  isAuthenticationError,
  isDataValidationError,
  isDeliveryError,
  isMessageParseError,
  isShutdownTimeoutError,
  isUnknownStreamError,
  isValidationThresholdError,
  MessageParseError,
  ShutdownTimeoutError,
  type UnconfirmedBatch,
  UnknownStreamError,
  ValidationThresholdError,
} from "./errors.js";
export { parseMessage } from "./messages.js";
export type {
  BatchEnvelope,
  DeliveryErrorKind,
  DeliveryFailure,
  DeliveryOutcome,
  DeliverySuccess,
  PropertySchema,
  RecordMessage,
  SchemaMessage,
  SingerMessage,
  StateMessage,
  StreamSchema,
  TransformedRecord,
} from "./model.js";
export type {
  BatchDeliveryPort,
  Clock,
  StateSink,
  TokenProvider,
} from "./port.js";
export { systemClock } from "./port.js";
export {
  type CoercionKind,
  type CoercionRule,
  type CompiledSchema,
  compileSchema,
  ruleFor,
} from "./schema.js";
export { coerceValue, transformRecord } from "./transformer.js";
