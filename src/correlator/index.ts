/**
 * Correlator Module - Public API
 */

// Types
export type {
  CorrelatorConfig,
  CorrelatorRequest,
  IncomingFrame,
  OutgoingFrame,
  PendingRequest,
  ReadRequest,
  Reply,
  RequestState,
  Transport,
  WriteRequest,
} from "./schema.js";
export type { CorrelatorError } from "./errors.js";
export type {
  Correlator,
  CorrelatorOptions,
  RequestHandle,
  RequestResult,
} from "./service.js";

// Schemas
export { IncomingFrameSchema, REQUEST_STATES } from "./schema.js";

// Error utilities
export {
  formatCorrelatorError,
  requestCancelled,
  requestTimeout,
  retryNotAllowed,
  sessionClosed,
  transportFailure,
} from "./errors.js";

// Service
export { createCorrelator } from "./service.js";

// Pure transformations
export { backoffDelay, mayRetry } from "./transform.js";
