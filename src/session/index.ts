/**
 * Session Module - Public API
 */

// Types
export type {
  CommandAck,
  DecodeFailureEvent,
  EntityEvent,
  IdentityEvent,
  RefreshOptions,
  SessionHandle,
  SessionHandlers,
  SessionOptions,
  StatusReply,
} from "./schema.js";
export type { SessionError } from "./errors.js";
export type { Session } from "./service.js";
export type {
  LoopbackAnswer,
  LoopbackResponder,
  LoopbackTransport,
} from "./loopback.js";
export type { StatusRequest } from "./transform.js";

// Error utilities
export { formatSessionError, unexpectedReply } from "./errors.js";

// Service
export { createSession } from "./service.js";
export { createLoopbackTransport } from "./loopback.js";

// Pure transformations
export {
  STATUS_REQUESTS,
  projectWrites,
  validationContextOf,
} from "./transform.js";
