/**
 * Session Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { CorrelatorConfig, Transport } from "../correlator/index.js";
import type { ReconcileEvent, Snapshot } from "../reconciler/index.js";
import type { EndpointKind, Registry } from "../registry/index.js";
import type { SessionError } from "./errors.js";

// =============================================================================
// Events
// =============================================================================

export type EntityEvent = Extract<
  ReconcileEvent,
  { type: "ENTITY_CHANGED" | "ENTITY_REMOVED" }
>;

export type IdentityEvent = Extract<
  ReconcileEvent,
  { type: "DEVICE_IDENTITY_CHANGED" }
>;

export type DecodeFailureEvent = Extract<
  ReconcileEvent,
  { type: "PARTIAL_DECODE_FAILURE" }
>;

/**
 * Observers. Each runs synchronously after the snapshot has been updated.
 */
export type SessionHandlers = Readonly<{
  onChange?: (event: EntityEvent, snapshot: Snapshot) => void;
  onIdentityChanged?: (event: IdentityEvent, snapshot: Snapshot) => void;
  onDecodeFailure?: (event: DecodeFailureEvent) => void;
}>;

// =============================================================================
// Options
// =============================================================================

export type SessionOptions = Readonly<{
  transport: Transport;
  /** Defaults to the bundled message table */
  registry?: Registry;
  /** Overrides for the environment's correlator settings */
  config?: Partial<CorrelatorConfig>;
  /** Overrides for the environment's endpoint names */
  endpoints?: Partial<Record<EndpointKind, string>>;
  handlers?: SessionHandlers;
}>;

export type RefreshOptions = Readonly<{
  /** Schedules to read, from index 0 */
  schedules?: number;
  /** Read the power monitor configuration and status */
  power?: boolean;
}>;

// =============================================================================
// Results
// =============================================================================

export type CommandAck = Readonly<{
  name: string;
  targetKey: string;
  attempts: number;
  /** Snapshot changes from merging the acknowledged command */
  events: readonly ReconcileEvent[];
}>;

export type StatusReply = Readonly<{
  status: string;
  index: number | null;
  attempts: number;
  events: readonly ReconcileEvent[];
}>;

export type SessionHandle<T> = Readonly<{
  /** null when the request was rejected before it was sent */
  requestId: number | null;
  result: Promise<Result<T, SessionError>>;
  cancel: () => void;
}>;
