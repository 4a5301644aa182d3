/**
 * Reconciler Module - Schemas and Types
 *
 * The session snapshot: one cached entity per status message, or one per
 * index for zones and schedules. Snapshots are immutable; every merge
 * returns a new one.
 */
import type {
  CodecError,
  DecodedRecord,
  DecodedValue,
} from "../codec/index.js";
import type {
  EntityKind,
  IndexedEntityKind,
  StatusSchema,
} from "../registry/index.js";

// =============================================================================
// Snapshot
// =============================================================================

export type EntityState = Readonly<{
  values: DecodedRecord;
  /** Reception sequence that last wrote each field */
  fieldSeq: Readonly<Record<string, number>>;
  /** Set when the device identity changed; cleared by the next write */
  stale: boolean;
}>;

export type SingletonEntityKind = Exclude<EntityKind, IndexedEntityKind>;

export type Snapshot = Readonly<{
  deviceUid: string | null;
  deviceType: string | null;
  singletons: Readonly<Partial<Record<SingletonEntityKind, EntityState>>>;
  zones: ReadonlyMap<number, EntityState>;
  schedules: ReadonlyMap<number, EntityState>;
}>;

export const EMPTY_SNAPSHOT: Snapshot = {
  deviceUid: null,
  deviceType: null,
  singletons: {},
  zones: new Map(),
  schedules: new Map(),
};

// =============================================================================
// Decoded Status
// =============================================================================

/**
 * A status payload after decoding, before it is merged.
 */
export type DecodedStatus = Readonly<{
  schema: StatusSchema;
  deviceUid: string | null;
  deviceType: string | null;
  /** One record, or a list of records for array-form zone/schedule payloads */
  body: DecodedValue;
  failures: readonly CodecError[];
}>;

// =============================================================================
// Events
// =============================================================================

export type ReconcileEvent =
  | Readonly<{
      type: "ENTITY_CHANGED";
      entity: EntityKind;
      index: number | null;
      changedFields: readonly string[];
    }>
  | Readonly<{
      type: "ENTITY_REMOVED";
      entity: IndexedEntityKind;
      index: number;
    }>
  | Readonly<{
      type: "DEVICE_IDENTITY_CHANGED";
      previousUid: string;
      currentUid: string;
    }>
  | Readonly<{
      type: "PARTIAL_DECODE_FAILURE";
      status: string;
      failures: readonly CodecError[];
    }>;

export type ReconcileResult = Readonly<{
  snapshot: Snapshot;
  events: readonly ReconcileEvent[];
}>;

/**
 * Extra addressing for a merge.
 * `requestIndex` is the `No` of the read that produced the payload; array
 * entries without their own index take `requestIndex + position`.
 */
export type MergeOptions = Readonly<{
  requestIndex?: number | null;
}>;
