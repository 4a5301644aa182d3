/**
 * Reconciler Module - Pure Transformations
 *
 * Decodes status payloads and merges them into an immutable snapshot.
 * Merges are field-wise last-writer-wins on the reception sequence number:
 * a field written at sequence n is never overwritten by a payload received
 * before n.
 */
import { isDeepStrictEqual } from "node:util";
import { type Result, err, ok } from "neverthrow";

import {
  type CodecError,
  type DecodedRecord,
  type DecodedValue,
  type WireValue,
  decodeFailed,
  decodeTolerant,
  isRecord,
} from "../codec/index.js";
import {
  type CommandSchema,
  type EntityKind,
  type IndexedEntityKind,
  type Registry,
  findStatusKey,
  schemaNotFound,
} from "../registry/index.js";
import type { StatusError } from "./errors.js";
import type {
  DecodedStatus,
  EntityState,
  MergeOptions,
  ReconcileEvent,
  ReconcileResult,
  SingletonEntityKind,
  Snapshot,
} from "./schema.js";

const IDENTITY_KEYS = new Set(["AirStreamDeviceUId", "DeviceType"]);

const SINGLETON_KINDS: readonly SingletonEntityKind[] = [
  "system",
  "faults",
  "temperzone",
  "firmware",
  "powerConfig",
  "powerStatus",
];

// =============================================================================
// Helpers
// =============================================================================

export function isDecodedList(
  value: DecodedValue | undefined,
): value is readonly DecodedValue[] {
  return Array.isArray(value);
}

/**
 * The value as a field record, or null for scalars and lists.
 */
export function recordOf(value: DecodedValue | undefined): DecodedRecord | null {
  if (value === undefined || value === null || typeof value !== "object") {
    return null;
  }
  if (isDecodedList(value)) return null;
  return value;
}

function entriesOf(body: DecodedValue): readonly DecodedValue[] {
  return isDecodedList(body) ? body : [body];
}

function isIndexed(entity: EntityKind): entity is IndexedEntityKind {
  return entity === "zone" || entity === "schedule";
}

function identityOf(raw: unknown): string | null {
  if (typeof raw === "string" && raw !== "") return raw;
  if (typeof raw === "number") return String(raw);
  return null;
}

/**
 * Top-level field names that failed to decode, from paths like
 * `SystemV2.Setpoint` or `PowerMonitorStatus.Dev[2].Ok`.
 */
function failedFields(name: string, failures: readonly CodecError[]): Set<string> {
  const fields = new Set<string>();
  const prefix = `${name}.`;
  for (const failure of failures) {
    if (!failure.path.startsWith(prefix)) continue;
    const rest = failure.path.slice(prefix.length);
    const field = /^[^.[]+/.exec(rest)?.[0];
    if (field) fields.add(field);
  }
  return fields;
}

function getEntity(
  snapshot: Snapshot,
  entity: EntityKind,
  index: number | null,
): EntityState | undefined {
  if (isIndexed(entity)) {
    if (index === null) return undefined;
    return (entity === "zone" ? snapshot.zones : snapshot.schedules).get(index);
  }
  return snapshot.singletons[entity];
}

function setEntity(
  snapshot: Snapshot,
  entity: EntityKind,
  index: number | null,
  state: EntityState,
): Snapshot {
  if (isIndexed(entity)) {
    if (index === null) return snapshot;
    if (entity === "zone") {
      return { ...snapshot, zones: new Map(snapshot.zones).set(index, state) };
    }
    return {
      ...snapshot,
      schedules: new Map(snapshot.schedules).set(index, state),
    };
  }
  return { ...snapshot, singletons: { ...snapshot.singletons, [entity]: state } };
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode a parsed status payload: `{ AirStreamDeviceUId, DeviceType, <Key>: body }`.
 *
 * Field-level failures are collected in `failures`; only a payload with no
 * recognisable message or an undecodable body fails outright.
 */
export function decodeStatus(
  registry: Registry,
  payload: unknown,
): Result<DecodedStatus, StatusError> {
  if (!isRecord(payload)) {
    return err(decodeFailed("", "status payload must be an object", payload));
  }
  const schema = findStatusKey(registry, payload);
  if (!schema) {
    const keys = Object.keys(payload).filter((key) => !IDENTITY_KEYS.has(key));
    return err(schemaNotFound(keys.join(",") || "(empty)", "status"));
  }

  const raw = payload[schema.key ?? schema.name];
  const deviceUid = identityOf(payload.AirStreamDeviceUId);
  const deviceType =
    typeof payload.DeviceType === "string" ? payload.DeviceType : null;

  if (schema.mode === "partial" && Array.isArray(raw)) {
    const entries: readonly unknown[] = raw;
    const failures: CodecError[] = [];
    const body = entries.map((entry, i) => {
      const decoded = decodeTolerant(schema.body, entry, `${schema.name}[${i}]`);
      failures.push(...decoded.failures);
      return decoded.value ?? null;
    });
    return ok({ schema, deviceUid, deviceType, body, failures });
  }

  const decoded = decodeTolerant(schema.body, raw, schema.name);
  if (decoded.value === undefined) {
    return err(
      decoded.failures[0] ?? decodeFailed(schema.name, "empty body", raw),
    );
  }
  return ok({
    schema,
    deviceUid,
    deviceType,
    body: decoded.value,
    failures: decoded.failures,
  });
}

// =============================================================================
// Merging
// =============================================================================

type Merge = Readonly<{ state: EntityState; changed: readonly string[] }>;

/**
 * Merge decoded fields into one entity.
 *
 * @param replace - Drop fields the payload does not carry (full messages)
 * @param keep - Fields never dropped, e.g. ones that failed to decode
 */
export function mergeEntity(
  existing: EntityState | undefined,
  incoming: DecodedRecord,
  seq: number,
  replace: boolean,
  keep: ReadonlySet<string> = new Set(),
): Merge {
  const base = existing && !existing.stale ? existing : undefined;
  const values: Record<string, DecodedValue> = base ? { ...base.values } : {};
  const fieldSeq: Record<string, number> = base ? { ...base.fieldSeq } : {};
  const changed: string[] = [];

  for (const [field, value] of Object.entries(incoming)) {
    const last = fieldSeq[field];
    if (last !== undefined && last > seq) continue;
    fieldSeq[field] = seq;
    if (!Object.hasOwn(values, field) || !isDeepStrictEqual(values[field], value)) {
      values[field] = value;
      changed.push(field);
    }
  }

  if (replace) {
    for (const field of Object.keys(values)) {
      if (Object.hasOwn(incoming, field) || keep.has(field)) continue;
      const last = fieldSeq[field];
      if (last !== undefined && last > seq) continue;
      delete values[field];
      delete fieldSeq[field];
      changed.push(field);
    }
  }

  return { state: { values, fieldSeq, stale: false }, changed };
}

function mergeInto(
  snapshot: Snapshot,
  entity: EntityKind,
  index: number | null,
  incoming: DecodedRecord,
  seq: number,
  replace: boolean,
  keep?: ReadonlySet<string>,
): ReconcileResult {
  const existing = getEntity(snapshot, entity, index);
  const merged = mergeEntity(existing, incoming, seq, replace, keep);
  if (merged.changed.length === 0 && existing) {
    return { snapshot, events: [] };
  }
  return {
    snapshot: setEntity(snapshot, entity, index, merged.state),
    events: [
      { type: "ENTITY_CHANGED", entity, index, changedFields: merged.changed },
    ],
  };
}

/**
 * Drop zones at or beyond a reduced zone count.
 */
function pruneZones(snapshot: Snapshot): ReconcileResult {
  const count = snapshot.singletons.system?.values.NoOfZones;
  if (typeof count !== "number") return { snapshot, events: [] };
  const removed = [...snapshot.zones.keys()].filter((index) => index >= count);
  if (removed.length === 0) return { snapshot, events: [] };
  const zones = new Map(snapshot.zones);
  for (const index of removed) zones.delete(index);
  return {
    snapshot: { ...snapshot, zones },
    events: removed.map(
      (index): ReconcileEvent => ({ type: "ENTITY_REMOVED", entity: "zone", index }),
    ),
  };
}

/**
 * Mark every cached entity stale and adopt a new device identity.
 */
export function invalidate(
  snapshot: Snapshot,
  deviceUid: string,
  deviceType: string | null,
): Snapshot {
  const markStale = (state: EntityState): EntityState => ({ ...state, stale: true });
  const singletons: Partial<Record<SingletonEntityKind, EntityState>> = {};
  for (const kind of SINGLETON_KINDS) {
    const state = snapshot.singletons[kind];
    if (state) singletons[kind] = markStale(state);
  }
  const restale = (map: ReadonlyMap<number, EntityState>) =>
    new Map([...map].map(([index, state]) => [index, markStale(state)] as const));
  return {
    deviceUid,
    deviceType,
    singletons,
    zones: restale(snapshot.zones),
    schedules: restale(snapshot.schedules),
  };
}

/**
 * Merge one decoded status into the snapshot.
 *
 * Full messages replace their entity; partial messages (zones, schedules)
 * touch only the addressed index. A payload from a different device UID is
 * not merged: the snapshot is marked stale and one DEVICE_IDENTITY_CHANGED
 * event is returned.
 */
export function applyStatus(
  snapshot: Snapshot,
  status: DecodedStatus,
  seq: number,
  options: MergeOptions = {},
): ReconcileResult {
  const { schema } = status;

  if (
    status.deviceUid !== null &&
    snapshot.deviceUid !== null &&
    status.deviceUid !== snapshot.deviceUid
  ) {
    return {
      snapshot: invalidate(snapshot, status.deviceUid, status.deviceType),
      events: [
        {
          type: "DEVICE_IDENTITY_CHANGED",
          previousUid: snapshot.deviceUid,
          currentUid: status.deviceUid,
        },
      ],
    };
  }

  let current: Snapshot =
    snapshot.deviceUid === null && status.deviceUid !== null
      ? { ...snapshot, deviceUid: status.deviceUid, deviceType: status.deviceType }
      : snapshot;
  const events: ReconcileEvent[] = [];

  if (isIndexed(schema.entity)) {
    const indexField = schema.indexField ?? "Index";
    const requestIndex = options.requestIndex ?? null;
    for (const [position, entry] of entriesOf(status.body).entries()) {
      const fields = recordOf(entry);
      if (!fields) continue;
      const own = fields[indexField];
      const index =
        typeof own === "number"
          ? own
          : requestIndex !== null
            ? requestIndex + position
            : null;
      if (index === null) continue;
      const record: DecodedRecord =
        typeof own === "number" ? fields : { ...fields, [indexField]: index };
      const merged = mergeInto(current, schema.entity, index, record, seq, false);
      current = merged.snapshot;
      events.push(...merged.events);
    }
  } else {
    const record: DecodedRecord = recordOf(status.body) ?? {
      [schema.key ?? schema.name]: status.body,
    };
    const existing = getEntity(current, schema.entity, null);
    const dedupe = schema.dedupeField;
    const duplicate =
      dedupe !== undefined &&
      existing !== undefined &&
      !existing.stale &&
      Object.hasOwn(record, dedupe) &&
      isDeepStrictEqual(existing.values[dedupe], record[dedupe]);
    if (duplicate) {
      return { snapshot: current, events: [] };
    }
    const merged = mergeInto(
      current,
      schema.entity,
      null,
      record,
      seq,
      schema.mode === "full",
      failedFields(schema.name, status.failures),
    );
    current = merged.snapshot;
    events.push(...merged.events);
    if (schema.entity === "system" && merged.events.length > 0) {
      const pruned = pruneZones(current);
      current = pruned.snapshot;
      events.push(...pruned.events);
    }
  }

  if (status.failures.length > 0) {
    events.push({
      type: "PARTIAL_DECODE_FAILURE",
      status: schema.name,
      failures: status.failures,
    });
  }

  return { snapshot: current, events };
}

// =============================================================================
// Command Acknowledgement
// =============================================================================

/**
 * Merge an acknowledged command into the snapshot as a partial status,
 * e.g. an acknowledged `BalanceMin { Index: 3, Min: 60 }` sets zone 3's
 * `BalanceMin` to 60.
 */
export function reflectCommand(
  registry: Registry,
  snapshot: Snapshot,
  command: Readonly<{ schema: CommandSchema; value: WireValue }>,
  seq: number,
): ReconcileResult {
  const unchanged: ReconcileResult = { snapshot, events: [] };
  const reflect = command.schema.reflect;
  if (!reflect) return unchanged;
  const status = registry.status.get(reflect.status);
  if (!status) return unchanged;
  const body = status.body;
  if (body.type !== "object") return unchanged;

  const mapped: Record<string, unknown> = {};
  if (reflect.value !== undefined) {
    mapped[reflect.value] = command.value;
  }
  if (isRecord(command.value)) {
    for (const [from, to] of Object.entries(reflect.fields ?? {})) {
      mapped[to] = command.value[from];
    }
  }

  let index: number | null = null;
  if (reflect.index !== undefined && isRecord(command.value)) {
    const raw = command.value[reflect.index];
    index = typeof raw === "number" ? raw : null;
    if (index === null) return unchanged;
  }

  let incoming: DecodedRecord;
  if (reflect.object !== undefined) {
    const nestedSpec = body.fields[reflect.object];
    if (!nestedSpec) return unchanged;
    const decoded = recordOf(
      decodeTolerant(nestedSpec, mapped, reflect.object).value,
    );
    if (!decoded) return unchanged;
    const current = getEntity(snapshot, status.entity, index)?.values[reflect.object];
    incoming = { [reflect.object]: { ...recordOf(current), ...decoded } };
  } else {
    const decoded = recordOf(decodeTolerant(body, mapped, status.name).value);
    if (!decoded) return unchanged;
    incoming = decoded;
  }

  if (index !== null && status.indexField !== undefined) {
    incoming = { ...incoming, [status.indexField]: index };
  }

  return mergeInto(snapshot, status.entity, index, incoming, seq, false);
}
