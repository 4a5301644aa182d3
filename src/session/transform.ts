/**
 * Session Module - Pure Transformations
 */
import {
  type Snapshot,
  reflectCommand,
  systemView,
  zoneViews,
} from "../reconciler/index.js";
import type { Registry } from "../registry/index.js";
import type {
  ValidatedCommand,
  ValidationContext,
  ZoneLimits,
} from "../validator/index.js";

// =============================================================================
// Status Requests
// =============================================================================

export type StatusRequest = Readonly<{
  name: "iZoneV2Request" | "PowerRequest";
  body: Readonly<{ Type: number; No: number; No1: number }>;
}>;

const izone = (type: number, no = 0): StatusRequest => ({
  name: "iZoneV2Request",
  body: { Type: type, No: no, No1: 0 },
});

const power = (type: number): StatusRequest => ({
  name: "PowerRequest",
  body: { Type: type, No: 0, No1: 0 },
});

export const STATUS_REQUESTS = {
  system: () => izone(1),
  zone: (index: number) => izone(2, index),
  schedule: (index: number) => izone(3, index),
  faults: () => izone(4),
  temperzone: () => izone(5),
  firmware: () => izone(6),
  powerConfig: () => power(1),
  powerStatus: () => power(2),
} as const;

// =============================================================================
// Validation Context
// =============================================================================

const toWire = (celsius: number): number => Math.round(celsius * 100);

/**
 * What the acknowledged snapshot says about limits, in wire units.
 * Stale entities contribute nothing.
 */
export function validationContextOf(snapshot: Snapshot): ValidationContext {
  const view = systemView(snapshot);
  const system = view && !view.stale ? view : null;

  const zones: Record<number, ZoneLimits> = {};
  for (const zone of zoneViews(snapshot)) {
    if (zone.stale) continue;
    zones[zone.index] = {
      balanceMin: zone.balanceMin ?? undefined,
      balanceMax: zone.balanceMax ?? undefined,
      minAir: zone.minAir ?? undefined,
      maxAir: zone.maxAir ?? undefined,
      zoneType: zone.zoneType?.type === "KNOWN" ? zone.zoneType.value : undefined,
    };
  }

  const locked = system?.economyLock ?? null;
  const min = system?.economyMin ?? null;
  const max = system?.economyMax ?? null;
  const economy =
    locked !== null && min !== null && max !== null
      ? { locked, min: toWire(min), max: toWire(max) }
      : undefined;

  return {
    zoneCount: system?.zoneCount ?? undefined,
    economy,
    zones,
  };
}

/**
 * The snapshot as it will be once every pending write is acknowledged,
 * applied in issue order after everything received up to `seq`.
 */
export function projectWrites(
  registry: Registry,
  snapshot: Snapshot,
  pending: Iterable<ValidatedCommand>,
  seq: number,
): Snapshot {
  let projected = snapshot;
  let next = seq;
  for (const command of pending) {
    next += 1;
    projected = reflectCommand(registry, projected, command, next).snapshot;
  }
  return projected;
}
