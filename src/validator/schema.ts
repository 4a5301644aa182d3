/**
 * Validator Module - Schemas and Types
 */
import type { WireValue } from "../codec/index.js";
import type {
  CommandSchema,
  EndpointKind,
  RequestSchema,
} from "../registry/index.js";

// =============================================================================
// Topology
// =============================================================================

/** Zone indices are 0..13 until NoOfZones is known. */
export const MAX_ZONES = 14;
export const POWER_DEVICES = 5;
export const POWER_CHANNELS = 3;

// =============================================================================
// Context
// =============================================================================

/**
 * Acknowledged per-zone type and limits, in wire units.
 */
export type ZoneLimits = Readonly<{
  /** ZoneType discriminant */
  zoneType?: number;
  balanceMin?: number;
  balanceMax?: number;
  minAir?: number;
  maxAir?: number;
}>;

/**
 * What the validator knows about the device beyond the candidate itself.
 * Temperatures are in wire units (×100).
 */
export type ValidationContext = Readonly<{
  zoneCount?: number;
  economy?: Readonly<{ locked: boolean; min: number; max: number }>;
  zones?: Readonly<Record<number, ZoneLimits>>;
}>;

// =============================================================================
// Output
// =============================================================================

export type ValidatedCommand = Readonly<{
  name: string;
  schema: CommandSchema;
  endpoint: EndpointKind;
  /** Normalized wire body, fields in declared order */
  value: WireValue;
  /** `Name` or `Name:Index` / `Name:Device/Channel`; writes to one key are serialized */
  targetKey: string;
}>;

export type ValidatedRequest = Readonly<{
  name: string;
  schema: RequestSchema;
  endpoint: EndpointKind;
  value: WireValue;
  /** Status message the reply carries */
  replyStatus: string;
  /** `No` for indexed replies (zone, schedule), otherwise null */
  index: number | null;
}>;
