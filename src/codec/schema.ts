/**
 * Codec Module - Schemas and Types
 *
 * Field specifications describe how one wire field maps to its domain
 * value. The registry file is made of these, so the zod schema here is
 * also what validates `schemas/messages.json` at load time.
 */
import { z } from "zod";

import { ENUM_NAMES, type EnumName } from "./enums.js";
import type { CodecError } from "./errors.js";

// =============================================================================
// Field Specifications
// =============================================================================

/**
 * Topologies an index field is bounded by.
 * zone: current NoOfZones, device: 5 power monitors, channel: 3 per device.
 */
export const TopologySchema = z.enum(["zone", "device", "channel"]);

export type Topology = z.infer<typeof TopologySchema>;

type NumericConstraints = {
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
  readonly oneOf?: readonly number[];
  readonly sentinels?: readonly number[];
};

export type IntSpec = Readonly<{ type: "int" }> & NumericConstraints;
export type TemperatureSpec = Readonly<{ type: "temperature" }> &
  NumericConstraints;
export type NumericSpec = IntSpec | TemperatureSpec;

export type FieldSpec =
  | IntSpec
  | TemperatureSpec
  | Readonly<{ type: "flag" }>
  | Readonly<{ type: "enum"; enum: EnumName }>
  | Readonly<{ type: "string"; maxBytes: number }>
  | Readonly<{ type: "text" }>
  | Readonly<{ type: "index"; topology: Topology }>
  | Readonly<{ type: "timeOfDay" }>
  | Readonly<{ type: "scheduleSetpoint" }>
  | Readonly<{ type: "object"; fields: Readonly<Record<string, FieldSpec>> }>
  | Readonly<{
      type: "array";
      items: FieldSpec;
      length?: number;
      maxLength?: number;
    }>;

export type ObjectSpec = Extract<FieldSpec, { type: "object" }>;

const numericConstraints = {
  min: z.number().int().optional(),
  max: z.number().int().optional(),
  step: z.number().int().positive().optional(),
  oneOf: z.array(z.number().int()).nonempty().optional(),
  sentinels: z.array(z.number().int()).optional(),
};

export const FieldSpecSchema: z.ZodType<FieldSpec> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("int"), ...numericConstraints }).strict(),
    z.object({ type: z.literal("temperature"), ...numericConstraints }).strict(),
    z.object({ type: z.literal("flag") }).strict(),
    z.object({ type: z.literal("enum"), enum: z.enum(ENUM_NAMES) }).strict(),
    z
      .object({ type: z.literal("string"), maxBytes: z.number().int().min(2) })
      .strict(),
    z.object({ type: z.literal("text") }).strict(),
    z.object({ type: z.literal("index"), topology: TopologySchema }).strict(),
    z.object({ type: z.literal("timeOfDay") }).strict(),
    z.object({ type: z.literal("scheduleSetpoint") }).strict(),
    z
      .object({
        type: z.literal("object"),
        fields: z.record(z.string().min(1), FieldSpecSchema),
      })
      .strict(),
    z
      .object({
        type: z.literal("array"),
        items: FieldSpecSchema,
        length: z.number().int().positive().optional(),
        maxLength: z.number().int().positive().optional(),
      })
      .strict(),
  ]),
);

// =============================================================================
// Domain Values (decoded)
// =============================================================================

export type KnownEnum = Readonly<{
  type: "KNOWN";
  enum: EnumName;
  name: string;
  value: number;
}>;

/** An integer the enumeration table has no entry for. */
export type UnknownEnum = Readonly<{
  type: "UNKNOWN_ENUM";
  enum: EnumName;
  raw: number;
}>;

export type EnumValue = KnownEnum | UnknownEnum;

/** Wall-clock time; `null` where the device uses a "no time set" sentinel. */
export type TimeOfDay = Readonly<{ hours: number; minutes: number }>;

export type ScheduleSetpoint =
  | Readonly<{ type: "OPEN" }>
  | Readonly<{ type: "CLOSE" }>
  | Readonly<{ type: "SETPOINT"; celsius: number }>;

export type DecodedValue =
  | number
  | string
  | boolean
  | null
  | EnumValue
  | TimeOfDay
  | ScheduleSetpoint
  | DecodedRecord
  | readonly DecodedValue[];

export interface DecodedRecord {
  readonly [field: string]: DecodedValue;
}

// =============================================================================
// Domain Values (to encode)
// =============================================================================

/**
 * Input accepted by `encode`: temperatures in °C, flags as booleans,
 * enums by member name or discriminant.
 */
export type DomainValue =
  | number
  | string
  | boolean
  | null
  | TimeOfDay
  | ScheduleSetpoint
  | DomainRecord
  | readonly DomainValue[];

export interface DomainRecord {
  readonly [field: string]: DomainValue;
}

// =============================================================================
// Wire Values
// =============================================================================

export type WireValue = number | string | WireRecord | readonly WireValue[];

export interface WireRecord {
  readonly [field: string]: WireValue;
}

/**
 * Result of a tolerant decode: whatever decoded, plus every failure met
 * on the way. `value` is undefined when the field itself could not decode.
 */
export type TolerantDecode = Readonly<{
  value: DecodedValue | undefined;
  failures: readonly CodecError[];
}>;
