/**
 * Validator Module - Pure Transformations
 *
 * Checks a candidate body against its registry entry and produces the
 * normalized wire body. Candidates are in wire units: temperatures ×100,
 * flags 0/1 (booleans accepted), enums by discriminant or member name.
 * Off-step values are rejected, never rounded.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type FieldSpec,
  type Topology,
  type WireValue,
  NO_TIME_HOUR,
  NO_TIME_MINUTE,
  enumValueOf,
  isKnownDiscriminant,
  isRecord,
  joinPath,
  numericViolation,
  terminatedByteLength,
} from "../codec/index.js";
import {
  type CommandSchema,
  type Registry,
  type RequestSchema,
  lookupCommand,
  lookupRequest,
} from "../registry/index.js";
import {
  type ValidationError,
  indexOutOfRange,
  validationFailed,
} from "./errors.js";
import { CROSS_FIELD_RULES } from "./rules.js";
import {
  MAX_ZONES,
  POWER_CHANNELS,
  POWER_DEVICES,
  type ValidatedCommand,
  type ValidatedRequest,
  type ValidationContext,
} from "./schema.js";

// =============================================================================
// Topology
// =============================================================================

/**
 * Exclusive upper bound for an index of the given topology.
 */
export function topologyLimit(
  topology: Topology,
  context: ValidationContext,
): number {
  switch (topology) {
    case "zone":
      return context.zoneCount ?? MAX_ZONES;
    case "device":
      return POWER_DEVICES;
    case "channel":
      return POWER_CHANNELS;
  }
}

// =============================================================================
// Field Checks
// =============================================================================

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * Check one value against its field spec.
 *
 * @param label - Field name used in errors
 */
export function checkValue(
  spec: FieldSpec,
  value: unknown,
  label: string,
  context: ValidationContext,
): Result<WireValue, ValidationError> {
  switch (spec.type) {
    case "int":
    case "temperature": {
      if (!isInteger(value)) {
        return err(validationFailed(label, "type", "expected an integer"));
      }
      const violation = numericViolation(spec, value, true);
      return violation
        ? err(validationFailed(label, violation.rule, violation.reason))
        : ok(value);
    }

    case "index": {
      if (!isInteger(value) || value < 0) {
        return err(validationFailed(label, "type", "expected a non-negative integer"));
      }
      const limit = topologyLimit(spec.topology, context);
      return value < limit ? ok(value) : err(indexOutOfRange(label, value, limit));
    }

    case "flag": {
      if (typeof value === "boolean") return ok(value ? 1 : 0);
      if (value === 0 || value === 1) return ok(value);
      return err(validationFailed(label, "type", "expected 0 or 1"));
    }

    case "enum": {
      if (typeof value === "string") {
        const discriminant = enumValueOf(spec.enum, value);
        return discriminant === null
          ? err(validationFailed(label, "enum", `${value} is not a ${spec.enum} member`))
          : ok(discriminant);
      }
      if (isInteger(value) && isKnownDiscriminant(spec.enum, value)) {
        return ok(value);
      }
      return err(
        validationFailed(label, "enum", `${String(value)} is not a ${spec.enum} value`),
      );
    }

    case "string": {
      if (typeof value !== "string") {
        return err(validationFailed(label, "type", "expected a string"));
      }
      const bytes = terminatedByteLength(value);
      if (bytes > spec.maxBytes) {
        return err(
          validationFailed(
            label,
            "length",
            `${bytes} bytes with terminator exceeds ${spec.maxBytes}`,
          ),
        );
      }
      return ok(value);
    }

    case "text": {
      return typeof value === "string"
        ? ok(value)
        : err(validationFailed(label, "type", "expected a string"));
    }

    case "timeOfDay": {
      if (!isInteger(value) || value < 0) {
        return err(validationFailed(label, "type", "expected hours*100+minutes"));
      }
      const hours = Math.floor(value / 100);
      const minutes = value % 100;
      const unset = hours === NO_TIME_HOUR && minutes === NO_TIME_MINUTE;
      if (!unset && (hours > 23 || minutes > 59)) {
        return err(validationFailed(label, "range", `${value} is not a time of day`));
      }
      return ok(value);
    }

    case "scheduleSetpoint": {
      return isInteger(value) && value >= 0
        ? ok(value)
        : err(validationFailed(label, "type", "expected a schedule setpoint"));
    }

    case "object": {
      if (!isRecord(value)) {
        return err(validationFailed(label, "shape", "expected an object"));
      }
      const unexpected = Object.keys(value).find(
        (key) => !Object.hasOwn(spec.fields, key),
      );
      if (unexpected !== undefined) {
        return err(validationFailed(joinPath(label, unexpected), "shape", "unexpected field"));
      }
      const out: Record<string, WireValue> = {};
      for (const [key, fieldSpec] of Object.entries(spec.fields)) {
        const fieldLabel = joinPath(label, key);
        if (value[key] === undefined) {
          return err(validationFailed(fieldLabel, "shape", "missing field"));
        }
        const checked = checkValue(fieldSpec, value[key], fieldLabel, context);
        if (checked.isErr()) return err(checked.error);
        out[key] = checked.value;
      }
      return ok(out);
    }

    case "array": {
      if (!Array.isArray(value)) {
        return err(validationFailed(label, "shape", "expected an array"));
      }
      const entries: readonly unknown[] = value;
      if (spec.length !== undefined && entries.length !== spec.length) {
        return err(
          validationFailed(label, "length", `expected ${spec.length} entries, got ${entries.length}`),
        );
      }
      if (spec.maxLength !== undefined && entries.length > spec.maxLength) {
        return err(
          validationFailed(label, "length", `at most ${spec.maxLength} entries, got ${entries.length}`),
        );
      }
      const out: WireValue[] = [];
      for (const [i, entry] of entries.entries()) {
        const checked = checkValue(spec.items, entry, `${label}[${i}]`, context);
        if (checked.isErr()) return err(checked.error);
        out.push(checked.value);
      }
      return ok(out);
    }
  }
}

/**
 * Object bodies report bare field names; scalar bodies report the message name.
 */
function checkBody(
  name: string,
  spec: FieldSpec,
  candidate: unknown,
  context: ValidationContext,
): Result<WireValue, ValidationError> {
  return checkValue(spec, candidate, spec.type === "object" ? "" : name, context);
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Key under which writes are serialized: the command's queue (its name,
 * unless it shares one with paired limits) plus whatever fields address a
 * zone, schedule or power channel, e.g. `Balance:3`.
 */
export function targetKeyOf(schema: CommandSchema, value: WireValue): string {
  const queue = schema.queue ?? schema.name;
  if (!schema.target || !isRecord(value)) return queue;
  const parts = schema.target.map((fieldName) => String(value[fieldName]));
  return `${queue}:${parts.join("/")}`;
}

function applyRules(
  schema: CommandSchema,
  value: WireValue,
  context: ValidationContext,
): Result<WireValue, ValidationError> {
  for (const rule of schema.rules) {
    const checked = CROSS_FIELD_RULES[rule](schema.name, value, context);
    if (checked.isErr()) return err(checked.error);
  }
  return ok(value);
}

/**
 * Validate a command candidate against a registry.
 */
export function validateCommand(
  registry: Registry,
  name: string,
  candidate: unknown,
  context: ValidationContext = {},
): Result<ValidatedCommand, ValidationError> {
  return lookupCommand(registry, name).andThen((schema) =>
    checkBody(name, schema.body, candidate, context)
      .andThen((value) => applyRules(schema, value, context))
      .map(
        (value): ValidatedCommand => ({
          name,
          schema,
          endpoint: schema.endpoint,
          value,
          targetKey: targetKeyOf(schema, value),
        }),
      ),
  );
}

// =============================================================================
// Requests
// =============================================================================

function replyFor(
  schema: RequestSchema,
  value: WireValue,
): Result<Pick<ValidatedRequest, "replyStatus" | "index">, ValidationError> {
  const type = isRecord(value) ? value.Type : undefined;
  const reply = schema.replies[String(type)];
  if (!reply) {
    return err(validationFailed("Type", "range", `${String(type)} is not a ${schema.name} type`));
  }
  const no = isRecord(value) ? value.No : undefined;
  return ok({
    replyStatus: reply.status,
    index: reply.indexed && typeof no === "number" ? no : null,
  });
}

/**
 * Validate a status request such as `{ Type: 2, No: 3, No1: 0 }`.
 */
export function validateRequest(
  registry: Registry,
  name: string,
  candidate: unknown,
  context: ValidationContext = {},
): Result<ValidatedRequest, ValidationError> {
  return lookupRequest(registry, name).andThen((schema) =>
    checkBody(name, schema.body, candidate, context).andThen((value) =>
      replyFor(schema, value).map(
        (reply): ValidatedRequest => ({
          name,
          schema,
          endpoint: schema.endpoint,
          value,
          ...reply,
        }),
      ),
    ),
  );
}
