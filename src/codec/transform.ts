/**
 * Codec Module - Pure Transformations
 *
 * Wire ⇄ domain conversion for single fields, nested objects and fixed
 * arrays. No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import { ENUM_TABLES, type EnumName } from "./enums.js";
import {
  type CodecError,
  arrayLengthMismatch,
  decodeFailed,
  encodeFailed,
  fieldTooLong,
} from "./errors.js";
import type {
  DecodedValue,
  DomainValue,
  EnumValue,
  FieldSpec,
  NumericSpec,
  ScheduleSetpoint,
  TolerantDecode,
  WireValue,
} from "./schema.js";

type ScalarSpec = Exclude<FieldSpec, { type: "object" } | { type: "array" }>;

/** Hour that marks "no time set" in schedule times. */
export const NO_TIME_HOUR = 31;
/** Minute that marks "no time set" in schedule times. */
export const NO_TIME_MINUTE = 63;

const SCHEDULE_SP_OPEN = 1;
const SCHEDULE_SP_CLOSE = 2;

const INTEGER_PATTERN = /^-?\d+$/;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Plain JSON object check (arrays and null excluded).
 */
export function isRecord(
  value: unknown,
): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function joinPath(parent: string, key: string): string {
  return parent === "" ? key : `${parent}.${key}`;
}

/**
 * UTF-8 byte length of a string plus its NUL terminator.
 */
export function terminatedByteLength(value: string): number {
  return Buffer.byteLength(value, "utf8") + 1;
}

/**
 * Integer from a JSON number or a numeric string; null otherwise.
 */
export function toInteger(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? raw : null;
  }
  if (typeof raw === "string" && INTEGER_PATTERN.test(raw.trim())) {
    return Number(raw.trim());
  }
  return null;
}

function toFlag(raw: unknown): boolean | null {
  if (typeof raw === "boolean") return raw;
  if (raw === 0 || raw === 1) return raw === 1;
  if (typeof raw === "string") {
    switch (raw.trim().toLowerCase()) {
      case "true":
      case "1":
        return true;
      case "false":
      case "0":
        return false;
    }
  }
  return null;
}

/**
 * Keep whole code points until the byte budget is spent.
 */
function truncateUtf8(value: string, maxBytes: number): string {
  let out = "";
  let used = 0;
  for (const ch of value) {
    const size = Buffer.byteLength(ch, "utf8");
    if (used + size > maxBytes) break;
    out += ch;
    used += size;
  }
  return out;
}

export type NumericViolation = Readonly<{
  rule: "range" | "step";
  reason: string;
}>;

/**
 * Check a wire integer against a numeric spec's constraints.
 * Sentinel values are always accepted. Returns null when the value passes.
 */
export function numericViolation(
  spec: NumericSpec,
  value: number,
  enforceStep: boolean,
): NumericViolation | null {
  if (spec.sentinels?.includes(value)) {
    return null;
  }
  if (spec.oneOf && !spec.oneOf.includes(value)) {
    return { rule: "range", reason: `must be one of ${spec.oneOf.join(", ")}` };
  }
  if (spec.min !== undefined && value < spec.min) {
    return { rule: "range", reason: `${value} is below minimum ${spec.min}` };
  }
  if (spec.max !== undefined && value > spec.max) {
    return { rule: "range", reason: `${value} is above maximum ${spec.max}` };
  }
  if (enforceStep && spec.step !== undefined) {
    const base = spec.min ?? 0;
    if ((value - base) % spec.step !== 0) {
      return {
        rule: "step",
        reason: `${value} is not on a ${spec.step} step from ${base}`,
      };
    }
  }
  return null;
}

// =============================================================================
// Enumerations
// =============================================================================

/**
 * Map a discriminant to its enum member; unknown values are kept raw.
 */
export function decodeEnum(name: EnumName, raw: number): EnumValue {
  const table = ENUM_TABLES[name];
  for (const [member, value] of Object.entries(table)) {
    if (value === raw) {
      return { type: "KNOWN", enum: name, name: member, value };
    }
  }
  return { type: "UNKNOWN_ENUM", enum: name, raw };
}

/**
 * Discriminant for a member name, or null when the table has no such member.
 */
export function enumValueOf(name: EnumName, member: string): number | null {
  const value = ENUM_TABLES[name][member];
  return value === undefined ? null : value;
}

export function isKnownDiscriminant(name: EnumName, raw: number): boolean {
  return Object.values(ENUM_TABLES[name]).includes(raw);
}

// =============================================================================
// Decoding
// =============================================================================

function decodeScalar(
  spec: ScalarSpec,
  raw: unknown,
  path: string,
): Result<DecodedValue, CodecError> {
  switch (spec.type) {
    case "int":
    case "temperature": {
      const value = toInteger(raw);
      if (value === null) {
        return err(decodeFailed(path, "expected an integer", raw));
      }
      const violation = numericViolation(spec, value, false);
      if (violation) {
        return err(decodeFailed(path, violation.reason, raw));
      }
      return ok(spec.type === "temperature" ? value / 100 : value);
    }

    case "index": {
      const value = toInteger(raw);
      if (value === null || value < 0) {
        return err(decodeFailed(path, "expected a non-negative integer", raw));
      }
      return ok(value);
    }

    case "flag": {
      const flag = toFlag(raw);
      if (flag === null) {
        return err(decodeFailed(path, "expected a flag", raw));
      }
      return ok(flag);
    }

    case "enum": {
      const value = toInteger(raw);
      if (value === null) {
        return err(decodeFailed(path, `expected a ${spec.enum} discriminant`, raw));
      }
      return ok(decodeEnum(spec.enum, value));
    }

    case "string": {
      if (typeof raw !== "string") {
        return err(decodeFailed(path, "expected a string", raw));
      }
      const terminator = raw.indexOf("\u0000");
      const content = terminator === -1 ? raw : raw.slice(0, terminator);
      return ok(truncateUtf8(content, spec.maxBytes - 1));
    }

    case "text": {
      if (typeof raw !== "string") {
        return err(decodeFailed(path, "expected a string", raw));
      }
      return ok(raw);
    }

    case "timeOfDay": {
      const value = toInteger(raw);
      if (value === null || value < 0) {
        return err(decodeFailed(path, "expected hours*100+minutes", raw));
      }
      const hours = Math.floor(value / 100);
      const minutes = value % 100;
      if (hours === NO_TIME_HOUR || minutes === NO_TIME_MINUTE) {
        return ok(null);
      }
      if (hours > 23 || minutes > 59) {
        return err(decodeFailed(path, `${value} is not a time of day`, raw));
      }
      return ok({ hours, minutes });
    }

    case "scheduleSetpoint": {
      const value = toInteger(raw);
      if (value === null || value < 0) {
        return err(decodeFailed(path, "expected a schedule setpoint", raw));
      }
      return ok(decodeScheduleSetpoint(value));
    }
  }
}

function decodeScheduleSetpoint(sp: number): ScheduleSetpoint {
  if (sp === SCHEDULE_SP_OPEN) return { type: "OPEN" };
  if (sp === SCHEDULE_SP_CLOSE) return { type: "CLOSE" };
  return { type: "SETPOINT", celsius: (sp * 50) / 100 };
}

/**
 * Decode as much of a value as possible.
 *
 * Object fields decode independently: a failing field is left out and its
 * failure recorded, the rest is kept. Undeclared object keys are ignored.
 * Array entries that fail decode to null so positions stay aligned.
 */
export function decodeTolerant(
  spec: FieldSpec,
  raw: unknown,
  path: string,
): TolerantDecode {
  if (spec.type === "object") {
    if (!isRecord(raw)) {
      return {
        value: undefined,
        failures: [decodeFailed(path, "expected an object", raw)],
      };
    }
    const value: Record<string, DecodedValue> = {};
    const failures: CodecError[] = [];
    for (const [key, fieldSpec] of Object.entries(spec.fields)) {
      if (!Object.hasOwn(raw, key)) continue;
      const decoded = decodeTolerant(fieldSpec, raw[key], joinPath(path, key));
      failures.push(...decoded.failures);
      if (decoded.value !== undefined) {
        value[key] = decoded.value;
      }
    }
    return { value, failures };
  }

  if (spec.type === "array") {
    if (!Array.isArray(raw)) {
      return {
        value: undefined,
        failures: [decodeFailed(path, "expected an array", raw)],
      };
    }
    const entries: readonly unknown[] = raw;
    if (spec.length !== undefined && entries.length !== spec.length) {
      return {
        value: undefined,
        failures: [arrayLengthMismatch(path, spec.length, entries.length)],
      };
    }
    if (spec.maxLength !== undefined && entries.length > spec.maxLength) {
      return {
        value: undefined,
        failures: [arrayLengthMismatch(path, spec.maxLength, entries.length)],
      };
    }
    const failures: CodecError[] = [];
    const value = entries.map((entry, i) => {
      const decoded = decodeTolerant(spec.items, entry, `${path}[${i}]`);
      failures.push(...decoded.failures);
      return decoded.value ?? null;
    });
    return { value, failures };
  }

  return decodeScalar(spec, raw, path).match<TolerantDecode>(
    (value) => ({ value, failures: [] }),
    (error) => ({ value: undefined, failures: [error] }),
  );
}

/**
 * Strict decode: the first failure anywhere fails the whole value.
 */
export function decode(
  spec: FieldSpec,
  raw: unknown,
  path = "",
): Result<DecodedValue, CodecError> {
  const decoded = decodeTolerant(spec, raw, path);
  const [first] = decoded.failures;
  if (first) {
    return err(first);
  }
  if (decoded.value === undefined) {
    return err(decodeFailed(path, "no value", raw));
  }
  return ok(decoded.value);
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode a domain value to its wire form.
 *
 * Only representation is checked here (types, byte lengths, array
 * lengths); range, step and cross-field checks belong to the validator.
 */
export function encode(
  spec: FieldSpec,
  value: DomainValue,
  path = "",
): Result<WireValue, CodecError> {
  return encodeUnknown(spec, value, path);
}

function encodeUnknown(
  spec: FieldSpec,
  value: unknown,
  path: string,
): Result<WireValue, CodecError> {
  switch (spec.type) {
    case "int":
    case "index": {
      if (typeof value !== "number" || !Number.isInteger(value)) {
        return err(encodeFailed(path, "expected an integer"));
      }
      return ok(value);
    }

    case "temperature": {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return err(encodeFailed(path, "expected a temperature in °C"));
      }
      return ok(Math.round(value * 100));
    }

    case "flag": {
      if (typeof value === "boolean") return ok(value ? 1 : 0);
      if (value === 0 || value === 1) return ok(value);
      return err(encodeFailed(path, "expected a boolean"));
    }

    case "enum": {
      if (typeof value === "string") {
        const discriminant = enumValueOf(spec.enum, value);
        return discriminant === null
          ? err(encodeFailed(path, `${value} is not a ${spec.enum} member`))
          : ok(discriminant);
      }
      if (typeof value === "number" && Number.isInteger(value)) {
        return ok(value);
      }
      return err(encodeFailed(path, `expected a ${spec.enum} member`));
    }

    case "string": {
      if (typeof value !== "string") {
        return err(encodeFailed(path, "expected a string"));
      }
      const bytes = terminatedByteLength(value);
      if (bytes > spec.maxBytes) {
        return err(fieldTooLong(path, spec.maxBytes, bytes));
      }
      return ok(value);
    }

    case "text": {
      if (typeof value !== "string") {
        return err(encodeFailed(path, "expected a string"));
      }
      return ok(value);
    }

    case "timeOfDay": {
      if (value === null) {
        return ok(NO_TIME_HOUR * 100 + NO_TIME_MINUTE);
      }
      if (
        isRecord(value) &&
        typeof value.hours === "number" &&
        typeof value.minutes === "number" &&
        Number.isInteger(value.hours) &&
        Number.isInteger(value.minutes)
      ) {
        return ok(value.hours * 100 + value.minutes);
      }
      return err(encodeFailed(path, "expected { hours, minutes } or null"));
    }

    case "scheduleSetpoint": {
      if (isRecord(value)) {
        if (value.type === "OPEN") return ok(SCHEDULE_SP_OPEN);
        if (value.type === "CLOSE") return ok(SCHEDULE_SP_CLOSE);
        if (value.type === "SETPOINT" && typeof value.celsius === "number") {
          const steps = value.celsius * 2;
          if (!Number.isInteger(steps) || steps <= SCHEDULE_SP_CLOSE) {
            return err(
              encodeFailed(path, `${value.celsius} is not a half-degree setpoint`),
            );
          }
          return ok(steps);
        }
      }
      return err(encodeFailed(path, "expected OPEN, CLOSE or SETPOINT"));
    }

    case "object": {
      if (!isRecord(value)) {
        return err(encodeFailed(path, "expected an object"));
      }
      const unexpected = Object.keys(value).find(
        (key) => !Object.hasOwn(spec.fields, key),
      );
      if (unexpected !== undefined) {
        return err(encodeFailed(joinPath(path, unexpected), "unexpected field"));
      }
      const out: Record<string, WireValue> = {};
      for (const [key, fieldSpec] of Object.entries(spec.fields)) {
        const fieldPath = joinPath(path, key);
        if (value[key] === undefined) {
          return err(encodeFailed(fieldPath, "missing field"));
        }
        const encoded = encodeUnknown(fieldSpec, value[key], fieldPath);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        out[key] = encoded.value;
      }
      return ok(out);
    }

    case "array": {
      if (!Array.isArray(value)) {
        return err(encodeFailed(path, "expected an array"));
      }
      const entries: readonly unknown[] = value;
      if (spec.length !== undefined && entries.length !== spec.length) {
        return err(arrayLengthMismatch(path, spec.length, entries.length));
      }
      if (spec.maxLength !== undefined && entries.length > spec.maxLength) {
        return err(arrayLengthMismatch(path, spec.maxLength, entries.length));
      }
      const out: WireValue[] = [];
      for (const [i, entry] of entries.entries()) {
        const encoded = encodeUnknown(spec.items, entry, `${path}[${i}]`);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        out.push(encoded.value);
      }
      return ok(out);
    }
  }
}

// =============================================================================
// Message Framing
// =============================================================================

/**
 * Serialize a message body as `{ "<name>": <value> }`.
 */
export function serializeMessage(name: string, value: WireValue): string {
  return JSON.stringify({ [name]: value });
}

/**
 * Parse a UTF-8 JSON frame body.
 */
export function parsePayload(
  body: string | Uint8Array,
): Result<unknown, CodecError> {
  const text =
    typeof body === "string" ? body : Buffer.from(body).toString("utf8");
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(decodeFailed("", `invalid JSON: ${message}`, text));
  }
}
