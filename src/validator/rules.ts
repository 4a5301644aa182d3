/**
 * Validator Module - Cross-Field Rules
 *
 * Checks that need more than one field, or the device's acknowledged
 * state. Registry entries name the rules that apply to them.
 */
import { type Result, err, ok } from "neverthrow";

import {
  NO_TIME_HOUR,
  NO_TIME_MINUTE,
  type WireValue,
  ZoneMode,
  ZoneType,
  isRecord,
} from "../codec/index.js";
import type { CrossFieldRule } from "../registry/index.js";
import { type ValidationError, validationFailed } from "./errors.js";
import type { ValidationContext, ZoneLimits } from "./schema.js";

type RuleCheck = (
  name: string,
  value: WireValue,
  context: ValidationContext,
) => Result<void, ValidationError>;

function field(value: WireValue, key: string): number | undefined {
  if (!isRecord(value)) return undefined;
  const entry = value[key];
  return typeof entry === "number" ? entry : undefined;
}

function scalar(value: WireValue): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function zoneLimits(
  value: WireValue,
  context: ValidationContext,
): ZoneLimits | undefined {
  const index = field(value, "Index");
  return index === undefined ? undefined : context.zones?.[index];
}

const crossField = (fieldName: string, reason: string) =>
  err(validationFailed(fieldName, "crossField", reason));

/**
 * `upper` must stay strictly above `lower` when both are known.
 */
function strictlyAbove(
  fieldName: string,
  upper: number | undefined,
  lower: number | undefined,
  upperLabel: string,
  lowerLabel: string,
): Result<void, ValidationError> {
  if (upper === undefined || lower === undefined || upper > lower) {
    return ok(undefined);
  }
  return crossField(
    fieldName,
    `${upperLabel} ${upper} must be above ${lowerLabel} ${lower}`,
  );
}

function sentinelPair(
  value: WireValue,
  hourKey: string,
  minuteKey: string,
): Result<void, ValidationError> {
  const hour = field(value, hourKey);
  const minute = field(value, minuteKey);
  if ((hour === NO_TIME_HOUR) === (minute === NO_TIME_MINUTE)) {
    return ok(undefined);
  }
  return crossField(
    hourKey,
    `${hourKey} ${NO_TIME_HOUR} and ${minuteKey} ${NO_TIME_MINUTE} mark "no time" together`,
  );
}

export const CROSS_FIELD_RULES: Readonly<Record<CrossFieldRule, RuleCheck>> = {
  balanceMaxAboveMin: (_name, value, context) =>
    strictlyAbove(
      "Max",
      field(value, "Max"),
      zoneLimits(value, context)?.balanceMin,
      "BalanceMax",
      "BalanceMin",
    ),

  balanceMinBelowMax: (_name, value, context) =>
    strictlyAbove(
      "Min",
      zoneLimits(value, context)?.balanceMax,
      field(value, "Min"),
      "BalanceMax",
      "BalanceMin",
    ),

  maxAirAboveMinAir: (_name, value, context) =>
    strictlyAbove(
      "MaxAir",
      field(value, "MaxAir"),
      zoneLimits(value, context)?.minAir,
      "MaxAir",
      "MinAir",
    ),

  minAirBelowMaxAir: (_name, value, context) =>
    strictlyAbove(
      "MinAir",
      zoneLimits(value, context)?.maxAir,
      field(value, "MinAir"),
      "MaxAir",
      "MinAir",
    ),

  ecoMaxNotBelowMin: (name, value, context) => {
    const max = scalar(value);
    const min = context.economy?.min;
    if (max === undefined || min === undefined || max >= min) return ok(undefined);
    return crossField(name, `EcoMax ${max} is below EcoMin ${min}`);
  },

  ecoMinNotAboveMax: (name, value, context) => {
    const min = scalar(value);
    const max = context.economy?.max;
    if (min === undefined || max === undefined || min <= max) return ok(undefined);
    return crossField(name, `EcoMin ${min} is above EcoMax ${max}`);
  },

  withinEconomyLock: (name, value, context) => {
    const economy = context.economy;
    const setpoint = scalar(value) ?? field(value, "Setpoint");
    if (!economy?.locked || setpoint === undefined) return ok(undefined);
    if (setpoint >= economy.min && setpoint <= economy.max) return ok(undefined);
    return crossField(
      typeof value === "number" ? name : "Setpoint",
      `${setpoint} is outside the economy lock ${economy.min}..${economy.max}`,
    );
  },

  zoneTypeAllowsSetpoint: (_name, value, context) => {
    const zoneType = zoneLimits(value, context)?.zoneType;
    if (zoneType === undefined || zoneType === ZoneType.Auto) return ok(undefined);
    return crossField(
      "Setpoint",
      `zone ${String(field(value, "Index"))} is not an Auto zone`,
    );
  },

  zoneTypeAllowsMode: (_name, value, context) => {
    const mode = field(value, "Mode");
    const index = String(field(value, "Index"));
    if (mode !== ZoneMode.Open && mode !== ZoneMode.Close && mode !== ZoneMode.Auto) {
      return crossField("Mode", `mode ${String(mode)} is set by the controller`);
    }
    const zoneType = zoneLimits(value, context)?.zoneType;
    if (zoneType === ZoneType.Constant) {
      return crossField("Mode", `zone ${index} is a constant zone`);
    }
    if (zoneType === ZoneType.OpenClose && mode === ZoneMode.Auto) {
      return crossField("Mode", `zone ${index} is an open/close zone`);
    }
    return ok(undefined);
  },

  constantsWithinZones: (name, value, context) => {
    const constants = scalar(value);
    const zones = context.zoneCount;
    if (constants === undefined || zones === undefined || constants <= zones) {
      return ok(undefined);
    }
    return crossField(name, `${constants} constants exceed ${zones} zones`);
  },

  scheduleTimeSentinels: (_name, value) =>
    sentinelPair(value, "StartH", "StartM").andThen(() =>
      sentinelPair(value, "StopH", "StopM"),
    ),
};
