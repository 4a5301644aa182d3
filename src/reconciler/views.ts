/**
 * Reconciler Module - Read Views
 *
 * Typed projections over the snapshot for callers that do not want to
 * walk decoded records. Missing or undecodable fields read as null.
 */
import type {
  DecodedRecord,
  DecodedValue,
  EnumValue,
  ScheduleSetpoint,
  TimeOfDay,
} from "../codec/index.js";
import { POWER_CHANNELS, POWER_DEVICES } from "../validator/index.js";
import type { EntityState, Snapshot } from "./schema.js";
import { isDecodedList, recordOf } from "./transform.js";

/** `GrNo` value for channels outside any group. */
export const NO_GROUP = 255;

// =============================================================================
// Field Readers
// =============================================================================

function readNumber(values: DecodedRecord, key: string): number | null {
  const value = values[key];
  return typeof value === "number" ? value : null;
}

function readBoolean(values: DecodedRecord, key: string): boolean | null {
  const value = values[key];
  return typeof value === "boolean" ? value : null;
}

function readString(values: DecodedRecord, key: string): string | null {
  const value = values[key];
  return typeof value === "string" ? value : null;
}

function isEnumValue(value: DecodedValue | undefined): value is EnumValue {
  const record = recordOf(value);
  return record?.type === "KNOWN" || record?.type === "UNKNOWN_ENUM";
}

function readEnum(values: DecodedRecord, key: string): EnumValue | null {
  const value = values[key];
  return isEnumValue(value) ? value : null;
}

function readTime(values: DecodedRecord, key: string): TimeOfDay | null {
  const record = recordOf(values[key]);
  const hours = record?.hours;
  const minutes = record?.minutes;
  return typeof hours === "number" && typeof minutes === "number"
    ? { hours, minutes }
    : null;
}

function readRecords(
  values: DecodedRecord,
  key: string,
): readonly (DecodedRecord | null)[] {
  const value = values[key];
  return isDecodedList(value) ? value.map(recordOf) : [];
}

/** Member name of a known enum value, else null. */
export function enumName(value: EnumValue | null): string | null {
  return value?.type === "KNOWN" ? value.name : null;
}

// =============================================================================
// System
// =============================================================================

export type SystemView = Readonly<{
  on: boolean | null;
  mode: EnumValue | null;
  fan: EnumValue | null;
  /** °C */
  setpoint: number | null;
  supplyTemperature: number | null;
  returnTemperature: number | null;
  controlZone: number | null;
  zoneCount: number | null;
  constantCount: number | null;
  economyLock: boolean | null;
  economyMin: number | null;
  economyMax: number | null;
  tags: readonly [string | null, string | null];
  warnings: string | null;
  acError: string | null;
  stale: boolean;
}>;

export function systemView(snapshot: Snapshot): SystemView | null {
  const state = snapshot.singletons.system;
  if (!state) return null;
  const v = state.values;
  const power = readEnum(v, "SysOn");
  return {
    on: power?.type === "KNOWN" ? power.value === 1 : null,
    mode: readEnum(v, "SysMode"),
    fan: readEnum(v, "SysFan"),
    setpoint: readNumber(v, "Setpoint"),
    supplyTemperature: readNumber(v, "Supply"),
    returnTemperature: readNumber(v, "Temp"),
    controlZone: readNumber(v, "CtrlZone"),
    zoneCount: readNumber(v, "NoOfZones"),
    constantCount: readNumber(v, "NoOfConst"),
    economyLock: readBoolean(v, "EcoLock"),
    economyMin: readNumber(v, "EcoMin"),
    economyMax: readNumber(v, "EcoMax"),
    tags: [readString(v, "Tag1"), readString(v, "Tag2")],
    warnings: readString(v, "Warnings"),
    acError: readString(v, "ACError"),
    stale: state.stale,
  };
}

export type FanSpeed = "Low" | "Med" | "High" | "Top" | "Auto";

/**
 * Fan speeds the unit offers, from `FanAutoEn` and `FanAutoType`.
 */
export function fanModes(snapshot: Snapshot): readonly FanSpeed[] {
  const v = snapshot.singletons.system?.values;
  if (!v || readBoolean(v, "FanAutoEn") !== true) {
    return ["Low", "Med", "High"];
  }
  switch (enumName(readEnum(v, "FanAutoType"))) {
    case "TwoSpeed":
      return ["Low", "High", "Auto"];
    case "FourSpeed":
      return ["Low", "Med", "High", "Top", "Auto"];
    default:
      return ["Low", "Med", "High", "Auto"];
  }
}

// =============================================================================
// Zones and Schedules
// =============================================================================

export type ZoneView = Readonly<{
  index: number;
  name: string | null;
  mode: EnumValue | null;
  zoneType: EnumValue | null;
  setpoint: number | null;
  temperature: number | null;
  minAir: number | null;
  maxAir: number | null;
  balanceMin: number | null;
  balanceMax: number | null;
  damperPosition: number | null;
  sensorFault: boolean | null;
  stale: boolean;
}>;

function toZoneView(index: number, state: EntityState): ZoneView {
  const v = state.values;
  return {
    index,
    name: readString(v, "Name"),
    mode: readEnum(v, "Mode"),
    zoneType: readEnum(v, "ZoneType"),
    setpoint: readNumber(v, "Setpoint"),
    temperature: readNumber(v, "Temp"),
    minAir: readNumber(v, "MinAir"),
    maxAir: readNumber(v, "MaxAir"),
    balanceMin: readNumber(v, "BalanceMin"),
    balanceMax: readNumber(v, "BalanceMax"),
    damperPosition: readNumber(v, "DmpPos"),
    sensorFault: readBoolean(v, "SensorFault"),
    stale: state.stale,
  };
}

export function zoneView(snapshot: Snapshot, index: number): ZoneView | null {
  const state = snapshot.zones.get(index);
  return state ? toZoneView(index, state) : null;
}

/** Cached zones in index order. */
export function zoneViews(snapshot: Snapshot): readonly ZoneView[] {
  return [...snapshot.zones]
    .sort(([a], [b]) => a - b)
    .map(([index, state]) => toZoneView(index, state));
}

export const WEEKDAYS = ["M", "Tu", "W", "Th", "F", "Sa", "Su"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type ScheduleView = Readonly<{
  index: number;
  name: string | null;
  active: boolean | null;
  start: TimeOfDay | null;
  stop: TimeOfDay | null;
  days: Readonly<Record<Weekday, boolean>>;
  zones: readonly (ScheduleSetpoint | null)[];
  stale: boolean;
}>;

function isScheduleSetpoint(
  value: DecodedValue | undefined,
): value is ScheduleSetpoint {
  const type = recordOf(value)?.type;
  return type === "OPEN" || type === "CLOSE" || type === "SETPOINT";
}

export function scheduleView(
  snapshot: Snapshot,
  index: number,
): ScheduleView | null {
  const state = snapshot.schedules.get(index);
  if (!state) return null;
  const v = state.values;
  const days = {
    M: readBoolean(v, "M") === true,
    Tu: readBoolean(v, "Tu") === true,
    W: readBoolean(v, "W") === true,
    Th: readBoolean(v, "Th") === true,
    F: readBoolean(v, "F") === true,
    Sa: readBoolean(v, "Sa") === true,
    Su: readBoolean(v, "Su") === true,
  };
  return {
    index,
    name: readString(v, "Name"),
    active: readBoolean(v, "Active"),
    start: readTime(v, "Start"),
    stop: readTime(v, "Stop"),
    days,
    zones: readRecords(v, "Zones").map((entry) => {
      const sp = entry?.Sp;
      return isScheduleSetpoint(sp) ? sp : null;
    }),
    stale: state.stale,
  };
}

// =============================================================================
// Faults
// =============================================================================

export type FaultRecord = Readonly<{
  code: string;
  day: number | null;
  year: number | null;
  hour: number | null;
  /** The bridge sends month and minute under the same key; JSON keeps the minute */
  minute: number | null;
}>;

export function faultRecords(snapshot: Snapshot): readonly FaultRecord[] {
  const v = snapshot.singletons.faults?.values;
  if (!v) return [];
  return readRecords(v, "Faults").flatMap((fault) => {
    if (!fault) return [];
    const code = readString(fault, "Code");
    if (code === null) return [];
    return [
      {
        code,
        day: readNumber(fault, "D"),
        year: readNumber(fault, "Y"),
        hour: readNumber(fault, "H"),
        minute: readNumber(fault, "M"),
      },
    ];
  });
}

/**
 * Firmware entries from the comma separated list.
 */
export function firmwareList(snapshot: Snapshot): readonly string[] {
  const v = snapshot.singletons.firmware?.values;
  const text = v ? readString(v, "Fmw") : null;
  if (!text) return [];
  return text
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

// =============================================================================
// Power
// =============================================================================

export type PowerChannelView = Readonly<{
  device: number;
  channel: number;
  name: string | null;
  enabled: boolean | null;
  group: number | null;
  generate: boolean | null;
  addToTotal: boolean | null;
  /** Signed watts from the latest status */
  watts: number | null;
}>;

export type PowerDeviceView = Readonly<{
  device: number;
  enabled: boolean | null;
  ok: boolean | null;
  battery: EnumValue | null;
  channels: readonly PowerChannelView[];
}>;

export type PowerView = Readonly<{
  enabled: boolean | null;
  voltage: number | null;
  powerFactor: number | null;
  costOfPower: number | null;
  emissions: number | null;
  lastReadingNo: number | null;
  devices: readonly PowerDeviceView[];
  stale: boolean;
}>;

/** `Generate` when present, else the inverse of the older `Consum` flag. */
function generates(channel: DecodedRecord): boolean | null {
  const generate = readBoolean(channel, "Generate");
  if (generate !== null) return generate;
  const consumes = readBoolean(channel, "Consum");
  return consumes === null ? null : !consumes;
}

export function powerView(snapshot: Snapshot): PowerView | null {
  const configState = snapshot.singletons.powerConfig;
  const statusState = snapshot.singletons.powerStatus;
  if (!configState && !statusState) return null;
  const config = configState?.values ?? {};
  const status = statusState?.values ?? {};
  const configDevices = readRecords(config, "Devices");
  const statusDevices = readRecords(status, "Dev");

  const devices: PowerDeviceView[] = [];
  for (let device = 0; device < POWER_DEVICES; device++) {
    const dc = configDevices[device] ?? null;
    const ds = statusDevices[device] ?? null;
    const configChannels = dc ? readRecords(dc, "Channels") : [];
    const statusChannels = ds ? readRecords(ds, "Ch") : [];
    const channels: PowerChannelView[] = [];
    for (let channel = 0; channel < POWER_CHANNELS; channel++) {
      const cc = configChannels[channel] ?? null;
      const cs = statusChannels[channel] ?? null;
      const group = cc ? readNumber(cc, "GrNo") : null;
      channels.push({
        device,
        channel,
        name: cc ? readString(cc, "Name") : null,
        enabled: cc ? readBoolean(cc, "Enabled") : null,
        group: group === null || group >= NO_GROUP ? null : group,
        generate: cc ? generates(cc) : null,
        addToTotal: cc ? readBoolean(cc, "AddToTotal") : null,
        watts: cs ? readNumber(cs, "Pwr") : null,
      });
    }
    devices.push({
      device,
      enabled: dc ? readBoolean(dc, "Enabled") : null,
      ok: ds ? readBoolean(ds, "Ok") : null,
      battery: ds ? readEnum(ds, "Batt") : null,
      channels,
    });
  }

  return {
    enabled: readBoolean(config, "Enabled"),
    voltage: readNumber(config, "Voltage"),
    powerFactor: readNumber(config, "PF"),
    costOfPower: readNumber(config, "CostOfPower"),
    emissions: readNumber(config, "Emissions"),
    lastReadingNo: readNumber(status, "LastReadingNo"),
    devices,
    stale: (configState?.stale ?? false) || (statusState?.stale ?? false),
  };
}

export type PowerGroupView = Readonly<{
  group: number;
  /** Name of the group's first channel */
  name: string | null;
  /** Watts of the group's first channel */
  watts: number | null;
  /** True only when every device in the group reports OK */
  ok: boolean;
  channels: readonly PowerChannelView[];
}>;

/**
 * Channels grouped by `GrNo`, in order of first appearance.
 */
export function powerGroups(snapshot: Snapshot): readonly PowerGroupView[] {
  const view = powerView(snapshot);
  if (!view) return [];
  const byGroup = new Map<number, PowerChannelView[]>();
  for (const device of view.devices) {
    for (const channel of device.channels) {
      if (channel.group === null) continue;
      const members = byGroup.get(channel.group) ?? [];
      members.push(channel);
      byGroup.set(channel.group, members);
    }
  }
  return [...byGroup].map(([group, channels]) => {
    const [first] = channels;
    const deviceIds = new Set(channels.map((channel) => channel.device));
    return {
      group,
      name: first?.name ?? null,
      watts: first?.watts ?? null,
      ok: [...deviceIds].every((id) => view.devices[id]?.ok === true),
      channels,
    };
  });
}
