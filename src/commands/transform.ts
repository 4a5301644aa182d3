/**
 * Commands Module - Builders
 *
 * One builder per command family. Builders only shape domain values; the
 * codec converts units in `encodeCommand` and the validator checks ranges.
 *
 * @example
 * encodeCommand(registry, zoneSetpoint(3, 22.5))
 * // => ok({ name: "ZoneSetpoint", value: { Index: 3, Setpoint: 2250 } })
 */
import type { Result } from "neverthrow";

import {
  type FanAutoTypeName,
  NO_TIME_HOUR,
  NO_TIME_MINUTE,
  type ReturnAirSensorName,
  type RoomSensorTypeName,
  type SysFanName,
  type SysModeName,
  type TemperzoneFanTypeName,
  type TemperzoneModeTypeName,
  type ZoneModeName,
  type ZoneTypeName,
  encode,
} from "../codec/index.js";
import { type Registry, lookupCommand } from "../registry/index.js";
import type { CommandError } from "./errors.js";
import type {
  DomainCommand,
  FlagCommand,
  GasHeatSettings,
  ScheduleSettings,
  ScheduleZone,
  SettingCommand,
  WireCommand,
} from "./schema.js";

/** Group number for a channel in no group. */
export const UNGROUPED = 255;

// =============================================================================
// Encoding
// =============================================================================

/**
 * Convert a domain command to its wire body.
 */
export function encodeCommand(
  registry: Registry,
  command: DomainCommand,
): Result<WireCommand, CommandError> {
  return lookupCommand(registry, command.name).andThen((schema) =>
    encode(schema.body, command.value, command.name).map(
      (value): WireCommand => ({ name: command.name, value }),
    ),
  );
}

// =============================================================================
// System
// =============================================================================

export function sysOn(on: boolean): DomainCommand {
  return { name: "SysOn", value: on ? "On" : "Off" };
}

export function sysMode(mode: SysModeName): DomainCommand {
  return { name: "SysMode", value: mode };
}

export function sysFan(fan: SysFanName): DomainCommand {
  return { name: "SysFan", value: fan };
}

export function sysSetpoint(celsius: number): DomainCommand {
  return { name: "SysSetpoint", value: celsius };
}

export function economyMin(celsius: number): DomainCommand {
  return { name: "EconomyMin", value: celsius };
}

export function economyMax(celsius: number): DomainCommand {
  return { name: "EconomyMax", value: celsius };
}

export function returnAirSensor(sensor: ReturnAirSensorName): DomainCommand {
  return { name: "RASSet", value: sensor };
}

export function masterZone(index: number): DomainCommand {
  return { name: "MasterZone", value: index };
}

export function fanAutoType(type: FanAutoTypeName): DomainCommand {
  return { name: "FanAutoType", value: type };
}

export function systemTag(tag: 1 | 2, text: string): DomainCommand {
  return { name: tag === 1 ? "SysTag1" : "SysTag2", value: text };
}

export function changePassword(password: string): DomainCommand {
  return { name: "ChangePass", value: password };
}

/** Pair a new wireless sensor; the body is always 1. */
export function rfPair(): DomainCommand {
  return { name: "RfPair", value: 1 };
}

export function flag(name: FlagCommand, on: boolean): DomainCommand {
  return { name, value: on };
}

export function setting(name: SettingCommand, value: number): DomainCommand {
  return { name, value };
}

export function lockSystem(
  locked: boolean,
  code: string,
  days: number,
): DomainCommand {
  return {
    name: "LockSystem",
    value: { Lock: locked, LockCode: code, LockDays: days },
  };
}

export function temperzoneSetpoints(
  heatCelsius: number,
  coolCelsius: number,
): DomainCommand {
  return {
    name: "TemperzoneSettingsSetpoints",
    value: { HeatSetpoint: heatCelsius, CoolSetpoint: coolCelsius },
  };
}

export function temperzoneUnit(
  fanType: TemperzoneFanTypeName,
  modeType: TemperzoneModeTypeName,
): DomainCommand {
  return {
    name: "TemperzoneSettingsUnit",
    value: { FanType: fanType, ModeType: modeType },
  };
}

export function gasHeatSettings(settings: GasHeatSettings): DomainCommand {
  return {
    name: "GasHeatSettings",
    value: {
      Type: settings.type,
      MinRunTime: settings.minRunTime,
      AnticycleTime: settings.anticycleTime,
      StageOffset: settings.stageOffset,
      StageDelay: settings.stageDelay,
      CycleFanCool: settings.cycleFanCool,
      CycleFanHeat: settings.cycleFanHeat,
    },
  };
}

// =============================================================================
// Zones
// =============================================================================

export function zoneMode(index: number, mode: ZoneModeName): DomainCommand {
  return { name: "ZoneMode", value: { Index: index, Mode: mode } };
}

export function zoneSetpoint(index: number, celsius: number): DomainCommand {
  return { name: "ZoneSetpoint", value: { Index: index, Setpoint: celsius } };
}

export function zoneMaxAir(index: number, percent: number): DomainCommand {
  return { name: "ZoneMaxAir", value: { Index: index, MaxAir: percent } };
}

export function zoneMinAir(index: number, percent: number): DomainCommand {
  return { name: "ZoneMinAir", value: { Index: index, MinAir: percent } };
}

export function balanceMax(index: number, percent: number): DomainCommand {
  return { name: "BalanceMax", value: { Index: index, Max: percent } };
}

export function balanceMin(index: number, percent: number): DomainCommand {
  return { name: "BalanceMin", value: { Index: index, Min: percent } };
}

export function damperSkip(index: number, skip: boolean): DomainCommand {
  return { name: "DamperSkip", value: { Index: index, Skip: skip } };
}

export function zoneName(index: number, name: string): DomainCommand {
  return { name: "ZoneName", value: { Index: index, Name: name } };
}

export function zoneSetting(
  index: number,
  sensor: RoomSensorTypeName,
  type: ZoneTypeName,
  constantNo: number,
): DomainCommand {
  return {
    name: "ZoneSetting",
    value: { Index: index, Sensor: sensor, Zone: type, ConstNo: constantNo },
  };
}

export function sensorCalibration(index: number, offset: number): DomainCommand {
  return { name: "SensorCalib", value: { Index: index, Calibrate: offset } };
}

export function zoneBypass(index: number, bypass: boolean): DomainCommand {
  return { name: "ZoneBypass", value: { Index: index, Bypass: bypass } };
}

export function zoneArea(index: number, area: number): DomainCommand {
  return { name: "ZoneArea", value: { Index: index, Area: area } };
}

// =============================================================================
// Schedules
// =============================================================================

export function scheduleName(index: number, name: string): DomainCommand {
  return { name: "SchedName", value: { Index: index, Name: name } };
}

export function scheduleEnable(index: number, enabled: boolean): DomainCommand {
  return { name: "SchedEnable", value: { Index: index, Enabled: enabled } };
}

export function scheduleZones(
  index: number,
  zones: readonly ScheduleZone[],
): DomainCommand {
  return {
    name: "SchedZones",
    value: {
      Index: index,
      Zones: zones.map((zone) => ({ Mode: zone.mode, Setpoint: zone.setpoint })),
    },
  };
}

/**
 * Schedule times go out as separate hour and minute fields; a cleared time
 * is sent as hour 31, minute 63.
 */
export function scheduleSettings(
  index: number,
  settings: ScheduleSettings,
): DomainCommand {
  const { start, stop, days } = settings;
  return {
    name: "SchedSettings",
    value: {
      Index: index,
      StartH: start?.hours ?? NO_TIME_HOUR,
      StartM: start?.minutes ?? NO_TIME_MINUTE,
      StopH: stop?.hours ?? NO_TIME_HOUR,
      StopM: stop?.minutes ?? NO_TIME_MINUTE,
      DaysEnabled: { ...days },
    },
  };
}

// =============================================================================
// Power
// =============================================================================

export function deviceEnable(device: number, enabled: boolean): DomainCommand {
  return { name: "DeviceEnable", value: { Device: device, Enable: enabled } };
}

export function channelEnable(
  device: number,
  channel: number,
  enabled: boolean,
): DomainCommand {
  return {
    name: "ChannelEnable",
    value: { Device: device, Channel: channel, Enable: enabled },
  };
}

export function channelName(
  device: number,
  channel: number,
  name: string,
): DomainCommand {
  return {
    name: "ChannelName",
    value: { Device: device, Channel: channel, String: name },
  };
}

/**
 * @param group - null takes the channel out of every group
 */
export function channelGroup(
  device: number,
  channel: number,
  group: number | null,
): DomainCommand {
  return {
    name: "ChannelGroup",
    value: { Device: device, Channel: channel, Group: group ?? UNGROUPED },
  };
}

export function channelGenerate(
  device: number,
  channel: number,
  generate: boolean,
): DomainCommand {
  return {
    name: "ChannelGenerate",
    value: { Device: device, Channel: channel, Generate: generate },
  };
}

export function channelAddToTotal(
  device: number,
  channel: number,
  add: boolean,
): DomainCommand {
  return {
    name: "ChannelAddToTotal",
    value: { Device: device, Channel: channel, AddToTotal: add },
  };
}

export function powerTag(tag: 1 | 2, text: string): DomainCommand {
  return { name: tag === 1 ? "Tag1" : "Tag2", value: text };
}
