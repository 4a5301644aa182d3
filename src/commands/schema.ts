/**
 * Commands Module - Schemas and Types
 *
 * Commands built from domain values (°C, booleans, enum member names),
 * before the codec turns them into wire bodies.
 */
import type {
  DomainValue,
  GasHeatTypeName,
  TimeOfDay,
  WireValue,
  ZoneModeName,
} from "../codec/index.js";

export type DomainCommand = Readonly<{
  name: string;
  value: DomainValue;
}>;

export type WireCommand = Readonly<{
  name: string;
  value: WireValue;
}>;

/**
 * Commands whose body is a single on/off flag.
 */
export const FLAG_COMMANDS = [
  "iSaveOn",
  "TemperzoneQuietMode",
  "ShowActTemps",
  "OpenDampersWhenOff",
  "CnstCtrlAreaEn",
  "HideInduct",
  "ReverseDampers",
  "ScroogeMode",
  "EconomyLock",
  "EnableiSave",
  "FanAutoEn",
  "iZoneOnOff",
  "iZoneMode",
  "iZoneFan",
  "iZoneSetpoint",
  "ExtOnOff",
  "ExtMode",
  "ExtFan",
  "ExtSetpoint",
  "AutoOff",
  "RoomTempDisp",
  "SetWiredLeds",
  "AirflowLock",
  "AirflowMinLock",
] as const;

export type FlagCommand = (typeof FLAG_COMMANDS)[number];

/**
 * Commands whose body is a single integer setting.
 */
export const SETTING_COMMANDS = [
  "StaticP",
  "CnstCtrlArea",
  "SysSleepTimer",
  "ChangeRfCh",
  "FanCapacity",
  "FanUnitCapacity",
  "FilterWarn",
  "DamperTime",
  "AutoModeDeadB",
  "NoOfZones",
  "NoOfConstants",
  "PowerEmissions",
  "PowerCostOfPower",
  "PowerFactor",
  "SystemVoltage",
] as const;

export type SettingCommand = (typeof SETTING_COMMANDS)[number];

export type ScheduleZone = Readonly<{
  mode: ZoneModeName;
  /** °C */
  setpoint: number;
}>;

export type ScheduleDays = Readonly<{
  M: boolean;
  Tu: boolean;
  W: boolean;
  Th: boolean;
  F: boolean;
  Sa: boolean;
  Su: boolean;
}>;

export type ScheduleSettings = Readonly<{
  /** null clears the time */
  start: TimeOfDay | null;
  stop: TimeOfDay | null;
  days: ScheduleDays;
}>;

export type GasHeatSettings = Readonly<{
  type: GasHeatTypeName;
  minRunTime: number;
  anticycleTime: number;
  stageOffset: number;
  stageDelay: number;
  cycleFanCool: boolean;
  cycleFanHeat: boolean;
}>;
