/**
 * Codec Module - Enumeration Tables
 *
 * Closed discriminant tables for every enumerated wire field. Values are
 * the exact integers the bridge sends and accepts.
 */

export const SysOn = { Off: 0, On: 1 } as const;

export const SysMode = { Cool: 1, Heat: 2, Vent: 3, Dry: 4, Auto: 5 } as const;

export const SysFan = {
  Low: 1,
  Med: 2,
  High: 3,
  Auto: 4,
  Top: 5,
  NonGasHeat: 99,
} as const;

export const ReturnAirSensor = { Ras: 1, Master: 2, Zones: 3 } as const;

export const UnitBrand = {
  PanasonicToshiba: 1,
  Daikin: 2,
  MitsubishiElectric: 3,
  Lg301: 4,
  Lg310: 5,
  Fujitsu: 6,
  Samsung: 7,
  Temperzone: 8,
  MitsubishiHeavyIndustries: 9,
  GasHeatAddOnCool: 10,
  Generic: 11,
  Unknown: 12,
  Hitachi: 13,
  AaGenIii: 14,
  FujitsuIntesis: 15,
  Lg485: 16,
  YorkAc: 17,
  HaierAc: 18,
} as const;

export const GasHeatType = {
  HeatOnly1SpeedFan: 0,
  CoolOnly1SpeedFan: 1,
  OneHeatOneCool1SpeedFan: 2,
  TwoHeatOneCool1SpeedFan: 3,
  OneHeatPump1SpeedFan: 4,
  OneHeatPump3SpeedFan: 5,
  OneHeatPumpOneHeat1SpeedFan: 6,
  TwoHeatPumpOneHeat1SpeedFan: 7,
  OneGasHeat: 8,
  TwoGasHeatTwoCool1SpeedFan: 9,
  RemoteOnOff: 10,
  AaGenIii: 11,
} as const;

export const FanAutoType = {
  TwoSpeed: 0,
  ThreeSpeed: 1,
  VariableSpeed: 2,
  FourSpeed: 3,
} as const;

export const TemperzoneModeType = {
  NoExpansion: 0,
  SingleExpansion: 1,
  SeriesExpansion: 2,
  DryMode: 3,
} as const;

export const TemperzoneFanType = { VariableSpeed: 0, ThreeSpeed: 1 } as const;

export const OemMake = { Airstream: 0, Metalflex: 1, Westaflex: 2 } as const;

export const ZoneType = { OpenClose: 1, Constant: 2, Auto: 3 } as const;

export const ZoneMode = {
  Open: 1,
  Close: 2,
  Auto: 3,
  Override: 4,
  Constant: 5,
} as const;

export const RfSignalLevel = { Full: 0, Half: 1, Quarter: 2, None: 3 } as const;

export const BatteryLevel = { Full: 0, Half: 1, Empty: 2 } as const;

export const RoomSensorType = {
  Ccts: 0,
  Csm: 1,
  Czco: 2,
  Crfs: 3,
  Cs: 4,
  NoSensor: 255,
} as const;

export const CpmBattery = { Critical: 0, Low: 1, Normal: 2, Full: 3 } as const;

// =============================================================================
// Lookup
// =============================================================================

export const ENUM_NAMES = [
  "SysOn",
  "SysMode",
  "SysFan",
  "ReturnAirSensor",
  "UnitBrand",
  "GasHeatType",
  "FanAutoType",
  "TemperzoneModeType",
  "TemperzoneFanType",
  "OemMake",
  "ZoneType",
  "ZoneMode",
  "RfSignalLevel",
  "BatteryLevel",
  "RoomSensorType",
  "CpmBattery",
] as const;

export type EnumName = (typeof ENUM_NAMES)[number];

export const ENUM_TABLES: { readonly [K in EnumName]: Readonly<Record<string, number>> } = {
  SysOn,
  SysMode,
  SysFan,
  ReturnAirSensor,
  UnitBrand,
  GasHeatType,
  FanAutoType,
  TemperzoneModeType,
  TemperzoneFanType,
  OemMake,
  ZoneType,
  ZoneMode,
  RfSignalLevel,
  BatteryLevel,
  RoomSensorType,
  CpmBattery,
};

export type SysModeName = keyof typeof SysMode;
export type SysFanName = keyof typeof SysFan;
export type ZoneModeName = keyof typeof ZoneMode;
export type ReturnAirSensorName = keyof typeof ReturnAirSensor;
export type FanAutoTypeName = keyof typeof FanAutoType;
export type GasHeatTypeName = keyof typeof GasHeatType;
export type TemperzoneFanTypeName = keyof typeof TemperzoneFanType;
export type TemperzoneModeTypeName = keyof typeof TemperzoneModeType;
export type RoomSensorTypeName = keyof typeof RoomSensorType;
export type ZoneTypeName = keyof typeof ZoneType;
