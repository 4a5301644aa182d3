/**
 * Commands Module - Public API
 */

// Types
export type {
  DomainCommand,
  FlagCommand,
  GasHeatSettings,
  ScheduleDays,
  ScheduleSettings,
  ScheduleZone,
  SettingCommand,
  WireCommand,
} from "./schema.js";
export type { CommandError } from "./errors.js";

// Constants
export { FLAG_COMMANDS, SETTING_COMMANDS } from "./schema.js";
export { UNGROUPED } from "./transform.js";

// Error utilities
export { formatCommandError } from "./errors.js";

// Builders
export {
  balanceMax,
  balanceMin,
  changePassword,
  channelAddToTotal,
  channelEnable,
  channelGenerate,
  channelGroup,
  channelName,
  damperSkip,
  deviceEnable,
  economyMax,
  economyMin,
  encodeCommand,
  fanAutoType,
  flag,
  gasHeatSettings,
  lockSystem,
  masterZone,
  powerTag,
  returnAirSensor,
  rfPair,
  scheduleEnable,
  scheduleName,
  scheduleSettings,
  scheduleZones,
  sensorCalibration,
  setting,
  sysFan,
  sysMode,
  sysOn,
  sysSetpoint,
  systemTag,
  temperzoneSetpoints,
  temperzoneUnit,
  zoneArea,
  zoneBypass,
  zoneMaxAir,
  zoneMinAir,
  zoneMode,
  zoneName,
  zoneSetpoint,
  zoneSetting,
} from "./transform.js";
