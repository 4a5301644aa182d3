/**
 * Codec Module - Public API
 */

// Types
export type {
  DecodedRecord,
  DecodedValue,
  DomainRecord,
  DomainValue,
  EnumValue,
  FieldSpec,
  KnownEnum,
  NumericSpec,
  ObjectSpec,
  ScheduleSetpoint,
  TimeOfDay,
  TolerantDecode,
  Topology,
  UnknownEnum,
  WireRecord,
  WireValue,
} from "./schema.js";
export type { CodecError } from "./errors.js";
export type { NumericViolation } from "./transform.js";
export type {
  EnumName,
  FanAutoTypeName,
  GasHeatTypeName,
  ReturnAirSensorName,
  RoomSensorTypeName,
  SysFanName,
  SysModeName,
  TemperzoneFanTypeName,
  TemperzoneModeTypeName,
  ZoneModeName,
  ZoneTypeName,
} from "./enums.js";

// Schemas
export { FieldSpecSchema, TopologySchema } from "./schema.js";

// Enumeration tables
export {
  BatteryLevel,
  CpmBattery,
  ENUM_NAMES,
  ENUM_TABLES,
  FanAutoType,
  GasHeatType,
  OemMake,
  ReturnAirSensor,
  RfSignalLevel,
  RoomSensorType,
  SysFan,
  SysMode,
  SysOn,
  TemperzoneFanType,
  TemperzoneModeType,
  UnitBrand,
  ZoneMode,
  ZoneType,
} from "./enums.js";

// Error utilities
export {
  arrayLengthMismatch,
  decodeFailed,
  encodeFailed,
  fieldTooLong,
  formatCodecError,
} from "./errors.js";

// Pure transformations
export {
  NO_TIME_HOUR,
  NO_TIME_MINUTE,
  decode,
  decodeEnum,
  decodeTolerant,
  encode,
  enumValueOf,
  isKnownDiscriminant,
  isRecord,
  joinPath,
  numericViolation,
  parsePayload,
  serializeMessage,
  terminatedByteLength,
  toInteger,
} from "./transform.js";
