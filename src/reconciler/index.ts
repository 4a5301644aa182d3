/**
 * Reconciler Module - Public API
 */

// Types
export type {
  DecodedStatus,
  EntityState,
  MergeOptions,
  ReconcileEvent,
  ReconcileResult,
  SingletonEntityKind,
  Snapshot,
} from "./schema.js";
export type { StatusError } from "./errors.js";
export type {
  FanSpeed,
  FaultRecord,
  PowerChannelView,
  PowerDeviceView,
  PowerGroupView,
  PowerView,
  ScheduleView,
  SystemView,
  Weekday,
  ZoneView,
} from "./views.js";

// Constants
export { EMPTY_SNAPSHOT } from "./schema.js";
export { NO_GROUP, WEEKDAYS } from "./views.js";

// Error utilities
export { formatStatusError } from "./errors.js";

// Pure transformations
export {
  applyStatus,
  decodeStatus,
  invalidate,
  isDecodedList,
  mergeEntity,
  recordOf,
  reflectCommand,
} from "./transform.js";

// Read views
export {
  enumName,
  faultRecords,
  fanModes,
  firmwareList,
  powerGroups,
  powerView,
  scheduleView,
  systemView,
  zoneView,
  zoneViews,
} from "./views.js";
