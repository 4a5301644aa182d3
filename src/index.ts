/**
 * iZone Protocol Engine - Public API
 *
 * Client-side protocol engine for iZone HVAC controllers and power
 * monitors behind an iZone bridge:
 * - Field codec and message registry
 * - Command validation and typed command builders
 * - Session snapshot reconciliation
 * - Request/response correlation over a caller-supplied transport
 *
 * @example
 * import { createSession, zoneSetpoint } from "izone-protocol-engine";
 *
 * const session = createSession({ transport })._unsafeUnwrap();
 * await session.refreshAll();
 * const ack = await session.command(zoneSetpoint(3, 22.5)).result;
 */

export * from "./codec/index.js";
export * from "./registry/index.js";
export * from "./validator/index.js";
export * from "./reconciler/index.js";
export * from "./correlator/index.js";
export * from "./commands/index.js";
export * from "./session/index.js";
