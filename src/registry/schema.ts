/**
 * Registry Module - Schemas and Types
 *
 * Shape of `schemas/messages.json`: every status, request and command the
 * bridge understands. Schemas are the source of truth - types derived with
 * z.infer<>.
 */
import { z } from "zod";

import { FieldSpecSchema } from "../codec/index.js";

// =============================================================================
// Shared Enumerations
// =============================================================================

export const EndpointKindSchema = z.enum([
  "izoneCommand",
  "izoneRequest",
  "powerCommand",
  "powerRequest",
]);

export type EndpointKind = z.infer<typeof EndpointKindSchema>;

export const EntityKindSchema = z.enum([
  "system",
  "zone",
  "schedule",
  "faults",
  "temperzone",
  "firmware",
  "powerConfig",
  "powerStatus",
]);

export type EntityKind = z.infer<typeof EntityKindSchema>;

/** Entities addressed by an index (zone number, schedule number). */
export type IndexedEntityKind = Extract<EntityKind, "zone" | "schedule">;

/**
 * Cross-field rules a command can name. Implemented by the validator.
 */
export const CrossFieldRuleSchema = z.enum([
  "balanceMaxAboveMin",
  "balanceMinBelowMax",
  "maxAirAboveMinAir",
  "minAirBelowMaxAir",
  "ecoMaxNotBelowMin",
  "ecoMinNotAboveMax",
  "withinEconomyLock",
  "zoneTypeAllowsSetpoint",
  "zoneTypeAllowsMode",
  "constantsWithinZones",
  "scheduleTimeSentinels",
]);

export type CrossFieldRule = z.infer<typeof CrossFieldRuleSchema>;

// =============================================================================
// Message Schemas
// =============================================================================

export const StatusSchemaSchema = z
  .object({
    name: z.string().min(1),
    key: z.string().min(1).optional().describe("Wire key when it differs from name"),
    entity: EntityKindSchema,
    mode: z.enum(["full", "partial"]),
    indexField: z.string().optional(),
    dedupeField: z.string().optional(),
    body: FieldSpecSchema,
  })
  .strict();

export type StatusSchema = z.infer<typeof StatusSchemaSchema>;

export const ReplyMappingSchema = z
  .object({
    status: z.string().min(1),
    indexed: z.boolean().default(false),
  })
  .strict();

export const RequestSchemaSchema = z
  .object({
    name: z.string().min(1),
    endpoint: EndpointKindSchema,
    body: FieldSpecSchema,
    replies: z.record(z.string().regex(/^\d+$/), ReplyMappingSchema),
  })
  .strict();

export type RequestSchema = z.infer<typeof RequestSchemaSchema>;

/**
 * How an acknowledged command is merged back into cached status.
 * Scalar commands name the status field in `value`; object commands map
 * their own fields onto status fields, optionally inside a nested object.
 */
export const ReflectionSchema = z
  .object({
    status: z.string().min(1),
    value: z.string().optional(),
    index: z.string().optional(),
    object: z.string().optional(),
    fields: z.record(z.string()).optional(),
  })
  .strict();

export type Reflection = z.infer<typeof ReflectionSchema>;

export const CommandSchemaSchema = z
  .object({
    name: z.string().min(1),
    endpoint: EndpointKindSchema,
    idempotent: z.boolean(),
    body: FieldSpecSchema,
    target: z.array(z.string()).nonempty().optional(),
    /** Write queue shared with the commands this one is checked against */
    queue: z.string().min(1).optional(),
    rules: z.array(CrossFieldRuleSchema).default([]),
    reflect: ReflectionSchema.optional(),
  })
  .strict();

export type CommandSchema = z.infer<typeof CommandSchemaSchema>;

export const RegistryFileSchema = z
  .object({
    version: z.literal(1),
    status: z.array(StatusSchemaSchema),
    requests: z.array(RequestSchemaSchema),
    commands: z.array(CommandSchemaSchema),
  })
  .strict();

export type RegistryFile = z.infer<typeof RegistryFileSchema>;

// =============================================================================
// Built Registry
// =============================================================================

export type MessageSchema =
  | Readonly<{ kind: "status"; schema: StatusSchema }>
  | Readonly<{ kind: "request"; schema: RequestSchema }>
  | Readonly<{ kind: "command"; schema: CommandSchema }>;

/**
 * Immutable lookup tables, shared by every session.
 */
export type Registry = Readonly<{
  version: number;
  status: ReadonlyMap<string, StatusSchema>;
  statusByKey: ReadonlyMap<string, StatusSchema>;
  requests: ReadonlyMap<string, RequestSchema>;
  commands: ReadonlyMap<string, CommandSchema>;
}>;
