/**
 * Registry Module - Public API
 */

// Types
export type {
  CommandSchema,
  CrossFieldRule,
  EndpointKind,
  EntityKind,
  IndexedEntityKind,
  MessageSchema,
  Reflection,
  Registry,
  RegistryFile,
  RequestSchema,
  StatusSchema,
} from "./schema.js";
export type { RegistryError } from "./errors.js";

// Schemas
export {
  CrossFieldRuleSchema,
  EndpointKindSchema,
  EntityKindSchema,
  RegistryFileSchema,
} from "./schema.js";

// Error utilities
export { formatRegistryError, schemaNotFound } from "./errors.js";

// Service functions (side effects)
export { getRegistry, loadRegistry } from "./service.js";

// Pure transformations
export {
  buildRegistry,
  findStatusKey,
  idempotentCommands,
  lookup,
  lookupCommand,
  lookupRequest,
  lookupStatus,
} from "./transform.js";
