/**
 * Registry Module - Pure Transformations
 *
 * Builds the immutable lookup tables from a parsed registry file and
 * checks that messages refer to each other consistently.
 */
import { type Result, err, ok } from "neverthrow";

import type { FieldSpec } from "../codec/index.js";
import {
  type RegistryError,
  registryInvalid,
  schemaNotFound,
} from "./errors.js";
import type {
  CommandSchema,
  MessageSchema,
  Registry,
  RegistryFile,
  RequestSchema,
  StatusSchema,
} from "./schema.js";

// =============================================================================
// Building
// =============================================================================

function objectFields(spec: FieldSpec): ReadonlySet<string> | null {
  return spec.type === "object" ? new Set(Object.keys(spec.fields)) : null;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function statusFieldExists(
  status: StatusSchema,
  field: string,
  nestedIn: string | undefined,
): boolean {
  const top = status.body;
  if (top.type !== "object") return false;
  if (nestedIn === undefined) return Object.hasOwn(top.fields, field);
  const nested = top.fields[nestedIn];
  return nested?.type === "object" && Object.hasOwn(nested.fields, field);
}

function commandIssues(
  command: CommandSchema,
  status: ReadonlyMap<string, StatusSchema>,
): string[] {
  const issues: string[] = [];
  const bodyFields = objectFields(command.body);

  for (const field of command.target ?? []) {
    if (!bodyFields?.has(field)) {
      issues.push(`${command.name}: target field ${field} is not in the body`);
    }
  }

  const reflect = command.reflect;
  if (!reflect) return issues;

  const target = status.get(reflect.status);
  if (!target) {
    issues.push(`${command.name}: reflects into unknown status ${reflect.status}`);
    return issues;
  }
  if (target.mode === "partial" && reflect.index === undefined) {
    issues.push(`${command.name}: reflection into ${target.name} needs an index`);
  }
  if (reflect.index !== undefined && !bodyFields?.has(reflect.index)) {
    issues.push(`${command.name}: reflection index ${reflect.index} is not in the body`);
  }
  if (reflect.value !== undefined) {
    if (bodyFields) {
      issues.push(`${command.name}: scalar reflection on an object body`);
    }
    if (!statusFieldExists(target, reflect.value, reflect.object)) {
      issues.push(`${command.name}: ${target.name} has no field ${reflect.value}`);
    }
  }
  for (const [from, to] of Object.entries(reflect.fields ?? {})) {
    if (!bodyFields?.has(from)) {
      issues.push(`${command.name}: reflected field ${from} is not in the body`);
    }
    if (!statusFieldExists(target, to, reflect.object)) {
      issues.push(`${command.name}: ${target.name} has no field ${to}`);
    }
  }
  return issues;
}

/**
 * Build the lookup tables, rejecting duplicate names and dangling
 * references between messages.
 */
export function buildRegistry(
  file: RegistryFile,
): Result<Registry, RegistryError> {
  const issues: string[] = [];
  const seen = new Set<string>();
  const claim = (name: string) => {
    if (seen.has(name)) issues.push(`duplicate message name ${name}`);
    seen.add(name);
  };

  const status = new Map<string, StatusSchema>();
  const statusByKey = new Map<string, StatusSchema>();
  for (const entry of file.status) {
    claim(entry.name);
    status.set(entry.name, entry);
    const key = entry.key ?? entry.name;
    if (statusByKey.has(key)) issues.push(`duplicate status key ${key}`);
    statusByKey.set(key, entry);
    if (entry.mode === "partial") {
      const fields = objectFields(entry.body);
      if (entry.indexField === undefined || !fields?.has(entry.indexField)) {
        issues.push(`${entry.name}: partial status needs an index field`);
      }
    }
  }

  const requests = new Map<string, RequestSchema>();
  for (const entry of file.requests) {
    claim(entry.name);
    requests.set(entry.name, entry);
    for (const [type, reply] of Object.entries(entry.replies)) {
      if (!status.has(reply.status)) {
        issues.push(`${entry.name} type ${type}: unknown reply ${reply.status}`);
      }
    }
  }

  const commands = new Map<string, CommandSchema>();
  for (const entry of file.commands) {
    claim(entry.name);
    commands.set(entry.name, entry);
    issues.push(...commandIssues(entry, status));
  }

  if (issues.length > 0) {
    return err(registryInvalid(issues));
  }

  deepFreeze(file);
  return ok(
    Object.freeze({
      version: file.version,
      status,
      statusByKey,
      requests,
      commands,
    }),
  );
}

// =============================================================================
// Lookup
// =============================================================================

/**
 * Find any message by name.
 */
export function lookup(
  registry: Registry,
  name: string,
): Result<MessageSchema, RegistryError> {
  const status = registry.status.get(name);
  if (status) return ok({ kind: "status", schema: status });
  const request = registry.requests.get(name);
  if (request) return ok({ kind: "request", schema: request });
  const command = registry.commands.get(name);
  if (command) return ok({ kind: "command", schema: command });
  return err(schemaNotFound(name));
}

export function lookupCommand(
  registry: Registry,
  name: string,
): Result<CommandSchema, RegistryError> {
  const command = registry.commands.get(name);
  return command ? ok(command) : err(schemaNotFound(name, "command"));
}

export function lookupRequest(
  registry: Registry,
  name: string,
): Result<RequestSchema, RegistryError> {
  const request = registry.requests.get(name);
  return request ? ok(request) : err(schemaNotFound(name, "request"));
}

export function lookupStatus(
  registry: Registry,
  name: string,
): Result<StatusSchema, RegistryError> {
  const status = registry.status.get(name);
  return status ? ok(status) : err(schemaNotFound(name, "status"));
}

/**
 * Find the status message a payload carries.
 * A payload is an object holding device identity plus one message key.
 */
export function findStatusKey(
  registry: Registry,
  payload: Readonly<Record<string, unknown>>,
): StatusSchema | null {
  for (const key of Object.keys(payload)) {
    const status = registry.statusByKey.get(key);
    if (status) return status;
  }
  return null;
}

/**
 * Names of commands registered as safe to resend.
 */
export function idempotentCommands(registry: Registry): readonly string[] {
  return [...registry.commands.values()]
    .filter((command) => command.idempotent)
    .map((command) => command.name);
}
