/**
 * Validator Module - Service Layer
 *
 * Entry points bound to the shared registry.
 */
import { type Result, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type Registry,
  type RegistryError,
  getRegistry,
} from "../registry/index.js";
import { type ValidationError, formatValidationError } from "./errors.js";
import type {
  ValidatedCommand,
  ValidatedRequest,
  ValidationContext,
} from "./schema.js";
import { validateCommand, validateRequest } from "./transform.js";

const log = createLogger("validator");

function resolveRegistry(
  registry: Registry | undefined,
): Result<Registry, RegistryError> {
  return registry ? ok(registry) : getRegistry();
}

function logRejection<T>(
  name: string,
  result: Result<T, ValidationError>,
): Result<T, ValidationError> {
  if (result.isErr()) {
    log.debug({ name, error: result.error }, formatValidationError(result.error));
  }
  return result;
}

/**
 * Validate a command candidate before it is sent.
 *
 * @param name - Command name, e.g. "ZoneSetpoint"
 * @param candidate - Wire-unit body, e.g. `{ Index: 3, Setpoint: 2200 }`
 * @param context - Topology and acknowledged limits from the session snapshot
 * @param registry - Defaults to the bundled registry
 */
export function validate(
  name: string,
  candidate: unknown,
  context: ValidationContext = {},
  registry?: Registry,
): Result<ValidatedCommand, ValidationError> {
  return logRejection(
    name,
    resolveRegistry(registry).andThen((loaded) =>
      validateCommand(loaded, name, candidate, context),
    ),
  );
}

/**
 * Validate a status request, e.g. `("iZoneV2Request", { Type: 2, No: 3, No1: 0 })`.
 */
export function validateStatusRequest(
  name: string,
  candidate: unknown,
  context: ValidationContext = {},
  registry?: Registry,
): Result<ValidatedRequest, ValidationError> {
  return logRejection(
    name,
    resolveRegistry(registry).andThen((loaded) =>
      validateRequest(loaded, name, candidate, context),
    ),
  );
}
