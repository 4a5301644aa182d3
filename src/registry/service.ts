/**
 * Registry Module - Service Layer
 *
 * Loads `schemas/messages.json` once and shares the result read-only.
 */
import { readFileSync } from "node:fs";
import { type Result, err } from "neverthrow";

import { parsePayload } from "../codec/index.js";
import { createLogger } from "../logger.js";
import {
  type RegistryError,
  formatRegistryError,
  registryInvalid,
  registryUnreadable,
} from "./errors.js";
import { type Registry, RegistryFileSchema } from "./schema.js";
import { buildRegistry } from "./transform.js";

const log = createLogger("registry");

const DEFAULT_REGISTRY_URL = new URL(
  "../../schemas/messages.json",
  import.meta.url,
);

// =============================================================================
// Module State
// =============================================================================

let shared: Result<Registry, RegistryError> | null = null;

// =============================================================================
// Loading
// =============================================================================

/**
 * Read, validate and build a registry from a JSON file.
 *
 * @param source - File URL or path; defaults to the bundled message table
 */
export function loadRegistry(
  source: URL | string = DEFAULT_REGISTRY_URL,
): Result<Registry, RegistryError> {
  let text: string;
  try {
    text = readFileSync(source, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    return err(registryUnreadable(`cannot read ${String(source)}`, cause));
  }

  const result: Result<Registry, RegistryError> = parsePayload(text)
    .mapErr((error) => registryUnreadable(`${String(source)}: ${error.type}`))
    .andThen((raw) => {
      const parsed = RegistryFileSchema.safeParse(raw);
      if (!parsed.success) {
        return err(
          registryInvalid(
            parsed.error.issues.map(
              (issue) => `${issue.path.join(".")}: ${issue.message}`,
            ),
          ),
        );
      }
      return buildRegistry(parsed.data);
    });

  result.match(
    (registry) =>
      log.debug(
        {
          status: registry.status.size,
          requests: registry.requests.size,
          commands: registry.commands.size,
        },
        "Registry loaded",
      ),
    (error) => log.error({ error }, formatRegistryError(error)),
  );

  return result;
}

/**
 * The bundled registry, loaded on first use and shared by every session.
 */
export function getRegistry(): Result<Registry, RegistryError> {
  if (!shared) {
    shared = loadRegistry();
  }
  return shared;
}
