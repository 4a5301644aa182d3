/**
 * Session Module - Service Layer
 *
 * One session per controller connection. It owns the snapshot and the
 * correlator; every snapshot update happens synchronously inside a
 * transport callback or a caller's call, so no two merges interleave.
 */
import { type Result, err, ok } from "neverthrow";

import { parsePayload, serializeMessage } from "../codec/index.js";
import { type DomainCommand, encodeCommand } from "../commands/index.js";
import { getEndpointConfig } from "../config.js";
import {
  type CorrelatorError,
  type CorrelatorRequest,
  type PendingRequest,
  type RequestHandle,
  createCorrelator,
} from "../correlator/index.js";
import { createLogger } from "../logger.js";
import {
  EMPTY_SNAPSHOT,
  type ReconcileEvent,
  type Snapshot,
  type StatusError,
  applyStatus,
  decodeStatus,
  formatStatusError,
  reflectCommand,
  systemView,
} from "../reconciler/index.js";
import {
  type EndpointKind,
  type Registry,
  type RegistryError,
  getRegistry,
  idempotentCommands,
} from "../registry/index.js";
import {
  type ValidatedCommand,
  type ValidatedRequest,
  type ValidationContext,
  validateCommand,
  validateRequest,
} from "../validator/index.js";
import { type SessionError, formatSessionError, unexpectedReply } from "./errors.js";
import type {
  CommandAck,
  RefreshOptions,
  SessionHandle,
  SessionOptions,
  StatusReply,
} from "./schema.js";
import {
  STATUS_REQUESTS,
  type StatusRequest,
  projectWrites,
  validationContextOf,
} from "./transform.js";

const log = createLogger("session");

// =============================================================================
// Types
// =============================================================================

type StatusResult = Promise<Result<StatusReply, SessionError>>;

export type Session = Readonly<{
  /** Current acknowledged state */
  snapshot: () => Snapshot;
  /** Acknowledged state plus pending writes, as new commands see it */
  validationContext: () => ValidationContext;

  /** Encode a domain command and send it */
  command: (command: DomainCommand) => SessionHandle<CommandAck>;
  /** Validate a wire-unit command body and send it */
  send: (name: string, candidate: unknown) => SessionHandle<CommandAck>;
  /** Validate a status request and send it; the reply is merged before the result resolves */
  request: (name: string, candidate: unknown) => SessionHandle<StatusReply>;

  fetchSystem: () => StatusResult;
  fetchZone: (index: number) => StatusResult;
  fetchSchedule: (index: number) => StatusResult;
  fetchFaults: () => StatusResult;
  fetchTemperzone: () => StatusResult;
  fetchFirmware: () => StatusResult;
  fetchPowerConfig: () => StatusResult;
  fetchPowerStatus: () => StatusResult;
  /** System, every zone, then schedules, faults and power; stops at the first error */
  refreshAll: (
    options?: RefreshOptions,
  ) => Promise<Result<readonly StatusReply[], SessionError>>;

  /** Merge a status body that arrived outside any request */
  receive: (body: string) => Result<readonly ReconcileEvent[], StatusError>;

  enableCommandRetry: (name: string) => Result<void, CorrelatorError>;
  idempotentCommands: () => readonly string[];
  pending: () => readonly PendingRequest[];
  close: () => void;
}>;

type TrackedWrite = {
  readonly command: ValidatedCommand;
  events: readonly ReconcileEvent[];
};

type TrackedRead = {
  readonly request: ValidatedRequest;
  outcome: Result<readonly ReconcileEvent[], SessionError> | null;
};

function rejected<T>(error: SessionError): SessionHandle<T> {
  return {
    requestId: null,
    result: Promise.resolve(err(error)),
    cancel: () => undefined,
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Open a session over a transport.
 *
 * @example
 * const session = createSession({ transport });
 * if (session.isOk()) {
 *   await session.value.fetchSystem();
 *   await session.value.command(zoneSetpoint(3, 22.5)).result;
 * }
 */
export function createSession(
  options: SessionOptions,
): Result<Session, RegistryError> {
  const loaded: Result<Registry, RegistryError> = options.registry
    ? ok(options.registry)
    : getRegistry();
  if (loaded.isErr()) return err(loaded.error);
  const registry = loaded.value;

  const endpoints: Record<EndpointKind, string> = {
    ...getEndpointConfig(),
    ...options.endpoints,
  };
  const handlers = options.handlers ?? {};

  let current: Snapshot = EMPTY_SNAPSHOT;
  let seq = 0;
  const writes = new Map<CorrelatorRequest, TrackedWrite>();
  const reads = new Map<CorrelatorRequest, TrackedRead>();

  // ---------------------------------------------------------------------------
  // Snapshot updates
  // ---------------------------------------------------------------------------

  function notify(event: ReconcileEvent): void {
    switch (event.type) {
      case "ENTITY_CHANGED":
      case "ENTITY_REMOVED":
        log.debug(event, `${event.type}: ${event.entity}`);
        handlers.onChange?.(event, current);
        return;
      case "DEVICE_IDENTITY_CHANGED":
        log.warn(
          { previousUid: event.previousUid, currentUid: event.currentUid },
          "Device identity changed; cached state marked stale",
        );
        handlers.onIdentityChanged?.(event, current);
        return;
      case "PARTIAL_DECODE_FAILURE":
        log.warn(
          { status: event.status, failures: event.failures },
          `Partial decode failure in ${event.status}`,
        );
        handlers.onDecodeFailure?.(event);
        return;
    }
  }

  function publish(events: readonly ReconcileEvent[]): void {
    for (const event of events) {
      try {
        notify(event);
      } catch (error) {
        log.error({ error, event: event.type }, "Session observer threw");
      }
    }
  }

  function commit(next: Snapshot, events: readonly ReconcileEvent[]): void {
    current = next;
    publish(events);
  }

  /**
   * Decode and merge one status body. `requestIndex` addresses array-form
   * payloads that omit their own index.
   */
  function merge(
    body: string,
    requestIndex: number | null,
  ): Result<{ status: string; events: readonly ReconcileEvent[] }, StatusError> {
    return parsePayload(body)
      .andThen((payload) => decodeStatus(registry, payload))
      .map((status) => {
        seq += 1;
        const result = applyStatus(current, status, seq, { requestIndex });
        commit(result.snapshot, result.events);
        return { status: status.schema.name, events: result.events };
      });
  }

  function receive(body: string): Result<readonly ReconcileEvent[], StatusError> {
    const merged = merge(body, null);
    if (merged.isErr()) {
      log.warn({ error: merged.error }, formatStatusError(merged.error));
      return err(merged.error);
    }
    return ok(merged.value.events);
  }

  // ---------------------------------------------------------------------------
  // Settlement
  // ---------------------------------------------------------------------------

  function settleWrite(request: CorrelatorRequest, succeeded: boolean): void {
    const tracked = writes.get(request);
    if (!tracked) return;
    writes.delete(request);
    if (!succeeded) return;
    seq += 1;
    const result = reflectCommand(registry, current, tracked.command, seq);
    tracked.events = result.events;
    commit(result.snapshot, result.events);
  }

  function settleRead(request: CorrelatorRequest, body: string | null): void {
    const tracked = reads.get(request);
    if (!tracked) return;
    reads.delete(request);
    if (body === null) return;

    const expected = tracked.request.replyStatus;
    const merged = merge(body, tracked.request.index);
    if (merged.isErr()) {
      log.warn({ error: merged.error, expected }, formatStatusError(merged.error));
      tracked.outcome = err(merged.error);
      return;
    }
    if (merged.value.status !== expected) {
      log.warn(
        { expected, received: merged.value.status },
        "Reply carried a different status than requested",
      );
      tracked.outcome = err(unexpectedReply(expected, merged.value.status));
      return;
    }
    tracked.outcome = ok(merged.value.events);
  }

  const correlator = createCorrelator({
    transport: options.transport,
    config: options.config,
    idempotentCommands: idempotentCommands(registry),
    onUnsolicited: (body) => {
      // Failures are logged by receive
      receive(body);
    },
    onSettled: (request, _requestId, result) => {
      if (request.kind === "write") {
        settleWrite(request, result.isOk());
      } else {
        settleRead(request, result.isOk() ? result.value.body : null);
      }
    },
  });

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Limits a new command is checked against: acknowledged state with every
   * queued or in-flight write applied on top.
   */
  function validationContext(): ValidationContext {
    const pending = [...writes.values()].map((tracked) => tracked.command);
    return validationContextOf(projectWrites(registry, current, pending, seq));
  }

  function send(name: string, candidate: unknown): SessionHandle<CommandAck> {
    const validated = validateCommand(registry, name, candidate, validationContext());
    if (validated.isErr()) {
      log.debug({ name, error: validated.error }, formatSessionError(validated.error));
      return rejected(validated.error);
    }
    const command = validated.value;
    const request: CorrelatorRequest = {
      kind: "write",
      name,
      endpoint: endpoints[command.endpoint],
      body: serializeMessage(name, command.value),
      targetKey: command.targetKey,
    };
    const tracked: TrackedWrite = { command, events: [] };
    writes.set(request, tracked);

    const handle: RequestHandle = correlator.send(request);
    return {
      requestId: handle.requestId,
      cancel: handle.cancel,
      result: handle.result.then((result) =>
        result
          .mapErr((error): SessionError => error)
          .map(
            (reply): CommandAck => ({
              name,
              targetKey: command.targetKey,
              attempts: reply.attempts,
              events: tracked.events,
            }),
          ),
      ),
    };
  }

  function command(domain: DomainCommand): SessionHandle<CommandAck> {
    const encoded = encodeCommand(registry, domain);
    if (encoded.isErr()) {
      log.debug({ name: domain.name, error: encoded.error }, formatSessionError(encoded.error));
      return rejected(encoded.error);
    }
    return send(encoded.value.name, encoded.value.value);
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  function request(name: string, candidate: unknown): SessionHandle<StatusReply> {
    const validated = validateRequest(registry, name, candidate, validationContext());
    if (validated.isErr()) {
      log.debug({ name, error: validated.error }, formatSessionError(validated.error));
      return rejected(validated.error);
    }
    const statusRequest = validated.value;
    const outgoing: CorrelatorRequest = {
      kind: "read",
      name,
      endpoint: endpoints[statusRequest.endpoint],
      body: serializeMessage(name, statusRequest.value),
    };
    const tracked: TrackedRead = { request: statusRequest, outcome: null };
    reads.set(outgoing, tracked);

    const handle = correlator.send(outgoing);
    return {
      requestId: handle.requestId,
      cancel: handle.cancel,
      result: handle.result.then((result) =>
        result
          .mapErr((error): SessionError => error)
          .andThen((reply) => {
            const outcome: Result<readonly ReconcileEvent[], SessionError> =
              tracked.outcome ?? err(unexpectedReply(statusRequest.replyStatus, null));
            return outcome.map(
              (events): StatusReply => ({
                status: statusRequest.replyStatus,
                index: statusRequest.index,
                attempts: reply.attempts,
                events,
              }),
            );
          }),
      ),
    };
  }

  const fetchStatus = (status: StatusRequest): StatusResult =>
    request(status.name, status.body).result;

  async function refreshAll(
    refresh: RefreshOptions = {},
  ): Promise<Result<readonly StatusReply[], SessionError>> {
    const replies: StatusReply[] = [];
    const run = async (status: StatusRequest): Promise<SessionError | null> => {
      const result = await fetchStatus(status);
      if (result.isErr()) return result.error;
      replies.push(result.value);
      return null;
    };

    const system = await run(STATUS_REQUESTS.system());
    if (system) return err(system);

    const zoneCount = systemView(current)?.zoneCount ?? 0;
    const plan: StatusRequest[] = [];
    for (let index = 0; index < zoneCount; index++) {
      plan.push(STATUS_REQUESTS.zone(index));
    }
    for (let index = 0; index < (refresh.schedules ?? 0); index++) {
      plan.push(STATUS_REQUESTS.schedule(index));
    }
    plan.push(STATUS_REQUESTS.faults());
    if (refresh.power ?? true) {
      plan.push(STATUS_REQUESTS.powerConfig(), STATUS_REQUESTS.powerStatus());
    }

    for (const status of plan) {
      const failure = await run(status);
      if (failure) return err(failure);
    }
    log.info({ replies: replies.length }, "Session refreshed");
    return ok(replies);
  }

  function close(): void {
    correlator.close();
    writes.clear();
    reads.clear();
    log.info({ deviceUid: current.deviceUid }, "Session closed");
  }

  log.info({ endpoints }, "Session opened");

  return ok({
    snapshot: () => current,
    validationContext,
    command,
    send,
    request,
    fetchSystem: () => fetchStatus(STATUS_REQUESTS.system()),
    fetchZone: (index) => fetchStatus(STATUS_REQUESTS.zone(index)),
    fetchSchedule: (index) => fetchStatus(STATUS_REQUESTS.schedule(index)),
    fetchFaults: () => fetchStatus(STATUS_REQUESTS.faults()),
    fetchTemperzone: () => fetchStatus(STATUS_REQUESTS.temperzone()),
    fetchFirmware: () => fetchStatus(STATUS_REQUESTS.firmware()),
    fetchPowerConfig: () => fetchStatus(STATUS_REQUESTS.powerConfig()),
    fetchPowerStatus: () => fetchStatus(STATUS_REQUESTS.powerStatus()),
    refreshAll,
    receive,
    enableCommandRetry: correlator.enableCommandRetry,
    idempotentCommands: correlator.idempotentCommands,
    pending: correlator.pending,
    close,
  });
}
