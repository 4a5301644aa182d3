/**
 * Correlator Module - Service Layer
 *
 * Tracks every outstanding request of one session: matches replies to
 * frames, times out attempts, retries reads with backoff and keeps at most
 * one write in flight per target. All bookkeeping runs synchronously inside
 * transport and timer callbacks.
 */
import { type Result, err, ok } from "neverthrow";

import { getCorrelatorConfig } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type CorrelatorError,
  formatCorrelatorError,
  requestCancelled,
  requestTimeout,
  retryNotAllowed,
  sessionClosed,
  transportFailure,
} from "./errors.js";
import {
  type CorrelatorConfig,
  type CorrelatorRequest,
  IncomingFrameSchema,
  type PendingRequest,
  type Reply,
  type RequestState,
  type Transport,
} from "./schema.js";
import { backoffDelay, mayRetry } from "./transform.js";

const log = createLogger("correlator");

// =============================================================================
// Types
// =============================================================================

export type RequestResult = Result<Reply, CorrelatorError>;

export type RequestHandle = Readonly<{
  requestId: number;
  result: Promise<RequestResult>;
  /** Detach the caller; a write already sent keeps its slot until it settles */
  cancel: () => void;
}>;

export type CorrelatorOptions = Readonly<{
  transport: Transport;
  config?: Partial<CorrelatorConfig>;
  /** Commands registered as safe to resend */
  idempotentCommands?: readonly string[];
  /** Status bodies not matched to any outstanding frame */
  onUnsolicited?: (body: string) => void;
  /** Runs once per request as it settles, before its caller resumes; also for detached callers */
  onSettled?: (
    request: CorrelatorRequest,
    requestId: number,
    result: RequestResult,
  ) => void;
}>;

export type Correlator = Readonly<{
  send: (request: CorrelatorRequest) => RequestHandle;
  enableCommandRetry: (name: string) => Result<void, CorrelatorError>;
  idempotentCommands: () => readonly string[];
  pending: () => readonly PendingRequest[];
  close: () => void;
}>;

type Entry = {
  readonly requestId: number;
  readonly request: CorrelatorRequest;
  readonly issuedAt: number;
  readonly resolveCaller: (result: RequestResult) => void;
  state: RequestState;
  attempts: number;
  frameId: number | null;
  deadline: number | null;
  timer: ReturnType<typeof setTimeout> | null;
  detached: boolean;
  callerResolved: boolean;
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the correlator for one session and subscribe it to the transport.
 */
export function createCorrelator(options: CorrelatorOptions): Correlator {
  const config: CorrelatorConfig = {
    ...getCorrelatorConfig(),
    ...options.config,
  };
  const registeredIdempotent = new Set(options.idempotentCommands ?? []);
  const retryEnabled = new Set<string>();

  const entries = new Map<number, Entry>();
  const byFrame = new Map<number, Entry>();
  const writeQueues = new Map<string, Entry[]>();

  let nextRequestId = 1;
  let nextFrameId = 1;
  let closed = false;

  // ---------------------------------------------------------------------------
  // Caller notification
  // ---------------------------------------------------------------------------

  function resolveCaller(entry: Entry, result: RequestResult): void {
    if (entry.callerResolved) return;
    entry.callerResolved = true;
    entry.resolveCaller(result);
  }

  function clearTimer(entry: Entry): void {
    if (entry.timer !== null) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  function dispatch(entry: Entry): void {
    const frameId = nextFrameId++;
    const { request } = entry;
    entry.attempts += 1;
    entry.frameId = frameId;
    entry.state = "AWAITING_REPLY";
    entry.deadline = Date.now() + config.timeoutMs;
    byFrame.set(frameId, entry);
    entry.timer = setTimeout(() => {
      attemptFailed(entry, frameId, null);
    }, config.timeoutMs);

    log.debug(
      {
        requestId: entry.requestId,
        frameId,
        endpoint: request.endpoint,
        attempt: entry.attempts,
      },
      `Frame sent: ${request.name}`,
    );

    void options.transport
      .sendFrame({ frameId, endpoint: request.endpoint, body: request.body })
      .catch((error: unknown) => {
        attemptFailed(
          entry,
          frameId,
          error instanceof Error ? error.message : String(error),
        );
      });
  }

  /**
   * An attempt timed out (`failure` null) or failed. Retries when allowed,
   * otherwise settles the request.
   */
  function attemptFailed(
    entry: Entry,
    frameId: number,
    failure: string | null,
  ): void {
    if (entry.frameId !== frameId || byFrame.get(frameId) !== entry) return;
    clearTimer(entry);
    byFrame.delete(frameId);
    entry.frameId = null;
    entry.deadline = null;

    const { request } = entry;
    if (
      !entry.detached &&
      mayRetry(config, request, entry.attempts, retryEnabled)
    ) {
      const delayMs = backoffDelay(config, entry.attempts);
      entry.state = "ISSUED";
      log.debug(
        { requestId: entry.requestId, attempt: entry.attempts, delayMs, failure },
        `Retrying ${request.name}`,
      );
      entry.timer = setTimeout(() => {
        entry.timer = null;
        dispatch(entry);
      }, delayMs);
      return;
    }

    if (failure === null) {
      settle(
        entry,
        "TIMED_OUT",
        err(requestTimeout(request.name, entry.attempts, request.kind === "write")),
      );
    } else {
      settle(
        entry,
        "FAILED",
        err(transportFailure(request.name, failure, entry.attempts)),
      );
    }
  }

  function settle(entry: Entry, state: RequestState, result: RequestResult): void {
    clearTimer(entry);
    if (entry.frameId !== null) byFrame.delete(entry.frameId);
    entry.frameId = null;
    entry.deadline = null;
    entry.state = state;
    entries.delete(entry.requestId);

    const { request } = entry;
    result.match(
      () =>
        request.kind === "write"
          ? logOperationComplete(log, request.name, entry.issuedAt, {
              requestId: entry.requestId,
              attempts: entry.attempts,
            })
          : log.debug(
              { requestId: entry.requestId, attempts: entry.attempts },
              `Reply received: ${request.name}`,
            ),
      (error) => {
        if (error.type === "TRANSPORT_FAILURE") {
          log.error({ requestId: entry.requestId, error }, formatCorrelatorError(error));
        } else if (error.type === "REQUEST_TIMEOUT") {
          logOperationFailed(log, request.name, formatCorrelatorError(error), {
            requestId: entry.requestId,
          });
        } else {
          log.debug({ requestId: entry.requestId }, formatCorrelatorError(error));
        }
      },
    );

    options.onSettled?.(request, entry.requestId, result);
    resolveCaller(entry, result);
    if (request.kind === "write") release(entry, request.targetKey);
  }

  /**
   * Remove a write from its target queue and start the next one.
   */
  function release(entry: Entry, targetKey: string): void {
    const queue = writeQueues.get(targetKey);
    if (!queue) return;
    const wasHead = queue[0] === entry;
    const position = queue.indexOf(entry);
    if (position !== -1) queue.splice(position, 1);
    if (queue.length === 0) {
      writeQueues.delete(targetKey);
      return;
    }
    const next = queue[0];
    if (wasHead && next && next.attempts === 0) dispatch(next);
  }

  // ---------------------------------------------------------------------------
  // Incoming frames
  // ---------------------------------------------------------------------------

  function onFrame(raw: unknown): void {
    if (closed) return;
    const parsed = IncomingFrameSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(
        { issues: parsed.error.issues.map((issue) => issue.message) },
        "Malformed frame dropped",
      );
      return;
    }
    const frame = parsed.data;

    switch (frame.type) {
      case "UNSOLICITED":
        options.onUnsolicited?.(frame.body);
        return;

      case "REPLY": {
        const entry = byFrame.get(frame.frameId);
        if (!entry) {
          log.debug({ frameId: frame.frameId }, "Reply for no outstanding frame");
          options.onUnsolicited?.(frame.body);
          return;
        }
        settle(
          entry,
          "RESOLVED",
          ok({
            requestId: entry.requestId,
            frameId: frame.frameId,
            body: frame.body,
            attempts: entry.attempts,
          }),
        );
        return;
      }

      case "FAILURE": {
        const entry = byFrame.get(frame.frameId);
        if (!entry) {
          log.debug({ frameId: frame.frameId }, "Failure for no outstanding frame");
          return;
        }
        attemptFailed(entry, frame.frameId, frame.message);
        return;
      }
    }
  }

  const unsubscribe = options.transport.subscribe(onFrame);

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  function cancel(entry: Entry): void {
    if (!entries.has(entry.requestId)) return;
    const { request } = entry;
    if (entry.state === "ISSUED" || request.kind === "read") {
      settle(entry, "CANCELLED", err(requestCancelled(request.name)));
      return;
    }
    entry.detached = true;
    log.debug(
      { requestId: entry.requestId },
      `Caller detached from ${request.name}; waiting for it to settle`,
    );
    resolveCaller(entry, err(requestCancelled(request.name)));
  }

  function send(request: CorrelatorRequest): RequestHandle {
    const requestId = nextRequestId++;
    if (closed) {
      return {
        requestId,
        result: Promise.resolve(err(sessionClosed(request.name))),
        cancel: () => undefined,
      };
    }

    let resolvePromise: (result: RequestResult) => void = () => undefined;
    const result = new Promise<RequestResult>((resolve) => {
      resolvePromise = resolve;
    });
    const entry: Entry = {
      requestId,
      request,
      issuedAt: Date.now(),
      resolveCaller: resolvePromise,
      state: "ISSUED",
      attempts: 0,
      frameId: null,
      deadline: null,
      timer: null,
      detached: false,
      callerResolved: false,
    };
    entries.set(requestId, entry);
    logOperationStart(log, request.name, { requestId, kind: request.kind });

    if (request.kind === "write") {
      const queue = writeQueues.get(request.targetKey) ?? [];
      queue.push(entry);
      writeQueues.set(request.targetKey, queue);
      if (queue.length === 1) {
        dispatch(entry);
      } else {
        log.debug(
          { requestId, targetKey: request.targetKey, ahead: queue.length - 1 },
          "Write queued behind an outstanding write",
        );
      }
    } else {
      dispatch(entry);
    }

    return { requestId, result, cancel: () => cancel(entry) };
  }

  function enableCommandRetry(name: string): Result<void, CorrelatorError> {
    if (!registeredIdempotent.has(name)) {
      return err(retryNotAllowed(name));
    }
    retryEnabled.add(name);
    return ok(undefined);
  }

  function pending(): readonly PendingRequest[] {
    return [...entries.values()].map((entry) => ({
      requestId: entry.requestId,
      kind: entry.request.kind,
      name: entry.request.name,
      targetKey: entry.request.kind === "write" ? entry.request.targetKey : null,
      state: entry.state,
      attempts: entry.attempts,
      issuedAt: entry.issuedAt,
      deadline: entry.deadline,
      detached: entry.detached,
    }));
  }

  function close(): void {
    if (closed) return;
    closed = true;
    unsubscribe();
    for (const entry of entries.values()) {
      clearTimer(entry);
      entry.state = "CANCELLED";
      resolveCaller(entry, err(sessionClosed(entry.request.name)));
    }
    entries.clear();
    byFrame.clear();
    writeQueues.clear();
    log.debug("Correlator closed");
  }

  return {
    send,
    enableCommandRetry,
    idempotentCommands: () => [...registeredIdempotent],
    pending,
    close,
  };
}
