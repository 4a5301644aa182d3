/**
 * Correlator Service Tests
 *
 * Drives the correlator through a fake transport with fake timers.
 */
import { afterEach, beforeEach, describe, expect, it, test, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
  getCorrelatorConfig: () => ({
    timeoutMs: 1000,
    retryBaseMs: 100,
    readAttempts: 3,
  }),
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type {
  CorrelatorRequest,
  OutgoingFrame,
  ReadRequest,
  Transport,
  WriteRequest,
} from "../schema.js";
import { type CorrelatorOptions, createCorrelator } from "../service.js";
import { backoffDelay, mayRetry } from "../transform.js";

// =============================================================================
// Fixtures
// =============================================================================

function fakeTransport(failSend = false) {
  const sent: OutgoingFrame[] = [];
  let listener: ((frame: unknown) => void) | null = null;
  const transport: Transport = {
    sendFrame: async (frame) => {
      sent.push(frame);
      if (failSend) throw new Error("socket closed");
    },
    subscribe: (next) => {
      listener = next;
      return () => {
        listener = null;
      };
    },
  };
  return {
    transport,
    sent,
    deliver: (frame: unknown) => listener?.(frame),
    isSubscribed: () => listener !== null,
  };
}

const readSystem: ReadRequest = {
  kind: "read",
  name: "iZoneV2Request",
  endpoint: "iZoneRequestV2",
  body: '{"iZoneV2Request":{"Type":1,"No":0,"No1":0}}',
};

function zoneSetpoint(zone: number, wire: number): WriteRequest {
  return {
    kind: "write",
    name: "ZoneSetpoint",
    endpoint: "iZoneCommandV2",
    body: JSON.stringify({ ZoneSetpoint: { Index: zone, Setpoint: wire } }),
    targetKey: `ZoneSetpoint:${zone}`,
  };
}

function setup(failSend = false, extra: Partial<CorrelatorOptions> = {}) {
  const fake = fakeTransport(failSend);
  const onUnsolicited = vi.fn();
  const correlator = createCorrelator({
    transport: fake.transport,
    idempotentCommands: ["ZoneSetpoint"],
    onUnsolicited,
    ...extra,
  });
  return { ...fake, onUnsolicited, correlator };
}

const reply = (frameId: number, body = "{}") => ({ type: "REPLY", frameId, body });

describe("Correlator Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // Reads
  // ===========================================================================

  describe("reads", () => {
    it("resolves the caller with the matching reply", async () => {
      const { correlator, sent, deliver } = setup();

      const handle = correlator.send(readSystem);
      deliver(reply(1, '{"SystemV2":{}}'));

      expect(sent).toEqual([
        { frameId: 1, endpoint: "iZoneRequestV2", body: readSystem.body },
      ]);
      expect((await handle.result)._unsafeUnwrap()).toEqual({
        requestId: 1,
        frameId: 1,
        body: '{"SystemV2":{}}',
        attempts: 1,
      });
      expect(correlator.pending()).toEqual([]);
    });

    it("retries a timed-out read with exponential backoff", async () => {
      const { correlator, sent } = setup();

      const handle = correlator.send(readSystem);
      vi.advanceTimersByTime(1000);
      expect(sent).toHaveLength(1);
      expect(correlator.pending()[0]?.state).toBe("ISSUED");

      vi.advanceTimersByTime(100);
      expect(sent).toHaveLength(2);
      expect(sent[1]?.frameId).toBe(2);

      vi.advanceTimersByTime(1000 + 199);
      expect(sent).toHaveLength(2);
      vi.advanceTimersByTime(1);
      expect(sent).toHaveLength(3);

      vi.advanceTimersByTime(1000);

      expect((await handle.result)._unsafeUnwrapErr()).toEqual({
        type: "REQUEST_TIMEOUT",
        name: "iZoneV2Request",
        attempts: 3,
        outcome: "NOT_APPLIED",
      });
      expect(vi.getTimerCount()).toBe(0);
    });

    it("accepts the reply to a retried attempt", async () => {
      const { correlator, deliver } = setup();

      const handle = correlator.send(readSystem);
      vi.advanceTimersByTime(1100);
      deliver(reply(2));

      const result = (await handle.result)._unsafeUnwrap();
      expect(result.frameId).toBe(2);
      expect(result.attempts).toBe(2);
    });

    it("routes a reply to an abandoned attempt as unsolicited", () => {
      const { correlator, deliver, onUnsolicited } = setup();

      correlator.send(readSystem);
      vi.advanceTimersByTime(1100);
      deliver(reply(1, '{"SystemV2":{"SysOn":1}}'));

      expect(onUnsolicited).toHaveBeenCalledWith('{"SystemV2":{"SysOn":1}}');
      expect(correlator.pending()).toHaveLength(1);
    });

    it("retries a read after a failure frame", () => {
      const { correlator, sent, deliver } = setup();

      correlator.send(readSystem);
      deliver({ type: "FAILURE", frameId: 1, message: "busy" });
      vi.advanceTimersByTime(100);

      expect(sent).toHaveLength(2);
    });

    it("honours a configured attempt count", async () => {
      const { correlator, sent } = setup(false, { config: { readAttempts: 1 } });

      const handle = correlator.send(readSystem);
      vi.advanceTimersByTime(1000);

      expect(sent).toHaveLength(1);
      expect((await handle.result)._unsafeUnwrapErr()).toMatchObject({
        type: "REQUEST_TIMEOUT",
        attempts: 1,
      });
    });
  });

  // ===========================================================================
  // Writes
  // ===========================================================================

  describe("writes", () => {
    it("does not resend a timed-out write", async () => {
      const { correlator, sent } = setup();

      const handle = correlator.send(zoneSetpoint(3, 2200));
      vi.advanceTimersByTime(5000);

      expect(sent).toHaveLength(1);
      expect((await handle.result)._unsafeUnwrapErr()).toEqual({
        type: "REQUEST_TIMEOUT",
        name: "ZoneSetpoint",
        attempts: 1,
        outcome: "UNKNOWN",
      });
    });

    it("resends an opted-in idempotent write", () => {
      const { correlator, sent } = setup();

      expect(correlator.enableCommandRetry("ZoneSetpoint").isOk()).toBe(true);
      correlator.send(zoneSetpoint(3, 2200));
      vi.advanceTimersByTime(1100);

      expect(sent).toHaveLength(2);
    });

    it("refuses retry for commands not registered as safe", () => {
      const { correlator } = setup();

      expect(correlator.enableCommandRetry("SysOn")._unsafeUnwrapErr()).toEqual({
        type: "RETRY_NOT_ALLOWED",
        name: "SysOn",
      });
      expect(correlator.idempotentCommands()).toEqual(["ZoneSetpoint"]);
    });

    test("two writes to the same zone go out in issue order, one at a time", async () => {
      const { correlator, sent, deliver } = setup();

      const first = correlator.send(zoneSetpoint(3, 2200));
      const second = correlator.send(zoneSetpoint(3, 2300));
      const other = correlator.send(zoneSetpoint(4, 2000));

      expect(sent.map((frame) => frame.body)).toEqual([
        zoneSetpoint(3, 2200).body,
        zoneSetpoint(4, 2000).body,
      ]);
      expect(correlator.pending().map((entry) => entry.state)).toEqual([
        "AWAITING_REPLY",
        "ISSUED",
        "AWAITING_REPLY",
      ]);

      deliver(reply(1));

      expect(sent[2]).toEqual({
        frameId: 3,
        endpoint: "iZoneCommandV2",
        body: zoneSetpoint(3, 2300).body,
      });
      deliver(reply(3));
      deliver(reply(2));

      expect((await first.result).isOk()).toBe(true);
      expect((await second.result)._unsafeUnwrap().frameId).toBe(3);
      expect((await other.result)._unsafeUnwrap().frameId).toBe(2);
    });

    it("frees the slot when the head write times out", () => {
      const { correlator, sent } = setup();

      correlator.send(zoneSetpoint(3, 2200));
      correlator.send(zoneSetpoint(3, 2300));
      vi.advanceTimersByTime(1000);

      expect(sent).toHaveLength(2);
      expect(sent[1]?.body).toBe(zoneSetpoint(3, 2300).body);
    });

    it("drops a cancelled write that is still queued", async () => {
      const { correlator, sent, deliver } = setup();

      correlator.send(zoneSetpoint(3, 2200));
      const queued = correlator.send(zoneSetpoint(3, 2300));
      queued.cancel();
      deliver(reply(1));

      expect(sent).toHaveLength(1);
      expect((await queued.result)._unsafeUnwrapErr()).toEqual({
        type: "REQUEST_CANCELLED",
        name: "ZoneSetpoint",
      });
    });

    it("keeps a cancelled in-flight write until its reply arrives", async () => {
      const onSettled = vi.fn();
      const { correlator, sent, deliver } = setup(false, { onSettled });

      const first = correlator.send(zoneSetpoint(3, 2200));
      correlator.send(zoneSetpoint(3, 2300));
      first.cancel();

      expect((await first.result)._unsafeUnwrapErr().type).toBe("REQUEST_CANCELLED");
      expect(correlator.pending()[0]).toMatchObject({
        requestId: 1,
        state: "AWAITING_REPLY",
        detached: true,
      });
      expect(sent).toHaveLength(1);

      deliver(reply(1));

      expect(sent).toHaveLength(2);
      expect(onSettled).toHaveBeenCalledTimes(1);
      expect(onSettled.mock.calls[0]?.[1]).toBe(1);
    });

    it("reports a send that the transport rejects", async () => {
      const { correlator } = setup(true);

      const handle = correlator.send(zoneSetpoint(3, 2200));

      expect((await handle.result)._unsafeUnwrapErr()).toEqual({
        type: "TRANSPORT_FAILURE",
        name: "ZoneSetpoint",
        message: "socket closed",
        attempts: 1,
      });
    });
  });

  // ===========================================================================
  // Incoming frames and shutdown
  // ===========================================================================

  describe("incoming frames", () => {
    it("passes unsolicited status through", () => {
      const { deliver, onUnsolicited } = setup();

      deliver({ type: "UNSOLICITED", body: '{"ZonesV2":{"Index":1}}' });

      expect(onUnsolicited).toHaveBeenCalledWith('{"ZonesV2":{"Index":1}}');
    });

    it("drops malformed frames", () => {
      const { correlator, deliver, onUnsolicited } = setup();

      correlator.send(readSystem);
      deliver({ type: "REPLY", frameId: "1" });
      deliver("garbage");

      expect(onUnsolicited).not.toHaveBeenCalled();
      expect(correlator.pending()).toHaveLength(1);
    });

    it("runs onSettled before the caller resumes", async () => {
      const order: string[] = [];
      const { correlator, deliver } = setup(false, {
        onSettled: (request: CorrelatorRequest) => order.push(`settled ${request.name}`),
      });

      const handle = correlator.send(readSystem);
      const done = handle.result.then(() => order.push("caller"));
      deliver(reply(1));
      await done;

      expect(order).toEqual(["settled iZoneV2Request", "caller"]);
    });
  });

  describe("close", () => {
    it("fails outstanding and later requests and clears every timer", async () => {
      const { correlator, isSubscribed } = setup();

      const handle = correlator.send(readSystem);
      correlator.close();
      const late = correlator.send(readSystem);

      expect((await handle.result)._unsafeUnwrapErr()).toEqual({
        type: "SESSION_CLOSED",
        name: "iZoneV2Request",
      });
      expect((await late.result)._unsafeUnwrapErr().type).toBe("SESSION_CLOSED");
      expect(vi.getTimerCount()).toBe(0);
      expect(isSubscribed()).toBe(false);
    });
  });
});

describe("Correlator Transform", () => {
  const config = { timeoutMs: 1000, retryBaseMs: 100, readAttempts: 3 };

  it("doubles the backoff per attempt", () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(config, attempt))).toEqual([
      100, 200, 400,
    ]);
  });

  it("retries reads and opted-in writes only while attempts remain", () => {
    const write = zoneSetpoint(1, 2000);

    expect(mayRetry(config, readSystem, 2, new Set())).toBe(true);
    expect(mayRetry(config, readSystem, 3, new Set())).toBe(false);
    expect(mayRetry(config, write, 1, new Set())).toBe(false);
    expect(mayRetry(config, write, 1, new Set(["ZoneSetpoint"]))).toBe(true);
  });
});
