/**
 * Session Service Tests
 *
 * Runs whole sessions against the in-process loopback transport.
 */
import { afterEach, describe, expect, it, test, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
  getCorrelatorConfig: () => ({
    timeoutMs: 1000,
    retryBaseMs: 1,
    readAttempts: 3,
  }),
  getEndpointConfig: () => ({
    izoneCommand: "iZoneCommandV2",
    izoneRequest: "iZoneRequestV2",
    powerCommand: "PowerCommand",
    powerRequest: "PowerRequest",
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
import { zoneName, zoneSetpoint } from "../../commands/index.js";
import { zoneView } from "../../reconciler/index.js";
import {
  type LoopbackResponder,
  type LoopbackTransport,
  createLoopbackTransport,
} from "../loopback.js";
import type { SessionHandlers } from "../schema.js";
import { type Session, createSession } from "../service.js";

// =============================================================================
// Fixtures
// =============================================================================

const UID = "000000001";

function status(name: string, body: unknown, uid = UID): string {
  return JSON.stringify({ AirStreamDeviceUId: uid, DeviceType: "ASH", [name]: body });
}

const systemStatus = (fields: Record<string, unknown> = {}, uid = UID) =>
  status("SystemV2", { SysOn: 1, SysMode: 1, NoOfZones: 4, Setpoint: 2200, ...fields }, uid);

const zoneStatus = (fields: Record<string, unknown>) =>
  status("ZonesV2", { Name: "Kitchen", Mode: 3, Setpoint: 2150, ...fields });

const requestBody = (name: string, type: number, no = 0) =>
  JSON.stringify({ [name]: { Type: type, No: no, No1: 0 } });

/** Answers status requests from a table and acknowledges every command. */
function deviceResponder(table: ReadonlyMap<string, string>): LoopbackResponder {
  return (frame) => {
    if (frame.endpoint === "iZoneCommandV2" || frame.endpoint === "PowerCommand") {
      return { reply: "{}" };
    }
    const reply = table.get(frame.body);
    return reply === undefined ? null : { reply };
  };
}

let session: Session | null = null;

function open(
  transport: LoopbackTransport,
  handlers: SessionHandlers = {},
): Session {
  const opened = createSession({ transport, handlers })._unsafeUnwrap();
  session = opened;
  return opened;
}

afterEach(() => {
  session?.close();
  session = null;
  vi.useRealTimers();
});

// =============================================================================
// Reads
// =============================================================================

describe("status requests", () => {
  it("sends the request frame and merges the reply before resolving", async () => {
    const transport = createLoopbackTransport(
      deviceResponder(new Map([[requestBody("iZoneV2Request", 1), systemStatus()]])),
    );
    const s = open(transport);

    const reply = (await s.fetchSystem())._unsafeUnwrap();

    expect(transport.sent).toEqual([
      {
        frameId: 1,
        endpoint: "iZoneRequestV2",
        body: '{"iZoneV2Request":{"Type":1,"No":0,"No1":0}}',
      },
    ]);
    expect(reply).toMatchObject({ status: "SystemV2", index: null, attempts: 1 });
    expect(reply.events).toEqual([
      {
        type: "ENTITY_CHANGED",
        entity: "system",
        index: null,
        changedFields: ["SysOn", "SysMode", "Setpoint", "NoOfZones"],
      },
    ]);
    expect(s.snapshot().deviceUid).toBe(UID);
    expect(s.validationContext().zoneCount).toBe(4);
  });

  it("retries a read after a transport failure", async () => {
    let calls = 0;
    const transport = createLoopbackTransport((frame) => {
      calls += 1;
      if (calls === 1) return { failure: "bridge busy" };
      return frame.body === requestBody("iZoneV2Request", 2, 3)
        ? { reply: zoneStatus({ Index: 3 }) }
        : null;
    });
    const s = open(transport);

    const reply = (await s.fetchZone(3))._unsafeUnwrap();

    expect(reply).toMatchObject({ status: "ZonesV2", index: 3, attempts: 2 });
    expect(transport.sent).toHaveLength(2);
    expect(zoneView(s.snapshot(), 3)?.name).toBe("Kitchen");
  });

  it("reports a reply carrying a different status", async () => {
    const transport = createLoopbackTransport(() => ({
      reply: zoneStatus({ Index: 1 }),
    }));
    const s = open(transport);

    const error = (await s.fetchSystem())._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "UNEXPECTED_REPLY",
      expected: "SystemV2",
      received: "ZonesV2",
    });
    expect(zoneView(s.snapshot(), 1)?.name).toBe("Kitchen");
  });

  it("reports an undecodable reply", async () => {
    const transport = createLoopbackTransport(() => ({ reply: "not json" }));
    const s = open(transport);

    const error = (await s.fetchFaults())._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: "DECODE_FAILED", path: "" });
  });

  test("a read that never gets a reply times out as not applied", async () => {
    vi.useFakeTimers();
    const transport = createLoopbackTransport(() => null);
    const s = open(transport);

    const pending = s.fetchFirmware();
    // three attempts with 1ms and 2ms backoff between them
    await vi.advanceTimersByTimeAsync(3100);

    expect((await pending)._unsafeUnwrapErr()).toEqual({
      type: "REQUEST_TIMEOUT",
      name: "iZoneV2Request",
      attempts: 3,
      outcome: "NOT_APPLIED",
    });
  });
});

// =============================================================================
// Commands
// =============================================================================

describe("commands", () => {
  it("merges an acknowledged command into the snapshot", async () => {
    const transport = createLoopbackTransport(deviceResponder(new Map()));
    const s = open(transport);
    s.receive(zoneStatus({ Index: 3 }))._unsafeUnwrap();

    const ack = (await s.command(zoneSetpoint(3, 22.5)).result)._unsafeUnwrap();

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]).toEqual({
      frameId: 1,
      endpoint: "iZoneCommandV2",
      body: '{"ZoneSetpoint":{"Index":3,"Setpoint":2250}}',
    });
    expect(ack).toEqual({
      name: "ZoneSetpoint",
      targetKey: "ZoneSetpoint:3",
      attempts: 1,
      events: [
        {
          type: "ENTITY_CHANGED",
          entity: "zone",
          index: 3,
          changedFields: ["Setpoint"],
        },
      ],
    });
    expect(zoneView(s.snapshot(), 3)?.setpoint).toBe(22.5);
  });

  it("sends writes to one zone in issue order", async () => {
    const transport = createLoopbackTransport(deviceResponder(new Map()));
    const s = open(transport);
    s.receive(zoneStatus({ Index: 3 }))._unsafeUnwrap();

    const first = s.command(zoneSetpoint(3, 22.5));
    const second = s.command(zoneSetpoint(3, 23));
    expect(transport.sent).toHaveLength(1);

    await first.result;
    await second.result;

    expect(transport.sent.map((frame) => frame.body)).toEqual([
      '{"ZoneSetpoint":{"Index":3,"Setpoint":2250}}',
      '{"ZoneSetpoint":{"Index":3,"Setpoint":2300}}',
    ]);
    expect(zoneView(s.snapshot(), 3)?.setpoint).toBe(23);
  });

  it("checks balance limits against the acknowledged zone before sending", async () => {
    const transport = createLoopbackTransport(deviceResponder(new Map()));
    const s = open(transport);
    s.receive(zoneStatus({ Index: 3, BalanceMax: 60 }))._unsafeUnwrap();

    const handle = s.send("BalanceMin", { Index: 3, Min: 60 });

    expect(handle.requestId).toBeNull();
    expect((await handle.result)._unsafeUnwrapErr()).toEqual({
      type: "VALIDATION_FAILED",
      field: "Min",
      rule: "crossField",
      reason: "BalanceMax 60 must be above BalanceMin 60",
    });
    expect(transport.sent).toHaveLength(0);
  });

  it("rejects a command that cannot be encoded without sending it", async () => {
    const transport = createLoopbackTransport(deviceResponder(new Map()));
    const s = open(transport);

    const handle = s.command(zoneName(3, "A very long zone name!"));

    expect((await handle.result)._unsafeUnwrapErr()).toMatchObject({
      type: "FIELD_TOO_LONG",
      path: "ZoneName.Name",
    });
    expect(transport.sent).toHaveLength(0);
  });

  it("leaves the snapshot alone when a write times out", async () => {
    vi.useFakeTimers();
    const transport = createLoopbackTransport(() => null);
    const s = open(transport);

    const handle = s.send("SysOn", 1);
    await vi.advanceTimersByTimeAsync(1000);

    expect((await handle.result)._unsafeUnwrapErr()).toEqual({
      type: "REQUEST_TIMEOUT",
      name: "SysOn",
      attempts: 1,
      outcome: "UNKNOWN",
    });
    expect(transport.sent).toHaveLength(1);
    expect(s.snapshot().singletons.system).toBeUndefined();
  });

  describe("paired limits with writes outstanding", () => {
    function openWithBalance(): { s: Session; transport: LoopbackTransport } {
      const transport = createLoopbackTransport(() => null);
      const s = open(transport);
      s.receive(zoneStatus({ Index: 3, BalanceMin: 20, BalanceMax: 80 }))._unsafeUnwrap();
      return { s, transport };
    }

    it("checks a new limit against an unacknowledged one", async () => {
      const { s, transport } = openWithBalance();

      const first = s.send("BalanceMin", { Index: 3, Min: 60 });
      const second = s.send("BalanceMax", { Index: 3, Max: 50 });

      expect(first.requestId).toBe(1);
      expect(second.requestId).toBeNull();
      expect((await second.result)._unsafeUnwrapErr()).toEqual({
        type: "VALIDATION_FAILED",
        field: "Max",
        rule: "crossField",
        reason: "BalanceMax 50 must be above BalanceMin 60",
      });
      expect(transport.sent.map((frame) => frame.body)).toEqual([
        '{"BalanceMin":{"Index":3,"Min":60}}',
      ]);
    });

    it("queues both limits of a zone behind one another", () => {
      const { s, transport } = openWithBalance();

      s.send("BalanceMin", { Index: 3, Min: 60 });
      const second = s.send("BalanceMax", { Index: 3, Max: 90 });

      expect(second.requestId).toBe(2);
      expect(transport.sent).toHaveLength(1);
      expect(s.pending()[1]).toMatchObject({
        requestId: 2,
        name: "BalanceMax",
        targetKey: "Balance:3",
        state: "ISSUED",
      });
    });

    it("checks against acknowledged state again once a write fails", async () => {
      vi.useFakeTimers();
      const { s } = openWithBalance();

      const first = s.send("BalanceMin", { Index: 3, Min: 60 });
      await vi.advanceTimersByTimeAsync(1000);
      expect((await first.result)._unsafeUnwrapErr().type).toBe("REQUEST_TIMEOUT");

      expect(s.validationContext().zones?.[3]).toMatchObject({ balanceMin: 20 });
      expect(s.send("BalanceMax", { Index: 3, Max: 50 }).requestId).toBe(2);
    });
  });

  test("command retry is only available for idempotent commands", () => {
    const s = open(createLoopbackTransport(() => null));

    expect(s.enableCommandRetry("SysMode").isOk()).toBe(true);
    expect(s.enableCommandRetry("SysOn")._unsafeUnwrapErr()).toEqual({
      type: "RETRY_NOT_ALLOWED",
      name: "SysOn",
    });
    expect(s.idempotentCommands()).toContain("ZoneSetpoint");
  });
});

// =============================================================================
// Unsolicited status
// =============================================================================

describe("unsolicited status", () => {
  it("notifies observers of pushed changes", async () => {
    const onChange = vi.fn();
    const transport = createLoopbackTransport(() => null);
    const s = open(transport, { onChange });

    transport.push(systemStatus());
    await Promise.resolve();

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange.mock.calls[0]?.[0]).toEqual({
      type: "ENTITY_CHANGED",
      entity: "system",
      index: null,
      changedFields: ["SysOn", "SysMode", "Setpoint", "NoOfZones"],
    });
    expect(onChange.mock.calls[0]?.[1]).toBe(s.snapshot());
  });

  it("invalidates the snapshot when another device answers", async () => {
    const onIdentityChanged = vi.fn();
    const onChange = vi.fn();
    const transport = createLoopbackTransport(() => null);
    const s = open(transport, { onChange, onIdentityChanged });
    s.receive(systemStatus())._unsafeUnwrap();

    transport.push(systemStatus({ SysOn: 0 }, "000000002"));
    await Promise.resolve();

    expect(onIdentityChanged).toHaveBeenCalledTimes(1);
    expect(onIdentityChanged.mock.calls[0]?.[0]).toEqual({
      type: "DEVICE_IDENTITY_CHANGED",
      previousUid: UID,
      currentUid: "000000002",
    });
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(s.snapshot().singletons.system?.stale).toBe(true);
  });

  it("reports field decode failures and keeps the rest", () => {
    const onDecodeFailure = vi.fn();
    const s = open(createLoopbackTransport(() => null), { onDecodeFailure });

    const events = s.receive(systemStatus({ Setpoint: "warm" }))._unsafeUnwrap();

    expect(events.map((event) => event.type)).toEqual([
      "ENTITY_CHANGED",
      "PARTIAL_DECODE_FAILURE",
    ]);
    expect(onDecodeFailure).toHaveBeenCalledTimes(1);
    expect(s.snapshot().singletons.system?.values.NoOfZones).toBe(4);
  });

  it("rejects a status body that is not an object", () => {
    const s = open(createLoopbackTransport(() => null));

    expect(s.receive("[1,2]")._unsafeUnwrapErr()).toEqual({
      type: "DECODE_FAILED",
      path: "",
      message: "status payload must be an object",
      raw: [1, 2],
    });
  });

  it("rejects a status message with no body", () => {
    const s = open(createLoopbackTransport(() => null));

    expect(s.receive(status("ZonesV2", null))._unsafeUnwrapErr()).toEqual({
      type: "DECODE_FAILED",
      path: "ZonesV2",
      message: "expected an object",
      raw: null,
    });
  });

  it("keeps listening after a pushed frame it cannot decode", async () => {
    const onChange = vi.fn();
    const transport = createLoopbackTransport(() => null);
    const s = open(transport, { onChange });

    transport.push("[1,2]");
    transport.push(status("SystemV2", 7));
    transport.push(systemStatus());
    await Promise.resolve();

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(s.snapshot().singletons.system?.values.NoOfZones).toBe(4);
  });

  it("returns an error for a body with no known status", () => {
    const s = open(createLoopbackTransport(() => null));

    expect(s.receive('{"Bogus":{}}')._unsafeUnwrapErr()).toMatchObject({
      type: "SCHEMA_NOT_FOUND",
    });
  });
});

// =============================================================================
// Refresh and lifecycle
// =============================================================================

describe("refreshAll", () => {
  const table = new Map([
    [requestBody("iZoneV2Request", 1), systemStatus({ NoOfZones: 2 })],
    [requestBody("iZoneV2Request", 2, 0), zoneStatus({ Index: 0, Name: "Living" })],
    [requestBody("iZoneV2Request", 2, 1), zoneStatus({ Index: 1, Name: "Bed" })],
    [requestBody("iZoneV2Request", 4), status("AcUnitFaultHistV2", { Faults: [] })],
    [requestBody("PowerRequest", 1), status("PowerMonitorConfig", { Enabled: 1 })],
    [requestBody("PowerRequest", 2), status("PowerMonitorStatus", { LastReadingNo: 7 })],
  ]);

  it("reads the system, each zone, faults and power in order", async () => {
    const s = open(createLoopbackTransport(deviceResponder(table)));

    const replies = (await s.refreshAll())._unsafeUnwrap();

    expect(replies.map((reply) => [reply.status, reply.index])).toEqual([
      ["SystemV2", null],
      ["ZonesV2", 0],
      ["ZonesV2", 1],
      ["AcUnitFaultHistV2", null],
      ["PowerMonitorConfig", null],
      ["PowerMonitorStatus", null],
    ]);
    expect(zoneView(s.snapshot(), 1)?.name).toBe("Bed");
  });

  it("skips power when asked", async () => {
    const s = open(createLoopbackTransport(deviceResponder(table)));

    const replies = (await s.refreshAll({ power: false }))._unsafeUnwrap();

    expect(replies).toHaveLength(4);
  });

  it("stops at the first failed read", async () => {
    vi.useFakeTimers();
    const partial = new Map(table);
    partial.delete(requestBody("iZoneV2Request", 2, 1));
    const transport = createLoopbackTransport(deviceResponder(partial));
    const s = open(transport);

    const pending = s.refreshAll();
    await vi.advanceTimersByTimeAsync(5000);

    expect((await pending)._unsafeUnwrapErr()).toMatchObject({
      type: "REQUEST_TIMEOUT",
      outcome: "NOT_APPLIED",
    });
    expect(transport.sent.map((frame) => frame.body)).not.toContain(
      requestBody("iZoneV2Request", 4),
    );
  });
});

describe("close", () => {
  it("settles outstanding requests and refuses new ones", async () => {
    const s = open(createLoopbackTransport(() => null));
    const pending = s.fetchSystem();

    s.close();

    expect((await pending)._unsafeUnwrapErr()).toEqual({
      type: "SESSION_CLOSED",
      name: "iZoneV2Request",
    });
    expect((await s.fetchSystem())._unsafeUnwrapErr().type).toBe("SESSION_CLOSED");
    expect(s.pending()).toEqual([]);
  });
});
