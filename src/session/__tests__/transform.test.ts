/**
 * Session Transform Tests
 */
import { describe, expect, it, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
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
}));

import {
  EMPTY_SNAPSHOT,
  type Snapshot,
  applyStatus,
  decodeStatus,
} from "../../reconciler/index.js";
import { loadRegistry } from "../../registry/index.js";
import { validate } from "../../validator/index.js";
import { STATUS_REQUESTS, projectWrites, validationContextOf } from "../transform.js";

const registry = loadRegistry()._unsafeUnwrap();

function merge(snapshot: Snapshot, payload: unknown, seq: number): Snapshot {
  const status = decodeStatus(registry, payload)._unsafeUnwrap();
  return applyStatus(snapshot, status, seq).snapshot;
}

const identity = (uid = "000000001") => ({
  AirStreamDeviceUId: uid,
  DeviceType: "ASH",
});

describe("STATUS_REQUESTS", () => {
  it("addresses iZone reads by type and index", () => {
    expect(STATUS_REQUESTS.system()).toEqual({
      name: "iZoneV2Request",
      body: { Type: 1, No: 0, No1: 0 },
    });
    expect(STATUS_REQUESTS.zone(5).body).toEqual({ Type: 2, No: 5, No1: 0 });
    expect(STATUS_REQUESTS.schedule(2).body).toEqual({ Type: 3, No: 2, No1: 0 });
    expect(STATUS_REQUESTS.firmware().body.Type).toBe(6);
  });

  it("sends power reads as PowerRequest", () => {
    expect(STATUS_REQUESTS.powerConfig()).toEqual({
      name: "PowerRequest",
      body: { Type: 1, No: 0, No1: 0 },
    });
    expect(STATUS_REQUESTS.powerStatus().body.Type).toBe(2);
  });
});

describe("validationContextOf", () => {
  const acknowledged = [
    {
      ...identity(),
      SystemV2: { EcoLock: 1, EcoMin: 2000, EcoMax: 2400, NoOfZones: 4 },
    },
    {
      ...identity(),
      ZonesV2: { Index: 2, BalanceMin: 10, BalanceMax: 90, MinAir: 0, MaxAir: 100 },
    },
    { ...identity(), ZonesV2: { Index: 1, Name: "Den", ZoneType: 1 } },
  ].reduce<Snapshot>((snapshot, payload, i) => merge(snapshot, payload, i + 1), EMPTY_SNAPSHOT);

  it("is empty before anything is known", () => {
    expect(validationContextOf(EMPTY_SNAPSHOT)).toEqual({ zones: {} });
  });

  it("carries topology, economy limits and zone limits in wire units", () => {
    expect(validationContextOf(acknowledged)).toEqual({
      zoneCount: 4,
      economy: { locked: true, min: 2000, max: 2400 },
      zones: {
        1: { zoneType: 1 },
        2: { balanceMin: 10, balanceMax: 90, minAir: 0, maxAir: 100 },
      },
    });
  });

  it("ignores stale state after the device changes", () => {
    const replaced = merge(
      acknowledged,
      { ...identity("000000002"), SystemV2: { NoOfZones: 2 } },
      10,
    );

    expect(validationContextOf(replaced)).toEqual({ zones: {} });
  });
});

describe("projectWrites", () => {
  const acknowledged = merge(
    EMPTY_SNAPSHOT,
    { ...identity(), ZonesV2: { Index: 3, BalanceMin: 20, BalanceMax: 80 } },
    1,
  );
  const command = (name: string, candidate: unknown) =>
    validate(name, candidate, {}, registry)._unsafeUnwrap();

  it("applies pending writes in order over acknowledged state", () => {
    const projected = projectWrites(
      registry,
      acknowledged,
      [
        command("BalanceMin", { Index: 3, Min: 60 }),
        command("BalanceMax", { Index: 3, Max: 90 }),
      ],
      1,
    );

    expect(validationContextOf(projected).zones?.[3]).toEqual({
      balanceMin: 60,
      balanceMax: 90,
    });
  });

  it("leaves the snapshot alone when nothing is pending", () => {
    expect(projectWrites(registry, acknowledged, [], 1)).toBe(acknowledged);
  });
});
