/**
 * Registry Service Tests
 *
 * Loads the bundled message table and malformed copies of it.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, test, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

// Mock logger to reduce noise in tests
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

// Import after mocks
import { getRegistry, loadRegistry } from "../service.js";
import { findStatusKey, idempotentCommands, lookup } from "../transform.js";

function writeTemp(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "izone-registry-"));
  const path = join(dir, "messages.json");
  writeFileSync(path, content, "utf8");
  return path;
}

describe("Registry Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Bundled table
  // ===========================================================================

  describe("getRegistry", () => {
    test("loads the bundled message table once", () => {
      const first = getRegistry()._unsafeUnwrap();
      const second = getRegistry()._unsafeUnwrap();

      expect(second).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
    });

    test("knows every status message", () => {
      const registry = getRegistry()._unsafeUnwrap();

      expect([...registry.status.keys()]).toEqual([
        "SystemV2",
        "ZonesV2",
        "SchedulesV2",
        "AcUnitFaultHistV2",
        "TemperzoneInfoV2",
        "FirmwareList",
        "PowerMonitorConfig",
        "PowerMonitorStatus",
      ]);
    });

    test("resolves commands, requests and status by name", () => {
      const registry = getRegistry()._unsafeUnwrap();

      expect(lookup(registry, "ZoneSetpoint")._unsafeUnwrap().kind).toBe(
        "command",
      );
      expect(lookup(registry, "PowerRequest")._unsafeUnwrap().kind).toBe(
        "request",
      );
      expect(lookup(registry, "ZonesV2")._unsafeUnwrap().kind).toBe("status");
      expect(lookup(registry, "SysTurbo")._unsafeUnwrapErr()).toEqual({
        type: "SCHEMA_NOT_FOUND",
        name: "SysTurbo",
      });
    });

    test("finds the firmware list under its wire key", () => {
      const registry = getRegistry()._unsafeUnwrap();

      const status = findStatusKey(registry, {
        AirStreamDeviceUId: "000000001",
        DeviceType: "ASH",
        Fmw: "CTS:1.0",
      });

      expect(status?.name).toBe("FirmwareList");
    });

    test("lists only commands registered safe to resend", () => {
      const registry = getRegistry()._unsafeUnwrap();

      const names = idempotentCommands(registry);

      expect(names).toContain("ZoneSetpoint");
      expect(names).toContain("ChannelName");
      expect(names).not.toContain("SysOn");
      expect(names).not.toContain("ChangeRfCh");
    });
  });

  // ===========================================================================
  // Malformed files
  // ===========================================================================

  describe("loadRegistry", () => {
    test("returns REGISTRY_UNREADABLE for a missing file", () => {
      const result = loadRegistry(join(tmpdir(), "no-such-dir", "x.json"));

      expect(result._unsafeUnwrapErr().type).toBe("REGISTRY_UNREADABLE");
    });

    test("returns REGISTRY_UNREADABLE for malformed JSON", () => {
      const result = loadRegistry(writeTemp("{ nope"));

      expect(result._unsafeUnwrapErr().type).toBe("REGISTRY_UNREADABLE");
    });

    test("returns REGISTRY_INVALID when a field spec has the wrong shape", () => {
      const path = writeTemp(
        JSON.stringify({
          version: 1,
          status: [],
          requests: [],
          commands: [
            {
              name: "SysSetpoint",
              endpoint: "izoneCommand",
              idempotent: true,
              body: { type: "temperature", min: "low" },
            },
          ],
        }),
      );

      const error = loadRegistry(path)._unsafeUnwrapErr();

      expect(error.type).toBe("REGISTRY_INVALID");
    });
  });
});
