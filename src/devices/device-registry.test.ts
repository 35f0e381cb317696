import { describe, expect, it, vi } from "vitest";
import type { DeviceEntry } from "../config/types.js";
import { createSilentLogger } from "../logger.js";
import { DeviceRegistry } from "./device-registry.js";
import type { DeviceHandle, DeviceTransport } from "./device-transport.js";
import { SimulatedTransport } from "./simulated-transport.js";

const entries: DeviceEntry[] = [
  { name: "Light 1", location: "Live Room", kind: "socket", deviceId: "TESTDEVICE01" },
  { name: "Light 2", location: "Booth", kind: "bulb", deviceId: "TESTDEVICE02" },
];

function handleFor(deviceId: string): DeviceHandle {
  return { deviceId, address: `10.0.0.${deviceId.slice(-1)}`, setState: vi.fn(async () => {}) };
}

function fakeTransport(resolve: DeviceTransport["resolve"]) {
  const forget = vi.fn();
  const transport: DeviceTransport = {
    id: "fake",
    resolve,
    forget,
    close: async () => {},
  };
  return { transport, forget };
}

describe("DeviceRegistry", () => {
  it("lists the configured devices", () => {
    const registry = new DeviceRegistry(entries, new SimulatedTransport(entries), createSilentLogger());

    expect(registry.all().map((entry) => entry.deviceId)).toEqual(["TESTDEVICE01", "TESTDEVICE02"]);
    expect(registry.get("TESTDEVICE02")?.kind).toBe("bulb");
    expect(registry.get("UNKNOWN")).toBeUndefined();
  });

  it("caches resolved handles", async () => {
    const resolve = vi.fn(async (entry: DeviceEntry) => handleFor(entry.deviceId));
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    const first = await registry.resolve("TESTDEVICE01");
    const second = await registry.resolve("TESTDEVICE01");

    expect(second).toBe(first);
    expect(resolve).toHaveBeenCalledTimes(1);
    expect(registry.isResolved("TESTDEVICE01")).toBe(true);
  });

  it("shares one resolution between concurrent callers", async () => {
    const resolve = vi.fn(async (entry: DeviceEntry) => handleFor(entry.deviceId));
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    const [a, b] = await Promise.all([registry.resolve("TESTDEVICE02"), registry.resolve("TESTDEVICE02")]);

    expect(a).toBe(b);
    expect(resolve).toHaveBeenCalledTimes(1);
  });

  it("does not cache a device that was not found", async () => {
    const resolve = vi.fn(async (): Promise<DeviceHandle | null> => null);
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    expect(await registry.resolve("TESTDEVICE01")).toBeNull();
    expect(await registry.resolve("TESTDEVICE01")).toBeNull();
    expect(resolve).toHaveBeenCalledTimes(2);
  });

  it("returns null for an unknown id without asking the transport", async () => {
    const resolve = vi.fn(async (entry: DeviceEntry) => handleFor(entry.deviceId));
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    expect(await registry.resolve("UNKNOWN")).toBeNull();
    expect(resolve).not.toHaveBeenCalled();
  });

  it("re-resolves after invalidation", async () => {
    const resolve = vi.fn(async (entry: DeviceEntry) => handleFor(entry.deviceId));
    const { transport, forget } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    await registry.resolve("TESTDEVICE01");
    registry.invalidate("TESTDEVICE01");

    expect(registry.isResolved("TESTDEVICE01")).toBe(false);
    expect(forget).toHaveBeenCalledWith("TESTDEVICE01");
    await registry.resolve("TESTDEVICE01");
    expect(resolve).toHaveBeenCalledTimes(2);
  });

  it("does not cache a handle whose resolution finishes after invalidation", async () => {
    const finishers: Array<(handle: DeviceHandle) => void> = [];
    const resolve = vi.fn(
      (_entry: DeviceEntry) =>
        new Promise<DeviceHandle | null>((resolvePromise) => {
          finishers.push(resolvePromise);
        }),
    );
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    const late = registry.resolve("TESTDEVICE01");
    registry.invalidate("TESTDEVICE01");
    const fresh = registry.resolve("TESTDEVICE01");
    finishers[0](handleFor("TESTDEVICE01"));
    await late;

    expect(registry.isResolved("TESTDEVICE01")).toBe(false);
    expect(resolve).toHaveBeenCalledTimes(2);

    finishers[1](handleFor("TESTDEVICE01"));
    await fresh;
    expect(registry.isResolved("TESTDEVICE01")).toBe(true);
  });

  it("reports missing devices on warm-up without throwing", async () => {
    const resolve = vi.fn(async (entry: DeviceEntry): Promise<DeviceHandle | null> => {
      if (entry.deviceId === "TESTDEVICE02") throw new Error("network down");
      return handleFor(entry.deviceId);
    });
    const { transport } = fakeTransport(resolve);
    const registry = new DeviceRegistry(entries, transport, createSilentLogger());

    const report = await registry.warm();

    expect(report.resolved.map((entry) => entry.deviceId)).toEqual(["TESTDEVICE01"]);
    expect(report.missing.map((entry) => entry.deviceId)).toEqual(["TESTDEVICE02"]);
  });
});
