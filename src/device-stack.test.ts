import { describe, expect, it } from "vitest";
import { parseRuntimeConfig } from "./config/load-config.js";
import { createDeviceStack } from "./device-stack.js";
import { createSilentLogger } from "./logger.js";

const devices = [
  { name: "Light 1", location: "Live Room", kind: "socket", deviceId: "TESTDEVICE01" },
  { name: "Light 2", location: "Booth", kind: "Bulb", deviceId: "TESTDEVICE02" },
];

describe("createDeviceStack", () => {
  it("wires the simulator into a working actuator", async () => {
    const config = parseRuntimeConfig({ transport: { type: "simulator", latencyMs: 0 }, devices });
    const { transport, registry, actuator } = createDeviceStack(config, createSilentLogger());

    const results = await actuator.setAll(true);

    expect(transport.id).toBe("simulator");
    expect(results.map((result) => result.outcome)).toEqual(["success", "success"]);
    expect(registry.isResolved("TESTDEVICE02")).toBe(true);
    await transport.close();
  });

  it("builds the kasa transport by default", async () => {
    const config = parseRuntimeConfig({ devices });
    const { transport } = createDeviceStack(config, createSilentLogger());

    expect(transport.id).toBe("kasa");
    await transport.close();
  });
});
