import type { RuntimeConfig } from "./config/types.js";
import { Actuator } from "./core/actuator.js";
import { createTransport } from "./devices/create-transport.js";
import { DeviceRegistry } from "./devices/device-registry.js";
import type { DeviceTransport } from "./devices/device-transport.js";
import type { Logger } from "./logger.js";

export type DeviceStack = {
  transport: DeviceTransport;
  registry: DeviceRegistry;
  actuator: Actuator;
};

export function createDeviceStack(config: RuntimeConfig, logger: Logger): DeviceStack {
  const transport = createTransport(config, logger);
  const registry = new DeviceRegistry(config.devices, transport, logger.child({ component: "registry" }));
  const actuator = new Actuator(registry, {
    commandTimeoutMs: config.actuation.commandTimeoutMs,
    bulbBrightness: config.actuation.bulbBrightness,
    logger: logger.child({ component: "actuator" }),
  });
  return { transport, registry, actuator };
}
