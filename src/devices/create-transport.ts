import type { RuntimeConfig } from "../config/types.js";
import type { Logger } from "../logger.js";
import type { DeviceTransport } from "./device-transport.js";
import { KasaTransport } from "./kasa-transport.js";
import { MqttTransport } from "./mqtt-transport.js";
import { SimulatedTransport } from "./simulated-transport.js";

export function createTransport(config: RuntimeConfig, logger: Logger): DeviceTransport {
  const transport = config.transport;
  const child = logger.child({ component: transport.type });
  switch (transport.type) {
    case "kasa":
      return new KasaTransport(transport, { requestTimeoutMs: config.actuation.commandTimeoutMs, logger: child });
    case "mqtt":
      return new MqttTransport(transport, { confirmTimeoutMs: config.actuation.commandTimeoutMs, logger: child });
    case "simulator":
      return new SimulatedTransport(config.devices, transport.latencyMs);
  }
}
