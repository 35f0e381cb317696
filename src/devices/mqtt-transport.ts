import mqtt from "mqtt";
import type { IClientOptions } from "mqtt";
import { z } from "zod";
import type { DeviceEntry, TransportDefinition } from "../config/types.js";
import { DeviceCommandError } from "../core/errors.js";
import { withTimeout } from "../core/timeout.js";
import type { Logger } from "../logger.js";
import type { DeviceCommand, DeviceHandle, DeviceTransport, DiscoveredDevice } from "./device-transport.js";

type MqttDefinition = Extract<TransportDefinition, { type: "mqtt" }>;

/** The slice of an MQTT client the transport needs. */
export interface MqttConnection {
  readonly connected: boolean;
  onConnect(listener: () => void): void;
  onMessage(listener: (topic: string, payload: Buffer) => void): void;
  onError(listener: (error: Error) => void): void;
  subscribe(topics: string[]): void;
  publish(topic: string, payload: string): Promise<void>;
  end(): Promise<void>;
}

function toClientOptions(definition: MqttDefinition): IClientOptions {
  const options: IClientOptions = {};
  if (definition.clientId) options.clientId = definition.clientId;
  if (definition.username) options.username = definition.username;
  if (definition.password) options.password = definition.password;
  return options;
}

export function connectMqtt(definition: MqttDefinition): MqttConnection {
  const client = mqtt.connect(definition.brokerUrl, toClientOptions(definition));
  return {
    get connected() {
      return client.connected;
    },
    onConnect: (listener) => {
      client.on("connect", () => listener());
    },
    onMessage: (listener) => {
      client.on("message", (topic, payload) => listener(topic, payload));
    },
    onError: (listener) => {
      client.on("error", (error) => listener(error));
    },
    subscribe: (topics) => {
      client.subscribe(topics, { qos: 0 });
    },
    publish: (topic, payload) =>
      new Promise<void>((resolvePromise, rejectPromise) => {
        client.publish(topic, payload, { qos: 1 }, (error) => {
          if (error) rejectPromise(error);
          else resolvePromise();
        });
      }),
    end: () => client.endAsync(),
  };
}

function parseOnOff(value: unknown): boolean | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toUpperCase();
  if (normalized === "ON") return true;
  if (normalized === "OFF") return false;
  return null;
}

const resultSchema = z.object({ POWER: z.string() });

type Waiter = { expected: boolean; resolve: () => void; abort: (error: Error) => void };

export type MqttTransportOptions = {
  confirmTimeoutMs: number;
  logger: Logger;
  connection?: MqttConnection;
};

/**
 * Tasmota-style devices: commands on `cmnd/<id>/POWER` (or `Dimmer` for a bulb
 * turning on), confirmation from `stat/<id>/POWER` or `stat/<id>/RESULT`,
 * availability from `tele/<id>/LWT`.
 */
export class MqttTransport implements DeviceTransport {
  readonly id = "mqtt";
  private readonly connection: MqttConnection;
  private readonly availability = new Map<string, boolean>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  private readonly firstConnect: Promise<void>;

  constructor(
    private readonly definition: MqttDefinition,
    private readonly options: MqttTransportOptions,
  ) {
    this.connection = options.connection ?? connectMqtt(definition);
    let markConnected = () => {};
    this.firstConnect = new Promise<void>((resolvePromise) => {
      markConnected = () => resolvePromise();
    });
    this.connection.onConnect(() => {
      markConnected();
      this.connection.subscribe([
        `${definition.statPrefix}/+/POWER`,
        `${definition.statPrefix}/+/RESULT`,
        `${definition.telePrefix}/+/LWT`,
      ]);
      this.options.logger.info({ brokerUrl: definition.brokerUrl }, "Connected to MQTT broker");
    });
    this.connection.onMessage((topic, payload) => {
      this.handleMessage(topic, payload.toString("utf8"));
    });
    this.connection.onError((error) => {
      this.options.logger.error({ brokerUrl: definition.brokerUrl, error: error.message }, "MQTT client error");
    });
  }

  async resolve(entry: DeviceEntry): Promise<DeviceHandle | null> {
    await this.ensureConnected();
    if (this.availability.get(entry.deviceId) === false) return null;
    return {
      deviceId: entry.deviceId,
      address: `${this.definition.commandPrefix}/${entry.deviceId}`,
      setState: (command) => this.send(entry, command),
    };
  }

  async discover(): Promise<DiscoveredDevice[]> {
    return [...this.availability.entries()]
      .filter(([, online]) => online)
      .map(([deviceId]) => ({ deviceId, address: `${this.definition.commandPrefix}/${deviceId}` }));
  }

  /** Pending confirmations fail as unreachable. */
  async close(): Promise<void> {
    const closed = new DeviceCommandError("unreachable", `MQTT transport for ${this.definition.brokerUrl} closed`);
    for (const waiters of this.waiters.values()) {
      for (const waiter of waiters) waiter.abort(closed);
    }
    this.waiters.clear();
    await this.connection.end();
  }

  private async ensureConnected(): Promise<void> {
    if (this.connection.connected) return;
    const message = `MQTT broker ${this.definition.brokerUrl} is not connected`;
    try {
      await withTimeout(this.firstConnect, this.options.confirmTimeoutMs, message);
    } catch (error) {
      throw new DeviceCommandError("unreachable", message, { cause: error });
    }
    if (!this.connection.connected) throw new DeviceCommandError("unreachable", message);
  }

  private async send(entry: DeviceEntry, command: DeviceCommand): Promise<void> {
    const base = `${this.definition.commandPrefix}/${entry.deviceId}`;
    const dimmer = entry.kind === "bulb" && command.on && command.brightness !== undefined;
    const topic = dimmer ? `${base}/Dimmer` : `${base}/POWER`;
    const payload = dimmer ? String(command.brightness) : command.on ? "ON" : "OFF";

    const confirmed = this.waitFor(entry, command.on);
    try {
      await this.connection.publish(topic, payload);
    } catch (error) {
      confirmed.cancel();
      throw new DeviceCommandError("unreachable", `Publishing to ${topic} failed`, { cause: error });
    }
    await confirmed.promise;
  }

  private waitFor(entry: DeviceEntry, expected: boolean): { promise: Promise<void>; cancel: () => void } {
    const waiters = this.waiters.get(entry.deviceId) ?? new Set<Waiter>();
    this.waiters.set(entry.deviceId, waiters);

    let cancel = () => {};
    const promise = new Promise<void>((resolvePromise, rejectPromise) => {
      const waiter: Waiter = {
        expected,
        resolve: () => {
          clearTimeout(timer);
          resolvePromise();
        },
        abort: (error) => {
          clearTimeout(timer);
          rejectPromise(error);
        },
      };
      const timer = setTimeout(() => {
        waiters.delete(waiter);
        rejectPromise(
          new DeviceCommandError(
            "timeout",
            `${entry.name} did not confirm ${expected ? "on" : "off"} within ${this.options.confirmTimeoutMs}ms`,
          ),
        );
      }, this.options.confirmTimeoutMs);
      cancel = () => {
        clearTimeout(timer);
        waiters.delete(waiter);
      };
      waiters.add(waiter);
    });
    return { promise, cancel };
  }

  private handleMessage(topic: string, payload: string): void {
    const slash = topic.lastIndexOf("/");
    const leaf = topic.slice(slash + 1);
    const head = topic.slice(0, slash);

    const telePrefix = `${this.definition.telePrefix}/`;
    if (leaf === "LWT" && head.startsWith(telePrefix)) {
      const deviceId = head.slice(telePrefix.length);
      const online = payload.trim().toLowerCase() === "online";
      this.availability.set(deviceId, online);
      this.options.logger.debug({ deviceId, online }, "Device availability changed");
      return;
    }

    const statPrefix = `${this.definition.statPrefix}/`;
    if (!head.startsWith(statPrefix)) return;
    const deviceId = head.slice(statPrefix.length);

    let state: boolean | null = null;
    if (leaf === "POWER") {
      state = parseOnOff(payload);
    } else if (leaf === "RESULT") {
      state = parseOnOff(this.parseResult(payload)?.POWER);
    }
    if (state !== null) this.confirm(deviceId, state);
  }

  private parseResult(payload: string): z.infer<typeof resultSchema> | null {
    let raw: unknown;
    try {
      raw = JSON.parse(payload) as unknown;
    } catch {
      return null;
    }
    const parsed = resultSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private confirm(deviceId: string, state: boolean): void {
    this.availability.set(deviceId, true);
    const waiters = this.waiters.get(deviceId);
    if (!waiters) return;
    for (const waiter of [...waiters]) {
      if (waiter.expected !== state) continue;
      waiters.delete(waiter);
      waiter.resolve();
    }
  }
}
