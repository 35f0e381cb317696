import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DeviceEntry, TransportDefinition } from "../config/types.js";
import { DeviceCommandError } from "../core/errors.js";
import { createSilentLogger } from "../logger.js";
import { MqttTransport, type MqttConnection } from "./mqtt-transport.js";

const definition: Extract<TransportDefinition, { type: "mqtt" }> = {
  type: "mqtt",
  brokerUrl: "mqtt://broker.test:1883",
  commandPrefix: "cmnd",
  statPrefix: "stat",
  telePrefix: "tele",
};

const plug: DeviceEntry = { name: "Light 1", location: "Live Room", kind: "socket", deviceId: "light1" };
const bulb: DeviceEntry = { name: "Light 5", location: "Booth", kind: "bulb", deviceId: "light5" };

class FakeConnection implements MqttConnection {
  connected = true;
  readonly published: Array<{ topic: string; payload: string }> = [];
  readonly subscriptions: string[] = [];
  reply: ((topic: string, payload: string) => void) | null = null;
  private connectListener: () => void = () => {};
  private messageListener: (topic: string, payload: Buffer) => void = () => {};

  onConnect(listener: () => void): void {
    this.connectListener = listener;
  }

  onMessage(listener: (topic: string, payload: Buffer) => void): void {
    this.messageListener = listener;
  }

  onError(): void {}

  subscribe(topics: string[]): void {
    this.subscriptions.push(...topics);
  }

  async publish(topic: string, payload: string): Promise<void> {
    this.published.push({ topic, payload });
    this.reply?.(topic, payload);
  }

  async end(): Promise<void> {
    this.connected = false;
  }

  emitConnect(): void {
    this.connectListener();
  }

  emit(topic: string, payload: string): void {
    this.messageListener(topic, Buffer.from(payload));
  }
}

function setup() {
  const connection = new FakeConnection();
  const transport = new MqttTransport(definition, {
    confirmTimeoutMs: 3000,
    logger: createSilentLogger(),
    connection,
  });
  return { connection, transport };
}

describe("MqttTransport", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("subscribes to status and availability topics on connect", () => {
    const { connection } = setup();

    connection.emitConnect();

    expect(connection.subscriptions).toEqual(["stat/+/POWER", "stat/+/RESULT", "tele/+/LWT"]);
  });

  it("switches a socket and waits for the power report", async () => {
    const { connection, transport } = setup();
    connection.reply = (topic, payload) => {
      if (topic === "cmnd/light1/POWER") connection.emit("stat/light1/POWER", payload);
    };

    const handle = await transport.resolve(plug);
    await handle?.setState({ on: true });

    expect(handle?.address).toBe("cmnd/light1");
    expect(connection.published).toEqual([{ topic: "cmnd/light1/POWER", payload: "ON" }]);
  });

  it("sets a bulb's dimmer when turning it on and confirms through RESULT", async () => {
    const { connection, transport } = setup();
    connection.reply = () => {
      connection.emit("stat/light5/RESULT", JSON.stringify({ POWER: "ON", Dimmer: 100 }));
    };

    const handle = await transport.resolve(bulb);
    await handle?.setState({ on: true, brightness: 100 });

    expect(connection.published).toEqual([{ topic: "cmnd/light5/Dimmer", payload: "100" }]);
  });

  it("turns a bulb off through POWER", async () => {
    const { connection, transport } = setup();
    connection.reply = () => connection.emit("stat/light5/POWER", "OFF");

    await (await transport.resolve(bulb))?.setState({ on: false });

    expect(connection.published).toEqual([{ topic: "cmnd/light5/POWER", payload: "OFF" }]);
  });

  it("fails with a timeout when the device never confirms", async () => {
    const { transport } = setup();
    const handle = await transport.resolve(plug);

    const pending = handle?.setState({ on: true });
    const assertion = expect(pending).rejects.toThrow("Light 1 did not confirm on within 3000ms");
    await vi.advanceTimersByTimeAsync(3000);

    await assertion;
  });

  it("ignores a report of the opposite state", async () => {
    const { connection, transport } = setup();
    const handle = await transport.resolve(plug);

    let confirmed = false;
    const pending = handle?.setState({ on: false }).then(() => {
      confirmed = true;
    });
    connection.emit("stat/light1/POWER", "ON");
    await vi.advanceTimersByTimeAsync(10);
    expect(confirmed).toBe(false);

    connection.emit("stat/light1/POWER", "OFF");
    await pending;
    expect(confirmed).toBe(true);
  });

  it("treats a device whose last will says Offline as missing", async () => {
    const { connection, transport } = setup();

    connection.emit("tele/light1/LWT", "Offline");
    connection.emit("tele/light5/LWT", "Online");

    expect(await transport.resolve(plug)).toBeNull();
    expect(await transport.discover()).toEqual([{ deviceId: "light5", address: "cmnd/light5" }]);
  });

  it("reports an unconnected broker as unreachable", async () => {
    const { connection, transport } = setup();
    connection.connected = false;

    const failure = transport.resolve(plug);
    const assertion = expect(failure).rejects.toMatchObject({
      kind: "unreachable",
      message: "MQTT broker mqtt://broker.test:1883 is not connected",
    });
    await vi.advanceTimersByTimeAsync(3000);

    await assertion;
    await expect(failure).rejects.toBeInstanceOf(DeviceCommandError);
  });

  it("waits for the first connection before resolving", async () => {
    const { connection, transport } = setup();
    connection.connected = false;

    const pending = transport.resolve(plug);
    await vi.advanceTimersByTimeAsync(500);
    connection.connected = true;
    connection.emitConnect();

    expect((await pending)?.address).toBe("cmnd/light1");
  });

  it("fails pending confirmations and clears their timers on close", async () => {
    const { transport } = setup();
    const handle = await transport.resolve(plug);

    const pending = handle?.setState({ on: true });
    const assertion = expect(pending).rejects.toMatchObject({
      kind: "unreachable",
      message: "MQTT transport for mqtt://broker.test:1883 closed",
    });
    await vi.advanceTimersByTimeAsync(10);
    await transport.close();

    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });
});
