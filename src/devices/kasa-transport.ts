import dgram from "node:dgram";
import type { DeviceEntry, TransportDefinition } from "../config/types.js";
import { DeviceCommandError, asErrorMessage } from "../core/errors.js";
import type { Logger } from "../logger.js";
import type { DeviceHandle, DeviceTransport, DiscoveredDevice } from "./device-transport.js";
import {
  SYSINFO_COMMAND,
  assertSuccess,
  buildSetStateCommand,
  decodeResponse,
  encodeCommand,
  parseSysinfo,
  type KasaCommand,
} from "./kasa-protocol.js";

type KasaDefinition = Extract<TransportDefinition, { type: "kasa" }>;

export type KasaReply = { address: string; response: unknown };

export interface KasaClient {
  request(host: string, command: KasaCommand, timeoutMs: number): Promise<unknown>;
  /** Collects replies for `timeoutMs`; `onReply` sees each one as it arrives. */
  broadcast(command: KasaCommand, timeoutMs: number, onReply?: (reply: KasaReply) => void): Promise<KasaReply[]>;
  close(): Promise<void>;
}

export class UdpKasaClient implements KasaClient {
  constructor(
    private readonly port: number,
    private readonly broadcastAddress: string,
  ) {}

  request(host: string, command: KasaCommand, timeoutMs: number): Promise<unknown> {
    const socket = dgram.createSocket("udp4");
    return new Promise<unknown>((resolvePromise, rejectPromise) => {
      let done = false;
      const finish = (error: Error | null, response?: unknown) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        socket.close();
        if (error) rejectPromise(error);
        else resolvePromise(response);
      };
      const timer = setTimeout(() => {
        finish(new DeviceCommandError("timeout", `No reply from ${host} within ${timeoutMs}ms`));
      }, timeoutMs);

      socket.once("message", (data) => {
        try {
          finish(null, decodeResponse(data));
        } catch (error) {
          finish(error instanceof Error ? error : new DeviceCommandError("protocol", asErrorMessage(error)));
        }
      });
      socket.once("error", (error) => {
        finish(new DeviceCommandError("unreachable", `${host}: ${error.message}`, { cause: error }));
      });
      socket.send(encodeCommand(command), this.port, host, (error) => {
        if (error) finish(new DeviceCommandError("unreachable", `${host}: ${error.message}`, { cause: error }));
      });
    });
  }

  /** Undecodable replies carry a null response. */
  broadcast(command: KasaCommand, timeoutMs: number, onReply?: (reply: KasaReply) => void): Promise<KasaReply[]> {
    const socket = dgram.createSocket("udp4");
    const replies: KasaReply[] = [];
    return new Promise<KasaReply[]>((resolvePromise, rejectPromise) => {
      let done = false;
      const finish = (error: Error | null) => {
        if (done) return;
        done = true;
        socket.close();
        if (error) rejectPromise(error);
        else resolvePromise(replies);
      };

      socket.on("message", (data, remote) => {
        let reply: KasaReply;
        try {
          reply = { address: remote.address, response: decodeResponse(data) };
        } catch {
          reply = { address: remote.address, response: null };
        }
        replies.push(reply);
        onReply?.(reply);
      });
      socket.once("error", (error) => {
        finish(new DeviceCommandError("unreachable", `Discovery failed: ${error.message}`, { cause: error }));
      });
      socket.bind(() => {
        socket.setBroadcast(true);
        socket.send(encodeCommand(command), this.port, this.broadcastAddress);
        setTimeout(() => finish(null), timeoutMs);
      });
    });
  }

  async close(): Promise<void> {}
}

export type KasaTransportOptions = {
  requestTimeoutMs: number;
  logger: Logger;
  client?: KasaClient;
};

type DiscoveryCache = { at: number; devices: Map<string, DiscoveredDevice> };

/** TP-Link Kasa sockets and bulbs over the local UDP protocol, matched by device id. */
export class KasaTransport implements DeviceTransport {
  readonly id = "kasa";
  private readonly client: KasaClient;
  private cache: DiscoveryCache | null = null;
  private discovering: Promise<DiscoveredDevice[]> | null = null;
  private readonly lookups = new Map<string, Set<(device: DiscoveredDevice) => void>>();

  constructor(
    private readonly definition: KasaDefinition,
    private readonly options: KasaTransportOptions,
  ) {
    this.client = options.client ?? new UdpKasaClient(definition.port, definition.broadcastAddress);
  }

  async resolve(entry: DeviceEntry): Promise<DeviceHandle | null> {
    if (entry.host) {
      const verified = await this.verifyHost(entry, entry.host);
      if (verified) return this.handleFor(entry, entry.host);
    }

    const found = this.cachedDevice(entry.deviceId) ?? (await this.locate(entry.deviceId));
    return found ? this.handleFor(entry, found.address) : null;
  }

  /** Broadcast discovery; concurrent callers share one round. */
  discover(): Promise<DiscoveredDevice[]> {
    if (!this.discovering) {
      this.discovering = this.runDiscovery().finally(() => {
        this.discovering = null;
      });
    }
    return this.discovering;
  }

  forget(deviceId: string): void {
    this.cache?.devices.delete(deviceId);
  }

  async close(): Promise<void> {
    this.cache = null;
    await this.client.close();
  }

  /** Settles on the first reply from `deviceId`, or when the discovery round ends without one. */
  private async locate(deviceId: string): Promise<DiscoveredDevice | undefined> {
    const listeners = this.lookups.get(deviceId) ?? new Set<(device: DiscoveredDevice) => void>();
    this.lookups.set(deviceId, listeners);
    let notify: (device: DiscoveredDevice) => void = () => {};
    const replied = new Promise<DiscoveredDevice>((resolvePromise) => {
      notify = resolvePromise;
    });
    listeners.add(notify);

    try {
      const finished = this.discover().then((devices) => devices.find((device) => device.deviceId === deviceId));
      return await Promise.race([replied, finished]);
    } finally {
      listeners.delete(notify);
      if (listeners.size === 0) this.lookups.delete(deviceId);
    }
  }

  private async runDiscovery(): Promise<DiscoveredDevice[]> {
    const replies = await this.client.broadcast(SYSINFO_COMMAND, this.definition.discoveryTimeoutMs, (reply) => {
      const device = parseSysinfo(reply.response, reply.address);
      if (!device) return;
      for (const listener of this.lookups.get(device.deviceId) ?? []) listener(device);
    });
    const devices = new Map<string, DiscoveredDevice>();
    for (const reply of replies) {
      const device = parseSysinfo(reply.response, reply.address);
      if (device && !devices.has(device.deviceId)) {
        devices.set(device.deviceId, device);
      }
    }
    this.cache = { at: Date.now(), devices };
    this.options.logger.debug({ found: devices.size }, "Kasa discovery finished");
    return [...devices.values()];
  }

  private cachedDevice(deviceId: string): DiscoveredDevice | undefined {
    if (!this.cache) return undefined;
    if (Date.now() - this.cache.at >= this.definition.discoveryCacheMs) return undefined;
    return this.cache.devices.get(deviceId);
  }

  private async verifyHost(entry: DeviceEntry, host: string): Promise<boolean> {
    try {
      const response = await this.client.request(host, SYSINFO_COMMAND, this.options.requestTimeoutMs);
      const device = parseSysinfo(response, host);
      if (device?.deviceId === entry.deviceId) return true;
      this.options.logger.warn(
        { deviceId: entry.deviceId, host, reported: device?.deviceId ?? null },
        `${entry.name} host answers with another device id; falling back to discovery`,
      );
    } catch (error) {
      this.options.logger.warn(
        { deviceId: entry.deviceId, host, error: asErrorMessage(error) },
        `${entry.name} host did not answer; falling back to discovery`,
      );
    }
    return false;
  }

  private handleFor(entry: DeviceEntry, address: string): DeviceHandle {
    return {
      deviceId: entry.deviceId,
      address,
      setState: async (command) => {
        const response = await this.client.request(
          address,
          buildSetStateCommand(entry.kind, command),
          this.options.requestTimeoutMs,
        );
        assertSuccess(response, `Turning ${command.on ? "on" : "off"} ${entry.name}`);
      },
    };
  }
}
