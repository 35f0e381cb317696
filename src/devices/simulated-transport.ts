import type { DeviceEntry } from "../config/types.js";
import { DeviceCommandError, type DeviceFailureKind } from "../core/errors.js";
import type { DeviceCommand, DeviceHandle, DeviceTransport, DiscoveredDevice } from "./device-transport.js";

export type SimulatedBehavior = {
  latencyMs?: number;
  /** Commands never complete. */
  hang?: boolean;
  fail?: DeviceFailureKind;
  /** Device is not found on the network. */
  missing?: boolean;
};

export type SimulatedCommand = DeviceCommand & { deviceId: string };

function delay(ms: number): Promise<void> {
  return new Promise((resolvePromise) => {
    setTimeout(resolvePromise, ms);
  });
}

/** In-process fleet for dry runs and tests. */
export class SimulatedTransport implements DeviceTransport {
  readonly id = "simulator";
  private readonly states = new Map<string, boolean>();
  private readonly behaviors = new Map<string, SimulatedBehavior>();
  private readonly listeners = new Set<(command: SimulatedCommand) => void>();
  readonly resolutions: string[] = [];

  constructor(
    private readonly entries: readonly DeviceEntry[] = [],
    private readonly latencyMs = 0,
  ) {
    for (const entry of entries) {
      this.states.set(entry.deviceId, false);
    }
  }

  setBehavior(deviceId: string, behavior: SimulatedBehavior): void {
    this.behaviors.set(deviceId, behavior);
  }

  getState(deviceId: string): boolean | undefined {
    return this.states.get(deviceId);
  }

  subscribe(listener: (command: SimulatedCommand) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async resolve(entry: DeviceEntry): Promise<DeviceHandle | null> {
    this.resolutions.push(entry.deviceId);
    if (this.behaviors.get(entry.deviceId)?.missing) return null;
    return {
      deviceId: entry.deviceId,
      address: `sim://${entry.deviceId}`,
      setState: (command) => this.apply(entry.deviceId, command),
    };
  }

  async discover(): Promise<DiscoveredDevice[]> {
    return this.entries
      .filter((entry) => !this.behaviors.get(entry.deviceId)?.missing)
      .map((entry) => ({
        deviceId: entry.deviceId,
        address: `sim://${entry.deviceId}`,
        alias: entry.name,
        kind: entry.kind,
        isOn: this.states.get(entry.deviceId) ?? false,
      }));
  }

  async close(): Promise<void> {
    this.listeners.clear();
  }

  private async apply(deviceId: string, command: DeviceCommand): Promise<void> {
    const behavior = this.behaviors.get(deviceId) ?? {};
    if (behavior.hang) {
      await new Promise<never>(() => {});
    }
    const latencyMs = behavior.latencyMs ?? this.latencyMs;
    if (latencyMs > 0) await delay(latencyMs);
    if (behavior.fail) {
      throw new DeviceCommandError(behavior.fail, `Simulated ${behavior.fail} failure for ${deviceId}`);
    }

    this.states.set(deviceId, command.on);
    for (const listener of this.listeners) {
      listener({ deviceId, ...command });
    }
  }
}
