import type { DeviceEntry, DeviceKind } from "../config/types.js";

export type DeviceCommand = {
  on: boolean;
  /** Percent, bulbs only. */
  brightness?: number;
};

export interface DeviceHandle {
  readonly deviceId: string;
  readonly address: string;
  setState(command: DeviceCommand): Promise<void>;
}

export type DiscoveredDevice = {
  deviceId: string;
  address: string;
  alias?: string;
  model?: string;
  kind?: DeviceKind;
  isOn?: boolean;
};

/**
 * Network-side device control. `resolve` returns null when the device cannot be
 * found; errors it throws are treated as failed commands, never as fatal.
 */
export interface DeviceTransport {
  readonly id: string;
  resolve(entry: DeviceEntry): Promise<DeviceHandle | null>;
  discover?(): Promise<DiscoveredDevice[]>;
  forget?(deviceId: string): void;
  close(): Promise<void>;
}
