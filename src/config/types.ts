export type DeviceKind = "socket" | "bulb";

export type DeviceEntry = {
  name: string;
  location: string;
  kind: DeviceKind;
  /** Hardware identifier reported by the device; the only key used for addressing. */
  deviceId: string;
  /** Optional fixed network address, verified against `deviceId` before use. */
  host?: string;
};

export type ValueMode = "threshold" | "binary";

export type ControlSourceDefinition =
  | {
      type: "udp-midi";
      host: string;
      port: number;
      multicastGroup?: string;
    }
  | {
      type: "none";
    };

export type ControlDefinition = {
  source: ControlSourceDefinition;
  /** MIDI channel 1-16; omitted means any channel. */
  channel?: number;
  playController: number;
  recordController: number;
  valueMode: ValueMode;
  threshold: number;
  debounceMs: number;
  queueCapacity: number;
};

export type ActuationDefinition = {
  commandTimeoutMs: number;
  bulbBrightness: number;
  syncOnStart: boolean;
};

export type TransportDefinition =
  | {
      type: "kasa";
      port: number;
      broadcastAddress: string;
      discoveryTimeoutMs: number;
      discoveryCacheMs: number;
    }
  | {
      type: "mqtt";
      brokerUrl: string;
      clientId?: string;
      username?: string;
      password?: string;
      commandPrefix: string;
      statPrefix: string;
      telePrefix: string;
    }
  | {
      type: "simulator";
      latencyMs: number;
    };

export type ServerDefinition = {
  enabled: boolean;
  host: string;
  port: number;
};

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type LoggingDefinition = {
  level: LogLevel;
  file?: string;
};

export type RuntimeConfig = {
  control: ControlDefinition;
  actuation: ActuationDefinition;
  transport: TransportDefinition;
  server: ServerDefinition;
  logging: LoggingDefinition;
  devices: DeviceEntry[];
};
