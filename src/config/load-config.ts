import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, asErrorMessage } from "../core/errors.js";
import type { LogLevel, RuntimeConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "data/config.json";

const controllerNumber = z.number().int().min(0).max(127);
const portNumber = z.number().int().min(1).max(65535);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

// Older config files used `type` and `device_id`.
function normalizeDevice(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  if (record.kind === undefined && record.type !== undefined) record.kind = record.type;
  if (record.deviceId === undefined && record.device_id !== undefined) record.deviceId = record.device_id;
  delete record.type;
  delete record.device_id;
  return record;
}

const deviceSchema = z.preprocess(
  normalizeDevice,
  z.object({
    name: z.string().min(1),
    location: z.string().default(""),
    kind: z.string().trim().toLowerCase().pipe(z.enum(["socket", "bulb"])),
    deviceId: z.string().trim().min(1),
    host: z.string().min(1).optional(),
  }),
);

const controlSourceSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("udp-midi"),
    host: z.string().default("0.0.0.0"),
    port: portNumber.default(21928),
    multicastGroup: z.string().optional(),
  }),
  z.object({ type: z.literal("none") }),
]);

const controlSchema = z
  .object({
    source: controlSourceSchema.default({ type: "udp-midi", multicastGroup: "225.0.0.37" }),
    channel: z.number().int().min(1).max(16).optional(),
    playController: controllerNumber.default(117),
    recordController: controllerNumber.default(118),
    valueMode: z.enum(["threshold", "binary"]).default("threshold"),
    threshold: z.number().int().min(1).max(127).default(64),
    debounceMs: z.number().int().min(0).max(10_000).default(250),
    queueCapacity: z.number().int().min(1).default(256),
  })
  .refine((control) => control.playController !== control.recordController, {
    message: "playController and recordController must differ",
  });

const actuationSchema = z.object({
  commandTimeoutMs: z.number().int().min(100).max(60_000).default(3000),
  bulbBrightness: z.number().int().min(1).max(100).default(100),
  syncOnStart: z.boolean().default(true),
});

const transportSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("kasa"),
    port: portNumber.default(9999),
    broadcastAddress: z.string().default("255.255.255.255"),
    discoveryTimeoutMs: z.number().int().min(100).default(1500),
    discoveryCacheMs: z.number().int().min(0).default(60_000),
  }),
  z.object({
    type: z.literal("mqtt"),
    brokerUrl: z.string().url(),
    clientId: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    commandPrefix: z.string().default("cmnd"),
    statPrefix: z.string().default("stat"),
    telePrefix: z.string().default("tele"),
  }),
  z.object({
    type: z.literal("simulator"),
    latencyMs: z.number().int().min(0).default(50),
  }),
]);

const serverSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default("127.0.0.1"),
  port: portNumber.default(3000),
});

const loggingSchema = z.object({
  level: logLevelSchema.default("info"),
  file: z.string().min(1).optional(),
});

const configSchema = z.object({
  control: controlSchema.default({}),
  actuation: actuationSchema.default({}),
  transport: transportSchema.default({ type: "kasa" }),
  server: serverSchema.default({}),
  logging: loggingSchema.default({}),
  devices: z
    .array(deviceSchema)
    .min(1, "No devices configured")
    .superRefine((devices, context) => {
      const seen = new Set<string>();
      devices.forEach((device, index) => {
        if (seen.has(device.deviceId)) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "deviceId"],
            message: `Duplicate deviceId: ${device.deviceId}`,
          });
        }
        seen.add(device.deviceId);
      });
    }),
})
  // A device found by discovery during an actuation must still fit inside the command timeout.
  .superRefine((config, context) => {
    const { transport, actuation } = config;
    if (transport.type === "kasa" && transport.discoveryTimeoutMs >= actuation.commandTimeoutMs) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["transport", "discoveryTimeoutMs"],
        message: `must be shorter than actuation.commandTimeoutMs (${actuation.commandTimeoutMs})`,
      });
    }
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function applyEnvOverrides(config: RuntimeConfig, env: NodeJS.ProcessEnv): RuntimeConfig {
  const port = Number(env.PORT);
  const level = logLevelSchema.safeParse(env.LOG_LEVEL);
  let logLevel: LogLevel = level.success ? level.data : config.logging.level;
  if (env.RECLIGHTS_DEBUG === "1") logLevel = "debug";

  return {
    ...config,
    server: {
      ...config.server,
      port: Number.isInteger(port) && port > 0 ? port : config.server.port,
    },
    logging: { ...config.logging, level: logLevel },
  };
}

export function parseRuntimeConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): RuntimeConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return applyEnvOverrides(result.data, env);
}

export async function loadRuntimeConfig(
  configPath = process.env.RECLIGHTS_CONFIG ?? DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RuntimeConfig> {
  const fullPath = resolve(process.cwd(), configPath);

  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Configuration file not found: ${fullPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in configuration file: ${asErrorMessage(error)}`, {
      cause: error,
    });
  }

  return parseRuntimeConfig(parsed, env);
}
