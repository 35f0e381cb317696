import { z } from "zod";
import type { DeviceKind } from "../config/types.js";
import { DeviceCommandError } from "../core/errors.js";
import type { DeviceCommand, DiscoveredDevice } from "./device-transport.js";

export const KASA_PORT = 9999;
const INITIAL_KEY = 171;
const BULB_SERVICE = "smartlife.iot.smartbulb.lightingservice";

export type KasaCommand = Record<string, Record<string, unknown>>;

export const SYSINFO_COMMAND: KasaCommand = { system: { get_sysinfo: {} } };

/** XOR autokey cipher used by the local protocol; each output byte keys the next. */
export function encrypt(plain: string): Buffer {
  const input = Buffer.from(plain, "utf8");
  const output = Buffer.alloc(input.length);
  let key = INITIAL_KEY;
  for (let i = 0; i < input.length; i += 1) {
    key = input[i] ^ key;
    output[i] = key;
  }
  return output;
}

export function decrypt(data: Uint8Array): string {
  const output = Buffer.alloc(data.length);
  let key = INITIAL_KEY;
  for (let i = 0; i < data.length; i += 1) {
    const byte = data[i];
    output[i] = byte ^ key;
    key = byte;
  }
  return output.toString("utf8");
}

export function encodeCommand(command: KasaCommand): Buffer {
  return encrypt(JSON.stringify(command));
}

export function decodeResponse(data: Uint8Array): unknown {
  const text = decrypt(data);
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new DeviceCommandError("protocol", "Device sent a response that is not JSON", { cause: error });
  }
}

export function buildSetStateCommand(kind: DeviceKind, command: DeviceCommand): KasaCommand {
  if (kind === "socket") {
    return { system: { set_relay_state: { state: command.on ? 1 : 0 } } };
  }
  const lightState: Record<string, number> = { on_off: command.on ? 1 : 0, transition_period: 0 };
  if (command.on && command.brightness !== undefined) {
    lightState.brightness = command.brightness;
  }
  return { [BULB_SERVICE]: { transition_light_state: lightState } };
}

const sysinfoSchema = z.object({
  system: z.object({
    get_sysinfo: z.object({
      deviceId: z.string().min(1),
      alias: z.string().optional(),
      model: z.string().optional(),
      type: z.string().optional(),
      mic_type: z.string().optional(),
      relay_state: z.number().optional(),
      light_state: z.object({ on_off: z.number() }).partial().optional(),
    }),
  }),
});

export function parseSysinfo(response: unknown, address: string): DiscoveredDevice | null {
  const parsed = sysinfoSchema.safeParse(response);
  if (!parsed.success) return null;
  const info = parsed.data.system.get_sysinfo;
  const type = (info.type ?? info.mic_type ?? "").toUpperCase();

  const device: DiscoveredDevice = {
    deviceId: info.deviceId,
    address,
    kind: type.includes("BULB") ? "bulb" : "socket",
  };
  if (info.alias !== undefined) device.alias = info.alias;
  if (info.model !== undefined) device.model = info.model;
  if (info.relay_state !== undefined) {
    device.isOn = info.relay_state === 1;
  } else if (info.light_state?.on_off !== undefined) {
    device.isOn = info.light_state.on_off === 1;
  }
  return device;
}

export type KasaError = { code: number; message?: string };

/** First non-zero `err_code` anywhere in a response. */
export function findErrorCode(response: unknown): KasaError | null {
  if (typeof response !== "object" || response === null) return null;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(response));
  const code = record.err_code;
  if (typeof code === "number" && code !== 0) {
    const message = record.err_msg;
    return typeof message === "string" ? { code, message } : { code };
  }
  for (const value of Object.values(record)) {
    const nested = findErrorCode(value);
    if (nested) return nested;
  }
  return null;
}

export function assertSuccess(response: unknown, context: string): void {
  const error = findErrorCode(response);
  if (!error) return;
  const suffix = error.message ? `: ${error.message}` : "";
  throw new DeviceCommandError("protocol", `${context} failed with err_code ${error.code}${suffix}`);
}
