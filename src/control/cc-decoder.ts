import type { ControlDefinition } from "../config/types.js";
import { controlEvent, type ControlEvent, type Signal } from "../core/control-event.js";

const CONTROL_CHANGE = 0xb0;
const SYSEX_START = 0xf0;
const SYSEX_END = 0xf7;
const REALTIME_MIN = 0xf8;

export type MidiMessage = readonly number[];

export type ControlMapping = Pick<
  ControlDefinition,
  "channel" | "playController" | "recordController" | "valueMode" | "threshold"
>;

export type DecodeResult =
  | { kind: "event"; event: ControlEvent }
  | { kind: "ignored" }
  | { kind: "malformed"; reason: string };

function dataLength(status: number): number {
  const type = status & 0xf0;
  return type === 0xc0 || type === 0xd0 ? 1 : 2;
}

/**
 * Splits a raw MIDI byte stream into channel messages. Running status is
 * honoured; realtime bytes, SysEx and system common messages are skipped, and
 * an incomplete trailing message is discarded.
 */
export function parseMidiStream(bytes: Iterable<number>): number[][] {
  const messages: number[][] = [];
  let running: number | null = null;
  let current: number[] = [];
  let inSysex = false;

  for (const byte of bytes) {
    if (byte >= REALTIME_MIN) continue;

    if (inSysex) {
      if (byte < 0x80) continue;
      inSysex = false;
      if (byte === SYSEX_END) continue;
    }

    if (byte === SYSEX_START) {
      inSysex = true;
      running = null;
      current = [];
      continue;
    }
    if (byte >= SYSEX_START) {
      running = null;
      current = [];
      continue;
    }
    if (byte >= 0x80) {
      running = byte;
      current = [byte];
      continue;
    }

    if (running === null) continue;
    if (current.length === 0) current = [running];
    current.push(byte);
    if (current.length === dataLength(running) + 1) {
      messages.push(current);
      current = [];
    }
  }

  return messages;
}

function signalFor(controller: number, mapping: ControlMapping): Signal | null {
  if (controller === mapping.playController) return "play";
  if (controller === mapping.recordController) return "record";
  return null;
}

export function decodeControlChange(
  message: MidiMessage,
  mapping: ControlMapping,
  receivedAt = Date.now(),
): DecodeResult {
  const [status, controller, value] = message;
  if (status === undefined || (status & 0xf0) !== CONTROL_CHANGE) return { kind: "ignored" };
  if (mapping.channel !== undefined && (status & 0x0f) + 1 !== mapping.channel) return { kind: "ignored" };

  if (controller === undefined || value === undefined || message.length !== 3) {
    return { kind: "malformed", reason: `Control change needs 2 data bytes, got ${message.length - 1}` };
  }
  if (controller > 0x7f || value > 0x7f) {
    return { kind: "malformed", reason: `Data byte out of range in [${message.join(", ")}]` };
  }

  const signal = signalFor(controller, mapping);
  if (signal === null) return { kind: "ignored" };

  if (mapping.valueMode === "binary") {
    if (value === 127) return { kind: "event", event: controlEvent(signal, "on", receivedAt) };
    if (value === 0) return { kind: "event", event: controlEvent(signal, "off", receivedAt) };
    return { kind: "malformed", reason: `CC ${controller} value ${value} is neither 0 nor 127` };
  }

  return { kind: "event", event: controlEvent(signal, value >= mapping.threshold ? "on" : "off", receivedAt) };
}
