import { z } from "zod";
import { SIGNALS, SIGNAL_VALUES, type Signal, type SignalValue } from "../core/control-event.js";
import type { ReconcilerEvent, ReconcilerStatus } from "../core/reconciler.js";

export type ServerEvent = { type: "status"; payload: ReconcilerStatus } | ReconcilerEvent;

export type ClientEvent =
  | { type: "override"; payload: { on: boolean } }
  | { type: "control"; payload: { signal: Signal; value: SignalValue } };

const signalSchema = z.enum(SIGNALS);
const signalValueSchema = z.enum(SIGNAL_VALUES);

export const overridePayloadSchema = z.object({ on: z.boolean() });
export const controlPayloadSchema = z.object({ signal: signalSchema, value: signalValueSchema });

const clientEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("override"), payload: overridePayloadSchema }),
  z.object({ type: z.literal("control"), payload: controlPayloadSchema }),
]);

/** Null for anything that is not a well-formed client event. */
export function parseClientEvent(raw: string): ClientEvent | null {
  let value: unknown;
  try {
    value = JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
  const parsed = clientEventSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
