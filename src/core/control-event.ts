export const SIGNALS = ["play", "record"] as const;
export const SIGNAL_VALUES = ["on", "off"] as const;

export type Signal = (typeof SIGNALS)[number];

export type SignalValue = (typeof SIGNAL_VALUES)[number];

export type ControlEvent = Readonly<{
  signal: Signal;
  value: SignalValue;
  receivedAt: number;
}>;

export function controlEvent(signal: Signal, value: SignalValue, receivedAt = Date.now()): ControlEvent {
  return Object.freeze({ signal, value, receivedAt });
}
