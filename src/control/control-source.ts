import type { ControlEvent } from "../core/control-event.js";

export type ControlEventHandler = (event: ControlEvent) => void;

/** Inbound transport of control events. `start` rejects with a ControlSourceError when it cannot listen. */
export interface ControlSource {
  readonly id: string;
  start(onEvent: ControlEventHandler): Promise<void>;
  stop(): Promise<void>;
}
