import type { ControlDefinition } from "../config/types.js";
import type { Logger } from "../logger.js";
import type { ControlSource } from "./control-source.js";
import { NoneSource } from "./none-source.js";
import { UdpMidiSource } from "./udp-midi-source.js";

export function createControlSource(control: ControlDefinition, logger: Logger): ControlSource {
  switch (control.source.type) {
    case "udp-midi":
      return new UdpMidiSource(control.source, control, logger.child({ component: "midi" }));
    case "none":
      return new NoneSource();
  }
}
