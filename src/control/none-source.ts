import type { ControlSource } from "./control-source.js";

/** No inbound transport; events arrive through the HTTP and WebSocket surface only. */
export class NoneSource implements ControlSource {
  readonly id = "none";

  async start(): Promise<void> {}

  async stop(): Promise<void> {}
}
