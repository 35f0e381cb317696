import dgram from "node:dgram";
import type { ControlSourceDefinition } from "../config/types.js";
import type { ControlEvent } from "../core/control-event.js";
import { ControlSourceError, asErrorMessage } from "../core/errors.js";
import type { Logger } from "../logger.js";
import { decodeControlChange, parseMidiStream, type ControlMapping, type MidiMessage } from "./cc-decoder.js";
import type { ControlEventHandler, ControlSource } from "./control-source.js";

type UdpMidiDefinition = Extract<ControlSourceDefinition, { type: "udp-midi" }>;

export type DecodedPacket = {
  events: ControlEvent[];
  malformed: Array<{ message: MidiMessage; reason: string }>;
  ignored: MidiMessage[];
};

export function decodePacket(data: Uint8Array, mapping: ControlMapping, receivedAt = Date.now()): DecodedPacket {
  const packet: DecodedPacket = { events: [], malformed: [], ignored: [] };
  for (const message of parseMidiStream(data)) {
    const result = decodeControlChange(message, mapping, receivedAt);
    switch (result.kind) {
      case "event":
        packet.events.push(result.event);
        break;
      case "malformed":
        packet.malformed.push({ message, reason: result.reason });
        break;
      case "ignored":
        packet.ignored.push(message);
        break;
    }
  }
  return packet;
}

/** Raw MIDI bytes over UDP, as sent by ipMIDI-style network MIDI drivers. */
export class UdpMidiSource implements ControlSource {
  readonly id = "udp-midi";
  private socket: dgram.Socket | null = null;

  constructor(
    private readonly definition: UdpMidiDefinition,
    private readonly mapping: ControlMapping,
    private readonly logger: Logger,
  ) {}

  async start(onEvent: ControlEventHandler): Promise<void> {
    if (this.socket) return;
    const { host, port, multicastGroup } = this.definition;
    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });

    try {
      await new Promise<void>((resolvePromise, rejectPromise) => {
        socket.once("error", rejectPromise);
        socket.bind(port, host, () => {
          socket.off("error", rejectPromise);
          resolvePromise();
        });
      });
      if (multicastGroup) socket.addMembership(multicastGroup);
    } catch (error) {
      socket.close();
      throw new ControlSourceError(`Could not listen for MIDI on ${host}:${port}: ${asErrorMessage(error)}`, {
        cause: error,
      });
    }

    socket.on("message", (data, remote) => {
      this.handlePacket(data, remote.address, onEvent);
    });
    socket.on("error", (error) => {
      this.logger.error({ error: error.message }, "MIDI socket error");
    });
    this.socket = socket;
    this.logger.info({ host, port, multicastGroup }, "Listening for MIDI control changes");
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    await new Promise<void>((resolvePromise) => {
      socket.close(() => resolvePromise());
    });
  }

  private handlePacket(data: Buffer, from: string, onEvent: ControlEventHandler): void {
    const packet = decodePacket(data, this.mapping);
    for (const { message, reason } of packet.malformed) {
      this.logger.warn({ from, message, reason }, "Dropped malformed MIDI message");
    }
    if (packet.ignored.length > 0) {
      this.logger.debug({ from, messages: packet.ignored }, "Ignored MIDI messages");
    }
    for (const event of packet.events) {
      onEvent(event);
    }
  }
}
