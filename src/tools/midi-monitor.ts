import { loadRuntimeConfig } from "../config/load-config.js";
import type { ControlSourceDefinition } from "../config/types.js";
import { UdpMidiSource } from "../control/udp-midi-source.js";
import { createLogger } from "../logger.js";
import { parseToolArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2));
  const config = await loadRuntimeConfig(args.config);
  const configured = config.control.source.type === "udp-midi" ? config.control.source : null;

  const definition: Extract<ControlSourceDefinition, { type: "udp-midi" }> = {
    type: "udp-midi",
    host: args.host ?? configured?.host ?? "0.0.0.0",
    port: args.port ?? configured?.port ?? 21928,
  };
  const group = args.group ?? configured?.multicastGroup;
  if (group) definition.multicastGroup = group;

  // Debug level prints every ignored message too.
  const logger = createLogger({ level: "debug" });
  const source = new UdpMidiSource(definition, config.control, logger);

  console.log(
    `Waiting for CC ${config.control.playController} (play) and CC ${config.control.recordController} (record)` +
      ` on ${definition.host}:${definition.port}${group ? ` group ${group}` : ""}. Ctrl+C to exit.`,
  );
  await source.start((event) => {
    console.log(`${new Date(event.receivedAt).toISOString()}  ${event.signal.padEnd(6)} ${event.value}`);
  });

  process.once("SIGINT", () => {
    source.stop().then(
      () => console.log("\nMIDI monitor stopped"),
      (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
      },
    );
  });
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
