import { createInterface } from "node:readline/promises";
import { loadRuntimeConfig } from "../config/load-config.js";
import type { ActuationResult, Actuator } from "../core/actuator.js";
import { createDeviceStack } from "../device-stack.js";
import { createLogger } from "../logger.js";
import { parseToolArgs } from "./args.js";

function printResults(results: ActuationResult[]): void {
  for (const result of results) {
    const mark = result.outcome === "success" ? "✓" : "✗";
    const detail = result.detail ? ` (${result.detail})` : "";
    console.log(`  ${mark} ${result.name}: ${result.outcome} in ${result.durationMs}ms${detail}`);
  }
}

async function interactive(actuator: Actuator): Promise<void> {
  console.log("Commands: on, off, status, exit");
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const command = (await prompt.question("\nEnter command (on/off/status/exit): ")).trim().toLowerCase();
      if (command === "exit") return;
      if (command === "on" || command === "off") {
        printResults(await actuator.setAll(command === "on"));
      } else if (command === "status") {
        printResults(actuator.lastResults());
      } else {
        console.log("Invalid command. Use on, off, status or exit.");
      }
    }
  } finally {
    prompt.close();
  }
}

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2));
  const config = await loadRuntimeConfig(args.config);
  const logger = createLogger({ level: args.debug ? "debug" : "warn" });
  const { transport, registry, actuator } = createDeviceStack(config, logger);

  try {
    const report = await registry.warm();
    console.log(`Connected to ${report.resolved.length} of ${config.devices.length} devices`);

    const command = args.positionals[0]?.toLowerCase();
    if (command === "on" || command === "off") {
      const results = await actuator.setAll(command === "on");
      printResults(results);
      if (results.some((result) => result.outcome !== "success")) process.exitCode = 2;
      return;
    }
    if (command !== undefined) {
      throw new Error(`Unknown command: ${command}. Use on or off, or no argument for a prompt.`);
    }
    await interactive(actuator);
  } finally {
    await transport.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
