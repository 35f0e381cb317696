import { loadRuntimeConfig } from "../config/load-config.js";
import { createTransport } from "../devices/create-transport.js";
import { buildDiscoveryReport, formatDiscoveryReport } from "../devices/discovery-report.js";
import { createLogger } from "../logger.js";
import { parseToolArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2));
  const config = await loadRuntimeConfig(args.config);
  const logger = createLogger({ level: args.debug ? "debug" : "warn" });
  const transport = createTransport(config, logger);

  try {
    if (!transport.discover) {
      console.log(`The ${transport.id} transport cannot list devices; resolving each configured device instead.`);
      for (const entry of config.devices) {
        const handle = await transport.resolve(entry);
        console.log(`  ${handle ? "✓" : "✗"} ${entry.name} (${entry.location}) ${handle?.address ?? "not found"}`);
      }
      return;
    }

    console.log(`Discovering ${transport.id} devices...`);
    const discovered = await transport.discover();
    const report = buildDiscoveryReport(config.devices, discovered);
    for (const line of formatDiscoveryReport(report)) {
      console.log(line);
    }
    if (report.missing.length > 0) process.exitCode = 2;
  } finally {
    await transport.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
