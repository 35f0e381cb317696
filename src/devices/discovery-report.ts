import type { DeviceEntry } from "../config/types.js";
import type { DiscoveredDevice } from "./device-transport.js";

export type DiscoveryReport = {
  found: Array<{ entry: DeviceEntry; device: DiscoveredDevice }>;
  missing: DeviceEntry[];
  unexpected: DiscoveredDevice[];
};

export function buildDiscoveryReport(
  configured: readonly DeviceEntry[],
  discovered: readonly DiscoveredDevice[],
): DiscoveryReport {
  const byId = new Map(discovered.map((device) => [device.deviceId, device]));
  const report: DiscoveryReport = { found: [], missing: [], unexpected: [] };

  for (const entry of configured) {
    const device = byId.get(entry.deviceId);
    if (device) {
      report.found.push({ entry, device });
      byId.delete(entry.deviceId);
    } else {
      report.missing.push(entry);
    }
  }
  report.unexpected = [...byId.values()];
  return report;
}

export function formatDiscoveryReport(report: DiscoveryReport): string[] {
  const lines = [`Found ${report.found.length} of ${report.found.length + report.missing.length} configured devices`];
  for (const { entry, device } of report.found) {
    const state = device.isOn === undefined ? "" : device.isOn ? " [on]" : " [off]";
    lines.push(`  ✓ ${entry.name} (${entry.location}) at ${device.address}${state}`);
  }
  for (const entry of report.missing) {
    lines.push(`  ✗ ${entry.name} (${entry.location}) ${entry.deviceId} not found`);
  }
  if (report.unexpected.length > 0) {
    lines.push(`Unexpected devices on the network: ${report.unexpected.length}`);
    for (const device of report.unexpected) {
      lines.push(`  ? ${device.alias ?? "(no alias)"} ${device.deviceId} at ${device.address}`);
    }
  }
  return lines;
}
