import type { DeviceEntry } from "../config/types.js";
import { asErrorMessage } from "../core/errors.js";
import type { Logger } from "../logger.js";
import type { DeviceHandle, DeviceTransport } from "./device-transport.js";

export type WarmupReport = {
  resolved: DeviceEntry[];
  missing: DeviceEntry[];
};

export class DeviceRegistry {
  private readonly entries: ReadonlyMap<string, DeviceEntry>;
  private readonly handles = new Map<string, DeviceHandle>();
  private readonly resolving = new Map<string, Promise<DeviceHandle | null>>();
  private readonly invalidations = new Map<string, number>();

  constructor(
    entries: readonly DeviceEntry[],
    private readonly transport: DeviceTransport,
    private readonly logger: Logger,
  ) {
    this.entries = new Map(entries.map((entry) => [entry.deviceId, { ...entry }]));
  }

  all(): DeviceEntry[] {
    return [...this.entries.values()];
  }

  get(deviceId: string): DeviceEntry | undefined {
    return this.entries.get(deviceId);
  }

  isResolved(deviceId: string): boolean {
    return this.handles.has(deviceId);
  }

  /**
   * Cached handle, or a fresh resolution shared by concurrent callers. Null is
   * never cached, nor is a handle whose resolution outlived an `invalidate`.
   */
  async resolve(deviceId: string): Promise<DeviceHandle | null> {
    const cached = this.handles.get(deviceId);
    if (cached) return cached;

    const entry = this.entries.get(deviceId);
    if (!entry) return null;

    let pending = this.resolving.get(deviceId);
    if (!pending) {
      const started = this.transport.resolve(entry).finally(() => {
        if (this.resolving.get(deviceId) === started) this.resolving.delete(deviceId);
      });
      this.resolving.set(deviceId, started);
      pending = started;
    }

    const invalidation = this.invalidations.get(deviceId) ?? 0;
    const handle = await pending;
    if (handle && invalidation === (this.invalidations.get(deviceId) ?? 0)) {
      if (!this.handles.has(deviceId)) {
        this.logger.debug({ deviceId, name: entry.name, address: handle.address }, "Device resolved");
      }
      this.handles.set(deviceId, handle);
    }
    return handle;
  }

  invalidate(deviceId: string): void {
    this.invalidations.set(deviceId, (this.invalidations.get(deviceId) ?? 0) + 1);
    this.handles.delete(deviceId);
    this.resolving.delete(deviceId);
    this.transport.forget?.(deviceId);
  }

  /** Resolves every device once and logs the ones that could not be found. */
  async warm(): Promise<WarmupReport> {
    const report: WarmupReport = { resolved: [], missing: [] };
    const entries = this.all();
    const outcomes = await Promise.all(
      entries.map(async (entry) => {
        try {
          return (await this.resolve(entry.deviceId)) !== null;
        } catch (error) {
          this.logger.warn({ deviceId: entry.deviceId, error: asErrorMessage(error) }, "Device resolution failed");
          return false;
        }
      }),
    );

    entries.forEach((entry, index) => {
      if (outcomes[index]) {
        report.resolved.push(entry);
        this.logger.info({ deviceId: entry.deviceId, location: entry.location }, `Matched ${entry.name}`);
      } else {
        report.missing.push(entry);
      }
    });

    if (report.missing.length > 0) {
      this.logger.warn(
        { missing: report.missing.map((entry) => `${entry.name} (${entry.location})`) },
        `Could not find ${report.missing.length} devices; will retry on the next actuation`,
      );
    }
    return report;
  }
}
