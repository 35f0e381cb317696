import type { DeviceEntry } from "../config/types.js";
import type { DeviceCommand } from "../devices/device-transport.js";
import type { DeviceRegistry } from "../devices/device-registry.js";
import type { Logger } from "../logger.js";
import { DeviceCommandError, TimeoutError, asErrorMessage } from "./errors.js";
import { withTimeout } from "./timeout.js";

export type ActuationOutcome = "success" | "timeout" | "unreachable" | "protocol_error" | "superseded";

export type ActuationResult = {
  deviceId: string;
  name: string;
  requestedState: boolean;
  outcome: ActuationOutcome;
  durationMs: number;
  generation: number;
  detail?: string;
};

export type ActuatorOptions = {
  commandTimeoutMs: number;
  bulbBrightness: number;
  logger: Logger;
};

class UnresolvedDeviceError extends Error {}

function classifyFailure(error: unknown): ActuationOutcome {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof UnresolvedDeviceError) return "unreachable";
  if (error instanceof DeviceCommandError) {
    switch (error.kind) {
      case "timeout":
        return "timeout";
      case "unreachable":
        return "unreachable";
      case "protocol":
        return "protocol_error";
    }
  }
  return "protocol_error";
}

/**
 * Drives every registered device to a target state. Devices are commanded
 * concurrently; commands for the same device run one after another, and a
 * queued command is skipped once a newer batch has been dispatched.
 */
export class Actuator {
  private generation = 0;
  private readonly lanes = new Map<string, Promise<void>>();
  private readonly latest = new Map<string, ActuationResult>();

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly options: ActuatorOptions,
  ) {}

  get currentGeneration(): number {
    return this.generation;
  }

  async setAll(target: boolean): Promise<ActuationResult[]> {
    this.generation += 1;
    const generation = this.generation;
    const entries = this.registry.all();
    this.options.logger.info(
      { target, generation, devices: entries.length },
      `Turning ${target ? "on" : "off"} all recording lights`,
    );

    const results = await Promise.all(entries.map((entry) => this.actuate(entry, target, generation)));

    const failed = results.filter((result) => result.outcome !== "success" && result.outcome !== "superseded");
    const summary = {
      target,
      generation,
      succeeded: results.filter((result) => result.outcome === "success").length,
      superseded: results.filter((result) => result.outcome === "superseded").length,
      failed: failed.length,
    };
    if (failed.length > 0) {
      this.options.logger.warn(summary, "Actuation batch finished with failures");
    } else {
      this.options.logger.info(summary, "Actuation batch finished");
    }
    return results;
  }

  lastResults(): ActuationResult[] {
    return [...this.latest.values()];
  }

  private async actuate(entry: DeviceEntry, target: boolean, generation: number): Promise<ActuationResult> {
    const startedAt = Date.now();
    const previous = this.lanes.get(entry.deviceId) ?? Promise.resolve();
    const run = previous.then(() => this.command(entry, target, generation));
    const timed = withTimeout(
      run,
      this.options.commandTimeoutMs,
      `No response from ${entry.name} within ${this.options.commandTimeoutMs}ms`,
    );
    const lane = timed.then(
      () => undefined,
      () => undefined,
    );
    this.lanes.set(entry.deviceId, lane);

    let outcome: ActuationOutcome;
    let detail: string | undefined;
    try {
      outcome = await timed;
    } catch (error) {
      outcome = classifyFailure(error);
      detail = asErrorMessage(error);
    } finally {
      if (this.lanes.get(entry.deviceId) === lane) {
        this.lanes.delete(entry.deviceId);
      }
    }

    const result: ActuationResult = {
      deviceId: entry.deviceId,
      name: entry.name,
      requestedState: target,
      outcome,
      durationMs: Date.now() - startedAt,
      generation,
    };
    if (detail !== undefined) result.detail = detail;
    this.record(entry, result);
    return result;
  }

  private async command(entry: DeviceEntry, target: boolean, generation: number): Promise<ActuationOutcome> {
    if (generation < this.generation) return "superseded";

    const handle = await this.registry.resolve(entry.deviceId);
    if (!handle) {
      throw new UnresolvedDeviceError(`${entry.name} (${entry.location}) was not found on the network`);
    }
    if (generation < this.generation) return "superseded";

    await handle.setState(this.buildCommand(entry, target));
    return "success";
  }

  private buildCommand(entry: DeviceEntry, target: boolean): DeviceCommand {
    if (entry.kind === "bulb" && target) {
      return { on: true, brightness: this.options.bulbBrightness };
    }
    return { on: target };
  }

  private record(entry: DeviceEntry, result: ActuationResult): void {
    const logger = this.options.logger;
    const action = result.requestedState ? "on" : "off";
    switch (result.outcome) {
      case "success":
        logger.info({ deviceId: entry.deviceId, durationMs: result.durationMs }, `Turned ${action} ${entry.name}`);
        break;
      case "superseded":
        logger.debug({ deviceId: entry.deviceId, generation: result.generation }, `Skipped stale command for ${entry.name}`);
        return;
      case "timeout":
      case "unreachable":
        this.registry.invalidate(entry.deviceId);
        logger.warn(
          { deviceId: entry.deviceId, outcome: result.outcome, detail: result.detail },
          `Failed to turn ${action} ${entry.name}`,
        );
        break;
      case "protocol_error":
        logger.error(
          { deviceId: entry.deviceId, outcome: result.outcome, detail: result.detail },
          `Failed to turn ${action} ${entry.name}`,
        );
        break;
    }
    this.latest.set(entry.deviceId, result);
  }
}
