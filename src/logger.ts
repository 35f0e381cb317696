import pino from "pino";
import type { Logger } from "pino";
import type { LoggingDefinition } from "./config/types.js";

export type { Logger };

export function createLogger(definition: LoggingDefinition): Logger {
  const options = { name: "recording-lights", level: definition.level };
  if (!definition.file) {
    return pino(options);
  }

  const streams = pino.multistream([
    { level: definition.level, stream: process.stdout },
    { level: definition.level, stream: pino.destination({ dest: definition.file, mkdir: true, sync: false }) },
  ]);
  return pino(options, streams);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
