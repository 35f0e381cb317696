export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
}

/** Raised when the inbound control transport cannot be established. Fatal. */
export class ControlSourceError extends Error {
  override readonly name = "ControlSourceError";
}

export class TimeoutError extends Error {
  override readonly name = "TimeoutError";
}

export type DeviceFailureKind = "timeout" | "unreachable" | "protocol";

export class DeviceCommandError extends Error {
  override readonly name = "DeviceCommandError";

  constructor(
    readonly kind: DeviceFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return "Unknown error";
}
