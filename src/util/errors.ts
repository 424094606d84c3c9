export type ErrorCode =
  | "INVALID_COMMAND"
  | "DEVICE_UNREACHABLE"
  | "DEVICE_TIMEOUT"
  | "PROTOCOL_ERROR"
  | "CONFIG_ERROR";

export class BulbsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected before dispatch: empty target set, bad address or out-of-range value. */
export class InvalidCommandError extends BulbsError {
  constructor(message: string) {
    super("INVALID_COMMAND", message);
  }
}

export class DeviceUnreachableError extends BulbsError {
  constructor(address: string, options?: { cause?: unknown }) {
    super("DEVICE_UNREACHABLE", `${address} is unreachable`, options);
  }
}

export class DeviceTimeoutError extends BulbsError {
  constructor(address: string, timeoutMs: number) {
    super("DEVICE_TIMEOUT", `${address} did not answer within ${timeoutMs}ms`);
  }
}

/** The device answered, but not with something we understand. */
export class ProtocolError extends BulbsError {
  constructor(address: string, detail: string) {
    super("PROTOCOL_ERROR", `${address}: ${detail}`);
  }
}

export class ConfigError extends BulbsError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
