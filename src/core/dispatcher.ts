import type { BulbTransport } from "../adapters/bulb.js";
import { BulbsError, DeviceTimeoutError, errorMessage } from "../util/errors.js";
import { Semaphore } from "../util/limiter.js";
import logger from "../util/logger.js";
import { withTimeout } from "../util/timeout.js";
import type { Command, CommandResult, ControlCmd, DeviceAddress, DeviceState, DispatchResults, FailureKind } from "../util/types.js";
import { createCommand, describeCmd } from "./command.js";

export const REQUEST_TIMEOUT_MS = 1000;
export const MAX_CONCURRENCY = 16;

export type DispatcherOptions = {
  timeoutMs?: number;
  maxConcurrency?: number;
};

export type DispatchOptions = {
  /** Aborting stops new requests; ones already sent run to completion or timeout. */
  signal?: AbortSignal;
};

export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof BulbsError) {
    switch (err.code) {
      case "DEVICE_TIMEOUT":
        return "timeout";
      case "PROTOCOL_ERROR":
        return "protocol";
      default:
        return "unreachable";
    }
  }
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) return "timeout";
  return "unreachable";
}

async function perform(transport: BulbTransport, address: DeviceAddress, cmd: ControlCmd, signal: AbortSignal): Promise<DeviceState> {
  switch (cmd.name) {
    case "status":
      return transport.getState(address, signal);
    case "power":
      return transport.setPower(address, cmd.value, signal);
    case "brightness":
      return transport.setBrightness(address, cmd.value, signal);
    case "color":
      return transport.setColor(address, cmd.value, signal);
    case "toggle": {
      const current = await transport.getState(address, signal);
      return transport.setPower(address, current.power === "on" ? "off" : "on", signal);
    }
  }
}

/**
 * Fans one command out to its targets, at most `maxConcurrency` at a time,
 * each under its own timeout. Every target ends up with exactly one result;
 * nothing thrown by a device escapes. The registry is left to the caller.
 */
export class CommandDispatcher {
  private timeoutMs: number;
  private maxConcurrency: number;

  constructor(
    private transport: BulbTransport,
    opts: DispatcherOptions = {},
  ) {
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxConcurrency = opts.maxConcurrency ?? MAX_CONCURRENCY;
  }

  async dispatch(command: Command, opts: DispatchOptions = {}): Promise<DispatchResults> {
    // re-validate: a Command built by hand must not reach the network
    const { cmd, targets } = createCommand(command.cmd, command.targets);
    const slots = new Semaphore(Math.min(targets.length, this.maxConcurrency));
    const label = describeCmd(cmd);
    logger.debug(`dispatch ${label} to ${targets.length} device(s)`);

    const run = async (address: DeviceAddress): Promise<CommandResult> => {
      const cancelled: CommandResult = { address, ok: false, failure: "cancelled", message: "dispatch cancelled before request" };
      if (!(await slots.acquire(opts.signal))) return cancelled;
      if (opts.signal?.aborted) {
        slots.release();
        return cancelled;
      }
      try {
        const state = await withTimeout(
          (signal) => perform(this.transport, address, cmd, signal),
          this.timeoutMs,
          () => new DeviceTimeoutError(address.key, this.timeoutMs),
        );
        return { address, ok: true, state };
      } catch (err) {
        const failure = classifyFailure(err);
        logger.debug(`${label} failed on ${address.key}: ${failure}`, { error: errorMessage(err) });
        return { address, ok: false, failure, message: errorMessage(err) };
      } finally {
        slots.release();
      }
    };

    const results = await Promise.all(targets.map(run));
    return new Map(results.map((r) => [r.address.key, r]));
  }
}
