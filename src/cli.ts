import chalk from "chalk";
import type { BulbEngine } from "./core/engine.js";
import { formatDevice, formatFailure } from "./format.js";
import type { StoredDevice } from "./store.js";
import { DEFAULT_DEVICE_PORT, parseAddress } from "./util/address.js";
import { parseRgb } from "./util/color.js";
import { BulbsError, InvalidCommandError } from "./util/errors.js";
import logger from "./util/logger.js";
import type { ControlCmd, Report } from "./util/types.js";

export const EXIT_OK = 0;
export const EXIT_DEVICE_FAILURE = 1;
export const EXIT_USAGE = 2;

export type PowerArg = "on" | "off" | "toggle";

export type CliOptions = {
  addr?: string[];
  brightness?: string;
  color?: string;
  discover?: boolean;
  status?: boolean;
  power?: PowerArg;
};

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliContext = {
  engine: BulbEngine;
  stored: StoredDevice[];
  devicePort?: number;
  io?: CliIO;
};

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

export function parseBrightness(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) throw new InvalidCommandError(`brightness must be an integer 0-100, got "${raw}"`);
  const n = Number(raw.trim());
  if (n > 100) throw new InvalidCommandError(`brightness must be 0-100, got ${n}`);
  return n;
}

function planCommands(opts: CliOptions): ControlCmd[] {
  const plan: ControlCmd[] = [];
  if (opts.brightness !== undefined) plan.push({ name: "brightness", value: parseBrightness(opts.brightness) });
  if (opts.color !== undefined) plan.push({ name: "color", value: parseRgb(opts.color) });
  if (opts.power === "toggle") plan.push({ name: "toggle" });
  else if (opts.power) plan.push({ name: "power", value: opts.power });
  if (opts.status) plan.push({ name: "status" });
  return plan;
}

/**
 * One-shot control: brightness, then color, then power, then status, each
 * sent to every target. `toggle` switches the whole group together. Returns
 * the process exit code.
 */
export async function runCli(opts: CliOptions, ctx: CliContext): Promise<number> {
  const io = ctx.io ?? defaultIO;
  const { engine } = ctx;
  const fail = (msg: string) => {
    io.err(chalk.red(`error: ${msg}`));
    return EXIT_USAGE;
  };

  let plan: ControlCmd[];
  try {
    plan = planCommands(opts);
  } catch (err) {
    if (err instanceof BulbsError) return fail(err.message);
    throw err;
  }
  if (plan.length === 0) return fail("nothing to do, provide argument or option that does something");

  // explicit addresses replace the saved device list
  try {
    if (opts.addr && opts.addr.length > 0) {
      for (const a of opts.addr) engine.registry.upsert(parseAddress(a, ctx.devicePort ?? DEFAULT_DEVICE_PORT));
    } else {
      for (const d of ctx.stored) engine.registry.upsert(d.address, { name: d.name });
    }
  } catch (err) {
    if (err instanceof BulbsError) return fail(err.message);
    throw err;
  }

  if (opts.discover) {
    const found = await engine.discover();
    logger.info(`discovered ${found.length} device(s)`);
  }

  const targets = engine.registry.snapshot().map((d) => d.address);
  if (targets.length === 0) return fail("no devices found, provide at least one device address");

  const reports: Report[] = [];
  const run = async (cmd: ControlCmd) => {
    const report = await engine.execute(cmd, targets);
    reports.push(report);
    for (const d of report.details) {
      const line = formatFailure(d);
      if (line) io.err(chalk.red(line));
    }
  };
  for (const cmd of plan) {
    if (cmd.name !== "toggle") {
      await run(cmd);
      continue;
    }
    // the group follows the first device: on turns everything off, anything else turns it on
    await run({ name: "status" });
    const first = engine.registry.get(targets[0]);
    await run({ name: "power", value: first?.state?.power === "on" ? "off" : "on" });
  }

  if (opts.status) {
    for (const d of engine.registry.snapshot()) {
      const line = formatDevice(d);
      io.out(d.health === "unreachable" ? chalk.dim(line) : line);
    }
  }

  const worst = reports.find((r) => r.outcome !== "success");
  if (worst) {
    logger.debug(`cli finished with ${worst.outcome}`);
    return EXIT_DEVICE_FAILURE;
  }
  return EXIT_OK;
}
