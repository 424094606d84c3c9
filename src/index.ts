#!/usr/bin/env node

import chalk from "chalk";
import { Argument, Command, Option } from "commander";
import { runCli, type CliOptions, EXIT_USAGE } from "./cli.js";
import { loadConfig, type Config } from "./config.js";
import { createEngine } from "./core/engine.js";
import { startServer } from "./server.js";
import { loadDevices } from "./store.js";
import { App } from "./tui/app.js";
import { runTui } from "./tui/terminal.js";
import { BulbsError, errorMessage } from "./util/errors.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import logger, { setLogLevel } from "./util/logger.js";

const collect = (value: string, previous: string[]) => [...previous, value];

function setup(configPath: string | undefined): Config {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return configPath ? { ...config, devicesFile: configPath } : config;
}

const program = new Command();

program
  .name("bulbs-tui")
  .description("Discover and control networked LED bulbs")
  .version("0.1.0")
  .option("--config <path>", "Path to the device list file")
  .action(async (opts: { config?: string }) => {
    const config = setup(opts.config);
    const engine = createEngine(config);
    const stored = await loadDevices(config.devicesFile, config.devicePort);
    const app = new App({ engine, devicesFile: config.devicesFile, devicePort: config.devicePort }, stored);
    await runTui(app);
  });

program
  .command("cli")
  .description("Control bulbs non interactively")
  .addArgument(new Argument("[power]", "Set LED power").choices(["on", "off", "toggle"]))
  .addOption(new Option("-a <addr>", "Device address (overrides devices defined in config file)").argParser(collect).default([]))
  .option("-b <num>", "Set brightness (0-100)")
  .option("-c <color>", "Set color, e.g. #FF8800")
  .option("-d", "Discover devices on the local network")
  .option("-s", "Show device properties")
  .action(async (power: CliOptions["power"], flags: { a: string[]; b?: string; c?: string; d?: boolean; s?: boolean }) => {
    const config = setup(program.opts<{ config?: string }>().config);
    const engine = createEngine(config);
    const stored = flags.a.length > 0 ? [] : await loadDevices(config.devicesFile, config.devicePort);
    process.exitCode = await runCli(
      { power, addr: flags.a, brightness: flags.b, color: flags.c, discover: flags.d, status: flags.s },
      { engine, stored, devicePort: config.devicePort },
    );
  });

program
  .command("mcp")
  .description("Serve the bulb controls as MCP tools over stdio")
  .action(async () => {
    const config = setup(program.opts<{ config?: string }>().config);
    const engine = createEngine(config);
    for (const d of await loadDevices(config.devicesFile, config.devicePort)) {
      engine.registry.upsert(d.address, { name: d.name });
    }
    await startServer({
      engine,
      limiter: new TokenBucketLimiter(config.rateRps),
      allowlist: config.allowlist,
      devicePort: config.devicePort,
    });
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof BulbsError) {
    console.error(chalk.red(`error: ${err.message}`));
    process.exitCode = EXIT_USAGE;
    return;
  }
  logger.error(errorMessage(err), { error: err });
  process.exitCode = 1;
});
