import dotenv from "dotenv";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./util/errors.js";

dotenv.config();

const int = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const envSchema = z.object({
  BULBS_CONFIG: z.string().optional(),
  BULBS_LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("warn"),
  BULBS_REQUEST_TIMEOUT_MS: int(1, 60_000).default(1000),
  BULBS_MAX_CONCURRENCY: int(1, 256).default(16),
  BULBS_DEVICE_PORT: int(1, 65535).default(80),
  BULBS_DISCOVERY_TIMEOUT_MS: int(1, 120_000).default(3000),
  BULBS_DISCOVERY_QUIET_MS: int(1, 120_000).default(1000),
  BULBS_PROBE_TIMEOUT_MS: int(1, 10_000).default(200),
  BULBS_PROBE_CONCURRENCY: int(1, 254).default(50),
  BULBS_RATE_RPS: z.coerce.number().positive().default(5),
  BULBS_ALLOWLIST: z.string().default(""),
});

export type Config = {
  devicesFile: string;
  logLevel: "error" | "warn" | "info" | "debug";
  requestTimeoutMs: number;
  maxConcurrency: number;
  devicePort: number;
  discovery: {
    timeoutMs: number;
    quietMs: number;
    probeTimeoutMs: number;
    probeConcurrency: number;
  };
  rateRps: number;
  allowlist: string[];
};

export function defaultDevicesFile(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, "bulbs", "tui.json");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // empty strings mean "unset" so a blank line in .env falls back to the default
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    devicesFile: e.BULBS_CONFIG ?? defaultDevicesFile(env),
    logLevel: e.BULBS_LOG_LEVEL,
    requestTimeoutMs: e.BULBS_REQUEST_TIMEOUT_MS,
    maxConcurrency: e.BULBS_MAX_CONCURRENCY,
    devicePort: e.BULBS_DEVICE_PORT,
    discovery: {
      timeoutMs: e.BULBS_DISCOVERY_TIMEOUT_MS,
      quietMs: e.BULBS_DISCOVERY_QUIET_MS,
      probeTimeoutMs: e.BULBS_PROBE_TIMEOUT_MS,
      probeConcurrency: e.BULBS_PROBE_CONCURRENCY,
    },
    rateRps: e.BULBS_RATE_RPS,
    allowlist: e.BULBS_ALLOWLIST.split(/[,\s]+/)
      .map((s) => s.trim())
      .filter(Boolean),
  };
}
