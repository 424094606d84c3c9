import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { reportToJSON, stateToJSON } from "./core/aggregator.js";
import type { BulbEngine } from "./core/engine.js";
import { DEFAULT_DEVICE_PORT, parseAddress } from "./util/address.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import logger from "./util/logger.js";
import type { ControlCmd, DeviceAddress } from "./util/types.js";

export type ServerContext = {
  engine: BulbEngine;
  limiter?: TokenBucketLimiter;
  allowlist?: string[];
  devicePort?: number;
};

const Addresses = z.array(z.string().min(1)).min(1).describe("Bulb addresses, host or host:port");

export function createServer(ctx: ServerContext): McpServer {
  const { engine } = ctx;
  const limiter = ctx.limiter ?? new TokenBucketLimiter(5);
  const port = ctx.devicePort ?? DEFAULT_DEVICE_PORT;
  const allowed = new Set((ctx.allowlist ?? []).map((a) => parseAddress(a, port).key));

  const isAllowed = (address: DeviceAddress) => allowed.size === 0 || allowed.has(address.key);

  function resolveTargets(raw: string[]): DeviceAddress[] {
    const targets = raw.map((a) => parseAddress(a, port));
    const denied = targets.filter((t) => !isAllowed(t));
    if (denied.length > 0) throw new Error(`Device not allowed: ${denied.map((d) => d.key).join(", ")}`);
    return targets;
  }

  // a cancelled tool call stops waiting for a token and leaves unsent requests unsent
  async function control(raw: string[], cmd: ControlCmd, signal: AbortSignal) {
    const targets = resolveTargets(raw);
    await limiter.take(signal);
    const report = await engine.execute(cmd, targets, { signal });
    return {
      content: [{ type: "text" as const, text: JSON.stringify(reportToJSON(report), null, 2) }],
      isError: report.outcome !== "success",
    };
  }

  const server = new McpServer({ name: "bulbs", version: "0.1.0" });

  // ---- TOOLS ----
  server.registerTool(
    "bulbs_list_devices",
    {
      description: "List known bulbs with their last observed state and health.",
      inputSchema: {},
    },
    async () => {
      const list = engine.registry
        .snapshot()
        .filter((d) => isAllowed(d.address))
        .map((d) => ({
          address: d.address.key,
          name: d.name,
          health: d.health,
          state: d.state ? stateToJSON(d.state) : null,
        }));
      return { content: [{ type: "text", text: JSON.stringify(list, null, 2) }] };
    },
  );

  server.registerTool(
    "bulbs_discover",
    {
      description: "Probe the local network for bulbs and add them to the device list.",
      inputSchema: { timeoutMs: z.number().int().min(100).max(60_000).optional() },
    },
    async ({ timeoutMs }, { signal }) => {
      await limiter.take(signal);
      const found = (await engine.discover(timeoutMs)).filter(isAllowed);
      return { content: [{ type: "text", text: JSON.stringify(found.map((a) => a.key)) }] };
    },
  );

  server.registerTool(
    "bulbs_get_state",
    {
      description: "Query power/brightness/color of one or more bulbs.",
      inputSchema: { addresses: Addresses },
    },
    async ({ addresses }, { signal }) => control(addresses, { name: "status" }, signal),
  );

  server.registerTool(
    "bulbs_set_power",
    {
      description: "Turn bulbs on, off, or toggle each one.",
      inputSchema: { addresses: Addresses, power: z.enum(["on", "off", "toggle"]) },
    },
    async ({ addresses, power }, { signal }) =>
      control(addresses, power === "toggle" ? { name: "toggle" } : { name: "power", value: power }, signal),
  );

  server.registerTool(
    "bulbs_set_brightness",
    {
      description: "Set brightness (0-100).",
      inputSchema: { addresses: Addresses, percent: z.number().min(0).max(100) },
    },
    async ({ addresses, percent }, { signal }) =>
      control(addresses, { name: "brightness", value: Math.round(percent) }, signal),
  );

  server.registerTool(
    "bulbs_set_color",
    {
      description: "Set RGB color.",
      inputSchema: {
        addresses: Addresses,
        r: z.number().int().min(0).max(255),
        g: z.number().int().min(0).max(255),
        b: z.number().int().min(0).max(255),
      },
    },
    async ({ addresses, r, g, b }, { signal }) => control(addresses, { name: "color", value: { r, g, b } }, signal),
  );

  return server;
}

export async function startServer(ctx: ServerContext): Promise<void> {
  const server = createServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("bulbs MCP server running (stdio)");
}
