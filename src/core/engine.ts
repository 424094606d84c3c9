import { type BulbTransport, HttpBulbClient } from "../adapters/bulb.js";
import { type AddressResolver, LanResolver } from "../adapters/lan.js";
import type { Config } from "../config.js";
import type { ControlCmd, DeviceAddress, Report } from "../util/types.js";
import { aggregate } from "./aggregator.js";
import { createCommand } from "./command.js";
import { CommandDispatcher, type DispatchOptions } from "./dispatcher.js";
import { DeviceRegistry } from "./registry.js";

/**
 * Wires resolver, dispatcher and registry together the way every front end
 * uses them: dispatch, feed the results into the registry, report.
 */
export class BulbEngine {
  constructor(
    readonly registry: DeviceRegistry,
    readonly dispatcher: CommandDispatcher,
    readonly resolver: AddressResolver,
    private discoveryTimeoutMs?: number,
  ) {}

  async execute(cmd: ControlCmd, targets: Iterable<DeviceAddress>, opts: DispatchOptions = {}): Promise<Report> {
    const command = createCommand(cmd, targets);
    const results = await this.dispatcher.dispatch(command, opts);
    this.registry.apply(results);
    return aggregate(command, results);
  }

  /** New addresses enter the registry with unknown health; known ones are left alone. */
  async discover(timeoutMs = this.discoveryTimeoutMs): Promise<DeviceAddress[]> {
    const found = await this.resolver.discover(timeoutMs);
    for (const address of found) {
      if (!this.registry.has(address)) this.registry.upsert(address, { health: "unknown" });
    }
    return found;
  }
}

export function createEngine(config: Config, transport: BulbTransport = new HttpBulbClient()): BulbEngine {
  const dispatcher = new CommandDispatcher(transport, {
    timeoutMs: config.requestTimeoutMs,
    maxConcurrency: config.maxConcurrency,
  });
  const resolver = new LanResolver({
    port: config.devicePort,
    quietMs: config.discovery.quietMs,
    probeTimeoutMs: config.discovery.probeTimeoutMs,
    concurrency: config.discovery.probeConcurrency,
    transport,
  });
  return new BulbEngine(new DeviceRegistry(), dispatcher, resolver, config.discovery.timeoutMs);
}
