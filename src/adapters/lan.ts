import { networkInterfaces } from "node:os";
import { compareAddresses, DEFAULT_DEVICE_PORT, deviceAddress, uniqueAddresses } from "../util/address.js";
import { errorMessage } from "../util/errors.js";
import { Semaphore } from "../util/limiter.js";
import logger from "../util/logger.js";
import { withTimeout } from "../util/timeout.js";
import type { DeviceAddress } from "../util/types.js";
import { type BulbTransport, HttpBulbClient } from "./bulb.js";

export const DISCOVERY_TIMEOUT_MS = 3000;
export const DISCOVERY_QUIET_MS = 1000;
export const PROBE_TIMEOUT_MS = 200;
export const PROBE_CONCURRENCY = 50;

export interface AddressResolver {
  /** Never rejects for lack of devices: nobody answering is an empty list. */
  discover(timeoutMs?: number): Promise<DeviceAddress[]>;
}

export type Probe = (address: DeviceAddress, signal: AbortSignal) => Promise<boolean>;

type Interfaces = ReturnType<typeof networkInterfaces>;

/** Every host of the /24 around each non-internal IPv4 interface, minus our own addresses. */
export function subnetCandidates(port = DEFAULT_DEVICE_PORT, interfaces: Interfaces = networkInterfaces()): DeviceAddress[] {
  const own = new Set<string>();
  const bases = new Set<string>();
  for (const addrs of Object.values(interfaces)) {
    if (!addrs) continue;
    for (const a of addrs) {
      if (a.family !== "IPv4" || a.internal) continue;
      own.add(a.address);
      bases.add(a.address.split(".").slice(0, 3).join("."));
    }
  }
  const out: DeviceAddress[] = [];
  for (const base of bases) {
    for (let i = 1; i < 255; i++) {
      const host = `${base}.${i}`;
      if (!own.has(host)) out.push(deviceAddress(host, port));
    }
  }
  return out;
}

export type LanResolverOptions = {
  port?: number;
  quietMs?: number;
  probeTimeoutMs?: number;
  concurrency?: number;
  candidates?: () => DeviceAddress[];
  probe?: Probe;
  transport?: BulbTransport;
};

/**
 * Subnet sweep: each candidate gets a status request, and whoever answers with
 * a valid status document is a bulb. Ends when every probe settled, at the
 * overall timeout, or once responses have gone quiet for `quietMs`.
 */
export class LanResolver implements AddressResolver {
  private quietMs: number;
  private probeTimeoutMs: number;
  private concurrency: number;
  private candidates: () => DeviceAddress[];
  private probe: Probe;

  constructor(opts: LanResolverOptions = {}) {
    const port = opts.port ?? DEFAULT_DEVICE_PORT;
    const transport = opts.transport ?? new HttpBulbClient();
    this.quietMs = opts.quietMs ?? DISCOVERY_QUIET_MS;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? PROBE_TIMEOUT_MS;
    this.concurrency = opts.concurrency ?? PROBE_CONCURRENCY;
    this.candidates = opts.candidates ?? (() => subnetCandidates(port));
    this.probe =
      opts.probe ??
      (async (address, signal) => {
        await transport.getState(address, signal);
        return true;
      });
  }

  async discover(timeoutMs = DISCOVERY_TIMEOUT_MS): Promise<DeviceAddress[]> {
    const candidates = uniqueAddresses(this.candidates());
    const found = new Map<string, DeviceAddress>();
    const stop = new AbortController();

    if (candidates.length === 0) {
      logger.warn("discovery: no IPv4 network to probe");
      return [];
    }
    logger.debug(`discovery: probing ${candidates.length} address(es)`, { timeoutMs, quietMs: this.quietMs });

    const slots = new Semaphore(Math.min(this.concurrency, candidates.length));

    return new Promise<DeviceAddress[]>((resolve) => {
      let quiet: NodeJS.Timeout | undefined;

      const finish = () => {
        if (stop.signal.aborted) return;
        clearTimeout(overall);
        clearTimeout(quiet);
        stop.abort();
        const out = Array.from(found.values()).sort(compareAddresses);
        if (out.length === 0) logger.warn("DiscoveryTimeout: no devices responded", { timeoutMs });
        else logger.info(`discovery: ${out.length} device(s) found`);
        resolve(out);
      };
      const overall = setTimeout(finish, timeoutMs);

      const runProbe = async (address: DeviceAddress): Promise<void> => {
        if (!(await slots.acquire(stop.signal))) return;
        try {
          const ok = await withTimeout(
            (signal) => this.probe(address, signal),
            this.probeTimeoutMs,
            () => new Error("probe timed out"),
            stop.signal,
          );
          if (ok && !stop.signal.aborted) {
            found.set(address.key, address);
            clearTimeout(quiet);
            quiet = setTimeout(finish, this.quietMs);
          }
        } catch (err) {
          logger.debug(`discovery: ${address.key} silent (${errorMessage(err)})`);
        } finally {
          slots.release();
        }
      };

      void Promise.all(candidates.map(runProbe)).then(finish);
    });
  }
}
