import { InvalidCommandError } from "./errors.js";
import type { DeviceAddress } from "./types.js";

export const DEFAULT_DEVICE_PORT = 80;

export function deviceAddress(host: string, port = DEFAULT_DEVICE_PORT): DeviceAddress {
  const h = host.trim().toLowerCase();
  if (!h) throw new InvalidCommandError("device address has an empty host");
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidCommandError(`invalid port ${port} for ${h}`);
  }
  const key = port === DEFAULT_DEVICE_PORT ? h : `${h}:${port}`;
  return Object.freeze({ host: h, port, key });
}

/**
 * Accepts `host`, `host:port` and `[v6]:port`. Hosts keep IPv6 brackets so the
 * value can be dropped straight into a URL.
 */
export function parseAddress(input: string, defaultPort = DEFAULT_DEVICE_PORT): DeviceAddress {
  const raw = input.trim();
  if (!raw) throw new InvalidCommandError("empty device address");
  if (/[/?#@\s]/.test(raw) || raw.includes("://")) {
    throw new InvalidCommandError(`invalid device address "${input}"`);
  }
  let url: URL;
  try {
    url = new URL(`http://${raw}`);
  } catch {
    throw new InvalidCommandError(`invalid device address "${input}"`);
  }
  // URL drops an explicit :80, so only a non-empty port overrides the default
  const port = url.port ? Number(url.port) : /:80$/.test(raw) ? DEFAULT_DEVICE_PORT : defaultPort;
  return deviceAddress(url.hostname, port);
}

export function sameAddress(a: DeviceAddress, b: DeviceAddress): boolean {
  return a.key === b.key;
}

export function uniqueAddresses(addresses: Iterable<DeviceAddress>): DeviceAddress[] {
  const seen = new Map<string, DeviceAddress>();
  for (const a of addresses) if (!seen.has(a.key)) seen.set(a.key, a);
  return Array.from(seen.values());
}

function ipv4Octets(host: string): number[] | null {
  const m = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/.exec(host);
  if (!m) return null;
  const octets = m.slice(1).map(Number);
  return octets.every((o) => o <= 255) ? octets : null;
}

/** IPv4 hosts sort numerically and before names; ties break on port. */
export function compareAddresses(a: DeviceAddress, b: DeviceAddress): number {
  const ia = ipv4Octets(a.host);
  const ib = ipv4Octets(b.host);
  if (ia && ib) {
    for (let i = 0; i < 4; i++) {
      if (ia[i] !== ib[i]) return ia[i] - ib[i];
    }
  } else if (ia) {
    return -1;
  } else if (ib) {
    return 1;
  } else if (a.host !== b.host) {
    return a.host < b.host ? -1 : 1;
  }
  return a.port - b.port;
}
