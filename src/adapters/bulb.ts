import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import { formatRgb, tryParseRgb } from "../util/color.js";
import { DeviceUnreachableError, ProtocolError } from "../util/errors.js";
import type { DeviceAddress, DeviceState, Power, Rgb } from "../util/types.js";

/** What the dispatcher needs from a device. Every call resolves to the confirmed state. */
export interface BulbTransport {
  getState(address: DeviceAddress, signal?: AbortSignal): Promise<DeviceState>;
  setPower(address: DeviceAddress, power: Power, signal?: AbortSignal): Promise<DeviceState>;
  setBrightness(address: DeviceAddress, percent: number, signal?: AbortSignal): Promise<DeviceState>;
  setColor(address: DeviceAddress, color: Rgb, signal?: AbortSignal): Promise<DeviceState>;
}

// Firmware reports power as 0/1 under "on" (older builds: "enabled") and brightness as 0..1.
const flag = z.union([z.literal(0), z.literal(1), z.boolean()]);
const WireStatus = z
  .object({
    brightness: z.number().min(0).max(1),
    color: z.string(),
    on: flag.optional(),
    enabled: flag.optional(),
  })
  .refine((s) => s.on !== undefined || s.enabled !== undefined, { message: "missing power flag" });

export function parseStatus(doc: unknown, now: number = Date.now()): DeviceState | null {
  const parsed = WireStatus.safeParse(doc);
  if (!parsed.success) return null;
  const color = tryParseRgb(parsed.data.color);
  if (!color) return null;
  const on = parsed.data.on ?? parsed.data.enabled;
  return {
    power: on === 1 || on === true ? "on" : "off",
    brightness: Math.round(parsed.data.brightness * 100),
    color,
    updatedAt: now,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export type HttpBulbClientOptions = {
  dispatcher?: Dispatcher;
  now?: () => number;
};

export class HttpBulbClient implements BulbTransport {
  private dispatcher?: Dispatcher;
  private now: () => number;

  constructor(opts: HttpBulbClientOptions = {}) {
    this.dispatcher = opts.dispatcher;
    this.now = opts.now ?? (() => Date.now());
  }

  private async request(address: DeviceAddress, method: "GET" | "PUT", path: string, signal?: AbortSignal): Promise<string> {
    const url = `http://${address.host}:${address.port}${path}`;
    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await fetch(url, { method, signal, dispatcher: this.dispatcher });
    } catch (err) {
      // the caller's reason (a timeout) wins over whatever fetch made of the abort
      if (signal?.aborted) throw signal.reason;
      throw new DeviceUnreachableError(address.key, { cause: err });
    }
    const body = await res.text();
    if (!res.ok) {
      throw new ProtocolError(address.key, `HTTP ${res.status}${body ? ` ${body.slice(0, 80)}` : ""}`);
    }
    return body;
  }

  async getState(address: DeviceAddress, signal?: AbortSignal): Promise<DeviceState> {
    const body = await this.request(address, "GET", "/led", signal);
    const doc = parseJson(body);
    if (doc === undefined) throw new ProtocolError(address.key, `malformed response: ${body.slice(0, 80)}`);
    const state = parseStatus(doc, this.now());
    if (!state) throw new ProtocolError(address.key, "unexpected status document");
    return state;
  }

  // A PUT answer is used when it is itself a status document; otherwise read the state back.
  private async put(address: DeviceAddress, path: string, signal?: AbortSignal): Promise<DeviceState> {
    const body = await this.request(address, "PUT", path, signal);
    return parseStatus(parseJson(body), this.now()) ?? this.getState(address, signal);
  }

  async setPower(address: DeviceAddress, power: Power, signal?: AbortSignal): Promise<DeviceState> {
    return this.put(address, `/led/${power}`, signal);
  }

  async setBrightness(address: DeviceAddress, percent: number, signal?: AbortSignal): Promise<DeviceState> {
    return this.put(address, `/led/brightness/${percent / 100}`, signal);
  }

  async setColor(address: DeviceAddress, color: Rgb, signal?: AbortSignal): Promise<DeviceState> {
    return this.put(address, `/led/color/${formatRgb(color).slice(1)}`, signal);
  }
}
