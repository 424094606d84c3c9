import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { DEFAULT_DEVICE_PORT, parseAddress } from "./util/address.js";
import { ConfigError, errorMessage } from "./util/errors.js";
import type { Device, DeviceAddress } from "./util/types.js";

export type StoredDevice = { address: DeviceAddress; name: string };

const DeviceFile = z.object({
  bulb: z
    .array(
      z.object({
        ip: z.string().min(1),
        name: z.string().default(""),
      }),
    )
    .default([]),
});

/** A missing file is an empty device list. */
export async function loadDevices(path: string, defaultPort = DEFAULT_DEVICE_PORT): Promise<StoredDevice[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw new ConfigError(`cannot read ${path}: ${errorMessage(err)}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = DeviceFile.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(`${path}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }

  const out: StoredDevice[] = [];
  for (const b of parsed.data.bulb) {
    try {
      out.push({ address: parseAddress(b.ip, defaultPort), name: b.name });
    } catch (err) {
      throw new ConfigError(`${path}: ${errorMessage(err)}`);
    }
  }
  return out;
}

export async function saveDevices(
  path: string,
  devices: ReadonlyArray<Pick<Device, "address" | "name">>,
  defaultPort = DEFAULT_DEVICE_PORT,
): Promise<void> {
  const ip = (a: DeviceAddress) => (a.port === defaultPort ? a.host : `${a.host}:${a.port}`);
  const doc = { bulb: devices.map((d) => ({ ip: ip(d.address), name: d.name })) };
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(doc, null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new ConfigError(`failed to save config: ${path}: ${errorMessage(err)}`);
  }
}
