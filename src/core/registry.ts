import { compareAddresses } from "../util/address.js";
import type { CommandResult, Device, DeviceAddress, DeviceState, DispatchResults, Health } from "../util/types.js";

export type DeviceUpdate = {
  state?: DeviceState;
  health?: Health;
  name?: string;
};

function freezeDevice(d: Device): Readonly<Device> {
  const state = d.state ? Object.freeze({ ...d.state, color: Object.freeze({ ...d.state.color }) }) : null;
  return Object.freeze({ address: d.address, name: d.name, state, health: d.health });
}

function isResultMap(r: DispatchResults | Iterable<CommandResult>): r is DispatchResults {
  return r instanceof Map;
}

/**
 * The known set of devices, keyed by address. Entries are stored frozen and
 * replaced whole on every write, so a reader holding a snapshot never sees a
 * half-applied update. All methods are synchronous; there is nothing for
 * callers to lock.
 */
export class DeviceRegistry {
  private devices = new Map<string, Readonly<Device>>();

  get size(): number {
    return this.devices.size;
  }

  has(address: DeviceAddress): boolean {
    return this.devices.has(address.key);
  }

  get(address: DeviceAddress): Readonly<Device> | undefined {
    return this.devices.get(address.key);
  }

  /** Inserts, or overwrites the given fields of the existing entry. */
  upsert(address: DeviceAddress, update: DeviceUpdate = {}): Readonly<Device> {
    const prev = this.devices.get(address.key);
    const next = freezeDevice({
      address: prev?.address ?? address,
      name: update.name ?? prev?.name ?? "",
      state: update.state ?? prev?.state ?? null,
      health: update.health ?? prev?.health ?? "unknown",
    });
    this.devices.set(address.key, next);
    return next;
  }

  remove(address: DeviceAddress): boolean {
    return this.devices.delete(address.key);
  }

  snapshot(): ReadonlyArray<Readonly<Device>> {
    return Object.freeze(Array.from(this.devices.values()).sort((a, b) => compareAddresses(a.address, b.address)));
  }

  /**
   * Records what a dispatch learned. Timeouts and connection failures mark a
   * known device unreachable; a garbled answer leaves its health unknown;
   * cancelled and missing results change nothing.
   */
  apply(results: DispatchResults | Iterable<CommandResult>): void {
    const list: Iterable<CommandResult> = isResultMap(results) ? results.values() : results;
    for (const r of list) this.applyOne(r);
  }

  private applyOne(r: CommandResult): void {
    if (r.ok) {
      this.upsert(r.address, { state: r.state, health: "reachable" });
      return;
    }
    if (!this.has(r.address)) return;
    switch (r.failure) {
      case "timeout":
      case "unreachable":
        this.upsert(r.address, { health: "unreachable" });
        break;
      case "protocol":
        this.upsert(r.address, { health: "unknown" });
        break;
      case "cancelled":
      case "missing":
        break;
    }
  }
}
