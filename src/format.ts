import { formatRgb } from "./util/color.js";
import type { CommandResult, Device, DeviceState } from "./util/types.js";

export function describeState(s: DeviceState | null): string {
  if (!s) return "unknown";
  return `${s.power === "on" ? "ON" : "OFF"} ${s.brightness}% ${formatRgb(s.color)}`;
}

/** `address name power brightness color` in fixed columns. */
export function formatDevice(d: Pick<Device, "address" | "name" | "state" | "health">): string {
  const s = d.state;
  const cols = [
    d.address.key.padEnd(16),
    d.name.padEnd(16),
    (s ? (s.power === "on" ? "ON" : "OFF") : "?").padEnd(3),
    (s ? String(s.brightness) : "-").padStart(4),
    s ? formatRgb(s.color) : "-",
  ];
  if (d.health === "unreachable") cols.push("(unreachable)");
  return cols.join(" ").trimEnd();
}

export function formatFailure(r: CommandResult): string | null {
  return r.ok ? null : `${r.address.key}: ${r.failure} - ${r.message}`;
}
