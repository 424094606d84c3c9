import { z } from "zod";
import { uniqueAddresses } from "../util/address.js";
import { InvalidCommandError } from "../util/errors.js";
import type { Command, ControlCmd, DeviceAddress } from "../util/types.js";

const channel = z.number().int().min(0).max(255);

export const ControlCmdSchema = z.discriminatedUnion("name", [
  z.object({ name: z.literal("power"), value: z.enum(["on", "off"]) }),
  z.object({ name: z.literal("brightness"), value: z.number().int().min(0).max(100) }),
  z.object({ name: z.literal("color"), value: z.object({ r: channel, g: channel, b: channel }) }),
  z.object({ name: z.literal("toggle") }),
  z.object({ name: z.literal("status") }),
]);

export function validateControlCmd(cmd: ControlCmd): ControlCmd {
  const parsed = ControlCmdSchema.safeParse(cmd);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join(".")})` : "";
    throw new InvalidCommandError(`invalid ${cmd.name} command${where}: ${issue?.message ?? "rejected"}`);
  }
  return parsed.data;
}

/** Validates the payload and de-duplicates targets; throws InvalidCommandError. */
export function createCommand(cmd: ControlCmd, targets: Iterable<DeviceAddress>): Command {
  const unique = uniqueAddresses(targets);
  if (unique.length === 0) throw new InvalidCommandError("command has no target devices");
  return { cmd: validateControlCmd(cmd), targets: Object.freeze(unique) };
}

export function describeCmd(cmd: ControlCmd): string {
  switch (cmd.name) {
    case "power":
      return `power ${cmd.value}`;
    case "brightness":
      return `brightness ${cmd.value}%`;
    case "color":
      return `color rgb(${cmd.value.r},${cmd.value.g},${cmd.value.b})`;
    case "toggle":
      return "toggle";
    case "status":
      return "status";
  }
}
