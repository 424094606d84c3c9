export type DeviceAddress = Readonly<{
  host: string;
  port: number;
  key: string; // host, or host:port when not on the default port
}>;

export type Rgb = { r: number; g: number; b: number };

export type Power = "on" | "off";

export type Health = "reachable" | "unreachable" | "unknown";

export type DeviceState = {
  power: Power;
  brightness: number; // 0–100
  color: Rgb;
  updatedAt: number; // epoch ms
};

export type Device = {
  address: DeviceAddress;
  name: string;
  state: DeviceState | null;
  health: Health;
};

export type ControlCmd =
  | { name: "power"; value: Power }
  | { name: "brightness"; value: number }
  | { name: "color"; value: Rgb }
  | { name: "toggle" }
  | { name: "status" };

export type Command = {
  cmd: ControlCmd;
  targets: readonly DeviceAddress[];
};

export type FailureKind = "timeout" | "unreachable" | "protocol" | "cancelled" | "missing";

export type CommandResult =
  | { address: DeviceAddress; ok: true; state: DeviceState }
  | { address: DeviceAddress; ok: false; failure: FailureKind; message: string };

export type DispatchResults = ReadonlyMap<string, CommandResult>;

export type Outcome = "success" | "partial_failure" | "failure";

export type Report = {
  command: Command;
  outcome: Outcome;
  succeeded: number;
  failed: number;
  details: readonly CommandResult[];
};
