import type { Key } from "node:readline";
import type { BulbEngine } from "../core/engine.js";
import { describeState, formatFailure } from "../format.js";
import { saveDevices, type StoredDevice } from "../store.js";
import { DEFAULT_DEVICE_PORT, parseAddress } from "../util/address.js";
import { formatRgb, tryParseRgb } from "../util/color.js";
import { BulbsError } from "../util/errors.js";
import type { ControlCmd, Device, DeviceAddress, Report } from "../util/types.js";

export type Widget = "devices" | "logs" | "add" | "settings";
export type AddField = "ip" | "name";
export type SettingField = "color" | "brightness";

export type AppOptions = {
  engine: BulbEngine;
  devicesFile: string;
  devicePort?: number;
  maxLogs?: number;
};

const LOG_SCROLL_STEP = 4;

export class App {
  readonly engine: BulbEngine;
  private devicesFile: string;
  private devicePort: number;
  private maxLogs: number;
  private selected = new Set<string>();

  cursor = 0;
  widget: Widget = "devices";
  adding: AddField | null = null;
  setting: SettingField | null = null;
  logs: string[] = [];
  logOffset = 0;
  ipInput = "";
  nameInput = "";
  colorInput = "";
  brightnessInput = "";

  constructor(opts: AppOptions, stored: StoredDevice[] = []) {
    this.engine = opts.engine;
    this.devicesFile = opts.devicesFile;
    this.devicePort = opts.devicePort ?? DEFAULT_DEVICE_PORT;
    this.maxLogs = opts.maxLogs ?? 200;
    for (const d of stored) {
      this.engine.registry.upsert(d.address, { name: d.name });
      this.selected.add(d.address.key);
    }
  }

  get devices(): ReadonlyArray<Readonly<Device>> {
    return this.engine.registry.snapshot();
  }

  get current(): Readonly<Device> | undefined {
    return this.devices[this.cursor];
  }

  isSelected(address: DeviceAddress): boolean {
    return this.selected.has(address.key);
  }

  private selectedDevices(): ReadonlyArray<Readonly<Device>> {
    return this.devices.filter((d) => this.selected.has(d.address.key));
  }

  log(line: string): void {
    this.logs.unshift(line);
    if (this.logs.length > this.maxLogs) this.logs.length = this.maxLogs;
  }

  private async run(cmd: ControlCmd, targets: DeviceAddress[]): Promise<Report | null> {
    try {
      const report = await this.engine.execute(cmd, targets);
      for (const d of report.details) {
        const failure = formatFailure(d);
        if (failure) this.log(failure);
        else if (d.ok && cmd.name === "status") this.log(`${d.address.key}: ${describeState(d.state)}`);
      }
      return report;
    } catch (err) {
      if (!(err instanceof BulbsError)) throw err;
      this.log(err.message);
      return null;
    }
  }

  // -- navigation --

  prevDevice(): void {
    this.cursor = Math.max(0, this.cursor - 1);
  }

  nextDevice(): void {
    if (this.cursor < this.devices.length - 1) this.cursor += 1;
  }

  selectDevice(): void {
    const d = this.current;
    if (!d) return;
    if (this.selected.has(d.address.key)) this.selected.delete(d.address.key);
    else this.selected.add(d.address.key);
  }

  removeDevice(): void {
    const d = this.current;
    if (!d) return;
    this.engine.registry.remove(d.address);
    this.selected.delete(d.address.key);
    this.prevDevice();
  }

  scrollLogsLeft(): void {
    this.logOffset = Math.max(0, this.logOffset - LOG_SCROLL_STEP);
  }

  scrollLogsRight(): void {
    this.logOffset += LOG_SCROLL_STEP;
  }

  toggleAddingField(): void {
    this.adding = this.adding === "ip" ? "name" : "ip";
  }

  toggleSettingsField(): void {
    this.setting = this.setting === "color" ? "brightness" : "color";
  }

  // -- device actions --

  async refreshDevices(): Promise<void> {
    const targets = this.devices.map((d) => d.address);
    if (targets.length === 0) return;
    await this.run({ name: "status" }, targets);
  }

  /** Status is queried before the device is kept; a failure leaves the dialog open. */
  async addDevice(): Promise<void> {
    const ip = this.ipInput.trim();
    if (ip) {
      let address: DeviceAddress;
      try {
        address = parseAddress(ip, this.devicePort);
      } catch (err) {
        if (!(err instanceof BulbsError)) throw err;
        this.log(err.message);
        return;
      }
      if (this.engine.registry.has(address)) {
        this.log(`Device "${ip}" already added`);
        return;
      }
      const report = await this.run({ name: "status" }, [address]);
      if (!report || report.outcome !== "success") return;
      this.engine.registry.upsert(address, { name: this.nameInput.trim() });
      this.selected.add(address.key);
      this.ipInput = "";
      this.nameInput = "";
    }
    this.adding = null;
    this.widget = "devices";
  }

  async discover(): Promise<void> {
    const known = new Set(this.devices.map((d) => d.address.key));
    const found = await this.engine.discover();
    const fresh = found.filter((a) => !known.has(a.key));
    if (found.length === 0) {
      this.log("no devices found");
      return;
    }
    this.log(`discovered ${fresh.length} new device(s)`);
    if (fresh.length === 0) return;
    for (const a of fresh) this.selected.add(a.key);
    await this.run({ name: "status" }, fresh);
  }

  async toggleCurrent(): Promise<void> {
    const d = this.current;
    if (d) await this.run({ name: "toggle" }, [d.address]);
  }

  /** The whole selection follows its first device: on turns everything off, anything else turns it on. */
  async toggleSelected(): Promise<void> {
    const targets = this.selectedDevices();
    if (targets.length === 0) {
      this.log("no devices selected");
      return;
    }
    const value = targets[0].state?.power === "on" ? "off" : "on";
    await this.run(
      { name: "power", value },
      targets.map((d) => d.address),
    );
  }

  openSettings(): void {
    const first = this.selectedDevices()[0];
    if (!first) return;
    this.colorInput = first.state ? formatRgb(first.state.color) : "#";
    this.brightnessInput = first.state ? String(first.state.brightness) : "";
    this.widget = "settings";
    this.setting = "color";
  }

  closeDialog(): void {
    this.widget = "devices";
    this.adding = null;
    this.setting = null;
  }

  async applySettings(): Promise<void> {
    const targets = this.selectedDevices();
    if (targets.length === 0) {
      this.log("no devices selected");
      this.closeDialog();
      return;
    }
    const addresses = targets.map((d) => d.address);

    if (this.colorInput.length === 7) {
      const color = tryParseRgb(this.colorInput);
      if (color) await this.run({ name: "color", value: color }, addresses);
      else this.log(`invalid color "${this.colorInput}"`);
      this.colorInput = "#";
    }

    const raw = this.brightnessInput.trim();
    if (!/^\d+$/.test(raw) || Number(raw) > 100) {
      this.log(`invalid brightness "${raw}", expected 0-100`);
      return;
    }
    const brightness = Number(raw);
    if (brightness !== targets[0].state?.brightness) {
      await this.run({ name: "brightness", value: brightness }, addresses);
    }
    this.brightnessInput = "";
    this.closeDialog();
  }

  async save(): Promise<void> {
    await saveDevices(this.devicesFile, this.devices, this.devicePort);
  }

  // -- keys --

  /** Returns "quit" once the device list has been saved and the TUI should exit. */
  async handleKey(str: string | undefined, key: Key = {}): Promise<"quit" | undefined> {
    const ch = str && str.length === 1 && !key.ctrl && !key.meta ? str : undefined;
    if (key.ctrl && key.name === "c") {
      await this.save();
      return "quit";
    }

    switch (this.widget) {
      case "devices":
        if (key.name === "escape" || ch === "q") {
          await this.save();
          return "quit";
        }
        if (key.name === "return") await this.toggleCurrent();
        else if (key.name === "tab") this.widget = "logs";
        else if (key.name === "up" || ch === "k") this.prevDevice();
        else if (key.name === "down" || ch === "j") this.nextDevice();
        else if (ch === "a") {
          this.widget = "add";
          this.adding = "ip";
        } else if (ch === "A") await this.discover();
        else if (ch === "c") this.openSettings();
        else if (ch === "d") this.removeDevice();
        else if (ch === "e") await this.toggleSelected();
        else if (ch === "r") await this.refreshDevices();
        else if (ch === " ") this.selectDevice();
        return undefined;

      case "logs":
        if (key.name === "escape" || ch === "q") {
          await this.save();
          return "quit";
        }
        if (key.name === "backspace") this.logs = [];
        else if (key.name === "tab") this.widget = "devices";
        else if (key.name === "left" || ch === "h") this.scrollLogsLeft();
        else if (key.name === "right" || ch === "l") this.scrollLogsRight();
        return undefined;

      case "add":
        if (key.name === "escape") this.closeDialog();
        else if (key.name === "return") await this.addDevice();
        else if (key.name === "backspace") {
          if (this.adding === "name") this.nameInput = this.nameInput.slice(0, -1);
          else this.ipInput = this.ipInput.slice(0, -1);
        } else if (key.name === "tab" || key.name === "up" || key.name === "down") this.toggleAddingField();
        else if (ch) {
          if (this.adding === "name") this.nameInput += ch;
          else this.ipInput += ch;
        }
        return undefined;

      case "settings":
        if (key.name === "escape" || ch === "q") this.closeDialog();
        else if (key.name === "return") await this.applySettings();
        else if (key.name === "backspace") {
          if (this.setting === "brightness") this.brightnessInput = this.brightnessInput.slice(0, -1);
          else if (this.colorInput.length > 1) this.colorInput = this.colorInput.slice(0, -1);
        } else if (key.name === "tab" || key.name === "up" || key.name === "down") this.toggleSettingsField();
        else if (ch) {
          if (this.setting === "brightness") this.brightnessInput += ch;
          else if (this.colorInput.length < 7) this.colorInput += ch;
        }
        return undefined;
    }
  }
}
