import chalk from "chalk";
import { formatDevice } from "../format.js";
import type { App } from "./app.js";

const HELP: Array<[string, string]> = [
  ["[a]", "add device"],
  ["[A]", "discover devices"],
  ["<c>", "change color"],
  ["[d]", "remove device"],
  ["<e>", "ON/OFF"],
  ["<q>", "quit"],
  ["<space>", "select"],
];

export function helpLine(): string {
  return HELP.map(([k, label]) => `${chalk.blue.bold(k)}:${label}`).join(" ");
}

function box(title: string, body: string[], width: number, focused: boolean): string[] {
  const paint = focused ? chalk.blueBright : (s: string) => s;
  const inner = Math.max(0, width - title.length - 5);
  return [
    paint(`┌ ${title} ${"─".repeat(inner)}┐`),
    ...body.map((line) => `${paint("│")} ${line}`),
    paint(`└${"─".repeat(Math.max(0, width - 2))}┘`),
  ];
}

function deviceRows(app: App): string[] {
  if (app.devices.length === 0) return [chalk.dim("no devices, press a to add or A to discover")];
  return app.devices.map((d, i) => {
    const marker = app.isSelected(d.address) ? ">" : " ";
    let style = d.state?.power === "on" ? chalk.bold.blue : chalk.bold.gray;
    if (i === app.cursor) style = style.bgBlueBright;
    const swatch = d.state ? chalk.bgRgb(d.state.color.r, d.state.color.g, d.state.color.b)("   ") : "   ";
    return `${style(`${marker} ${formatDevice(d)}`)}  ${swatch}`;
  });
}

function dialog(app: App, width: number): string[] {
  const field = (active: boolean, label: string, value: string) =>
    `${active ? chalk.yellow("›") : " "} ${label.padEnd(11)} ${value}`;
  if (app.widget === "add") {
    return box(
      "Add device",
      [field(app.adding === "ip", "Address", app.ipInput), field(app.adding === "name", "Name", app.nameInput)],
      width,
      true,
    );
  }
  if (app.widget === "settings") {
    return box(
      "Settings",
      [
        field(app.setting === "color", "Color", app.colorInput),
        field(app.setting === "brightness", "Brightness", app.brightnessInput),
      ],
      width,
      true,
    );
  }
  return [];
}

/** The whole screen, one string per terminal row. */
export function render(app: App, width: number, height: number): string[] {
  const top = [helpLine(), ...box("Devices", deviceRows(app), width, app.widget === "devices")];
  const modal = dialog(app, width);
  const logRoom = Math.max(1, height - top.length - modal.length - 2);
  const logs = app.logs.slice(0, logRoom).map((l) => l.replace(/\n/g, " ").slice(app.logOffset));
  const screen = [...top, ...modal, ...box("Logs", logs, width, app.widget === "logs")];
  return screen.slice(0, height);
}
