import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { EXIT_DEVICE_FAILURE, EXIT_OK, EXIT_USAGE, parseBrightness, runCli, type CliOptions } from "../src/cli.js";
import type { BulbEngine } from "../src/core/engine.js";
import type { StoredDevice } from "../src/store.js";
import { InvalidCommandError } from "../src/util/errors.js";
import { addr, fakeEngine, FakeResolver, FakeTransport } from "./fakes.js";

const A = addr("10.0.0.2");
const B = addr("10.0.0.3");

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { out: (l: string) => out.push(l), err: (l: string) => err.push(l) } };
}

async function run(opts: CliOptions, engine: BulbEngine, stored: StoredDevice[] = []) {
  const c = capture();
  const code = await runCli(opts, { engine, stored, io: c.io });
  return { code, out: c.out, err: c.err };
}

beforeAll(() => {
  chalk.level = 0;
});

describe("parseBrightness", () => {
  it("takes whole percentages", () => {
    expect(parseBrightness("0")).toBe(0);
    expect(parseBrightness(" 75 ")).toBe(75);
    expect(parseBrightness("100")).toBe(100);
  });

  it("rejects anything else", () => {
    expect(() => parseBrightness("0.5")).toThrow('brightness must be an integer 0-100, got "0.5"');
    expect(() => parseBrightness("-1")).toThrow(InvalidCommandError);
    expect(() => parseBrightness("101")).toThrow("brightness must be 0-100, got 101");
  });
});

describe("runCli", () => {
  it("refuses to run without an action", async () => {
    const r = await run({ addr: ["10.0.0.2"] }, fakeEngine(new FakeTransport()));
    expect(r.code).toBe(EXIT_USAGE);
    expect(r.err).toEqual(["error: nothing to do, provide argument or option that does something"]);
  });

  it("refuses to run without targets", async () => {
    const transport = new FakeTransport();
    const r = await run({ power: "on" }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_USAGE);
    expect(r.err).toEqual(["error: no devices found, provide at least one device address"]);
    expect(transport.calls).toEqual([]);
  });

  it("reports a bad color as a usage error before contacting anything", async () => {
    const transport = new FakeTransport();
    const r = await run({ addr: ["10.0.0.2"], color: "red" }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_USAGE);
    expect(r.err).toEqual(['error: invalid color "red", expected #RRGGBB']);
    expect(transport.calls).toEqual([]);
  });

  it("reports a malformed address as a usage error", async () => {
    const r = await run({ addr: ["http://10.0.0.2"], power: "on" }, fakeEngine(new FakeTransport()));
    expect(r.code).toBe(EXIT_USAGE);
    expect(r.err).toEqual(['error: invalid device address "http://10.0.0.2"']);
  });

  it("applies brightness, color, power and status in that order", async () => {
    const transport = new FakeTransport();
    const r = await run({ addr: ["10.0.0.2"], power: "on", color: "#FF0000", brightness: "80", status: true }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_OK);
    expect(transport.calls.map((c) => c.op)).toEqual(["brightness 80", "color", "power on", "status"]);
  });

  it("prints one status line per device", async () => {
    const transport = new FakeTransport().seed("10.0.0.2", { power: "on", brightness: 80, color: { r: 255, g: 0, b: 0 } });
    const stored = [{ address: A, name: "desk" }];
    const r = await run({ status: true }, fakeEngine(transport), stored);
    expect(r.code).toBe(EXIT_OK);
    expect(r.out).toEqual(["10.0.0.2" + " ".repeat(9) + "desk" + " ".repeat(13) + "ON" + " ".repeat(4) + "80 #FF0000"]);
  });

  it("exits 1 and names the failed device when one does not answer", async () => {
    const transport = new FakeTransport({ "10.0.0.3": { kind: "hang" } });
    const r = await run({ addr: ["10.0.0.2", "10.0.0.3"], power: "off" }, fakeEngine(transport, undefined, 30));
    expect(r.code).toBe(EXIT_DEVICE_FAILURE);
    expect(r.err).toEqual(["10.0.0.3: timeout - 10.0.0.3 did not answer within 30ms"]);
  });

  it("marks unreachable devices in the status listing", async () => {
    const transport = new FakeTransport({ "10.0.0.3": { kind: "unreachable" } });
    const r = await run({ addr: ["10.0.0.3"], status: true }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_DEVICE_FAILURE);
    expect(r.out).toEqual(["10.0.0.3" + " ".repeat(26) + "?      - - (unreachable)"]);
  });

  it("lets explicit addresses replace the saved list", async () => {
    const transport = new FakeTransport();
    const r = await run({ addr: ["10.0.0.9"], power: "on" }, fakeEngine(transport), [{ address: A, name: "desk" }]);
    expect(r.code).toBe(EXIT_OK);
    expect(transport.calls).toEqual([{ op: "power on", address: "10.0.0.9" }]);
  });

  it("switches every device off when the first one is on", async () => {
    const transport = new FakeTransport().seed("10.0.0.2", { power: "on" }).seed("10.0.0.3", { power: "off" });
    const r = await run({ addr: ["10.0.0.3", "10.0.0.2"], power: "toggle" }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_OK);
    expect([transport.states.get("10.0.0.2")?.power, transport.states.get("10.0.0.3")?.power]).toEqual(["off", "off"]);
    const opsFor = (key: string) => transport.calls.filter((c) => c.address === key).map((c) => c.op);
    expect(opsFor("10.0.0.2")).toEqual(["status", "power off"]);
    expect(opsFor("10.0.0.3")).toEqual(["status", "power off"]);
  });

  it("switches every device on when the first one is off", async () => {
    const transport = new FakeTransport().seed("10.0.0.2", { power: "off" }).seed("10.0.0.3", { power: "on" });
    const r = await run({ addr: ["10.0.0.2", "10.0.0.3"], power: "toggle" }, fakeEngine(transport));
    expect(r.code).toBe(EXIT_OK);
    expect([transport.states.get("10.0.0.2")?.power, transport.states.get("10.0.0.3")?.power]).toEqual(["on", "on"]);
  });

  it("adds discovered devices to the targets", async () => {
    const transport = new FakeTransport();
    const resolver = new FakeResolver([B]);
    const r = await run({ discover: true, power: "toggle" }, fakeEngine(transport, resolver), [{ address: A, name: "desk" }]);
    expect(r.code).toBe(EXIT_OK);
    expect(resolver.calls).toBe(1);
    expect(transport.states.get("10.0.0.2")?.power).toBe("on");
    expect(transport.states.get("10.0.0.3")?.power).toBe("on");
  });
});
