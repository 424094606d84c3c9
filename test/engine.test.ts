import { MockAgent } from "undici";
import { afterEach, describe, expect, it } from "vitest";
import { HttpBulbClient } from "../src/adapters/bulb.js";
import { CommandDispatcher } from "../src/core/dispatcher.js";
import { BulbEngine } from "../src/core/engine.js";
import { DeviceRegistry } from "../src/core/registry.js";
import { InvalidCommandError } from "../src/util/errors.js";
import { addr, fakeEngine, FakeResolver, FakeTransport, state } from "./fakes.js";

const A = addr("10.0.0.2");
const B = addr("10.0.0.3");

describe("BulbEngine", () => {
  it("reports a partial failure and records both outcomes when one bulb hangs", async () => {
    const engine = fakeEngine(new FakeTransport({ "10.0.0.3": { kind: "hang" } }), undefined, 30);
    engine.registry.upsert(A);
    engine.registry.upsert(B);

    const report = await engine.execute({ name: "power", value: "on" }, [A, B]);

    expect(report.outcome).toBe("partial_failure");
    expect(report.details[0]).toMatchObject({ ok: true, state: { power: "on" } });
    expect(report.details[1]).toMatchObject({ ok: false, failure: "timeout" });
    expect(engine.registry.get(A)).toMatchObject({ health: "reachable", state: { power: "on" } });
    expect(engine.registry.get(B)).toMatchObject({ health: "unreachable", state: null });
  });

  it("keeps the registry in line with what finished when a dispatch is cancelled", async () => {
    const C = addr("10.0.0.4");
    const transport = new FakeTransport({}, { kind: "ok", delayMs: 40 });
    const engine = new BulbEngine(
      new DeviceRegistry(),
      new CommandDispatcher(transport, { timeoutMs: 1000, maxConcurrency: 1 }),
      new FakeResolver(),
    );
    engine.registry.upsert(A, { name: "desk" });
    const before = [
      engine.registry.upsert(B, { name: "shelf", state: state({ brightness: 20 }), health: "reachable" }),
      engine.registry.upsert(C, { health: "unreachable" }),
    ];

    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const report = await engine.execute({ name: "power", value: "on" }, [A, B, C], { signal: controller.signal });

    expect(report.outcome).toBe("partial_failure");
    expect(report.details.map((d) => (d.ok ? "ok" : d.failure))).toEqual(["ok", "cancelled", "cancelled"]);
    expect(engine.registry.get(A)).toMatchObject({ name: "desk", health: "reachable", state: { power: "on" } });
    expect(engine.registry.get(B)).toBe(before[0]);
    expect(engine.registry.get(C)).toBe(before[1]);
    expect(transport.calls).toEqual([{ op: "power on", address: "10.0.0.2" }]);
  });

  it("rejects an empty target set without sending anything", async () => {
    const transport = new FakeTransport();
    const engine = fakeEngine(transport);
    await expect(engine.execute({ name: "power", value: "on" }, [])).rejects.toThrow(InvalidCommandError);
    expect(transport.calls).toEqual([]);
  });

  it("adds discovered addresses with unknown health and keeps known ones", async () => {
    const resolver = new FakeResolver([A, B]);
    const engine = fakeEngine(new FakeTransport(), resolver);
    engine.registry.upsert(A, { name: "desk", health: "reachable" });

    const found = await engine.discover();

    expect(found).toEqual([A, B]);
    expect(engine.registry.get(A)).toMatchObject({ name: "desk", health: "reachable" });
    expect(engine.registry.get(B)).toMatchObject({ name: "", health: "unknown", state: null });
  });

  it("treats an empty network as a normal result", async () => {
    const engine = fakeEngine(new FakeTransport(), new FakeResolver([]));
    await expect(engine.discover()).resolves.toEqual([]);
    expect(engine.registry.size).toBe(0);
  });

  describe("over HTTP", () => {
    let agent: MockAgent;

    afterEach(async () => {
      await agent.close();
    });

    it("stores the queried state of a bulb", async () => {
      agent = new MockAgent();
      agent.disableNetConnect();
      agent.get("http://10.0.0.2").intercept({ path: "/led", method: "GET" }).reply(200, { brightness: 0.8, color: "#FF0000", on: 1 });
      const transport = new HttpBulbClient({ dispatcher: agent, now: () => 5000 });
      const engine = new BulbEngine(new DeviceRegistry(), new CommandDispatcher(transport, { timeoutMs: 1000 }), new FakeResolver());

      const report = await engine.execute({ name: "status" }, [A]);

      expect(report.outcome).toBe("success");
      expect(engine.registry.get(A)).toEqual({
        address: A,
        name: "",
        health: "reachable",
        state: { power: "on", brightness: 80, color: { r: 255, g: 0, b: 0 }, updatedAt: 5000 },
      });
    });
  });
});
