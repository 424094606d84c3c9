import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HttpBulbClient, parseStatus } from "../src/adapters/bulb.js";
import { parseAddress } from "../src/util/address.js";
import { DeviceUnreachableError, ProtocolError } from "../src/util/errors.js";

const A = parseAddress("10.0.0.5");

describe("parseStatus", () => {
  it("converts the firmware's fraction and flag", () => {
    expect(parseStatus({ brightness: 0.8, color: "#FF0000", on: 1 }, 42)).toEqual({
      power: "on",
      brightness: 80,
      color: { r: 255, g: 0, b: 0 },
      updatedAt: 42,
    });
  });

  it("accepts the older enabled flag", () => {
    expect(parseStatus({ brightness: 0, color: "#000000", enabled: 0 }, 1)?.power).toBe("off");
  });

  it("returns null for documents that are not a status", () => {
    expect(parseStatus({ brightness: 0.5, color: "#FF0000" })).toBeNull();
    expect(parseStatus({ brightness: 2, color: "#FF0000", on: 1 })).toBeNull();
    expect(parseStatus({ brightness: 0.5, color: "blue", on: 1 })).toBeNull();
    expect(parseStatus("OK")).toBeNull();
  });
});

describe("HttpBulbClient", () => {
  let agent: MockAgent;
  let client: HttpBulbClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new HttpBulbClient({ dispatcher: agent, now: () => 1000 });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("reads the status document", async () => {
    agent.get("http://10.0.0.5").intercept({ path: "/led", method: "GET" }).reply(200, { brightness: 0.8, color: "#FF0000", on: 1 });
    await expect(client.getState(A)).resolves.toEqual({ power: "on", brightness: 80, color: { r: 255, g: 0, b: 0 }, updatedAt: 1000 });
  });

  it("reads the state back after a PUT without a status body", async () => {
    const pool = agent.get("http://10.0.0.5");
    pool.intercept({ path: "/led/brightness/0.3", method: "PUT" }).reply(200, "OK");
    pool.intercept({ path: "/led", method: "GET" }).reply(200, { brightness: 0.3, color: "#00FF00", on: 1 });
    const s = await client.setBrightness(A, 30);
    expect(s.brightness).toBe(30);
    agent.assertNoPendingInterceptors();
  });

  it("uses a status body returned by the PUT", async () => {
    agent.get("http://10.0.0.5").intercept({ path: "/led/color/FF8800", method: "PUT" }).reply(200, { brightness: 1, color: "#FF8800", on: 1 });
    const s = await client.setColor(A, { r: 255, g: 136, b: 0 });
    expect(s.color).toEqual({ r: 255, g: 136, b: 0 });
  });

  it("talks to non-default ports", async () => {
    agent.get("http://10.0.0.5:8080").intercept({ path: "/led/off", method: "PUT" }).reply(200, { brightness: 0.5, color: "#FFFFFF", on: 0 });
    const s = await client.setPower(parseAddress("10.0.0.5:8080"), "off");
    expect(s.power).toBe("off");
  });

  it("classifies an HTTP error status as a protocol error", async () => {
    agent.get("http://10.0.0.5").intercept({ path: "/led/on", method: "PUT" }).reply(500, "boom");
    await expect(client.setPower(A, "on")).rejects.toThrow(new ProtocolError("10.0.0.5", "HTTP 500 boom"));
  });

  it("classifies a malformed body as a protocol error", async () => {
    agent.get("http://10.0.0.5").intercept({ path: "/led", method: "GET" }).reply(200, "<html>");
    await expect(client.getState(A)).rejects.toBeInstanceOf(ProtocolError);
  });

  it("classifies a connection failure as unreachable", async () => {
    agent.get("http://10.0.0.5").intercept({ path: "/led", method: "GET" }).replyWithError(new Error("connect ECONNREFUSED"));
    await expect(client.getState(A)).rejects.toBeInstanceOf(DeviceUnreachableError);
  });
});
