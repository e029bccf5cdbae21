import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigurationError } from "@beaconkit/core";
import { decodeBeacon } from "@beaconkit/protocol";
import { ManualClock } from "@beaconkit/providers";
import { BeaconKit, createBeaconKit } from "./beaconkit.js";
import { statusResponse, stubTransport, type StubTransport } from "./test-helpers.js";

const CONFIG = {
  endpoint: "https://collector.example.com/mbeacon",
  applicationId: "app-1",
  applicationName: "Demo",
  deviceId: "device-1",
};

describe("BeaconKit", () => {
  let clock: ManualClock;
  let transport: StubTransport;
  let kit: BeaconKit;

  beforeEach(() => {
    clock = new ManualClock(10_000);
    transport = stubTransport();
    kit = createBeaconKit(CONFIG, {
      transport,
      clock,
      workerIds: { currentWorkerId: () => 0 },
      autoStart: false,
    });
  });

  afterEach(async () => {
    await kit.shutdown();
  });

  it("rejects invalid configuration", () => {
    expect(() => createBeaconKit({ ...CONFIG, endpoint: "not a url" }, { transport })).toThrow(
      ConfigurationError,
    );
  });

  it("starts with the default capture policy", () => {
    expect(kit.getPolicy()).toMatchObject({
      version: 0,
      captureEnabled: true,
      serverId: 1,
      maxBeaconSizeBytes: 30 * 1024,
      sendIntervalMs: 120_000,
    });
  });

  it("numbers sessions consecutively", () => {
    expect(kit.createSession().id).toBe(1);
    expect(kit.createSession().id).toBe(2);
    expect(kit.getSender().openSessions()).toHaveLength(2);
  });

  it("ships a session's actions with the device prefix", async () => {
    const session = kit.createSession("10.0.0.1");
    clock.advance(20);
    const action = session.enterAction("load");
    clock.advance(30);
    action.leaveAction();
    session.end();

    await kit.getSender().runCycle();

    expect(transport.payloads).toHaveLength(1);
    const beacon = decodeBeacon(transport.payloads[0] ?? "");
    expect(Object.fromEntries(beacon.prefix)).toEqual({
      vv: "3",
      va: "0.1.0",
      ap: "app-1",
      an: "Demo",
      vn: "0.0.0",
      pt: "1",
      tt: "beaconkit-node",
      vi: "device-1",
      sn: "1",
      ip: "10.0.0.1",
      mp: "1",
      tv: "10000",
      ts: "10000",
      tx: "10050",
    });
    expect(beacon.records.map((r) => r.get("et"))).toEqual(["18", "1", "19"]);
    expect(Object.fromEntries(beacon.records[1] ?? [])).toEqual({
      et: "1",
      sn: "1",
      it: "0",
      na: "load",
      ca: "1",
      pa: "0",
      s0: "2",
      t0: "20",
      s1: "3",
      t1: "30",
    });
    expect(session.getState()).toBe("closed");
  });

  it("reports a successful initialization", async () => {
    const started = createBeaconKit(CONFIG, { transport, clock });
    try {
      await expect(started.waitForInitCompletion(1000)).resolves.toBe(true);
    } finally {
      await started.shutdown();
    }
  });

  it("reports no initialization while the loop is not running", async () => {
    await expect(kit.waitForInitCompletion()).resolves.toBe(false);
  });

  it("exposes policy updates from the collector", async () => {
    transport.respondWith(statusResponse({ captureEnabled: true, maxBeaconSizeKB: 2 }));
    kit.createSession();

    await kit.getSender().runCycle();

    expect(kit.getPolicy().maxBeaconSizeBytes).toBe(2048);
  });

  it("flushes open sessions on shutdown", async () => {
    const session = kit.createSession();
    session.identifyUser("alice");

    await kit.shutdown();

    expect(transport.payloads).toHaveLength(1);
    expect(transport.payloads[0]).toContain("et=60&sn=1&it=0&na=alice&");
    expect(session.getState()).toBe("closed");
  });
});
