import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createDefaultCapturePolicy, type CapturePolicy } from "@beaconkit/core";
import type { EventCache } from "@beaconkit/cache";
import { ManualClock } from "@beaconkit/providers";
import { DispatchSender, type DispatchSenderOptions } from "./dispatch-sender.js";
import { CapturePolicyStore } from "./policy-store.js";
import { Session } from "./session.js";
import {
  createTestBeacon,
  createTestCache,
  statusResponse,
  stubTransport,
  type StubTransport,
} from "./test-helpers.js";

describe("DispatchSender", () => {
  let clock: ManualClock;
  let cache: EventCache;
  let policy: CapturePolicyStore;
  let transport: StubTransport;
  let sender: DispatchSender;
  let nextSessionNumber: number;

  function createSender(overrides: Partial<DispatchSenderOptions> = {}): DispatchSender {
    return new DispatchSender({
      transport,
      cache,
      policy,
      clock,
      maxRecordAgeMs: 60_000,
      captureOffRetryIntervalMs: 5,
      initialRetryDelayMs: 1000,
      maxRetryDelayMs: 4000,
      statusRetries: 5,
      ...overrides,
    });
  }

  const newSession = (): Session =>
    new Session(sender, createTestBeacon(nextSessionNumber++, cache, policy, clock));

  beforeEach(() => {
    clock = new ManualClock(5000);
    cache = createTestCache();
    policy = new CapturePolicyStore(createDefaultCapturePolicy(60_000));
    transport = stubTransport();
    nextSessionNumber = 1;
    sender = createSender();
  });

  afterEach(async () => {
    await sender.shutdown();
  });

  describe("registry", () => {
    it("registers a new session as open", () => {
      const session = newSession();

      expect(sender.openSessions()).toEqual([session]);
      expect(sender.finishingSessions()).toEqual([]);
    });

    it("ignores a repeated registration", () => {
      const session = newSession();

      sender.startSession(session);

      expect(sender.openSessions()).toHaveLength(1);
    });

    it("moves an ended session to finishing", () => {
      const session = newSession();

      session.end();

      expect(sender.openSessions()).toEqual([]);
      expect(sender.finishingSessions()).toEqual([session]);
    });
  });

  describe("runCycle()", () => {
    it("sends open sessions before finishing ones and closes drained finishing sessions", async () => {
      const finishing = newSession();
      const open = newSession();
      finishing.end();
      const closed: number[] = [];
      sender.on("sessionClosed", (id) => closed.push(id));

      await sender.runCycle();

      expect(transport.payloads).toHaveLength(2);
      expect(transport.payloads[0]).toContain("&sn=2&");
      expect(transport.payloads[1]).toContain("&sn=1&");
      expect(finishing.getState()).toBe("closed");
      expect(open.getState()).toBe("active");
      expect(sender.finishingSessions()).toEqual([]);
      expect(closed).toEqual([1]);
    });

    it("keeps an open session registered after its data was sent", async () => {
      const session = newSession();

      await sender.runCycle();

      expect(session.isEmpty()).toBe(true);
      expect(sender.openSessions()).toEqual([session]);
    });

    it("backs off a failing session exponentially up to the cap", async () => {
      const session = newSession();
      session.end();
      transport.failBeacons(10);
      const send = vi.spyOn(transport, "sendBeaconRequest");

      await sender.runCycle();
      expect(sender.failureCount(session)).toBe(1);

      await sender.runCycle();
      expect(send).toHaveBeenCalledTimes(1);

      clock.advance(1000);
      await sender.runCycle();
      expect(sender.failureCount(session)).toBe(2);

      clock.advance(1999);
      await sender.runCycle();
      expect(send).toHaveBeenCalledTimes(2);

      clock.advance(1);
      await sender.runCycle();
      expect(sender.failureCount(session)).toBe(3);

      clock.advance(4000);
      await sender.runCycle();
      expect(sender.failureCount(session)).toBe(4);

      clock.advance(4000);
      await sender.runCycle();
      expect(send).toHaveBeenCalledTimes(5);
      expect(session.getState()).toBe("ending");
      expect(sender.finishingSessions()).toEqual([session]);
    });

    it("resets the backoff after a successful send", async () => {
      const session = newSession();
      session.end();
      transport.failBeacons(1);

      await sender.runCycle();
      clock.advance(1000);
      await sender.runCycle();

      expect(sender.failureCount(session)).toBe(0);
      expect(session.getState()).toBe("closed");
      expect(transport.payloads).toHaveLength(1);
    });

    it("does not delay other sessions when one fails", async () => {
      const failing = newSession();
      const healthy = newSession();
      transport.failBeacons(1);

      await sender.runCycle();

      expect(sender.failureCount(failing)).toBe(1);
      expect(sender.failureCount(healthy)).toBe(0);
      expect(transport.payloads).toHaveLength(1);
      expect(transport.payloads[0]).toContain("&sn=2&");
    });

    it("uses the server id and multiplicity of the newest response", async () => {
      newSession();
      newSession();
      transport.respondWith(statusResponse({ captureEnabled: true, serverId: 5, multiplicity: 2 }));
      const send = vi.spyOn(transport, "sendBeaconRequest");

      await sender.runCycle();

      expect(send.mock.calls.map(([serverId]) => serverId)).toEqual([1, 5]);
      expect(transport.payloads[0]).toContain("&mp=1&");
      expect(transport.payloads[1]).toContain("&mp=2&");
      expect(policy.current().serverId).toBe(5);
    });

    it("drops every session and all buffered data when capture is disabled", async () => {
      const first = newSession();
      const second = newSession();
      second.end();
      transport.respondWith(statusResponse({ captureEnabled: false }));
      const changes: CapturePolicy[] = [];
      sender.on("policyChanged", (p) => changes.push(p));

      await sender.runCycle();

      expect(transport.payloads).toHaveLength(1);
      expect(first.getState()).toBe("closed");
      expect(second.getState()).toBe("closed");
      expect(sender.openSessions()).toEqual([]);
      expect(sender.finishingSessions()).toEqual([]);
      expect(cache.totalBytes()).toBe(0);
      expect(changes.map((p) => p.captureEnabled)).toEqual([false]);
    });

    it("sends nothing while capture is disabled", async () => {
      policy.apply(statusResponse({ captureEnabled: false }));
      const session = newSession();

      await sender.runCycle();

      expect(transport.payloads).toEqual([]);
      expect(session.isEmpty()).toBe(true);
    });

    it("emits no change event when a response repeats the current policy", async () => {
      newSession();
      transport.respondWith(statusResponse({ captureEnabled: true }));
      const listener = vi.fn();
      sender.on("policyChanged", listener);

      await sender.runCycle();

      expect(listener).not.toHaveBeenCalled();
      expect(policy.current().version).toBe(1);
    });

    it("drops records older than the maximum age before sending", async () => {
      const session = newSession();
      session.end();
      clock.advance(60_001);

      await sender.runCycle();

      expect(transport.payloads).toEqual([]);
      expect(session.getState()).toBe("closed");
    });
  });

  describe("background loop", () => {
    it("applies the initial status response", async () => {
      transport.respondWith(statusResponse({ captureEnabled: true, serverId: 3 }));

      sender.start();

      await expect(sender.waitForInit()).resolves.toBe(true);
      expect(transport.statusRequests).toBe(1);
      expect(policy.current().serverId).toBe(3);
    });

    it("retries the initial status request", async () => {
      sender = createSender({ initialRetryDelayMs: 1, maxRetryDelayMs: 2 });
      transport.failStatus(2);

      sender.start();

      await expect(sender.waitForInit()).resolves.toBe(true);
      expect(transport.statusRequests).toBe(3);
    });

    it("gives up after the configured number of retries", async () => {
      sender = createSender({ initialRetryDelayMs: 1, maxRetryDelayMs: 2, statusRetries: 2 });
      transport.failStatus(10);

      sender.start();

      await expect(sender.waitForInit()).resolves.toBe(false);
      expect(transport.statusRequests).toBe(3);
      expect(policy.current().version).toBe(0);
    });

    it("reports a failed initialization when never started", async () => {
      await expect(sender.waitForInit()).resolves.toBe(false);
    });

    it("polls the status while capture is disabled", async () => {
      transport.respondWith(statusResponse({ captureEnabled: false }));

      sender.start();
      await sender.waitForInit();

      await vi.waitFor(() => {
        expect(transport.statusRequests).toBeGreaterThanOrEqual(2);
      });
    });
  });

  describe("shutdown()", () => {
    it("ends open sessions and flushes every session once", async () => {
      const open = newSession();
      const ending = newSession();
      ending.end();

      await sender.shutdown();

      expect(transport.payloads).toHaveLength(2);
      expect(transport.payloads[0]).toContain("et=19&sn=2&");
      expect(transport.payloads[1]).toContain("et=19&sn=1&");
      expect(open.getState()).toBe("closed");
      expect(ending.getState()).toBe("closed");
      expect(sender.openSessions()).toEqual([]);
      expect(sender.finishingSessions()).toEqual([]);
    });

    it("abandons data that could not be sent", async () => {
      const session = newSession();
      transport.failBeacons(10);

      await sender.shutdown();

      expect(session.getState()).toBe("closed");
      expect(cache.totalBytes()).toBe(0);
    });

    it("closes sessions created afterwards", async () => {
      await sender.shutdown();

      const late = newSession();

      expect(late.getState()).toBe("closed");
      expect(late.isEmpty()).toBe(true);
      expect(sender.openSessions()).toEqual([]);
    });

    it("stops the background loop", async () => {
      sender.start();
      await sender.waitForInit();

      await sender.shutdown();
      await sender.shutdown();

      expect(transport.statusRequests).toBe(1);
    });
  });
});
