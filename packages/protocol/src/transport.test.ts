import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProtocolError, TransportError } from "@beaconkit/core";
import { HttpTransportClient } from "./transport.js";

function mockResponse(body: string, status = 200, statusText = "OK") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => body,
  };
}

describe("HttpTransportClient", () => {
  let mockFetch: ReturnType<typeof vi.fn>;
  let client: HttpTransportClient;

  beforeEach(() => {
    mockFetch = vi.fn().mockResolvedValue(mockResponse("type=m&cp=1&id=5"));
    vi.stubGlobal("fetch", mockFetch);
    client = new HttpTransportClient({
      endpoint: "https://collector.example.com/mbeacon",
      applicationId: "app-1",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the monitor URL for a server id", () => {
    expect(client.buildUrl(7)).toBe(
      "https://collector.example.com/mbeacon?type=m&srvid=7&app=app-1&va=0.1.0&pt=1&tt=beaconkit-node",
    );
  });

  it("sends status requests as GET and parses the response", async () => {
    const response = await client.sendStatusRequest(1);

    expect(response.captureEnabled).toBe(true);
    expect(response.serverId).toBe(5);
    expect(mockFetch).toHaveBeenCalledWith(
      "https://collector.example.com/mbeacon?type=m&srvid=1&app=app-1&va=0.1.0&pt=1&tt=beaconkit-node",
      expect.objectContaining({ method: "GET" }),
    );
  });

  it("POSTs beacon payloads as text", async () => {
    const payload = new TextEncoder().encode("vv=3&et=60");

    await client.sendBeaconRequest(2, payload);

    const [url, init] = mockFetch.mock.calls[0] as [string, RequestInit];
    expect(url).toContain("srvid=2");
    expect(init.method).toBe("POST");
    expect(init.body).toBe(payload);
    expect(init.headers).toEqual({ "Content-Type": "text/plain; charset=UTF-8" });
  });

  it("throws TransportError with the status on non-success responses", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse("", 503, "Service Unavailable"));

    await expect(client.sendStatusRequest(1)).rejects.toMatchObject({
      name: "TransportError",
      status: 503,
      message: "HTTP 503: Service Unavailable",
    });
  });

  it("throws TransportError when the connection fails", async () => {
    mockFetch.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    await expect(client.sendStatusRequest(1)).rejects.toBeInstanceOf(TransportError);
  });

  it("throws ProtocolError on a malformed body", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse("<html>oops</html>"));

    await expect(client.sendStatusRequest(1)).rejects.toBeInstanceOf(ProtocolError);
  });
});
