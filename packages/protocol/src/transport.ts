import { TransportError } from "@beaconkit/core";
import { createLogger } from "@beaconkit/logger";
import { parseStatusResponse, type StatusResponse } from "./status-response.js";
import { AGENT_TECHNOLOGY, PLATFORM_TYPE, SDK_VERSION } from "./event-types.js";

const log = createLogger("protocol:transport");

/**
 * Boundary to the collector. Both calls resolve with the parsed status
 * response and reject with `TransportError` or `ProtocolError`.
 */
export interface TransportClient {
  sendStatusRequest(serverId: number): Promise<StatusResponse>;
  sendBeaconRequest(serverId: number, payload: Uint8Array): Promise<StatusResponse>;
}

export interface HttpTransportOptions {
  /** Collector monitor URL, e.g. https://collector.example.com/mbeacon */
  endpoint: string;
  applicationId: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  requestTimeoutMs?: number;
}

/**
 * TransportClient over the global `fetch`.
 * Status requests are GETs; beacons are POSTed as UTF-8 text.
 */
export class HttpTransportClient implements TransportClient {
  private readonly endpoint: string;
  private readonly applicationId: string;
  private readonly requestTimeoutMs: number;

  constructor(options: HttpTransportOptions) {
    this.endpoint = options.endpoint;
    this.applicationId = options.applicationId;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  sendStatusRequest(serverId: number): Promise<StatusResponse> {
    return this.exchange(serverId, { method: "GET" });
  }

  sendBeaconRequest(serverId: number, payload: Uint8Array): Promise<StatusResponse> {
    return this.exchange(serverId, {
      method: "POST",
      headers: { "Content-Type": "text/plain; charset=UTF-8" },
      body: payload,
    });
  }

  /** Monitor URL for the given server id. */
  buildUrl(serverId: number): string {
    const url = new URL(this.endpoint);
    url.searchParams.set("type", "m");
    url.searchParams.set("srvid", String(serverId));
    url.searchParams.set("app", this.applicationId);
    url.searchParams.set("va", SDK_VERSION);
    url.searchParams.set("pt", String(PLATFORM_TYPE));
    url.searchParams.set("tt", AGENT_TECHNOLOGY);
    return url.toString();
  }

  private async exchange(serverId: number, init: RequestInit): Promise<StatusResponse> {
    const url = this.buildUrl(serverId);

    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      body = await response.text();
    } catch (err) {
      throw new TransportError(`Request to ${url} failed: ${err}`, { cause: err });
    }

    if (!response.ok) {
      throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
        status: response.status,
      });
    }

    log.debug(`${init.method} ${url} -> ${response.status} (${body.length} chars)`);
    return parseStatusResponse(body);
  }
}
