import type { CapturePolicy } from "@beaconkit/core";
import type { StatusResponse } from "./status-response.js";

/** Read access to the current capture policy snapshot. */
export interface CapturePolicySource {
  current(): CapturePolicy;
}

/** Application and device details repeated in every beacon prefix. */
export interface BeaconDeviceInfo {
  applicationId: string;
  applicationName: string;
  applicationVersion: string;
  deviceId: string;
  operatingSystem?: string;
  manufacturer?: string;
  modelId?: string;
  clientIp?: string;
}

/** A closed action as handed to the builder. */
export interface ActionData {
  id: number;
  name: string;
  parentId: number;
  startTime: number;
  endTime: number;
  startSequence: number;
  endSequence: number;
}

export type BeaconSendResult =
  | { status: "empty" }
  | { status: "sent"; chunks: number; response: StatusResponse | undefined }
  | {
      status: "failed";
      chunks: number;
      response: StatusResponse | undefined;
      error: Error;
    };
