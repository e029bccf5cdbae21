export type {
  ActionData,
  BeaconDeviceInfo,
  BeaconSendResult,
  CapturePolicySource,
} from "./types.js";
export type { BeaconBuilderOptions } from "./beacon-builder.js";
export { BeaconBuilder } from "./beacon-builder.js";

export type { StatusResponse } from "./status-response.js";
export { parseStatusResponse } from "./status-response.js";

export type { TransportClient, HttpTransportOptions } from "./transport.js";
export { HttpTransportClient } from "./transport.js";

export type { WireField, WireValue, DecodedBeacon } from "./wire.js";
export {
  encodeFields,
  decodeFields,
  decodePairs,
  decodeBeacon,
  toWellFormed,
  FIELD_DELIMITER,
} from "./wire.js";

export {
  EventType,
  WireKey,
  PROTOCOL_VERSION,
  SDK_VERSION,
  PLATFORM_TYPE,
  AGENT_TECHNOLOGY,
} from "./event-types.js";
