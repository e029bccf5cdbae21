export const EventType = {
  ACTION: 1,
  NAMED_EVENT: 10,
  VALUE_STRING: 11,
  VALUE_INT: 12,
  VALUE_DOUBLE: 13,
  SESSION_START: 18,
  SESSION_END: 19,
  ERROR: 40,
  CRASH: 50,
  IDENTIFY_USER: 60,
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const WireKey = {
  // beacon prefix
  PROTOCOL_VERSION: "vv",
  SDK_VERSION: "va",
  APPLICATION_ID: "ap",
  APPLICATION_NAME: "an",
  APPLICATION_VERSION: "vn",
  PLATFORM_TYPE: "pt",
  AGENT_TECHNOLOGY: "tt",
  VISITOR_ID: "vi",
  CLIENT_IP: "ip",
  OPERATING_SYSTEM: "os",
  MANUFACTURER: "mf",
  MODEL_ID: "md",
  MULTIPLICITY: "mp",
  SESSION_START_TIME: "tv",
  TIMESYNC_TIME: "ts",
  TRANSMISSION_TIME: "tx",

  // shared by prefix and records
  SESSION_NUMBER: "sn",

  // event records
  EVENT_TYPE: "et",
  NAME: "na",
  WORKER_ID: "it",
  ACTION_ID: "ca",
  PARENT_ACTION_ID: "pa",
  START_SEQUENCE: "s0",
  TIME_0: "t0",
  END_SEQUENCE: "s1",
  TIME_1: "t1",
  VALUE: "vl",
  ERROR_CODE: "ev",
  REASON: "rs",
  STACKTRACE: "st",
} as const;

export const PROTOCOL_VERSION = 3;
export const SDK_VERSION = "0.1.0";
export const PLATFORM_TYPE = 1;
export const AGENT_TECHNOLOGY = "beaconkit-node";
