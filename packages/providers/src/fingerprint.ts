import { createHash, randomUUID } from "node:crypto";
import { execSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { createLogger } from "@beaconkit/logger";

const log = createLogger("providers:fingerprint");

interface MachineIdSource {
  label: string;
  read(): string;
  /** First capture group is the machine id. */
  pattern: RegExp;
}

const run = (command: string): string => execSync(command, { encoding: "utf-8", timeout: 5000 });

const MACHINE_ID_SOURCES: Partial<Record<NodeJS.Platform, MachineIdSource>> = {
  darwin: {
    label: "IOPlatformUUID",
    read: () => run("ioreg -rd1 -c IOPlatformExpertDevice"),
    pattern: /"IOPlatformUUID"\s*=\s*"([^"]+)"/,
  },
  win32: {
    label: "MachineGuid",
    read: () => run('reg query "HKLM\\SOFTWARE\\Microsoft\\Cryptography" /v MachineGuid'),
    pattern: /MachineGuid\s+REG_SZ\s+(\S+)/,
  },
  linux: {
    label: "/etc/machine-id",
    read: () => readFileSync("/etc/machine-id", "utf-8"),
    pattern: /^\s*([0-9a-f]{32})\s*$/,
  },
};

let visitorId: string | null = null;

const hash = (value: string): string => createHash("sha256").update(value).digest("hex");

function readMachineId(platform: NodeJS.Platform): string {
  const source = MACHINE_ID_SOURCES[platform];
  if (!source) {
    throw new Error(`Unsupported platform: ${platform}`);
  }
  const match = source.pattern.exec(source.read());
  if (!match?.[1]) {
    throw new Error(`No ${source.label} found on ${platform}`);
  }
  return match[1];
}

/** Visitor id for beacons: sha256 of the OS machine id, computed once per process. */
export function getDeviceId(): string {
  visitorId ??= hash(readMachineId(process.platform));
  return visitorId;
}

/** {@link getDeviceId}, or a random per-process id when the host has no readable machine id. */
export function getDeviceIdOrRandom(): string {
  try {
    return getDeviceId();
  } catch (err) {
    log.warn(`Falling back to a random device id: ${err}`);
    visitorId = hash(randomUUID());
    return visitorId;
  }
}
