import { parseChoice } from "../shared/cli";
import { ownValue } from "../shared/lib";
import { logger } from "../shared/logger";
import { loadAliases, type Aliases } from "../stores/stores";
import { adb, adbHost, ask, type Session } from "./session";

export type Device = {
  serial: string;
  /** device | offline | unauthorized | recovery | sideload | ... */
  state: string;
  product?: string;
  model?: string;
  device?: string;
  transportId?: string;
};

const DEVICE_STATES = new Set([
  "device",
  "offline",
  "unauthorized",
  "authorizing",
  "connecting",
  "recovery",
  "rescue",
  "sideload",
  "bootloader",
  "host",
  "detached",
]);

// Anything else on stdout (daemon notices, server version warnings) is not a device line.
export function parseDevices(stdout: string): Device[] {
  const devices: Device[] = [];
  for (const rawLine of stdout.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("List of devices attached") || line.startsWith("*")) continue;
    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;
    let state = parts[1];
    let rest = parts.slice(2);
    if (state === "no" && rest[0] === "permissions") {
      state = "no permissions";
      rest = [];
    } else if (!DEVICE_STATES.has(state)) {
      continue;
    }
    const dev: Device = { serial: parts[0], state };
    for (const part of rest) {
      const idx = part.indexOf(":");
      if (idx <= 0) continue;
      const key = part.slice(0, idx);
      const value = part.slice(idx + 1);
      if (key === "product") dev.product = value;
      else if (key === "model") dev.model = value;
      else if (key === "device") dev.device = value;
      else if (key === "transport_id") dev.transportId = value;
    }
    devices.push(dev);
  }
  return devices;
}

export function listDevices(session: Session): Device[] {
  const result = adbHost(session, ["devices", "-l"]);
  if (result.exitCode !== 0) {
    logger.error("failed to list adb devices", { adb: session.adbPath, stderr: result.stderr.trim() });
    return [];
  }
  return parseDevices(result.stdout);
}

export function authorizedDevices(devices: Device[]) {
  return devices.filter((d) => d.state === "device");
}

export function resolveSerial(aliases: Aliases, input: string) {
  const v = input.trim();
  return ownValue(aliases, v) || v;
}

export function aliasesForSerial(aliases: Aliases, serial: string) {
  return Object.keys(aliases)
    .filter((alias) => aliases[alias] === serial)
    .sort();
}

export function describeDevice(d: Device, aliases: Aliases = {}) {
  const parts = [d.serial, `(${d.state})`];
  if (d.model) parts.push(`model=${d.model}`);
  const names = aliasesForSerial(aliases, d.serial);
  if (names.length) parts.push(`alias=${names.join(",")}`);
  return parts.join(" ");
}

/** Prompts for a device from the list; returns "" when the pick is invalid. */
export async function chooseDevice(session: Session, devices: Device[]): Promise<string> {
  const aliases = loadAliases(session.settings);
  devices.forEach((d, i) => console.log(`${i + 1}) ${describeDevice(d, aliases)}`));
  const idx = parseChoice(await ask(session, "Select device number: "), devices.length);
  if (idx < 0) {
    console.log("Invalid choice.");
    return "";
  }
  return devices[idx].serial;
}

export async function selectInitialDevice(session: Session): Promise<void> {
  const requested = session.settings.serial;
  if (requested) {
    session.serial = resolveSerial(loadAliases(session.settings), requested);
    logger.info("use requested device", { serial: session.serial });
    return;
  }
  const online = authorizedDevices(listDevices(session));
  if (online.length === 0) {
    logger.error("no authorized device found; connect one or use Switch device later");
    return;
  }
  if (online.length === 1) {
    session.serial = online[0].serial;
    logger.info("use the only connected device", { serial: session.serial });
    return;
  }
  console.log("Multiple devices connected:");
  session.serial = await chooseDevice(session, online);
}

export async function switchDevice(session: Session): Promise<void> {
  const devices = listDevices(session);
  if (devices.length === 0) {
    console.log("No devices found.");
    return;
  }
  const serial = await chooseDevice(session, devices);
  if (!serial) return;
  session.serial = serial;
  console.log(`Selected device: ${serial}`);
}

export type DeviceSummary = {
  serial: string;
  state: string;
  model: string;
  brand: string;
  android_version: string;
  api_level: string;
  battery_level: string;
};

export function parseBatteryLevel(dumpsys: string) {
  const m = dumpsys.match(/^\s*level:\s*(\d+)/m);
  return m ? `${m[1]}%` : "";
}

export function getprop(session: Session, name: string) {
  return adb(session, ["shell", "getprop", name]).stdout.trim();
}

export function deviceSummary(session: Session): DeviceSummary {
  return {
    serial: session.serial,
    state: adb(session, ["get-state"]).stdout.trim() || "unknown",
    model: getprop(session, "ro.product.model"),
    brand: getprop(session, "ro.product.brand"),
    android_version: getprop(session, "ro.build.version.release"),
    api_level: getprop(session, "ro.build.version.sdk"),
    battery_level: parseBatteryLevel(adb(session, ["shell", "dumpsys", "battery"]).stdout),
  };
}

export function printDeviceSummary(summary: DeviceSummary) {
  console.log(`Serial: ${summary.serial}`);
  console.log(`State: ${summary.state}`);
  console.log(`Model: ${summary.model || "unknown"}`);
  console.log(`Brand: ${summary.brand || "unknown"}`);
  console.log(`Android: ${summary.android_version || "unknown"} (API ${summary.api_level || "?"})`);
  console.log(`Battery: ${summary.battery_level || "unknown"}`);
}
