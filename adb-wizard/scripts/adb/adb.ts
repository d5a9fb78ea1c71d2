import fs from "fs";
import path from "path";
import { PLATFORM_TOOLS_DIR, type Settings } from "../config";

export function adbPrefix(adbPath: string, serial: string) {
  return serial ? [adbPath, "-s", serial] : [adbPath];
}

export function adbCmd(adbPath: string, serial: string, ...args: string[]) {
  return [...adbPrefix(adbPath, serial), ...args];
}

export function adbExecutableName(platform: NodeJS.Platform = process.platform) {
  return platform === "win32" ? "adb.exe" : "adb";
}

export function localAdbPath(settings: Settings, platform: NodeJS.Platform = process.platform) {
  return path.join(settings.dataDir, PLATFORM_TOOLS_DIR, adbExecutableName(platform));
}

/** Explicit setting, then the project-local platform-tools copy, then whatever `adb` is on PATH. */
export function resolveAdbPath(settings: Settings, exists: (p: string) => boolean = fs.existsSync) {
  if (settings.adbPath) return settings.adbPath;
  const local = localAdbPath(settings);
  if (exists(local)) return local;
  return "adb";
}

// ---------- redaction ----------

const redactions: Array<[RegExp, string]> = [
  [/[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g, "<redacted-email>"],
  [/\b(?:[0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}\b/g, "<redacted-mac>"],
  [/\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g, "<redacted-ip>"],
  [/\b\d{15}\b/g, "<redacted-imei>"],
];

export function redactText(text: string) {
  let out = text;
  for (const [re, replacement] of redactions) out = out.replace(re, replacement);
  return out;
}

export function redactIfEnabled(settings: Pick<Settings, "redact">, text: string) {
  return settings.redact ? redactText(text) : text;
}

export function redactValue(value: unknown): unknown {
  if (typeof value === "string") return redactText(value);
  if (Array.isArray(value)) return value.map((v) => redactValue(v));
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = redactValue(v);
    return out;
  }
  return value;
}
