import fs from "fs";
import os from "os";
import path from "path";
import { errorMessage, logger } from "./logger";

// ---------- env / path ----------

export function env(name: string, def = "", source: NodeJS.ProcessEnv = process.env) {
  const v = (source[name] || "").trim();
  return v || def;
}

export function envFlag(raw: string) {
  const v = raw.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function expandHome(p: string) {
  if (!p.startsWith("~")) return p;
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

export function ensureDir(dirPath: string) {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function isWritableDir(dirPath: string) {
  try {
    fs.accessSync(dirPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

// Paths typed into a prompt are often pasted with surrounding quotes.
export function cleanPathInput(raw: string) {
  return expandHome(raw.trim().replace(/^["']+|["']+$/g, ""));
}

// ---------- date ----------

export function fileTimestamp(d: Date) {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

/** Serials of network devices look like `192.168.1.10:5555`; keep file names portable. */
export function fileSafe(value: string) {
  return value.replace(/[^a-zA-Z0-9_.-]/g, "_");
}

// ---------- json files ----------

export function readJSONFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    logger.error("unreadable json file", { path: filePath, err: errorMessage(err) });
    return undefined;
  }
}

export function writeJSONFile(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

/** Assigns an own enumerable property, so keys such as `__proto__` are stored like any other name. */
export function setOwn<T>(record: Record<string, T>, key: string, value: T) {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

export function str(v: unknown, def = "") {
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return def;
}

// ---------- text ----------

export function truncate(text: string, max: number) {
  return text.length > max ? text.slice(0, max) : text;
}

export function nonEmptyLines(text: string) {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}
