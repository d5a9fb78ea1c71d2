import fs from "fs";
import path from "path";
import zlib from "zlib";
import { redactIfEnabled } from "../adb/adb";
import { adb, adbStream, ask, requireDevice, type Session } from "../adb/session";
import { outputPath } from "../config";
import { parseIntOr } from "../shared/cli";
import { ensureDir, fileSafe, fileTimestamp } from "../shared/lib";
import { logger } from "../shared/logger";

export const LOG_PRIORITIES = ["V", "D", "I", "W", "E", "F", "S"] as const;

export function normalizePriority(raw: string, fallback = "I") {
  const v = raw.trim().toUpperCase();
  return (LOG_PRIORITIES as readonly string[]).includes(v) ? v : fallback;
}

export function filterSpec(tag: string, priority: string) {
  return [`${tag || "*"}:${priority}`, "*:S"];
}

export async function tailLogcat(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  console.log("Streaming logcat. Press Ctrl+C to stop.");
  await adbStream(session, ["logcat"]);
}

export async function tailFilteredLogcat(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const tag = (await ask(session, "Tag (default *): ")) || "*";
  const priority = normalizePriority(await ask(session, "Priority [V/D/I/W/E/F/S] (default I): "));
  console.log("Streaming filtered logcat. Press Ctrl+C to stop.");
  await adbStream(session, ["logcat", ...filterSpec(tag, priority)]);
}

export function saveLogcatSnapshot(session: Session): string {
  if (!requireDevice(session)) return "";
  const filePath = outputPath(session.settings, `logcat_${fileSafe(session.serial)}_${fileTimestamp(session.clock.now())}.txt`);
  const raw = adb(session, ["logcat", "-d"], { check: true }).stdout;
  ensureDir(session.settings.outputDir);
  fs.writeFileSync(filePath, redactIfEnabled(session.settings, raw), "utf-8");
  console.log(`Saved logcat snapshot: ${filePath}`);
  return filePath;
}

const BUGREPORT_TIMEOUT_MS = 10 * 60_000;

/** logcat dump plus a full bugreport zip in one timestamped directory. */
export function collectLogBundle(session: Session): string {
  if (!requireDevice(session)) return "";
  const dir = outputPath(session.settings, `bundle_${fileSafe(session.serial)}_${fileTimestamp(session.clock.now())}`);
  ensureDir(dir);
  const logcat = adb(session, ["logcat", "-d"]).stdout;
  fs.writeFileSync(path.join(dir, "logcat.txt"), redactIfEnabled(session.settings, logcat), "utf-8");
  console.log("Collecting bugreport (this can take a few minutes)...");
  const report = adb(session, ["bugreport", path.join(dir, "bugreport.zip")], { timeoutMs: BUGREPORT_TIMEOUT_MS });
  if (report.exitCode !== 0) {
    logger.error("bugreport failed", { serial: session.serial, stderr: report.stderr.trim() });
    console.log("Bugreport failed; bundle contains logcat only.");
  }
  console.log(`Bundle saved in: ${dir}`);
  return dir;
}

// ---------- scheduled capture ----------

export const DEFAULT_CAPTURE_MINUTES = 5;
export const DEFAULT_CHUNK_INTERVAL_SEC = 30;
export const MIN_CAPTURE_SEC = 30;
export const MIN_CHUNK_INTERVAL_SEC = 5;

export type CapturePlan = { totalSeconds: number; intervalSeconds: number };

export function planCapture(minutesRaw: string, intervalRaw: string): CapturePlan {
  const minutes = parseIntOr(minutesRaw || String(DEFAULT_CAPTURE_MINUTES), DEFAULT_CAPTURE_MINUTES);
  const interval = parseIntOr(intervalRaw || String(DEFAULT_CHUNK_INTERVAL_SEC), DEFAULT_CHUNK_INTERVAL_SEC);
  return {
    totalSeconds: Math.max(MIN_CAPTURE_SEC, minutes * 60),
    intervalSeconds: Math.max(MIN_CHUNK_INTERVAL_SEC, interval),
  };
}

export function chunkFileName(chunk: number) {
  return `logcat_chunk_${String(chunk).padStart(3, "0")}.txt.gz`;
}

/** Dump, gzip, clear, sleep; repeated until the deadline passes. */
export async function captureLogChunks(session: Session, plan: CapturePlan): Promise<{ dir: string; chunks: number }> {
  const started = session.clock.now();
  const dir = outputPath(session.settings, `scheduled_logs_${fileSafe(session.serial)}_${fileTimestamp(started)}`);
  ensureDir(dir);
  const endAt = started.getTime() + plan.totalSeconds * 1000;
  let chunk = 1;
  while (session.clock.now().getTime() < endAt) {
    const raw = adb(session, ["logcat", "-d"]).stdout;
    const target = path.join(dir, chunkFileName(chunk));
    fs.writeFileSync(target, zlib.gzipSync(Buffer.from(redactIfEnabled(session.settings, raw), "utf-8")));
    adb(session, ["logcat", "-c"]);
    logger.debug("log chunk written", { chunk, path: target });
    chunk += 1;
    if (session.clock.now().getTime() < endAt) await session.clock.sleep(plan.intervalSeconds * 1000);
  }
  console.log(`Scheduled logs saved in: ${dir}`);
  return { dir, chunks: chunk - 1 };
}

export async function scheduledLogCapture(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const minutes = await ask(session, `Duration minutes (default ${DEFAULT_CAPTURE_MINUTES}): `);
  const interval = await ask(session, `Chunk interval seconds (default ${DEFAULT_CHUNK_INTERVAL_SEC}): `);
  await captureLogChunks(session, planCapture(minutes, interval));
}
