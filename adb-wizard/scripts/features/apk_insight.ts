import fs from "fs";
import { adb, ask, runTool, type Session } from "../adb/session";
import type { SignatureCheckMode } from "../config";
import { cleanPathInput } from "../shared/lib";
import { logger } from "../shared/logger";

export type ApkMetadata = {
  packageName: string;
  versionCode: string;
  versionName: string;
  minSdk: string;
  targetSdk: string;
};

export type InstalledPackage = {
  versionCode: string;
  hasSigningDetails: boolean;
  details: string;
};

const MISMATCH_SIGNALS = ["signature mismatch", "inconsistent certificates", "does not match"];

export const DOWNGRADE_WARNING = "Warning: APK versionCode is lower than installed version (potential downgrade).";
export const STRICT_SIGNATURE_WARNING =
  "Warning: Strict mode enabled; signature mismatch cannot be verified reliably from dumpsys output.";
export const SIGNATURE_MISMATCH_WARNING = "Warning: Installed package signature may differ; install may fail.";

function quotedValue(line: string, key: string) {
  const m = line.match(new RegExp(`\\b${key}='([^']*)'`));
  return m ? m[1] : "";
}

function afterColon(line: string) {
  return line.slice(line.indexOf(":") + 1).replace(/'/g, "").trim();
}

/** Reads the fields we need out of `aapt dump badging`. */
export function parseAaptBadging(out: string): ApkMetadata {
  const meta: ApkMetadata = { packageName: "", versionCode: "", versionName: "", minSdk: "", targetSdk: "" };
  for (const raw of out.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith("package:")) {
      meta.packageName = quotedValue(line, "name");
      meta.versionCode = quotedValue(line, "versionCode");
      meta.versionName = quotedValue(line, "versionName");
    } else if (line.startsWith("sdkVersion:")) {
      meta.minSdk = afterColon(line);
    } else if (line.startsWith("targetSdkVersion:")) {
      meta.targetSdk = afterColon(line);
    }
  }
  return meta;
}

export function parseInstalledPackage(details: string): InstalledPackage {
  let versionCode = "";
  let hasSigningDetails = false;
  for (const raw of details.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith("versionCode=")) {
      versionCode = line.slice("versionCode=".length).split(/\s+/)[0];
    }
    const lower = line.toLowerCase();
    if (lower.includes("signatures:") || lower.includes("signing")) hasSigningDetails = true;
  }
  return { versionCode, hasSigningDetails, details };
}

const isDigits = (v: string) => /^\d+$/.test(v);

export function installWarnings(meta: ApkMetadata, installed: InstalledPackage, mode: SignatureCheckMode): string[] {
  const warnings: string[] = [];
  if (isDigits(meta.versionCode) && isDigits(installed.versionCode)) {
    if (Number(meta.versionCode) < Number(installed.versionCode)) warnings.push(DOWNGRADE_WARNING);
  }
  if (mode === "off" || !installed.hasSigningDetails) return warnings;
  if (mode === "strict") {
    warnings.push(STRICT_SIGNATURE_WARNING);
  } else {
    const text = installed.details.toLowerCase();
    if (MISMATCH_SIGNALS.some((signal) => text.includes(signal))) warnings.push(SIGNATURE_MISMATCH_WARNING);
  }
  return warnings;
}

export function formatMetadata(apk: string, meta: ApkMetadata) {
  const orUnknown = (v: string) => v || "unknown";
  return [
    `APK: ${apk}`,
    `Package: ${orUnknown(meta.packageName)}`,
    `Version code: ${orUnknown(meta.versionCode)}`,
    `Version name: ${orUnknown(meta.versionName)}`,
    `minSdk: ${orUnknown(meta.minSdk)}`,
    `targetSdk: ${orUnknown(meta.targetSdk)}`,
  ];
}

export type ApkInsightResult = { metadata: ApkMetadata; warnings: string[] };

export function apkInsight(session: Session, apk: string): ApkInsightResult | undefined {
  if (!fs.existsSync(apk)) {
    console.log(`APK path does not exist: ${apk}`);
    return undefined;
  }
  const badging = runTool(session, [session.settings.aaptPath, "dump", "badging", apk]);
  if (badging.exitCode !== 0 || !badging.stdout.trim()) {
    logger.debug("aapt unavailable", { aapt: session.settings.aaptPath, exitCode: badging.exitCode });
    console.log("aapt not found or metadata unavailable. Install Android build-tools for richer APK insight.");
  }
  const metadata = parseAaptBadging(badging.exitCode === 0 ? badging.stdout : "");
  for (const line of formatMetadata(apk, metadata)) console.log(line);

  let warnings: string[] = [];
  if (metadata.packageName && isDigits(metadata.versionCode) && session.serial) {
    const details = adb(session, ["shell", "dumpsys", "package", metadata.packageName]).stdout;
    warnings = installWarnings(metadata, parseInstalledPackage(details), session.settings.signatureCheckMode);
    for (const warning of warnings) console.log(warning);
  }
  return { metadata, warnings };
}

export async function apkInsightInteractive(session: Session): Promise<void> {
  const apk = cleanPathInput(await ask(session, "APK path: "));
  if (!apk) {
    console.log("APK path is required.");
    return;
  }
  apkInsight(session, apk);
}
