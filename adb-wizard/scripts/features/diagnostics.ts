import fs from "fs";
import { redactIfEnabled, redactValue } from "../adb/adb";
import { adb, adbHost, ask, requireDevice, runTool, shellOut, type Session } from "../adb/session";
import { ALIASES_FILE, PROFILES_FILE, WORKFLOWS_FILE, outputPath, type Settings } from "../config";
import { isYes } from "../shared/cli";
import { cleanPathInput, ensureDir, fileSafe, fileTimestamp, isRecord, isWritableDir, readJSONFile, str, truncate, writeJSONFile } from "../shared/lib";
import { MAX_DUMP_CHARS } from "./apps";

export type Sections = Record<string, string>;

export function formatSections(sections: Sections) {
  return Object.entries(sections)
    .map(([key, value]) => `## ${key}\n${value}\n\n`)
    .join("");
}

function writeReportJSON(settings: Settings, filePath: string, data: Sections) {
  ensureDir(settings.outputDir);
  writeJSONFile(filePath, settings.redact ? redactValue(data) : data);
}

function writeReportText(settings: Settings, filePath: string, sections: Sections) {
  ensureDir(settings.outputDir);
  fs.writeFileSync(filePath, redactIfEnabled(settings, formatSections(sections)), "utf-8");
}

export function collectHealthData(session: Session, timestamp: string): Sections {
  const getprop = (name: string) => shellOut(session, "getprop", name).trim();
  return {
    serial: session.serial,
    timestamp,
    getprop_model: getprop("ro.product.model"),
    getprop_brand: getprop("ro.product.brand"),
    android_version: getprop("ro.build.version.release"),
    api_level: getprop("ro.build.version.sdk"),
    storage_df: shellOut(session, "df", "-h"),
    battery: shellOut(session, "dumpsys", "battery"),
    thermal: shellOut(session, "dumpsys", "thermalservice"),
    ip_route: shellOut(session, "ip", "route"),
  };
}

export function exportHealthReport(session: Session): string[] {
  if (!requireDevice(session)) return [];
  const timestamp = fileTimestamp(session.clock.now());
  const base = `health_report_${fileSafe(session.serial)}_${timestamp}`;
  const textPath = outputPath(session.settings, `${base}.txt`);
  const jsonPath = outputPath(session.settings, `${base}.json`);
  const data = collectHealthData(session, timestamp);
  writeReportJSON(session.settings, jsonPath, data);
  writeReportText(session.settings, textPath, data);
  console.log(`Wrote reports: ${textPath}, ${jsonPath}`);
  return [textPath, jsonPath];
}

export function snapshotDeviceState(session: Session): string {
  if (!requireDevice(session)) return "";
  const timestamp = fileTimestamp(session.clock.now());
  const filePath = outputPath(session.settings, `device_snapshot_${fileSafe(session.serial)}_${timestamp}.json`);
  const data: Sections = {
    serial: session.serial,
    timestamp,
    packages_all: shellOut(session, "pm", "list", "packages"),
    packages_user: shellOut(session, "pm", "list", "packages", "-3"),
    getprop: shellOut(session, "getprop"),
    settings_global: shellOut(session, "settings", "list", "global"),
    settings_system: shellOut(session, "settings", "list", "system"),
    settings_secure: shellOut(session, "settings", "list", "secure"),
  };
  writeReportJSON(session.settings, filePath, data);
  console.log(`Snapshot saved: ${filePath}`);
  return filePath;
}

export function parseSettingsMap(raw: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    const idx = line.indexOf("=");
    if (idx < 0) continue;
    out.set(line.slice(0, idx).trim(), line.slice(idx + 1).trim());
  }
  return out;
}

export const SETTINGS_NAMESPACES = ["global", "system", "secure"] as const;

export async function restoreDeviceState(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const filePath = cleanPathInput(await ask(session, "Snapshot JSON path: "));
  if (!filePath) {
    console.log("Snapshot path is required.");
    return;
  }
  if (!fs.existsSync(filePath)) {
    console.log(`Snapshot path does not exist: ${filePath}`);
    return;
  }
  const data = readJSONFile(filePath);
  if (!isRecord(data)) {
    console.log("Failed to read snapshot file.");
    return;
  }
  for (const namespace of SETTINGS_NAMESPACES) {
    const settingsMap = parseSettingsMap(str(data[`settings_${namespace}`]));
    if (settingsMap.size === 0) continue;
    console.log(`Restore ${namespace} settings from snapshot? (${settingsMap.size} entries)`);
    if (!isYes(await ask(session, "[y/N]: "))) continue;
    for (const [key, value] of settingsMap) {
      adb(session, ["shell", "settings", "put", namespace, key, value]);
    }
  }
  console.log("Restore attempt complete.");
}

export async function processServiceInspector(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await ask(session, "Package filter (optional): ");
  const ps = shellOut(session, "ps", "-A");
  if (!pkg) {
    console.log(ps);
    return;
  }
  const matched = ps.split(/\r?\n/).filter((line) => line.includes(pkg));
  console.log(matched.length ? matched.join("\n") : "(no matching processes)");
  const pidof = shellOut(session, "pidof", pkg).trim();
  if (pidof) console.log(`pidof: ${pidof}`);
  const services = shellOut(session, "dumpsys", "activity", "services", pkg);
  console.log(services ? truncate(services, MAX_DUMP_CHARS) : "(no services output)");
}

export function dnsLines(props: string) {
  return props
    .split(/\r?\n/)
    .filter((line) => line.toLowerCase().includes("dns"))
    .join("\n");
}

export function networkDiagnosticsPack(session: Session): string {
  if (!requireDevice(session)) return "";
  const timestamp = fileTimestamp(session.clock.now());
  const filePath = outputPath(session.settings, `network_diag_${fileSafe(session.serial)}_${timestamp}.txt`);
  const sections: Sections = {
    ip_addr: shellOut(session, "ip", "addr"),
    ip_route: shellOut(session, "ip", "route"),
    dns_props: dnsLines(shellOut(session, "getprop")),
    ping_google: shellOut(session, "ping", "-c", "2", "8.8.8.8"),
    connectivity: shellOut(session, "dumpsys", "connectivity"),
  };
  writeReportText(session.settings, filePath, sections);
  console.log(`Saved network diagnostics: ${filePath}`);
  return filePath;
}

export type PrerequisiteReport = {
  cwd: string;
  dataDir: string;
  writable: boolean;
  adbPath: string;
  adbResponds: boolean;
  aaptPath: string;
  aaptResponds: boolean;
};

export function checkPrerequisites(session: Session): PrerequisiteReport {
  const { dataDir, aaptPath } = session.settings;
  return {
    cwd: process.cwd(),
    dataDir,
    writable: isWritableDir(dataDir),
    adbPath: session.adbPath,
    adbResponds: adbHost(session, ["version"]).exitCode === 0,
    aaptPath,
    aaptResponds: runTool(session, [aaptPath, "version"]).exitCode === 0,
  };
}

export function prerequisiteHealthCheck(session: Session): PrerequisiteReport {
  const report = checkPrerequisites(session);
  const yn = (v: boolean) => (v ? "yes" : "no");
  console.log("Prerequisite health check");
  console.log(`- Current working directory: ${report.cwd}`);
  console.log(`- Data directory: ${report.dataDir}`);
  console.log(`- Writable data directory: ${yn(report.writable)}`);
  console.log(`- ADB executable: ${report.adbPath}`);
  console.log(`- ADB responds: ${yn(report.adbResponds)}`);
  console.log(`- AAPT executable: ${report.aaptPath}`);
  console.log(`- AAPT responds: ${yn(report.aaptResponds)}`);
  for (const fileName of [WORKFLOWS_FILE, PROFILES_FILE, ALIASES_FILE]) {
    console.log(`- File create possible for ${fileName}: ${yn(report.writable)}`);
  }
  return report;
}
