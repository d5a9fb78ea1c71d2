import path from "path";
import { parseOptionalPositiveInt } from "./shared/cli";
import { env, envFlag, expandHome } from "./shared/lib";
import { parseLogLevel, type LogLevel } from "./shared/logger";
import { defaultTimeoutMs } from "./adb/exec";

export const WORKFLOWS_FILE = ".adb_wizard_workflows.json";
export const PROFILES_FILE = ".adb_wizard_profiles.json";
export const ALIASES_FILE = ".adb_wizard_aliases.json";
export const PLUGINS_DIR = "plugins";
export const PLATFORM_TOOLS_DIR = "platform-tools";

export type SignatureCheckMode = "conservative" | "strict" | "off";

export type Settings = {
  /** Explicit adb executable; empty means "resolve". */
  adbPath: string;
  aaptPath: string;
  /** Serial or alias requested up front; empty means auto-select. */
  serial: string;
  dataDir: string;
  outputDir: string;
  redact: boolean;
  signatureCheckMode: SignatureCheckMode;
  activeProfile: string;
  timeoutMs: number;
  logJson: boolean;
  logLevel: LogLevel;
};

export type CLIOptions = {
  adb?: string;
  aapt?: string;
  serial?: string;
  dataDir?: string;
  outputDir?: string;
  redact?: boolean;
  signatureCheck?: string;
  profile?: string;
  timeoutMs?: string;
  logJson?: boolean;
  logLevel?: string;
};

export function parseSignatureCheckMode(raw: string | undefined): SignatureCheckMode {
  const v = String(raw || "conservative").trim().toLowerCase();
  if (v === "conservative" || v === "strict" || v === "off") return v;
  throw new Error(`invalid --signature-check: ${raw}`);
}

function dirSetting(raw: string, cwd: string) {
  return raw ? path.resolve(cwd, expandHome(raw)) : cwd;
}

export function loadSettings(opts: CLIOptions, source: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Settings {
  const pick = (cli: string | undefined, ...envNames: string[]) => {
    const v = String(cli || "").trim();
    if (v) return v;
    for (const name of envNames) {
      const fromEnv = env(name, "", source);
      if (fromEnv) return fromEnv;
    }
    return "";
  };
  const adbPath = pick(opts.adb, "ADB_WIZARD_ADB", "ADB_PATH");
  const timeoutRaw = pick(opts.timeoutMs, "ADB_WIZARD_TIMEOUT_MS");
  return {
    adbPath: adbPath ? expandHome(adbPath) : "",
    aaptPath: expandHome(pick(opts.aapt, "AAPT_PATH") || "aapt"),
    serial: pick(opts.serial, "ANDROID_SERIAL"),
    dataDir: dirSetting(pick(opts.dataDir, "ADB_WIZARD_DATA_DIR"), cwd),
    outputDir: dirSetting(pick(opts.outputDir, "ADB_WIZARD_OUTPUT_DIR"), cwd),
    redact: Boolean(opts.redact) || envFlag(env("ADB_WIZARD_REDACT", "", source)),
    signatureCheckMode: parseSignatureCheckMode(pick(opts.signatureCheck, "ADB_WIZARD_SIGNATURE_CHECK") || undefined),
    activeProfile: pick(opts.profile, "ADB_WIZARD_PROFILE"),
    timeoutMs: parseOptionalPositiveInt(timeoutRaw || undefined, "--timeout-ms") ?? defaultTimeoutMs,
    logJson: Boolean(opts.logJson),
    logLevel: parseLogLevel(pick(opts.logLevel, "ADB_WIZARD_LOG_LEVEL") || undefined),
  };
}

export function storePath(settings: Pick<Settings, "dataDir">, fileName: string) {
  return path.join(settings.dataDir, fileName);
}

export function outputPath(settings: Pick<Settings, "outputDir">, fileName: string) {
  return path.join(settings.outputDir, fileName);
}
