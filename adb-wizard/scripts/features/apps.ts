import fs from "fs";
import path from "path";
import { writeCapturedOutput } from "../adb/exec";
import { adb, ask, requireDevice, type Session } from "../adb/session";
import { isYes } from "../shared/cli";
import { cleanPathInput, nonEmptyLines, truncate } from "../shared/lib";
import { logger } from "../shared/logger";

export const LAUNCHER_CATEGORY = "android.intent.category.LAUNCHER";
export const MAX_DUMP_CHARS = 4000;

export function launchArgs(pkg: string, activity: string) {
  if (activity) return ["shell", "am", "start", "-n", `${pkg}/${activity}`];
  return ["shell", "monkey", "-p", pkg, "-c", LAUNCHER_CATEGORY, "1"];
}

export type LaunchTarget =
  | { kind: "uri"; raw: string; uri: string }
  | { kind: "activity"; raw: string; packageName: string; activity: string }
  | { kind: "package"; raw: string; packageName: string };

export function parseLaunchTarget(target: string): LaunchTarget {
  const t = target.trim();
  if (!t) throw new Error("launch target is empty");
  if (t.includes("://")) return { kind: "uri", raw: t, uri: t };
  if (t.includes("/")) {
    const [pkg, actRaw] = t.split("/", 2).map((s) => s.trim());
    if (!pkg || !actRaw) throw new Error(`invalid activity target: ${JSON.stringify(target)}`);
    let act = actRaw;
    if (!act.startsWith(".") && !act.includes(".")) act = `.${act}`;
    return { kind: "activity", raw: t, packageName: pkg, activity: act };
  }
  return { kind: "package", raw: t, packageName: t };
}

export function launchTargetArgs(launch: LaunchTarget) {
  switch (launch.kind) {
    case "uri":
      return ["shell", "am", "start", "-W", "-a", "android.intent.action.VIEW", "-d", launch.uri];
    case "activity":
      return ["shell", "am", "start", "-W", "-n", `${launch.packageName}/${launch.activity}`];
    case "package":
      return launchArgs(launch.packageName, "");
  }
}

export function detectLaunchError(output: string) {
  const trimmed = output.trim();
  if (!trimmed) return "";
  if (trimmed.includes("Error:")) return trimmed;
  if (trimmed.includes("monkey aborted") || trimmed.includes("No activities found")) return trimmed;
  return "";
}

function requireExistingFile(p: string, label: string) {
  if (!p) {
    console.log(`${label} is required.`);
    return false;
  }
  if (!fs.existsSync(p)) {
    console.log(`${label} does not exist: ${p}`);
    return false;
  }
  return true;
}

export async function installApk(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const apk = cleanPathInput(await ask(session, "APK path: "));
  if (!requireExistingFile(apk, "APK path")) return;
  const result = adb(session, ["install", "-r", apk]);
  writeCapturedOutput(result);
  console.log(result.exitCode === 0 ? "Install complete." : "Install failed.");
}

/** Accepts space-separated APK files or a single directory holding the split set. */
export function resolveSplitApks(input: string): string[] {
  const raw = input.trim();
  if (!raw) return [];
  const single = cleanPathInput(raw);
  if (fs.existsSync(single) && fs.statSync(single).isDirectory()) {
    return fs
      .readdirSync(single)
      .filter((name) => name.toLowerCase().endsWith(".apk"))
      .sort()
      .map((name) => path.join(single, name));
  }
  return raw.split(/\s+/).map(cleanPathInput).filter(Boolean);
}

export async function installSplitApks(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const apks = resolveSplitApks(await ask(session, "APK files (space-separated) or directory: "));
  if (apks.length === 0) {
    console.log("No APK files given.");
    return;
  }
  const missing = apks.filter((p) => !fs.existsSync(p));
  if (missing.length) {
    console.log(`APK path does not exist: ${missing.join(", ")}`);
    return;
  }
  const result = adb(session, ["install-multiple", "-r", ...apks]);
  writeCapturedOutput(result);
  console.log(result.exitCode === 0 ? `Installed ${apks.length} split APKs.` : "Install failed.");
}

export type PackageScope = "all" | "user" | "system";

export function parsePackageList(raw: string): string[] {
  return nonEmptyLines(raw).map((line) => line.replace(/^package:/, "").trim());
}

export function listPackageNames(session: Session, scope: PackageScope = "all"): string[] {
  const args = ["shell", "pm", "list", "packages"];
  if (scope === "user") args.push("-3");
  if (scope === "system") args.push("-s");
  return parsePackageList(adb(session, args).stdout);
}

export async function listPackages(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const scopeRaw = await ask(session, "Scope [a]ll/[u]ser/[s]ystem (default a): ");
  const scope: PackageScope = scopeRaw.toLowerCase().startsWith("u")
    ? "user"
    : scopeRaw.toLowerCase().startsWith("s")
      ? "system"
      : "all";
  const filter = (await ask(session, "Filter substring (optional): ")).toLowerCase();
  const names = listPackageNames(session, scope)
    .filter((name) => !filter || name.toLowerCase().includes(filter))
    .sort();
  if (names.length === 0) {
    console.log("No packages found.");
    return;
  }
  for (const name of names) console.log(name);
  console.log(`(${names.length} packages)`);
}

export function packageInfo(session: Session, pkg: string) {
  return adb(session, ["shell", "dumpsys", "package", pkg]).stdout;
}

async function askPackage(session: Session) {
  const pkg = await ask(session, "Package name: ");
  if (!pkg) console.log("Package name is required.");
  return pkg;
}

export async function showPackageInfo(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await askPackage(session);
  if (!pkg) return;
  const out = packageInfo(session, pkg);
  console.log(out ? truncate(out, MAX_DUMP_CHARS) : "(no output)");
}

export function launchTarget(session: Session, target: string): boolean {
  const launch = parseLaunchTarget(target);
  const result = adb(session, launchTargetArgs(launch));
  const err = result.exitCode !== 0 ? result.stderr.trim() || `exit code ${result.exitCode}` : detectLaunchError(result.stdout + result.stderr);
  if (err) {
    logger.error("launch failed", { target: launch.raw, err });
    console.log(`Launch failed: ${err}`);
    return false;
  }
  console.log(`Launched: ${launch.raw}`);
  return true;
}

export async function launchApp(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const target = await ask(session, "Package, package/activity or URI: ");
  if (!target) {
    console.log("Launch target is required.");
    return;
  }
  launchTarget(session, target);
}

export async function uninstallPackage(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await askPackage(session);
  if (!pkg) return;
  if (!isYes(await ask(session, `Uninstall ${pkg}? [y/N]: `))) {
    console.log("Cancelled.");
    return;
  }
  const keepData = isYes(await ask(session, "Keep app data and cache? [y/N]: "));
  const result = adb(session, keepData ? ["uninstall", "-k", pkg] : ["uninstall", pkg]);
  writeCapturedOutput(result);
}

export async function forceStopApp(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await askPackage(session);
  if (!pkg) return;
  adb(session, ["shell", "am", "force-stop", pkg]);
  console.log(`Force-stopped: ${pkg}`);
}

export async function clearAppData(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await askPackage(session);
  if (!pkg) return;
  if (!isYes(await ask(session, `Clear all data for ${pkg}? [y/N]: `))) {
    console.log("Cancelled.");
    return;
  }
  writeCapturedOutput(adb(session, ["shell", "pm", "clear", pkg]));
}
