import fs from "fs";
import path from "path";
import { localAdbPath } from "../adb/adb";
import { ask, runTool, type Session } from "../adb/session";
import { PLATFORM_TOOLS_DIR } from "../config";
import { isYes } from "../shared/cli";
import { ensureDir } from "../shared/lib";
import { logger } from "../shared/logger";

const DOWNLOAD_BASE = "https://dl.google.com/android/repository";
const EXTRACT_TIMEOUT_MS = 5 * 60_000;

export type Downloader = (url: string) => Promise<Buffer>;

export function platformToolsOS(platform: NodeJS.Platform = process.platform) {
  if (platform === "win32") return "windows";
  if (platform === "darwin") return "darwin";
  return "linux";
}

export function platformToolsUrl(platform: NodeJS.Platform = process.platform) {
  return `${DOWNLOAD_BASE}/platform-tools-latest-${platformToolsOS(platform)}.zip`;
}

export function extractCommand(archive: string, destDir: string, platform: NodeJS.Platform = process.platform) {
  if (platform === "win32") return ["tar", "-xf", archive, "-C", destDir];
  return ["unzip", "-q", "-o", archive, "-d", destDir];
}

export const fetchDownloader: Downloader = async (url) => {
  const resp = await fetch(url);
  if (Math.floor(resp.status / 100) !== 2) {
    throw new Error(`http ${resp.status}: ${url}`);
  }
  return Buffer.from(await resp.arrayBuffer());
};

/** Replaces `<dataDir>/platform-tools` with a fresh download and points the session at its adb. */
export async function installPlatformTools(
  session: Session,
  download: Downloader = fetchDownloader,
  platform: NodeJS.Platform = process.platform
): Promise<string> {
  const { dataDir } = session.settings;
  const url = platformToolsUrl(platform);
  ensureDir(dataDir);
  console.log(`Downloading ${url}`);
  const archive = path.join(dataDir, `platform-tools-latest-${platformToolsOS(platform)}.zip`);
  fs.writeFileSync(archive, await download(url));
  logger.info("platform-tools downloaded", { url, path: archive });

  try {
    fs.rmSync(path.join(dataDir, PLATFORM_TOOLS_DIR), { recursive: true, force: true });
    runTool(session, extractCommand(archive, dataDir, platform), { check: true, timeoutMs: EXTRACT_TIMEOUT_MS });
  } finally {
    fs.rmSync(archive, { force: true });
  }

  const adbPath = localAdbPath(session.settings, platform);
  const version = runTool(session, [adbPath, "version"], { check: true });
  session.adbPath = adbPath;
  console.log(version.stdout.trim().split(/\r?\n/)[0] || "adb version unknown");
  console.log(`Platform-tools installed: ${path.dirname(adbPath)}`);
  return adbPath;
}

export async function reinstallPlatformTools(session: Session, download: Downloader = fetchDownloader): Promise<void> {
  const target = path.join(session.settings.dataDir, PLATFORM_TOOLS_DIR);
  console.log(`This replaces ${target} (project-local, not system-wide).`);
  if (!isYes(await ask(session, "Proceed? [y/N]: "))) {
    console.log("Cancelled.");
    return;
  }
  await installPlatformTools(session, download);
}
