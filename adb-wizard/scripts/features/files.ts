import fs from "fs";
import { writeCapturedOutput } from "../adb/exec";
import { adb, ask, requireDevice, type Session } from "../adb/session";
import { cleanPathInput, ensureDir } from "../shared/lib";

export const DEFAULT_REMOTE_DIR = "/sdcard/";

export async function pushFile(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const local = cleanPathInput(await ask(session, "Local path: "));
  if (!local) {
    console.log("Local path is required.");
    return;
  }
  if (!fs.existsSync(local)) {
    console.log(`Local path does not exist: ${local}`);
    return;
  }
  const remote = (await ask(session, `Remote path [${DEFAULT_REMOTE_DIR}]: `)) || DEFAULT_REMOTE_DIR;
  const result = adb(session, ["push", local, remote]);
  writeCapturedOutput(result);
  console.log(result.exitCode === 0 ? "Push complete." : "Push failed.");
}

export async function pullFile(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const remote = await ask(session, "Remote path: ");
  if (!remote) {
    console.log("Remote path is required.");
    return;
  }
  const defaultLocal = session.settings.outputDir;
  const local = cleanPathInput(await ask(session, `Local destination [${defaultLocal}]: `)) || defaultLocal;
  if (local === defaultLocal) ensureDir(defaultLocal);
  const result = adb(session, ["pull", remote, local]);
  writeCapturedOutput(result);
  console.log(result.exitCode === 0 ? "Pull complete." : "Pull failed.");
}
