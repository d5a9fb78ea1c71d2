import fs from "fs";
import { writeCapturedOutput } from "../adb/exec";
import { authorizedDevices, listDevices } from "../adb/devices";
import { adbOn, ask, type Session } from "../adb/session";
import { cleanPathInput } from "../shared/lib";

/** Runs the same install or shell command on every authorized device, one after another. */
export async function multiDeviceBroadcast(session: Session): Promise<void> {
  const devices = authorizedDevices(listDevices(session));
  if (devices.length === 0) {
    console.log("No authorized devices available.");
    return;
  }
  console.log("Broadcast action:");
  console.log("1) Install APK on all devices");
  console.log("2) Run shell command on all devices");
  const choice = await ask(session, "> ");
  if (choice === "1") {
    const apk = cleanPathInput(await ask(session, "APK path: "));
    if (!apk) {
      console.log("APK path is required.");
      return;
    }
    if (!fs.existsSync(apk)) {
      console.log(`APK path does not exist: ${apk}`);
      return;
    }
    for (const d of devices) {
      console.log(`[${d.serial}] installing...`);
      writeCapturedOutput(adbOn(session, d.serial, ["install", "-r", apk]));
    }
    console.log("Broadcast install complete.");
    return;
  }
  if (choice === "2") {
    const cmd = await ask(session, "shell> ");
    if (!cmd) {
      console.log("Shell command is required.");
      return;
    }
    for (const d of devices) {
      console.log(`[${d.serial}] running...`);
      const out = adbOn(session, d.serial, ["shell", cmd]);
      console.log(`--- ${d.serial} ---`);
      if (out.stdout.trim()) console.log(out.stdout.trim());
      if (out.stderr.trim()) console.log(out.stderr.trim());
    }
    return;
  }
  console.log("Unknown option.");
}
