import { writeCapturedOutput } from "../adb/exec";
import { adb, adbHost, ask, requireDevice, type Session } from "../adb/session";
import { outputPath } from "../config";
import { clamp, isYes, parseIntOr } from "../shared/cli";
import { ensureDir, fileSafe, fileTimestamp } from "../shared/lib";
import { logger } from "../shared/logger";
import { runMenu } from "../menus/menu";

// ---------- reboot ----------

export const REBOOT_MODES = { "1": "", "2": "recovery", "3": "bootloader" } as const;

export async function rebootDevice(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  console.log("1) Normal");
  console.log("2) Recovery");
  console.log("3) Bootloader");
  const choice = (await ask(session, "Reboot mode (default 1): ")) || "1";
  if (choice !== "1" && choice !== "2" && choice !== "3") {
    console.log("Invalid choice.");
    return;
  }
  const mode = REBOOT_MODES[choice];
  if (!isYes(await ask(session, `Reboot ${session.serial}${mode ? ` into ${mode}` : ""}? [y/N]: `))) {
    console.log("Cancelled.");
    return;
  }
  writeCapturedOutput(adb(session, mode ? ["reboot", mode] : ["reboot"]));
  console.log("Reboot requested.");
}

// ---------- Wi-Fi ----------

export const DEFAULT_TCPIP_PORT = 5555;

export function parseTcpPort(raw: string) {
  const port = parseIntOr(raw, DEFAULT_TCPIP_PORT);
  return port >= 1 && port <= 65535 ? port : DEFAULT_TCPIP_PORT;
}

/** Device IP from `ip route` (the `src` field), falling back to `ip addr show wlan0`. */
export function parseDeviceIp(routeOut: string, addrOut: string) {
  for (const line of routeOut.split("\n")) {
    if (!line.includes("src")) continue;
    const parts = line.trim().split(/\s+/);
    const idx = parts.indexOf("src");
    if (idx >= 0 && idx + 1 < parts.length) return parts[idx + 1];
  }
  for (const line of addrOut.split("\n")) {
    if (!line.includes("inet ")) continue;
    const parts = line.trim().split(/\s+/);
    if (parts.length >= 2) return parts[1].split("/")[0];
  }
  return "";
}

export function deviceIp(session: Session) {
  const route = adb(session, ["shell", "ip", "route"]).stdout;
  const fromRoute = parseDeviceIp(route, "");
  if (fromRoute) return fromRoute;
  return parseDeviceIp("", adb(session, ["shell", "ip", "addr", "show", "wlan0"]).stdout);
}

export async function connectOverWifi(session: Session): Promise<void> {
  const manual = await ask(session, "Device address (blank = switch the current USB device to Wi-Fi): ");
  let address = manual;
  if (!address) {
    if (!requireDevice(session)) return;
    const port = parseTcpPort(await ask(session, `TCP port (default ${DEFAULT_TCPIP_PORT}): `));
    const ip = deviceIp(session);
    if (!ip) {
      console.log("Could not determine device IP. Is Wi-Fi enabled?");
      return;
    }
    const tcpip = adb(session, ["tcpip", String(port)]);
    writeCapturedOutput(tcpip);
    if (tcpip.exitCode !== 0) {
      console.log("Failed to enable tcpip mode.");
      return;
    }
    await session.clock.sleep(2000);
    address = `${ip}:${port}`;
  } else if (!address.includes(":")) {
    address = `${address}:${DEFAULT_TCPIP_PORT}`;
  }
  const result = adbHost(session, ["connect", address]);
  writeCapturedOutput(result);
  const output = (result.stdout + result.stderr).toLowerCase();
  if (result.exitCode === 0 && output.includes("connected")) {
    session.serial = address;
    logger.info("switched to wifi device", { serial: address });
    console.log(`Selected device: ${address}`);
  }
}

export async function disconnectWifi(session: Session): Promise<void> {
  const address = await ask(session, "Address to disconnect (blank = all): ");
  writeCapturedOutput(adbHost(session, address ? ["disconnect", address] : ["disconnect"]));
  if (!address || address === session.serial) {
    if (session.serial.includes(":")) session.serial = "";
  }
}

export async function wirelessPairing(session: Session): Promise<void> {
  const host = await ask(session, "Pair host (e.g. 192.168.1.10:37099): ");
  const code = await ask(session, "Pair code: ");
  if (!host || !code) {
    console.log("Host and pair code are required.");
    return;
  }
  writeCapturedOutput(adbHost(session, ["pair", host, code]));
  const connectHost = await ask(session, "Connect host (e.g. 192.168.1.10:5555): ");
  if (connectHost) writeCapturedOutput(adbHost(session, ["connect", connectHost]));
}

// ---------- port forwarding ----------

export async function managePortForwarding(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const run = (...args: string[]) => writeCapturedOutput(adb(session, args));
  await runMenu(session, "Port forwarding", [
    {
      key: "1",
      label: "List forwards",
      run: () => {
        const forwards = adb(session, ["forward", "--list"]).stdout.trim();
        const reverses = adb(session, ["reverse", "--list"]).stdout.trim();
        console.log(`Forwards:\n${forwards || "(none)"}`);
        console.log(`Reverses:\n${reverses || "(none)"}`);
      },
    },
    {
      key: "2",
      label: "Add forward (local->remote)",
      run: async () => {
        const local = await ask(session, "Local (e.g. tcp:8081): ");
        const remote = await ask(session, "Remote (e.g. tcp:8081): ");
        if (local && remote) run("forward", local, remote);
      },
    },
    {
      key: "3",
      label: "Remove forward",
      run: async () => {
        const local = await ask(session, "Local to remove (e.g. tcp:8081): ");
        if (local) run("forward", "--remove", local);
      },
    },
    {
      key: "4",
      label: "Add reverse (remote->local)",
      run: async () => {
        const remote = await ask(session, "Remote (e.g. tcp:8081): ");
        const local = await ask(session, "Local (e.g. tcp:8081): ");
        if (remote && local) run("reverse", remote, local);
      },
    },
    {
      key: "5",
      label: "Remove reverse",
      run: async () => {
        const remote = await ask(session, "Remote to remove (e.g. tcp:8081): ");
        if (remote) run("reverse", "--remove", remote);
      },
    },
  ]);
}

// ---------- screen capture ----------

export const MAX_SCREENRECORD_SEC = 180;
export const DEFAULT_SCREENRECORD_SEC = 15;

export function parseRecordDuration(raw: string) {
  return clamp(parseIntOr(raw || String(DEFAULT_SCREENRECORD_SEC), DEFAULT_SCREENRECORD_SEC), 1, MAX_SCREENRECORD_SEC);
}

/** Runs the capture on-device, pulls it into the output dir and removes the device copy. */
function captureAndPull(session: Session, fileName: string, captureArgs: string[], timeoutMs?: number) {
  const local = outputPath(session.settings, fileName);
  const remote = `/sdcard/${fileName}`;
  ensureDir(session.settings.outputDir);
  adb(session, ["shell", ...captureArgs, remote], { check: true, timeoutMs });
  adb(session, ["pull", remote, local], { check: true });
  adb(session, ["shell", "rm", remote]);
  return local;
}

export function takeScreenshot(session: Session) {
  const fileName = `screenshot_${fileSafe(session.serial)}_${fileTimestamp(session.clock.now())}.png`;
  const local = captureAndPull(session, fileName, ["screencap", "-p"]);
  console.log(`Saved screenshot: ${local}`);
  return local;
}

export function recordScreen(session: Session, seconds: number) {
  const fileName = `screenrecord_${fileSafe(session.serial)}_${fileTimestamp(session.clock.now())}.mp4`;
  console.log(`Recording for ${seconds}s...`);
  const local = captureAndPull(session, fileName, ["screenrecord", "--time-limit", String(seconds)], (seconds + 30) * 1000);
  console.log(`Saved screenrecord: ${local}`);
  return local;
}

export async function screenCaptureTools(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  await runMenu(session, "Screen capture tools", [
    {
      key: "1",
      label: "Screenshot (PNG)",
      run: () => {
        takeScreenshot(session);
      },
    },
    {
      key: "2",
      label: "Screenrecord + pull",
      run: async () => {
        const seconds = parseRecordDuration(await ask(session, `Duration in seconds (max ${MAX_SCREENRECORD_SEC}, default ${DEFAULT_SCREENRECORD_SEC}): `));
        recordScreen(session, seconds);
      },
    },
  ]);
}
