import { writeCapturedOutput } from "../adb/exec";
import { adb, ask, requireDevice, type Session } from "../adb/session";
import { parseChoice } from "../shared/cli";
import { truncate } from "../shared/lib";
import { runMenu } from "../menus/menu";
import { MAX_DUMP_CHARS, launchArgs, listPackageNames, packageInfo } from "./apps";

// ---------- permissions ----------

export function grantedPermissionLines(dumpsys: string) {
  return dumpsys
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.includes("android.permission.") && (line.includes("granted=true") || line.includes("granted:")));
}

export async function appPermissionManager(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const pkg = await ask(session, "Package name: ");
  if (!pkg) {
    console.log("Package name is required.");
    return;
  }
  const askPermission = () => ask(session, "Permission (e.g. android.permission.CAMERA): ");
  await runMenu(session, "Permission manager", [
    {
      key: "1",
      label: "List granted permissions",
      run: () => {
        const lines = grantedPermissionLines(packageInfo(session, pkg));
        console.log(lines.length ? lines.join("\n") : "(no granted permission lines found)");
      },
    },
    {
      key: "2",
      label: "Grant permission",
      run: async () => {
        const perm = await askPermission();
        if (perm) writeCapturedOutput(adb(session, ["shell", "pm", "grant", pkg, perm]));
      },
    },
    {
      key: "3",
      label: "Revoke permission",
      run: async () => {
        const perm = await askPermission();
        if (perm) writeCapturedOutput(adb(session, ["shell", "pm", "revoke", pkg, perm]));
      },
    },
  ]);
}

// ---------- intents ----------

export function splitArgs(raw: string) {
  return raw.trim().split(/\s+/).filter(Boolean);
}

export async function intentDeeplinkRunner(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const am = (...args: string[]) => writeCapturedOutput(adb(session, ["shell", "am", ...args]));
  await runMenu(session, "Intent and deep-link runner", [
    {
      key: "1",
      label: "Open URL deep link",
      run: async () => {
        const url = await ask(session, "URL: ");
        if (url) am("start", "-a", "android.intent.action.VIEW", "-d", url);
      },
    },
    {
      key: "2",
      label: "Start explicit component",
      run: async () => {
        const component = await ask(session, "Component (package/.Activity): ");
        if (component) am("start", "-n", component);
      },
    },
    {
      key: "3",
      label: "Send broadcast",
      run: async () => {
        const action = await ask(session, "Broadcast action: ");
        if (action) am("broadcast", "-a", action);
      },
    },
    {
      key: "4",
      label: "Raw am command",
      run: async () => {
        const args = splitArgs(await ask(session, "am args (without 'am'): "));
        if (args.length) am(...args);
      },
    },
  ]);
}

// ---------- package search ----------

export const MAX_SEARCH_RESULTS = 100;

export function searchPackages(packages: string[], query: string) {
  const q = query.trim().toLowerCase();
  const matched = q ? packages.filter((p) => p.toLowerCase().includes(q)) : packages.slice();
  return matched.slice(0, MAX_SEARCH_RESULTS);
}

export async function interactivePackageSearch(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const packages = listPackageNames(session);
  if (packages.length === 0) {
    console.log("No packages found.");
    return;
  }
  const matched = searchPackages(packages, await ask(session, "Search substring: "));
  if (matched.length === 0) {
    console.log("No matches.");
    return;
  }
  matched.forEach((p, i) => console.log(`${i + 1}) ${p}`));
  const idx = parseChoice(await ask(session, "Pick package number: "), matched.length);
  if (idx < 0) {
    console.log("Invalid choice.");
    return;
  }
  const pkg = matched[idx];
  console.log(`Selected: ${pkg}`);
  console.log("1) Launch");
  console.log("2) Force-stop");
  console.log("3) Show package info");
  const action = await ask(session, "> ");
  if (action === "1") {
    writeCapturedOutput(adb(session, launchArgs(pkg, "")));
  } else if (action === "2") {
    adb(session, ["shell", "am", "force-stop", pkg]);
    console.log(`Force-stopped: ${pkg}`);
  } else if (action === "3") {
    const out = packageInfo(session, pkg);
    console.log(out ? truncate(out, MAX_DUMP_CHARS) : "(no output)");
  } else {
    console.log("Unknown option.");
  }
}
