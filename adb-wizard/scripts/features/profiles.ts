import { adb, adbStream, ask, askWithDefault, requireDevice, type Session } from "../adb/session";
import { isYes, parseChoice } from "../shared/cli";
import { ownValue, setOwn } from "../shared/lib";
import { loadProfiles, saveProfiles, type Profile, type Profiles } from "../stores/stores";
import { launchArgs } from "./apps";

export async function selectProfile(session: Session, profiles: Profiles): Promise<string> {
  const names = Object.keys(profiles).sort();
  if (names.length === 0) {
    console.log("No profiles found.");
    return "";
  }
  names.forEach((name, i) => console.log(`${i + 1}) ${name}`));
  const idx = parseChoice(await ask(session, "Select profile number: "), names.length);
  if (idx < 0) {
    console.log("Invalid choice.");
    return "";
  }
  return names[idx];
}

export async function createOrUpdateProfile(session: Session): Promise<void> {
  const profiles = loadProfiles(session.settings);
  const name = await ask(session, "Profile name: ");
  if (!name) {
    console.log("Profile name is required.");
    return;
  }
  const existing = ownValue(profiles, name);
  setOwn(profiles, name, {
    package_name: await askWithDefault(session, "Package name", existing?.package_name ?? ""),
    activity: await askWithDefault(session, "Activity", existing?.activity ?? ""),
    log_tag: await askWithDefault(session, "Log tag", existing?.log_tag || "*"),
    apk_path: await askWithDefault(session, "APK path", existing?.apk_path ?? ""),
  });
  saveProfiles(session.settings, profiles);
  console.log(`Saved profile: ${name}`);
}

export async function deleteProfile(session: Session): Promise<void> {
  const profiles = loadProfiles(session.settings);
  const name = await selectProfile(session, profiles);
  if (!name) return;
  delete profiles[name];
  saveProfiles(session.settings, profiles);
  console.log(`Deleted profile: ${name}`);
}

export function formatProfile(name: string, p: Profile) {
  return `- ${name}: package=${p.package_name}, activity=${p.activity}, log_tag=${p.log_tag}, apk_path=${p.apk_path}`;
}

export function viewProfiles(session: Session) {
  const profiles = loadProfiles(session.settings);
  const names = Object.keys(profiles).sort();
  if (names.length === 0) {
    console.log("No profiles found.");
    return;
  }
  for (const name of names) console.log(formatProfile(name, profiles[name]));
}

type DevLoopTarget = { apkPath: string; packageName: string; activity: string; tag: string };

function targetFromProfile(p: Profile | undefined): DevLoopTarget {
  return {
    apkPath: p?.apk_path ?? "",
    packageName: p?.package_name ?? "",
    activity: p?.activity ?? "",
    tag: p?.log_tag || "*",
  };
}

/** install -> clear -> launch -> filtered logcat, seeded from the active or a chosen profile. */
export async function runDevLoop(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const profiles = loadProfiles(session.settings);
  const active = session.settings.activeProfile;
  let seed = targetFromProfile(undefined);
  const activeProfile = active ? ownValue(profiles, active) : undefined;
  if (activeProfile) {
    seed = targetFromProfile(activeProfile);
  } else if (Object.keys(profiles).length > 0) {
    if (isYes(await ask(session, "Use profile? [y/N]: "))) {
      const name = await selectProfile(session, profiles);
      if (name) seed = targetFromProfile(profiles[name]);
    }
  }
  const apkPath = await askWithDefault(session, "APK path", seed.apkPath);
  const pkg = await askWithDefault(session, "Package", seed.packageName);
  const activity = await askWithDefault(session, "Activity", seed.activity);
  const tag = await askWithDefault(session, "Log tag", seed.tag);

  if (apkPath) adb(session, ["install", "-r", apkPath], { check: true });
  if (pkg) {
    adb(session, ["shell", "pm", "clear", pkg]);
    adb(session, launchArgs(pkg, activity));
  }
  console.log("Starting filtered logcat. Press Ctrl+C to stop.");
  await adbStream(session, ["logcat", `${tag}:I`, "*:S"]);
}
