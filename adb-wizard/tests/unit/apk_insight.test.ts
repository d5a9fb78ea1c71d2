import fs from "fs";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import {
  DOWNGRADE_WARNING,
  SIGNATURE_MISMATCH_WARNING,
  STRICT_SIGNATURE_WARNING,
  apkInsight,
  installWarnings,
  parseAaptBadging,
  parseInstalledPackage,
} from "../../scripts/features/apk_insight";
import { captureConsole, fail, tempDir, testSession } from "../helpers/fakes";

const BADGING = [
  "package: name='com.example.app' versionCode='42' versionName='1.4.2' platformBuildVersionName='14'",
  "sdkVersion:'24'",
  "targetSdkVersion:'34'",
  "application-label:'Example'",
].join("\n");

const INSTALLED = ["Packages:", "  Package [com.example.app] (abc123):", "    versionCode=50 minSdk=24 targetSdk=34", "    Signing KeySets:"].join("\n");

const META = parseAaptBadging(BADGING);

describe("parseAaptBadging", () => {
  it("reads package, version and sdk fields", () => {
    expect(META).toEqual({
      packageName: "com.example.app",
      versionCode: "42",
      versionName: "1.4.2",
      minSdk: "24",
      targetSdk: "34",
    });
  });

  it("leaves missing fields empty", () => {
    expect(parseAaptBadging("")).toEqual({ packageName: "", versionCode: "", versionName: "", minSdk: "", targetSdk: "" });
  });
});

describe("parseInstalledPackage", () => {
  it("reads the installed version and signing marker", () => {
    expect(parseInstalledPackage(INSTALLED)).toMatchObject({ versionCode: "50", hasSigningDetails: true });
    expect(parseInstalledPackage("Unable to find package")).toMatchObject({ versionCode: "", hasSigningDetails: false });
  });
});

describe("installWarnings", () => {
  const installed = parseInstalledPackage(INSTALLED);

  it("warns about a downgrade", () => {
    expect(installWarnings(META, installed, "off")).toEqual([DOWNGRADE_WARNING]);
  });

  it("adds the strict-mode note when signing details exist", () => {
    expect(installWarnings(META, installed, "strict")).toEqual([DOWNGRADE_WARNING, STRICT_SIGNATURE_WARNING]);
  });

  it("only flags explicit mismatch wording in conservative mode", () => {
    expect(installWarnings(META, installed, "conservative")).toEqual([DOWNGRADE_WARNING]);
    const mismatched = parseInstalledPackage(`${INSTALLED}\n    signature mismatch detected`);
    expect(installWarnings({ ...META, versionCode: "60" }, mismatched, "conservative")).toEqual([SIGNATURE_MISMATCH_WARNING]);
  });
});

describe("apkInsight", () => {
  let out: string[];
  let apk: string;
  beforeEach(() => {
    out = captureConsole();
    apk = path.join(tempDir(), "app.apk");
    fs.writeFileSync(apk, "");
  });

  it("prints metadata and warnings for the selected device", () => {
    const h = testSession({ settings: { signatureCheckMode: "strict" } });
    h.runner.on("dump badging", BADGING).on("dumpsys package", INSTALLED);
    const result = apkInsight(h.session, apk);
    expect(result?.warnings).toEqual([DOWNGRADE_WARNING, STRICT_SIGNATURE_WARNING]);
    expect(h.runner.lines()).toEqual([`aapt dump badging ${apk}`, "adb -s emulator-5554 shell dumpsys package com.example.app"]);
    expect(out).toEqual([
      `APK: ${apk}`,
      "Package: com.example.app",
      "Version code: 42",
      "Version name: 1.4.2",
      "minSdk: 24",
      "targetSdk: 34",
      DOWNGRADE_WARNING,
      STRICT_SIGNATURE_WARNING,
    ]);
  });

  it("degrades to unknown fields without aapt", () => {
    const h = testSession();
    h.runner.on("dump badging", fail("aapt: not found", 127));
    const result = apkInsight(h.session, apk);
    expect(result?.warnings).toEqual([]);
    expect(out[0]).toBe("aapt not found or metadata unavailable. Install Android build-tools for richer APK insight.");
    expect(out).toContain("Package: unknown");
    expect(h.runner.calls).toHaveLength(1);
  });

  it("skips the device check with no device selected", () => {
    const h = testSession({ serial: "" });
    h.runner.on("dump badging", BADGING);
    apkInsight(h.session, apk);
    expect(h.runner.calls).toHaveLength(1);
  });

  it("rejects a missing file", () => {
    const h = testSession();
    expect(apkInsight(h.session, "/nope/app.apk")).toBeUndefined();
    expect(out).toEqual(["APK path does not exist: /nope/app.apk"]);
  });
});
