import fs from "fs";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import {
  dnsLines,
  exportHealthReport,
  formatSections,
  networkDiagnosticsPack,
  parseSettingsMap,
  prerequisiteHealthCheck,
  processServiceInspector,
  restoreDeviceState,
  snapshotDeviceState,
} from "../../scripts/features/diagnostics";
import { captureConsole, fail, tempDir, testSession } from "../helpers/fakes";

describe("formatSections", () => {
  it("renders markdown-style sections", () => {
    expect(formatSections({ a: "one", b: "two" })).toBe("## a\none\n\n## b\ntwo\n\n");
  });
});

describe("exportHealthReport", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("writes text and JSON reports", () => {
    const h = testSession();
    h.runner.on("ro.product.model", "Pixel 7\n").on("ip route", "default via 192.168.1.1 dev wlan0\n");
    const [textPath, jsonPath] = exportHealthReport(h.session);
    const dir = h.session.settings.outputDir;
    expect(textPath).toBe(path.join(dir, "health_report_emulator-5554_20240102_030405.txt"));
    expect(jsonPath).toBe(path.join(dir, "health_report_emulator-5554_20240102_030405.json"));
    const data: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf-8"));
    expect(data).toMatchObject({
      serial: "emulator-5554",
      timestamp: "20240102_030405",
      getprop_model: "Pixel 7",
      ip_route: "default via 192.168.1.1 dev wlan0\n",
    });
    expect(fs.readFileSync(textPath, "utf-8").startsWith("## serial\nemulator-5554\n\n## timestamp\n20240102_030405\n\n")).toBe(true);
    expect(out).toEqual([`Wrote reports: ${textPath}, ${jsonPath}`]);
  });

  it("redacts both files when enabled", () => {
    const h = testSession({ settings: { redact: true } });
    h.runner.on("ip route", "default via 192.168.1.1 dev wlan0\n");
    const [textPath, jsonPath] = exportHealthReport(h.session);
    const data: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf-8"));
    expect(data).toMatchObject({ ip_route: "default via <redacted-ip> dev wlan0\n" });
    expect(fs.readFileSync(textPath, "utf-8")).toContain("## ip_route\ndefault via <redacted-ip> dev wlan0\n");
  });

  it("uses a file-safe name for network serials", () => {
    const h = testSession({ serial: "192.168.1.42:5555" });
    const [textPath] = exportHealthReport(h.session);
    expect(path.basename(textPath)).toBe("health_report_192.168.1.42_5555_20240102_030405.txt");
  });

  it("needs a device", () => {
    const h = testSession({ serial: "" });
    expect(exportHealthReport(h.session)).toEqual([]);
    expect(out).toEqual(['No device selected. Use "Switch device" first.']);
  });
});

describe("snapshot and restore", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("parses key=value settings", () => {
    expect([...parseSettingsMap("a=1\nb = two\nnoeq\nc=x=y\n")]).toEqual([
      ["a", "1"],
      ["b", "two"],
      ["c", "x=y"],
    ]);
  });

  it("snapshots packages, properties and settings", () => {
    const h = testSession();
    h.runner.on("settings list secure", "android_id=abc\n").on("pm list packages -3", "package:com.example.app\n");
    const file = snapshotDeviceState(h.session);
    expect(path.basename(file)).toBe("device_snapshot_emulator-5554_20240102_030405.json");
    const data: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    expect(data).toMatchObject({ packages_user: "package:com.example.app\n", settings_secure: "android_id=abc\n" });
    expect(out).toEqual([`Snapshot saved: ${file}`]);
  });

  it("restores only the confirmed namespaces", async () => {
    const dir = tempDir();
    const file = path.join(dir, "snap.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ settings_global: "airplane_mode_on=0\nwifi_on=1\n", settings_system: "", settings_secure: "x=1\n" })
    );
    const restore = testSession({ answers: [`'${file}'`, "y", "n"], settings: { dataDir: dir } });
    await restoreDeviceState(restore.session);
    expect(restore.runner.lines()).toEqual([
      "adb -s emulator-5554 shell settings put global airplane_mode_on 0",
      "adb -s emulator-5554 shell settings put global wifi_on 1",
    ]);
    expect(out).toContain("Restore global settings from snapshot? (2 entries)");
    expect(out).toContain("Restore secure settings from snapshot? (1 entries)");
    expect(out[out.length - 1]).toBe("Restore attempt complete.");
  });

  it("rejects a missing snapshot", async () => {
    const h = testSession({ answers: ["/nope/snap.json"] });
    await restoreDeviceState(h.session);
    expect(out).toEqual(["Snapshot path does not exist: /nope/snap.json"]);
  });
});

describe("inspectors", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("filters processes by package", async () => {
    const h = testSession({ answers: ["com.example.app"] });
    h.runner
      .on("ps -A", "USER PID NAME\nu0_a1 100 com.example.app\nroot 1 init\n")
      .on("pidof", "100\n")
      .on("dumpsys activity services", "");
    await processServiceInspector(h.session);
    expect(out).toEqual(["u0_a1 100 com.example.app", "pidof: 100", "(no services output)"]);
  });

  it("keeps only dns properties", () => {
    expect(dnsLines("[net.dns1]: [8.8.8.8]\n[ro.build]: [x]\n[net.DNS2]: [1.1.1.1]")).toBe("[net.dns1]: [8.8.8.8]\n[net.DNS2]: [1.1.1.1]");
  });

  it("saves a network diagnostics pack", () => {
    const h = testSession();
    h.runner.on("getprop", "[net.dns1]: [8.8.8.8]\n[ro.x]: [y]\n");
    const file = networkDiagnosticsPack(h.session);
    expect(path.basename(file)).toBe("network_diag_emulator-5554_20240102_030405.txt");
    expect(fs.readFileSync(file, "utf-8")).toContain("## dns_props\n[net.dns1]: [8.8.8.8]\n\n");
    expect(h.runner.lines()).toContain("adb -s emulator-5554 shell ping -c 2 8.8.8.8");
  });

  it("reports prerequisites", () => {
    const h = testSession();
    h.runner.on("aapt version", fail("not found", 127));
    const report = prerequisiteHealthCheck(h.session);
    expect(report).toMatchObject({ writable: true, adbResponds: true, aaptResponds: false });
    expect(out).toContain("- AAPT responds: no");
    expect(out).toContain("- File create possible for .adb_wizard_workflows.json: yes");
  });
});
