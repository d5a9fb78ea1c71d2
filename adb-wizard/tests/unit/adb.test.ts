import { describe, expect, it } from "vitest";
import { adbCmd, localAdbPath, redactIfEnabled, redactText, redactValue, resolveAdbPath } from "../../scripts/adb/adb";
import { CommandError, ensureSuccess, runCmd } from "../../scripts/adb/exec";
import { testSettings } from "../helpers/fakes";

describe("adbCmd", () => {
  it("adds -s only when a serial is set", () => {
    expect(adbCmd("adb", "emulator-5554", "shell", "ls")).toEqual(["adb", "-s", "emulator-5554", "shell", "ls"]);
    expect(adbCmd("adb", "", "devices")).toEqual(["adb", "devices"]);
  });
});

describe("resolveAdbPath", () => {
  it("uses the explicit path first", () => {
    expect(resolveAdbPath(testSettings({ adbPath: "/opt/adb" }), () => true)).toBe("/opt/adb");
  });

  it("uses project-local platform-tools when present", () => {
    const settings = testSettings({ adbPath: "" });
    expect(resolveAdbPath(settings, (p) => p === localAdbPath(settings))).toBe(localAdbPath(settings));
  });

  it("falls back to adb on PATH", () => {
    expect(resolveAdbPath(testSettings({ adbPath: "" }), () => false)).toBe("adb");
  });

  it("names the windows executable", () => {
    const settings = testSettings({ adbPath: "" });
    expect(localAdbPath(settings, "win32").endsWith("adb.exe")).toBe(true);
  });
});

describe("redaction", () => {
  it("replaces addresses and identifiers", () => {
    const input = "ip 192.168.1.20 mac aa:bb:cc:dd:ee:ff mail dev@example.com imei 356938035643809";
    expect(redactText(input)).toBe("ip <redacted-ip> mac <redacted-mac> mail <redacted-email> imei <redacted-imei>");
  });

  it("only redacts when enabled", () => {
    expect(redactIfEnabled({ redact: false }, "10.0.0.1")).toBe("10.0.0.1");
    expect(redactIfEnabled({ redact: true }, "10.0.0.1")).toBe("<redacted-ip>");
  });

  it("walks nested values", () => {
    expect(redactValue({ a: ["10.0.0.1"], n: 5, nested: { mail: "qa@example.org" } })).toEqual({
      a: ["<redacted-ip>"],
      n: 5,
      nested: { mail: "<redacted-email>" },
    });
  });
});

describe("exec", () => {
  it("builds a readable CommandError", () => {
    const err = new CommandError(["adb", "install", "a.apk"], { stdout: "", stderr: "INSTALL_FAILED\n", exitCode: 1 });
    expect(err.message).toBe("adb install a.apk failed: INSTALL_FAILED");
  });

  it("falls back to the exit code when there is no output", () => {
    expect(() => ensureSuccess(["adb", "reboot"], { stdout: "", stderr: "", exitCode: 3 })).toThrow("adb reboot failed: exit code 3");
  });

  it("passes successful results through", () => {
    const result = { stdout: "ok", stderr: "", exitCode: 0 };
    expect(ensureSuccess(["adb"], result)).toBe(result);
  });

  it("reports a missing executable as exit code 1", () => {
    const result = runCmd(["adb-wizard-missing-binary-xyz"], true, 1000);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("ENOENT");
  });
});
