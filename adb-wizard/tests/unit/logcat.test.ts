import fs from "fs";
import path from "path";
import zlib from "zlib";
import { beforeEach, describe, expect, it } from "vitest";
import {
  captureLogChunks,
  chunkFileName,
  collectLogBundle,
  filterSpec,
  normalizePriority,
  planCapture,
  saveLogcatSnapshot,
  tailFilteredLogcat,
} from "../../scripts/features/logcat";
import { captureConsole, fail, testSession } from "../helpers/fakes";

describe("filters", () => {
  it("normalizes priorities", () => {
    expect(normalizePriority("w")).toBe("W");
    expect(normalizePriority("x")).toBe("I");
    expect(normalizePriority("", "E")).toBe("E");
  });

  it("silences everything else", () => {
    expect(filterSpec("", "E")).toEqual(["*:E", "*:S"]);
    expect(filterSpec("ActivityManager", "D")).toEqual(["ActivityManager:D", "*:S"]);
  });

  it("streams the filtered log", async () => {
    captureConsole();
    const h = testSession({ answers: ["ExampleTag", "e"] });
    await tailFilteredLogcat(h.session);
    expect(h.runner.streamed).toEqual([["adb", "-s", "emulator-5554", "logcat", "ExampleTag:E", "*:S"]]);
  });
});

describe("planCapture", () => {
  it("uses defaults for blank or invalid input", () => {
    expect(planCapture("", "")).toEqual({ totalSeconds: 300, intervalSeconds: 30 });
    expect(planCapture("x", "abc")).toEqual({ totalSeconds: 300, intervalSeconds: 30 });
  });

  it("enforces the minimums", () => {
    expect(planCapture("0", "1")).toEqual({ totalSeconds: 30, intervalSeconds: 5 });
    expect(planCapture("2", "10")).toEqual({ totalSeconds: 120, intervalSeconds: 10 });
  });

  it("numbers chunk files", () => {
    expect(chunkFileName(7)).toBe("logcat_chunk_007.txt.gz");
  });
});

describe("captureLogChunks", () => {
  beforeEach(() => {
    captureConsole();
  });

  it("dumps, compresses and clears until the deadline", async () => {
    const h = testSession({ settings: { redact: true } });
    h.runner.on("logcat -d", "connected to 10.0.0.5\n");
    const { dir, chunks } = await captureLogChunks(h.session, { totalSeconds: 30, intervalSeconds: 10 });
    expect(chunks).toBe(3);
    expect(path.basename(dir)).toBe("scheduled_logs_emulator-5554_20240102_030405");
    expect(h.clock.slept).toEqual([10_000, 10_000, 10_000]);
    expect(h.runner.lines().filter((l) => l.endsWith("logcat -c"))).toHaveLength(3);
    expect(fs.readdirSync(dir).sort()).toEqual(["logcat_chunk_001.txt.gz", "logcat_chunk_002.txt.gz", "logcat_chunk_003.txt.gz"]);
    const text = zlib.gunzipSync(fs.readFileSync(path.join(dir, "logcat_chunk_002.txt.gz"))).toString("utf-8");
    expect(text).toBe("connected to <redacted-ip>\n");
  });
});

describe("snapshots and bundles", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("saves a logcat dump", () => {
    const h = testSession({ serial: "192.168.1.42:5555" });
    h.runner.on("logcat -d", "I/Example: started\n");
    const file = saveLogcatSnapshot(h.session);
    expect(path.basename(file)).toBe("logcat_192.168.1.42_5555_20240102_030405.txt");
    expect(fs.readFileSync(file, "utf-8")).toBe("I/Example: started\n");
  });

  it("fails when logcat cannot be read", () => {
    const h = testSession();
    h.runner.on("logcat -d", fail("device offline"));
    expect(() => saveLogcatSnapshot(h.session)).toThrow("device offline");
  });

  it("bundles logcat with a bugreport", () => {
    const h = testSession();
    h.runner.on("logcat -d", "log line\n").on("bugreport", fail("bugreport unsupported"));
    const dir = collectLogBundle(h.session);
    expect(path.basename(dir)).toBe("bundle_emulator-5554_20240102_030405");
    expect(fs.readFileSync(path.join(dir, "logcat.txt"), "utf-8")).toBe("log line\n");
    expect(h.runner.lines()).toContain(`adb -s emulator-5554 bugreport ${path.join(dir, "bugreport.zip")}`);
    expect(h.runner.options[1]).toEqual({ timeoutMs: 600_000 });
    expect(out).toContain("Bugreport failed; bundle contains logcat only.");
  });
});
