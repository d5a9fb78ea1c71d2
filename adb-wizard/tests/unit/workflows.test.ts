import { beforeEach, describe, expect, it } from "vitest";
import { buildWorkflow, executeWorkflow, findWorkflow, formatWorkflowLine, listWorkflows } from "../../scripts/features/workflows";
import { loadWorkflows, saveWorkflows } from "../../scripts/stores/stores";
import { captureConsole, fail, testSession } from "../helpers/fakes";

describe("buildWorkflow", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("collects steps until a blank action and saves them", async () => {
    const h = testSession({
      answers: ["smoke", "install_apk", "/tmp/app.apk", "bogus", "launch_app", "com.example.app", "", "tail_filtered_logcat", "", "w", ""],
    });
    await buildWorkflow(h.session);
    expect(out).toContain("Unknown action.");
    expect(out).toContain("Saved workflow: smoke");
    expect(loadWorkflows(h.session.settings)).toEqual([
      {
        name: "smoke",
        steps: [
          { action: "install_apk", apk_path: "/tmp/app.apk" },
          { action: "launch_app", package: "com.example.app", activity: "" },
          { action: "tail_filtered_logcat", tag: "*", priority: "W" },
        ],
      },
    ]);
  });

  it("replaces a workflow with the same name", async () => {
    const h = testSession({ answers: ["smoke", "clear_data", "com.example.app", ""] });
    saveWorkflows(h.session.settings, [
      { name: "smoke", steps: [{ action: "install_apk", apk_path: "/old.apk" }] },
      { name: "other", steps: [] },
    ]);
    await buildWorkflow(h.session);
    expect(loadWorkflows(h.session.settings).map((w) => w.name)).toEqual(["other", "smoke"]);
  });

  it("refuses an empty workflow", async () => {
    const h = testSession({ answers: ["empty", ""] });
    await buildWorkflow(h.session);
    expect(out).toContain("No steps added.");
    expect(loadWorkflows(h.session.settings)).toEqual([]);
  });
});

describe("listing", () => {
  it("formats a workflow line", () => {
    expect(formatWorkflowLine({ name: "smoke", steps: [{ action: "install_apk" }, { action: "launch_app" }] }, 0)).toBe(
      "1) smoke [install_apk, launch_app]"
    );
  });

  it("reports an empty store", () => {
    const out = captureConsole();
    const h = testSession();
    expect(listWorkflows(h.session)).toEqual([]);
    expect(out).toEqual(["No workflows found."]);
  });

  it("finds a workflow by name", () => {
    const h = testSession();
    saveWorkflows(h.session.settings, [{ name: "smoke", steps: [] }]);
    expect(findWorkflow(h.session, "smoke")).toEqual({ name: "smoke", steps: [] });
    expect(findWorkflow(h.session, "missing")).toBeUndefined();
  });
});

describe("executeWorkflow", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("runs each step in order", async () => {
    const h = testSession();
    const outcome = await executeWorkflow(h.session, {
      name: "smoke",
      steps: [
        { action: "install_apk", apk_path: "/tmp/app.apk" },
        { action: "clear_data", package: "com.example.app" },
        { action: "launch_app", package: "com.example.app", activity: ".MainActivity" },
        { action: "tail_filtered_logcat", tag: "ExampleTag", priority: "D" },
      ],
    });
    expect(outcome).toEqual({ completed: true, stepsRun: 4 });
    expect(h.runner.lines()).toEqual([
      "adb -s emulator-5554 install -r /tmp/app.apk",
      "adb -s emulator-5554 shell pm clear com.example.app",
      "adb -s emulator-5554 shell am start -n com.example.app/.MainActivity",
    ]);
    expect(h.runner.streamed).toEqual([["adb", "-s", "emulator-5554", "logcat", "ExampleTag:D", "*:S"]]);
    expect(out[0]).toBe("Running workflow: smoke");
    expect(out[out.length - 1]).toBe("Workflow complete.");
  });

  it("launches through monkey without an activity", async () => {
    const h = testSession();
    await executeWorkflow(h.session, { name: "w", steps: [{ action: "launch_app", package: "com.example.app" }] });
    expect(h.runner.lines()).toEqual(["adb -s emulator-5554 shell monkey -p com.example.app -c android.intent.category.LAUNCHER 1"]);
  });

  it("stops at the first failing step", async () => {
    const h = testSession();
    h.runner.on("install", fail("INSTALL_FAILED_OLDER_SDK"));
    const outcome = await executeWorkflow(h.session, {
      name: "smoke",
      steps: [
        { action: "install_apk", apk_path: "/tmp/app.apk" },
        { action: "clear_data", package: "com.example.app" },
      ],
    });
    expect(outcome).toEqual({ completed: false, stepsRun: 1 });
    expect(out).toContain("Workflow stopped at step 1 (install_apk): INSTALL_FAILED_OLDER_SDK");
    expect(h.runner.calls).toHaveLength(1);
  });

  it("reports unknown and incomplete steps without stopping", async () => {
    const h = testSession();
    const outcome = await executeWorkflow(h.session, {
      name: "odd",
      steps: [{ action: "reboot" }, { action: "install_apk" }],
    });
    expect(outcome.completed).toBe(true);
    expect(out).toContain("Unknown step action: reboot");
    expect(out).toContain("Skipped install_apk (missing apk_path).");
    expect(h.runner.calls).toEqual([]);
  });
});
