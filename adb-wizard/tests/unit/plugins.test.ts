import fs from "fs";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { collectPluginActions, listPluginFiles, pluginDir, runPlugins } from "../../scripts/features/plugins";
import { captureConsole, testSession } from "../helpers/fakes";

const HELLO = `module.exports = {
  register() {
    return [
      { name: "Say hello", run(ctx) { ctx.run(ctx.adbCmd(ctx.adbPath, ctx.serial, "shell", "echo", "hi")); } },
      { name: "" },
    ];
  },
};
`;

const FAILING = `module.exports = {
  register: () => [{ name: "Explode", run: () => { throw new Error("kaboom"); } }],
};
`;

function writePlugins(dir: string, files: Record<string, string>) {
  fs.mkdirSync(dir, { recursive: true });
  for (const [name, body] of Object.entries(files)) fs.writeFileSync(path.join(dir, name), body);
}

describe("plugins", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("lists plugin files, skipping private and non-script files", () => {
    const h = testSession();
    const dir = pluginDir(h.session);
    writePlugins(dir, { "hello.js": HELLO, "_draft.js": HELLO, "notes.txt": "", "b.cjs": FAILING });
    expect(listPluginFiles(dir)).toEqual(["b.cjs", "hello.js"]);
  });

  it("reports broken plugins and keeps valid actions", () => {
    const h = testSession();
    const dir = pluginDir(h.session);
    writePlugins(dir, { "broken.js": 'throw new Error("boom");\n', "hello.js": HELLO, "noop.js": "module.exports = {};\n" });
    const actions = collectPluginActions(dir);
    expect(actions.map((a) => a.name)).toEqual(["Say hello"]);
    expect(out).toEqual(["Failed loading plugin broken.js: boom"]);
  });

  it("runs the chosen action with the session context", async () => {
    const h = testSession({ answers: ["2"] });
    writePlugins(pluginDir(h.session), { "failing.cjs": FAILING, "hello.js": HELLO });
    await runPlugins(h.session);
    expect(out.slice(0, 3)).toEqual(["Plugin actions:", "1) Explode", "2) Say hello"]);
    expect(h.runner.calls).toEqual([["adb", "-s", "emulator-5554", "shell", "echo", "hi"]]);
  });

  it("reports an action that throws", async () => {
    const h = testSession({ answers: ["1"] });
    writePlugins(pluginDir(h.session), { "failing.cjs": FAILING });
    await runPlugins(h.session);
    expect(out[out.length - 1]).toBe("Plugin action failed: kaboom");
  });

  it("explains a missing or empty plugins directory", async () => {
    const h = testSession();
    await runPlugins(h.session);
    expect(out).toEqual([`No plugins directory found: ${pluginDir(h.session)}`]);
    writePlugins(pluginDir(h.session), { "readme.md": "" });
    await runPlugins(h.session);
    expect(out[1]).toBe("No plugins found.");
  });
});
