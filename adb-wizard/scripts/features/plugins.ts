import fs from "fs";
import { createRequire } from "module";
import path from "path";
import { adbCmd } from "../adb/adb";
import type { CmdResult } from "../adb/exec";
import { ask, type Session } from "../adb/session";
import { PLUGINS_DIR } from "../config";
import { parseChoice } from "../shared/cli";
import { isRecord } from "../shared/lib";
import { errorMessage, logger } from "../shared/logger";

export type PluginContext = {
  adbPath: string;
  serial: string;
  run: (cmd: string[]) => CmdResult;
  adbCmd: (adbPath: string, serial: string, ...args: string[]) => string[];
};

export type PluginAction = {
  name: string;
  run: (ctx: PluginContext) => unknown;
};

type PluginModule = { register: () => unknown };

const PLUGIN_EXTENSIONS = [".js", ".cjs"];

function isPluginModule(v: unknown): v is PluginModule {
  return isRecord(v) && typeof v.register === "function";
}

function isPluginAction(v: unknown): v is PluginAction {
  return isRecord(v) && typeof v.name === "string" && v.name !== "" && typeof v.run === "function";
}

export function pluginDir(session: Session) {
  return path.join(session.settings.dataDir, PLUGINS_DIR);
}

export function listPluginFiles(dir: string) {
  return fs
    .readdirSync(dir)
    .filter((name) => PLUGIN_EXTENSIONS.includes(path.extname(name)) && !name.startsWith("_"))
    .sort();
}

function loadPluginModule(dir: string, fileName: string): PluginModule | undefined {
  const requireFromDir = createRequire(path.join(dir, "index.js"));
  const loaded: unknown = requireFromDir(path.join(dir, fileName));
  if (isPluginModule(loaded)) return loaded;
  if (isRecord(loaded) && isPluginModule(loaded.default)) return loaded.default;
  return undefined;
}

/** Loads every plugin file and collects its registered actions; broken files are reported and skipped. */
export function collectPluginActions(dir: string): PluginAction[] {
  const actions: PluginAction[] = [];
  for (const fileName of listPluginFiles(dir)) {
    let mod: PluginModule | undefined;
    try {
      mod = loadPluginModule(dir, fileName);
    } catch (err) {
      console.log(`Failed loading plugin ${fileName}: ${errorMessage(err)}`);
      logger.error("plugin load failed", { file: fileName, err: errorMessage(err) });
      continue;
    }
    if (!mod) continue;
    try {
      const registered = mod.register();
      if (!Array.isArray(registered)) continue;
      actions.push(...registered.filter(isPluginAction));
    } catch (err) {
      console.log(`Failed registering actions in plugin ${fileName}: ${errorMessage(err)}`);
    }
  }
  return actions;
}

export function pluginContext(session: Session): PluginContext {
  return {
    adbPath: session.adbPath,
    serial: session.serial,
    run: (cmd) => session.runner.run(cmd, { timeoutMs: session.settings.timeoutMs }),
    adbCmd,
  };
}

export async function runPlugins(session: Session): Promise<void> {
  const dir = pluginDir(session);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    console.log(`No plugins directory found: ${dir}`);
    return;
  }
  if (listPluginFiles(dir).length === 0) {
    console.log("No plugins found.");
    return;
  }
  const actions = collectPluginActions(dir);
  if (actions.length === 0) {
    console.log("No valid plugin actions found.");
    return;
  }
  console.log("Plugin actions:");
  actions.forEach((action, i) => console.log(`${i + 1}) ${action.name}`));
  const idx = parseChoice(await ask(session, "> "), actions.length);
  if (idx < 0) {
    console.log("Invalid choice.");
    return;
  }
  const selected = actions[idx];
  try {
    await selected.run(pluginContext(session));
  } catch (err) {
    console.log(`Plugin action failed: ${errorMessage(err)}`);
    logger.error("plugin action failed", { action: selected.name, err: errorMessage(err) });
  }
}
