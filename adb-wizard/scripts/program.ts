import { Command, CommanderError, type OutputConfiguration } from "commander";
import { resolveAdbPath } from "./adb/adb";
import { describeDevice, listDevices, selectInitialDevice } from "./adb/devices";
import type { CommandRunner } from "./adb/exec";
import { createSession, requireDevice, type Clock, type Session } from "./adb/session";
import { loadSettings, type CLIOptions, type Settings } from "./config";
import { apkInsight } from "./features/apk_insight";
import { exportHealthReport, networkDiagnosticsPack, prerequisiteHealthCheck, snapshotDeviceState } from "./features/diagnostics";
import { captureLogChunks, planCapture } from "./features/logcat";
import { executeWorkflow, findWorkflow, listWorkflows } from "./features/workflows";
import { mainMenu } from "./menus/sections";
import { cleanPathInput } from "./shared/lib";
import { errorMessage, logger, setLoggerConfig, type LogSink } from "./shared/logger";
import { InputClosedError, createPrompter, type Prompter } from "./shared/prompt";
import { loadAliases } from "./stores/stores";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Process-level collaborators; tests swap in fakes. */
export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  runner?: CommandRunner;
  clock?: Clock;
  prompter?: () => Prompter;
  logSink?: LogSink;
  output?: OutputConfiguration;
};

type DeviceNeed = "none" | "optional" | "required";

type CommandNeeds = {
  device: DeviceNeed;
  /** Closed input ends an interactive command normally; anywhere else it means no answer was given. */
  interactive?: boolean;
};

type CommandBody = (session: Session) => Promise<number> | number;

function readSettings(program: Command, deps: CliDeps): Settings | null {
  try {
    const settings = loadSettings(program.opts<CLIOptions>(), deps.env ?? process.env, deps.cwd ?? process.cwd());
    setLoggerConfig(settings.logJson, settings.logLevel, deps.logSink);
    return settings;
  } catch (err) {
    logger.error("invalid options", { err: errorMessage(err) });
    return null;
  }
}

/** Builds a session from the global options, selects a device as the command needs, and always releases the prompt. */
async function withSession(program: Command, deps: CliDeps, needs: CommandNeeds, fn: CommandBody): Promise<number> {
  const settings = readSettings(program, deps);
  if (!settings) return EXIT_USAGE;
  const prompter = (deps.prompter ?? createPrompter)();
  const session = createSession({
    settings,
    adbPath: resolveAdbPath(settings),
    prompter,
    runner: deps.runner,
    clock: deps.clock,
  });
  logger.debug("session ready", { adb: session.adbPath, dataDir: settings.dataDir, outputDir: settings.outputDir });
  try {
    if (needs.device !== "none") {
      await selectInitialDevice(session);
      if (needs.device === "required" && !requireDevice(session)) return EXIT_USAGE;
    }
    return await fn(session);
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    console.log("");
    if (needs.interactive) return EXIT_OK;
    logger.error("input closed before a device was selected");
    return EXIT_USAGE;
  } finally {
    prompter.close();
  }
}

function cmdDevices(session: Session) {
  const devices = listDevices(session);
  if (devices.length === 0) {
    console.log("No devices found.");
    return EXIT_OK;
  }
  const aliases = loadAliases(session.settings);
  for (const d of devices) console.log(describeDevice(d, aliases));
  return EXIT_OK;
}

async function cmdWorkflowRun(session: Session, name: string) {
  const wf = findWorkflow(session, name);
  if (!wf) {
    logger.error("workflow not found", { name });
    return EXIT_FAILURE;
  }
  const outcome = await executeWorkflow(session, wf);
  return outcome.completed ? EXIT_OK : EXIT_FAILURE;
}

function cmdApkInsight(session: Session, apk: string) {
  return apkInsight(session, cleanPathInput(apk)) ? EXIT_OK : EXIT_USAGE;
}

function cmdDoctor(session: Session) {
  const report = prerequisiteHealthCheck(session);
  return report.adbResponds && report.writable ? EXIT_OK : EXIT_FAILURE;
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name("adb-wizard")
    .description("Interactive menu-driven front-end for Android adb")
    .exitOverride()
    .showHelpAfterError()
    .showSuggestionAfterError()
    .option("--adb <path>", "adb executable (default: project-local platform-tools, then adb on PATH)")
    .option("--aapt <path>", "aapt executable used for APK insight")
    .option("-s, --serial <id>", "device serial or alias")
    .option("--data-dir <dir>", "directory for workflows, profiles, aliases, plugins and platform-tools")
    .option("--output-dir <dir>", "directory for reports, snapshots and captures")
    .option("--redact", "redact IPs, MACs, emails and IMEIs in saved files")
    .option("--signature-check <mode>", "APK signature check: conservative|strict|off")
    .option("--profile <name>", "active profile for the dev loop")
    .option("--timeout-ms <ms>", "timeout for captured adb commands")
    .option("--log-json", "Output logs in JSON")
    .option("--log-level <level>", "log verbosity: debug|info|error");
  if (deps.output) program.configureOutput(deps.output);

  const action = (needs: CommandNeeds, fn: CommandBody) => async () => {
    setExitCode(await withSession(program, deps, needs, fn));
  };

  program
    .command("menu", { isDefault: true })
    .description("Open the interactive main menu")
    .action(
      action({ device: "optional", interactive: true }, async (session) => {
        await mainMenu(session);
        return EXIT_OK;
      })
    );
  program
    .command("devices")
    .description("List connected devices with their aliases")
    .action(action({ device: "none" }, cmdDevices));
  program
    .command("workflows")
    .description("List saved workflows")
    .action(
      action({ device: "none" }, (session) => {
        listWorkflows(session);
        return EXIT_OK;
      })
    );
  program
    .command("workflow-run")
    .description("Run a saved workflow by name")
    .argument("<name>", "workflow name")
    .action(async (name: string) => {
      await action({ device: "required" }, (session) => cmdWorkflowRun(session, name))();
    });
  program
    .command("health-report")
    .description("Write a device health report (.txt and .json)")
    .action(action({ device: "required" }, (session) => (exportHealthReport(session).length ? EXIT_OK : EXIT_FAILURE)));
  program
    .command("snapshot")
    .description("Snapshot packages, properties and settings to JSON")
    .action(action({ device: "required" }, (session) => (snapshotDeviceState(session) ? EXIT_OK : EXIT_FAILURE)));
  program
    .command("network-diag")
    .description("Save a network diagnostics pack")
    .action(action({ device: "required" }, (session) => (networkDiagnosticsPack(session) ? EXIT_OK : EXIT_FAILURE)));
  program
    .command("scheduled-logs")
    .description("Capture gzip'd logcat chunks for a fixed duration")
    .option("--minutes <n>", "capture duration in minutes (default 5)")
    .option("--interval-sec <n>", "seconds between chunks (default 30)")
    .action(async (options: { minutes?: string; intervalSec?: string }) => {
      await action({ device: "required" }, async (session) => {
        await captureLogChunks(session, planCapture(options.minutes ?? "", options.intervalSec ?? ""));
        return EXIT_OK;
      })();
    });
  program
    .command("apk-insight")
    .description("Show APK metadata and install warnings for the selected device")
    .argument("<apk>", "path to the APK")
    .action(async (apk: string) => {
      await action({ device: "optional" }, (session) => cmdApkInsight(session, apk))();
    });
  program
    .command("doctor")
    .description("Check adb, aapt and the data directory")
    .action(action({ device: "none" }, cmdDoctor));

  return program;
}

/** Parses `argv` (without the node and script entries) and returns the process exit code. */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode: number = EXIT_OK;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    // exitOverride turns help output and parse errors into CommanderError.
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    throw err;
  }
  return exitCode;
}
