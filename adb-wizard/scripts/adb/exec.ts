import { spawn, spawnSync } from "child_process";
import { logger } from "../shared/logger";

export const defaultTimeoutMs = 120_000;

export type CmdResult = { stdout: string; stderr: string; exitCode: number };

export type RunOptions = { timeoutMs?: number; cwd?: string };

export interface CommandRunner {
  /** Runs to completion with output captured. */
  run(cmd: string[], options?: RunOptions): CmdResult;
  /** Runs with output attached to the terminal until exit or Ctrl+C. */
  stream(cmd: string[]): Promise<number>;
}

export class CommandError extends Error {
  readonly cmd: string[];
  readonly result: CmdResult;

  constructor(cmd: string[], result: CmdResult) {
    const detail = (result.stderr || result.stdout).trim() || `exit code ${result.exitCode}`;
    super(`${cmd.join(" ")} failed: ${detail}`);
    this.name = "CommandError";
    this.cmd = cmd;
    this.result = result;
  }
}

export function ensureSuccess(cmd: string[], result: CmdResult): CmdResult {
  if (result.exitCode !== 0) throw new CommandError(cmd, result);
  return result;
}

export function runCmd(cmd: string[], capture: boolean, timeoutMs: number, cwd?: string): CmdResult {
  const res = spawnSync(cmd[0], cmd.slice(1), {
    encoding: "utf8",
    timeout: timeoutMs > 0 ? timeoutMs : defaultTimeoutMs,
    maxBuffer: 64 * 1024 * 1024,
    ...(cwd ? { cwd } : {}),
    stdio: capture ? "pipe" : "inherit",
  });
  if (res.error) {
    if ("code" in res.error && res.error.code === "ETIMEDOUT") {
      return { stdout: res.stdout ?? "", stderr: "Command timed out", exitCode: 124 };
    }
    return { stdout: res.stdout ?? "", stderr: res.stderr || String(res.error), exitCode: 1 };
  }
  const exitCode = typeof res.status === "number" ? res.status : 1;
  return { stdout: res.stdout ?? "", stderr: res.stderr ?? "", exitCode };
}

export function streamCmd(cmd: string[]): Promise<number> {
  return new Promise<number>((resolve) => {
    const stdin = process.stdin;
    // readline keeps the terminal in raw mode, which turns Ctrl+C into a keypress
    // instead of a SIGINT for the child's process group.
    const restoreRaw = Boolean(stdin.isTTY && stdin.isRaw);
    if (restoreRaw) stdin.setRawMode(false);

    let interrupted = false;
    let settled = false;
    const child = spawn(cmd[0], cmd.slice(1), { stdio: ["ignore", "inherit", "inherit"] });
    const onSigint = () => {
      interrupted = true;
      child.kill("SIGINT");
    };
    process.on("SIGINT", onSigint);

    const finish = (code: number) => {
      if (settled) return;
      settled = true;
      process.off("SIGINT", onSigint);
      if (restoreRaw) stdin.setRawMode(true);
      if (interrupted) process.stdout.write("\n");
      resolve(code);
    };
    child.on("error", (err) => {
      logger.error("command failed to start", { cmd: cmd.join(" "), err: err.message });
      finish(1);
    });
    child.on("close", (code) => {
      if (interrupted) finish(130);
      else finish(typeof code === "number" ? code : 1);
    });
  });
}

export const systemRunner: CommandRunner = {
  run(cmd, options = {}) {
    logger.debug("exec", { cmd: cmd.join(" ") });
    return runCmd(cmd, true, options.timeoutMs ?? defaultTimeoutMs, options.cwd);
  },
  stream(cmd) {
    logger.debug("exec stream", { cmd: cmd.join(" ") });
    return streamCmd(cmd);
  },
};

export function writeCapturedOutput(result: CmdResult) {
  if (result.stdout.trim()) console.log(result.stdout.trimEnd());
  if (result.stderr.trim()) console.error(result.stderr.trimEnd());
}
