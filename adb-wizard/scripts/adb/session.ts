import type { Settings } from "../config";
import type { Prompter } from "../shared/prompt";
import { adbCmd } from "./adb";
import { ensureSuccess, systemRunner, type CmdResult, type CommandRunner } from "./exec";

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms) => (ms <= 0 ? Promise.resolve() : new Promise<void>((resolve) => setTimeout(resolve, ms))),
};

export type Session = {
  settings: Settings;
  adbPath: string;
  /** Currently selected device; empty when none is selected. */
  serial: string;
  runner: CommandRunner;
  prompter: Prompter;
  clock: Clock;
};

export type SessionInit = Pick<Session, "settings" | "adbPath" | "prompter"> &
  Partial<Pick<Session, "serial" | "runner" | "clock">>;

export function createSession(init: SessionInit): Session {
  return {
    settings: init.settings,
    adbPath: init.adbPath,
    serial: init.serial ?? "",
    runner: init.runner ?? systemRunner,
    prompter: init.prompter,
    clock: init.clock ?? systemClock,
  };
}

export type ExecOptions = { check?: boolean; timeoutMs?: number };

export function runTool(session: Session, cmd: string[], options: ExecOptions = {}): CmdResult {
  const result = session.runner.run(cmd, { timeoutMs: options.timeoutMs ?? session.settings.timeoutMs });
  return options.check ? ensureSuccess(cmd, result) : result;
}

/** adb scoped to the selected device. */
export function adb(session: Session, args: string[], options: ExecOptions = {}): CmdResult {
  return runTool(session, adbCmd(session.adbPath, session.serial, ...args), options);
}

/** adb scoped to a specific device, regardless of the current selection. */
export function adbOn(session: Session, serial: string, args: string[], options: ExecOptions = {}): CmdResult {
  return runTool(session, adbCmd(session.adbPath, serial, ...args), options);
}

/** adb commands that talk to the server rather than a device (pair, connect, devices). */
export function adbHost(session: Session, args: string[], options: ExecOptions = {}): CmdResult {
  return runTool(session, [session.adbPath, ...args], options);
}

export function adbStream(session: Session, args: string[]): Promise<number> {
  return session.runner.stream(adbCmd(session.adbPath, session.serial, ...args));
}

export function shellOut(session: Session, ...args: string[]): string {
  return adb(session, ["shell", ...args]).stdout;
}

export function requireDevice(session: Session): boolean {
  if (session.serial) return true;
  console.log('No device selected. Use "Switch device" first.');
  return false;
}

export async function ask(session: Session, question: string): Promise<string> {
  return (await session.prompter.ask(question)).trim();
}

export async function askWithDefault(session: Session, label: string, current: string): Promise<string> {
  return (await ask(session, `${label} [${current}]: `)) || current;
}
