import { writeCapturedOutput } from "../adb/exec";
import { adb, ask, requireDevice, type Session } from "../adb/session";
import { parseChoice } from "../shared/cli";

export type ShellInput =
  | { kind: "exit" }
  | { kind: "history" }
  | { kind: "recall"; index: number }
  | { kind: "command"; command: string };

export function parseShellInput(raw: string): ShellInput {
  const line = raw.trim();
  if (!line || line === "exit") return { kind: "exit" };
  if (line === "!history") return { kind: "history" };
  const recall = line.match(/^!(\d+)$/);
  if (recall) return { kind: "recall", index: Number(recall[1]) };
  return { kind: "command", command: line };
}

/** Interactive `adb shell` loop with `!history` and `!<n>` recall; blank or `exit` leaves. */
export async function shellRepl(session: Session, history: string[] = []): Promise<string[]> {
  if (!requireDevice(session)) return history;
  console.log("Type a shell command. !history lists previous commands, !<n> repeats one, blank or exit returns.");
  for (;;) {
    const input = parseShellInput(await ask(session, "shell> "));
    if (input.kind === "exit") return history;
    if (input.kind === "history") {
      if (history.length === 0) console.log("(no history)");
      history.forEach((cmd, i) => console.log(`${i + 1}) ${cmd}`));
      continue;
    }
    let command = "";
    if (input.kind === "recall") {
      const idx = parseChoice(String(input.index), history.length);
      if (idx < 0) {
        console.log("No such history entry.");
        continue;
      }
      command = history[idx];
      console.log(`shell> ${command}`);
    } else {
      command = input.command;
    }
    history.push(command);
    const result = adb(session, ["shell", command]);
    writeCapturedOutput(result);
    if (result.exitCode !== 0) console.log(`(exit code ${result.exitCode})`);
  }
}
