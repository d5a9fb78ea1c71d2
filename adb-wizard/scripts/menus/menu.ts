import { ask, type Session } from "../adb/session";
import { errorMessage, logger } from "../shared/logger";
import { InputClosedError } from "../shared/prompt";

export type MenuItem = {
  key: string;
  label: string;
  run: () => Promise<void> | void;
};

export async function guard(label: string, action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof InputClosedError) throw err;
    console.log(`Action failed: ${errorMessage(err)}`);
    logger.error("action failed", { action: label, err: errorMessage(err) });
  }
}

export function menuLines(items: MenuItem[], exitLabel = "Back") {
  return [...items.map((item) => `${item.key}) ${item.label}`), `0) ${exitLabel}`];
}

/** Loops until "0"; each action runs under `guard` so one failure never ends the session. */
export async function runMenu(session: Session, title: string, items: MenuItem[], exitLabel = "Back"): Promise<void> {
  for (;;) {
    console.log(`\n${title}`);
    for (const line of menuLines(items, exitLabel)) console.log(line);
    const choice = await ask(session, "> ");
    if (choice === "0") return;
    const item = items.find((candidate) => candidate.key === choice);
    if (!item) {
      console.log("Unknown option.");
      continue;
    }
    await guard(item.label, item.run);
  }
}
