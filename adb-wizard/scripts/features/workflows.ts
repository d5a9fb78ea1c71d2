import { CommandError } from "../adb/exec";
import { adb, adbStream, ask, requireDevice, type Session } from "../adb/session";
import { parseChoice } from "../shared/cli";
import { errorMessage, logger } from "../shared/logger";
import {
  WORKFLOW_ACTIONS,
  isWorkflowAction,
  loadWorkflows,
  saveWorkflows,
  type Workflow,
  type WorkflowStep,
} from "../stores/stores";
import { launchArgs } from "./apps";

export async function buildWorkflow(session: Session): Promise<void> {
  const workflows = loadWorkflows(session.settings);
  const name = await ask(session, "Workflow name: ");
  if (!name) {
    console.log("Workflow name is required.");
    return;
  }
  const steps: WorkflowStep[] = [];
  console.log(`Add steps: ${WORKFLOW_ACTIONS.join(" | ")}`);
  for (;;) {
    const action = await ask(session, "Step action (blank to finish): ");
    if (!action) break;
    if (!isWorkflowAction(action)) {
      console.log("Unknown action.");
      continue;
    }
    const step: WorkflowStep = { action };
    if (action === "install_apk") step.apk_path = await ask(session, "apk_path: ");
    if (action === "clear_data" || action === "launch_app") step.package = await ask(session, "package: ");
    if (action === "launch_app") step.activity = await ask(session, "activity (optional): ");
    if (action === "tail_filtered_logcat") {
      step.tag = (await ask(session, "tag (default *): ")) || "*";
      step.priority = ((await ask(session, "priority [V/D/I/W/E/F/S] (default I): ")) || "I").toUpperCase();
    }
    steps.push(step);
  }
  if (steps.length === 0) {
    console.log("No steps added.");
    return;
  }
  const kept = workflows.filter((w) => w.name !== name);
  kept.push({ name, steps });
  saveWorkflows(session.settings, kept);
  console.log(`Saved workflow: ${name}`);
}

export function formatWorkflowLine(wf: Workflow, index: number) {
  const stepNames = wf.steps.map((s) => s.action || "?").join(", ");
  return `${index + 1}) ${wf.name || "unnamed"} [${stepNames}]`;
}

export function listWorkflows(session: Session): Workflow[] {
  const workflows = loadWorkflows(session.settings);
  if (workflows.length === 0) {
    console.log("No workflows found.");
    return workflows;
  }
  workflows.forEach((wf, i) => console.log(formatWorkflowLine(wf, i)));
  return workflows;
}

export type WorkflowOutcome = { completed: boolean; stepsRun: number };

async function runStep(session: Session, step: WorkflowStep): Promise<void> {
  const action = step.action;
  switch (action) {
    case "install_apk": {
      const apkPath = step.apk_path || "";
      if (!apkPath) {
        console.log("Skipped install_apk (missing apk_path).");
        return;
      }
      adb(session, ["install", "-r", apkPath], { check: true });
      return;
    }
    case "clear_data": {
      const pkg = step.package || "";
      if (pkg) adb(session, ["shell", "pm", "clear", pkg], { check: true });
      return;
    }
    case "launch_app": {
      const pkg = step.package || "";
      if (!pkg) {
        console.log("Skipped launch_app (missing package).");
        return;
      }
      adb(session, launchArgs(pkg, step.activity || ""), { check: true });
      return;
    }
    case "tail_filtered_logcat": {
      const tag = step.tag || "*";
      const priority = step.priority || "I";
      console.log("Streaming filtered logcat. Press Ctrl+C to continue.");
      await adbStream(session, ["logcat", `${tag}:${priority}`, "*:S"]);
      return;
    }
    default:
      console.log(`Unknown step action: ${action}`);
  }
}

/** Executes steps strictly in order; the first failing command stops the run. */
export async function executeWorkflow(session: Session, wf: Workflow): Promise<WorkflowOutcome> {
  console.log(`Running workflow: ${wf.name || "unnamed"}`);
  for (let i = 0; i < wf.steps.length; i++) {
    const step = wf.steps[i];
    logger.debug("workflow step", { workflow: wf.name, step: i + 1, action: step.action });
    try {
      await runStep(session, step);
    } catch (err) {
      if (!(err instanceof CommandError)) throw err;
      const detail = (err.result.stderr || err.result.stdout).trim() || `exit code ${err.result.exitCode}`;
      console.log(`Workflow stopped at step ${i + 1} (${step.action}): ${detail}`);
      logger.error("workflow step failed", { workflow: wf.name, step: i + 1, err: errorMessage(err) });
      return { completed: false, stepsRun: i + 1 };
    }
  }
  console.log("Workflow complete.");
  return { completed: true, stepsRun: wf.steps.length };
}

export async function runWorkflowInteractive(session: Session): Promise<void> {
  if (!requireDevice(session)) return;
  const workflows = listWorkflows(session);
  if (workflows.length === 0) return;
  const idx = parseChoice(await ask(session, "Select workflow number: "), workflows.length);
  if (idx < 0) {
    console.log("Invalid choice.");
    return;
  }
  await executeWorkflow(session, workflows[idx]);
}

export function findWorkflow(session: Session, name: string): Workflow | undefined {
  return loadWorkflows(session.settings).find((wf) => wf.name === name);
}
