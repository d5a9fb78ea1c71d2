import { ALIASES_FILE, PROFILES_FILE, WORKFLOWS_FILE, storePath, type Settings } from "../config";
import { isRecord, readJSONFile, setOwn, str, writeJSONFile } from "../shared/lib";

export const WORKFLOW_ACTIONS = ["install_apk", "clear_data", "launch_app", "tail_filtered_logcat"] as const;
export type WorkflowAction = (typeof WORKFLOW_ACTIONS)[number];

// Steps are stored loosely: hand-edited files may carry unknown actions or missing
// fields, and playback reports those instead of rejecting the whole file.
export type WorkflowStep = {
  action: string;
  apk_path?: string;
  package?: string;
  activity?: string;
  tag?: string;
  priority?: string;
};

export type Workflow = { name: string; steps: WorkflowStep[] };

export type Profile = {
  package_name: string;
  activity: string;
  log_tag: string;
  apk_path: string;
};

export type Profiles = Record<string, Profile>;
export type Aliases = Record<string, string>;

export function isWorkflowAction(action: string): action is WorkflowAction {
  return (WORKFLOW_ACTIONS as readonly string[]).includes(action);
}

const STEP_FIELDS = ["apk_path", "package", "activity", "tag", "priority"] as const;

function normalizeStep(raw: unknown): WorkflowStep | null {
  if (!isRecord(raw)) return null;
  const step: WorkflowStep = { action: str(raw.action) };
  for (const field of STEP_FIELDS) {
    if (raw[field] !== undefined) step[field] = str(raw[field]);
  }
  return step;
}

export function normalizeWorkflows(raw: unknown): Workflow[] {
  if (!Array.isArray(raw)) return [];
  const out: Workflow[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const steps = Array.isArray(item.steps)
      ? item.steps.map(normalizeStep).filter((s): s is WorkflowStep => s !== null)
      : [];
    out.push({ name: str(item.name), steps });
  }
  return out;
}

export function normalizeProfiles(raw: unknown): Profiles {
  if (!isRecord(raw)) return {};
  const out: Profiles = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!isRecord(value)) continue;
    setOwn(out, name, {
      package_name: str(value.package_name),
      activity: str(value.activity),
      log_tag: str(value.log_tag, "*") || "*",
      apk_path: str(value.apk_path),
    });
  }
  return out;
}

export function normalizeAliases(raw: unknown): Aliases {
  if (!isRecord(raw)) return {};
  const out: Aliases = {};
  for (const [alias, serial] of Object.entries(raw)) {
    const s = str(serial).trim();
    if (s) setOwn(out, alias, s);
  }
  return out;
}

type StoreSettings = Pick<Settings, "dataDir">;

export function loadWorkflows(settings: StoreSettings): Workflow[] {
  return normalizeWorkflows(readJSONFile(storePath(settings, WORKFLOWS_FILE)));
}

export function saveWorkflows(settings: StoreSettings, workflows: Workflow[]) {
  writeJSONFile(storePath(settings, WORKFLOWS_FILE), workflows);
}

export function loadProfiles(settings: StoreSettings): Profiles {
  return normalizeProfiles(readJSONFile(storePath(settings, PROFILES_FILE)));
}

export function saveProfiles(settings: StoreSettings, profiles: Profiles) {
  writeJSONFile(storePath(settings, PROFILES_FILE), profiles);
}

export function loadAliases(settings: StoreSettings): Aliases {
  return normalizeAliases(readJSONFile(storePath(settings, ALIASES_FILE)));
}

export function saveAliases(settings: StoreSettings, aliases: Aliases) {
  writeJSONFile(storePath(settings, ALIASES_FILE), aliases);
}
