import { deviceSummary, printDeviceSummary, switchDevice } from "../adb/devices";
import { requireDevice, type Session } from "../adb/session";
import { manageDeviceAliases } from "../features/aliases";
import { apkInsightInteractive } from "../features/apk_insight";
import { appPermissionManager, interactivePackageSearch, intentDeeplinkRunner } from "../features/app_tools";
import {
  clearAppData,
  forceStopApp,
  installApk,
  installSplitApks,
  launchApp,
  listPackages,
  showPackageInfo,
  uninstallPackage,
} from "../features/apps";
import { multiDeviceBroadcast } from "../features/broadcast";
import {
  connectOverWifi,
  disconnectWifi,
  managePortForwarding,
  rebootDevice,
  screenCaptureTools,
  wirelessPairing,
} from "../features/device_tools";
import {
  exportHealthReport,
  networkDiagnosticsPack,
  prerequisiteHealthCheck,
  processServiceInspector,
  restoreDeviceState,
  snapshotDeviceState,
} from "../features/diagnostics";
import { pullFile, pushFile } from "../features/files";
import { collectLogBundle, saveLogcatSnapshot, scheduledLogCapture, tailFilteredLogcat, tailLogcat } from "../features/logcat";
import { reinstallPlatformTools } from "../features/platform_tools";
import { runPlugins } from "../features/plugins";
import { createOrUpdateProfile, deleteProfile, runDevLoop, viewProfiles } from "../features/profiles";
import { shellRepl } from "../features/shell";
import { buildWorkflow, listWorkflows, runWorkflowInteractive } from "../features/workflows";
import { runMenu, type MenuItem } from "./menu";

function numbered(entries: Array<[string, MenuItem["run"]]>): MenuItem[] {
  return entries.map(([label, run], i) => ({ key: String(i + 1), label, run }));
}

export function deviceSessionMenu(session: Session) {
  return runMenu(
    session,
    "Device and session",
    numbered([
      ["Show device summary", () => {
        if (requireDevice(session)) printDeviceSummary(deviceSummary(session));
      }],
      ["Switch device", () => switchDevice(session)],
      ["Reboot device", () => rebootDevice(session)],
      ["Connect over Wi-Fi (tcpip/connect)", () => connectOverWifi(session)],
      ["Disconnect Wi-Fi device", () => disconnectWifi(session)],
    ])
  );
}

export function appPackageMenu(session: Session) {
  return runMenu(
    session,
    "App and package",
    numbered([
      ["Install APK", () => installApk(session)],
      ["Install split APKs", () => installSplitApks(session)],
      ["List packages", () => listPackages(session)],
      ["Show package info", () => showPackageInfo(session)],
      ["Launch app", () => launchApp(session)],
      ["Uninstall package", () => uninstallPackage(session)],
      ["Force-stop app", () => forceStopApp(session)],
      ["Clear app data", () => clearAppData(session)],
    ])
  );
}

export function fileTransferMenu(session: Session) {
  return runMenu(
    session,
    "File transfer",
    numbered([
      ["Push file to device", () => pushFile(session)],
      ["Pull file from device", () => pullFile(session)],
    ])
  );
}

export function loggingMenu(session: Session) {
  return runMenu(
    session,
    "Logging and diagnostics",
    numbered([
      ["Tail logcat (Ctrl+C to stop)", () => tailLogcat(session)],
      ["Save logcat snapshot", () => {
        saveLogcatSnapshot(session);
      }],
      ["Tail filtered logcat", () => tailFilteredLogcat(session)],
      ["Collect logcat + bugreport bundle", () => {
        collectLogBundle(session);
      }],
    ])
  );
}

export function utilitiesMenu(session: Session) {
  const history: string[] = [];
  return runMenu(
    session,
    "Utilities",
    numbered([
      ["Run shell command (!history, !<index>)", async () => {
        await shellRepl(session, history);
      }],
    ])
  );
}

export function advancedMenu(session: Session) {
  return runMenu(
    session,
    "Advanced tools",
    numbered([
      ["Build workflow", () => buildWorkflow(session)],
      ["List workflows", () => {
        listWorkflows(session);
      }],
      ["Run workflow", () => runWorkflowInteractive(session)],
      ["Create or update profile", () => createOrUpdateProfile(session)],
      ["Delete profile", () => deleteProfile(session)],
      ["View profiles", () => viewProfiles(session)],
      ["Dev loop (install, clear, launch, logcat)", () => runDevLoop(session)],
      ["Export device health report", () => {
        exportHealthReport(session);
      }],
      ["Snapshot device state", () => {
        snapshotDeviceState(session);
      }],
      ["Restore device settings from snapshot", () => restoreDeviceState(session)],
      ["App permission manager", () => appPermissionManager(session)],
      ["Intent and deep-link runner", () => intentDeeplinkRunner(session)],
      ["Process and service inspector", () => processServiceInspector(session)],
      ["Network diagnostics pack", () => {
        networkDiagnosticsPack(session);
      }],
      ["Interactive package search", () => interactivePackageSearch(session)],
      ["Device aliases", () => manageDeviceAliases(session)],
      ["Scheduled log capture", () => scheduledLogCapture(session)],
      ["Prerequisite health check", () => {
        prerequisiteHealthCheck(session);
      }],
      ["Port forwarding", () => managePortForwarding(session)],
      ["Screen capture tools", () => screenCaptureTools(session)],
      ["Wireless pairing", () => wirelessPairing(session)],
      ["Multi-device broadcast", () => multiDeviceBroadcast(session)],
      ["Run plugins", () => runPlugins(session)],
      ["APK insight", () => apkInsightInteractive(session)],
    ])
  );
}

export function platformToolsMenu(session: Session) {
  return runMenu(
    session,
    "Platform tools",
    numbered([
      ["Re-download and reinstall project-local platform-tools (not system-wide)", () => reinstallPlatformTools(session)],
    ])
  );
}

export function mainMenu(session: Session) {
  return runMenu(
    session,
    "ADB Wizard",
    numbered([
      ["Device and session", () => deviceSessionMenu(session)],
      ["App and package", () => appPackageMenu(session)],
      ["File transfer", () => fileTransferMenu(session)],
      ["Logging and diagnostics", () => loggingMenu(session)],
      ["Utilities", () => utilitiesMenu(session)],
      ["Advanced tools", () => advancedMenu(session)],
      ["Platform tools", () => platformToolsMenu(session)],
    ]),
    "Exit"
  );
}
