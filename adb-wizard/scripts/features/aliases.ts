import { ask, type Session } from "../adb/session";
import { runMenu } from "../menus/menu";
import { ownValue, setOwn } from "../shared/lib";
import { loadAliases, saveAliases, type Aliases } from "../stores/stores";

export function formatAliases(aliases: Aliases) {
  return Object.keys(aliases)
    .sort()
    .map((alias) => `${alias} -> ${aliases[alias]}`);
}

export async function manageDeviceAliases(session: Session): Promise<void> {
  const { settings } = session;
  await runMenu(session, "Device aliases", [
    {
      key: "1",
      label: "List aliases",
      run: () => {
        const lines = formatAliases(loadAliases(settings));
        console.log(lines.length ? lines.join("\n") : "(no aliases)");
      },
    },
    {
      key: "2",
      label: "Set alias",
      run: async () => {
        const alias = await ask(session, "Alias: ");
        const serial = (await ask(session, `Serial [${session.serial}]: `)) || session.serial;
        if (!alias || !serial) return;
        const aliases = loadAliases(settings);
        setOwn(aliases, alias, serial);
        saveAliases(settings, aliases);
        console.log("Alias saved.");
      },
    },
    {
      key: "3",
      label: "Remove alias",
      run: async () => {
        const alias = await ask(session, "Alias to remove: ");
        const aliases = loadAliases(settings);
        if (ownValue(aliases, alias) === undefined) {
          console.log("Alias not found.");
          return;
        }
        delete aliases[alias];
        saveAliases(settings, aliases);
        console.log("Alias removed.");
      },
    },
    {
      key: "4",
      label: "Resolve alias to serial",
      run: async () => {
        const alias = await ask(session, "Alias: ");
        const serial = ownValue(loadAliases(settings), alias);
        console.log(serial ? `${alias} -> ${serial}` : "Alias not found.");
      },
    },
  ]);
}
