import { beforeEach, describe, expect, it, vi } from "vitest";
import { guard, menuLines, runMenu } from "../../scripts/menus/menu";
import { mainMenu } from "../../scripts/menus/sections";
import { InputClosedError } from "../../scripts/shared/prompt";
import { captureConsole, testSession } from "../helpers/fakes";

describe("menu", () => {
  let out: string[];
  beforeEach(() => {
    out = captureConsole();
  });

  it("formats items with a back entry", () => {
    expect(menuLines([{ key: "1", label: "One", run: () => {} }], "Exit")).toEqual(["1) One", "0) Exit"]);
  });

  it("runs picked items until 0", async () => {
    const action = vi.fn();
    const h = testSession({ answers: ["9", "1", "0"] });
    await runMenu(h.session, "Tools", [{ key: "1", label: "Do it", run: action }]);
    expect(action).toHaveBeenCalledTimes(1);
    expect(out).toContain("Unknown option.");
    expect(out.filter((l) => l === "\nTools")).toHaveLength(3);
  });

  it("keeps going after an action fails", async () => {
    await guard("explode", () => {
      throw new Error("boom");
    });
    expect(out).toEqual(["Action failed: boom"]);
  });

  it("lets closed input end the session", async () => {
    await expect(
      guard("read", () => {
        throw new InputClosedError();
      })
    ).rejects.toBeInstanceOf(InputClosedError);
  });

  it("opens submenus from the main menu", async () => {
    const h = testSession({ answers: ["3", "0", "0"] });
    await mainMenu(h.session);
    expect(out).toContain("\nFile transfer");
    expect(out).toContain("7) Platform tools");
    expect(out[out.length - 1]).toBe("0) Exit");
  });

  it("propagates end of input from a nested menu", async () => {
    const h = testSession({ answers: ["5", "1"] });
    await expect(mainMenu(h.session)).rejects.toBeInstanceOf(InputClosedError);
  });
});
