import { describe, it, expect } from "vitest";
import { QuitRequestedError } from "../../../src/lib/errors.js";
import { KEY_HANDLERS } from "../../../src/lib/settings/flows/index.js";
import { key } from "../../../src/lib/settings/keys.js";
import { SETTINGS_STATES } from "../../../src/lib/settings/states.js";
import { RENDERERS } from "../../../src/lib/settings/views.js";
import { createHarness, localEntry, remoteEntry } from "./harness.js";

const entries = () => [localEntry("a", "Alpha"), remoteEntry("b", "Beta")];

describe("SettingsController", () => {
  it("has a key handler and a renderer for every state", () => {
    for (const state of SETTINGS_STATES) {
      expect(typeof KEY_HANDLERS[state]).toBe("function");
      expect(typeof RENDERERS[state]).toBe("function");
    }
  });

  it.each([
    ["AddLocalError", "AddLocalPath"],
    ["AddRemoteError", "AddRemotePath"],
    ["EditNameError", "RepositoryActions"],
    ["EditBranchError", "RepositoryActions"],
    ["EditClonePathError", "RepositoryActions"],
    ["RefreshError", "RepositoryActions"],
    ["DeleteError", "RepositoryActions"],
    ["UpdatePATError", "MainMenu"],
  ] as const)("dismisses %s with a plain character", async (from, to) => {
    const h = createHarness(entries());
    h.ctrl.selectedRepositoryId = "b";
    h.ctrl.state = from;

    await h.press("x");

    expect(h.ctrl.state).toBe(to);
  });

  it("starts on the main menu with repositories and the fixed actions", () => {
    const { ctrl } = createHarness(entries());

    expect(ctrl.state).toBe("MainMenu");
    expect(ctrl.menuRevision).toBe(1);
    expect(ctrl.mainMenu.items.map((item) => item.label)).toEqual([
      "📁 Alpha",
      "🔗 Beta",
      "➕ Add New Repository",
      "🔑 Update GitHub PAT",
    ]);
  });

  describe("resetScratch", () => {
    it("empties every per-flow field", () => {
      const { ctrl } = createHarness(entries());
      ctrl.scratch = {
        name: "n",
        path: "/p",
        remoteUrl: "https://github.com/acme/x",
        branch: "dev",
        token: "test-secret",
      };
      ctrl.hasChanges = true;
      ctrl.isDirty = true;
      ctrl.changeKind = "branch";
      ctrl.tokenReason = "missing";
      ctrl.textInput.setValue("typed");
      ctrl.layout.setError(new Error("boom"));

      ctrl.resetScratch();

      expect(ctrl.scratch).toEqual({ name: "", path: "", remoteUrl: "", branch: "", token: "" });
      expect(ctrl.hasChanges).toBe(false);
      expect(ctrl.isDirty).toBe(false);
      expect(ctrl.changeKind).toBeUndefined();
      expect(ctrl.tokenReason).toBeUndefined();
      expect(ctrl.textInput.value).toBe("");
      expect(ctrl.layout.getError()).toBeUndefined();
    });
  });

  describe("keys", () => {
    it("quits on ctrl+c from any screen", () => {
      const { ctrl } = createHarness(entries());
      ctrl.state = "AddLocalName";

      expect(() => ctrl.update({ type: "key", key: key("c", { ctrl: true }) })).toThrow(
        QuitRequestedError
      );
    });

    it("quits on q or esc from the main menu", () => {
      const { ctrl } = createHarness(entries());

      expect(() => ctrl.update({ type: "key", key: key("q") })).toThrow(QuitRequestedError);
      expect(() => ctrl.update({ type: "key", key: key("esc") })).toThrow(QuitRequestedError);
    });

    it("drops keys while a command is outstanding", () => {
      const { ctrl, logs } = createHarness(entries());
      ctrl.busy = true;

      expect(ctrl.update({ type: "key", key: key("down") })).toBeUndefined();
      expect(ctrl.mainMenu.index).toBe(0);
      expect(logs).toContainEqual({
        level: "debug",
        message: "Key ignored while a command is running",
        fields: { state: "MainMenu", key: "down" },
      });
    });

    it("still reads keys during a refresh", () => {
      const { ctrl, logs } = createHarness(entries());
      ctrl.selectedRepositoryId = "b";
      ctrl.state = "RefreshInProgress";
      ctrl.busy = true;

      expect(ctrl.update({ type: "key", key: key("esc") })).toBeUndefined();
      expect(ctrl.state).toBe("RefreshInProgress");
      expect(logs.map((record) => record.message)).toContain(
        "Refresh cannot be cancelled once started"
      );
    });

    it("records the terminal size", () => {
      const { ctrl } = createHarness(entries());
      ctrl.update({ type: "resize", columns: 120, rows: 40 });
      expect(ctrl.size).toEqual({ columns: 120, rows: 40 });
    });
  });

  describe("flow-scoped messages", () => {
    it("ignores a dirty-check reply addressed to another flow", async () => {
      const h = createHarness(entries());
      await h.openRepository("b");
      await h.chooseAction("editBranch");
      expect(h.ctrl.state).toBe("UpdateGitHubBranch");

      const command = h.ctrl.update({ type: "deleteDirtyChecked", isDirty: true });

      expect(command).toBeUndefined();
      expect(h.ctrl.state).toBe("UpdateGitHubBranch");
      expect(h.ctrl.isDirty).toBe(false);
      expect(h.logs).toContainEqual({
        level: "debug",
        message: "Ignoring message for another flow",
        fields: { message: "deleteDirtyChecked", state: "UpdateGitHubBranch" },
      });
    });

    it("consumes a dirty-check reply addressed to the current flow", async () => {
      const h = createHarness(entries());
      await h.openRepository("b");
      await h.chooseAction("editBranch");

      h.ctrl.update({ type: "editBranchDirtyChecked", isDirty: true });

      expect(h.ctrl.state).toBe("EditBranchError");
      expect(h.ctrl.isDirty).toBe(true);
    });

    it("keeps the busy flag when a stray message arrives", () => {
      const { ctrl } = createHarness(entries());
      ctrl.selectedRepositoryId = "b";
      ctrl.state = "ConfirmDelete";
      ctrl.busy = true;

      ctrl.update({ type: "refreshDirtyChecked", isDirty: false });

      expect(ctrl.state).toBe("ConfirmDelete");
      expect(ctrl.busy).toBe(true);
    });
  });

  describe("failureFor", () => {
    it("maps a rejected command to the current flow's failure", () => {
      const { ctrl } = createHarness(entries());
      const error = new Error("disk full");

      ctrl.state = "AddLocalPath";
      expect(ctrl.failureFor(error)).toEqual({ type: "addLocalFailed", error });

      ctrl.state = "RefreshInProgress";
      expect(ctrl.failureFor(error)).toEqual({ type: "refreshCompleted", success: false, error });

      ctrl.state = "UpdatePATConfirm";
      expect(ctrl.failureFor(error)).toEqual({ type: "updateTokenFailed", error });
    });

    it("has no failure for menus", () => {
      const { ctrl } = createHarness(entries());
      expect(ctrl.failureFor(new Error("x"))).toBeUndefined();

      ctrl.state = "RepositoryActions";
      expect(ctrl.failureFor(new Error("x"))).toBeUndefined();
    });
  });

  describe("transitions", () => {
    const keys = ["enter", "esc", "space", "up", "down", "y", "n", "x", "backspace"];

    it("never leaves a flow except for a shared screen or its origin", async () => {
      for (const state of SETTINGS_STATES) {
        for (const name of keys) {
          const h = createHarness(entries(), { token: "test-token" });
          const entry = h.ctrl.registry.repositories[1];
          h.ctrl.selectedRepositoryId = entry.id;
          h.ctrl.rebuildActionMenu(entry);
          h.ctrl.state = state;

          try {
            await h.press(name);
          } catch (error) {
            if (!(error instanceof QuitRequestedError)) throw error;
          }

          const crossings = h.logs.filter((record) => record.message === "Transition crosses flows");
          expect(crossings, `${state} + ${name}`).toEqual([]);
        }
      }
    });
  });

  describe("menu rebuilds", () => {
    it("rebuilds the menu and re-prepares once per completed flow", async () => {
      const h = createHarness(entries());
      await h.openRepository("a");
      await h.chooseAction("rename");
      await h.submit("Gamma");
      expect(h.ctrl.state).toBe("EditNameConfirm");

      const revision = h.ctrl.menuRevision;
      h.prepare.mockClear();
      await h.press("y");

      expect(h.ctrl.state).toBe("Complete");
      expect(h.ctrl.menuRevision).toBe(revision + 1);
      expect(h.prepare).toHaveBeenCalledTimes(1);
    });

    it("rebuilds once when adding a local repository", async () => {
      const h = createHarness(entries());
      h.ctrl.mainMenu.select(2);
      await h.press("enter");
      await h.press("enter");
      await h.submit("Docs");

      const revision = h.ctrl.menuRevision;
      h.prepare.mockClear();
      await h.submit("/rules/docs");

      expect(h.ctrl.state).toBe("Complete");
      expect(h.ctrl.menuRevision).toBe(revision + 1);
      expect(h.prepare).toHaveBeenCalledTimes(1);
    });

    it("reloads from disk when Complete is dismissed", async () => {
      const h = createHarness(entries());
      h.ctrl.state = "Complete";
      h.disk.registry = { version: "1.0", repositories: [localEntry("z", "Zeta")] };

      await h.press("x");

      expect(h.ctrl.state).toBe("MainMenu");
      expect(h.ctrl.registry.repositories.map((entry) => entry.id)).toEqual(["z"]);
      expect(h.ctrl.mainMenu.items[0].label).toBe("📁 Zeta");
    });
  });
});
