import type { RepositoryEntry } from "../../../types/index.js";
import { DEFAULTS } from "../../config.js";
import { toUserPath } from "../../ui-utils.js";
import type { ListItem } from "../components/select-list.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import { isKey } from "../keys.js";
import type { SettingsState } from "../states.js";

export type RepositoryAction =
  | "editBranch"
  | "editClonePath"
  | "rename"
  | "refresh"
  | "delete"
  | "back";

const LABELS: Record<RepositoryAction, string> = {
  editBranch: "🌿 Edit Branch",
  editClonePath: "📂 Edit Clone Path",
  rename: "✏️  Rename",
  refresh: "🔄 Manual Refresh",
  delete: "🗑️  Delete",
  back: "← Back",
};

/**
 * Actions offered for one entry. Delete needs at least two entries.
 */
export function buildRepositoryActions(
  entry: RepositoryEntry,
  entryCount: number
): ListItem<RepositoryAction>[] {
  const actions: RepositoryAction[] =
    entry.kind === "remote" ? ["editBranch", "editClonePath", "rename", "refresh"] : ["rename"];

  if (entryCount >= 2) {
    actions.push("delete");
  }
  actions.push("back");

  return actions.map((value) => ({ value, label: LABELS[value] }));
}

function backToMainMenu(ctrl: SettingsController): undefined {
  ctrl.selectedRepositoryId = undefined;
  ctrl.resetScratch();
  ctrl.transitionTo("MainMenu");
  return undefined;
}

function start(ctrl: SettingsController, entry: RepositoryEntry, action: RepositoryAction): undefined {
  ctrl.resetScratch();

  switch (action) {
    case "editBranch":
      ctrl.changeKind = "branch";
      ctrl.prepareInput({ value: entry.branch ?? "", placeholder: "main (default branch)" });
      ctrl.transitionTo("UpdateGitHubBranch");
      return undefined;
    case "editClonePath":
      ctrl.changeKind = "path";
      ctrl.prepareInput({ placeholder: toUserPath(entry.path) });
      ctrl.transitionTo("UpdateGitHubPath");
      return undefined;
    case "rename":
      ctrl.changeKind = "name";
      ctrl.prepareInput({ value: entry.name, charLimit: DEFAULTS.maxNameLength });
      ctrl.transitionTo("UpdateRepoName");
      return undefined;
    case "refresh":
      ctrl.changeKind = "refresh";
      ctrl.transitionTo("ManualRefresh");
      return undefined;
    case "delete":
      ctrl.changeKind = "delete";
      ctrl.transitionTo("ConfirmDelete");
      return undefined;
    case "back":
      return backToMainMenu(ctrl);
  }
}

const repositoryActions: KeyHandler = (ctrl, key) => {
  if (isKey(key, "esc")) {
    return backToMainMenu(ctrl);
  }
  if (isKey(key, "up", "k")) {
    ctrl.actionMenu.up();
    return undefined;
  }
  if (isKey(key, "down", "j")) {
    ctrl.actionMenu.down();
    return undefined;
  }
  if (!isKey(key, "enter", "space")) {
    return undefined;
  }

  const entry = ctrl.selectedEntry();
  const action = ctrl.actionMenu.selected();
  if (!entry || !action) {
    return backToMainMenu(ctrl);
  }
  return start(ctrl, entry, action.value);
};

export const REPOSITORY_ACTION_KEYS = {
  RepositoryActions: repositoryActions,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
