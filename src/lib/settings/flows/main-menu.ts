import type { PreparedRepository } from "../../../types/index.js";
import { requestQuit } from "../../errors.js";
import { findEntry } from "../../registry.js";
import { formatRelativeTime, toUserPath } from "../../ui-utils.js";
import type { ListItem } from "../components/select-list.js";
import type { KeyHandler } from "../controller.js";
import { isKey } from "../keys.js";
import type { SettingsState } from "../states.js";

export type MenuItemValue =
  | { kind: "repository"; id: string }
  | { kind: "add" }
  | { kind: "token" };

export const ADD_REPOSITORY_LABEL = "➕ Add New Repository";
export const UPDATE_TOKEN_LABEL = "🔑 Update GitHub PAT";

function describe(repo: PreparedRepository, now: Date): string {
  const { entry } = repo;
  const parts = [toUserPath(repo.localPath)];

  if (entry.kind === "remote") {
    parts.push(entry.branch ? `branch ${entry.branch}` : "default branch");
  }
  if (entry.lastSyncedAt) {
    parts.push(`synced ${formatRelativeTime(entry.lastSyncedAt, now)}`);
  }
  if (repo.status === "missing") {
    parts.push("missing");
  } else if (repo.status === "error") {
    parts.push(`error: ${repo.error ?? "unknown"}`);
  }

  return parts.join(" · ");
}

/**
 * Prepared repositories first, then the two fixed actions
 */
export function buildMainMenuItems(
  prepared: readonly PreparedRepository[],
  now: Date
): ListItem<MenuItemValue>[] {
  const items: ListItem<MenuItemValue>[] = prepared.map((repo) => ({
    value: { kind: "repository", id: repo.entry.id },
    label: `${repo.entry.kind === "remote" ? "🔗" : "📁"} ${repo.entry.name}`,
    description: describe(repo, now),
  }));

  items.push({ value: { kind: "add" }, label: ADD_REPOSITORY_LABEL });
  items.push({ value: { kind: "token" }, label: UPDATE_TOKEN_LABEL });
  return items;
}

const mainMenu: KeyHandler = (ctrl, key) => {
  if (isKey(key, "esc", "q")) {
    ctrl.log.info("Settings closed", { state: ctrl.state });
    requestQuit();
  }
  if (isKey(key, "up", "k")) {
    ctrl.mainMenu.up();
    return undefined;
  }
  if (isKey(key, "down", "j")) {
    ctrl.mainMenu.down();
    return undefined;
  }
  if (!isKey(key, "enter", "space")) {
    return undefined;
  }

  const item = ctrl.mainMenu.selected();
  if (!item) return undefined;

  const { value } = item;
  switch (value.kind) {
    case "repository": {
      const entry = findEntry(ctrl.registry, value.id);
      if (!entry) {
        ctrl.log.warn("Menu item has no registry entry", { id: value.id });
        return undefined;
      }
      ctrl.selectedRepositoryId = entry.id;
      ctrl.rebuildActionMenu(entry);
      ctrl.transitionTo("RepositoryActions");
      return undefined;
    }
    case "add":
      ctrl.resetScratch();
      ctrl.typeMenu.select(0);
      ctrl.transitionTo("AddRepositoryType");
      return undefined;
    case "token":
      ctrl.resetScratch();
      ctrl.changeKind = "token";
      ctrl.prepareInput({ echoMode: "password", placeholder: "ghp_…" });
      ctrl.transitionTo("UpdateGitHubPAT");
      return undefined;
  }
};

export const MAIN_MENU_KEYS = {
  MainMenu: mainMenu,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
