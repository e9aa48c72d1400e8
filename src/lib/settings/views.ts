import color from "picocolors";
import type { RepositoryEntry } from "../../types/index.js";
import { maskSecret, pluralize, toUserPath } from "../ui-utils.js";
import { S_BAR, S_BULLET, type LayoutConfig } from "./components/layout.js";
import type { SettingsController } from "./controller.js";
import type { SettingsState } from "./states.js";

export type Renderer = (ctrl: SettingsController) => string;

const HELP_INPUT = "enter: continue • esc: back";
const HELP_MENU = "↑/↓: navigate • enter: select • esc: back";
const HELP_CONFIRM = "y: confirm • n/esc: cancel";
const HELP_DISMISS = "any key: back";
const PROCEED = "Do you want to proceed? (y/N)";
const TOKEN_LIST_LIMIT = 5;

// ─────────────────────────────────────────────────────────────────────────────
// SCREEN SHAPES
// ─────────────────────────────────────────────────────────────────────────────

function input(ctrl: SettingsController, config: LayoutConfig, label: string, note?: string): string {
  const lines = [label, `${color.cyan(S_BAR)} ${ctrl.textInput.view()}`];
  if (note) {
    lines.push("", color.dim(note));
  }
  return ctrl.layout.render({ helpText: HELP_INPUT, ...config }, lines.join("\n"));
}

function confirm(ctrl: SettingsController, config: LayoutConfig, lines: string[]): string {
  return ctrl.layout.render({ helpText: HELP_CONFIRM, ...config }, [...lines, "", PROCEED].join("\n"));
}

function failure(
  ctrl: SettingsController,
  title: string,
  reasons: string[],
  error: Error | undefined = ctrl.layout.getError()
): string {
  const lines = [color.red(`${S_BULLET} ${error?.message ?? "unknown error"}`), "", "💡 Common reasons:"];
  for (const reason of reasons) {
    lines.push(`  ${S_BULLET} ${reason}`);
  }
  return ctrl.layout.render({ title, helpText: HELP_DISMISS, inlineError: false }, lines.join("\n"));
}

function selected(ctrl: SettingsController): RepositoryEntry | undefined {
  return ctrl.selectedEntry();
}

function branchLabel(branch: string | undefined): string {
  return branch ? branch : "default branch";
}

function remoteEntries(ctrl: SettingsController): RepositoryEntry[] {
  return ctrl.registry.repositories.filter((entry) => entry.kind === "remote");
}

// ─────────────────────────────────────────────────────────────────────────────
// MENUS
// ─────────────────────────────────────────────────────────────────────────────

const mainMenu: Renderer = (ctrl) => {
  const count = ctrl.registry.repositories.length;
  const maxItems = Math.max(3, Math.floor((ctrl.size.rows - 8) / 2));
  return ctrl.layout.render(
    {
      title: "⚙️  Rulebook Settings",
      subtitle: `${count} ${pluralize("repository", count)} configured`,
      helpText: "↑/↓: navigate • enter: select • q/esc: quit",
    },
    ctrl.mainMenu.render(maxItems)
  );
};

const repositoryActions: Renderer = (ctrl) => {
  const entry = selected(ctrl);
  const subtitle = entry
    ? entry.kind === "remote"
      ? `${entry.remoteUrl ?? ""} (${branchLabel(entry.branch)}) → ${toUserPath(entry.path)}`
      : toUserPath(entry.path)
    : undefined;

  return ctrl.layout.render(
    { title: `📦 ${entry?.name ?? "Repository"}`, subtitle, helpText: HELP_MENU },
    ctrl.actionMenu.render()
  );
};

const addRepositoryType: Renderer = (ctrl) =>
  ctrl.layout.render(
    { title: "➕ Add New Repository", subtitle: "Where do the rules live?", helpText: HELP_MENU },
    ctrl.typeMenu.render()
  );

// ─────────────────────────────────────────────────────────────────────────────
// ADD
// ─────────────────────────────────────────────────────────────────────────────

const ADD_LOCAL_TITLE = "📁 Add Local Repository";
const ADD_REMOTE_TITLE = "🔗 Add GitHub Repository";

const addLocalName: Renderer = (ctrl) =>
  input(ctrl, { title: ADD_LOCAL_TITLE, subtitle: "Step 1 of 2" }, "Name:");

const addLocalPath: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: ADD_LOCAL_TITLE, subtitle: `Step 2 of 2 · ${ctrl.scratch.name}` },
    "Directory:",
    "Absolute path or ~/…"
  );

const addLocalError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Add Repository", [
    "The directory is not readable",
    "The configuration file could not be written",
  ]);

const addRemoteName: Renderer = (ctrl) =>
  input(ctrl, { title: ADD_REMOTE_TITLE, subtitle: "Step 1 of 4" }, "Name:");

const addRemoteUrl: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: ADD_REMOTE_TITLE, subtitle: `Step 2 of 4 · ${ctrl.scratch.name}` },
    "Repository URL:",
    "HTTPS or SSH"
  );

const addRemoteBranch: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: ADD_REMOTE_TITLE, subtitle: `Step 3 of 4 · ${ctrl.scratch.remoteUrl}` },
    "Branch:",
    "Leave empty to track the default branch"
  );

const addRemotePath: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: ADD_REMOTE_TITLE, subtitle: "Step 4 of 4" },
    "Clone into:",
    "Leave empty to use the suggested directory"
  );

const addRemoteToken: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: "🔑 GitHub Token Required", subtitle: ctrl.tokenReason },
    `A personal access token with read access to ${ctrl.scratch.remoteUrl} is needed.\n\nToken:`,
    "Stored in your config directory and used for every GitHub repository"
  );

const addRemoteError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Add Repository", [
    "The token cannot read this repository",
    "The repository or branch does not exist",
    "The target directory already holds other files",
    "The network is unreachable",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// RENAME
// ─────────────────────────────────────────────────────────────────────────────

const updateRepoName: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: "✏️  Rename Repository", subtitle: `Current name: ${selected(ctrl)?.name ?? ""}` },
    "New name:"
  );

const editNameConfirm: Renderer = (ctrl) => {
  const current = selected(ctrl)?.name ?? "";
  const lines = ctrl.hasChanges
    ? [`Rename '${current}' to '${ctrl.scratch.name}'?`]
    : [`The name '${current}' is unchanged.`];
  return confirm(ctrl, { title: "✏️  Confirm Rename" }, lines);
};

const editNameError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Rename Repository", [
    "Another repository already uses this name",
    "The configuration file could not be written",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// BRANCH
// ─────────────────────────────────────────────────────────────────────────────

const updateGitHubBranch: Renderer = (ctrl) =>
  input(
    ctrl,
    {
      title: "🌿 Edit Branch",
      subtitle: `Current: ${branchLabel(selected(ctrl)?.branch)}`,
    },
    "Branch:",
    "Leave empty to track the default branch"
  );

const editBranchConfirm: Renderer = (ctrl) => {
  const entry = selected(ctrl);
  return confirm(ctrl, { title: "🌿 Confirm Branch Change" }, [
    `Switch '${entry?.name ?? ""}' from ${branchLabel(entry?.branch)} to ${branchLabel(ctrl.scratch.branch)}?`,
    "",
    color.dim("The clone is fetched and checked out after saving."),
  ]);
};

const editBranchError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Change Branch", [
    "The working tree has uncommitted changes",
    "The branch has not been pushed to origin",
    "The token cannot read this repository",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// CLONE PATH
// ─────────────────────────────────────────────────────────────────────────────

const updateGitHubPath: Renderer = (ctrl) =>
  input(
    ctrl,
    {
      title: "📂 Edit Clone Path",
      subtitle: `Current: ${toUserPath(selected(ctrl)?.path ?? "")}`,
    },
    "New directory:",
    "Leave empty to keep the current directory"
  );

const editClonePathConfirm: Renderer = (ctrl) => {
  const from = toUserPath(selected(ctrl)?.path ?? "");
  const to = toUserPath(ctrl.scratch.path);
  return confirm(ctrl, { title: "📂 Confirm Clone Path" }, [
    `Move the clone from ${from} to ${to}?`,
    "",
    color.yellow(`⚠️  ${from} is not deleted. Remove it yourself once the new clone is ready.`),
  ]);
};

const editClonePathError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Change Clone Path", [
    "The working tree has uncommitted changes",
    "Another repository already uses this directory",
    "The directory is not writable",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// REFRESH
// ─────────────────────────────────────────────────────────────────────────────

const manualRefresh: Renderer = (ctrl) => {
  const entry = selected(ctrl);
  return confirm(ctrl, { title: "🔄 Manual Refresh" }, [
    `Fetch the latest changes for '${entry?.name ?? ""}' (${branchLabel(entry?.branch)})?`,
  ]);
};

const refreshInProgress: Renderer = (ctrl) =>
  ctrl.layout.render(
    { title: "🔄 Refreshing…", helpText: "Refresh cannot be cancelled" },
    `Fetching ${selected(ctrl)?.remoteUrl ?? ""}`
  );

const refreshError: Renderer = (ctrl) =>
  failure(
    ctrl,
    "❌ Refresh Failed",
    [
      "The working tree has uncommitted changes",
      "The local branch has diverged from origin",
      "The token has expired",
      "The network is unreachable",
    ],
    ctrl.lastRefreshError ?? ctrl.layout.getError()
  );

// ─────────────────────────────────────────────────────────────────────────────
// DELETE
// ─────────────────────────────────────────────────────────────────────────────

const confirmDelete: Renderer = (ctrl) => {
  const entry = selected(ctrl);
  const path = toUserPath(entry?.path ?? "");
  const note =
    entry?.kind === "remote"
      ? `The clone at ${path} stays on disk. Delete it yourself if you no longer need it.`
      : `The directory at ${path} stays on disk.`;

  return confirm(ctrl, { title: "🗑️  Delete Repository", helpText: "y: delete • n/esc: cancel" }, [
    `Remove '${entry?.name ?? ""}' from your settings?`,
    "",
    color.yellow(`⚠️  ${note}`),
  ]);
};

const deleteError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Delete Repository", [
    "It is the only configured repository",
    "The working tree has uncommitted changes",
    "The configuration file could not be written",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// TOKEN
// ─────────────────────────────────────────────────────────────────────────────

function remoteSummary(ctrl: SettingsController): string[] {
  const remotes = remoteEntries(ctrl);
  if (remotes.length === 0) {
    return [color.dim("No GitHub repositories are configured yet.")];
  }

  const lines = [`Used by ${remotes.length} ${pluralize("repository", remotes.length)}:`];
  for (const entry of remotes.slice(0, TOKEN_LIST_LIMIT)) {
    lines.push(`  ${S_BULLET} ${entry.name} ${color.dim(entry.remoteUrl ?? "")}`);
  }
  if (remotes.length > TOKEN_LIST_LIMIT) {
    lines.push(`  ... and ${remotes.length - TOKEN_LIST_LIMIT} more`);
  }
  return lines;
}

const updateGitHubPAT: Renderer = (ctrl) =>
  input(
    ctrl,
    { title: "🔑 Update GitHub PAT", subtitle: "The token is checked against every GitHub repository" },
    [...remoteSummary(ctrl), "", "Token:"].join("\n")
  );

const updatePATConfirm: Renderer = (ctrl) =>
  confirm(ctrl, { title: "🔑 Confirm Token" }, [
    `Store token ${maskSecret(ctrl.scratch.token)}?`,
    "",
    ...remoteSummary(ctrl),
  ]);

const updatePATError: Renderer = (ctrl) =>
  failure(ctrl, "❌ Could Not Update Token", [
    "The token has expired or was revoked",
    "The token lacks the repo scope",
    "A configured repository no longer exists",
  ]);

// ─────────────────────────────────────────────────────────────────────────────
// COMPLETE
// ─────────────────────────────────────────────────────────────────────────────

const complete: Renderer = (ctrl) => {
  const count = ctrl.registry.repositories.length;
  return ctrl.layout.render(
    {
      title: "✅ Settings Updated",
      subtitle: `${count} ${pluralize("repository", count)} configured`,
      helpText: "Press any key to continue",
    },
    "Your changes have been saved."
  );
};

export const RENDERERS: Record<SettingsState, Renderer> = {
  MainMenu: mainMenu,
  RepositoryActions: repositoryActions,
  AddRepositoryType: addRepositoryType,

  AddLocalName: addLocalName,
  AddLocalPath: addLocalPath,
  AddLocalError: addLocalError,

  AddRemoteName: addRemoteName,
  AddRemoteURL: addRemoteUrl,
  AddRemoteBranch: addRemoteBranch,
  AddRemotePath: addRemotePath,
  AddRemoteToken: addRemoteToken,
  AddRemoteError: addRemoteError,

  UpdateRepoName: updateRepoName,
  EditNameConfirm: editNameConfirm,
  EditNameError: editNameError,

  UpdateGitHubBranch: updateGitHubBranch,
  EditBranchConfirm: editBranchConfirm,
  EditBranchError: editBranchError,

  UpdateGitHubPath: updateGitHubPath,
  EditClonePathConfirm: editClonePathConfirm,
  EditClonePathError: editClonePathError,

  ManualRefresh: manualRefresh,
  RefreshInProgress: refreshInProgress,
  RefreshError: refreshError,

  ConfirmDelete: confirmDelete,
  DeleteError: deleteError,

  UpdateGitHubPAT: updateGitHubPAT,
  UpdatePATConfirm: updatePATConfirm,
  UpdatePATError: updatePATError,

  Complete: complete,
};

export function renderView(ctrl: SettingsController): string {
  return RENDERERS[ctrl.state](ctrl);
}
