import type { RepositoryEntry } from "../../../types/index.js";
import { DEFAULTS } from "../../config.js";
import { toError, wrapError } from "../../errors.js";
import { findEntry, updateEntry } from "../../registry.js";
import { validateBranchName } from "../../validation.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import { checkDirty, settleDirtyCheck } from "../dirty-check.js";
import type { Command, MessageOf, SettingsMessage } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { handleTextInput, isConfirmKey, isDeclineKey, passes } from "./input.js";

function backToActions(ctrl: SettingsController): undefined {
  ctrl.resetScratch();
  ctrl.transitionTo("RepositoryActions");
  return undefined;
}

/**
 * Check the branch exists, save, then pull the new branch into the clone
 */
function switchBranch(ctrl: SettingsController, entry: RepositoryEntry): Command {
  const registry = ctrl.registry;
  const branch = ctrl.scratch.branch;

  return async (): Promise<SettingsMessage> => {
    const token = await ctrl.tokenOrUndefined();

    if (branch) {
      let exists: boolean;
      try {
        exists = await ctrl.sourceFor(entry, token).branchExistsOnRemote(branch);
      } catch (error) {
        return { type: "editBranchFailed", error: wrapError("failed to check remote branch", error) };
      }
      if (!exists) {
        return {
          type: "editBranchFailed",
          error: new Error(
            `branch '${branch}' does not exist on remote '${DEFAULTS.remoteName}'. Push the branch first or choose an existing branch`
          ),
        };
      }
    }

    const next = updateEntry(registry, entry.id, { branch: branch || undefined });
    const result = await commitRegistry(ctrl, "editBranch", next);
    if (result.type !== "mutationCommitted") return result;

    const updated = findEntry(next, entry.id);
    if (updated) {
      try {
        await ctrl.sourceFor(updated, token).fetchUpdates();
      } catch (error) {
        ctrl.log.warn("Branch saved but the clone was not updated", {
          id: entry.id,
          error: toError(error).message,
        });
      }
    }
    return result;
  };
}

const updateGitHubBranch: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(branch) {
      const entry = ctrl.selectedEntry();
      if (!entry) return backToActions(ctrl);
      if (!passes(ctrl, () => validateBranchName(branch))) return undefined;

      ctrl.scratch.branch = branch;
      ctrl.hasChanges = branch !== (entry.branch ?? "");
      return ctrl.issue(
        checkDirty(entry, (e) => ctrl.sourceFor(e), (isDirty, error) => ({
          type: "editBranchDirtyChecked",
          isDirty,
          error,
        }))
      );
    },
    cancel() {
      return backToActions(ctrl);
    },
  });

const editBranchConfirm: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToActions(ctrl);
  }
  if (!isConfirmKey(key)) {
    return undefined;
  }

  const entry = ctrl.selectedEntry();
  if (!entry) return backToActions(ctrl);
  return ctrl.issue(switchBranch(ctrl, entry));
};

const editBranchError: KeyHandler = (ctrl) => backToActions(ctrl);

export function onEditBranchDirtyChecked(
  ctrl: SettingsController,
  message: MessageOf<"editBranchDirtyChecked">
): Command | undefined {
  return settleDirtyCheck(ctrl, message, () => {
    ctrl.transitionTo("EditBranchConfirm");
    return undefined;
  });
}

export function onEditBranchFailed(
  ctrl: SettingsController,
  message: MessageOf<"editBranchFailed">
): undefined {
  return ctrl.fail(message.error);
}

export const EDIT_BRANCH_KEYS = {
  UpdateGitHubBranch: updateGitHubBranch,
  EditBranchConfirm: editBranchConfirm,
  EditBranchError: editBranchError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
