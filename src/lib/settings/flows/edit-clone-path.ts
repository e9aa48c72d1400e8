import { ValidationError } from "../../errors.js";
import { findEntryByPath, updateEntry } from "../../registry.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import { checkDirty, settleDirtyCheck } from "../dirty-check.js";
import type { Command, MessageOf } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { handleTextInput, isConfirmKey, isDeclineKey, passes } from "./input.js";

function backToActions(ctrl: SettingsController): undefined {
  ctrl.resetScratch();
  ctrl.transitionTo("RepositoryActions");
  return undefined;
}

const updateGitHubPath: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(raw) {
      const entry = ctrl.selectedEntry();
      if (!entry) return backToActions(ctrl);

      const { paths } = ctrl.deps;
      const target = raw || entry.path;

      let path = "";
      const valid = passes(ctrl, () => {
        paths.validateStoragePath(target);
        path = paths.expand(target);
        const owner = findEntryByPath(ctrl.registry, path);
        if (owner && owner.id !== entry.id) {
          throw new ValidationError(`path already used by repository '${owner.name}'`);
        }
      });
      if (!valid) return undefined;

      ctrl.scratch.path = path;
      ctrl.hasChanges = path !== entry.path;
      return ctrl.issue(
        checkDirty(entry, (e) => ctrl.sourceFor(e), (isDirty, error) => ({
          type: "editClonePathDirtyChecked",
          isDirty,
          error,
        }))
      );
    },
    cancel() {
      return backToActions(ctrl);
    },
  });

const editClonePathConfirm: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToActions(ctrl);
  }
  if (!isConfirmKey(key)) {
    return undefined;
  }

  const entry = ctrl.selectedEntry();
  if (!entry) return backToActions(ctrl);

  const registry = ctrl.registry;
  const path = ctrl.scratch.path;
  // The new path is cloned on preparation; the old directory stays where it is
  return ctrl.issue(async () =>
    commitRegistry(ctrl, "editClonePath", updateEntry(registry, entry.id, { path }))
  );
};

const editClonePathError: KeyHandler = (ctrl) => backToActions(ctrl);

export function onEditClonePathDirtyChecked(
  ctrl: SettingsController,
  message: MessageOf<"editClonePathDirtyChecked">
): Command | undefined {
  return settleDirtyCheck(ctrl, message, () => {
    ctrl.transitionTo("EditClonePathConfirm");
    return undefined;
  });
}

export function onEditClonePathFailed(
  ctrl: SettingsController,
  message: MessageOf<"editClonePathFailed">
): undefined {
  return ctrl.fail(message.error);
}

export const EDIT_CLONE_PATH_KEYS = {
  UpdateGitHubPath: updateGitHubPath,
  EditClonePathConfirm: editClonePathConfirm,
  EditClonePathError: editClonePathError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
