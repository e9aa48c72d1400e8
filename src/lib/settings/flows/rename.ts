import { toError, ValidationError } from "../../errors.js";
import { updateEntry } from "../../registry.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import type { MessageOf } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import {
  handleTextInput,
  isConfirmKey,
  isDeclineKey,
  passes,
  validateUniqueName,
} from "./input.js";

function backToActions(ctrl: SettingsController): undefined {
  ctrl.resetScratch();
  ctrl.transitionTo("RepositoryActions");
  return undefined;
}

const updateRepoName: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(name) {
      const entry = ctrl.selectedEntry();
      if (!entry) return backToActions(ctrl);
      if (!passes(ctrl, () => validateUniqueName(ctrl, name, entry))) return undefined;

      ctrl.scratch.name = name;
      ctrl.hasChanges = name !== entry.name;
      ctrl.transitionTo("EditNameConfirm");
      return undefined;
    },
    cancel() {
      return backToActions(ctrl);
    },
  });

const editNameConfirm: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToActions(ctrl);
  }
  if (!isConfirmKey(key)) {
    return undefined;
  }

  const entry = ctrl.selectedEntry();
  const name = ctrl.scratch.name;
  try {
    if (!entry) {
      throw new ValidationError(`repository not found: ${ctrl.selectedRepositoryId ?? ""}`);
    }
    validateUniqueName(ctrl, name, entry);
    const next = updateEntry(ctrl.registry, entry.id, { name });
    return ctrl.issue(async () => commitRegistry(ctrl, "rename", next));
  } catch (error) {
    return ctrl.fail(toError(error));
  }
};

const editNameError: KeyHandler = (ctrl) => backToActions(ctrl);

export function onEditNameFailed(
  ctrl: SettingsController,
  message: MessageOf<"editNameFailed">
): undefined {
  return ctrl.fail(message.error);
}

export const RENAME_KEYS = {
  UpdateRepoName: updateRepoName,
  EditNameConfirm: editNameConfirm,
  EditNameError: editNameError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
