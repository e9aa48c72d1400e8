import type { Registry } from "../../../types/index.js";
import { toError, ValidationError } from "../../errors.js";
import { removeEntry } from "../../registry.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import { checkDirty, settleDirtyCheck } from "../dirty-check.js";
import { isChar } from "../keys.js";
import type { Command, MessageOf } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { isDeclineKey } from "./input.js";

function backToActions(ctrl: SettingsController): undefined {
  ctrl.resetScratch();
  ctrl.transitionTo("RepositoryActions");
  return undefined;
}

const confirmDelete: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToActions(ctrl);
  }
  // Deleting takes an explicit y; enter does nothing here
  if (!isChar(key, "y", "Y")) {
    return undefined;
  }

  if (ctrl.registry.repositories.length <= 1) {
    return ctrl.fail(
      new ValidationError(
        "cannot delete the last repository.\n\nYou must have at least one repository configured."
      )
    );
  }

  const entry = ctrl.selectedEntry();
  if (!entry) {
    return ctrl.fail(new ValidationError(`repository not found: ${ctrl.selectedRepositoryId ?? ""}`));
  }

  return ctrl.issue(
    checkDirty(entry, (e) => ctrl.sourceFor(e), (isDirty, error) => ({
      type: "deleteDirtyChecked",
      isDirty,
      error,
    }))
  );
};

const deleteError: KeyHandler = (ctrl) => backToActions(ctrl);

export function onDeleteDirtyChecked(
  ctrl: SettingsController,
  message: MessageOf<"deleteDirtyChecked">
): Command | undefined {
  return settleDirtyCheck(ctrl, message, (entry) => {
    let registry: Registry;
    try {
      registry = removeEntry(ctrl.registry, entry.id);
    } catch (error) {
      return ctrl.fail(toError(error));
    }

    ctrl.log.info("Removing repository; files on disk are kept", { id: entry.id, path: entry.path });
    return ctrl.issue(async () => commitRegistry(ctrl, "delete", registry));
  });
}

export function onDeleteFailed(
  ctrl: SettingsController,
  message: MessageOf<"deleteFailed">
): undefined {
  return ctrl.fail(message.error);
}

export const DELETE_KEYS = {
  ConfirmDelete: confirmDelete,
  DeleteError: deleteError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
