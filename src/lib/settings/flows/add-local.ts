import type { RepositoryEntry } from "../../../types/index.js";
import { ValidationError } from "../../errors.js";
import { addEntry, findEntryByPath, generateRepositoryId } from "../../registry.js";
import { toUserPath } from "../../ui-utils.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import type { Command, MessageOf } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { handleTextInput, passes, validateUniqueName } from "./input.js";

function createLocal(ctrl: SettingsController): Command {
  const registry = ctrl.registry;
  const createdAt = Math.floor(ctrl.now().getTime() / 1000);
  const entry: RepositoryEntry = {
    id: generateRepositoryId(ctrl.scratch.name, createdAt),
    name: ctrl.scratch.name,
    kind: "local",
    createdAt,
    path: ctrl.scratch.path,
  };

  return async () => commitRegistry(ctrl, "addLocal", addEntry(registry, entry));
}

const addLocalName: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(name) {
      if (!passes(ctrl, () => validateUniqueName(ctrl, name))) return undefined;

      ctrl.scratch.name = name;
      ctrl.hasChanges = true;
      ctrl.prepareInput({ placeholder: "~/path/to/rules" });
      ctrl.transitionTo("AddLocalPath");
      return undefined;
    },
    cancel() {
      ctrl.resetScratch();
      ctrl.transitionTo("AddRepositoryType");
      return undefined;
    },
  });

const addLocalPath: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(raw) {
      let path = "";
      const valid = passes(ctrl, () => {
        ctrl.deps.paths.validateStoragePath(raw);
        path = ctrl.deps.paths.expand(raw);
        if (findEntryByPath(ctrl.registry, path)) {
          throw new ValidationError("path already used by another repository");
        }
      });
      if (!valid) return undefined;

      ctrl.scratch.path = path;
      return ctrl.issue(createLocal(ctrl));
    },
    cancel() {
      ctrl.prepareInput({ value: ctrl.scratch.name });
      ctrl.transitionTo("AddLocalName");
      return undefined;
    },
  });

const addLocalError: KeyHandler = (ctrl) => {
  ctrl.prepareInput({ value: toUserPath(ctrl.scratch.path), placeholder: "~/path/to/rules" });
  ctrl.transitionTo("AddLocalPath");
  return undefined;
};

export function onAddLocalFailed(
  ctrl: SettingsController,
  message: MessageOf<"addLocalFailed">
): undefined {
  return ctrl.fail(message.error);
}

export const ADD_LOCAL_KEYS = {
  AddLocalName: addLocalName,
  AddLocalPath: addLocalPath,
  AddLocalError: addLocalError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
