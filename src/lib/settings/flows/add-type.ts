import { DEFAULTS } from "../../config.js";
import type { KeyHandler } from "../controller.js";
import { isKey } from "../keys.js";
import type { SettingsState } from "../states.js";

const addRepositoryType: KeyHandler = (ctrl, key) => {
  if (isKey(key, "esc")) {
    ctrl.transitionTo("MainMenu");
    return undefined;
  }
  if (isKey(key, "up", "k")) {
    ctrl.typeMenu.up();
    return undefined;
  }
  if (isKey(key, "down", "j")) {
    ctrl.typeMenu.down();
    return undefined;
  }
  if (!isKey(key, "enter", "space")) {
    return undefined;
  }

  const kind = ctrl.typeMenu.selected()?.value ?? "local";
  ctrl.resetScratch();
  ctrl.changeKind = kind === "local" ? "addLocal" : "addRemote";
  ctrl.prepareInput({ placeholder: "my-rules", charLimit: DEFAULTS.maxNameLength });
  ctrl.transitionTo(kind === "local" ? "AddLocalName" : "AddRemoteName");
  return undefined;
};

export const ADD_TYPE_KEYS = {
  AddRepositoryType: addRepositoryType,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
