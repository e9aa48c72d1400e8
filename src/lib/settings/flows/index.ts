import type { KeyHandler } from "../controller.js";
import type { SettingsState } from "../states.js";
import { ADD_LOCAL_KEYS } from "./add-local.js";
import { ADD_REMOTE_KEYS } from "./add-remote.js";
import { ADD_TYPE_KEYS } from "./add-type.js";
import { COMPLETE_KEYS } from "./complete.js";
import { DELETE_KEYS } from "./delete.js";
import { EDIT_BRANCH_KEYS } from "./edit-branch.js";
import { EDIT_CLONE_PATH_KEYS } from "./edit-clone-path.js";
import { MAIN_MENU_KEYS } from "./main-menu.js";
import { REFRESH_KEYS } from "./refresh.js";
import { RENAME_KEYS } from "./rename.js";
import { REPOSITORY_ACTION_KEYS } from "./repository-actions.js";
import { UPDATE_TOKEN_KEYS } from "./update-token.js";

/**
 * One key handler per state. Each flow contributes the states it owns.
 */
export const KEY_HANDLERS: Record<SettingsState, KeyHandler> = {
  ...MAIN_MENU_KEYS,
  ...COMPLETE_KEYS,
  ...REPOSITORY_ACTION_KEYS,
  ...ADD_TYPE_KEYS,
  ...ADD_LOCAL_KEYS,
  ...ADD_REMOTE_KEYS,
  ...RENAME_KEYS,
  ...EDIT_BRANCH_KEYS,
  ...EDIT_CLONE_PATH_KEYS,
  ...REFRESH_KEYS,
  ...DELETE_KEYS,
  ...UPDATE_TOKEN_KEYS,
};
