import type { RepositoryEntry } from "../../../types/index.js";
import { ValidationError } from "../../errors.js";
import { findEntryByName } from "../../registry.js";
import { validateRepositoryName } from "../../validation.js";
import type { SettingsController } from "../controller.js";
import { isChar, isKey, type KeyPress } from "../keys.js";
import type { Command } from "../messages.js";

interface InputHandlers {
  submit(value: string): Command | undefined;
  cancel(): Command | undefined;
}

/**
 * enter submits the trimmed value, esc cancels, anything else edits
 */
export function handleTextInput(
  ctrl: SettingsController,
  key: KeyPress,
  handlers: InputHandlers
): Command | undefined {
  if (isKey(key, "enter")) {
    return handlers.submit(ctrl.textInput.value.trim());
  }
  if (isKey(key, "esc")) {
    return handlers.cancel();
  }
  if (ctrl.textInput.update(key)) {
    ctrl.layout.clearError();
  }
  return undefined;
}

/**
 * Run a check, showing its error inline. Returns whether it passed.
 */
export function passes(ctrl: SettingsController, check: () => void): boolean {
  try {
    check();
    return true;
  } catch (error) {
    ctrl.setInlineError(error);
    return false;
  }
}

export function isConfirmKey(key: KeyPress): boolean {
  return isKey(key, "enter") || isChar(key, "y", "Y");
}

export function isDeclineKey(key: KeyPress): boolean {
  return isKey(key, "esc") || isChar(key, "n", "N");
}

/**
 * Name rules plus uniqueness. The entry being renamed may keep its own name.
 */
export function validateUniqueName(
  ctrl: SettingsController,
  name: string,
  editing?: RepositoryEntry
): void {
  validateRepositoryName(name);

  const clash = findEntryByName(ctrl.registry, name);
  if (clash && clash.id !== editing?.id) {
    throw new ValidationError("repository name already exists");
  }
}
