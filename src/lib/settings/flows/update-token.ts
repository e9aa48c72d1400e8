import type { RepositoryEntry } from "../../../types/index.js";
import { toError, ValidationError, wrapError } from "../../errors.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import type { Command, MessageOf, SettingsMessage } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { handleTextInput, isConfirmKey, isDeclineKey } from "./input.js";

function backToMainMenu(ctrl: SettingsController): undefined {
  ctrl.resetScratch();
  ctrl.transitionTo("MainMenu");
  return undefined;
}

/**
 * Format check, then a live check against every remote entry
 */
async function validateToken(
  ctrl: SettingsController,
  token: string,
  entries: readonly RepositoryEntry[]
): Promise<SettingsMessage | undefined> {
  const { credentials } = ctrl.deps;

  try {
    credentials.validateTokenFormat(token);
  } catch (error) {
    return { type: "updateTokenFailed", error: wrapError("invalid PAT format", error) };
  }

  try {
    await credentials.validateTokenAgainstEntries(token, entries);
  } catch (error) {
    return { type: "updateTokenFailed", error: toError(error) };
  }

  return undefined;
}

function checkToken(ctrl: SettingsController): Command {
  const token = ctrl.scratch.token;
  const entries = ctrl.registry.repositories;
  return async () =>
    (await validateToken(ctrl, token, entries)) ?? { type: "updateTokenValidated" };
}

function saveToken(ctrl: SettingsController): Command {
  const token = ctrl.scratch.token;
  const registry = ctrl.registry;

  return async () => {
    const failure = await validateToken(ctrl, token, registry.repositories);
    if (failure) return failure;

    try {
      await ctrl.deps.credentials.store(token);
    } catch (error) {
      return { type: "updateTokenFailed", error: wrapError("failed to store GitHub token", error) };
    }

    // Clones that were waiting on a token can be prepared now
    return commitRegistry(ctrl, "updateToken", registry, { persist: false });
  };
}

const updateGitHubPAT: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(token) {
      if (!token) {
        return ctrl.setInlineError(new ValidationError("PAT cannot be empty"));
      }

      ctrl.scratch.token = token;
      ctrl.hasChanges = true;
      return ctrl.issue(checkToken(ctrl));
    },
    cancel() {
      return backToMainMenu(ctrl);
    },
  });

const updatePATConfirm: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToMainMenu(ctrl);
  }
  if (!isConfirmKey(key)) {
    return undefined;
  }
  return ctrl.issue(saveToken(ctrl));
};

const updatePATError: KeyHandler = (ctrl) => backToMainMenu(ctrl);

export function onUpdateTokenValidated(ctrl: SettingsController): undefined {
  ctrl.transitionTo("UpdatePATConfirm");
  return undefined;
}

export function onUpdateTokenFailed(
  ctrl: SettingsController,
  message: MessageOf<"updateTokenFailed">
): undefined {
  ctrl.scratch.token = "";
  return ctrl.fail(message.error);
}

export const UPDATE_TOKEN_KEYS = {
  UpdateGitHubPAT: updateGitHubPAT,
  UpdatePATConfirm: updatePATConfirm,
  UpdatePATError: updatePATError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
