import type { Registry, RepositoryEntry } from "../../../types/index.js";
import { toError, ValidationError, wrapError } from "../../errors.js";
import { validateCloneDirectory } from "../../paths.js";
import {
  addEntry,
  findEntryByPath,
  findEntryByRemoteUrl,
  generateRepositoryId,
} from "../../registry.js";
import { toUserPath } from "../../ui-utils.js";
import { validateBranchName, validateRemoteUrl } from "../../validation.js";
import type { KeyHandler, Scratch, SettingsController } from "../controller.js";
import type { Command, MessageOf, SettingsMessage } from "../messages.js";
import { commitRegistry } from "../reconcile.js";
import type { SettingsState } from "../states.js";
import { handleTextInput, passes, validateUniqueName } from "./input.js";

const DIFFERENT_REPOSITORY =
  "directory contains a different git repository. Choose an empty directory or the matching clone.";

const URL_PLACEHOLDER = "https://github.com/owner/repo";
const BRANCH_PLACEHOLDER = "main (optional)";

/**
 * Clone-target conflicts read better without the found/expected URLs
 */
function translatePreparationError(error: Error): Error {
  if (/different git repository/i.test(error.message)) {
    return new Error(DIFFERENT_REPOSITORY, { cause: error });
  }
  return error;
}

interface CreateSnapshot {
  registry: Registry;
  input: Scratch;
  createdAt: number;
}

function snapshot(ctrl: SettingsController): CreateSnapshot {
  return {
    registry: ctrl.registry,
    input: { ...ctrl.scratch },
    createdAt: Math.floor(ctrl.now().getTime() / 1000),
  };
}

function createEntry(ctrl: SettingsController, { registry, input, createdAt }: CreateSnapshot) {
  const entry: RepositoryEntry = {
    id: generateRepositoryId(input.name, createdAt),
    name: input.name,
    kind: "remote",
    createdAt,
    path: input.path,
    remoteUrl: input.remoteUrl,
    branch: input.branch || undefined,
  };

  return commitRegistry(ctrl, "addRemote", addEntry(registry, entry), {
    requirePrepared: entry.id,
    translate: translatePreparationError,
  });
}

/**
 * Create with the stored token, or ask for one when it is missing or rejected
 */
function createRemote(ctrl: SettingsController): Command {
  const snap = snapshot(ctrl);
  const { credentials } = ctrl.deps;

  return async (): Promise<SettingsMessage> => {
    let token: string;
    try {
      token = await credentials.get();
      await credentials.validateTokenAgainstUrl(token, snap.input.remoteUrl);
    } catch (error) {
      return { type: "tokenNeeded", reason: toError(error).message };
    }

    return createEntry(ctrl, snap);
  };
}

function createRemoteWithToken(ctrl: SettingsController): Command {
  const snap = snapshot(ctrl);
  const token = snap.input.token;
  const { credentials } = ctrl.deps;

  return async (): Promise<SettingsMessage> => {
    try {
      credentials.validateTokenFormat(token);
    } catch (error) {
      return { type: "addRemoteFailed", error: wrapError("invalid PAT format", error) };
    }

    try {
      await credentials.validateTokenAgainstUrl(token, snap.input.remoteUrl);
    } catch (error) {
      return { type: "addRemoteFailed", error: toError(error) };
    }

    try {
      await credentials.store(token);
    } catch (error) {
      return { type: "addRemoteFailed", error: wrapError("failed to store GitHub token", error) };
    }

    return createEntry(ctrl, snap);
  };
}

function pathPlaceholder(ctrl: SettingsController): string {
  return toUserPath(ctrl.deps.paths.deriveClonePath(ctrl.scratch.remoteUrl));
}

function showPathInput(ctrl: SettingsController): void {
  ctrl.scratch.token = "";
  ctrl.prepareInput({
    value: ctrl.scratch.path ? toUserPath(ctrl.scratch.path) : "",
    placeholder: pathPlaceholder(ctrl),
  });
  ctrl.transitionTo("AddRemotePath");
}

const addRemoteName: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(name) {
      if (!passes(ctrl, () => validateUniqueName(ctrl, name))) return undefined;

      ctrl.scratch.name = name;
      ctrl.hasChanges = true;
      ctrl.prepareInput({ value: ctrl.scratch.remoteUrl, placeholder: URL_PLACEHOLDER });
      ctrl.transitionTo("AddRemoteURL");
      return undefined;
    },
    cancel() {
      ctrl.resetScratch();
      ctrl.transitionTo("AddRepositoryType");
      return undefined;
    },
  });

const addRemoteUrl: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(url) {
      const valid = passes(ctrl, () => {
        validateRemoteUrl(url);
        if (findEntryByRemoteUrl(ctrl.registry, url)) {
          throw new ValidationError("GitHub URL already used by another repository");
        }
      });
      if (!valid) return undefined;

      ctrl.scratch.remoteUrl = url;
      ctrl.prepareInput({ value: ctrl.scratch.branch, placeholder: BRANCH_PLACEHOLDER });
      ctrl.transitionTo("AddRemoteBranch");
      return undefined;
    },
    cancel() {
      ctrl.prepareInput({ value: ctrl.scratch.name });
      ctrl.transitionTo("AddRemoteName");
      return undefined;
    },
  });

const addRemoteBranch: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(branch) {
      if (!passes(ctrl, () => validateBranchName(branch))) return undefined;

      ctrl.scratch.branch = branch;
      showPathInput(ctrl);
      return undefined;
    },
    cancel() {
      ctrl.prepareInput({ value: ctrl.scratch.remoteUrl, placeholder: URL_PLACEHOLDER });
      ctrl.transitionTo("AddRemoteURL");
      return undefined;
    },
  });

const addRemotePath: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(raw) {
      const { paths } = ctrl.deps;
      const target = raw || paths.deriveClonePath(ctrl.scratch.remoteUrl);

      let path = "";
      const valid = passes(ctrl, () => {
        paths.validateStoragePath(target);
        path = paths.expand(target);
        if (findEntryByPath(ctrl.registry, path)) {
          throw new ValidationError("path already used by another repository");
        }
        validateCloneDirectory(paths.getDirectoryStatus(path), path);
      });
      if (!valid) return undefined;

      ctrl.scratch.path = path;
      return ctrl.issue(createRemote(ctrl));
    },
    cancel() {
      ctrl.prepareInput({ value: ctrl.scratch.branch, placeholder: BRANCH_PLACEHOLDER });
      ctrl.transitionTo("AddRemoteBranch");
      return undefined;
    },
  });

const addRemoteToken: KeyHandler = (ctrl, key) =>
  handleTextInput(ctrl, key, {
    submit(token) {
      if (!token) {
        return ctrl.setInlineError(new ValidationError("PAT cannot be empty"));
      }

      ctrl.scratch.token = token;
      return ctrl.issue(createRemoteWithToken(ctrl));
    },
    cancel() {
      ctrl.tokenReason = undefined;
      showPathInput(ctrl);
      return undefined;
    },
  });

const addRemoteError: KeyHandler = (ctrl) => {
  showPathInput(ctrl);
  return undefined;
};

/**
 * No usable token: ask for one, keeping everything typed so far
 */
export function onTokenNeeded(
  ctrl: SettingsController,
  message: MessageOf<"tokenNeeded">
): undefined {
  ctrl.log.info("GitHub token required", { reason: message.reason });
  ctrl.tokenReason = message.reason;
  ctrl.prepareInput({ echoMode: "password", placeholder: "ghp_…" });
  ctrl.transitionTo("AddRemoteToken");
  return undefined;
}

export function onAddRemoteFailed(
  ctrl: SettingsController,
  message: MessageOf<"addRemoteFailed">
): undefined {
  ctrl.scratch.token = "";
  return ctrl.fail(message.error);
}

export const ADD_REMOTE_KEYS = {
  AddRemoteName: addRemoteName,
  AddRemoteURL: addRemoteUrl,
  AddRemoteBranch: addRemoteBranch,
  AddRemotePath: addRemotePath,
  AddRemoteToken: addRemoteToken,
  AddRemoteError: addRemoteError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
