import type { RepositoryEntry } from "../../types/index.js";
import { toError, wrapError } from "../errors.js";
import type { GitSource } from "../git.js";
import { toUserPath } from "../ui-utils.js";
import type { SettingsController } from "./controller.js";
import type { Command, DirtyCheckResult, SettingsMessage } from "./messages.js";

/**
 * Builds the caller's flow-scoped reply from a dirty-check result
 */
export type DirtyCheckReply = (isDirty: boolean, error?: Error) => SettingsMessage;

/**
 * Ask whether an entry's working tree has uncommitted changes.
 * Local entries have no working tree to protect and are always clean.
 */
export function checkDirty(
  entry: RepositoryEntry,
  sourceFor: (entry: RepositoryEntry) => GitSource,
  done: DirtyCheckReply
): Command {
  return async () => {
    if (entry.kind === "local") {
      return done(false);
    }

    try {
      return done(await sourceFor(entry).isWorkingTreeDirty());
    } catch (error) {
      return done(false, toError(error));
    }
  };
}

export function dirtyStateWarning(path: string): string {
  const userPath = toUserPath(path);
  return [
    "⚠️  Uncommitted Changes Detected",
    "",
    `The repository at ${userPath} has uncommitted changes.`,
    "Resolve them before continuing:",
    "",
    `  1. Commit and push:  cd ${userPath} && git add . && git commit && git push`,
    `  2. Discard them:     cd ${userPath} && git reset --hard`,
  ].join("\n");
}

/**
 * Route a dirty-check reply: a failed check or a dirty tree ends the flow on
 * its error screen, a clean tree continues with onClean.
 */
export function settleDirtyCheck(
  ctrl: SettingsController,
  result: DirtyCheckResult,
  onClean: (entry: RepositoryEntry) => Command | undefined
): Command | undefined {
  const entry = ctrl.selectedEntry();
  if (!entry) {
    return ctrl.fail(new Error(`repository not found: ${ctrl.selectedRepositoryId ?? ""}`));
  }

  if (result.error) {
    return ctrl.fail(wrapError("failed to check repository status", result.error));
  }
  if (result.isDirty) {
    ctrl.isDirty = true;
    return ctrl.fail(new Error(dirtyStateWarning(entry.path)));
  }

  return onClean(entry);
}
