import type { RepositoryEntry } from "../../../types/index.js";
import { toError } from "../../errors.js";
import { findEntry, updateEntry } from "../../registry.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import { checkDirty, settleDirtyCheck } from "../dirty-check.js";
import { isKey } from "../keys.js";
import type { Command, MessageOf, SettingsMessage } from "../messages.js";
import type { SettingsState } from "../states.js";
import { isConfirmKey, isDeclineKey } from "./input.js";

function backToActions(ctrl: SettingsController): undefined {
  ctrl.lastRefreshError = undefined;
  ctrl.resetScratch();
  ctrl.transitionTo("RepositoryActions");
  return undefined;
}

/**
 * Fetch, then record the sync time. The save is best effort.
 */
function runRefresh(ctrl: SettingsController, entry: RepositoryEntry): Command {
  const registry = ctrl.registry;
  const syncedAt = ctrl.now().toISOString();

  return async (): Promise<SettingsMessage> => {
    const token = await ctrl.tokenOrUndefined();

    try {
      await ctrl.sourceFor(entry, token).fetchUpdates();
    } catch (error) {
      return { type: "refreshCompleted", success: false, error: toError(error) };
    }

    const next = updateEntry(registry, entry.id, { lastSyncedAt: syncedAt });
    try {
      await ctrl.deps.saveRegistry(next);
    } catch (error) {
      ctrl.log.warn("Could not record sync time", {
        id: entry.id,
        error: toError(error).message,
      });
    }

    return { type: "refreshCompleted", success: true, registry: next };
  };
}

const manualRefresh: KeyHandler = (ctrl, key) => {
  if (isDeclineKey(key)) {
    return backToActions(ctrl);
  }
  if (!isConfirmKey(key)) {
    return undefined;
  }

  const entry = ctrl.selectedEntry();
  if (!entry) return backToActions(ctrl);

  return ctrl.issue(
    checkDirty(entry, (e) => ctrl.sourceFor(e), (isDirty, error) => ({
      type: "refreshDirtyChecked",
      isDirty,
      error,
    }))
  );
};

const refreshInProgress: KeyHandler = (ctrl, key) => {
  if (isKey(key, "esc")) {
    ctrl.log.info("Refresh cannot be cancelled once started", {
      id: ctrl.selectedRepositoryId,
    });
  }
  return undefined;
};

const refreshError: KeyHandler = (ctrl) => backToActions(ctrl);

export function onRefreshDirtyChecked(
  ctrl: SettingsController,
  message: MessageOf<"refreshDirtyChecked">
): Command | undefined {
  const command = settleDirtyCheck(ctrl, message, (entry) => {
    ctrl.refreshInProgress = true;
    ctrl.transitionTo("RefreshInProgress");
    return ctrl.issue(runRefresh(ctrl, entry));
  });

  if (ctrl.state === "RefreshError") {
    ctrl.lastRefreshError = ctrl.layout.getError();
  }
  return command;
}

export function onRefreshCompleted(
  ctrl: SettingsController,
  message: MessageOf<"refreshCompleted">
): undefined {
  ctrl.refreshInProgress = false;

  if (!message.success) {
    const error = message.error ?? new Error("refresh failed");
    ctrl.fail(error);
    ctrl.lastRefreshError = error;
    return undefined;
  }

  if (message.registry) {
    const registry = message.registry;
    ctrl.registry = registry;
    ctrl.prepared = ctrl.prepared.map((repo) => ({
      ...repo,
      entry: findEntry(registry, repo.entry.id) ?? repo.entry,
    }));
  }

  ctrl.lastRefreshError = undefined;
  ctrl.selectedRepositoryId = undefined;
  ctrl.resetScratch();
  ctrl.rebuildMenuItems();
  ctrl.log.info("Repository refreshed");
  ctrl.transitionTo("MainMenu");
  return undefined;
}

export const REFRESH_KEYS = {
  ManualRefresh: manualRefresh,
  RefreshInProgress: refreshInProgress,
  RefreshError: refreshError,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
