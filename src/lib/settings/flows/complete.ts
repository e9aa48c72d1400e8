import { toError } from "../../errors.js";
import type { KeyHandler, SettingsController } from "../controller.js";
import type { Command, SettingsMessage } from "../messages.js";
import type { SettingsState } from "../states.js";

/**
 * Re-read the registry from disk. On failure the in-memory copy is kept.
 */
export function reloadRegistry(ctrl: SettingsController): Command {
  const fallback: SettingsMessage = {
    type: "registryLoaded",
    registry: ctrl.registry,
    prepared: ctrl.prepared,
  };

  return async () => {
    try {
      const registry = await ctrl.deps.loadRegistry();
      const result = await ctrl.deps.prepare(registry.repositories);
      return { type: "registryLoaded", registry, prepared: result.repositories };
    } catch (error) {
      ctrl.log.error("Could not reload settings", { error: toError(error).message });
      return fallback;
    }
  };
}

const complete: KeyHandler = (ctrl) => ctrl.issue(reloadRegistry(ctrl));

export const COMPLETE_KEYS = {
  Complete: complete,
} satisfies Partial<Record<SettingsState, KeyHandler>>;
