import type { PreparationResult, Registry } from "../../types/index.js";
import { wrapError } from "../errors.js";
import type { SettingsController } from "./controller.js";
import { mutationFailure, type MutatingFlow, type SettingsMessage } from "./messages.js";

export interface CommitOptions {
  // Skip the save when nothing on disk changes (token updates)
  persist?: boolean;
  // Fail the flow, before anything is saved, when this entry cannot be prepared
  requirePrepared?: string;
  // Rewrite a preparation error for display
  translate?: (error: Error) => Error;
}

/**
 * Persist the next registry, re-prepare every entry, and report the result.
 * The controller adopts the registry only when this yields mutationCommitted.
 */
export async function commitRegistry(
  ctrl: SettingsController,
  flow: MutatingFlow,
  next: Registry,
  options: CommitOptions = {}
): Promise<SettingsMessage> {
  let prepared: PreparationResult | undefined;

  // An entry that cannot be prepared is never saved
  if (options.requirePrepared) {
    prepared = await ctrl.deps.prepare(next.repositories);
    const failure = prepared.failures.find((f) => f.id === options.requirePrepared);
    if (failure) {
      const error = options.translate ? options.translate(failure.error) : failure.error;
      return mutationFailure(flow, error);
    }
  }

  if (options.persist !== false) {
    try {
      await ctrl.deps.saveRegistry(next);
    } catch (error) {
      return mutationFailure(flow, wrapError("failed to save configuration", error));
    }
  }

  prepared ??= await ctrl.deps.prepare(next.repositories);
  return { type: "mutationCommitted", flow, registry: next, prepared };
}
