import type { PreparationResult, PreparedRepository, Registry } from "../../types/index.js";
import type { KeyPress } from "./keys.js";
import type { Flow } from "./states.js";

/**
 * Flows that end by persisting and re-preparing the registry
 */
export type MutatingFlow =
  | "addLocal"
  | "addRemote"
  | "rename"
  | "editBranch"
  | "editClonePath"
  | "delete"
  | "updateToken";

export interface DirtyCheckResult {
  isDirty: boolean;
  error?: Error;
}

export type SettingsMessage =
  // Universal
  | { type: "registryLoaded"; registry: Registry; prepared: PreparedRepository[] }
  | { type: "mutationCommitted"; flow: MutatingFlow; registry: Registry; prepared: PreparationResult }

  // Dirty checks, one kind per flow
  | ({ type: "editBranchDirtyChecked" } & DirtyCheckResult)
  | ({ type: "editClonePathDirtyChecked" } & DirtyCheckResult)
  | ({ type: "refreshDirtyChecked" } & DirtyCheckResult)
  | ({ type: "deleteDirtyChecked" } & DirtyCheckResult)

  // Refresh
  | { type: "refreshCompleted"; success: boolean; error?: Error; registry?: Registry }

  // Token
  | { type: "tokenNeeded"; reason: string }
  | { type: "updateTokenValidated" }

  // Flow failures
  | { type: "addLocalFailed"; error: Error }
  | { type: "addRemoteFailed"; error: Error }
  | { type: "editNameFailed"; error: Error }
  | { type: "editBranchFailed"; error: Error }
  | { type: "editClonePathFailed"; error: Error }
  | { type: "deleteFailed"; error: Error }
  | { type: "updateTokenFailed"; error: Error };

export type SettingsMessageType = SettingsMessage["type"];

/**
 * The flow a message belongs to. Universal messages have none.
 */
export const MESSAGE_FLOW: Record<SettingsMessageType, Flow | undefined> = {
  registryLoaded: undefined,
  mutationCommitted: undefined,
  editBranchDirtyChecked: "editBranch",
  editClonePathDirtyChecked: "editClonePath",
  refreshDirtyChecked: "refresh",
  deleteDirtyChecked: "delete",
  refreshCompleted: "refresh",
  tokenNeeded: "addRemote",
  updateTokenValidated: "updateToken",
  addLocalFailed: "addLocal",
  addRemoteFailed: "addRemote",
  editNameFailed: "rename",
  editBranchFailed: "editBranch",
  editClonePathFailed: "editClonePath",
  deleteFailed: "delete",
  updateTokenFailed: "updateToken",
};

export function messageFlow(message: SettingsMessage): Flow | undefined {
  if (message.type === "mutationCommitted") {
    return message.flow;
  }
  return MESSAGE_FLOW[message.type];
}

export type MessageOf<T extends SettingsMessageType> = Extract<SettingsMessage, { type: T }>;

/**
 * The failure message for a flow that persists the registry
 */
export function mutationFailure(flow: MutatingFlow, error: Error): SettingsMessage {
  switch (flow) {
    case "addLocal":
      return { type: "addLocalFailed", error };
    case "addRemote":
      return { type: "addRemoteFailed", error };
    case "rename":
      return { type: "editNameFailed", error };
    case "editBranch":
      return { type: "editBranchFailed", error };
    case "editClonePath":
      return { type: "editClonePathFailed", error };
    case "delete":
      return { type: "deleteFailed", error };
    case "updateToken":
      return { type: "updateTokenFailed", error };
  }
}

/**
 * Build the failure message a flow's error screen consumes.
 * Menus have no error screen.
 */
export function failureMessage(flow: Flow, error: Error): SettingsMessage | undefined {
  switch (flow) {
    case "refresh":
      return { type: "refreshCompleted", success: false, error };
    case "shared":
    case "repositoryActions":
    case "addType":
      return undefined;
    default:
      return mutationFailure(flow, error);
  }
}

/**
 * A deferred effect. The host runs it and feeds the result back as a message.
 */
export type Command = () => Promise<SettingsMessage>;

export type SettingsEvent =
  | { type: "key"; key: KeyPress }
  | { type: "resize"; columns: number; rows: number }
  | SettingsMessage;
