/**
 * Settings screens, grouped by the flow that owns them.
 *
 * Only MainMenu and Complete are shared. Every other state belongs to exactly
 * one flow, so a state's key handler never has to ask which edit is active.
 */
export const SETTINGS_STATES = [
  "MainMenu",
  "RepositoryActions",
  "AddRepositoryType",

  "AddLocalName",
  "AddLocalPath",
  "AddLocalError",

  "AddRemoteName",
  "AddRemoteURL",
  "AddRemoteBranch",
  "AddRemotePath",
  "AddRemoteToken",
  "AddRemoteError",

  "UpdateRepoName",
  "EditNameConfirm",
  "EditNameError",

  "UpdateGitHubBranch",
  "EditBranchConfirm",
  "EditBranchError",

  "UpdateGitHubPath",
  "EditClonePathConfirm",
  "EditClonePathError",

  "ManualRefresh",
  "RefreshInProgress",
  "RefreshError",

  "ConfirmDelete",
  "DeleteError",

  "UpdateGitHubPAT",
  "UpdatePATConfirm",
  "UpdatePATError",

  "Complete",
] as const;

export type SettingsState = (typeof SETTINGS_STATES)[number];

export type Flow =
  | "shared"
  | "repositoryActions"
  | "addType"
  | "addLocal"
  | "addRemote"
  | "rename"
  | "editBranch"
  | "editClonePath"
  | "refresh"
  | "delete"
  | "updateToken";

export const STATE_FLOW: Record<SettingsState, Flow> = {
  MainMenu: "shared",
  Complete: "shared",

  RepositoryActions: "repositoryActions",
  AddRepositoryType: "addType",

  AddLocalName: "addLocal",
  AddLocalPath: "addLocal",
  AddLocalError: "addLocal",

  AddRemoteName: "addRemote",
  AddRemoteURL: "addRemote",
  AddRemoteBranch: "addRemote",
  AddRemotePath: "addRemote",
  AddRemoteToken: "addRemote",
  AddRemoteError: "addRemote",

  UpdateRepoName: "rename",
  EditNameConfirm: "rename",
  EditNameError: "rename",

  UpdateGitHubBranch: "editBranch",
  EditBranchConfirm: "editBranch",
  EditBranchError: "editBranch",

  UpdateGitHubPath: "editClonePath",
  EditClonePathConfirm: "editClonePath",
  EditClonePathError: "editClonePath",

  ManualRefresh: "refresh",
  RefreshInProgress: "refresh",
  RefreshError: "refresh",

  ConfirmDelete: "delete",
  DeleteError: "delete",

  UpdateGitHubPAT: "updateToken",
  UpdatePATConfirm: "updateToken",
  UpdatePATError: "updateToken",
};

/**
 * Where each flow starts, where it returns to, and its terminal error screen
 */
interface FlowShape {
  entry: SettingsState;
  origin: SettingsState;
  error?: SettingsState;
}

export const FLOWS: Record<Exclude<Flow, "shared">, FlowShape> = {
  repositoryActions: { entry: "RepositoryActions", origin: "MainMenu" },
  addType: { entry: "AddRepositoryType", origin: "MainMenu" },
  addLocal: { entry: "AddLocalName", origin: "AddRepositoryType", error: "AddLocalError" },
  addRemote: { entry: "AddRemoteName", origin: "AddRepositoryType", error: "AddRemoteError" },
  rename: { entry: "UpdateRepoName", origin: "RepositoryActions", error: "EditNameError" },
  editBranch: { entry: "UpdateGitHubBranch", origin: "RepositoryActions", error: "EditBranchError" },
  editClonePath: {
    entry: "UpdateGitHubPath",
    origin: "RepositoryActions",
    error: "EditClonePathError",
  },
  refresh: { entry: "ManualRefresh", origin: "RepositoryActions", error: "RefreshError" },
  delete: { entry: "ConfirmDelete", origin: "RepositoryActions", error: "DeleteError" },
  updateToken: { entry: "UpdateGitHubPAT", origin: "MainMenu", error: "UpdatePATError" },
};

export function flowOf(state: SettingsState): Flow {
  return STATE_FLOW[state];
}

export function isErrorState(state: SettingsState): boolean {
  return Object.values(FLOWS).some((shape) => shape.error === state);
}

/**
 * Whether moving from one screen to another stays inside the flow discipline:
 * same flow, a shared screen, the flow's origin, or (from a menu) the entry of
 * a flow that menu launches.
 */
export function canTransition(from: SettingsState, to: SettingsState): boolean {
  const fromFlow = flowOf(from);
  const toFlow = flowOf(to);

  if (fromFlow === "shared" || toFlow === "shared" || fromFlow === toFlow) {
    return true;
  }

  if (FLOWS[fromFlow].origin === to) {
    return true;
  }

  // Menus launch the flows whose origin they are
  return FLOWS[toFlow].entry === to && FLOWS[toFlow].origin === from;
}
