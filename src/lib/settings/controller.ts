import type {
  PreparedRepository,
  Registry,
  RepositoryEntry,
  RepositoryKind,
} from "../../types/index.js";
import type { CredentialManager } from "../credentials.js";
import { requestQuit, toError } from "../errors.js";
import type { GitSource, GitSourceFactory } from "../git.js";
import { createLogger, type Logger } from "../logger.js";
import type { PathUtilities } from "../paths.js";
import type { Preparer } from "../preparation.js";
import { findEntry } from "../registry.js";
import { Layout } from "./components/layout.js";
import { SelectList } from "./components/select-list.js";
import { TextInput, type TextInputOptions } from "./components/text-input.js";
import { KEY_HANDLERS } from "./flows/index.js";
import { buildMainMenuItems, type MenuItemValue } from "./flows/main-menu.js";
import { buildRepositoryActions, type RepositoryAction } from "./flows/repository-actions.js";
import { onAddRemoteFailed, onTokenNeeded } from "./flows/add-remote.js";
import { onAddLocalFailed } from "./flows/add-local.js";
import { onEditNameFailed } from "./flows/rename.js";
import { onEditBranchDirtyChecked, onEditBranchFailed } from "./flows/edit-branch.js";
import { onEditClonePathDirtyChecked, onEditClonePathFailed } from "./flows/edit-clone-path.js";
import { onRefreshCompleted, onRefreshDirtyChecked } from "./flows/refresh.js";
import { onDeleteDirtyChecked, onDeleteFailed } from "./flows/delete.js";
import { onUpdateTokenFailed, onUpdateTokenValidated } from "./flows/update-token.js";
import { isQuitKey, type KeyPress } from "./keys.js";
import {
  failureMessage,
  messageFlow,
  type Command,
  type MessageOf,
  type SettingsEvent,
  type SettingsMessage,
} from "./messages.js";
import { canTransition, FLOWS, flowOf, type SettingsState } from "./states.js";

/**
 * Everything the controller talks to outside its own state
 */
export interface SettingsDeps {
  paths: PathUtilities;
  credentials: CredentialManager;
  gitSource: GitSourceFactory;
  prepare: Preparer;
  loadRegistry(): Promise<Registry>;
  saveRegistry(registry: Registry): Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

export type ChangeKind =
  | "addLocal"
  | "addRemote"
  | "name"
  | "branch"
  | "path"
  | "refresh"
  | "delete"
  | "token";

/**
 * Per-flow inputs, discarded when the flow ends
 */
export interface Scratch {
  name: string;
  path: string;
  remoteUrl: string;
  branch: string;
  token: string;
}

export type KeyHandler = (ctrl: SettingsController, key: KeyPress) => Command | undefined;

function emptyScratch(): Scratch {
  return { name: "", path: "", remoteUrl: "", branch: "", token: "" };
}

export class SettingsController {
  state: SettingsState = "MainMenu";
  previousState: SettingsState | undefined;

  registry: Registry;
  prepared: PreparedRepository[];

  selectedRepositoryId: string | undefined;
  changeKind: ChangeKind | undefined;
  scratch: Scratch = emptyScratch();
  hasChanges = false;
  isDirty = false;

  refreshInProgress = false;
  lastRefreshError: Error | undefined;
  tokenReason: string | undefined;

  // Set while a command is outstanding; keys are dropped until its message arrives
  busy = false;
  // Bumped on every menu rebuild
  menuRevision = 0;
  size = { columns: 80, rows: 24 };

  readonly textInput = new TextInput();
  readonly layout = new Layout();
  readonly mainMenu = new SelectList<MenuItemValue>();
  readonly actionMenu = new SelectList<RepositoryAction>();
  readonly typeMenu = new SelectList<RepositoryKind>();

  readonly deps: SettingsDeps;
  readonly log: Logger;

  constructor(registry: Registry, prepared: PreparedRepository[], deps: SettingsDeps) {
    this.registry = registry;
    this.prepared = prepared;
    this.deps = deps;
    this.log = deps.logger ?? createLogger("settings");

    this.typeMenu.setItems([
      { value: "local", label: "📁 Local Directory", description: "Use rules from a directory on this machine" },
      { value: "remote", label: "🔗 GitHub Repository", description: "Clone rules from a remote repository" },
    ]);
    this.rebuildMenuItems();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // DISPATCH
  // ─────────────────────────────────────────────────────────────────────────────

  update(event: SettingsEvent): Command | undefined {
    switch (event.type) {
      case "key":
        return this.handleKey(event.key);
      case "resize":
        this.size = { columns: event.columns, rows: event.rows };
        return undefined;
      default:
        return this.handleMessage(event);
    }
  }

  private handleKey(key: KeyPress): Command | undefined {
    if (isQuitKey(key)) {
      this.log.info("Settings closed", { state: this.state });
      requestQuit();
    }

    if (this.busy && this.state !== "RefreshInProgress") {
      this.log.debug("Key ignored while a command is running", { state: this.state, key: key.name });
      return undefined;
    }

    return KEY_HANDLERS[this.state](this, key);
  }

  private handleMessage(message: SettingsMessage): Command | undefined {
    const flow = messageFlow(message);
    if (flow !== undefined && flow !== flowOf(this.state)) {
      this.log.debug("Ignoring message for another flow", {
        message: message.type,
        state: this.state,
      });
      return undefined;
    }

    this.busy = false;

    switch (message.type) {
      case "registryLoaded":
        return this.applyRegistryLoaded(message);
      case "mutationCommitted":
        return this.applyCommit(message);
      case "editBranchDirtyChecked":
        return onEditBranchDirtyChecked(this, message);
      case "editClonePathDirtyChecked":
        return onEditClonePathDirtyChecked(this, message);
      case "refreshDirtyChecked":
        return onRefreshDirtyChecked(this, message);
      case "deleteDirtyChecked":
        return onDeleteDirtyChecked(this, message);
      case "refreshCompleted":
        return onRefreshCompleted(this, message);
      case "tokenNeeded":
        return onTokenNeeded(this, message);
      case "updateTokenValidated":
        return onUpdateTokenValidated(this);
      case "addLocalFailed":
        return onAddLocalFailed(this, message);
      case "addRemoteFailed":
        return onAddRemoteFailed(this, message);
      case "editNameFailed":
        return onEditNameFailed(this, message);
      case "editBranchFailed":
        return onEditBranchFailed(this, message);
      case "editClonePathFailed":
        return onEditClonePathFailed(this, message);
      case "deleteFailed":
        return onDeleteFailed(this, message);
      case "updateTokenFailed":
        return onUpdateTokenFailed(this, message);
    }
  }

  /**
   * Replace the registry with the one on disk and go back to the main menu
   */
  private applyRegistryLoaded(message: MessageOf<"registryLoaded">): undefined {
    this.registry = message.registry;
    this.prepared = message.prepared;
    this.rebuildMenuItems();
    this.resetScratch();
    this.selectedRepositoryId = undefined;
    this.transitionTo("MainMenu");
    return undefined;
  }

  /**
   * Adopt a persisted registry: list, menu, scratch, selection, then Complete
   */
  private applyCommit(message: MessageOf<"mutationCommitted">): undefined {
    this.registry = message.registry;
    this.prepared = message.prepared.repositories;

    for (const failure of message.prepared.failures) {
      this.log.warn("Repository could not be prepared", {
        id: failure.id,
        error: failure.error.message,
      });
    }

    this.rebuildMenuItems();
    this.resetScratch();
    if (message.flow === "delete") {
      this.selectedRepositoryId = undefined;
    }

    this.log.info("Settings saved", { flow: message.flow });
    this.transitionTo("Complete");
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HELPERS FOR FLOWS
  // ─────────────────────────────────────────────────────────────────────────────

  transitionTo(next: SettingsState): void {
    if (!canTransition(this.state, next)) {
      this.log.warn("Transition crosses flows", { from: this.state, to: next });
    }
    this.log.debug("State changed", { from: this.state, to: next });
    this.previousState = this.state;
    this.state = next;
    this.layout.clearError();
  }

  /**
   * Return to the previous screen
   */
  back(): void {
    this.transitionTo(this.previousState ?? "MainMenu");
  }

  /**
   * Move to the current flow's error screen and show the error there
   */
  fail(error: Error): undefined {
    const flow = flowOf(this.state);
    const errorState = flow === "shared" ? undefined : FLOWS[flow].error;

    this.log.error("Settings flow failed", { flow, error: error.message });
    if (!errorState) {
      this.layout.setError(error);
      return undefined;
    }

    this.transitionTo(errorState);
    this.layout.setError(error);
    return undefined;
  }

  /**
   * Show a validation error in the input screen's error slot
   */
  setInlineError(error: unknown): undefined {
    const err = toError(error);
    this.log.debug("Input rejected", { state: this.state, error: err.message });
    this.layout.setError(err);
    return undefined;
  }

  resetScratch(): void {
    this.scratch.token = "";
    this.scratch = emptyScratch();
    this.hasChanges = false;
    this.isDirty = false;
    this.changeKind = undefined;
    this.tokenReason = undefined;
    this.textInput.clear();
    this.layout.clearError();
  }

  prepareInput(options: TextInputOptions): void {
    this.textInput.reset(options);
    this.layout.clearError();
  }

  /**
   * Mark a command as outstanding and hand it to the host
   */
  issue(command: Command): Command {
    this.busy = true;
    return command;
  }

  selectedEntry(): RepositoryEntry | undefined {
    if (!this.selectedRepositoryId) return undefined;
    return findEntry(this.registry, this.selectedRepositoryId);
  }

  rebuildMenuItems(): void {
    this.mainMenu.setItems(buildMainMenuItems(this.prepared, this.now()));
    this.menuRevision++;
  }

  rebuildActionMenu(entry: RepositoryEntry): void {
    this.actionMenu.setItems(buildRepositoryActions(entry, this.registry.repositories.length));
    this.actionMenu.select(0);
  }

  now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  /**
   * The stored token, or undefined when none is usable
   */
  async tokenOrUndefined(): Promise<string | undefined> {
    try {
      return await this.deps.credentials.get();
    } catch (error) {
      this.log.debug("No stored token", { error: toError(error).message });
      return undefined;
    }
  }

  sourceFor(entry: RepositoryEntry, token?: string): GitSource {
    return this.deps.gitSource({
      url: entry.remoteUrl ?? "",
      branch: entry.branch,
      path: entry.path,
      token,
    });
  }

  /**
   * Turn a rejected command into the current flow's failure message
   */
  failureFor(error: unknown): SettingsMessage | undefined {
    return failureMessage(flowOf(this.state), toError(error));
  }
}
