import { simpleGit, type SimpleGit } from "simple-git";
import { existsSync } from "node:fs";
import { join } from "node:path";
import type { RepositoryStatus } from "../types/index.js";
import { DEFAULTS } from "./config.js";
import { parseRemoteUrl, withToken } from "./url-parser.js";

export type GitErrorKind = "auth" | "not-found" | "network" | "unknown";

/**
 * A git failure translated into something a user can act on
 */
export class GitOperationError extends Error {
  readonly kind: GitErrorKind;

  constructor(kind: GitErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GitOperationError";
    this.kind = kind;
  }
}

const AUTH_PATTERNS = [
  "401",
  "403",
  "authentication failed",
  "authentication required",
  "unauthorized",
  "forbidden",
  "could not read username",
  "invalid username or password",
];

const NOT_FOUND_PATTERNS = ["repository not found", "not found", "does not exist"];

const NETWORK_PATTERNS = [
  "could not resolve host",
  "timed out",
  "connection refused",
  "network is unreachable",
];

/**
 * Map raw git output to a GitOperationError
 */
export function translateGitError(operation: string, error: unknown): GitOperationError {
  const raw = error instanceof Error ? error.message : String(error);
  const lower = raw.toLowerCase();

  if (AUTH_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new GitOperationError(
      "auth",
      `${operation} failed: authentication required. Check that your GitHub token has access to this repository`,
      { cause: error }
    );
  }
  if (NOT_FOUND_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new GitOperationError(
      "not-found",
      `${operation} failed: repository not found or no access`,
      { cause: error }
    );
  }
  if (NETWORK_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new GitOperationError(
      "network",
      `${operation} failed: network error. Check your connection and try again`,
      { cause: error }
    );
  }

  const firstLine = raw.split("\n").find((line) => line.trim().length > 0) ?? raw;
  return new GitOperationError("unknown", `${operation} failed: ${firstLine.trim()}`, {
    cause: error,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// GIT SOURCE
// ─────────────────────────────────────────────────────────────────────────────

export interface GitSourceOptions {
  url: string;
  branch?: string;
  path: string;
  token?: string;
}

/**
 * Git operations for one remote repository and its working copy
 */
export interface GitSource {
  isWorkingTreeDirty(): Promise<boolean>;
  branchExistsOnRemote(name: string): Promise<boolean>;
  fetchUpdates(): Promise<void>;
  clone(): Promise<void>;
  getRemoteUrl(): Promise<string | null>;
}

export type GitSourceFactory = (options: GitSourceOptions) => GitSource;

function authenticatedUrl(url: string, token: string | undefined): string {
  if (!token) return url;
  try {
    return withToken(parseRemoteUrl(url).httpsUrl, token);
  } catch {
    return url;
  }
}

/**
 * Branch the remote's HEAD points at, if it advertises one
 */
async function defaultHead(git: SimpleGit, url: string): Promise<string | undefined> {
  const output = await git.listRemote(["--symref", url, "HEAD"]);
  const match = /^ref: refs\/heads\/(\S+)\s+HEAD$/m.exec(output);
  return match ? match[1] : undefined;
}

export function createGitSource(options: GitSourceOptions): GitSource {
  const remote = DEFAULTS.remoteName;
  const remoteUrl = () => authenticatedUrl(options.url, options.token);

  const isWorkingTreeDirty = async (): Promise<boolean> => {
    const status = await getRepositoryStatus(options.path);
    return status.isDirty;
  };

  return {
    isWorkingTreeDirty,

    async branchExistsOnRemote(name) {
      try {
        const output = await simpleGit().listRemote(["--heads", remoteUrl(), name]);
        return output.trim().length > 0;
      } catch (error) {
        throw translateGitError("Branch lookup", error);
      }
    },

    async fetchUpdates() {
      if (!existsSync(options.path)) {
        throw new GitOperationError(
          "not-found",
          `repository path does not exist: ${options.path}`
        );
      }

      // A dirty tree is left alone
      if (await isWorkingTreeDirty()) {
        return;
      }

      const git: SimpleGit = simpleGit(options.path);
      try {
        if (options.token) {
          await git.fetch(remoteUrl(), `+refs/heads/*:refs/remotes/${remote}/*`, ["--prune"]);
        } else {
          await git.fetch(remote, ["--prune", "--force"]);
        }

        // No branch configured means the remote's default head, not whatever is checked out
        const target =
          options.branch ?? (await defaultHead(git, remoteUrl())) ?? (await git.status()).current;
        if (!target) return;

        const local = await git.branchLocal();
        if (local.current !== target) {
          if (local.all.includes(target)) {
            await git.checkout(target);
          } else {
            await git.checkout(["-b", target, "--track", `${remote}/${target}`]);
          }
        }
        await git.merge(["--ff-only", `${remote}/${target}`]);
      } catch (error) {
        throw translateGitError("Fetch", error);
      }
    },

    async clone() {
      const args = options.branch ? ["--branch", options.branch] : [];
      try {
        await simpleGit().clone(remoteUrl(), options.path, args);
        // Keep the token out of .git/config
        await simpleGit(options.path).remote(["set-url", remote, options.url]);
      } catch (error) {
        throw translateGitError("Clone", error);
      }
    },

    async getRemoteUrl() {
      return getRemoteUrl(options.path, remote);
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// WORKING COPY HELPERS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Get the status of a local working copy
 */
export async function getRepositoryStatus(localPath: string): Promise<RepositoryStatus> {
  if (!existsSync(localPath)) {
    return { exists: false, isGitRepo: false, currentBranch: null, isDirty: false };
  }

  if (!existsSync(join(localPath, ".git"))) {
    return { exists: true, isGitRepo: false, currentBranch: null, isDirty: false };
  }

  const status = await simpleGit(localPath).status();

  return {
    exists: true,
    isGitRepo: true,
    currentBranch: status.current,
    isDirty: status.files.length > 0,
  };
}

/**
 * Get the remote URL for a repository
 */
export async function getRemoteUrl(
  localPath: string,
  remoteName: string = DEFAULTS.remoteName
): Promise<string | null> {
  if (!existsSync(join(localPath, ".git"))) return null;

  const remotes = await simpleGit(localPath).getRemotes(true);
  const remote = remotes.find((r) => r.name === remoteName);
  return remote?.refs?.fetch || null;
}

/**
 * Ask a remote for its heads using the given token
 */
export async function listRemoteHeads(
  url: string,
  token: string,
  timeoutMs: number = DEFAULTS.tokenValidationTimeoutMs
): Promise<string> {
  const git = simpleGit({ timeout: { block: timeoutMs } });
  return git.listRemote(["--heads", authenticatedUrl(url, token)]);
}
