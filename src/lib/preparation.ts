import { existsSync, statSync } from "node:fs";
import type {
  DirectoryStatus,
  PreparationFailure,
  PreparationResult,
  PreparedRepository,
  RepositoryEntry,
} from "../types/index.js";
import { toError } from "./errors.js";
import type { GitSourceFactory } from "./git.js";
import { remoteUrlKey } from "./url-parser.js";

export interface PreparationDeps {
  gitSource: GitSourceFactory;
  getDirectoryStatus(path: string): DirectoryStatus;
  getToken(): Promise<string | undefined>;
}

export type Preparer = (entries: readonly RepositoryEntry[]) => Promise<PreparationResult>;

function prepareLocal(entry: RepositoryEntry): PreparedRepository {
  const ready = existsSync(entry.path) && statSync(entry.path).isDirectory();
  return {
    entry,
    localPath: entry.path,
    status: ready ? "ready" : "missing",
  };
}

async function prepareRemote(
  entry: RepositoryEntry,
  deps: PreparationDeps,
  token: string | undefined
): Promise<PreparedRepository> {
  const url = entry.remoteUrl ?? "";
  const source = deps.gitSource({ url, branch: entry.branch, path: entry.path, token });
  const status = deps.getDirectoryStatus(entry.path);

  switch (status) {
    case "missing":
    case "empty": {
      await source.clone();
      return { entry, localPath: entry.path, status: "cloned" };
    }

    case "git-repo": {
      const found = await source.getRemoteUrl();
      if (!found || remoteUrlKey(found) !== remoteUrlKey(url)) {
        throw new Error(
          `directory contains different git repository (found ${found ?? "no origin"}, expected ${url})`
        );
      }
      return { entry, localPath: entry.path, status: "ready" };
    }

    case "non-empty":
      throw new Error("directory is not empty and is not a git repository");
  }
}

/**
 * Make every entry usable: check local directories, clone missing remotes.
 * Failures are collected per repository instead of aborting the batch.
 */
export function createPreparer(deps: PreparationDeps): Preparer {
  return async (entries) => {
    const repositories: PreparedRepository[] = [];
    const failures: PreparationFailure[] = [];
    const hasRemote = entries.some((entry) => entry.kind === "remote");
    const token = hasRemote ? await deps.getToken() : undefined;

    for (const entry of entries) {
      if (entry.kind === "local") {
        repositories.push(prepareLocal(entry));
        continue;
      }

      try {
        repositories.push(await prepareRemote(entry, deps, token));
      } catch (error) {
        const failure = toError(error);
        failures.push({ id: entry.id, error: failure });
        repositories.push({
          entry,
          localPath: entry.path,
          status: "error",
          error: failure.message,
        });
      }
    }

    return { repositories, failures };
  };
}
