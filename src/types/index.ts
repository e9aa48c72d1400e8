/**
 * Registry schema for rulebook
 */

export type RepositoryKind = "local" | "remote";

export interface Registry {
  version: "1.0";
  repositories: RepositoryEntry[];
}

export interface RepositoryEntry {
  // Identity
  id: string; // Stable identifier derived from the name and creation time
  name: string; // Human label, unique across the registry
  kind: RepositoryKind;
  createdAt: number; // Unix seconds

  // Location
  path: string; // Absolute local directory (clone target for remotes)

  // Remote only
  remoteUrl?: string;
  branch?: string; // Absent means the remote's default branch

  // Tracking
  lastSyncedAt?: string; // ISO 8601
}

/**
 * Result of parsing a remote URL
 */
export interface ParsedRemoteUrl {
  host: string;
  owner: string;
  name: string;
  httpsUrl: string;
}

/**
 * Local status of a working copy
 */
export interface RepositoryStatus {
  exists: boolean;
  isGitRepo: boolean;
  currentBranch: string | null;
  isDirty: boolean;
}

/**
 * What currently sits at a clone target
 */
export type DirectoryStatus = "missing" | "empty" | "non-empty" | "git-repo";

export type PreparedStatus = "ready" | "missing" | "cloned" | "error";

/**
 * A registry entry decorated with readiness data for display
 */
export interface PreparedRepository {
  entry: RepositoryEntry;
  localPath: string;
  status: PreparedStatus;
  error?: string;
}

export interface PreparationFailure {
  id: string;
  error: Error;
}

export interface PreparationResult {
  repositories: PreparedRepository[];
  failures: PreparationFailure[];
}
