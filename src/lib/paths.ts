import { accessSync, constants, existsSync, readdirSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import type { DirectoryStatus } from "../types/index.js";
import { getDefaultStorageDir } from "./config.js";
import { ValidationError } from "./errors.js";
import { parseRemoteUrl } from "./url-parser.js";
import { toUserPath } from "./ui-utils.js";

/**
 * Filesystem checks the settings controller relies on
 */
export interface PathUtilities {
  expand(path: string): string;
  validateStoragePath(path: string): void;
  isDirectoryEmpty(path: string): boolean;
  getDirectoryStatus(path: string): DirectoryStatus;
  deriveClonePath(remoteUrl: string): string;
}

const RESERVED_DIRS = new Set([
  "/bin",
  "/boot",
  "/dev",
  "/etc",
  "/lib",
  "/lib64",
  "/proc",
  "/root",
  "/sbin",
  "/sys",
  "/usr",
  "/var",
  "/System",
  "/Library",
  "/Applications",
]);

/**
 * Expand a leading ~ and resolve to an absolute path
 */
export function expandPath(path: string): string {
  const trimmed = path.trim();
  if (trimmed === "~") return homedir();
  if (trimmed.startsWith("~/")) return join(homedir(), trimmed.slice(2));
  return resolve(trimmed);
}

/**
 * Check that a path can hold a repository: absolute (or ~), not a system
 * directory, parent exists, and the path is a writable directory if present.
 */
export function validateStoragePath(path: string): void {
  const trimmed = path.trim();

  if (trimmed.length === 0) {
    throw new ValidationError("path cannot be empty");
  }
  if (trimmed.includes("\0")) {
    throw new ValidationError("path cannot contain null bytes");
  }
  if (!isAbsolute(trimmed) && trimmed !== "~" && !trimmed.startsWith("~/")) {
    throw new ValidationError("path must be absolute or start with ~/");
  }

  const expanded = expandPath(trimmed);
  if (expanded === sep || RESERVED_DIRS.has(expanded)) {
    throw new ValidationError(`path is a reserved system directory: ${expanded}`);
  }

  const parent = dirname(expanded);
  if (!existsSync(parent) || !statSync(parent).isDirectory()) {
    throw new ValidationError(`parent directory does not exist: ${parent}`);
  }

  if (existsSync(expanded)) {
    if (!statSync(expanded).isDirectory()) {
      throw new ValidationError(`path exists but is not a directory: ${expanded}`);
    }
    try {
      accessSync(expanded, constants.W_OK);
    } catch {
      throw new ValidationError(`directory is not writable: ${expanded}`);
    }
  }
}

/**
 * A missing directory counts as empty
 */
export function isDirectoryEmpty(path: string): boolean {
  if (!existsSync(path)) return true;
  return readdirSync(path).length === 0;
}

/**
 * Classify what currently sits at a clone target
 */
export function getDirectoryStatus(path: string): DirectoryStatus {
  if (!existsSync(path)) return "missing";
  if (isDirectoryEmpty(path)) return "empty";
  if (existsSync(join(path, ".git"))) return "git-repo";
  return "non-empty";
}

/**
 * Reject a clone target that already holds something
 */
export function validateCloneDirectory(status: DirectoryStatus, path: string): void {
  if (status === "git-repo") {
    throw new ValidationError(
      `directory already contains a Git repository: ${toUserPath(path)}. Choose an empty or new directory`
    );
  }
  if (status === "non-empty") {
    throw new ValidationError(
      `directory is not empty: ${toUserPath(path)}. Choose an empty or new directory`
    );
  }
}

/**
 * Default clone target for a remote: <storage dir>/<repo name>
 */
export function deriveClonePath(remoteUrl: string): string {
  try {
    return join(getDefaultStorageDir(), parseRemoteUrl(remoteUrl).name);
  } catch {
    return getDefaultStorageDir();
  }
}

export const nodePathUtilities: PathUtilities = {
  expand: expandPath,
  validateStoragePath,
  isDirectoryEmpty,
  getDirectoryStatus,
  deriveClonePath,
};
