import { DEFAULTS } from "./config.js";
import { ValidationError } from "./errors.js";
import { parseRemoteUrl } from "./url-parser.js";
import type { Registry, RepositoryEntry } from "../types/index.js";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Check a repository display name. Uniqueness is checked by the caller.
 */
export function validateRepositoryName(name: string): void {
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError("repository name cannot be empty");
  }
  if (trimmed.length > DEFAULTS.maxNameLength) {
    throw new ValidationError(
      `repository name must be ${DEFAULTS.maxNameLength} characters or less`
    );
  }
  if (CONTROL_CHARS.test(trimmed)) {
    throw new ValidationError("repository name cannot contain control characters");
  }
}

/**
 * Check that a remote URL is present and well-formed
 */
export function validateRemoteUrl(url: string): void {
  const trimmed = url.trim();

  if (trimmed.length === 0) {
    throw new ValidationError("repository URL cannot be empty");
  }

  try {
    parseRemoteUrl(trimmed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`invalid repository URL format: ${reason}`);
  }
}

/**
 * Check a branch name against git's ref rules. Empty means the default branch.
 */
export function validateBranchName(branch: string): void {
  const trimmed = branch.trim();
  if (trimmed.length === 0) return;

  if (/\s/.test(trimmed)) {
    throw new ValidationError("branch name cannot contain spaces");
  }
  if (trimmed.startsWith("/") || trimmed.endsWith("/")) {
    throw new ValidationError("branch name cannot start or end with /");
  }
  if (trimmed.includes("..")) {
    throw new ValidationError("branch name cannot contain ..");
  }
  if (trimmed.includes("@{")) {
    throw new ValidationError("branch name cannot contain @{");
  }
  const invalid = ["~", "^", ":", "?", "*", "[", "\\"].find((char) => trimmed.includes(char));
  if (invalid) {
    throw new ValidationError(`branch name cannot contain '${invalid}'`);
  }
  if (CONTROL_CHARS.test(trimmed)) {
    throw new ValidationError("branch name cannot contain control characters");
  }
  if (trimmed === ".") {
    throw new ValidationError("branch name cannot be '.'");
  }
  if (trimmed.endsWith(".lock")) {
    throw new ValidationError("branch name cannot end with .lock");
  }
}

/**
 * Structural problems in a loaded registry: duplicate ids and duplicate names
 */
export function validateRegistry(registry: Registry): string[] {
  const problems: string[] = [];
  const ids = new Set<string>();
  const names = new Map<string, RepositoryEntry>();

  for (const entry of registry.repositories) {
    if (ids.has(entry.id)) {
      problems.push(`duplicate repository id: ${entry.id}`);
    }
    ids.add(entry.id);

    const existing = names.get(entry.name);
    if (existing) {
      problems.push(`duplicate repository name '${entry.name}' (${existing.id}, ${entry.id})`);
    } else {
      names.set(entry.name, entry);
    }
  }

  return problems;
}
