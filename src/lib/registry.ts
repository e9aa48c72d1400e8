import { mkdir, readFile, writeFile, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { randomUUID } from "node:crypto";
import type { Registry, RepositoryEntry } from "../types/index.js";
import { getRegistryPath } from "./config.js";
import { RegistryError } from "./errors.js";
import { normalizeRegistry } from "./schema.js";
import { remoteUrlKey } from "./url-parser.js";

/**
 * Create an empty registry
 */
export function createEmptyRegistry(): Registry {
  return {
    version: "1.0",
    repositories: [],
  };
}

/**
 * Read the registry from disk
 * Returns an empty registry if the file doesn't exist
 */
export async function readRegistry(path: string = getRegistryPath()): Promise<Registry> {
  if (!existsSync(path)) {
    return createEmptyRegistry();
  }

  const content = await readFile(path, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new RegistryError(`Registry file is corrupted: ${path}`);
    }
    throw error;
  }

  return normalizeRegistry(data).data;
}

/**
 * Write the registry to disk atomically
 * Uses write-to-temp + rename pattern to prevent corruption
 */
export async function writeRegistry(
  registry: Registry,
  path: string = getRegistryPath()
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const normalized = normalizeRegistry(registry);
  const tempPath = join(dirname(path), `.registry.${randomUUID()}.tmp`);

  await writeFile(tempPath, serializeRegistry(normalized.data), "utf-8");
  await rename(tempPath, path);
}

/**
 * The exact bytes writeRegistry puts on disk
 */
export function serializeRegistry(registry: Registry): string {
  return JSON.stringify(registry, null, 2) + "\n";
}

/**
 * Find an entry by ID
 */
export function findEntry(registry: Registry, id: string): RepositoryEntry | undefined {
  return registry.repositories.find((entry) => entry.id === id);
}

/**
 * Find an entry by display name (exact match after trimming)
 */
export function findEntryByName(registry: Registry, name: string): RepositoryEntry | undefined {
  const wanted = name.trim();
  return registry.repositories.find((entry) => entry.name === wanted);
}

/**
 * Find a remote entry pointing at the same repository as url
 */
export function findEntryByRemoteUrl(
  registry: Registry,
  url: string
): RepositoryEntry | undefined {
  const key = remoteUrlKey(url);
  return registry.repositories.find(
    (entry) => entry.remoteUrl !== undefined && remoteUrlKey(entry.remoteUrl) === key
  );
}

/**
 * Find an entry whose local path resolves to the same directory
 */
export function findEntryByPath(registry: Registry, path: string): RepositoryEntry | undefined {
  const wanted = resolve(path);
  return registry.repositories.find((entry) => resolve(entry.path) === wanted);
}

/**
 * Add an entry to the registry
 * Throws if an entry with the same ID already exists
 */
export function addEntry(registry: Registry, entry: RepositoryEntry): Registry {
  if (findEntry(registry, entry.id)) {
    throw new Error(`Repository already exists in registry: ${entry.id}`);
  }

  return {
    ...registry,
    repositories: [...registry.repositories, entry],
  };
}

export type EntryUpdates = Partial<Omit<RepositoryEntry, "id" | "kind" | "createdAt">>;

const OPTIONAL_KEYS = ["remoteUrl", "branch", "lastSyncedAt"] as const;

/**
 * Update an entry in the registry. Keys set to undefined are removed.
 */
export function updateEntry(registry: Registry, id: string, updates: EntryUpdates): Registry {
  const index = registry.repositories.findIndex((entry) => entry.id === id);
  if (index === -1) {
    throw new Error(`Repository not found: ${id}`);
  }

  const current = registry.repositories[index];
  const merged: RepositoryEntry = {
    ...current,
    ...updates,
    id: current.id,
    kind: current.kind,
    createdAt: current.createdAt,
  };
  for (const key of OPTIONAL_KEYS) {
    if (key in updates && updates[key] === undefined) {
      delete merged[key];
    }
  }

  const repositories = [...registry.repositories];
  repositories[index] = merged;

  return {
    ...registry,
    repositories,
  };
}

/**
 * Remove an entry from the registry
 */
export function removeEntry(registry: Registry, id: string): Registry {
  const filtered = registry.repositories.filter((entry) => entry.id !== id);

  if (filtered.length === registry.repositories.length) {
    throw new Error(`Repository not found: ${id}`);
  }

  return {
    ...registry,
    repositories: filtered,
  };
}

/**
 * Generate a stable ID from a display name and creation time
 * Format: sanitized-name-<unix seconds>
 */
export function generateRepositoryId(name: string, createdAt: number): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return `${sanitized || "repo"}-${createdAt}`;
}
