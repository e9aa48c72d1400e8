import type { Registry, RepositoryEntry, RepositoryKind } from '../types/index.js';
import { RegistryError } from './errors.js';

type NormalizationResult<T> = {
  data: T;
  changed: boolean;
  issues: string[];
};

const ENTRY_KEYS = new Set([
  'id',
  'name',
  'kind',
  'createdAt',
  'path',
  'remoteUrl',
  'branch',
  'lastSyncedAt',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new RegistryError(`Invalid registry format (missing ${label})`);
  }
  return value;
}

function requireKind(value: unknown, label: string): RepositoryKind {
  if (value === 'local' || value === 'remote') {
    return value;
  }
  throw new RegistryError(`Invalid registry format (${label} must be "local" or "remote")`);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function normalizeEntry(
  raw: Record<string, unknown>,
  issues: string[],
  index: number
): { entry: RepositoryEntry; changed: boolean } {
  let changed = false;
  const at = `registry.repositories[${index}]`;

  for (const key of Object.keys(raw)) {
    if (!ENTRY_KEYS.has(key)) {
      issues.push(`${at} dropped unknown field "${key}"`);
      changed = true;
    }
  }

  const id = requireString(raw.id, `${at}.id`);
  const name = requireString(raw.name, `${at}.name`);
  const kind = requireKind(raw.kind, `${at}.kind`);
  const path = requireString(raw.path, `${at}.path`);

  let createdAt = 0;
  if (typeof raw.createdAt === 'number' && Number.isFinite(raw.createdAt)) {
    createdAt = Math.trunc(raw.createdAt);
  } else {
    issues.push(`${at} defaulted createdAt`);
    changed = true;
  }

  const lastSyncedAt = optionalString(raw.lastSyncedAt);
  const entry: RepositoryEntry = { id, name, kind, createdAt, path };

  if (kind === 'remote') {
    entry.remoteUrl = requireString(raw.remoteUrl, `${at}.remoteUrl`);
    const branch = optionalString(raw.branch);
    if (branch) entry.branch = branch;
  } else if (raw.remoteUrl !== undefined || raw.branch !== undefined) {
    issues.push(`${at} dropped remote fields from a local repository`);
    changed = true;
  }

  if (lastSyncedAt) entry.lastSyncedAt = lastSyncedAt;

  return { entry, changed };
}

export function normalizeRegistry(raw: unknown): NormalizationResult<Registry> {
  if (!isRecord(raw)) {
    throw new RegistryError('Invalid registry format');
  }

  const issues: string[] = [];
  let changed = false;

  for (const key of Object.keys(raw)) {
    if (key !== 'version' && key !== 'repositories') {
      issues.push(`registry dropped unknown field "${key}"`);
      changed = true;
    }
  }

  if (typeof raw.version !== 'string') {
    throw new RegistryError('Invalid registry format (missing version)');
  }
  if (raw.version !== '1.0') {
    issues.push(`registry upgraded version ${raw.version} to 1.0`);
    changed = true;
  }

  if (!Array.isArray(raw.repositories)) {
    throw new RegistryError('Invalid registry format (repositories must be a list)');
  }

  const repositories = raw.repositories.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new RegistryError(`Invalid registry format (repositories[${index}])`);
    }
    const normalized = normalizeEntry(entry, issues, index);
    if (normalized.changed) {
      changed = true;
    }
    return normalized.entry;
  });

  return {
    data: { version: '1.0', repositories },
    changed,
    issues,
  };
}
