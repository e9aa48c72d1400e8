import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { GitSource, GitSourceOptions } from "../../src/lib/git.js";
import { createPreparer, type PreparationDeps } from "../../src/lib/preparation.js";
import type { DirectoryStatus, RepositoryEntry } from "../../src/types/index.js";

function remote(id: string, overrides: Partial<RepositoryEntry> = {}): RepositoryEntry {
  return {
    id,
    name: id,
    kind: "remote",
    createdAt: 1,
    path: `/data/rulebook/${id}`,
    remoteUrl: `https://github.com/acme/${id}`,
    ...overrides,
  };
}

interface FakeSources {
  deps: PreparationDeps;
  created: GitSourceOptions[];
  cloned: string[];
}

function fakeSources(
  statuses: Record<string, DirectoryStatus>,
  origins: Record<string, string | null> = {},
  cloneError?: Error
): FakeSources {
  const created: GitSourceOptions[] = [];
  const cloned: string[] = [];

  const deps: PreparationDeps = {
    gitSource: (options): GitSource => {
      created.push(options);
      return {
        isWorkingTreeDirty: async () => false,
        branchExistsOnRemote: async () => true,
        fetchUpdates: async () => undefined,
        clone: async () => {
          if (cloneError) throw cloneError;
          cloned.push(options.path);
        },
        getRemoteUrl: async () => origins[options.path] ?? null,
      };
    },
    getDirectoryStatus: (path) => statuses[path] ?? "missing",
    getToken: vi.fn(async () => "test-secret"),
  };

  return { deps, created, cloned };
}

describe("createPreparer", () => {
  describe("local entries", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "rulebook-prepare-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("marks existing directories ready and others missing", async () => {
      const file = join(dir, "notes.md");
      await writeFile(file, "", "utf-8");
      const { deps } = fakeSources({});
      const entries: RepositoryEntry[] = [
        { id: "a", name: "A", kind: "local", createdAt: 1, path: dir },
        { id: "b", name: "B", kind: "local", createdAt: 1, path: join(dir, "gone") },
        { id: "c", name: "C", kind: "local", createdAt: 1, path: file },
      ];

      const result = await createPreparer(deps)(entries);

      expect(result.repositories.map((repo) => repo.status)).toEqual(["ready", "missing", "missing"]);
      expect(result.failures).toEqual([]);
    });

    it("does not ask for a token without remote entries", async () => {
      const { deps } = fakeSources({});

      await createPreparer(deps)([
        { id: "a", name: "A", kind: "local", createdAt: 1, path: dir },
      ]);

      expect(deps.getToken).not.toHaveBeenCalled();
    });
  });

  describe("remote entries", () => {
    it("clones into missing and empty directories", async () => {
      const { deps, created, cloned } = fakeSources({ "/data/rulebook/two": "empty" });

      const result = await createPreparer(deps)([remote("one", { branch: "dev" }), remote("two")]);

      expect(cloned).toEqual(["/data/rulebook/one", "/data/rulebook/two"]);
      expect(created[0]).toEqual({
        url: "https://github.com/acme/one",
        branch: "dev",
        path: "/data/rulebook/one",
        token: "test-secret",
      });
      expect(result.repositories.map((repo) => repo.status)).toEqual(["cloned", "cloned"]);
    });

    it("accepts an existing clone of the same remote", async () => {
      const { deps, cloned } = fakeSources(
        { "/data/rulebook/one": "git-repo" },
        { "/data/rulebook/one": "git@github.com:acme/one.git" }
      );

      const result = await createPreparer(deps)([remote("one")]);

      expect(cloned).toEqual([]);
      expect(result.repositories[0].status).toBe("ready");
    });

    it("reports a clone of a different remote", async () => {
      const { deps } = fakeSources(
        { "/data/rulebook/one": "git-repo" },
        { "/data/rulebook/one": "https://github.com/other/one" }
      );

      const result = await createPreparer(deps)([remote("one")]);

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].id).toBe("one");
      expect(result.failures[0].error.message).toBe(
        "directory contains different git repository (found https://github.com/other/one, expected https://github.com/acme/one)"
      );
      expect(result.repositories[0]).toMatchObject({
        status: "error",
        error: result.failures[0].error.message,
      });
    });

    it("reports a git directory without an origin", async () => {
      const { deps } = fakeSources({ "/data/rulebook/one": "git-repo" });

      const result = await createPreparer(deps)([remote("one")]);

      expect(result.failures[0].error.message).toBe(
        "directory contains different git repository (found no origin, expected https://github.com/acme/one)"
      );
    });

    it("refuses a non-empty directory", async () => {
      const { deps } = fakeSources({ "/data/rulebook/one": "non-empty" });

      const result = await createPreparer(deps)([remote("one")]);

      expect(result.failures[0].error.message).toBe(
        "directory is not empty and is not a git repository"
      );
    });

    it("keeps going after a failed clone", async () => {
      const { deps } = fakeSources({}, {}, new Error("Clone failed: repository not found or no access"));

      const result = await createPreparer(deps)([
        remote("one"),
        { id: "l", name: "L", kind: "local", createdAt: 1, path: "/rules/nowhere" },
      ]);

      expect(result.failures.map((failure) => failure.id)).toEqual(["one"]);
      expect(result.repositories.map((repo) => repo.status)).toEqual(["error", "missing"]);
    });
  });
});
