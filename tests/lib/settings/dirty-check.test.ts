import { describe, it, expect, vi } from "vitest";
import type { GitSource } from "../../../src/lib/git.js";
import { checkDirty, dirtyStateWarning } from "../../../src/lib/settings/dirty-check.js";
import type { SettingsMessage } from "../../../src/lib/settings/messages.js";
import type { RepositoryEntry } from "../../../src/types/index.js";
import { localEntry, remoteEntry } from "./harness.js";

const reply = (isDirty: boolean, error?: Error): SettingsMessage => ({
  type: "deleteDirtyChecked",
  isDirty,
  error,
});

function sourceWith(isWorkingTreeDirty: () => Promise<boolean>): GitSource {
  return {
    isWorkingTreeDirty,
    branchExistsOnRemote: async () => true,
    fetchUpdates: async () => undefined,
    clone: async () => undefined,
    getRemoteUrl: async () => null,
  };
}

describe("checkDirty", () => {
  it("treats a local entry as clean without touching git", async () => {
    const sourceFor = vi.fn<(entry: RepositoryEntry) => GitSource>();

    const message = await checkDirty(localEntry("a", "Alpha"), sourceFor, reply)();

    expect(message).toEqual({ type: "deleteDirtyChecked", isDirty: false, error: undefined });
    expect(sourceFor).not.toHaveBeenCalled();
  });

  it("reports the working tree state of a remote entry", async () => {
    const entry = remoteEntry("b", "Beta");
    const sourceFor = vi.fn(() => sourceWith(async () => true));

    const message = await checkDirty(entry, sourceFor, reply)();

    expect(message).toEqual({ type: "deleteDirtyChecked", isDirty: true, error: undefined });
    expect(sourceFor).toHaveBeenCalledWith(entry);
  });

  it("turns a failed check into a reply carrying the error", async () => {
    const failure = new Error("not a git repository");
    const sourceFor = () =>
      sourceWith(async () => {
        throw failure;
      });

    const message = await checkDirty(remoteEntry("b", "Beta"), sourceFor, reply)();

    expect(message).toEqual({ type: "deleteDirtyChecked", isDirty: false, error: failure });
  });

  it("is lazy until the host runs it", () => {
    const sourceFor = vi.fn(() => sourceWith(async () => false));
    checkDirty(remoteEntry("b", "Beta"), sourceFor, reply);
    expect(sourceFor).not.toHaveBeenCalled();
  });
});

describe("dirtyStateWarning", () => {
  it("explains how to resolve the changes", () => {
    expect(dirtyStateWarning("/srv/rules").split("\n")).toEqual([
      "⚠️  Uncommitted Changes Detected",
      "",
      "The repository at /srv/rules has uncommitted changes.",
      "Resolve them before continuing:",
      "",
      "  1. Commit and push:  cd /srv/rules && git add . && git commit && git push",
      "  2. Discard them:     cd /srv/rules && git reset --hard",
    ]);
  });
});
