import { describe, it, expect } from "vitest";
import { commitRegistry } from "../../../src/lib/settings/reconcile.js";
import { createHarness, localEntry, registryOf, remoteEntry } from "./harness.js";

describe("commitRegistry", () => {
  it("saves, prepares and reports the committed registry", async () => {
    const h = createHarness([localEntry("a", "Alpha")]);
    const next = registryOf(localEntry("a", "Alpha"), localEntry("b", "Beta"));

    const message = await commitRegistry(h.ctrl, "addLocal", next);

    expect(h.saves).toEqual([next]);
    expect(h.prepare).toHaveBeenCalledWith(next.repositories);
    expect(message).toMatchObject({ type: "mutationCommitted", flow: "addLocal", registry: next });
  });

  it("does not adopt anything itself", async () => {
    const h = createHarness([localEntry("a", "Alpha")]);
    const before = h.ctrl.registry;

    await commitRegistry(h.ctrl, "rename", registryOf(localEntry("a", "Renamed")));

    expect(h.ctrl.registry).toBe(before);
  });

  it("skips the save when asked to", async () => {
    const h = createHarness([remoteEntry("b", "Beta")]);

    const message = await commitRegistry(h.ctrl, "updateToken", h.ctrl.registry, {
      persist: false,
    });

    expect(h.saves).toEqual([]);
    expect(message.type).toBe("mutationCommitted");
  });

  it("reports a failed save as the flow's failure", async () => {
    const h = createHarness([localEntry("a", "Alpha")]);
    h.saveError.current = new Error("disk full");

    const message = await commitRegistry(h.ctrl, "delete", registryOf());

    expect(message).toMatchObject({ type: "deleteFailed" });
    expect(message.type === "deleteFailed" && message.error.message).toBe(
      "failed to save configuration: disk full"
    );
    expect(h.prepare).not.toHaveBeenCalled();
  });

  it("keeps an entry that cannot be prepared off disk", async () => {
    const h = createHarness([]);
    const entry = remoteEntry("c", "Gamma");
    h.prepareFailures.set(entry.path, new Error("clone failed"));

    const message = await commitRegistry(h.ctrl, "addRemote", registryOf(entry), {
      requirePrepared: entry.id,
      translate: (error) => new Error(`translated: ${error.message}`),
    });

    expect(h.saves).toEqual([]);
    expect(message.type === "addRemoteFailed" && message.error.message).toBe(
      "translated: clone failed"
    );
  });

  it("prepares once when the entry must be ready first", async () => {
    const h = createHarness([]);
    const entry = remoteEntry("c", "Gamma");

    const message = await commitRegistry(h.ctrl, "addRemote", registryOf(entry), {
      requirePrepared: entry.id,
    });

    expect(h.prepare).toHaveBeenCalledTimes(1);
    expect(h.saves).toHaveLength(1);
    expect(message.type).toBe("mutationCommitted");
  });

  it("passes on preparation failures of other entries", async () => {
    const h = createHarness([]);
    const broken = remoteEntry("b", "Beta");
    h.prepareFailures.set(broken.path, new Error("authentication required"));

    const message = await commitRegistry(h.ctrl, "rename", registryOf(broken));

    expect(message.type === "mutationCommitted" && message.prepared.failures).toEqual([
      { id: "b", error: new Error("authentication required") },
    ]);
  });
});
