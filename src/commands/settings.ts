import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import { ensureConfigDir, ensureStorageDir } from "../lib/config.js";
import { FileCredentialManager } from "../lib/credentials.js";
import { toError } from "../lib/errors.js";
import { createGitSource } from "../lib/git.js";
import { createLogger, flushJournal } from "../lib/logger.js";
import { getDirectoryStatus, nodePathUtilities } from "../lib/paths.js";
import { createPreparer } from "../lib/preparation.js";
import { readRegistry, writeRegistry } from "../lib/registry.js";
import { SettingsController } from "../lib/settings/controller.js";
import { SettingsHost, type SettingsHostOptions } from "../lib/settings/host.js";
import { validateRegistry } from "../lib/validation.js";
import { pluralize } from "../lib/ui-utils.js";

const log = createLogger("settings");

export default defineCommand({
  meta: {
    name: "settings",
    description: "Manage rule repositories interactively",
  },
  args: {},
  async run() {
    await runSettings();
  },
});

export async function runSettings(options: SettingsHostOptions = {}): Promise<void> {
  p.intro("rulebook settings");

  try {
    await ensureConfigDir();
    await ensureStorageDir();

    const credentials = new FileCredentialManager();
    const prepare = createPreparer({
      gitSource: createGitSource,
      getDirectoryStatus,
      async getToken() {
        try {
          return await credentials.get();
        } catch (error) {
          log.debug("Preparing without a token", { error: toError(error).message });
          return undefined;
        }
      },
    });

    const registry = await readRegistry();
    for (const problem of validateRegistry(registry)) {
      log.warn(`Registry: ${problem}`);
    }

    const s = p.spinner();
    const count = registry.repositories.length;
    s.start(`Preparing ${count} ${pluralize("repository", count)}...`);
    const prepared = await prepare(registry.repositories);
    s.stop(`Prepared ${prepared.repositories.length} ${pluralize("repository", prepared.repositories.length)}`);

    for (const failure of prepared.failures) {
      log.warn("Repository could not be prepared", { id: failure.id, error: failure.error.message });
    }
    flushJournal();

    const controller = new SettingsController(registry, prepared.repositories, {
      paths: nodePathUtilities,
      credentials,
      gitSource: createGitSource,
      prepare,
      loadRegistry: () => readRegistry(),
      saveRegistry: (next) => writeRegistry(next),
      logger: log,
    });

    await new SettingsHost(controller, options).run();
  } catch (error) {
    flushJournal();
    p.log.error(toError(error).message);
    process.exit(1);
  }

  flushJournal();
  p.outro("Settings closed");
}
