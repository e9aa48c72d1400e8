import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { readRegistry, serializeRegistry } from "../lib/registry.js";
import { formatRelativeTime, pluralize, toUserPath } from "../lib/ui-utils.js";
import type { RepositoryEntry } from "../types/index.js";

export default defineCommand({
  meta: {
    name: "list",
    description: "List configured rule repositories",
  },
  args: {
    json: {
      type: "boolean",
      description: "Print the registry as JSON",
    },
  },
  async run({ args }) {
    const registry = await readRegistry();

    if (args.json) {
      process.stdout.write(serializeRegistry(registry));
      return;
    }

    p.intro("rulebook list");

    if (registry.repositories.length === 0) {
      p.log.info("No repositories configured. Run 'rulebook' to add one.");
      p.outro("Nothing to show");
      return;
    }

    for (const entry of registry.repositories) {
      p.log.message(formatEntry(entry));
    }

    const count = registry.repositories.length;
    p.outro(`${count} ${pluralize("repository", count)}`);
  },
});

export function formatEntry(entry: RepositoryEntry, now: Date = new Date()): string {
  const icon = entry.kind === "remote" ? "🔗" : "📁";
  const lines = [`${icon} ${pc.bold(entry.name)}`, `   ${pc.dim(toUserPath(entry.path))}`];

  if (entry.kind === "remote") {
    lines.push(`   ${pc.dim(`${entry.remoteUrl ?? ""} (${entry.branch ?? "default branch"})`)}`);
  }
  if (entry.lastSyncedAt) {
    lines.push(`   ${pc.dim(`synced ${formatRelativeTime(entry.lastSyncedAt, now)}`)}`);
  }

  return lines.join("\n");
}
