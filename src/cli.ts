import { defineCommand, runMain } from "citty";

const main = defineCommand({
  meta: {
    name: "rulebook",
    version: "0.1.0",
    description: "Manage the repositories your editor rules come from",
  },
  subCommands: {
    list: () => import("./commands/list.js").then((m) => m.default),
    settings: () => import("./commands/settings.js").then((m) => m.default),
  },
  // Default: open settings when no subcommand given.
  // citty calls this after a subcommand too, so skip when one was named.
  async run({ rawArgs }) {
    if (rawArgs.some((arg) => !arg.startsWith("-"))) return;

    const { runSettings } = await import("./commands/settings.js");
    await runSettings();
  },
});

void runMain(main);
