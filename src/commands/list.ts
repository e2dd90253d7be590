import { Command } from "commander";
import { handleError, openContext } from "../util/cli-helpers.js";
import { formatListing } from "../util/format.js";

export function makeListCommand(): Command {
  const cmd = new Command("list");

  cmd
    .description("Show every registered source and its mirrors")
    .addHelpText(
      "after",
      `
OUTPUT:
  Default (TOON) / --json: [{ source, mirrors, lastSync, hash }]
  --table:
    /home/me/notes/readme.md  (last sync: 2026-10-19T08:00:00.000Z, hash: 2cf24dba5fb0)
      → /home/me/repos/site/readme.md
`,
    );

  cmd.action(async () => {
    try {
      const ctx = await openContext(cmd);
      const listing = await ctx.registry.list();
      process.stdout.write(formatListing(listing, ctx.format) + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
