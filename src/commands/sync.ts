import { Command } from "commander";
import { exitUnless, handleError, openContext } from "../util/cli-helpers.js";
import { formatSyncAll } from "../util/format.js";
import type { SyncAllResult } from "../core/sync.js";

export function makeSyncCommand(): Command {
  const cmd = new Command("sync");

  cmd
    .description("Copy sources to their mirrors and record their hashes")
    .argument("[source]", "Sync only this source (default: every source)")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Reads each source, writes its bytes verbatim to every registered mirror
  (creating parent directories), and records the source's SHA-256 and the
  sync time in the registry.

  A mirror that cannot be written is reported and the other mirrors are
  still written. The recorded hash always describes the source as it was
  read, so 'grainkeep verify' will show the failed mirror as missing or
  drifted until the next successful sync.

  Without <source>, every registered source is synced in path order; a
  source that cannot be read is reported and the rest continue.

EXIT CODES:
  0  every source synced and every mirror written
  1  at least one source or mirror failed
  2  (single source) the source could not be read

EXAMPLES:
  $ grainkeep sync
  $ grainkeep sync ~/notes/readme.md --table
`,
    );

  cmd.action(async (source: string | undefined) => {
    try {
      const ctx = await openContext(cmd);

      let result: SyncAllResult;
      if (source !== undefined) {
        const one = await ctx.syncEngine.sync(source);
        result = { outcomes: [{ status: "synced", ...one }], ok: one.ok };
      } else {
        result = await ctx.syncEngine.syncAll();
      }

      process.stdout.write(formatSyncAll(result, ctx.format) + "\n");
      exitUnless(result.ok);
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
