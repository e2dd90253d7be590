import { Command } from "commander";
import { exitUnless, handleError, openContext } from "../util/cli-helpers.js";
import { formatVerifyAll } from "../util/format.js";
import type { VerifyAllResult } from "../core/verify.js";

export function makeVerifyCommand(): Command {
  const cmd = new Command("verify");

  cmd
    .description("Check every mirror against its source's current content")
    .argument("[source]", "Verify only this source (default: every source)")
    .option("--quiet", "Exit code only (0=all in sync, 1=drift found)")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Hashes each source and each mirror and compares them. Nothing is
  written.

CHECKS PERFORMED:
  missing     a mirror path does not exist
  drifted     a mirror's content differs from the source as it is NOW
  unreadable  a mirror exists but could not be read
  source changed since last sync
              the source no longer matches the hash recorded at the last
              sync. Informational only: if the mirrors already carry the new
              content they are still in sync.

EXIT CODES:
  0  every mirror of every checked source is in sync
  1  at least one mirror is missing, drifted or unreadable

EXAMPLES:
  $ grainkeep verify --table
  $ grainkeep verify --quiet || grainkeep sync
`,
    );

  cmd.action(async (source: string | undefined, opts: { quiet?: boolean }) => {
    try {
      const ctx = await openContext(cmd);

      let result: VerifyAllResult;
      if (source !== undefined) {
        const report = await ctx.verifyEngine.verify(source);
        result = { reports: [report], ok: report.allInSync };
      } else {
        result = await ctx.verifyEngine.verifyAll();
      }

      if (!opts.quiet) {
        process.stdout.write(formatVerifyAll(result, ctx.format) + "\n");
      }
      exitUnless(result.ok);
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
