import { Command } from "commander";
import { createInterface } from "node:readline/promises";
import { canonicalPath } from "../core/home.js";
import { NodeFileSystem } from "../core/fs.js";
import { apply, plan, scan } from "../core/rebalance.js";
import { RenamePartialFailureError } from "../util/errors.js";
import { formatPlan, formatRenames, resolveFormat } from "../util/format.js";
import { handleError, resolveParentOpts, warn } from "../util/cli-helpers.js";

export function makeRebalanceCommand(): Command {
  const cmd = new Command("rebalance");

  cmd
    .description("Reassign dense grainorders to a directory's tagged files")
    .argument("<dir>", "Directory of grainorder-tagged files")
    .option("--dry-run", "Show the renames without asking or applying them")
    .option("-y, --yes", "Apply without asking for confirmation")
    .option("--start <code>", "Code given to the newest file")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Sorts the directory's tagged files by timestamp, newest first, and gives
  them consecutive grainorders from the start code (default xbdghj)
  upwards, so 'ls' lists them newest first with the codes packed tight.
  Only the code changes; timestamp and name are kept exactly.

  Tagged filename:  {code}-{YYYYY}-{MM}-{DD}--{HHMM}-{tz}--{name}
                    xzvbdh-12025-10-28--1315-pdt--readme.md

  Files that do not match are ignored. Archived files (code zxvsnm) are
  left where they are.

SAFETY:
  No two files ever hold the same code, even mid-way. If a rename fails,
  the ones done so far stay done, the rest are listed, and running
  rebalance again picks up from the current state.

EXAMPLES:
  $ grainkeep rebalance ~/notes --dry-run --table
  $ grainkeep rebalance ~/notes --yes
`,
    );

  cmd.action(
    async (dir: string, opts: { dryRun?: boolean; yes?: boolean; start?: string }) => {
      try {
        const format = resolveFormat(resolveParentOpts(cmd));
        const fs = new NodeFileSystem();
        const target = canonicalPath(dir);

        const scanned = await scan(fs, target);
        const p = plan(target, scanned.files, { start: opts.start });
        process.stdout.write(formatPlan(p, format) + "\n");

        const changes = p.steps.filter((s) => !s.unchanged).length;
        if (opts.dryRun || changes === 0) return;

        if (!opts.yes && !(await confirm(`Rename ${changes} file(s)? [y/N] `))) {
          warn("rebalance cancelled, nothing renamed");
          return;
        }

        try {
          const result = await apply(fs, p);
          process.stdout.write(formatRenames(result.renamed, [], [], format) + "\n");
        } catch (err) {
          if (err instanceof RenamePartialFailureError) {
            process.stdout.write(
              formatRenames(err.renamed, err.pending, err.failures, format) + "\n",
            );
          }
          throw err;
        }
      } catch (err) {
        handleError(err);
      }
    },
  );

  return cmd;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
