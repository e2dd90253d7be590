import { Command } from "commander";
import { canonicalPath } from "../core/home.js";
import { NodeFileSystem } from "../core/fs.js";
import { archive } from "../core/rebalance.js";
import { render, resolveFormat } from "../util/format.js";
import { handleError, resolveParentOpts } from "../util/cli-helpers.js";

export function makeArchiveCommand(): Command {
  const cmd = new Command("archive");

  cmd
    .description("Move a tagged file onto the archive code")
    .argument("<file>", "Grainorder-tagged file")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Renames the file to the reserved archive code zxvsnm, keeping its
  timestamp and name, so it sorts after every live file and frees its
  code. Archived files are never touched by rebalance.

EXAMPLES:
  $ grainkeep archive ~/notes/xbdghk-12025-10-28--1315-pdt--old-plan.md
`,
    );

  cmd.action(async (file: string) => {
    try {
      const format = resolveFormat(resolveParentOpts(cmd));
      const result = await archive(new NodeFileSystem(), canonicalPath(file));
      const output = render(result, format, () =>
        result.unchanged ? `Already archived: ${result.from}` : `Archived: ${result.to}`,
      );
      process.stdout.write(output + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
