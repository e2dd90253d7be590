import { Command } from "commander";
import { canonicalPath } from "../core/home.js";
import { NodeFileSystem } from "../core/fs.js";
import { allocateInDirectory } from "../core/allocator.js";
import { render, resolveFormat } from "../util/format.js";
import { handleError, resolveParentOpts } from "../util/cli-helpers.js";

export function makeNextCommand(): Command {
  const cmd = new Command("next");

  cmd
    .description("Print the next free grainorder for a directory")
    .argument("[dir]", "Directory of tagged files", ".")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Finds the newest (smallest) code among the directory's tagged files and
  prints the code one step below it, so a new file sorts first. An empty
  directory gets the start code xbdghj.

  Fails with exit 1 when no smaller code exists; rebalance the directory
  to make room.

EXAMPLES:
  $ grainkeep next ~/notes
  $ mv draft.md "$(grainkeep next --table)-12026-10-19--0930-pdt--draft.md"
`,
    );

  cmd.action(async (dir: string) => {
    try {
      const format = resolveFormat(resolveParentOpts(cmd));
      const target = canonicalPath(dir);
      const code = await allocateInDirectory(new NodeFileSystem(), target);
      process.stdout.write(render({ dir: target, code }, format, () => code) + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
