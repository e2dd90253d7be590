import { Command } from "commander";
import { ARCHIVE_CODE, CODE_SPACE_SIZE, EXHAUSTED } from "../core/constants.js";
import { assertValid, isArchive, predecessor, rank, successor } from "../core/grainorder.js";
import { render, resolveFormat } from "../util/format.js";
import { handleError, resolveParentOpts } from "../util/cli-helpers.js";

export function makeCodeCommand(): Command {
  const cmd = new Command("code");

  cmd
    .description("Validate a grainorder and show its neighbours")
    .argument("<code>", "Six-letter grainorder")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Checks that <code> is 6 distinct letters from "bdghjklmnsvxz" and
  prints its rank in the ${CODE_SPACE_SIZE.toLocaleString("en-US")}-code space and the
  codes directly before (newer) and after (older) it. "exhausted" means
  the edge of the space. ${ARCHIVE_CODE} is reserved for archived files.

EXAMPLES:
  $ grainkeep code xbdghj
  $ grainkeep code xzvbdh --json
`,
    );

  cmd.action(async (code: string) => {
    try {
      const format = resolveFormat(resolveParentOpts(cmd));
      assertValid(code);

      const before = predecessor(code);
      const after = successor(code);
      const info = {
        code,
        rank: rank(code),
        archive: isArchive(code),
        newer: before === EXHAUSTED ? "exhausted" : before,
        older: after === EXHAUSTED ? "exhausted" : after,
      };

      const output = render(info, format, () =>
        [
          `${info.code}${info.archive ? " (archive)" : ""}`,
          `  rank   ${info.rank} of ${CODE_SPACE_SIZE}`,
          `  newer  ${info.newer}`,
          `  older  ${info.older}`,
        ].join("\n"),
      );
      process.stdout.write(output + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
