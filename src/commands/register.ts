import { Command } from "commander";
import { handleError, openContext } from "../util/cli-helpers.js";
import { render } from "../util/format.js";
import type { RegisterResult } from "../core/registry.js";

export function makeRegisterCommand(): Command {
  const cmd = new Command("register");

  cmd
    .description("Register one or more mirrors for a source file")
    .argument("<source>", "File whose content is mirrored")
    .argument("<mirrors...>", "Paths that receive copies of the source")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Adds mirror paths to the source's registry entry, creating the entry if
  this is the first mirror. Paths are stored absolute with ~ expanded.
  Nothing is copied yet: run 'grainkeep sync' afterwards.

  Idempotent: registering a pair that already exists reports
  "already registered" and changes nothing.

ERRORS:
  Source not found (exit 2)     the source file does not exist
  A file cannot mirror itself   source and mirror are the same path

EXAMPLES:
  $ grainkeep register ~/notes/readme.md ~/repos/site/readme.md
  $ grainkeep register ./todo.md /mnt/backup/todo.md ~/phone/todo.md
`,
    );

  cmd.action(async (source: string, mirrors: string[]) => {
    try {
      const ctx = await openContext(cmd);

      const results: RegisterResult[] = [];
      for (const mirror of mirrors) {
        results.push(await ctx.registry.register(source, mirror));
      }

      const output = render(results, ctx.format, () =>
        results
          .map((r) =>
            r.status === "registered"
              ? `Registered: ${r.source} → ${r.mirror}`
              : `Already registered: ${r.source} → ${r.mirror}`,
          )
          .join("\n"),
      );
      process.stdout.write(output + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
