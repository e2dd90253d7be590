import { Command } from "commander";
import { handleError, openContext } from "../util/cli-helpers.js";
import { render } from "../util/format.js";

export function makeRemoveSourceCommand(): Command {
  const cmd = new Command("remove-source");

  cmd
    .description("Delete a source's registry entry")
    .argument("<source>", "Registered source file")
    .option("--force", "Remove even if mirrors are still registered")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Removes the source from the registry. Refuses while the entry still has
  mirrors, so an entry is never dropped by accident; --force overrides.
  No file on disk is touched.
`,
    );

  cmd.action(async (source: string, opts: { force?: boolean }) => {
    try {
      const ctx = await openContext(cmd);
      const result = await ctx.registry.removeSource(source, { force: opts.force });

      const output = render(result, ctx.format, () =>
        result.mirrors.length > 0
          ? `Removed: ${result.source} (dropped ${result.mirrors.length} mirror(s))`
          : `Removed: ${result.source}`,
      );
      process.stdout.write(output + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
