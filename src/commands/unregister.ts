import { Command } from "commander";
import { handleError, openContext } from "../util/cli-helpers.js";
import { render } from "../util/format.js";
import type { UnregisterResult } from "../core/registry.js";

export function makeUnregisterCommand(): Command {
  const cmd = new Command("unregister");

  cmd
    .description("Stop mirroring a source to one or more paths")
    .argument("<source>", "Registered source file")
    .argument("<mirrors...>", "Mirror paths to drop")
    .option("--strict", "Fail if a mirror is not registered for the source")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Removes mirror paths from the source's entry. The mirror files on disk
  are left alone. The entry itself stays, even with zero mirrors; use
  'grainkeep remove-source' to drop it.

  Removing a mirror that is not registered is a no-op unless --strict.

EXAMPLES:
  $ grainkeep unregister ~/notes/readme.md ~/repos/site/readme.md
`,
    );

  cmd.action(async (source: string, mirrors: string[], opts: { strict?: boolean }) => {
    try {
      const ctx = await openContext(cmd);

      const results: UnregisterResult[] = [];
      for (const mirror of mirrors) {
        results.push(
          await ctx.registry.unregister(source, mirror, { strict: opts.strict }),
        );
      }

      const output = render(results, ctx.format, () =>
        results
          .map((r) =>
            r.removed
              ? `Unregistered: ${r.source} → ${r.mirror}`
              : `Not registered (nothing to do): ${r.source} → ${r.mirror}`,
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
