import { Command } from "commander";
import {
  resolveHomePath,
  isHomeInitialized,
  initializeHome,
} from "../core/home.js";
import { handleError, resolveParentOpts } from "../util/cli-helpers.js";

export function makeInitCommand(): Command {
  const cmd = new Command("init");

  cmd
    .description("Create the grainkeep home (registry + marker)")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Creates the home directory that holds the mirror registry. Every
  registry command (register, unregister, list, sync, verify) requires an
  initialized home and fails with exit 2 if there is none. The grainorder
  commands (code, next, rebalance, archive) work without one.

  Created structure:
    <home>/
    ├── registry.yaml   Source → mirrors mapping, hashes, last sync times
    └── .grainkeep      Marker file proving the home is initialized

  registry.lock appears next to them while a command is updating the
  registry.

  Idempotent: safe to run multiple times. Never overwrites existing files.

OUTPUT:
  "Initialized grainkeep home at <path>"   — first time
  "Home already initialized at <path>"     — subsequent runs

EXAMPLES:
  $ grainkeep init
  $ grainkeep --home ~/sync/grainkeep init
  $ GRAINKEEP_HOME=/srv/gk grainkeep init
`,
    );

  cmd.action(async () => {
    try {
      const homePath = resolveHomePath(resolveParentOpts(cmd).home);
      const alreadyInit = await isHomeInitialized(homePath);

      await initializeHome(homePath);

      if (alreadyInit) {
        process.stdout.write(`Home already initialized at ${homePath}\n`);
      } else {
        process.stdout.write(`Initialized grainkeep home at ${homePath}\n`);
      }
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
