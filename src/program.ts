import { Command } from "commander";
import { makeInitCommand } from "./commands/init.js";
import { makeRegisterCommand } from "./commands/register.js";
import { makeUnregisterCommand } from "./commands/unregister.js";
import { makeRemoveSourceCommand } from "./commands/remove-source.js";
import { makeListCommand } from "./commands/list.js";
import { makeSyncCommand } from "./commands/sync.js";
import { makeVerifyCommand } from "./commands/verify.js";
import { makeRebalanceCommand } from "./commands/rebalance.js";
import { makeNextCommand } from "./commands/next.js";
import { makeCodeCommand } from "./commands/code.js";
import { makeArchiveCommand } from "./commands/archive.js";

/** The grainkeep program with every subcommand attached. */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name("grainkeep")
    .version("1.0.0")
    .description("Mirror files across directories and name them with grainorders")
    .option(
      "--home <path>",
      "Registry home (default: $GRAINKEEP_HOME or ~/.grainkeep)",
    )
    .option("--json", "Output as JSON (pretty-printed)")
    .option("--table", "Output as human-readable text (for terminal use)")
    .option(
      "--lock-timeout <ms>",
      "How long to wait for another process's registry lock (default: 5000)",
    )
    .addHelpText(
      "after",
      `
PURPOSE:
  grainkeep does two small jobs that fit together:

  1. MIRRORS. Keep hard copies of a file in other places (another repo, a
     backup disk, a synced folder) and notice when a copy drifts.
     The registry remembers which source goes where, the SHA-256 of the
     source at the last sync, and when that sync happened.

  2. GRAINORDERS. Prefix file names with a six-letter code so that a
     plain 'ls' lists the newest file first:

       xbdghj-12026-10-19--0930-pdt--plan.md      ← newest
       xbdghk-12026-10-12--1800-pdt--notes.md
       xbdghl-12025-10-28--1315-pdt--readme.md    ← oldest

     Codes are 6 distinct letters from "bdghjklmnsvxz" (1,235,520 codes).
     A new file takes the code just below the newest one ('grainkeep next');
     'grainkeep rebalance' re-packs a directory by timestamp.

REGISTRY (created by 'grainkeep init'):
  <home>/
  ├── registry.yaml     source → { mirrors, lastSync, hash }
  └── .grainkeep        Home marker file

OUTPUT FORMATS:
  (default) TOON. Compact structured output.
  --json:   Standard JSON. For scripts and programmatic parsing.
  --table:  Human-readable lines. For terminal viewing.

EXIT CODES:
  0  Success
  1  Operation reported failure (drift, failed mirror write, exhausted
     code space, incomplete rebalance)
  2  Filesystem error (home not initialized, source missing or unreadable,
     registry corrupt or locked)
  3  Bad input (invalid grainorder, unregistered source, bad argument)

COMMANDS:
  init                          Create the registry home
  register <src> <mirror...>    Add mirrors for a source
  unregister <src> <mirror...>  Drop mirrors
  remove-source <src>           Drop a source entry
  list                          Show the registry
  sync [src]                    Copy sources to mirrors
  verify [src]                  Detect missing or drifted mirrors
  rebalance <dir>               Re-pack grainorders by timestamp
  next [dir]                    Next free grainorder for a directory
  code <code>                   Validate and inspect a grainorder
  archive <file>                Move a file onto the archive code

TYPICAL SESSION:
  $ grainkeep init
  $ grainkeep register ~/notes/readme.md ~/repos/site/readme.md
  $ grainkeep sync
  $ grainkeep verify --table

Run 'grainkeep <command> --help' for full flag syntax and more examples.
`,
    );

  program.addCommand(makeInitCommand());
  program.addCommand(makeRegisterCommand());
  program.addCommand(makeUnregisterCommand());
  program.addCommand(makeRemoveSourceCommand());
  program.addCommand(makeListCommand());
  program.addCommand(makeSyncCommand());
  program.addCommand(makeVerifyCommand());
  program.addCommand(makeRebalanceCommand());
  program.addCommand(makeNextCommand());
  program.addCommand(makeCodeCommand());
  program.addCommand(makeArchiveCommand());

  return program;
}
