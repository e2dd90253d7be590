import { access, mkdir, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  DEFAULT_HOME_DIR,
  HOME_ENV,
  HOME_MARKER,
  REGISTRY_FILE,
} from "./constants.js";
import { serializeRegistry } from "./store.js";
import { FilesystemError, HomeNotInitializedError, describeError } from "../util/errors.js";

/**
 * Canonical form of a user-supplied path: `~` expanded, made absolute
 * against the cwd, and normalized. Registry keys are always canonical.
 */
export function canonicalPath(path: string, home: string = homedir()): string {
  if (path === "~") return resolve(home);
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return resolve(path);
}

/**
 * Resolve the home directory. Priority: --home flag > $GRAINKEEP_HOME >
 * ~/.grainkeep.
 */
export function resolveHomePath(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const chosen = flag ?? env[HOME_ENV];
  if (chosen) return canonicalPath(chosen);
  return join(homedir(), DEFAULT_HOME_DIR);
}

/** Looks for the .grainkeep marker file. */
export async function isHomeInitialized(homePath: string): Promise<boolean> {
  return fileExists(join(homePath, HOME_MARKER));
}

/**
 * Require the home to be initialized. Throws HomeNotInitializedError if not.
 * Call this at the top of every registry command.
 */
export async function requireHome(homePath: string): Promise<void> {
  if (!(await isHomeInitialized(homePath))) {
    throw new HomeNotInitializedError(homePath);
  }
}

/**
 * Create the home directory with an empty registry and the marker file.
 * Idempotent: creates only what is missing, never overwrites.
 */
export async function initializeHome(homePath: string): Promise<void> {
  try {
    await mkdir(homePath, { recursive: true });
  } catch (err) {
    throw new FilesystemError(
      `Cannot create home directory at '${homePath}': ${describeError(err)}`,
    );
  }

  const registryPath = join(homePath, REGISTRY_FILE);
  if (!(await fileExists(registryPath))) {
    await writeFile(registryPath, serializeRegistry(new Map()), "utf-8");
  }

  const markerPath = join(homePath, HOME_MARKER);
  if (!(await fileExists(markerPath))) {
    await writeFile(
      markerPath,
      JSON.stringify({ version: "1.0.0", created: new Date().toISOString() }) + "\n",
      "utf-8",
    );
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
