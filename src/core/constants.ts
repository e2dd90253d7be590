/**
 * Core constants for grainkeep.
 *
 * GRAINORDER SPACE:
 *   A grainorder is 6 distinct symbols drawn from a 13-letter alphabet.
 *   Codes order lexicographically, and since every symbol is a lowercase
 *   ASCII letter that is the same order `ls` uses. Smaller = newer.
 *
 *   bdghjk ............ xbdghj ............ zxvsnl  zxvsnm
 *   (minimum)        (start code)     (largest normal) (archive)
 *
 *   New files are allocated downwards from the newest code in a directory.
 *   A rebalance lays the whole directory out upwards from the start code,
 *   which leaves ~1M codes of headroom below it for newer files.
 */

/** Grainorder symbols in ascending order. */
export const ALPHABET = "bdghjklmnsvxz";

/** Symbols in the order they are preferred when minting a first code. */
export const PREFERENCE_ORDER = "xbdghjklmnsvz";

export const CODE_LENGTH = 6;

/** 13 · 12 · 11 · 10 · 9 · 8 */
export const CODE_SPACE_SIZE = 1_235_520;

/** First code handed out in an empty directory; newest file after a rebalance. */
export const START_CODE = PREFERENCE_ORDER.slice(0, CODE_LENGTH);

/** Largest code in the space, reserved for archived files. */
export const ARCHIVE_CODE = "zxvsnm";

/** Sentinel returned when stepping walks off the edge of the code space. */
export const EXHAUSTED = Symbol("grainorder.exhausted");
export type Exhausted = typeof EXHAUSTED;

// ─── Tagged filenames ────────────────────────────────────────────────

/**
 * {code}-{YYYYY}-{MM}-{DD}--{HHMM}-{tz}--{remainder}
 * e.g. xzvbdh-12025-10-28--1315-pdt--readme.md
 */
export const TAGGED_NAME_PATTERN =
  /^([a-z]{6})-(\d{5})-(\d{2})-(\d{2})--(\d{2})(\d{2})-([a-z]{3,4})--(.+)$/;

// ─── Registry ────────────────────────────────────────────────────────

/** Sentinel for a registry entry that has never been synced. */
export const NEVER_SYNCED = "never";

/** Hex length of the default SHA-256 content digest. */
export const DIGEST_LENGTH = 64;

export const REGISTRY_VERSION = 1;

/** Registry file inside the home directory. */
export const REGISTRY_FILE = "registry.yaml";

/** Lock file guarding registry read-modify-write. */
export const LOCK_FILE = "registry.lock";

/** Sentinel file that marks a directory as an initialized grainkeep home. */
export const HOME_MARKER = ".grainkeep";

/** Default home directory name under the user's home. */
export const DEFAULT_HOME_DIR = ".grainkeep";

/** Environment variable overriding the home directory. */
export const HOME_ENV = "GRAINKEEP_HOME";

export const LOCK_RETRY_MS = 50;
export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;

/** Locks older than this are assumed to belong to a dead process. */
export const STALE_LOCK_MS = 30_000;

/** Exit codes for the CLI. */
export const EXIT = {
  SUCCESS: 0,
  VALIDATION_ERROR: 1,
  FILESYSTEM_ERROR: 2,
  BAD_INPUT: 3,
} as const;
