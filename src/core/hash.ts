import { createHash } from "node:crypto";
import { DIGEST_LENGTH } from "./constants.js";

/**
 * Content digest used for drift detection. Any digest with negligible
 * collision probability works; the registry only stores and compares the
 * hex strings it returns.
 */
export interface ContentHasher {
  /** Hex length of every digest this hasher produces. */
  readonly digestLength: number;
  hash(data: Uint8Array): string;
}

export const sha256Hasher: ContentHasher = {
  digestLength: DIGEST_LENGTH,
  hash(data: Uint8Array): string {
    return createHash("sha256").update(data).digest("hex");
  },
};

/** True for "" (never synced) or a lowercase hex digest of the right length. */
export function isRecordedHash(value: string, digestLength = DIGEST_LENGTH): boolean {
  return value === "" || new RegExp(`^[0-9a-f]{${digestLength}}$`).test(value);
}
