import crypto from "crypto";
import { INTEGRITY_ALGORITHM } from "./constants";
import { IntegrityMismatchError, UnsupportedAlgorithmError } from "./errors";

/**
 * Computes the "sha512-<base64>" digest of some data, in the same format
 * the registry publishes under dist.integrity.
 */
export function computeIntegrity(data: Uint8Array): string {
  const hash = crypto
    .createHash(INTEGRITY_ALGORITHM)
    .update(data)
    .digest("base64");
  return `${INTEGRITY_ALGORITHM}-${hash}`;
}

/**
 * Compares the hash of a tarball's data against its expected digest. This
 * is how tarballs from the registry are checked for tampering or corruption.
 * @param expectedDigest Digest in "<algorithm>-<base64>" form. Only sha512
 * is accepted.
 * @param data Data of the file to hash.
 * @throws UnsupportedAlgorithmError if the digest is not a sha512 digest.
 * @throws IntegrityMismatchError if the hashes differ.
 */
export function verifyIntegrity(expectedDigest: string, data: Uint8Array): void {
  const parts = expectedDigest.split("-");
  if (parts.length !== 2 || parts[0] !== INTEGRITY_ALGORITHM) {
    throw new UnsupportedAlgorithmError(expectedDigest);
  }

  const actualDigest = computeIntegrity(data);
  // Case matters: base64 is case-sensitive.
  if (actualDigest !== expectedDigest) {
    throw new IntegrityMismatchError(expectedDigest, actualDigest);
  }
}
