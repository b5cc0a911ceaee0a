/**
 * Map of package name to semantic-version range, as found in a manifest's
 * "dependencies" section or in a published package's own dependencies.
 * For example: "semver": "^7.6.2"
 */
export type Dependencies = Record<string, string>;

/**
 * Represents the parts of package.json the package manager reads. Any other
 * keys are carried through untouched when the manifest is rewritten.
 */
export interface PackageJson {
  dependencies?: Dependencies;
  [key: string]: unknown;
}

/**
 * One published version of a package, as reported by the registry.
 */
export interface RegistryVersionRecord {
  // Exact version, e.g. "7.6.2".
  version: string;
  // URL of the tarball from where the package can be downloaded.
  artifactUrl: string;
  // Expected "sha512-<base64>" digest of the tarball.
  integrity: string;
  dependencies?: Dependencies;
}

/**
 * Persisted record of exactly what was installed for a package. The field
 * names are the on-disk JSON keys.
 */
export interface LockEntry {
  version: string;
  resolved_url: string;
  // Absent only in hand-written entries; the tarball is then installed
  // without verification.
  integrity?: string;
  dependencies?: Dependencies;
}

/**
 * The lock file: package name to its resolved installation record.
 */
export type LockFile = Record<string, LockEntry>;
