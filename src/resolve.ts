import semver from "semver";
import {
  ConfigError,
  InvalidRangeError,
  ResolutionNotFoundError,
} from "./errors";

/**
 * Picks the version of a package to install for a version range. The highest
 * published version satisfying the range wins.
 * @param packageName Name of the package, used in error messages.
 * @param versionRange The requested range, e.g. "^7.6.2" or "7.6.2".
 * @param availableVersions Every version string the registry lists.
 * @returns The exact version to install.
 * @throws InvalidRangeError if the range does not parse.
 * @throws ResolutionNotFoundError if no published version satisfies it.
 */
export function resolveVersion(
  packageName: string,
  versionRange: string,
  availableVersions: string[],
): string {
  // A pinned version that was published as-is needs no range matching.
  if (availableVersions.includes(versionRange)) {
    return versionRange;
  }

  if (semver.validRange(versionRange) === null) {
    throw new InvalidRangeError(versionRange, packageName);
  }

  // Registries may list legacy versions that are not valid semver; those
  // are left out rather than treated as errors.
  const matching = availableVersions
    .filter((version) => semver.valid(version) !== null)
    .filter((version) => semver.satisfies(version, versionRange))
    .sort(semver.compare);

  const highest = matching[matching.length - 1];
  if (highest === undefined) {
    throw new ResolutionNotFoundError(packageName, versionRange);
  }
  return highest;
}

/**
 * Checks whether a version recorded in the lock file still satisfies the
 * range requested for it.
 * @throws InvalidRangeError if the range does not parse.
 * @throws ConfigError if the locked version is not valid semver.
 */
export function satisfiesLockedVersion(
  packageName: string,
  versionRange: string,
  lockedVersion: string,
): boolean {
  if (versionRange === lockedVersion) {
    return true;
  }
  if (semver.validRange(versionRange) === null) {
    throw new InvalidRangeError(versionRange, packageName);
  }
  if (semver.valid(lockedVersion) === null) {
    throw new ConfigError(
      `Locked version "${lockedVersion}" of ${packageName} is not a valid version`,
      { context: { package: packageName, version: lockedVersion } },
    );
  }
  return semver.satisfies(lockedVersion, versionRange);
}
