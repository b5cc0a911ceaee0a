import semver from "semver";
import { InstallConfig } from "./config";
import { InvalidRangeError, RegistryError } from "./errors";
import { readManifest, writeManifest } from "./manifest";
import { RegistryClient } from "./registry";
import { parsePackageSpecifier } from "./utils";

/**
 * Adds a package and its version range to the package.json dependencies.
 * @param packageSpecifier The package in the format
 * "<packageName>@<versionRange>". If the range is omitted, the registry's
 * latest version is looked up and a caret range on it is recorded.
 * @returns Promise of the range that was recorded.
 * @throws InvalidRangeError if the given range does not parse.
 * @throws RegistryError if the registry has no "latest" version.
 */
export async function addPackage(
  packageSpecifier: string,
  config: InstallConfig,
  registry: RegistryClient,
): Promise<string> {
  const [packageName, requestedRange] = parsePackageSpecifier(packageSpecifier);

  let versionRange: string;
  if (requestedRange === undefined) {
    const distTags = await registry.getDistTags(packageName);
    const latest = distTags.latest;
    if (latest === undefined) {
      throw new RegistryError(`${packageName} has no latest version`, packageName);
    }
    versionRange = `^${latest}`;
  } else if (semver.validRange(requestedRange) === null) {
    throw new InvalidRangeError(requestedRange, packageName);
  } else {
    versionRange = requestedRange;
  }

  // Retrieve the current package.json content.
  const packageJson = await readManifest(config.packageJsonPath);
  // Add or update the dependency.
  packageJson.dependencies = {
    ...packageJson.dependencies,
    [packageName]: versionRange,
  };

  await writeManifest(config.packageJsonPath, packageJson);
  console.log(`Added ${packageName}@${versionRange} to package.json`);
  return versionRange;
}
