import fs from "fs/promises";

/**
 * Checks if a path exists in the file system.
 * @param path The file or directory path to check.
 * @returns Promise of true if path exists, or false otherwise.
 */
export async function checkPathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    // We successfully accessed the file, so it exists.
    return true;
  } catch {
    // We failed to access, so it doesn't exist.
    return false;
  }
}

/**
 * Creates a directory (and its parents) if it doesn't exist yet.
 */
export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  const exists = await checkPathExists(dirPath);
  if (!exists) {
    console.log(`'${dirPath}' directory does not exist. Creating...`);
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Parses a package specifier into its name and version range components.
 * A specifier follows the format "<packageName>[@<versionRange>]", e.g.
 * "semver@^7.6.2" or just "semver".
 * There is a bit more logic involved than just splitting on the '@' symbol
 * because we could have scoped packages, e.g. "@jridgewell/resolve-uri@3.1.2".
 * @returns Tuple of package name and version range, the range being
 * undefined when the specifier has none.
 */
export function parsePackageSpecifier(
  specifier: string,
): [string, string | undefined] {
  // Find index of last '@' character which separates package name and range.
  // An '@' at index 0 only marks a scope.
  const atIndex = specifier.lastIndexOf("@");
  if (atIndex <= 0) {
    return [specifier, undefined];
  }
  const packageName = specifier.substring(0, atIndex);
  const versionRange = specifier.substring(atIndex + 1);
  return [packageName, versionRange === "" ? undefined : versionRange];
}
