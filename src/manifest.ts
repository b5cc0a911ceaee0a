import fs from "fs/promises";
import { ConfigError } from "./errors";
import { Dependencies, PackageJson } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDependencies(value: unknown): value is Dependencies {
  return (
    isRecord(value) &&
    Object.values(value).every((range) => typeof range === "string")
  );
}

/**
 * Retrieves the package.json data.
 * @param manifestPath Path to package.json.
 * @returns Promise of parsed package.json object.
 * @throws ConfigError if package.json is missing, is not valid JSON or has a
 * malformed "dependencies" section.
 */
export async function readManifest(manifestPath: string): Promise<PackageJson> {
  let text: string;
  try {
    text = await fs.readFile(manifestPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`${manifestPath} does not exist. Please create it.`, {
      context: { path: manifestPath },
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Error reading ${manifestPath}: invalid JSON`, {
      context: { path: manifestPath },
      cause: error,
    });
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Error reading ${manifestPath}: expected an object`, {
      context: { path: manifestPath },
    });
  }

  const packageJson: PackageJson = {};
  for (const [key, value] of Object.entries(data)) {
    packageJson[key] = value;
  }

  const dependencies = data.dependencies;
  if (dependencies !== undefined) {
    if (!isDependencies(dependencies)) {
      throw new ConfigError(
        `Error reading ${manifestPath}: "dependencies" must map package names to version ranges`,
        { context: { path: manifestPath } },
      );
    }
    packageJson.dependencies = dependencies;
  }
  return packageJson;
}

/**
 * The direct dependencies of a manifest. No "dependencies" section means
 * there is nothing to install.
 */
export function getDependencies(packageJson: PackageJson): Dependencies {
  return packageJson.dependencies ?? {};
}

/**
 * Writes package.json back, pretty-printed.
 */
export async function writeManifest(
  manifestPath: string,
  packageJson: PackageJson,
): Promise<void> {
  await fs.writeFile(manifestPath, `${JSON.stringify(packageJson, null, 2)}\n`);
}
