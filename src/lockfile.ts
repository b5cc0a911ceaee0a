import fs from "fs/promises";
import { ConfigError, PersistenceError } from "./errors";
import { checkPathExists } from "./utils";
import { Dependencies, LockEntry, LockFile } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Stores a key as an own property. A plain assignment to "__proto__" would
 * replace the object's prototype instead.
 */
function setOwn<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Looks up the lock entry for a package. Only the lock file's own keys
 * count, so a package named after an Object.prototype member such as
 * "constructor" has no entry until one is recorded.
 */
export function getLockEntry(lock: LockFile, packageName: string): LockEntry | undefined {
  return Object.prototype.hasOwnProperty.call(lock, packageName)
    ? lock[packageName]
    : undefined;
}

/**
 * Records the lock entry for a package, replacing any previous one.
 */
export function setLockEntry(lock: LockFile, packageName: string, entry: LockEntry): void {
  setOwn(lock, packageName, entry);
}

function parseDependencies(
  packageName: string,
  value: unknown,
): Dependencies | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (
    !isRecord(value) ||
    !Object.values(value).every((range) => typeof range === "string")
  ) {
    throw new ConfigError(
      `Lock file entry for ${packageName} has invalid dependencies`,
      { context: { package: packageName } },
    );
  }

  const dependencies: Dependencies = {};
  for (const [name, range] of Object.entries(value)) {
    setOwn(dependencies, name, String(range));
  }
  return dependencies;
}

function parseLockEntry(packageName: string, value: unknown): LockEntry {
  if (
    !isRecord(value) ||
    typeof value.version !== "string" ||
    typeof value.resolved_url !== "string"
  ) {
    throw new ConfigError(
      `Lock file entry for ${packageName} needs a version and a resolved_url`,
      { context: { package: packageName } },
    );
  }

  const integrity = value.integrity;
  if (integrity !== undefined && typeof integrity !== "string") {
    throw new ConfigError(`Lock file entry for ${packageName} has an invalid integrity`, {
      context: { package: packageName },
    });
  }

  const entry: LockEntry = {
    version: value.version,
    resolved_url: value.resolved_url,
  };
  if (typeof integrity === "string") {
    entry.integrity = integrity;
  }
  const dependencies = parseDependencies(packageName, value.dependencies);
  if (dependencies) {
    entry.dependencies = dependencies;
  }
  return entry;
}

/**
 * Parses the contents of a lock file.
 * @throws ConfigError if the text is not a valid lock file.
 */
export function parseLockFile(text: string): LockFile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError("Error parsing lock file: invalid JSON", { cause: error });
  }
  if (!isRecord(data)) {
    throw new ConfigError("Error parsing lock file: expected an object");
  }

  const lock: LockFile = {};
  for (const [packageName, value] of Object.entries(data)) {
    setLockEntry(lock, packageName, parseLockEntry(packageName, value));
  }
  return lock;
}

function sortByKey<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    setOwn(sorted, key, record[key]);
  }
  return sorted;
}

/**
 * Serializes the lock file. Keys are sorted so that the same lock model
 * always produces the same bytes, whatever order packages were resolved in.
 */
export function serializeLockFile(lock: LockFile): string {
  const ordered: Record<string, LockEntry> = {};
  for (const [packageName, entry] of Object.entries(sortByKey(lock))) {
    setLockEntry(ordered, packageName, {
      version: entry.version,
      resolved_url: entry.resolved_url,
      integrity: entry.integrity,
      dependencies: entry.dependencies ? sortByKey(entry.dependencies) : undefined,
    });
  }
  // JSON.stringify leaves out the undefined fields.
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/**
 * Read the lock file.
 * @returns Promise of the lock file contents, or an empty lock file if it
 * doesn't exist yet.
 */
export async function readLockFile(lockPath: string): Promise<LockFile> {
  const lockFileExists = await checkPathExists(lockPath);
  if (!lockFileExists) {
    return {};
  }

  let fileContents: string;
  try {
    fileContents = await fs.readFile(lockPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Error reading lock file ${lockPath}`, {
      context: { path: lockPath },
      cause: error,
    });
  }
  return parseLockFile(fileContents);
}

/**
 * Saves the lock file. The content goes to a temporary file first and is
 * then renamed over the lock file, so a crash never leaves half a lock file.
 * @throws PersistenceError if the file can't be written.
 */
export async function saveLockFile(lockPath: string, lock: LockFile): Promise<void> {
  const tempPath = `${lockPath}.tmp`;
  try {
    await fs.writeFile(tempPath, serializeLockFile(lock));
    await fs.rename(tempPath, lockPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(
      `Failed to write lock file ${lockPath}: ${reason}`,
      lockPath,
      error,
    );
  }
  console.log(`Lock file saved at ${lockPath}`);
}
