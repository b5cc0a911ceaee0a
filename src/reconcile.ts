import path from "path";
import { NODE_MODULES_NAME } from "./constants";
import { getLockEntry, setLockEntry } from "./lockfile";
import { RegistryClient } from "./registry";
import { resolveVersion, satisfiesLockedVersion } from "./resolve";
import { fetchAndInstall, TarballServices } from "./tarball";
import { Dependencies, LockFile } from "./types";

/**
 * Collaborators the reconciliation talks to.
 */
export interface ReconcileServices extends TarballServices {
  registry: RegistryClient;
}

/**
 * Counts of what a reconciliation did, for the final report.
 */
export interface ReconcileSummary {
  // Packages installed from an existing lock file entry.
  reused: number;
  // Packages resolved against the registry.
  resolved: number;
  // Packages not installed because they already sit above themselves in
  // the tree.
  skippedCycles: number;
}

export function createSummary(): ReconcileSummary {
  return { reused: 0, resolved: 0, skippedCycles: 0 };
}

/**
 * Installs a package and walks into its own dependencies, unless the same
 * name@version is already being installed further up the current path. In
 * that case Node's module lookup finds the ancestor's copy, so the package is
 * skipped instead of recursing forever.
 * @returns false if the package was skipped as a cycle.
 */
async function installWithDependencies(
  packageName: string,
  version: string,
  url: string,
  integrity: string | undefined,
  dependencies: Dependencies | undefined,
  lock: LockFile,
  installRoot: string,
  services: ReconcileServices,
  ancestry: ReadonlySet<string>,
  summary: ReconcileSummary,
): Promise<boolean> {
  const packageIdentifier = `${packageName}@${version}`;
  if (ancestry.has(packageIdentifier)) {
    console.warn(
      `Dependency cycle: ${packageIdentifier} is already installed above ${installRoot}, skipping.`,
    );
    summary.skippedCycles++;
    return false;
  }

  const packageDir = await fetchAndInstall(
    url,
    packageName,
    integrity,
    installRoot,
    services,
  );

  if (dependencies && Object.keys(dependencies).length > 0) {
    await reconcile(
      dependencies,
      lock,
      path.join(packageDir, NODE_MODULES_NAME),
      services,
      new Set([...ancestry, packageIdentifier]),
      summary,
    );
  }
  return true;
}

/**
 * Installs one level of dependencies into installRoot and recurses into each
 * package's own dependencies, which land in a node_modules directory nested
 * inside that package.
 *
 * For every dependency:
 * 1. If the lock file has an entry for it whose version still satisfies the
 *    requested range, that exact tarball is installed and the registry is
 *    not consulted. The entry is left as it is.
 * 2. Otherwise the registry is asked for the highest version satisfying the
 *    range, which is installed and then recorded in the lock file.
 *
 * Dependencies are processed one at a time and the first error aborts the
 * whole reconciliation. Lock file entries recorded before the error stay in
 * `lock`, and files already extracted stay on disk.
 * @param dependencyRequests Map of package name to version range.
 * @param lock Lock file model, updated in place.
 * @param installRoot node_modules directory to install into.
 * @param services Registry, transport and extractor to use.
 * @param ancestry name@version of every package on the path from the root
 * down to installRoot.
 * @param summary Counters updated as packages are processed.
 */
export async function reconcile(
  dependencyRequests: Dependencies,
  lock: LockFile,
  installRoot: string,
  services: ReconcileServices,
  ancestry: ReadonlySet<string> = new Set(),
  summary: ReconcileSummary = createSummary(),
): Promise<ReconcileSummary> {
  for (const [packageName, versionRange] of Object.entries(dependencyRequests)) {
    const lockEntry = getLockEntry(lock, packageName);
    if (
      lockEntry &&
      satisfiesLockedVersion(packageName, versionRange, lockEntry.version)
    ) {
      console.log(
        `Using lock file entry ${packageName}@${lockEntry.version} for ${versionRange}`,
      );
      const installed = await installWithDependencies(
        packageName,
        lockEntry.version,
        lockEntry.resolved_url,
        lockEntry.integrity,
        lockEntry.dependencies,
        lock,
        installRoot,
        services,
        ancestry,
        summary,
      );
      if (installed) {
        summary.reused++;
      }
      continue;
    }

    console.log(`Resolving ${packageName}@${versionRange}`);
    const versions = await services.registry.getVersions(packageName);
    const exactVersion = resolveVersion(
      packageName,
      versionRange,
      Object.keys(versions),
    );
    const record = versions[exactVersion];
    console.log(`Resolved ${packageName}@${versionRange} to ${record.version}`);

    const installed = await installWithDependencies(
      packageName,
      record.version,
      record.artifactUrl,
      record.integrity,
      record.dependencies,
      lock,
      installRoot,
      services,
      ancestry,
      summary,
    );
    if (installed) {
      summary.resolved++;
    }

    setLockEntry(lock, packageName, {
      version: record.version,
      resolved_url: record.artifactUrl,
      integrity: record.integrity,
      dependencies: record.dependencies,
    });
  }

  return summary;
}
