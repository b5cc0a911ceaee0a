import { InstallConfig } from "./config";
import { formatError } from "./errors";
import { readLockFile, saveLockFile } from "./lockfile";
import { getDependencies, readManifest } from "./manifest";
import { reconcile, ReconcileServices, ReconcileSummary } from "./reconcile";
import { createRegistryClient } from "./registry";
import { extractTarball } from "./tarball";
import { createAxiosTransport } from "./transport";
import { ensureDirectoryExists } from "./utils";

/**
 * Wires the real registry, axios transport and tarball extractor together.
 */
export function createServices(config: InstallConfig): ReconcileServices {
  const transport = createAxiosTransport({ timeoutMs: config.fetchTimeoutMs });
  return {
    transport,
    registry: createRegistryClient({ registryUrl: config.registryUrl, transport }),
    extractor: extractTarball,
  };
}

/**
 * Runs the install flow:
 * 1. Read package.json and the lock file. Problems with either abort before
 *    anything is fetched.
 * 2. Reconcile the direct dependencies against the lock file, installing
 *    every package into node_modules.
 * 3. Save the lock file, even when step 2 failed part-way, so packages that
 *    were resolved before the failure are kept.
 * An install error is rethrown once the lock file is saved.
 * @returns Promise of what the reconciliation did.
 */
export async function installPackages(
  config: InstallConfig,
  services: ReconcileServices,
): Promise<ReconcileSummary> {
  const packageJson = await readManifest(config.packageJsonPath);
  const dependencies = getDependencies(packageJson);
  const lock = await readLockFile(config.lockPath);

  if (Object.keys(dependencies).length === 0) {
    console.log("No dependencies");
  } else {
    console.log(`dependencies: ${JSON.stringify(dependencies, null, 2)}`);
  }

  let summary: ReconcileSummary;
  try {
    await ensureDirectoryExists(config.nodeModulesPath);
    summary = await reconcile(dependencies, lock, config.nodeModulesPath, services);
  } catch (error) {
    // The install error is the one to surface; a lock file failure on top
    // of it is only reported.
    try {
      await saveLockFile(config.lockPath, lock);
    } catch (persistError) {
      console.error(formatError(persistError));
    }
    throw error;
  }

  await saveLockFile(config.lockPath, lock);
  console.log(
    `Installed ${summary.resolved + summary.reused} packages ` +
      `(${summary.resolved} resolved, ${summary.reused} from lock file` +
      `${summary.skippedCycles > 0 ? `, ${summary.skippedCycles} cycles skipped` : ""}).`,
  );
  return summary;
}
