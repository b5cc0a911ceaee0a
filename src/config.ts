import path from "path";
import {
  LOCK_FILE_NAME,
  LOCK_PATH,
  NODE_MODULES_NAME,
  NODE_MODULES_PATH,
  PACKAGE_JSON_NAME,
  PACKAGE_JSON_PATH,
  REGISTRY_URL,
} from "./constants";
import { ConfigError } from "./errors";

/**
 * Where an install reads from and writes to.
 */
export interface InstallConfig {
  packageJsonPath: string;
  lockPath: string;
  nodeModulesPath: string;
  registryUrl: string;
  // 0 means requests never time out.
  fetchTimeoutMs: number;
}

/**
 * Builds the install configuration from the defaults in constants.ts,
 * overridden by environment variables:
 * - NESTPM_PROJECT_DIR: project root holding package.json, the lock file
 *   and node_modules.
 * - NESTPM_REGISTRY: registry base URL.
 * - NESTPM_FETCH_TIMEOUT: request timeout in milliseconds.
 * @throws ConfigError if NESTPM_FETCH_TIMEOUT is not a non-negative integer.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InstallConfig {
  const projectDir = env.NESTPM_PROJECT_DIR;
  const paths = projectDir
    ? {
        packageJsonPath: path.resolve(projectDir, PACKAGE_JSON_NAME),
        lockPath: path.resolve(projectDir, LOCK_FILE_NAME),
        nodeModulesPath: path.resolve(projectDir, NODE_MODULES_NAME),
      }
    : {
        packageJsonPath: PACKAGE_JSON_PATH,
        lockPath: LOCK_PATH,
        nodeModulesPath: NODE_MODULES_PATH,
      };

  const registryUrl = (env.NESTPM_REGISTRY || REGISTRY_URL).replace(/\/+$/, "");

  let fetchTimeoutMs = 0;
  const rawTimeout = env.NESTPM_FETCH_TIMEOUT;
  if (rawTimeout !== undefined && rawTimeout !== "") {
    if (!/^\d+$/.test(rawTimeout)) {
      throw new ConfigError(
        `NESTPM_FETCH_TIMEOUT must be a number of milliseconds, got "${rawTimeout}"`,
      );
    }
    fetchTimeoutMs = Number(rawTimeout);
  }

  return { ...paths, registryUrl, fetchTimeoutMs };
}
