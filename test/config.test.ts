import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { LOCK_PATH, NODE_MODULES_PATH, PACKAGE_JSON_PATH, REGISTRY_URL } from "../src/constants";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  it("uses the defaults when nothing is overridden", () => {
    expect(loadConfig({})).toEqual({
      packageJsonPath: PACKAGE_JSON_PATH,
      lockPath: LOCK_PATH,
      nodeModulesPath: NODE_MODULES_PATH,
      registryUrl: REGISTRY_URL,
      fetchTimeoutMs: 0,
    });
  });

  it("places every file under NESTPM_PROJECT_DIR", () => {
    const projectDir = path.resolve("/tmp/project");
    const config = loadConfig({ NESTPM_PROJECT_DIR: projectDir });

    expect(config.packageJsonPath).toBe(path.join(projectDir, "package.json"));
    expect(config.lockPath).toBe(path.join(projectDir, "dep-lock.json"));
    expect(config.nodeModulesPath).toBe(path.join(projectDir, "node_modules"));
  });

  it("trims trailing slashes from NESTPM_REGISTRY", () => {
    const config = loadConfig({ NESTPM_REGISTRY: "https://registry.test/npm/" });
    expect(config.registryUrl).toBe("https://registry.test/npm");
  });

  it("reads NESTPM_FETCH_TIMEOUT as milliseconds", () => {
    expect(loadConfig({ NESTPM_FETCH_TIMEOUT: "30000" }).fetchTimeoutMs).toBe(30000);
  });

  it("rejects a NESTPM_FETCH_TIMEOUT that is not a number", () => {
    expect(() => loadConfig({ NESTPM_FETCH_TIMEOUT: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ NESTPM_FETCH_TIMEOUT: "-5" })).toThrow(ConfigError);
  });
});
