import path from "path";

export const LOCK_FILE_NAME = "dep-lock.json";
export const PACKAGE_JSON_NAME = "package.json";
export const NODE_MODULES_NAME = "node_modules";

// Base directory for the project being installed into.
export const BASE_OUTPUT_DIR = process.cwd();
// Default path for package.json.
export const PACKAGE_JSON_PATH = path.join(BASE_OUTPUT_DIR, PACKAGE_JSON_NAME);
// Default path for node_modules directory.
export const NODE_MODULES_PATH = path.join(BASE_OUTPUT_DIR, NODE_MODULES_NAME);
// Default path for the lock file.
export const LOCK_PATH = path.join(BASE_OUTPUT_DIR, LOCK_FILE_NAME);

// Public NPM registry.
export const REGISTRY_URL = "https://registry.npmjs.org";

// The only digest algorithm accepted for tarball integrity.
export const INTEGRITY_ALGORITHM = "sha512";
