import { LRUCache } from "lru-cache";
import { NetworkError, RegistryError } from "./errors";
import { Transport } from "./transport";
import { RegistryVersionRecord } from "./types";

/**
 * What the install flow needs to know about a package from the registry.
 */
export interface RegistryClient {
  // Every published version of the package, keyed by version string.
  getVersions(packageName: string): Promise<Record<string, RegistryVersionRecord>>;
  // Dist-tags such as "latest", mapped to exact versions.
  getDistTags(packageName: string): Promise<Record<string, string>>;
}

export interface RegistryClientOptions {
  registryUrl: string;
  transport: Transport;
}

/**
 * The parts of a registry package document ("packument") that are kept.
 */
interface PackageDocument {
  versions: Record<string, RegistryVersionRecord>;
  distTags: Record<string, string>;
}

const cacheOptions = {
  max: 500, // Max size of cache.
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    isRecord(value) &&
    Object.values(value).every((entry) => typeof entry === "string")
  );
}

/**
 * Builds the registry URL for a package. Scoped names keep their "@" but
 * the "/" between scope and name is escaped, as the registry expects.
 */
export function packageDocumentUrl(registryUrl: string, packageName: string): string {
  return `${registryUrl}/${packageName.replace("/", "%2f")}`;
}

/**
 * Validates one entry of a packument's "versions" map.
 */
function parseVersionRecord(
  packageName: string,
  key: string,
  value: unknown,
): RegistryVersionRecord {
  const invalid = (reason: string) =>
    new RegistryError(
      `Invalid registry metadata for ${packageName}@${key}: ${reason}`,
      packageName,
    );

  if (!isRecord(value)) {
    throw invalid("version entry is not an object");
  }
  const dist = value.dist;
  if (!isRecord(dist)) {
    throw invalid("missing dist");
  }
  const tarball = dist.tarball;
  if (typeof tarball !== "string") {
    throw invalid("missing dist.tarball");
  }
  // Every freshly resolved tarball is verified against this digest.
  const integrity = dist.integrity;
  if (typeof integrity !== "string") {
    throw invalid("missing dist.integrity");
  }

  const dependencies = value.dependencies;
  if (dependencies !== undefined && !isStringRecord(dependencies)) {
    throw invalid("dependencies is not a map of version ranges");
  }

  return {
    version: typeof value.version === "string" ? value.version : key,
    artifactUrl: tarball,
    integrity,
    dependencies: isStringRecord(dependencies) ? dependencies : undefined,
  };
}

function parsePackageDocument(packageName: string, body: unknown): PackageDocument {
  if (!isRecord(body) || !isRecord(body.versions)) {
    throw new RegistryError(
      `Invalid registry response for ${packageName}: missing versions`,
      packageName,
    );
  }

  const versions: Record<string, RegistryVersionRecord> = {};
  for (const [key, value] of Object.entries(body.versions)) {
    versions[key] = parseVersionRecord(packageName, key, value);
  }

  const distTags = body["dist-tags"];
  return {
    versions,
    distTags: isStringRecord(distTags) ? distTags : {},
  };
}

/**
 * Creates a registry client that fetches each package document once and
 * serves later lookups for the same package from memory.
 */
export function createRegistryClient(options: RegistryClientOptions): RegistryClient {
  const { registryUrl, transport } = options;
  // Cache results of requests to the registry for package documents.
  const documentCache = new LRUCache<string, PackageDocument>(cacheOptions);

  async function getPackageDocument(packageName: string): Promise<PackageDocument> {
    const cached = documentCache.get(packageName);
    if (cached) {
      console.log(`Retrieving registry info for ${packageName} from cache.`);
      return cached;
    }

    const url = packageDocumentUrl(registryUrl, packageName);
    console.log(`Fetching version info for ${url}.`);
    let body: unknown;
    try {
      body = await transport.getJson(url);
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new RegistryError(
          `Error fetching registry info for ${packageName}: ${error.message}`,
          packageName,
          error,
        );
      }
      throw error;
    }

    const document = parsePackageDocument(packageName, body);
    documentCache.set(packageName, document);
    return document;
  }

  return {
    async getVersions(packageName) {
      return (await getPackageDocument(packageName)).versions;
    },
    async getDistTags(packageName) {
      return (await getPackageDocument(packageName)).distTags;
    },
  };
}
