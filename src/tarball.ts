import path from "path";
import fs from "fs/promises";
import pako from "pako";
import { ExtractError } from "./errors";
import { verifyIntegrity } from "./integrity";
import { Transport } from "./transport";

/**
 * Unpacks a gzipped tarball into a directory, creating it if needed.
 */
export type Extractor = (tarballData: Uint8Array, destDir: string) => Promise<void>;

export interface TarballServices {
  transport: Transport;
  extractor: Extractor;
}

interface TarEntry {
  name: string;
  type: "file" | "directory" | "other";
  mode: number;
  content: Uint8Array;
}

const BLOCK_SIZE = 512;
const textDecoder = new TextDecoder();

/**
 * Parse a null-terminated string from a tar header.
 */
function parseString(data: Uint8Array, offset: number, length: number): string {
  const bytes = data.subarray(offset, offset + length);
  const nullIndex = bytes.indexOf(0);
  return textDecoder.decode(nullIndex >= 0 ? bytes.subarray(0, nullIndex) : bytes);
}

/**
 * Parse an octal number from a tar header.
 */
function parseOctal(data: Uint8Array, offset: number, length: number): number {
  const str = parseString(data, offset, length).trim();
  return parseInt(str, 8) || 0;
}

/**
 * Reads the "path" record out of a pax extended header, if there is one.
 */
function parsePaxPath(content: Uint8Array): string | undefined {
  // Records look like "<length> <key>=<value>\n".
  for (const record of textDecoder.decode(content).split("\n")) {
    const match = /^\d+ path=(.*)$/.exec(record);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Walks the entries of an uncompressed ustar archive. Long names from GNU
 * "L" records and pax "path" records replace the header name of the entry
 * that follows them.
 */
function* parseTar(data: Uint8Array): Generator<TarEntry> {
  let offset = 0;
  let pendingName: string | undefined;

  while (offset + BLOCK_SIZE <= data.length) {
    const header = data.subarray(offset, offset + BLOCK_SIZE);
    offset += BLOCK_SIZE;

    // End of archive is marked by zero blocks.
    if (header.every((b) => b === 0)) {
      return;
    }

    const name = parseString(header, 0, 100);
    const mode = parseOctal(header, 100, 8);
    const size = parseOctal(header, 124, 12);
    const typeFlag = String.fromCharCode(header[156]);
    const prefix = parseString(header, 345, 155);

    if (offset + size > data.length) {
      throw new Error(`entry "${name}" is truncated`);
    }
    const content = data.subarray(offset, offset + size);
    offset += Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

    if (typeFlag === "L") {
      pendingName = parseString(content, 0, content.length);
      continue;
    }
    if (typeFlag === "x") {
      pendingName = parsePaxPath(content) ?? pendingName;
      continue;
    }
    if (typeFlag === "g") {
      continue;
    }

    const fullName = pendingName ?? (prefix ? `${prefix}/${name}` : name);
    pendingName = undefined;
    if (!fullName) {
      continue;
    }

    let type: TarEntry["type"];
    switch (typeFlag) {
      case "0":
      case "\0":
      case "7":
        type = "file";
        break;
      case "5":
        type = "directory";
        break;
      default:
        type = "other";
    }

    yield { name: fullName, type, mode, content };
  }
}

/**
 * Resolves where an archive entry lands once its leading "package/"
 * directory is stripped. Returns undefined for the wrapper directory itself.
 * @throws Error if the entry would be written outside destDir.
 */
function entryDestination(destDir: string, entryName: string): string | undefined {
  const parts = entryName.split("/").filter(Boolean);
  if (parts.length <= 1) {
    return undefined;
  }

  const root = path.resolve(destDir);
  const destination = path.resolve(root, ...parts.slice(1));
  if (!destination.startsWith(root + path.sep)) {
    throw new Error(`entry "${entryName}" points outside the package directory`);
  }
  return destination;
}

/**
 * Default extractor: gunzips the tarball and writes its regular files and
 * directories under destDir. Symlinks, devices and the like are skipped.
 * @throws ExtractError if the data is not a valid gzipped tarball or a
 * file cannot be written.
 */
export async function extractTarball(
  tarballData: Uint8Array,
  destDir: string,
): Promise<void> {
  try {
    const tarData = pako.inflate(tarballData);
    await fs.mkdir(destDir, { recursive: true });

    for (const entry of parseTar(tarData)) {
      if (entry.type === "other") {
        continue;
      }
      const destination = entryDestination(destDir, entry.name);
      if (destination === undefined) {
        continue;
      }

      if (entry.type === "directory") {
        await fs.mkdir(destination, { recursive: true });
      } else {
        await fs.mkdir(path.dirname(destination), { recursive: true });
        // Only the executable bit is carried over from the archive.
        const mode = entry.mode & 0o111 ? 0o755 : 0o644;
        await fs.writeFile(destination, entry.content, { mode });
      }
    }
  } catch (error) {
    // pako throws bare strings for corrupt input.
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractError(`Failed to extract tarball into ${destDir}: ${reason}`, {
      context: { path: destDir },
      cause: error,
    });
  }
}

/**
 * Determines the directory a package is installed to inside a
 * node_modules directory. Scoped packages ("@scope/name") get a directory
 * per scope.
 * @throws ExtractError if the name could escape the install root.
 */
export function packageDirectory(installRoot: string, packageName: string): string {
  const parts = packageName.split("/");
  const isScoped = packageName.startsWith("@") && parts.length === 2;
  const valid =
    (parts.length === 1 || isScoped) &&
    parts.every((part) => part !== "" && part !== "." && part !== "..") &&
    !packageName.includes("\\");

  if (!valid) {
    throw new ExtractError(`Dependency name ${packageName} is invalid.`, {
      context: { package: packageName },
    });
  }
  return path.join(installRoot, ...parts);
}

/**
 * Downloads a package tarball, checks it against its expected digest and
 * unpacks it into installRoot/<packageName>.
 * @param url URL of the tarball.
 * @param packageName Name of the package, used for the target directory.
 * @param expectedDigest "sha512-..." digest to verify. When undefined,
 * verification is skipped.
 * @param installRoot node_modules directory to install into.
 * @returns Promise of the directory the package was extracted into.
 * @throws NetworkError, IntegrityError or ExtractError. Nothing is written
 * to disk unless the digest matched.
 */
export async function fetchAndInstall(
  url: string,
  packageName: string,
  expectedDigest: string | undefined,
  installRoot: string,
  services: TarballServices,
): Promise<string> {
  const packageDir = packageDirectory(installRoot, packageName);

  console.log(`Downloading tarball from: ${url}`);
  const tarData = await services.transport.getBytes(url);

  if (expectedDigest !== undefined) {
    try {
      verifyIntegrity(expectedDigest, tarData);
    } catch (error) {
      console.error(`Validation failed for ${packageName} (${url})`);
      throw error;
    }
    console.log(`Integrity check passed for ${packageName}`);
  } else {
    console.log(`No integrity hash provided for ${packageName}. Skipping validation.`);
  }

  await services.extractor(tarData, packageDir);
  console.log(`Extracted ${packageName} into ${packageDir}`);
  return packageDir;
}
