import os from "os";
import path from "path";
import fs from "fs/promises";
import pako from "pako";
import { NetworkError } from "../src/errors";
import { computeIntegrity } from "../src/integrity";
import { createRegistryClient, packageDocumentUrl } from "../src/registry";
import { ReconcileServices } from "../src/reconcile";
import { extractTarball } from "../src/tarball";
import { Transport } from "../src/transport";
import { Dependencies } from "../src/types";

export const TEST_REGISTRY = "https://registry.test";

export interface TarTestEntry {
  name: string;
  content?: string;
  // ustar type flag, "0" (regular file) by default.
  type?: string;
  mode?: number;
}

const encoder = new TextEncoder();

function tarHeader(entry: TarTestEntry, size: number): Uint8Array {
  const header = new Uint8Array(512);
  header.set(encoder.encode(entry.name).slice(0, 100), 0);
  header.set(encoder.encode(`${(entry.mode ?? 0o644).toString(8).padStart(7, "0")}\0`), 100);
  header.set(encoder.encode("0000000\0"), 108);
  header.set(encoder.encode("0000000\0"), 116);
  header.set(encoder.encode(`${size.toString(8).padStart(11, "0")} `), 124);
  header.set(encoder.encode("00000000000\0"), 136);
  header.set(encoder.encode("        "), 148);
  header[156] = (entry.type ?? "0").charCodeAt(0);

  let checksum = 0;
  for (let i = 0; i < 512; i++) {
    checksum += header[i];
  }
  header.set(encoder.encode(`${checksum.toString(8).padStart(6, "0")}\0 `), 148);
  return header;
}

/**
 * Builds an uncompressed tar archive from a list of entries.
 */
export function createTar(entries: TarTestEntry[]): Uint8Array {
  const chunks: Uint8Array[] = [];
  for (const entry of entries) {
    const content = encoder.encode(entry.content ?? "");
    chunks.push(tarHeader(entry, content.length));
    const padded = new Uint8Array(Math.ceil(content.length / 512) * 512);
    padded.set(content);
    chunks.push(padded);
  }
  chunks.push(new Uint8Array(1024));

  const result = new Uint8Array(chunks.reduce((sum, chunk) => sum + chunk.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Builds a gzipped npm-style tarball: every file sits under "package/".
 */
export function createTarball(files: Record<string, string>): Uint8Array {
  return pako.gzip(
    createTar(
      Object.entries(files).map(([name, content]) => ({
        name: `package/${name}`,
        content,
      })),
    ),
  );
}

interface FakeDocument {
  "dist-tags": Record<string, string>;
  versions: Record<string, unknown>;
}

export interface PublishOptions {
  dependencies?: Dependencies;
  files?: Record<string, string>;
  // Overrides the digest recorded in the registry.
  integrity?: string | null;
}

/**
 * In-memory registry and tarball host. Records every URL requested.
 */
export class FakeRegistry implements Transport {
  readonly jsonRequests: string[] = [];
  readonly byteRequests: string[] = [];
  private readonly documents = new Map<string, FakeDocument>();
  private readonly tarballs = new Map<string, Uint8Array>();
  private readonly rawDocuments = new Map<string, unknown>();

  static tarballUrl(name: string, version: string): string {
    const baseName = name.split("/").pop() ?? name;
    return `${TEST_REGISTRY}/${name}/-/${baseName}-${version}.tgz`;
  }

  /**
   * Publishes a version whose tarball holds a package.json plus any extra
   * files. Returns the tarball bytes.
   */
  publish(name: string, version: string, options: PublishOptions = {}): Uint8Array {
    const tarball = createTarball({
      "package.json": JSON.stringify({ name, version }),
      ...options.files,
    });
    const url = FakeRegistry.tarballUrl(name, version);
    this.tarballs.set(url, tarball);

    const documentUrl = packageDocumentUrl(TEST_REGISTRY, name);
    const document = this.documents.get(documentUrl) ?? { "dist-tags": {}, versions: {} };
    const dist: Record<string, string> = { tarball: url };
    if (options.integrity !== null) {
      dist.integrity = options.integrity ?? computeIntegrity(tarball);
    }
    document.versions[version] = {
      name,
      version,
      dist,
      ...(options.dependencies ? { dependencies: options.dependencies } : {}),
    };
    document["dist-tags"].latest = version;
    this.documents.set(documentUrl, document);
    return tarball;
  }

  /**
   * Replaces the bytes served for a tarball URL.
   */
  setTarball(url: string, data: Uint8Array): void {
    this.tarballs.set(url, data);
  }

  /**
   * Serves a raw registry document for a package.
   */
  setDocument(name: string, body: unknown): void {
    this.rawDocuments.set(packageDocumentUrl(TEST_REGISTRY, name), body);
  }

  async getJson(url: string): Promise<unknown> {
    this.jsonRequests.push(url);
    if (this.rawDocuments.has(url)) {
      return this.rawDocuments.get(url);
    }
    const document = this.documents.get(url);
    if (!document) {
      throw notFound(url);
    }
    return JSON.parse(JSON.stringify(document));
  }

  async getBytes(url: string): Promise<Uint8Array> {
    this.byteRequests.push(url);
    const tarball = this.tarballs.get(url);
    if (!tarball) {
      throw notFound(url);
    }
    return tarball;
  }
}

function notFound(url: string): NetworkError {
  return new NetworkError(`Failed to fetch ${url}: Request failed with status code 404`, {
    url,
    status: 404,
    statusText: "Not Found",
  });
}

export function createTestServices(registry: FakeRegistry): ReconcileServices {
  return {
    transport: registry,
    registry: createRegistryClient({ registryUrl: TEST_REGISTRY, transport: registry }),
    extractor: extractTarball,
  };
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "nestpm-test-"));
}

/**
 * Lists every file under a directory as "relative/path: content", sorted.
 */
export async function snapshotTree(dir: string): Promise<string[]> {
  const lines: string[] = [];
  async function walk(current: string): Promise<void> {
    for (const entry of await fs.readdir(current, { withFileTypes: true })) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else {
        const content = await fs.readFile(fullPath, "utf8");
        lines.push(`${path.relative(dir, fullPath)}: ${content}`);
      }
    }
  }
  await walk(dir);
  return lines.sort();
}
