/**
 * dscpack Engine — Test doubles
 *
 * In-process stand-ins for PowerShell, the module resolver and blob
 * storage, plus a ZIP reader for asserting archive contents.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as yauzl from "yauzl-promise";
import { BlobContainer, BlobStore } from "../src/storage";
import { ConfigurationParser } from "../src/parser";
import { ModuleResolver } from "../src/modules/resolver";
import { PowerShellRunner } from "../src/powershell";
import { ConfigurationParseResult, StorageCredentials } from "../src/types";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

/** Recursively list the paths under `dir`, relative and "/"-separated */
export function listTree(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const out: string[] = [];
  const walk = (current: string, prefix: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      out.push(rel);
      if (entry.isDirectory()) walk(path.join(current, entry.name), rel);
    }
  };
  walk(dir, "");
  return out.sort();
}

// ─── PowerShell ──────────────────────────────────────────────────

export class FakePowerShellRunner implements PowerShellRunner {
  scripts: string[] = [];

  constructor(private respond: (script: string) => string = () => "5") {}

  async run(script: string): Promise<string> {
    this.scripts.push(script);
    return this.respond(script);
  }
}

// ─── Parser ──────────────────────────────────────────────────────

export class FakeConfigurationParser implements ConfigurationParser {
  calls: string[] = [];

  constructor(
    private result: () => ConfigurationParseResult = () => ({
      requiredModules: new Map(),
      errors: [],
    }),
  ) {}

  async parse(configurationPath: string): Promise<ConfigurationParseResult> {
    this.calls.push(configurationPath);
    return this.result();
  }
}

export function parsedModules(
  modules: Record<string, string | null>,
  errors: string[] = [],
): () => ConfigurationParseResult {
  return () => ({
    requiredModules: new Map(Object.entries(modules)),
    errors,
  });
}

// ─── Module resolver ─────────────────────────────────────────────

/**
 * Resolves modules to folders under a fake "installed modules" root,
 * creating `<root>/<name>/<name>.psd1` for every module it is told about.
 */
export class FakeModuleResolver implements ModuleResolver {
  calls: Array<{ name: string; version: string | null }> = [];

  constructor(private root: string) {}

  install(name: string, files: Record<string, string> = {}): string {
    const folder = path.join(this.root, name);
    fs.mkdirSync(folder, { recursive: true });
    fs.writeFileSync(path.join(folder, `${name}.psd1`), `@{ ModuleVersion = '1.0' }`);
    for (const [rel, content] of Object.entries(files)) {
      const target = path.join(folder, rel);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    }
    return folder;
  }

  async resolve(name: string, version: string | null): Promise<string> {
    this.calls.push({ name, version });
    const folder = path.join(this.root, name);
    if (!fs.existsSync(folder)) {
      throw new Error(`Module ${name} is not installed`);
    }
    return folder;
  }
}

// ─── Blob storage ────────────────────────────────────────────────

export class FakeBlobContainer implements BlobContainer {
  created = false;
  blobs = new Map<string, Buffer>();

  constructor(
    readonly name: string,
    private accountName: string,
  ) {}

  async createIfNotExists(): Promise<boolean> {
    if (this.created) return false;
    this.created = true;
    return true;
  }

  blobUrl(blobName: string): string {
    return `https://${this.accountName}.blob.core.windows.net/${this.name}/${blobName}`;
  }

  async exists(blobName: string): Promise<boolean> {
    return this.blobs.has(blobName);
  }

  async uploadFile(blobName: string, filePath: string): Promise<void> {
    this.blobs.set(blobName, await fs.promises.readFile(filePath));
  }
}

export class FakeBlobStore implements BlobStore {
  containers = new Map<string, FakeBlobContainer>();
  lastCredentials: StorageCredentials | undefined;

  getContainer(
    credentials: StorageCredentials,
    containerName: string,
  ): FakeBlobContainer {
    this.lastCredentials = credentials;
    let container = this.containers.get(containerName);
    if (!container) {
      container = new FakeBlobContainer(containerName, credentials.accountName);
      this.containers.set(containerName, container);
    }
    return container;
  }
}

// ─── ZIP ─────────────────────────────────────────────────────────

/** File entries of a ZIP (directory entries skipped) with their content */
export async function readZip(archivePath: string): Promise<Map<string, string>> {
  const entries = new Map<string, string>();
  const zip = await yauzl.open(archivePath);
  try {
    for await (const entry of zip) {
      if (entry.filename.endsWith("/")) continue;
      const stream = await entry.openReadStream();
      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      entries.set(entry.filename, Buffer.concat(chunks).toString("utf-8"));
    }
  } finally {
    await zip.close();
  }
  return entries;
}
