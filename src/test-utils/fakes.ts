/**
 * Test utilities - In-memory registries and store
 *
 * Behave like the real adapters at the interface level and record every
 * mutating call in order, so tests can assert what happened and when.
 */

import { join } from "path";
import { STORE_INTEGRITY_KEY } from "#/constants";
import { AdapterError } from "#/errors";
import { readMirroredState } from "#/registry/metadata";
import type {
  ArtifactStore,
  CreatePackageInput,
  ImageCatalog,
  SourceModelVersion,
  SourceRegistryAdapter,
  StoredObject,
  TargetModelPackage,
  TargetRegistryAdapter,
} from "#/registry/registry.types";
import type { ApprovalStatus } from "#/schemas";
import type { createMockFileSystem, ShellResult } from "./mocks";

type MockFileSystem = ReturnType<typeof createMockFileSystem>;

interface InjectedFailure {
  op: string;
  key: string;
  error: Error;
  remaining: number;
}

/**
 * Failure table shared by the fakes: fail(op, key, error, times)
 */
class FailureTable {
  private failures: InjectedFailure[] = [];

  add(op: string, key: string, error: Error, times: number): void {
    this.failures.push({ op, key, error, remaining: times });
  }

  check(op: string, key: string): void {
    const failure = this.failures.find((f) => f.op === op && f.key === key && f.remaining > 0);
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
  }
}

/**
 * Retryable adapter failure, as a throttled or unavailable API reports it
 */
export function transientError(operation = "test"): AdapterError {
  return new AdapterError(operation, "Service unavailable", "retryable", { status: 503 });
}

/**
 * Fatal adapter failure, as a denied or invalid request reports it
 */
export function fatalError(operation = "test"): AdapterError {
  return new AdapterError(operation, "Access denied", "fatal", { status: 403 });
}

/**
 * Build a source version with defaults for every field
 */
export function sourceVersion(overrides: Partial<SourceModelVersion> & { runId: string }): SourceModelVersion {
  return {
    modelName: "churn_model",
    version: 1,
    stage: "Production",
    artifactUri: `runs:/${overrides.runId}/model`,
    status: "READY",
    tags: {},
    ...overrides,
  };
}

// ============================================================================
// Source registry
// ============================================================================

export interface SourceCall {
  op: "list" | "download";
  key: string;
}

export class FakeSourceRegistry implements SourceRegistryAdapter {
  readonly type = "fake";
  readonly calls: SourceCall[] = [];
  versions: SourceModelVersion[];
  /** Artifact tree per run id, as relative path -> content */
  artifacts = new Map<string, Record<string, string>>();
  /** Awaited at the start of every download */
  onDownload?: (version: SourceModelVersion, signal?: AbortSignal) => Promise<void>;

  private fs: MockFileSystem;
  private failures = new FailureTable();

  constructor(fs: MockFileSystem, versions: SourceModelVersion[] = []) {
    this.fs = fs;
    this.versions = versions;
  }

  fail(op: "list" | "download", key: string, error: Error, times = Infinity): void {
    this.failures.add(op, key, error, times);
  }

  async listVersions(modelName: string): Promise<SourceModelVersion[]> {
    this.calls.push({ op: "list", key: modelName });
    this.failures.check("list", modelName);
    return this.versions.filter((v) => v.modelName === modelName).map((v) => ({ ...v, tags: { ...v.tags } }));
  }

  async downloadArtifacts(version: SourceModelVersion, targetDir: string, signal?: AbortSignal): Promise<void> {
    this.calls.push({ op: "download", key: version.runId });
    await this.onDownload?.(version, signal);
    this.failures.check("download", version.runId);

    const tree = this.artifacts.get(version.runId);
    if (!tree) {
      throw new AdapterError("downloadArtifacts", `No artifacts for run ${version.runId}`, "fatal", { status: 404 });
    }
    for (const [relativePath, content] of Object.entries(tree)) {
      this.fs.writeFile(join(targetDir, relativePath), content);
    }
  }
}

// ============================================================================
// Target registry
// ============================================================================

export interface TargetCall {
  op: "list" | "create" | "update" | "delete";
  groupName: string;
  handle?: string;
  runId?: string;
  approvalStatus?: ApprovalStatus;
}

export class FakeTargetRegistry implements TargetRegistryAdapter {
  readonly type = "fake";
  readonly calls: TargetCall[] = [];
  readonly created: CreatePackageInput[] = [];
  private groups = new Map<string, TargetModelPackage[]>();
  private counter = 0;
  private failures = new FailureTable();

  /**
   * Fail an operation. Keys: group name for list, run id for create,
   * package handle for update and delete.
   */
  fail(op: "list" | "create" | "update" | "delete", key: string, error: Error, times = Infinity): void {
    this.failures.add(op, key, error, times);
  }

  /**
   * Add an existing package. Mirrored fields are read from metadata.
   */
  seed(pkg: Partial<TargetModelPackage> & { groupName: string; metadata: Record<string, string> }): TargetModelPackage {
    const seeded: TargetModelPackage = {
      handle: pkg.handle ?? this.nextHandle(pkg.groupName),
      approvalStatus: "Approved",
      ...readMirroredState(pkg.metadata),
      ...pkg,
    };
    this.packagesOf(seeded.groupName).push(seeded);
    return seeded;
  }

  /** Current packages of a group (copies) */
  packages(groupName: string): TargetModelPackage[] {
    return this.packagesOf(groupName).map((p) => ({ ...p, metadata: { ...p.metadata } }));
  }

  async listPackages(groupName: string): Promise<TargetModelPackage[]> {
    this.calls.push({ op: "list", groupName });
    this.failures.check("list", groupName);
    return this.packages(groupName);
  }

  async createPackage(input: CreatePackageInput): Promise<TargetModelPackage> {
    this.calls.push({ op: "create", groupName: input.groupName, runId: input.runId, approvalStatus: input.approvalStatus });
    this.failures.check("create", input.runId);

    this.created.push(input);
    const pkg: TargetModelPackage = {
      handle: this.nextHandle(input.groupName),
      groupName: input.groupName,
      ...readMirroredState(input.metadata),
      approvalStatus: input.approvalStatus,
      artifactLocation: input.artifactLocation,
      imageReference: input.imageReference,
      createdAt: new Date(this.counter * 1000),
      metadata: { ...input.metadata },
    };
    this.packagesOf(input.groupName).push(pkg);
    return { ...pkg, metadata: { ...pkg.metadata } };
  }

  async updateApproval(
    pkg: TargetModelPackage,
    status: ApprovalStatus,
    metadata: Record<string, string> = {}
  ): Promise<void> {
    this.calls.push({ op: "update", groupName: pkg.groupName, handle: pkg.handle, runId: pkg.runId, approvalStatus: status });
    this.failures.check("update", pkg.handle);

    const stored = this.packagesOf(pkg.groupName).find((p) => p.handle === pkg.handle);
    if (!stored) {
      throw new AdapterError("updateApproval", `Package ${pkg.handle} not found`, "fatal", { status: 404 });
    }
    stored.approvalStatus = status;
    stored.metadata = { ...stored.metadata, ...metadata };
    Object.assign(stored, readMirroredState(stored.metadata));
  }

  async deletePackage(pkg: TargetModelPackage): Promise<void> {
    this.calls.push({ op: "delete", groupName: pkg.groupName, handle: pkg.handle, runId: pkg.runId });
    this.failures.check("delete", pkg.handle);

    const packages = this.packagesOf(pkg.groupName);
    const index = packages.findIndex((p) => p.handle === pkg.handle);
    if (index !== -1) {
      packages.splice(index, 1);
    }
  }

  private packagesOf(groupName: string): TargetModelPackage[] {
    let packages = this.groups.get(groupName);
    if (!packages) {
      packages = [];
      this.groups.set(groupName, packages);
    }
    return packages;
  }

  private nextHandle(groupName: string): string {
    this.counter++;
    return `pkg/${groupName}/${this.counter}`;
  }
}

// ============================================================================
// Artifact store
// ============================================================================

export interface StoreCall {
  op: "stat" | "put" | "delete" | "list";
  location: string;
}

interface StoredEntry {
  body: Buffer;
  metadata: Record<string, string>;
}

export class FakeArtifactStore implements ArtifactStore {
  readonly type = "fake";
  readonly calls: StoreCall[] = [];
  readonly objects = new Map<string, StoredEntry>();
  private root: string;
  private failures = new FailureTable();

  constructor(bucket = "test-bucket") {
    this.root = `mem://${bucket}/`;
  }

  /**
   * Fail an operation. Keys: object key for put, location for stat and delete,
   * prefix for list.
   */
  fail(op: StoreCall["op"], key: string, error: Error, times = Infinity): void {
    this.failures.add(op, key, error, times);
  }

  /** Add an object directly, bypassing the call log */
  seed(key: string, body: string, metadata: Record<string, string> = {}): string {
    this.objects.set(key, { body: Buffer.from(body), metadata });
    return this.locationFor(key);
  }

  locationFor(key: string): string {
    return `${this.root}${key}`;
  }

  owns(location: string): boolean {
    return location.startsWith(this.root);
  }

  async stat(location: string): Promise<StoredObject | null> {
    this.calls.push({ op: "stat", location });
    this.failures.check("stat", location);

    const entry = this.owns(location) ? this.objects.get(location.slice(this.root.length)) : undefined;
    if (!entry) return null;
    return { location, integrity: entry.metadata[STORE_INTEGRITY_KEY], size: entry.body.length };
  }

  async put(key: string, body: Buffer, metadata: Record<string, string>): Promise<string> {
    const location = this.locationFor(key);
    this.calls.push({ op: "put", location });
    this.failures.check("put", key);

    this.objects.set(key, { body, metadata: { ...metadata } });
    return location;
  }

  async delete(location: string): Promise<void> {
    this.calls.push({ op: "delete", location });
    this.failures.check("delete", location);

    if (this.owns(location)) {
      this.objects.delete(location.slice(this.root.length));
    }
  }

  async list(prefix: string): Promise<string[]> {
    this.calls.push({ op: "list", location: this.locationFor(prefix) });
    this.failures.check("list", prefix);

    return [...this.objects.keys()]
      .filter((key) => key.startsWith(prefix))
      .sort()
      .map((key) => this.locationFor(key));
  }
}

/**
 * Image catalog backed by a plain record
 */
export function createFakeImageCatalog(images: Record<string, string> = {}): ImageCatalog & { lookups: string[] } {
  const lookups: string[] = [];
  return {
    lookups,
    async lookup(flavor: string): Promise<string | undefined> {
      lookups.push(flavor);
      return images[flavor];
    },
  };
}

// ============================================================================
// tar
// ============================================================================

/**
 * A `tar` stand-in over the mock file system.
 *
 * -czf writes a JSON document mapping archive paths to file contents;
 * -tzf lists it back the way tar does ("./", "./MLmodel", ...);
 * -tvzf reports no symlinks.
 */
export function createFakeTar(fs: MockFileSystem): ShellResult {
  return (args: string[]): string => {
    const [flag, archivePath] = args;
    if (!archivePath) {
      throw new Error("tar: missing archive path");
    }

    if (flag === "-czf") {
      const sourceDir = args[3];
      if (!sourceDir) throw new Error("tar: missing -C directory");

      const contents: Record<string, string> = {};
      const prefix = `${sourceDir}/`;
      const paths = [...fs.files.keys()].filter((path) => path.startsWith(prefix)).sort();
      for (const path of paths) {
        const entry = fs.files.get(path);
        if (entry && !entry.isDirectory) {
          contents[path.slice(prefix.length)] = entry.content.toString();
        }
      }
      fs.writeFileBinary(archivePath, Buffer.from(JSON.stringify(contents)));
      return "";
    }

    if (flag === "-tzf") {
      return ["./", ...Object.keys(readFakeArchive(fs.readFileBinary(archivePath))).map((p) => `./${p}`)].join("\n");
    }

    return "";
  };
}

/**
 * Decode an archive written by createFakeTar
 */
export function readFakeArchive(body: Buffer): Record<string, string> {
  const parsed: unknown = JSON.parse(body.toString("utf-8"));
  const contents: Record<string, string> = {};
  if (typeof parsed === "object" && parsed !== null) {
    for (const [path, content] of Object.entries(parsed)) {
      if (typeof content === "string") contents[path] = content;
    }
  }
  return contents;
}
