/**
 * Artifact Repackager
 *
 * Turns a source model version into the archive the serving containers expect,
 * stored under a key derived from (model name, run id):
 *
 *   MLmodel             flavor manifest
 *   requirements.txt    pinned dependencies
 *   inference.py        serving script (script-mode flavors)
 *   <serving path>/...  model files
 *
 * The archive's content integrity is recorded on the stored object; when the
 * key already holds an archive with the same integrity, nothing is uploaded.
 * Work files live in a private directory removed on every exit path.
 */

import { randomUUID } from "crypto";
import { join } from "path";
import {
  createTarball,
  sanitizePathComponent,
  validateTarballContents,
  type EngineContext,
} from "#/core";
import {
  ARCHIVE_FILENAME,
  ARTIFACT_SERVING_DIR,
  INFERENCE_SCRIPT_FILENAME,
  MANIFEST_FILENAME,
  REQUIREMENTS_FILENAME,
  STORE_INTEGRITY_KEY,
} from "#/constants";
import {
  AdapterError,
  RepackagingError,
  ResolutionError,
  StorageError,
  errorMessage,
  toStorageError,
} from "#/errors";
import { formatBytes } from "#/formatters";
import type { ImageResolution, ImageResolver } from "#/images";
import type { ArtifactStore, SourceModelVersion, SourceRegistryAdapter } from "#/registry/registry.types";
import { calculateDirectoryIntegrity } from "./integrity";
import { copyTree, getModelDataPath, getServingDataPath, getServingEnvironment } from "./layout";
import { readMlmodel, selectFlavor } from "./mlmodel";
import { buildArchiveKey } from "./naming";
import { getFlavorTemplate } from "./templates";
import type { RepackageOptions, RepackageResult } from "./artifact.types";

export interface ArtifactRepackagerConfig {
  keyPrefix: string;
}

export class ArtifactRepackager {
  private ctx: EngineContext;
  private source: SourceRegistryAdapter;
  private store: ArtifactStore;
  private images: ImageResolver;
  private keyPrefix: string;

  constructor(
    ctx: EngineContext,
    source: SourceRegistryAdapter,
    store: ArtifactStore,
    images: ImageResolver,
    config: ArtifactRepackagerConfig
  ) {
    this.ctx = ctx;
    this.source = source;
    this.store = store;
    this.images = images;
    this.keyPrefix = config.keyPrefix;
  }

  /**
   * Location the archive of a source version is stored at
   */
  locationFor(version: Pick<SourceModelVersion, "modelName" | "runId">): string {
    return this.store.locationFor(buildArchiveKey(this.keyPrefix, version.modelName, version.runId));
  }

  async repackage(version: SourceModelVersion, options: RepackageOptions = {}): Promise<RepackageResult> {
    const { fs, logger } = this.ctx;
    const { signal } = options;
    const { runId } = version;
    const log = logger.child({ runId, version: version.version });

    const workDir = join(this.ctx.paths.workDir, `${sanitizePathComponent(runId)}-${randomUUID()}`);
    const artifactDir = join(workDir, "artifact");
    const stagingDir = join(workDir, "package");
    const archivePath = join(workDir, ARCHIVE_FILENAME);

    try {
      signal?.throwIfAborted();
      fs.mkdir(artifactDir, { recursive: true });
      await this.download(version, artifactDir, signal);

      signal?.throwIfAborted();
      const manifest = readMlmodel(fs, artifactDir);
      if (!manifest.success) {
        const details = manifest.error.details?.join("; ");
        throw new RepackagingError(
          `Malformed artifact for run ${runId}: ${manifest.error.message}${details ? ` (${details})` : ""}`,
          { runId }
        );
      }

      const flavor = selectFlavor(manifest.data, version.tags);
      if (!flavor) {
        throw new RepackagingError(`Malformed artifact for run ${runId}: ${MANIFEST_FILENAME} declares no flavors`, {
          runId,
        });
      }

      const requirementsPath = join(artifactDir, REQUIREMENTS_FILENAME);
      const requirements = fs.exists(requirementsPath) ? fs.readFile(requirementsPath) : undefined;

      let image: ImageResolution | null;
      try {
        image = await this.images.resolve({ flavor, tags: version.tags, manifest: manifest.data, requirements });
      } catch (err) {
        throw new ResolutionError(`Image lookup failed for flavor ${flavor}: ${errorMessage(err)}`, {
          cause: err,
          runId,
        });
      }
      if (!image) {
        throw new RepackagingError(`Unsupported model flavor '${flavor}': no serving image configured`, { runId });
      }

      signal?.throwIfAborted();
      this.stageLayout(flavor, artifactDir, stagingDir, runId);
      const integrity = calculateDirectoryIntegrity(fs, stagingDir);

      const key = buildArchiveKey(this.keyPrefix, version.modelName, runId);
      const artifactLocation = this.store.locationFor(key);
      const environment = getServingEnvironment(image.servingFlavor, artifactLocation);
      const result = {
        artifactLocation,
        integrity,
        flavor,
        imageReference: image.imageReference,
        environment,
      };

      const existing = await this.statStored(artifactLocation, runId);
      if (existing?.integrity === integrity) {
        log.info("Archive already stored with matching integrity", { artifactLocation });
        return { ...result, reused: true, sizeBytes: existing.size };
      }

      signal?.throwIfAborted();
      const body = this.buildArchive(stagingDir, archivePath, runId);

      signal?.throwIfAborted();
      try {
        await this.store.put(key, body, { [STORE_INTEGRITY_KEY]: integrity });
      } catch (err) {
        throw toStorageError(err, `Failed to upload archive to ${artifactLocation}`, runId);
      }

      log.info("Archive uploaded", { artifactLocation, flavor, size: formatBytes(body.length) });
      return { ...result, reused: false, sizeBytes: body.length };
    } finally {
      if (fs.exists(workDir)) {
        fs.rmdir(workDir, { recursive: true });
      }
    }
  }

  private async download(version: SourceModelVersion, artifactDir: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.source.downloadArtifacts(version, artifactDir, signal);
    } catch (err) {
      signal?.throwIfAborted();
      // A fatal read (missing artifact, denied access) means the source artifact is unusable
      if (err instanceof AdapterError && !err.retryable) {
        throw new RepackagingError(
          `Cannot read artifact for run ${version.runId}: ${err.message}`,
          { cause: err, runId: version.runId }
        );
      }
      throw new ResolutionError(`Failed to download artifact for run ${version.runId}: ${errorMessage(err)}`, {
        cause: err,
        runId: version.runId,
      });
    }
  }

  private async statStored(location: string, runId: string) {
    try {
      return await this.store.stat(location);
    } catch (err) {
      throw toStorageError(err, `Failed to inspect ${location}`, runId);
    }
  }

  private stageLayout(flavor: string, artifactDir: string, stagingDir: string, runId: string): void {
    const { fs } = this.ctx;
    fs.mkdir(stagingDir, { recursive: true });

    const dataPath = getModelDataPath(flavor);
    const dataSrc = dataPath === "." ? artifactDir : join(artifactDir, dataPath);
    if (!fs.exists(dataSrc)) {
      throw new RepackagingError(`Model data '${dataPath}' not found in artifact for flavor ${flavor}`, { runId });
    }

    const servingPath = getServingDataPath(flavor);
    const dataDest = servingPath === "." ? stagingDir : join(stagingDir, servingPath);
    copyTree(fs, dataSrc, dataDest, dataSrc === artifactDir ? [ARTIFACT_SERVING_DIR] : []);

    fs.copyFile(join(artifactDir, MANIFEST_FILENAME), join(stagingDir, MANIFEST_FILENAME));

    const requirements =
      this.readOverride(artifactDir, REQUIREMENTS_FILENAME) ??
      getFlavorTemplate(flavor, REQUIREMENTS_FILENAME) ??
      this.readOptional(join(artifactDir, REQUIREMENTS_FILENAME));
    if (requirements !== null) {
      fs.writeFile(join(stagingDir, REQUIREMENTS_FILENAME), requirements);
    }

    const inference =
      this.readOverride(artifactDir, INFERENCE_SCRIPT_FILENAME) ??
      getFlavorTemplate(flavor, INFERENCE_SCRIPT_FILENAME);
    if (inference !== null) {
      fs.writeFile(join(stagingDir, INFERENCE_SCRIPT_FILENAME), inference);
    }
  }

  private readOverride(artifactDir: string, filename: string): string | null {
    return this.readOptional(join(artifactDir, ARTIFACT_SERVING_DIR, filename));
  }

  private readOptional(path: string): string | null {
    return this.ctx.fs.exists(path) ? this.ctx.fs.readFile(path) : null;
  }

  private buildArchive(stagingDir: string, archivePath: string, runId: string): Buffer {
    const { fs, shell } = this.ctx;

    try {
      createTarball(shell, stagingDir, archivePath);
    } catch (err) {
      throw new StorageError(`Failed to write archive for run ${runId}: ${errorMessage(err)}`, {
        cause: err,
        runId,
      });
    }

    const validation = validateTarballContents(shell, archivePath, [MANIFEST_FILENAME]);
    if (!validation.safe) {
      throw new RepackagingError(`Invalid archive for run ${runId}: ${validation.violations.join(", ")}`, {
        runId,
      });
    }

    return fs.readFileBinary(archivePath);
  }
}
