/**
 * Registry types and interfaces
 *
 * Capability interfaces for both registries and the artifact store.
 * The engine NEVER knows what MLflow or SageMaker is - only that there's
 * "a source registry", "a target registry" and "an artifact store".
 */

import type { ApprovalStatus, SourceStage } from "#/schemas";

/**
 * A version of a named model in the source registry.
 * Mutated upstream by stage transitions only; never deleted by the sync.
 */
export interface SourceModelVersion {
  modelName: string;
  /** Monotonically increasing per model; carries no cross-registry meaning */
  version: number;
  /** Training run identifier, the cross-registry join key */
  runId: string;
  stage: SourceStage;
  artifactUri: string;
  /** Registration status (READY once the artifact is available) */
  status: string;
  tags: Record<string, string>;
}

/**
 * A package in the target registry's package group (one group per model).
 */
export interface TargetModelPackage {
  /** Opaque handle (package ARN) */
  handle: string;
  groupName: string;
  /** Absent for packages the sync did not create */
  runId?: string;
  /** Source model the package was created for; several models can share a group */
  modelName?: string;
  approvalStatus?: ApprovalStatus;
  /** Source stage recorded at creation or last update */
  stage?: SourceStage;
  /** Source version recorded at creation or last update */
  version?: number;
  artifactLocation?: string;
  imageReference?: string;
  createdAt?: Date;
  metadata: Record<string, string>;
}

export interface CreatePackageInput {
  groupName: string;
  modelName: string;
  runId: string;
  version: number;
  approvalStatus: ApprovalStatus;
  artifactLocation: string;
  imageReference: string;
  environment: Record<string, string>;
  metadata: Record<string, string>;
  description: string;
}

export interface SourceRegistryAdapter {
  readonly type: string;

  /**
   * List every version of a model, whatever its stage
   */
  listVersions(modelName: string): Promise<SourceModelVersion[]>;

  /**
   * Download the version's artifact tree into targetDir.
   * An aborted signal stops the download with the signal's reason.
   */
  downloadArtifacts(version: SourceModelVersion, targetDir: string, signal?: AbortSignal): Promise<void>;
}

export interface TargetRegistryAdapter {
  readonly type: string;

  /**
   * List every package in a group. A group that does not exist yet is empty.
   */
  listPackages(groupName: string): Promise<TargetModelPackage[]>;

  /**
   * Register a package, creating its group first when needed
   */
  createPackage(input: CreatePackageInput): Promise<TargetModelPackage>;

  /**
   * Set approval status, replacing the given metadata keys
   */
  updateApproval(
    pkg: TargetModelPackage,
    status: ApprovalStatus,
    metadata?: Record<string, string>
  ): Promise<void>;

  deletePackage(pkg: TargetModelPackage): Promise<void>;
}

export interface StoredObject {
  location: string;
  integrity?: string;
  size?: number;
}

/**
 * Deterministically keyed object store with overwrite-safe writes.
 */
export interface ArtifactStore {
  readonly type: string;

  /** Location (URI) an object written under key will have */
  locationFor(key: string): string;

  /** Whether a location belongs to this store */
  owns(location: string): boolean;

  /** Object details, or null when the object does not exist */
  stat(location: string): Promise<StoredObject | null>;

  /** Write (or overwrite) an object; returns its location */
  put(key: string, body: Buffer, metadata: Record<string, string>): Promise<string>;

  delete(location: string): Promise<void>;

  /** Locations of every object under a key prefix */
  list(prefix: string): Promise<string[]>;
}

/**
 * External lookup of serving images by model flavor (e.g. a parameter store).
 */
export interface ImageCatalog {
  lookup(flavor: string): Promise<string | undefined>;
}

export interface RegistryAdapters {
  source: SourceRegistryAdapter;
  target: TargetRegistryAdapter;
  store: ArtifactStore;
  images?: ImageCatalog;
}
