import type { SyncError, SyncErrorKind } from "#/errors";
import type { StaleReason } from "#/identity";
import type { SourceStage } from "#/schemas";
import type { SourceModelVersion, TargetModelPackage } from "#/registry/registry.types";

/**
 * What started a pass. Only modelName is used to resolve state;
 * the rest is carried into logs and the report.
 */
export interface ReconcileTrigger {
  modelName: string;
  notificationId?: string;
  version?: number;
  newStage?: SourceStage;
}

export interface ReconcileOptions {
  /** Called once the model's lease is held */
  onLeaseAcquired?: () => void;
}

// ============================================================================
// Plan
// ============================================================================

export interface CreateOperation {
  runId: string;
  version: SourceModelVersion;
}

/**
 * approval: rewrite approval and mirrored metadata in place
 * artifact: register a replacement package and retire the stale ones
 */
export type UpdateMode = "approval" | "artifact";

export interface UpdateOperation {
  runId: string;
  mode: UpdateMode;
  version: SourceModelVersion;
  package: TargetModelPackage;
  reasons: StaleReason[];
}

export interface DeleteOperation {
  runId: string;
  packages: TargetModelPackage[];
}

export type RetireReason = "duplicate" | "replaced";

/**
 * A package removed in the delete phase once its run's create or update succeeded
 */
export interface RetireOperation {
  runId: string;
  package: TargetModelPackage;
  reason: RetireReason;
}

export interface ReconcilePlan {
  modelName: string;
  groupName: string;
  toCreate: CreateOperation[];
  toUpdate: UpdateOperation[];
  toDelete: DeleteOperation[];
  toRetire: RetireOperation[];
  /** Consistent run ids */
  unchanged: string[];
  /** Archive locations of every desired run */
  expectedLocations: string[];
}

export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  retire: number;
  unchanged: number;
}

// ============================================================================
// Report
// ============================================================================

export type OperationKind = "repackage" | "create" | "update" | "delete" | "retire";

export type RunStatus = "created" | "updated" | "deleted" | "unchanged" | "failed";

export interface RunFailure {
  kind: SyncErrorKind;
  message: string;
  retryable: boolean;
}

export interface RunOutcome {
  runId: string;
  status: RunStatus;
  /** Step that failed */
  operation?: OperationKind;
  /** Package registered or updated for the run */
  handle?: string;
  artifactLocation?: string;
  /** True when the stored archive was reused */
  reusedArtifact?: boolean;
  /** Handles removed for the run (deleted, replaced or duplicate packages) */
  removed: string[];
  /** Adapter calls made for the run, retries included */
  attempts: number;
  error?: RunFailure;
}

export interface PruneFailure {
  location: string;
  message: string;
}

export interface ReconcileReport {
  modelName: string;
  groupName: string;
  notificationId?: string;
  plan: PlanSummary;
  /** One outcome per run id, ordered by run id */
  outcomes: RunOutcome[];
  /** Archives deleted after the delete phase */
  pruned: string[];
  pruneFailures: PruneFailure[];
  /** Target writes, uploads and archive deletions performed */
  mutations: number;
  retryableFailures: RunOutcome[];
  fatalFailures: RunOutcome[];
  durationMs: number;
}

export type ReconcileResult =
  | { ok: true; report: ReconcileReport }
  | { ok: false; modelName: string; error: SyncError };
