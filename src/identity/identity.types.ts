import type { SourceStage } from "#/schemas";
import type { SourceModelVersion, TargetModelPackage } from "#/registry/registry.types";

/**
 * Join outcome for one run id
 *
 * - consistent:   package matches the desired version (no action)
 * - stale:        package exists but approval, mirrored stage/version or artifact disagree
 * - desired-only: deployable version without a package (create)
 * - actual-only:  package without a deployable version (delete)
 */
export type IdentityStatus = "consistent" | "stale" | "desired-only" | "actual-only";

export type StaleReason = "approval" | "stage" | "version" | "artifact";

export interface IdentityEntry {
  runId: string;
  status: IdentityStatus;
  /** Deployable version the run should be packaged from */
  desired?: SourceModelVersion;
  /** Every package carrying the run id */
  packages: TargetModelPackage[];
  /** Package kept for the run when a version is desired */
  primary?: TargetModelPackage;
  /** Packages of the run other than the primary */
  duplicates: TargetModelPackage[];
  /** Archive location the run's package should point at */
  expectedLocation?: string;
  staleReasons: StaleReason[];
}

export interface IdentitySnapshot {
  modelName: string;
  groupName: string;
  /** One entry per run id, ordered by run id */
  entries: IdentityEntry[];
  /** Packages without a run id or recorded for another model; never touched */
  unmanaged: TargetModelPackage[];
  /** Packages of runs whose only deployable versions are not READY yet; kept until they are */
  held: TargetModelPackage[];
  /** Versions in a deployable stage that cannot be packaged yet (not READY, no run id) */
  skipped: SourceModelVersion[];
}

export interface ResolveIdentityOptions {
  deployableStages?: readonly SourceStage[];
  /** Archive location expected for a version's package */
  locationFor: (version: SourceModelVersion) => string;
}
