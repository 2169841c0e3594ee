/**
 * Identity Resolver
 *
 * Joins source versions and target packages on the training run id. Version
 * numbers and timestamps never take part in matching: a version can be
 * re-registered or re-tagged without changing the run it was trained in.
 */

import { DEFAULT_DEPLOYABLE_STAGES } from "#/constants";
import { ResolutionError, errorMessage } from "#/errors";
import type { SourceStage } from "#/schemas";
import { toPackageGroupName } from "#/artifact/naming";
import type {
  SourceModelVersion,
  SourceRegistryAdapter,
  TargetModelPackage,
  TargetRegistryAdapter,
} from "#/registry/registry.types";
import type { IdentityEntry, IdentitySnapshot, ResolveIdentityOptions, StaleReason } from "./identity.types";

const READY_STATUS = "READY";

// Higher wins when several deployable versions share a run id
const STAGE_RANK: Record<SourceStage, number> = {
  None: 0,
  Archived: 0,
  Staging: 1,
  Production: 2,
};

/**
 * Read both registries and join them on run id.
 * Adapter failures are raised as ResolutionError.
 */
export async function resolveIdentity(
  modelName: string,
  source: SourceRegistryAdapter,
  target: TargetRegistryAdapter,
  options: ResolveIdentityOptions
): Promise<IdentitySnapshot> {
  const groupName = toPackageGroupName(modelName);

  const [versions, packages] = await Promise.all([
    source.listVersions(modelName).catch((err: unknown) => {
      throw new ResolutionError(`Failed to list versions of ${modelName}: ${errorMessage(err)}`, { cause: err });
    }),
    target.listPackages(groupName).catch((err: unknown) => {
      throw new ResolutionError(`Failed to list packages of ${groupName}: ${errorMessage(err)}`, { cause: err });
    }),
  ]);

  return joinOnRunId(modelName, groupName, versions, packages, options);
}

/**
 * Pure join of already-read state
 */
export function joinOnRunId(
  modelName: string,
  groupName: string,
  versions: SourceModelVersion[],
  packages: TargetModelPackage[],
  options: ResolveIdentityOptions
): IdentitySnapshot {
  const deployable = new Set<SourceStage>(options.deployableStages ?? DEFAULT_DEPLOYABLE_STAGES);

  const skipped: SourceModelVersion[] = [];
  const desiredByRun = new Map<string, SourceModelVersion>();
  for (const version of versions) {
    if (version.modelName !== modelName || !deployable.has(version.stage)) continue;
    if (version.status !== READY_STATUS || !version.runId) {
      skipped.push(version);
      continue;
    }

    const current = desiredByRun.get(version.runId);
    if (!current || outranks(version, current)) {
      desiredByRun.set(version.runId, version);
    }
  }

  const unmanaged: TargetModelPackage[] = [];
  const packagesByRun = new Map<string, TargetModelPackage[]>();
  for (const pkg of packages) {
    if (!pkg.runId || !belongsTo(pkg, modelName)) {
      unmanaged.push(pkg);
      continue;
    }
    const existing = packagesByRun.get(pkg.runId);
    if (existing) {
      existing.push(pkg);
    } else {
      packagesByRun.set(pkg.runId, [pkg]);
    }
  }

  // Packages of runs whose deployable versions are still registering stay as they are
  const held: TargetModelPackage[] = [];
  const pendingRuns = new Set(skipped.map((version) => version.runId).filter((runId) => runId.length > 0));
  for (const runId of pendingRuns) {
    const pending = packagesByRun.get(runId);
    if (pending && !desiredByRun.has(runId)) {
      held.push(...pending);
      packagesByRun.delete(runId);
    }
  }

  const runIds = [...new Set([...desiredByRun.keys(), ...packagesByRun.keys()])].sort();
  const entries = runIds.map((runId) =>
    classify(runId, desiredByRun.get(runId), packagesByRun.get(runId) ?? [], options)
  );

  return { modelName, groupName, entries, unmanaged, held, skipped };
}

function classify(
  runId: string,
  desired: SourceModelVersion | undefined,
  packages: TargetModelPackage[],
  options: ResolveIdentityOptions
): IdentityEntry {
  if (!desired) {
    return { runId, status: "actual-only", packages, duplicates: [], staleReasons: [] };
  }

  const expectedLocation = options.locationFor(desired);
  if (packages.length === 0) {
    return { runId, status: "desired-only", desired, packages, duplicates: [], expectedLocation, staleReasons: [] };
  }

  const ordered = [...packages].sort(
    (a, b) =>
      Number(b.artifactLocation === expectedLocation) - Number(a.artifactLocation === expectedLocation) ||
      (b.createdAt?.getTime() ?? 0) - (a.createdAt?.getTime() ?? 0)
  );
  const [primary, ...duplicates] = ordered;
  if (!primary) {
    return { runId, status: "desired-only", desired, packages, duplicates: [], expectedLocation, staleReasons: [] };
  }

  const staleReasons = compare(primary, desired, expectedLocation);
  return {
    runId,
    status: staleReasons.length > 0 ? "stale" : "consistent",
    desired,
    packages,
    primary,
    duplicates,
    expectedLocation,
    staleReasons,
  };
}

function compare(pkg: TargetModelPackage, desired: SourceModelVersion, expectedLocation: string): StaleReason[] {
  const reasons: StaleReason[] = [];
  if (pkg.approvalStatus !== "Approved") reasons.push("approval");
  if (pkg.stage !== desired.stage) reasons.push("stage");
  if (pkg.version !== desired.version) reasons.push("version");
  if (pkg.artifactLocation !== expectedLocation) reasons.push("artifact");
  return reasons;
}

// Several model names can map to one group. Packages without a recorded name count as the model's.
function belongsTo(pkg: TargetModelPackage, modelName: string): boolean {
  return pkg.modelName === undefined || pkg.modelName === modelName;
}

function outranks(candidate: SourceModelVersion, current: SourceModelVersion): boolean {
  const rankDiff = STAGE_RANK[candidate.stage] - STAGE_RANK[current.stage];
  return rankDiff !== 0 ? rankDiff > 0 : candidate.version > current.version;
}

/**
 * Approved packages of a model recorded with a stage, newest source version first.
 * Used by deployment tooling to pick what to deploy for a stage.
 *
 * @example findPackagesForStage(target, "churn_model", "Production")
 */
export async function findPackagesForStage(
  target: TargetRegistryAdapter,
  modelName: string,
  stage: SourceStage
): Promise<TargetModelPackage[]> {
  const groupName = toPackageGroupName(modelName);

  let packages: TargetModelPackage[];
  try {
    packages = await target.listPackages(groupName);
  } catch (err) {
    throw new ResolutionError(`Failed to list packages of ${groupName}: ${errorMessage(err)}`, { cause: err });
  }

  return packages
    .filter(
      (pkg) => pkg.runId && belongsTo(pkg, modelName) && pkg.approvalStatus === "Approved" && pkg.stage === stage
    )
    .sort((a, b) => (b.version ?? 0) - (a.version ?? 0));
}
