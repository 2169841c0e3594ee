import type { IdentitySnapshot } from "#/identity";
import type { PlanSummary, ReconcilePlan } from "./reconcile.types";

/**
 * Turn a snapshot into disjoint create, update and delete sets keyed by run id.
 *
 * Duplicate packages of a run that keeps a package are retired; when the
 * artifact location is stale the run gets a replacement package and every
 * old package of the run is retired.
 */
export function planReconciliation(snapshot: IdentitySnapshot): ReconcilePlan {
  const plan: ReconcilePlan = {
    modelName: snapshot.modelName,
    groupName: snapshot.groupName,
    toCreate: [],
    toUpdate: [],
    toDelete: [],
    toRetire: [],
    unchanged: [],
    expectedLocations: [],
  };

  for (const entry of snapshot.entries) {
    if (entry.expectedLocation) {
      plan.expectedLocations.push(entry.expectedLocation);
    }

    switch (entry.status) {
      case "desired-only":
        if (entry.desired) {
          plan.toCreate.push({ runId: entry.runId, version: entry.desired });
        }
        break;

      case "actual-only":
        plan.toDelete.push({ runId: entry.runId, packages: entry.packages });
        break;

      case "consistent":
        plan.unchanged.push(entry.runId);
        for (const duplicate of entry.duplicates) {
          plan.toRetire.push({ runId: entry.runId, package: duplicate, reason: "duplicate" });
        }
        break;

      case "stale": {
        if (!entry.desired || !entry.primary) break;
        const replaceArtifact = entry.staleReasons.includes("artifact");
        plan.toUpdate.push({
          runId: entry.runId,
          mode: replaceArtifact ? "artifact" : "approval",
          version: entry.desired,
          package: entry.primary,
          reasons: entry.staleReasons,
        });
        if (replaceArtifact) {
          plan.toRetire.push({ runId: entry.runId, package: entry.primary, reason: "replaced" });
        }
        for (const duplicate of entry.duplicates) {
          plan.toRetire.push({ runId: entry.runId, package: duplicate, reason: "duplicate" });
        }
        break;
      }
    }
  }

  return plan;
}

export function summarizePlan(plan: ReconcilePlan): PlanSummary {
  return {
    create: plan.toCreate.length,
    update: plan.toUpdate.length,
    delete: plan.toDelete.length,
    retire: plan.toRetire.length,
    unchanged: plan.unchanged.length,
  };
}

/**
 * Whether executing the plan would touch the target at all
 */
export function isEmptyPlan(plan: ReconcilePlan): boolean {
  return (
    plan.toCreate.length === 0 &&
    plan.toUpdate.length === 0 &&
    plan.toDelete.length === 0 &&
    plan.toRetire.length === 0
  );
}
