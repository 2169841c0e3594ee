/**
 * Reconciliation Engine
 *
 * One pass per trigger: lease the model, resolve both registries fresh,
 * plan by run id, then execute in phases that never interleave:
 *
 *   1. creates   repackage, upload, register
 *   2. updates   approval rewrite, or replacement package for a stale artifact
 *   3. deletes   packages of runs no longer deployable, plus retirements
 *   4. prune     archives no remaining package references
 *
 * Every step is retried on retryable failures. A failure is recorded against
 * its run id and never stops other runs.
 */

import { randomUUID } from "crypto";
import pLimit from "p-limit";
import type { EngineContext, Logger } from "#/core";
import { ARCHIVE_FILENAME } from "#/constants";
import {
  RepackagingError,
  ResolutionError,
  SyncError,
  TimeoutError,
  errorMessage,
  isSyncError,
  toRegistrationError,
} from "#/errors";
import { resolveIdentity, type IdentitySnapshot } from "#/identity";
import type { ArtifactRepackager, RepackageResult } from "#/artifact";
import { buildModelKeyPrefix, buildPackageDescription, toPackageGroupName } from "#/artifact/naming";
import { buildPackageMetadata, buildStageMetadata } from "#/registry/metadata";
import type { RegistryAdapters, SourceModelVersion, TargetModelPackage } from "#/registry/registry.types";
import type { ReconcileConfig } from "#/schemas";
import { InProcessLeaseProvider, type LeaseProvider } from "./lease";
import { isEmptyPlan, planReconciliation, summarizePlan } from "./plan";
import { withRetry, type RetryHooks } from "./retry";
import type {
  CreateOperation,
  DeleteOperation,
  OperationKind,
  PruneFailure,
  ReconcileOptions,
  ReconcilePlan,
  ReconcileReport,
  ReconcileResult,
  ReconcileTrigger,
  RetireOperation,
  RunOutcome,
  UpdateOperation,
} from "./reconcile.types";

export interface ReconciliationEngineOptions {
  config: ReconcileConfig;
  /** Store key prefix archives are written under */
  keyPrefix: string;
  leases?: LeaseProvider;
  /** Backoff sleep, replaced in tests */
  sleep?: (ms: number) => Promise<unknown>;
}

// Mutable state of a single pass; never outlives it
interface PassState {
  log: Logger;
  outcomes: Map<string, RunOutcome>;
  /** Archive locations written or confirmed during the pass */
  produced: Set<string>;
  pruned: string[];
  pruneFailures: PruneFailure[];
  mutations: number;
}

export class ReconciliationEngine {
  private ctx: EngineContext;
  private adapters: Pick<RegistryAdapters, "source" | "target" | "store">;
  private repackager: ArtifactRepackager;
  private config: ReconcileConfig;
  private keyPrefix: string;
  private leases: LeaseProvider;
  private sleep?: (ms: number) => Promise<unknown>;

  constructor(
    ctx: EngineContext,
    adapters: Pick<RegistryAdapters, "source" | "target" | "store">,
    repackager: ArtifactRepackager,
    options: ReconciliationEngineOptions
  ) {
    this.ctx = ctx;
    this.adapters = adapters;
    this.repackager = repackager;
    this.config = options.config;
    this.keyPrefix = options.keyPrefix;
    this.leases = options.leases ?? new InProcessLeaseProvider();
    this.sleep = options.sleep;
  }

  async reconcile(trigger: ReconcileTrigger, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const { modelName, notificationId } = trigger;
    const log = this.ctx.logger.child(notificationId ? { modelName, notificationId } : { modelName });
    const started = Date.now();

    // Models whose names map to one group share its lease
    const lease = await this.leases.acquire(toPackageGroupName(modelName), notificationId ?? randomUUID());
    try {
      options.onLeaseAcquired?.();
      log.info("Reconciliation started", { version: trigger.version, newStage: trigger.newStage });

      let snapshot: IdentitySnapshot;
      try {
        snapshot = await this.resolve(modelName, log);
      } catch (err) {
        const error = isSyncError(err)
          ? err
          : new ResolutionError(`Failed to resolve ${modelName}: ${errorMessage(err)}`, { cause: err });
        log.error("Identity resolution failed", { error: error.message });
        return { ok: false, modelName, error };
      }

      for (const version of snapshot.skipped) {
        log.warn("Deployable version not ready for packaging", {
          version: version.version,
          status: version.status,
          runId: version.runId || undefined,
        });
      }

      const plan = planReconciliation(snapshot);
      log.info("Reconciliation planned", { ...summarizePlan(plan) });

      const state: PassState = {
        log,
        outcomes: new Map(),
        produced: new Set(),
        pruned: [],
        pruneFailures: [],
        mutations: 0,
      };
      for (const runId of plan.unchanged) {
        state.outcomes.set(runId, { runId, status: "unchanged", removed: [], attempts: 0 });
      }

      if (!isEmptyPlan(plan)) {
        await this.execute(plan, state);
      }
      await this.prune(plan, state);

      const report = this.buildReport(trigger, plan, state, Date.now() - started);
      log.info("Reconciliation finished", {
        mutations: report.mutations,
        retryableFailures: report.retryableFailures.length,
        fatalFailures: report.fatalFailures.length,
        pruned: report.pruned.length,
      });
      return { ok: true, report };
    } finally {
      lease.release();
    }
  }

  private resolve(modelName: string, log: Logger): Promise<IdentitySnapshot> {
    const { source, target } = this.adapters;
    return withRetry(
      () =>
        resolveIdentity(modelName, source, target, {
          deployableStages: this.config.deployableStages,
          locationFor: (version) => this.repackager.locationFor(version),
        }),
      this.config.retry,
      this.retryHooks(log, "resolve")
    );
  }

  /**
   * Run the create, update and delete phases in order.
   * Each phase settles completely before the next one starts.
   */
  private async execute(plan: ReconcilePlan, state: PassState): Promise<void> {
    const limit = pLimit(this.config.concurrency);

    await Promise.all(plan.toCreate.map((op) => limit(() => this.create(op, plan, state))));
    await Promise.all(plan.toUpdate.map((op) => limit(() => this.update(op, plan, state))));
    await Promise.all([
      ...plan.toDelete.map((op) => limit(() => this.delete(op, state))),
      ...plan.toRetire.map((op) => limit(() => this.retire(op, state))),
    ]);
  }

  private async create(op: CreateOperation, plan: ReconcilePlan, state: PassState): Promise<void> {
    const outcome: RunOutcome = { runId: op.runId, status: "created", removed: [], attempts: 0 };
    state.outcomes.set(op.runId, outcome);

    try {
      const pkg = await this.register(op.version, plan, state, outcome);
      state.log.info("Package created", { runId: op.runId, handle: pkg.handle });
    } catch (err) {
      this.fail(outcome, err, state);
    }
  }

  private async update(op: UpdateOperation, plan: ReconcilePlan, state: PassState): Promise<void> {
    const outcome: RunOutcome = { runId: op.runId, status: "updated", removed: [], attempts: 0 };
    state.outcomes.set(op.runId, outcome);
    const log = state.log.child({ runId: op.runId });

    try {
      if (op.mode === "artifact") {
        const pkg = await this.register(op.version, plan, state, outcome);
        log.info("Replacement package created", { handle: pkg.handle, replaces: op.package.handle });
        return;
      }

      await this.step(outcome, "update", state, () =>
        this.adapters.target.updateApproval(op.package, "Approved", buildStageMetadata(op.version))
      );
      state.mutations++;
      outcome.handle = op.package.handle;
      outcome.artifactLocation = op.package.artifactLocation;
      log.info("Package updated", { handle: op.package.handle, reasons: op.reasons });
    } catch (err) {
      this.fail(outcome, err, state);
    }
  }

  private async delete(op: DeleteOperation, state: PassState): Promise<void> {
    const outcome: RunOutcome = { runId: op.runId, status: "deleted", removed: [], attempts: 0 };
    state.outcomes.set(op.runId, outcome);

    try {
      for (const pkg of op.packages) {
        await this.step(outcome, "delete", state, () => this.adapters.target.deletePackage(pkg));
        state.mutations++;
        outcome.removed.push(pkg.handle);
        state.log.info("Package deleted", { runId: op.runId, handle: pkg.handle });
      }
    } catch (err) {
      this.fail(outcome, err, state);
    }
  }

  /**
   * Remove a duplicate or replaced package, once its run's create or update
   * has succeeded
   */
  private async retire(op: RetireOperation, state: PassState): Promise<void> {
    const outcome = state.outcomes.get(op.runId);
    if (!outcome || outcome.status === "failed") {
      state.log.warn("Package kept: its run did not converge", { runId: op.runId, handle: op.package.handle });
      return;
    }

    try {
      await this.step(outcome, "retire", state, () => this.adapters.target.deletePackage(op.package));
      state.mutations++;
      outcome.removed.push(op.package.handle);
      if (outcome.status === "unchanged") outcome.status = "updated";
      state.log.info("Package retired", { runId: op.runId, handle: op.package.handle, reason: op.reason });
    } catch (err) {
      this.fail(outcome, err, state);
    }
  }

  /**
   * Repackage a version and register a package for it
   */
  private async register(
    version: SourceModelVersion,
    plan: ReconcilePlan,
    state: PassState,
    outcome: RunOutcome
  ): Promise<TargetModelPackage> {
    const artifact = await this.step(outcome, "repackage", state, () => this.repackageWithDeadline(version, state.log));
    state.produced.add(artifact.artifactLocation);
    outcome.artifactLocation = artifact.artifactLocation;
    outcome.reusedArtifact = artifact.reused;
    if (!artifact.reused) {
      state.mutations++;
    }

    const pkg = await this.step(outcome, "create", state, () =>
      this.adapters.target.createPackage({
        groupName: plan.groupName,
        modelName: version.modelName,
        runId: version.runId,
        version: version.version,
        approvalStatus: "Approved",
        artifactLocation: artifact.artifactLocation,
        imageReference: artifact.imageReference,
        environment: artifact.environment,
        metadata: buildPackageMetadata(version, artifact.integrity),
        description: buildPackageDescription(version.modelName, version.version),
      })
    );
    state.mutations++;
    outcome.handle = pkg.handle;
    return pkg;
  }

  /**
   * Repackage under the configured deadline. On expiry the attempt is aborted
   * through its signal and rejected with TimeoutError.
   */
  private async repackageWithDeadline(version: SourceModelVersion, log: Logger): Promise<RepackageResult> {
    const timeoutMs = this.config.repackageTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Repackaging run ${version.runId} exceeded ${timeoutMs}ms`, {
          runId: version.runId,
        });
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    const work = this.repackager.repackage(version, { signal: controller.signal });
    try {
      return await Promise.race([work, deadline]);
    } catch (err) {
      if (controller.signal.aborted) {
        // The abandoned attempt still settles; only log it
        work.catch((late: unknown) => {
          log.debug("Cancelled repackaging settled", { runId: version.runId, error: errorMessage(late) });
        });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Run one step of a run under the retry policy. Attempts are counted on the
   * outcome; the final failure is raised as a SyncError and the step recorded.
   */
  private async step<T>(
    outcome: RunOutcome,
    operation: OperationKind,
    state: PassState,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await withRetry(
        () => {
          outcome.attempts++;
          return run();
        },
        this.config.retry,
        this.retryHooks(state.log, operation, outcome.runId)
      );
    } catch (err) {
      outcome.operation = operation;
      throw toStepError(err, operation, outcome.runId);
    }
  }

  private fail(outcome: RunOutcome, err: unknown, state: PassState): void {
    const error = isSyncError(err) ? err : toStepError(err, outcome.operation ?? "create", outcome.runId);
    outcome.status = "failed";
    outcome.error = { kind: error.kind, message: error.message, retryable: error.retryable };

    const fields = { runId: outcome.runId, operation: outcome.operation, kind: error.kind, error: error.message };
    if (error.retryable) {
      state.log.warn("Run failed; a later pass will retry", fields);
    } else {
      state.log.error("Run failed", fields);
    }
  }

  /**
   * Delete archives under the model's prefix that no package references,
   * once every delete has settled. Packages are re-read so that failed
   * deletes and unmanaged packages keep their archives.
   */
  private async prune(plan: ReconcilePlan, state: PassState): Promise<void> {
    if (!this.config.pruneArtifacts) return;
    const { target, store } = this.adapters;
    const hooks = this.retryHooks(state.log, "prune");

    let remaining: TargetModelPackage[];
    let stored: string[];
    try {
      remaining = await withRetry(() => target.listPackages(plan.groupName), this.config.retry, hooks);
      stored = await withRetry(
        () => store.list(buildModelKeyPrefix(this.keyPrefix, plan.modelName)),
        this.config.retry,
        hooks
      );
    } catch (err) {
      state.log.warn("Archive pruning skipped", { error: errorMessage(err) });
      return;
    }

    const referenced = new Set<string>([...state.produced, ...plan.expectedLocations]);
    for (const pkg of remaining) {
      if (pkg.artifactLocation) referenced.add(pkg.artifactLocation);
    }

    const orphans = stored.filter(
      (location) => location.endsWith(`/${ARCHIVE_FILENAME}`) && !referenced.has(location)
    );
    for (const location of orphans) {
      try {
        await withRetry(() => store.delete(location), this.config.retry, hooks);
        state.mutations++;
        state.pruned.push(location);
        state.log.info("Orphaned archive deleted", { location });
      } catch (err) {
        state.pruneFailures.push({ location, message: errorMessage(err) });
        state.log.warn("Orphaned archive could not be deleted", { location, error: errorMessage(err) });
      }
    }
  }

  private buildReport(
    trigger: ReconcileTrigger,
    plan: ReconcilePlan,
    state: PassState,
    durationMs: number
  ): ReconcileReport {
    const outcomes = [...state.outcomes.values()].sort((a, b) => a.runId.localeCompare(b.runId));
    const failed = outcomes.filter((outcome) => outcome.status === "failed");

    return {
      modelName: plan.modelName,
      groupName: plan.groupName,
      notificationId: trigger.notificationId,
      plan: summarizePlan(plan),
      outcomes,
      pruned: state.pruned,
      pruneFailures: state.pruneFailures,
      mutations: state.mutations,
      retryableFailures: failed.filter((outcome) => outcome.error?.retryable),
      fatalFailures: failed.filter((outcome) => !outcome.error?.retryable),
      durationMs,
    };
  }

  private retryHooks(log: Logger, operation: string, runId?: string): RetryHooks {
    return {
      sleep: this.sleep,
      onRetry: (err, attempt, delayMs) => {
        log.warn("Retrying after transient failure", { operation, runId, attempt, delayMs, error: errorMessage(err) });
      },
    };
  }
}

function toStepError(err: unknown, operation: OperationKind, runId: string): SyncError {
  if (isSyncError(err)) return err;
  switch (operation) {
    case "repackage":
      return new RepackagingError(`Repackaging failed for run ${runId}: ${errorMessage(err)}`, { cause: err, runId });
    case "create":
      return toRegistrationError(err, `Failed to create package for run ${runId}`, runId);
    case "update":
      return toRegistrationError(err, `Failed to update package for run ${runId}`, runId);
    case "delete":
    case "retire":
      return toRegistrationError(err, `Failed to delete package for run ${runId}`, runId);
  }
}
