import { describe, test, expect, beforeEach } from "vitest";
import { ReconciliationEngine } from "./engine";
import { InProcessLeaseProvider } from "./lease";
import type { ReconcileReport, ReconcileResult } from "./reconcile.types";
import { ArtifactRepackager } from "#/artifact";
import { ImageResolver } from "#/images";
import { RepackagingError, ResolutionError } from "#/errors";
import { buildPackageMetadata } from "#/registry/metadata";
import type { SourceModelVersion } from "#/registry/registry.types";
import { ImagesConfigSchema, ReconcileConfigSchema } from "#/schemas";
import { createMockContext, createMockFileSystem, createMockLogger, createMockShellExecutor } from "#/test-utils/mocks";
import {
  FakeArtifactStore,
  FakeSourceRegistry,
  FakeTargetRegistry,
  createFakeTar,
  fatalError,
  sourceVersion,
  transientError,
} from "#/test-utils/fakes";

const MODEL = "churn_model";
const GROUP = "churn-model";

const SKLEARN_ARTIFACT = {
  MLmodel: "flavors:\n  sklearn:\n    pickled_model: model.pkl\n",
  "model.pkl": "pickle-bytes",
};

const keyOf = (runId: string) => `models/churn_model/${runId}/model.tar.gz`;
const locationOf = (runId: string) => `mem://test-bucket/${keyOf(runId)}`;

describe("ReconciliationEngine", () => {
  let source: FakeSourceRegistry;
  let target: FakeTargetRegistry;
  let store: FakeArtifactStore;
  let leases: InProcessLeaseProvider;
  let logger: ReturnType<typeof createMockLogger>;
  let createEngine: (config?: Record<string, unknown>) => ReconciliationEngine;

  beforeEach(() => {
    const fs = createMockFileSystem();
    logger = createMockLogger();
    const ctx = createMockContext({ fs, logger, shell: createMockShellExecutor({ tar: createFakeTar(fs) }) });
    source = new FakeSourceRegistry(fs);
    target = new FakeTargetRegistry();
    store = new FakeArtifactStore();
    leases = new InProcessLeaseProvider();

    const images = new ImageResolver(ImagesConfigSchema.parse({ flavors: { sklearn: "img-sklearn" } }));
    const repackager = new ArtifactRepackager(ctx, source, store, images, { keyPrefix: "models/" });

    createEngine = (config = {}) =>
      new ReconciliationEngine(ctx, { source, target, store }, repackager, {
        config: ReconcileConfigSchema.parse(config),
        keyPrefix: "models/",
        leases,
        sleep: async () => undefined,
      });
  });

  /** A package exactly matching a version, with its archive stored */
  function seedConsistent(version: SourceModelVersion, handle = `pkg/${version.runId}`) {
    store.seed(keyOf(version.runId), "archive", { integrity: "sha256:seeded" });
    return target.seed({
      handle,
      groupName: GROUP,
      artifactLocation: locationOf(version.runId),
      metadata: buildPackageMetadata(version),
    });
  }

  function reportOf(result: ReconcileResult): ReconcileReport {
    if (!result.ok) throw new Error(`Pass failed: ${result.error.message}`);
    return result.report;
  }

  const writes = () => target.calls.filter((call) => call.op !== "list");

  describe("scenarios", () => {
    test("a matching package produces zero operations", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      seedConsistent(v1);

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL, notificationId: "n1" }));

      expect(report.plan).toEqual({ create: 0, update: 0, delete: 0, retire: 0, unchanged: 1 });
      expect(report.outcomes).toEqual([{ runId: "r1", status: "unchanged", removed: [], attempts: 0 }]);
      expect(report.mutations).toBe(0);
      expect(report.notificationId).toBe("n1");
      expect(writes()).toEqual([]);
      expect(store.calls.map((call) => call.op)).toEqual(["list"]);
    });

    test("a version entering Staging gets one approved package", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      const v2 = sourceVersion({ runId: "r2", version: 2, stage: "Staging" });
      source.versions = [v1, v2];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      seedConsistent(v1);

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL, version: 2, newStage: "Staging" }));

      expect(report.plan.create).toBe(1);
      expect(report.outcomes[1]).toEqual({
        runId: "r2",
        status: "created",
        handle: "pkg/churn-model/1",
        artifactLocation: locationOf("r2"),
        reusedArtifact: false,
        removed: [],
        attempts: 2,
      });
      expect(report.mutations).toBe(2);

      const created = target.packages(GROUP).find((p) => p.runId === "r2");
      expect(created).toMatchObject({ approvalStatus: "Approved", stage: "Staging", version: 2 });
      expect(target.created[0]).toMatchObject({
        description: "mlflow churn_model-v2",
        imageReference: "img-sklearn",
        artifactLocation: locationOf("r2"),
      });
    });

    test("an archived version loses its package and then its archive", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Archived" });
      source.versions = [v1];
      seedConsistent(v1);

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.plan.delete).toBe(1);
      expect(report.outcomes).toEqual([
        { runId: "r1", status: "deleted", removed: ["pkg/r1"], attempts: 1 },
      ]);
      expect(report.pruned).toEqual([locationOf("r1")]);
      expect(report.mutations).toBe(2);
      expect(target.packages(GROUP)).toEqual([]);
      expect(store.objects.size).toBe(0);
    });

    test("keeps the archive when the package delete fails", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Archived" });
      source.versions = [v1];
      seedConsistent(v1);
      target.fail("delete", "pkg/r1", fatalError());

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes[0]).toMatchObject({
        status: "failed",
        operation: "delete",
        error: { kind: "registration", message: "Failed to delete package for run r1: Access denied", retryable: false },
      });
      expect(report.pruned).toEqual([]);
      expect(store.objects.has(keyOf("r1"))).toBe(true);
    });
  });

  describe("idempotence", () => {
    test("a second pass over unchanged state makes no mutations", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      const v2 = sourceVersion({ runId: "r2", version: 2, stage: "Staging" });
      source.versions = [v1, v2];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      seedConsistent(v1);
      const engine = createEngine();

      reportOf(await engine.reconcile({ modelName: MODEL }));
      const callsBefore = writes().length;
      const second = reportOf(await engine.reconcile({ modelName: MODEL }));

      expect(second.mutations).toBe(0);
      expect(second.plan).toEqual({ create: 0, update: 0, delete: 0, retire: 0, unchanged: 2 });
      expect(writes()).toHaveLength(callsBefore);
      expect(source.calls.filter((call) => call.op === "download")).toHaveLength(1);
    });
  });

  describe("failure isolation", () => {
    test("a broken artifact fails only its own run", async () => {
      source.versions = [
        sourceVersion({ runId: "r1", stage: "Production" }),
        sourceVersion({ runId: "r2", version: 2, stage: "Staging" }),
      ];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      target.seed({ handle: "pkg/r3", groupName: GROUP, metadata: { mlflow_run_id: "r3" } });

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes.map((o) => [o.runId, o.status])).toEqual([
        ["r1", "failed"],
        ["r2", "created"],
        ["r3", "deleted"],
      ]);
      expect(report.fatalFailures).toHaveLength(1);
      expect(report.fatalFailures[0]).toMatchObject({
        runId: "r1",
        operation: "repackage",
        attempts: 1,
        error: { kind: "repackaging", message: "Cannot read artifact for run r1: No artifacts for run r1", retryable: false },
      });
      expect(report.retryableFailures).toEqual([]);
    });

    test("a transient registration failure is retried, then reported as retryable", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, stage: "Staging" })];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      target.fail("create", "r2", transientError());

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.retryableFailures).toHaveLength(1);
      expect(report.retryableFailures[0]).toMatchObject({
        runId: "r2",
        operation: "create",
        attempts: 4,
        error: { kind: "registration", message: "Failed to create package for run r2: Service unavailable", retryable: true },
      });
      // Uploaded this pass, so not pruned
      expect(store.objects.has(keyOf("r2"))).toBe(true);
    });

    test("recovers when a transient failure clears within the retry budget", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, stage: "Staging" })];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      target.fail("create", "r2", transientError(), 2);

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes[0]).toMatchObject({ runId: "r2", status: "created", attempts: 4 });
      expect(logger.entries.filter((e) => e.message === "Retrying after transient failure")).toHaveLength(2);
    });
  });

  describe("ordering", () => {
    test("deletes run only after creates are registered", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, stage: "Staging" })];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      target.seed({ handle: "pkg/r1", groupName: GROUP, metadata: { mlflow_run_id: "r1" } });
      target.fail("create", "r2", transientError(), 1);

      reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(writes().map((call) => [call.op, call.runId])).toEqual([
        ["create", "r2"],
        ["create", "r2"],
        ["delete", "r1"],
      ]);
    });
  });

  describe("timeouts", () => {
    test("aborts repackaging past its deadline and registers nothing", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, stage: "Staging" })];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      source.onDownload = (_version, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal?.reason));
        });

      const report = reportOf(
        await createEngine({ repackageTimeoutMs: 20, retry: { maxAttempts: 1 } }).reconcile({ modelName: MODEL })
      );

      expect(report.outcomes[0]).toMatchObject({
        runId: "r2",
        status: "failed",
        operation: "repackage",
        error: { kind: "timeout", message: "Repackaging run r2 exceeded 20ms", retryable: true },
      });
      expect(report.retryableFailures).toHaveLength(1);
      expect(writes()).toEqual([]);
      expect(store.calls.filter((call) => call.op === "put")).toEqual([]);
    });
  });

  describe("stale packages", () => {
    test("rewrites approval and mirrored stage in place", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      target.seed({
        handle: "pkg/r1",
        groupName: GROUP,
        approvalStatus: "PendingManualApproval",
        artifactLocation: locationOf("r1"),
        metadata: buildPackageMetadata({ ...v1, stage: "Staging" }),
      });

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes).toEqual([
        {
          runId: "r1",
          status: "updated",
          handle: "pkg/r1",
          artifactLocation: locationOf("r1"),
          removed: [],
          attempts: 1,
        },
      ]);
      expect(report.mutations).toBe(1);
      expect(target.packages(GROUP)[0]).toMatchObject({ approvalStatus: "Approved", stage: "Production" });
    });

    test("replaces a package whose archive location is stale", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      source.artifacts.set("r1", SKLEARN_ARTIFACT);
      target.seed({
        handle: "pkg/old",
        groupName: GROUP,
        artifactLocation: "s3://legacy/r1.tar.gz",
        metadata: buildPackageMetadata(v1),
      });

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes[0]).toMatchObject({
        runId: "r1",
        status: "updated",
        handle: "pkg/churn-model/1",
        removed: ["pkg/old"],
        attempts: 3,
      });
      expect(target.packages(GROUP).map((p) => p.handle)).toEqual(["pkg/churn-model/1"]);
    });

    test("keeps the stale package when its replacement fails", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      source.artifacts.set("r1", SKLEARN_ARTIFACT);
      target.seed({
        handle: "pkg/old",
        groupName: GROUP,
        artifactLocation: "s3://legacy/r1.tar.gz",
        metadata: buildPackageMetadata(v1),
      });
      target.fail("create", "r1", fatalError());

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes[0]).toMatchObject({ runId: "r1", status: "failed", operation: "create", removed: [] });
      expect(target.packages(GROUP).map((p) => p.handle)).toEqual(["pkg/old"]);
    });

    test("retires duplicate packages of a run", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      for (const [handle, createdAt] of [["pkg/a", 1000], ["pkg/b", 2000]] as const) {
        target.seed({
          handle,
          groupName: GROUP,
          createdAt: new Date(createdAt),
          artifactLocation: locationOf("r1"),
          metadata: buildPackageMetadata(v1),
        });
      }

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes).toEqual([{ runId: "r1", status: "updated", removed: ["pkg/a"], attempts: 1 }]);
      expect(target.packages(GROUP).map((p) => p.handle)).toEqual(["pkg/b"]);
    });
  });

  describe("pruning", () => {
    test("deletes only archives no package references", async () => {
      const v1 = sourceVersion({ runId: "r1", stage: "Production" });
      source.versions = [v1];
      seedConsistent(v1);
      target.seed({ handle: "pkg/manual", groupName: GROUP, artifactLocation: locationOf("manual"), metadata: {} });
      store.seed(keyOf("manual"), "archive");
      store.seed(keyOf("r9"), "archive");
      store.seed("models/churn_model/r1/notes.txt", "notes");
      store.seed("models/churn_model_v2/r9/model.tar.gz", "archive");

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.pruned).toEqual([locationOf("r9")]);
      expect(report.mutations).toBe(1);
      expect([...store.objects.keys()].sort()).toEqual([
        "models/churn_model/manual/model.tar.gz",
        "models/churn_model/r1/model.tar.gz",
        "models/churn_model/r1/notes.txt",
        "models/churn_model_v2/r9/model.tar.gz",
      ]);
    });

    test("records archives that cannot be deleted", async () => {
      store.seed(keyOf("r9"), "archive");
      store.fail("delete", locationOf("r9"), fatalError());

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.pruned).toEqual([]);
      expect(report.pruneFailures).toEqual([{ location: locationOf("r9"), message: "Access denied" }]);
    });

    test("can be disabled", async () => {
      store.seed(keyOf("r9"), "archive");

      const report = reportOf(await createEngine({ pruneArtifacts: false }).reconcile({ modelName: MODEL }));

      expect(report.pruned).toEqual([]);
      expect(store.calls).toEqual([]);
    });
  });

  describe("resolution", () => {
    test("fails the pass and releases the lease when a registry cannot be read", async () => {
      source.fail("list", MODEL, transientError());

      const result = await createEngine().reconcile({ modelName: MODEL, notificationId: "n1" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ResolutionError);
      expect(result.error.message).toBe("Failed to list versions of churn_model: Service unavailable");
      expect(source.calls.filter((call) => call.op === "list")).toHaveLength(3);
      expect(leases.holderOf(GROUP)).toBeUndefined();
    });

    test("ignores deployable versions that are not ready", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, status: "PENDING_REGISTRATION" })];

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes).toEqual([]);
      expect(writes()).toEqual([]);
    });

    test("keeps the package of a run whose deployable version is still registering", async () => {
      seedConsistent(sourceVersion({ runId: "r1", version: 1 }));
      source.versions = [sourceVersion({ runId: "r1", version: 2, status: "PENDING_REGISTRATION" })];

      const report = reportOf(await createEngine().reconcile({ modelName: MODEL }));

      expect(report.outcomes).toEqual([]);
      expect(report.pruned).toEqual([]);
      expect(writes()).toEqual([]);
      expect(target.packages(GROUP).map((p) => p.runId)).toEqual(["r1"]);
    });

    test("fails the pass without retrying when a run id cannot become a storage key", async () => {
      source.versions = [sourceVersion({ runId: ".." })];

      const result = await createEngine().reconcile({ modelName: MODEL });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(RepackagingError);
      expect(result.error.message).toBe("Cannot derive a storage key from '..'");
      expect(source.calls.filter((call) => call.op === "list")).toHaveLength(1);
      expect(writes()).toEqual([]);
    });
  });

  describe("leases", () => {
    test("serializes passes for the same model", async () => {
      source.versions = [sourceVersion({ runId: "r2", version: 2, stage: "Staging" })];
      source.artifacts.set("r2", SKLEARN_ARTIFACT);
      const engine = createEngine();
      const acquired: string[] = [];

      const first = engine.reconcile({ modelName: MODEL, notificationId: "n1" }, { onLeaseAcquired: () => acquired.push("n1") });
      const second = engine.reconcile({ modelName: MODEL, notificationId: "n2" }, { onLeaseAcquired: () => acquired.push("n2") });
      expect(leases.waiting(GROUP)).toBe(1);

      const [firstReport, secondReport] = [reportOf(await first), reportOf(await second)];

      expect(acquired).toEqual(["n1", "n2"]);
      expect(firstReport.plan.create).toBe(1);
      expect(secondReport.mutations).toBe(0);
      expect(target.created).toHaveLength(1);
    });

    test("distinct models do not wait on each other", async () => {
      const engine = createEngine();

      const passes = [
        engine.reconcile({ modelName: MODEL, notificationId: "n1" }),
        engine.reconcile({ modelName: "fraud_model", notificationId: "n2" }),
      ];

      expect(leases.holderOf(GROUP)).toBe("n1");
      expect(leases.holderOf("fraud-model")).toBe("n2");
      expect(leases.waiting(GROUP)).toBe(0);
      await Promise.all(passes);
    });

    test("models sharing a package group wait on each other", async () => {
      const engine = createEngine();

      const passes = [
        engine.reconcile({ modelName: MODEL, notificationId: "n1" }),
        engine.reconcile({ modelName: "churn-model", notificationId: "n2" }),
      ];

      expect(leases.holderOf(GROUP)).toBe("n1");
      expect(leases.waiting(GROUP)).toBe(1);
      await Promise.all(passes);
    });
  });

  describe("shared package groups", () => {
    test("models whose names map to one group keep each other's packages", async () => {
      source.versions = [
        sourceVersion({ runId: "ra", stage: "Production" }),
        sourceVersion({ modelName: "churn-model", runId: "rb", stage: "Production" }),
      ];
      source.artifacts.set("ra", SKLEARN_ARTIFACT);
      source.artifacts.set("rb", SKLEARN_ARTIFACT);
      const engine = createEngine();
      const statuses = (report: ReconcileReport) => report.outcomes.map((o) => [o.runId, o.status]);

      const first = reportOf(await engine.reconcile({ modelName: MODEL }));
      const second = reportOf(await engine.reconcile({ modelName: "churn-model" }));
      const third = reportOf(await engine.reconcile({ modelName: MODEL }));

      expect(statuses(first)).toEqual([["ra", "created"]]);
      expect(statuses(second)).toEqual([["rb", "created"]]);
      expect(statuses(third)).toEqual([["ra", "unchanged"]]);
      expect(third.mutations).toBe(0);
      expect(target.packages(GROUP).map((p) => [p.modelName, p.runId])).toEqual([
        ["churn_model", "ra"],
        ["churn-model", "rb"],
      ]);
    });
  });

  describe("convergence", () => {
    test("approved run ids follow the source stages across passes", async () => {
      for (const runId of ["r1", "r2", "r3"]) source.artifacts.set(runId, SKLEARN_ARTIFACT);
      const engine = createEngine();
      const approvedRuns = () =>
        target
          .packages(GROUP)
          .filter((p) => p.approvalStatus === "Approved")
          .map((p) => p.runId)
          .sort();

      source.versions = [
        sourceVersion({ runId: "r1", version: 1, stage: "Production" }),
        sourceVersion({ runId: "r2", version: 2, stage: "Staging" }),
      ];
      reportOf(await engine.reconcile({ modelName: MODEL }));
      expect(approvedRuns()).toEqual(["r1", "r2"]);

      source.versions = [
        sourceVersion({ runId: "r1", version: 1, stage: "Archived" }),
        sourceVersion({ runId: "r2", version: 2, stage: "Production" }),
        sourceVersion({ runId: "r3", version: 3, stage: "Staging" }),
      ];
      const second = reportOf(await engine.reconcile({ modelName: MODEL }));
      expect(second.outcomes.map((o) => [o.runId, o.status])).toEqual([
        ["r1", "deleted"],
        ["r2", "updated"],
        ["r3", "created"],
      ]);
      expect(second.pruned).toEqual([locationOf("r1")]);
      expect(approvedRuns()).toEqual(["r2", "r3"]);
      expect(target.packages(GROUP).find((p) => p.runId === "r2")?.stage).toBe("Production");

      const third = reportOf(await engine.reconcile({ modelName: MODEL }));
      expect(third.mutations).toBe(0);
    });
  });
});
