import { describe, test, expect } from "vitest";
import { formatBytes, formatDuration, formatNumber, formatPlanSummary, formatReport } from "./index";
import type { ReconcileReport } from "#/reconcile/reconcile.types";

describe("formatters", () => {
  describe("formatBytes", () => {
    test("returns B for bytes < 1024", () => {
      expect(formatBytes(500)).toBe("500 B");
      expect(formatBytes(0)).toBe("0 B");
    });

    test("returns KB for bytes < 1MB", () => {
      expect(formatBytes(1024)).toBe("1.0 KB");
      expect(formatBytes(1536)).toBe("1.5 KB");
    });

    test("returns MB for bytes >= 1MB", () => {
      expect(formatBytes(1572864)).toBe("1.5 MB");
    });
  });

  describe("formatNumber", () => {
    test("adds thousand separators", () => {
      expect(formatNumber(1234567)).toBe("1,234,567");
      expect(formatNumber(999)).toBe("999");
    });
  });

  describe("formatDuration", () => {
    test("keeps short durations in milliseconds", () => {
      expect(formatDuration(850)).toBe("850ms");
    });

    test("switches to seconds and minutes", () => {
      expect(formatDuration(2500)).toBe("2.5s");
      expect(formatDuration(61_500)).toBe("1m 1.5s");
    });
  });

  describe("formatPlanSummary", () => {
    test("lists deletes, updates and creates", () => {
      expect(formatPlanSummary({ create: 1, update: 0, delete: 2, retire: 0, unchanged: 3 })).toBe(
        "2 models to delete, 0 models to update, 1 new models to create"
      );
    });

    test("mentions retirements only when there are some", () => {
      expect(formatPlanSummary({ create: 0, update: 1, delete: 0, retire: 2, unchanged: 0 })).toBe(
        "0 models to delete, 1 models to update, 0 new models to create, 2 packages to retire"
      );
    });
  });

  describe("formatReport", () => {
    test("lists changed and failed runs", () => {
      const report: ReconcileReport = {
        modelName: "churn_model",
        groupName: "churn-model",
        plan: { create: 1, update: 0, delete: 1, retire: 0, unchanged: 1 },
        outcomes: [
          { runId: "r1", status: "unchanged", removed: [], attempts: 0 },
          { runId: "r2", status: "created", handle: "pkg/2", removed: [], attempts: 2 },
          {
            runId: "r3",
            status: "failed",
            operation: "delete",
            removed: [],
            attempts: 3,
            error: { kind: "registration", message: "Throttled", retryable: true },
          },
        ],
        pruned: [],
        pruneFailures: [],
        mutations: 2,
        retryableFailures: [],
        fatalFailures: [],
        durationMs: 1200,
      };

      expect(formatReport(report).split("\n")).toEqual([
        "churn_model → churn-model: 1 models to delete, 0 models to update, 1 new models to create",
        "  r2: created (pkg/2)",
        "  r3: failed during delete [registration, retryable] Throttled",
        "  2 mutation(s) in 1.2s, 0 retryable and 0 fatal failure(s)",
      ]);
    });
  });
});
