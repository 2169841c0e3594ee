import type { PlanSummary, ReconcileReport, RunOutcome } from "#/reconcile/reconcile.types";

/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a number with thousand separators.
 *
 * @example formatNumber(1234567) → "1,234,567"
 */
export function formatNumber(num: number): string {
  return num.toLocaleString("en-US");
}

/**
 * @example formatDuration(850) → "850ms"
 * @example formatDuration(61_500) → "1m 1.5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds - minutes * 60).toFixed(1)}s`;
}

/**
 * One-line plan summary.
 *
 * @example formatPlanSummary({ create: 1, update: 0, delete: 2, retire: 0, unchanged: 3 })
 *   → "2 models to delete, 0 models to update, 1 new models to create"
 */
export function formatPlanSummary(plan: PlanSummary): string {
  const parts = [
    `${plan.delete} models to delete`,
    `${plan.update} models to update`,
    `${plan.create} new models to create`,
  ];
  if (plan.retire > 0) {
    parts.push(`${plan.retire} packages to retire`);
  }
  return parts.join(", ");
}

function formatOutcome(outcome: RunOutcome): string {
  if (outcome.status !== "failed" || !outcome.error) {
    return `  ${outcome.runId}: ${outcome.status}${outcome.handle ? ` (${outcome.handle})` : ""}`;
  }
  const retry = outcome.error.retryable ? "retryable" : "fatal";
  return `  ${outcome.runId}: failed during ${outcome.operation ?? "reconcile"} [${outcome.error.kind}, ${retry}] ${outcome.error.message}`;
}

/**
 * Multi-line, human readable pass report
 */
export function formatReport(report: ReconcileReport): string {
  const lines = [
    `${report.modelName} → ${report.groupName}: ${formatPlanSummary(report.plan)}`,
    ...report.outcomes.filter((outcome) => outcome.status !== "unchanged").map(formatOutcome),
  ];
  if (report.pruned.length > 0) {
    lines.push(`  pruned ${report.pruned.length} archive(s)`);
  }
  lines.push(
    `  ${formatNumber(report.mutations)} mutation(s) in ${formatDuration(report.durationMs)}, ` +
      `${report.retryableFailures.length} retryable and ${report.fatalFailures.length} fatal failure(s)`
  );
  return lines.join("\n");
}
