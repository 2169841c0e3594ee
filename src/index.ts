/**
 * registry-sync-engine
 *
 * Reconciles MLflow registered models into SageMaker model package groups.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from "#/core";

// Errors (sync error taxonomy)
export * from "#/errors";

// Schemas (Zod validation)
export * from "#/schemas";

// Configuration loading
export * from "#/config";

// Friendly parse errors
export * from "#/friendly-errors";

// Formatters (pure utilities)
export * from "#/formatters";

// Artifact (MLmodel, naming, repackaging)
export * from "#/artifact";

// Serving image resolution
export * from "#/images";

// Registry (MLflow, SageMaker, S3, SSM adapters)
export * from "#/registry";

// Identity (run id join between registries)
export * from "#/identity";

// Reconciliation (plan, engine, retry, leases)
export * from "#/reconcile";

// Webhook intake
export * from "#/intake";

// Service (bootstrap, alerts, notification handling)
export * from "#/service";

// Version utilities (loose semver)
export * from "#/version";

export * from "#/constants";
