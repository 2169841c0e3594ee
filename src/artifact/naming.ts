import { sanitizePathComponent } from "#/core";
import { ARCHIVE_FILENAME, MAX_GROUP_NAME_LENGTH } from "#/constants";
import { RepackagingError } from "#/errors";

/**
 * Characters the target registry rejects in package group names.
 */
const INVALID_GROUP_CHARS = /[^a-zA-Z0-9-]/g;

/**
 * Convert a source model name to its package group name.
 * Every character outside [a-zA-Z0-9-] becomes "-"; the result is capped at 63 characters.
 *
 * @example toPackageGroupName("churn_model") → "churn-model"
 * @example toPackageGroupName("team.fraud model") → "team-fraud-model"
 */
export function toPackageGroupName(modelName: string): string {
  return modelName.replace(INVALID_GROUP_CHARS, "-").slice(0, MAX_GROUP_NAME_LENGTH);
}

/**
 * Key prefix holding every archive of a model.
 *
 * @example buildModelKeyPrefix("models/", "churn_model") → "models/churn_model/"
 */
export function buildModelKeyPrefix(keyPrefix: string, modelName: string): string {
  return `${keyPrefix}${toSafeKeyComponent(modelName)}/`;
}

/**
 * Deterministic archive key for a training run of a model.
 * Repackaging the same run always targets the same key.
 *
 * @example buildArchiveKey("models/", "churn_model", "a1b2c3") → "models/churn_model/a1b2c3/model.tar.gz"
 */
export function buildArchiveKey(keyPrefix: string, modelName: string, runId: string): string {
  return `${buildModelKeyPrefix(keyPrefix, modelName)}${toSafeKeyComponent(runId)}/${ARCHIVE_FILENAME}`;
}

/**
 * Package description shown in the target registry.
 *
 * @example buildPackageDescription("churn_model", 3) → "mlflow churn_model-v3"
 */
export function buildPackageDescription(modelName: string, version: number): string {
  return `mlflow ${modelName}-v${version}`;
}

function toSafeKeyComponent(value: string): string {
  const sanitized = sanitizePathComponent(value);
  if (!sanitized) {
    throw new RepackagingError(`Cannot derive a storage key from '${value}'`);
  }
  return sanitized;
}
