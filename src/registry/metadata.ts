/**
 * Package metadata mapping
 *
 * The target registry stores the join key and the mirrored source state as
 * string metadata on each package. Writing and reading go through here so
 * adapters and fakes agree on the format.
 */

import { METADATA_KEYS } from "#/constants";
import { normalizeStage, type SourceStage } from "#/schemas";
import type { SourceModelVersion } from "./registry.types";

export interface MirroredState {
  runId?: string;
  modelName?: string;
  stage?: SourceStage;
  version?: number;
}

/**
 * Metadata recorded on a package for a source version.
 * Empty values are left out.
 */
export function buildPackageMetadata(
  version: SourceModelVersion,
  integrity?: string
): Record<string, string> {
  const metadata: Record<string, string> = {
    [METADATA_KEYS.runId]: version.runId,
    [METADATA_KEYS.stage]: version.stage,
    [METADATA_KEYS.version]: String(version.version),
    [METADATA_KEYS.name]: version.modelName,
    [METADATA_KEYS.source]: version.artifactUri,
  };

  if (integrity) {
    metadata[METADATA_KEYS.integrity] = integrity;
  }

  return Object.fromEntries(Object.entries(metadata).filter(([, value]) => value.length > 0));
}

/**
 * Metadata keys that follow the source stage (rewritten on approval updates).
 */
export function buildStageMetadata(version: SourceModelVersion): Record<string, string> {
  return {
    [METADATA_KEYS.stage]: version.stage,
    [METADATA_KEYS.version]: String(version.version),
  };
}

/**
 * Read the mirrored source state back from package metadata.
 * Unknown stages and non-numeric versions read as absent.
 */
export function readMirroredState(metadata: Record<string, string>): MirroredState {
  const runId = metadata[METADATA_KEYS.runId]?.trim();
  const modelName = metadata[METADATA_KEYS.name]?.trim();
  const rawVersion = metadata[METADATA_KEYS.version];
  const version = rawVersion !== undefined && /^\d+$/.test(rawVersion) ? Number(rawVersion) : undefined;

  return {
    runId: runId ? runId : undefined,
    modelName: modelName ? modelName : undefined,
    stage: normalizeStage(metadata[METADATA_KEYS.stage]),
    version,
  };
}
