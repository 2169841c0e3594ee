import { join } from "path";
import type { FileSystem } from "#/core";
import { DEPLOY_FLAVOR_TAG, MANIFEST_FILENAME, PYTHON_FUNCTION_FLAVOR } from "#/constants";
import { MlmodelSchema, type Mlmodel } from "#/schemas";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";

// Package name pinned in requirements.txt for a framework, when it differs from the flavor
const REQUIREMENT_PACKAGES: Record<string, string> = {
  sklearn: "scikit-learn",
  pytorch: "torch",
};

/**
 * Read and validate the MLmodel manifest at the root of an artifact tree.
 */
export function readMlmodel(fs: FileSystem, artifactDir: string): ParseResult<Mlmodel> {
  const manifestPath = join(artifactDir, MANIFEST_FILENAME);
  if (!fs.exists(manifestPath)) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Missing ${MANIFEST_FILENAME} manifest`,
      },
    };
  }

  return safeParseYaml(fs.readFile(manifestPath), MlmodelSchema, MANIFEST_FILENAME);
}

/**
 * Select the flavor to package.
 *
 * Priority:
 * 1. The deploy-flavor tag on the source version
 * 2. The first flavor other than python_function
 * 3. python_function
 */
export function selectFlavor(manifest: Mlmodel, tags: Record<string, string>): string | null {
  const tagged = tags[DEPLOY_FLAVOR_TAG]?.trim();
  if (tagged) return tagged;

  const flavors = Object.keys(manifest.flavors);
  return flavors.find((flavor) => flavor !== PYTHON_FUNCTION_FLAVOR) ?? flavors[0] ?? null;
}

/**
 * Framework version recorded by a flavor (e.g. sklearn_version, xgb_version).
 * Returned as found; YAML may have read it as a number.
 */
export function getFlavorVersion(manifest: Mlmodel, flavor: string): unknown {
  const config = manifest.flavors[flavor];
  if (!config) return undefined;

  const key = flavor === "xgboost" ? "xgb_version" : `${flavor}_version`;
  return config[key];
}

/**
 * Version pinned with "==" for a framework in a requirements file.
 *
 * @example getPinnedVersion("scikit-learn==1.2.2\nnumpy==1.24.0", "sklearn") → "1.2.2"
 */
export function getPinnedVersion(requirements: string, framework: string): string | undefined {
  const pkg = (REQUIREMENT_PACKAGES[framework] ?? framework).toLowerCase();

  for (const line of requirements.split("\n")) {
    const [name, version] = line.trim().split("==");
    if (name?.trim().toLowerCase() === pkg && version) {
      return version.trim();
    }
  }
  return undefined;
}

export function hasFlavor(manifest: Mlmodel, flavor: string): boolean {
  return flavor in manifest.flavors;
}
