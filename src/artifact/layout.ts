/**
 * Archive layout per model flavor
 *
 * Where a flavor keeps its model files inside the source artifact, and where
 * the serving container expects them inside the archive.
 */

import { join } from "path";
import type { FileSystem } from "#/core";
import { INFERENCE_SCRIPT_FILENAME } from "#/constants";

/** Model data directory inside the source artifact ("." is the artifact root) */
const MODEL_DATA_PATHS: Record<string, string> = {
  tensorflow: "tfmodel",
  xgboost: ".",
  sklearn: ".",
  python_function: ".",
};
const DEFAULT_MODEL_DATA_PATH = "data/model";

/** Model data directory inside the archive ("." is the archive root) */
const SERVING_DATA_PATHS: Record<string, string> = {
  tensorflow: "model/1",
  keras: "model/1",
};
const DEFAULT_SERVING_DATA_PATH = ".";

/** Flavors served by a framework container running a user inference script */
const SCRIPT_MODE_FLAVORS = new Set(["sklearn", "xgboost"]);

export function getModelDataPath(flavor: string): string {
  return MODEL_DATA_PATHS[flavor] ?? DEFAULT_MODEL_DATA_PATH;
}

export function getServingDataPath(flavor: string): string {
  return SERVING_DATA_PATHS[flavor] ?? DEFAULT_SERVING_DATA_PATH;
}

/**
 * Container environment for a flavor.
 *
 * @example getServingEnvironment("sklearn", "s3://bucket/m/r1/model.tar.gz")
 *   → { SAGEMAKER_SUBMIT_DIRECTORY: "s3://bucket/m/r1/model.tar.gz", SAGEMAKER_PROGRAM: "inference.py" }
 */
export function getServingEnvironment(flavor: string, artifactLocation: string): Record<string, string> {
  if (!SCRIPT_MODE_FLAVORS.has(flavor)) return {};
  return {
    SAGEMAKER_SUBMIT_DIRECTORY: artifactLocation,
    SAGEMAKER_PROGRAM: INFERENCE_SCRIPT_FILENAME,
  };
}

/**
 * Copy a directory tree, skipping top-level entries listed in exclude.
 * Returns the number of files copied.
 */
export function copyTree(fs: FileSystem, src: string, dest: string, exclude: string[] = []): number {
  let copied = 0;

  function walk(currentSrc: string, currentDest: string, topLevel: boolean): void {
    fs.mkdir(currentDest, { recursive: true });

    for (const entry of fs.readdir(currentSrc)) {
      if (topLevel && exclude.includes(entry)) continue;

      const srcPath = join(currentSrc, entry);
      const destPath = join(currentDest, entry);
      const stat = fs.stat(srcPath);

      if (stat.isDirectory) {
        walk(srcPath, destPath, false);
      } else if (stat.isFile) {
        fs.copyFile(srcPath, destPath);
        copied++;
      }
    }
  }

  walk(src, dest, true);
  return copied;
}
