/**
 * Default serving templates
 *
 * Flavor defaults for the inference script and requirements, used when the
 * source artifact ships no sagemaker/ overrides.
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const TEMPLATES_DIR = dirname(fileURLToPath(import.meta.url));

/**
 * Template body for a flavor, or null when the flavor has no default for that file
 */
export function getFlavorTemplate(flavor: string, filename: string): string | null {
  if (!/^[a-z0-9_]+$/.test(flavor)) return null;

  const templatePath = join(TEMPLATES_DIR, flavor, filename);
  if (!existsSync(templatePath)) return null;
  return readFileSync(templatePath, "utf-8");
}
