/**
 * Version utilities
 *
 * Thin wrapper over the semver package for framework versions. Framework and
 * image versions are loose ("1.2-1", "2.11", 1.7 read from YAML), so everything
 * goes through semver.coerce before comparison.
 */

import semver, { type SemVer } from "semver";

/**
 * Coerce a loose version into semver.
 * Returns null when nothing version-like can be extracted.
 *
 * @example parseLooseVersion("1.2-1") → 1.2.0
 * @example parseLooseVersion(1.7) → 1.7.0
 * @example parseLooseVersion("latest") → null
 */
export function parseLooseVersion(raw: unknown): SemVer | null {
  if (typeof raw !== "string" && typeof raw !== "number") return null;
  return semver.coerce(String(raw));
}

/**
 * Compare two loose versions.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b. Unparseable versions sort lowest.
 */
export function compareLooseVersions(a: string, b: string): -1 | 0 | 1 {
  const va = parseLooseVersion(a);
  const vb = parseLooseVersion(b);
  if (!va && !vb) return 0;
  if (!va) return -1;
  if (!vb) return 1;
  return semver.compare(va, vb);
}

/**
 * Sort versions in descending order (highest first).
 * Versions that cannot be coerced are filtered out.
 */
export function sortVersionsDesc(versions: string[]): string[] {
  const valid = versions.filter((v) => parseLooseVersion(v) !== null);
  return valid.sort((a, b) => compareLooseVersions(b, a));
}

/**
 * Get the highest version from a list.
 * Returns null if the list is empty or has no valid versions.
 */
export function getHighestVersion(versions: string[]): string | null {
  const sorted = sortVersionsDesc(versions);
  return sorted[0] ?? null;
}

/**
 * Pick the best available framework version for a requested one:
 * the highest available version with the same major (and minor, when matchMinor).
 *
 * @example matchFrameworkVersion("1.2.2", ["0.23-1", "1.0-1", "1.2-1"]) → "1.2-1"
 * @example matchFrameworkVersion("2.0.1", ["0.23-1", "1.0-1"]) → null
 */
export function matchFrameworkVersion(
  requested: unknown,
  available: string[],
  matchMinor = false
): string | null {
  const wanted = parseLooseVersion(requested);
  if (!wanted) return null;

  const candidates = available.filter((candidate) => {
    const parsed = parseLooseVersion(candidate);
    if (!parsed || parsed.major !== wanted.major) return false;
    return !matchMinor || parsed.minor === wanted.minor;
  });

  return getHighestVersion(candidates);
}
