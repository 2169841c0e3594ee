/**
 * Tar archive utilities.
 *
 * Archives are built with the system tar through the injected executor,
 * then listed back and checked before anything is uploaded: no absolute
 * paths, no entries escaping the archive root, no symlinks pointing outside,
 * and every required entry present.
 */

import { normalize, isAbsolute, posix } from "path";
import type { ShellExecutor } from "./interfaces";

export interface TarValidationResult {
  safe: boolean;
  entries: string[];
  violations: string[];
}

/**
 * Create a gzipped tarball holding the contents of sourceDir (not the directory itself).
 */
export function createTarball(shell: ShellExecutor, sourceDir: string, tarballPath: string): void {
  shell.execFile("tar", ["-czf", tarballPath, "-C", sourceDir, "."]);
}

/**
 * List and validate tarball entries.
 *
 * @param requiredEntries - Archive-relative paths that must be present (e.g. "MLmodel")
 */
export function validateTarballContents(
  shell: ShellExecutor,
  tarballPath: string,
  requiredEntries: string[] = []
): TarValidationResult {
  const violations: string[] = [];
  const entries: string[] = [];

  try {
    const listOutput = shell.execFile("tar", ["-tzf", tarballPath]);
    const rawEntries = listOutput.trim().split("\n").filter(Boolean);

    // Verbose listing is only needed for symlink targets
    const verboseOutput = shell.execFile("tar", ["-tvzf", tarballPath]);
    const symlinkTargets = parseSymlinks(verboseOutput.trim().split("\n").filter(Boolean));

    for (const rawEntry of rawEntries) {
      if (isAbsolute(rawEntry)) {
        violations.push(`Absolute path in tarball: ${rawEntry}`);
        continue;
      }

      const entry = toArchivePath(rawEntry);
      if (!entry) continue;

      if (entry === ".." || entry.startsWith("../")) {
        violations.push(`Path traversal in tarball: ${rawEntry}`);
        continue;
      }
      entries.push(entry);

      const symlinkTarget = symlinkTargets.get(rawEntry);
      if (symlinkTarget !== undefined) {
        const resolvedTarget = posix.normalize(posix.join(posix.dirname(entry), symlinkTarget));
        if (posix.isAbsolute(symlinkTarget) || resolvedTarget.startsWith("..")) {
          violations.push(`Symlink escapes archive root: ${rawEntry} -> ${symlinkTarget}`);
        }
      }
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    violations.push(`Cannot list tarball: ${message}`);
  }

  // Presence is only meaningful when the listing itself was clean
  if (violations.length === 0) {
    const present = new Set(entries);
    for (const required of requiredEntries) {
      if (!present.has(required)) {
        violations.push(`Missing required entry: ${required}`);
      }
    }
  }

  return {
    safe: violations.length === 0,
    entries,
    violations,
  };
}

/**
 * Normalize a listed entry to an archive-relative path.
 *
 * @example toArchivePath("./MLmodel") → "MLmodel"
 * @example toArchivePath("./model/1/") → "model/1"
 * @example toArchivePath("./") → null
 */
export function toArchivePath(entry: string): string | null {
  const normalized = normalize(entry).split("\\").join("/").replace(/\/+$/, "");
  if (normalized === "." || normalized === "") return null;
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}

/**
 * Parse symlink targets from `tar -tv` output (GNU and BSD).
 * Symlink lines start with "l" and carry "name -> target" after the time field.
 */
function parseSymlinks(lines: string[]): Map<string, string> {
  const symlinks = new Map<string, string>();

  for (const line of lines) {
    if (!line.startsWith("l")) continue;

    const arrowIndex = line.indexOf(" -> ");
    if (arrowIndex === -1) continue;

    const target = line.substring(arrowIndex + 4);
    const name = line.substring(0, arrowIndex).match(/\d{1,2}:\d{2}\s+(.+)$/)?.[1]?.trim();
    if (name) {
      symlinks.set(name, target);
    }
  }

  return symlinks;
}

/**
 * Sanitize a path component to remove separators, null bytes and parent references.
 */
export function sanitizePathComponent(component: string): string {
  return component
    .replace(/[/\\]/g, "")
    .replace(/\0/g, "")
    .replace(/\.\./g, "");
}
