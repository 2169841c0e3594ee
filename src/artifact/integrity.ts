import { createHash } from "crypto";
import { join, relative } from "path";
import type { FileSystem } from "#/core";

function hashContent(content: Buffer): string {
  const hash = createHash("sha256").update(content).digest("hex");
  return `sha256:${hash.slice(0, 32)}`;
}

/**
 * Hash all files in a directory recursively
 * Returns a map of relative paths (always "/"-separated) to their hashes
 */
export function hashDirectory(fs: FileSystem, dir: string): Record<string, string> {
  const hashes: Record<string, string> = {};

  function walkDir(currentDir: string): void {
    const entries = fs.readdir(currentDir);

    for (const entry of entries) {
      const fullPath = join(currentDir, entry);
      const stat = fs.stat(fullPath);

      if (stat.isDirectory) {
        walkDir(fullPath);
      } else if (stat.isFile) {
        const relativePath = relative(dir, fullPath).split("\\").join("/");
        hashes[relativePath] = hashContent(fs.readFileBinary(fullPath));
      }
    }
  }

  walkDir(dir);
  return hashes;
}

/**
 * Calculate integrity hash for a whole tree (hash of sorted file hashes).
 * Independent of file timestamps, so rebuilding an archive from the same
 * content yields the same integrity even when the archive bytes differ.
 */
export function calculateIntegrity(fileHashes: Record<string, string>): string {
  const sortedKeys = Object.keys(fileHashes).sort();
  const combined = sortedKeys.map((k) => `${k}:${fileHashes[k]}`).join("\n");
  const hash = createHash("sha256").update(combined).digest("hex");
  return `sha256:${hash.slice(0, 32)}`;
}

/**
 * Integrity of a directory tree in one call
 */
export function calculateDirectoryIntegrity(fs: FileSystem, dir: string): string {
  return calculateIntegrity(hashDirectory(fs, dir));
}
