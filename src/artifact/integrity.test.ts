import { describe, test, expect } from "vitest";
import { hashDirectory, calculateIntegrity, calculateDirectoryIntegrity } from "./integrity";
import { createMockFileSystem } from "#/test-utils/mocks";

describe("integrity", () => {
  describe("hashDirectory", () => {
    test("returns empty object for empty directory", () => {
      const fs = createMockFileSystem();
      fs.files.set("/dir", { content: "", isDirectory: true });

      const result = hashDirectory(fs, "/dir");

      expect(result).toEqual({});
    });

    test("walks directories recursively with relative keys", () => {
      const fs = createMockFileSystem({
        "/pkg/MLmodel": "flavors: {}",
        "/pkg/model/1/saved_model.pb": Buffer.from([0, 1, 2]),
      });

      const result = hashDirectory(fs, "/pkg");

      expect(Object.keys(result).sort()).toEqual(["MLmodel", "model/1/saved_model.pb"]);
      expect(result["MLmodel"]).toMatch(/^sha256:[a-f0-9]{32}$/);
    });

    test("produces consistent hashes for same content", () => {
      const fs1 = createMockFileSystem({ "/dir/model.pkl": "same content" });
      const fs2 = createMockFileSystem({ "/dir/model.pkl": Buffer.from("same content") });

      expect(hashDirectory(fs1, "/dir")["model.pkl"]).toBe(hashDirectory(fs2, "/dir")["model.pkl"]);
    });
  });

  describe("calculateIntegrity", () => {
    test("is independent of key insertion order", () => {
      const a = calculateIntegrity({ "a.txt": "sha256:1", "b.txt": "sha256:2" });
      const b = calculateIntegrity({ "b.txt": "sha256:2", "a.txt": "sha256:1" });

      expect(a).toBe(b);
    });

    test("changes when a file hash changes", () => {
      const a = calculateIntegrity({ "a.txt": "sha256:1" });
      const b = calculateIntegrity({ "a.txt": "sha256:2" });

      expect(a).not.toBe(b);
    });
  });

  describe("calculateDirectoryIntegrity", () => {
    test("matches hashing then combining", () => {
      const fs = createMockFileSystem({
        "/pkg/MLmodel": "flavors: {}",
        "/pkg/requirements.txt": "scikit-learn==1.2.2",
      });

      expect(calculateDirectoryIntegrity(fs, "/pkg")).toBe(
        calculateIntegrity(hashDirectory(fs, "/pkg"))
      );
    });
  });
});
