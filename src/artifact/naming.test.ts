import { describe, test, expect } from "vitest";
import {
  toPackageGroupName,
  buildModelKeyPrefix,
  buildArchiveKey,
  buildPackageDescription,
} from "./naming";
import { RepackagingError } from "#/errors";

describe("naming", () => {
  describe("toPackageGroupName", () => {
    test("replaces underscores with hyphens", () => {
      expect(toPackageGroupName("churn_model")).toBe("churn-model");
    });

    test("replaces every other invalid character", () => {
      expect(toPackageGroupName("team.fraud model")).toBe("team-fraud-model");
    });

    test("keeps valid names unchanged", () => {
      expect(toPackageGroupName("Churn-Model-2")).toBe("Churn-Model-2");
    });

    test("caps the name at 63 characters", () => {
      const name = toPackageGroupName("m".repeat(80));

      expect(name).toHaveLength(63);
    });
  });

  describe("buildModelKeyPrefix", () => {
    test("joins prefix and model name", () => {
      expect(buildModelKeyPrefix("models/", "churn_model")).toBe("models/churn_model/");
    });

    test("works without a prefix", () => {
      expect(buildModelKeyPrefix("", "churn_model")).toBe("churn_model/");
    });

    test("strips path separators from the model name", () => {
      expect(buildModelKeyPrefix("", "team/churn")).toBe("teamchurn/");
    });
  });

  describe("buildArchiveKey", () => {
    test("derives the key from model name and run id", () => {
      expect(buildArchiveKey("models/", "churn_model", "a1b2c3")).toBe(
        "models/churn_model/a1b2c3/model.tar.gz"
      );
    });

    test("is deterministic", () => {
      expect(buildArchiveKey("", "m", "r1")).toBe(buildArchiveKey("", "m", "r1"));
    });

    test("rejects run ids that sanitize to nothing", () => {
      expect(() => buildArchiveKey("", "m", "..")).toThrow("Cannot derive a storage key from '..'");
      expect(() => buildArchiveKey("", "m", "..")).toThrow(RepackagingError);
    });
  });

  describe("buildPackageDescription", () => {
    test("names model and version", () => {
      expect(buildPackageDescription("churn_model", 3)).toBe("mlflow churn_model-v3");
    });
  });
});
