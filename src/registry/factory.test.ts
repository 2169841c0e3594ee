import { describe, test, expect } from "vitest";
import { createAdapters } from "./factory";
import { MlflowRegistryClient } from "./clients/mlflow";
import { SageMakerRegistryClient } from "./clients/sagemaker";
import { S3ArtifactStore } from "./clients/s3";
import { SsmImageCatalog } from "./clients/ssm";
import { SyncConfigSchema } from "#/schemas";
import { createMockContext } from "#/test-utils/mocks";

const BASE_CONFIG = {
  source: { host: "https://mlflow.test" },
  target: { region: "us-east-1" },
  storage: { bucket: "ml-artifacts", region: "us-east-1" },
};

describe("factory", () => {
  describe("createAdapters", () => {
    test("builds the MLflow, SageMaker and S3 adapters", () => {
      const adapters = createAdapters(SyncConfigSchema.parse(BASE_CONFIG), createMockContext());

      expect(adapters.source).toBeInstanceOf(MlflowRegistryClient);
      expect(adapters.target).toBeInstanceOf(SageMakerRegistryClient);
      expect(adapters.store).toBeInstanceOf(S3ArtifactStore);
      expect(adapters.store.locationFor("k")).toBe("s3://ml-artifacts/k");
    });

    test("leaves out the image catalog without a parameter prefix", () => {
      const adapters = createAdapters(SyncConfigSchema.parse(BASE_CONFIG), createMockContext());

      expect(adapters.images).toBeUndefined();
    });

    test("builds the image catalog from the parameter prefix", () => {
      const config = SyncConfigSchema.parse({ ...BASE_CONFIG, images: { parameterPrefix: "/ml/images/" } });

      const adapters = createAdapters(config, createMockContext());

      expect(adapters.images).toBeInstanceOf(SsmImageCatalog);
    });
  });
});
