import { describe, test, expect } from "vitest";
import { loadSyncConfig, resolveSecrets } from "./config";
import { SyncConfigSchema } from "#/schemas";
import { createMockFileSystem } from "#/test-utils/mocks";

const CONFIG_PATH = "/etc/registry-sync.yaml";

describe("config", () => {
  describe("loadSyncConfig", () => {
    test("loads a minimal file with defaults", () => {
      const fs = createMockFileSystem({
        [CONFIG_PATH]: "source:\n  host: https://mlflow.test\nstorage:\n  bucket: test-bucket\n",
      });

      const result = loadSyncConfig(fs, CONFIG_PATH);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.source).toEqual({
        type: "mlflow",
        host: "https://mlflow.test",
        apiPath: "/api/2.0/mlflow",
        pageSize: 200,
      });
      expect(result.data.storage).toEqual({ type: "s3", bucket: "test-bucket", keyPrefix: "" });
      expect(result.data.target.groupTags).toEqual({ "model-source": "mlflow" });
      expect(result.data.workDir).toBe("/tmp/registry-sync");
    });

    test("reports YAML syntax errors", () => {
      const fs = createMockFileSystem({ [CONFIG_PATH]: "source: [unclosed\n" });

      const result = loadSyncConfig(fs, CONFIG_PATH);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.type).toBe("yaml");
      expect(result.error.message).toBe(`Invalid YAML syntax in ${CONFIG_PATH}`);
    });

    test("reports a key prefix without a trailing slash", () => {
      const fs = createMockFileSystem({
        [CONFIG_PATH]: "source:\n  host: https://mlflow.test\nstorage:\n  bucket: test-bucket\n  keyPrefix: models\n",
      });

      const result = loadSyncConfig(fs, CONFIG_PATH);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.details).toEqual(["storage.keyPrefix: keyPrefix must be empty or end with '/'"]);
    });
  });

  describe("resolveSecrets", () => {
    const base = SyncConfigSchema.parse({ source: { host: "https://mlflow.test" }, storage: { bucket: "b" } });

    test("reads tokens from the environment", () => {
      const secrets = resolveSecrets(base, { DATABRICKS_TOKEN: "db-token", WEBHOOK_SHARED_SECRET: "test-secret" });

      expect(secrets.getSourceToken()).toBe("db-token");
      expect(secrets.getWebhookSecret()).toBe("test-secret");
    });

    test("prefers MLFLOW_TRACKING_TOKEN over DATABRICKS_TOKEN", () => {
      const secrets = resolveSecrets(base, { MLFLOW_TRACKING_TOKEN: "mlflow-token", DATABRICKS_TOKEN: "db-token" });

      expect(secrets.getSourceToken()).toBe("mlflow-token");
    });

    test("prefers values from the configuration file", () => {
      const config = SyncConfigSchema.parse({
        source: { host: "https://mlflow.test", token: "file-token" },
        storage: { bucket: "b" },
        webhook: { secret: "file-secret" },
      });

      const secrets = resolveSecrets(config, { MLFLOW_TRACKING_TOKEN: "mlflow-token", WEBHOOK_SHARED_SECRET: "env-secret" });

      expect(secrets.getSourceToken()).toBe("file-token");
      expect(secrets.getWebhookSecret()).toBe("file-secret");
    });
  });
});
