import type { FileSystem, SecretProvider } from "#/core";
import { createEnvSecretProvider } from "#/core";
import { SyncConfigSchema, type SyncConfig } from "#/schemas";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";

/**
 * Load and validate the sync configuration file.
 * A missing file is reported the same way as an invalid one.
 */
export function loadSyncConfig(fs: FileSystem, configPath: string): ParseResult<SyncConfig> {
  if (!fs.exists(configPath)) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Configuration file not found: ${configPath}`,
      },
    };
  }

  const content = fs.readFile(configPath);
  return safeParseYaml(content, SyncConfigSchema, configPath);
}

/**
 * Secrets for a configuration.
 *
 * Priority:
 * 1. Value in the configuration file
 * 2. Environment (MLFLOW_TRACKING_TOKEN / DATABRICKS_TOKEN, WEBHOOK_SHARED_SECRET)
 */
export function resolveSecrets(
  config: SyncConfig,
  env: Record<string, string | undefined> = process.env
): SecretProvider {
  return createEnvSecretProvider(env, {
    sourceToken: config.source.token,
    webhookSecret: config.webhook.secret,
  });
}
