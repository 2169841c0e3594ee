/**
 * Composition root: configuration → context → adapters → engine → service
 */

import { createNodeContext, createNodeFileSystem, type EngineContext, type FileSystem } from "#/core";
import { loadSyncConfig, resolveSecrets } from "#/config";
import { DEFAULT_CONFIG_FILE } from "#/constants";
import type { ParseResult } from "#/friendly-errors";
import { ArtifactRepackager } from "#/artifact";
import { ImageResolver } from "#/images";
import { ReconciliationEngine, type LeaseProvider } from "#/reconcile";
import { createAdapters } from "#/registry/factory";
import type { RegistryAdapters } from "#/registry/registry.types";
import type { SyncConfig } from "#/schemas";
import type { AlertSink } from "./alerts";
import { SyncService } from "./sync-service";

export interface SyncAppOptions {
  configPath?: string;
  /** File system the configuration is read from */
  fs?: FileSystem;
  env?: Record<string, string | undefined>;
  /** Replaces the Node context built from the configuration */
  context?: EngineContext;
  /** Replaces the adapters built from the configuration */
  adapters?: RegistryAdapters;
  leases?: LeaseProvider;
  alerts?: AlertSink;
}

export interface SyncApp {
  config: SyncConfig;
  context: EngineContext;
  adapters: RegistryAdapters;
  repackager: ArtifactRepackager;
  engine: ReconciliationEngine;
  service: SyncService;
}

export function createSyncApp(options: SyncAppOptions = {}): ParseResult<SyncApp> {
  const configPath = options.configPath ?? DEFAULT_CONFIG_FILE;
  const loaded = loadSyncConfig(options.fs ?? createNodeFileSystem(), configPath);
  if (!loaded.success) return loaded;

  const config = loaded.data;
  const secrets = resolveSecrets(config, options.env);
  const context =
    options.context ?? createNodeContext({ workDir: config.workDir, logLevel: config.logLevel, secrets });
  const adapters = options.adapters ?? createAdapters(config, context);

  const images = new ImageResolver(config.images, adapters.images, context.logger.child({ component: "images" }));
  const repackager = new ArtifactRepackager(context, adapters.source, adapters.store, images, {
    keyPrefix: config.storage.keyPrefix,
  });
  const engine = new ReconciliationEngine(context, adapters, repackager, {
    config: config.reconcile,
    keyPrefix: config.storage.keyPrefix,
    leases: options.leases,
  });
  const service = new SyncService(engine, context.logger, {
    webhook: { secret: context.secrets.getWebhookSecret(), signatureHeader: config.webhook.signatureHeader },
    alerts: options.alerts,
  });

  return { success: true, data: { config, context, adapters, repackager, engine, service } };
}
