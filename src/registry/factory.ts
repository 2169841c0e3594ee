/**
 * Registry adapter factory
 *
 * Single decision point for creating adapters.
 * The factory is the ONLY place that knows about specific registry and store implementations.
 */

import { SageMakerClient } from "@aws-sdk/client-sagemaker";
import { S3Client } from "@aws-sdk/client-s3";
import { SSMClient } from "@aws-sdk/client-ssm";
import type { EngineContext } from "#/core";
import type { SyncConfig } from "#/schemas";
import type {
  ArtifactStore,
  ImageCatalog,
  RegistryAdapters,
  SourceRegistryAdapter,
  TargetRegistryAdapter,
} from "./registry.types";
import { MlflowRegistryClient } from "./clients/mlflow";
import { SageMakerRegistryClient, createSageMakerApi } from "./clients/sagemaker";
import { S3ArtifactStore, createS3Api } from "./clients/s3";
import { SsmImageCatalog, createSsmApi } from "./clients/ssm";

export function createSourceAdapter(config: SyncConfig, ctx: EngineContext): SourceRegistryAdapter {
  switch (config.source.type) {
    case "mlflow":
    default:
      return new MlflowRegistryClient(config.source, ctx);
  }
}

export function createTargetAdapter(config: SyncConfig, ctx: EngineContext): TargetRegistryAdapter {
  switch (config.target.type) {
    case "sagemaker":
    default:
      return new SageMakerRegistryClient(
        createSageMakerApi(new SageMakerClient({ region: config.target.region })),
        config.target,
        ctx.logger.child({ adapter: "sagemaker" })
      );
  }
}

export function createArtifactStore(config: SyncConfig): ArtifactStore {
  switch (config.storage.type) {
    case "s3":
    default:
      return new S3ArtifactStore(createS3Api(new S3Client({ region: config.storage.region })), config.storage);
  }
}

/**
 * Image catalog, when a parameter prefix is configured
 */
export function createImageCatalog(config: SyncConfig): ImageCatalog | undefined {
  const prefix = config.images.parameterPrefix;
  if (!prefix) return undefined;
  return new SsmImageCatalog(createSsmApi(new SSMClient({ region: config.target.region })), prefix);
}

export function createAdapters(config: SyncConfig, ctx: EngineContext): RegistryAdapters {
  return {
    source: createSourceAdapter(config, ctx),
    target: createTargetAdapter(config, ctx),
    store: createArtifactStore(config),
    images: createImageCatalog(config),
  };
}
