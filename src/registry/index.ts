/**
 * Registry module
 *
 * Source registry, target registry and artifact store adapters
 * (MLflow, SageMaker, S3) and the SSM image catalog.
 */

// Types
export * from "./registry.types";

// Package metadata mapping
export * from "./metadata";

// Factory (adapter creation)
export {
  createAdapters,
  createSourceAdapter,
  createTargetAdapter,
  createArtifactStore,
  createImageCatalog,
} from "./factory";

// Clients (direct access if needed)
export { MlflowRegistryClient, getRunRelativePath } from "./clients/mlflow";
export { SageMakerRegistryClient, createSageMakerApi, type SageMakerApi } from "./clients/sagemaker";
export { S3ArtifactStore, createS3Api, type S3Api } from "./clients/s3";
export { SsmImageCatalog, createSsmApi, type SsmApi } from "./clients/ssm";
export { classifyAwsError, isAwsNotFound, toAdapterError } from "./clients/aws-errors";
