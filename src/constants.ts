/**
 * Global constants for the registry sync engine
 */

export const SOURCE_STAGES = ["None", "Staging", "Production", "Archived"] as const;

export const DEFAULT_DEPLOYABLE_STAGES = ["Staging", "Production"] as const;

export const APPROVAL_STATUSES = ["Approved", "Rejected", "PendingManualApproval"] as const;

export const DEFAULT_CONFIG_FILE = "registry-sync.yaml";

export const DEFAULT_MLFLOW_API_PATH = "/api/2.0/mlflow";

export const USER_AGENT = "registry-sync-engine";

// Archive layout served by the SageMaker containers
export const ARCHIVE_FILENAME = "model.tar.gz";
export const MANIFEST_FILENAME = "MLmodel";
export const REQUIREMENTS_FILENAME = "requirements.txt";
export const INFERENCE_SCRIPT_FILENAME = "inference.py";

// Optional serving overrides shipped inside the source artifact
export const ARTIFACT_SERVING_DIR = "sagemaker";

// Source registry tags that steer packaging
export const DEPLOY_IMAGE_TAG = "sagemaker_deploy_image";
export const DEPLOY_FLAVOR_TAG = "sagemaker_deploy_flavor";

export const PYTHON_FUNCTION_FLAVOR = "python_function";

// Package metadata keys read back by downstream deployment tooling
export const METADATA_KEYS = {
  runId: "mlflow_run_id",
  stage: "mlflow_current_stage",
  version: "mlflow_version",
  name: "mlflow_name",
  source: "mlflow_source",
  integrity: "artifact_integrity",
} as const;

// Object metadata key holding the archive's content integrity
export const STORE_INTEGRITY_KEY = "integrity";

export const PACKAGE_GROUP_TAG = { key: "model-source", value: "mlflow" } as const;

export const SUPPORTED_CONTENT_TYPES = ["application/json", "text/csv", "application/x-npy"];

// SageMaker package group names: alphanumerics and hyphens, at most 63 characters
export const MAX_GROUP_NAME_LENGTH = 63;
