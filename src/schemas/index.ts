import { z } from "zod";
import {
  APPROVAL_STATUSES,
  DEFAULT_DEPLOYABLE_STAGES,
  DEFAULT_MLFLOW_API_PATH,
  PACKAGE_GROUP_TAG,
  SOURCE_STAGES,
} from "#/constants";

// Source registry stage. MLflow reports these capitalized; webhooks may not.
export const SourceStageSchema = z.enum(SOURCE_STAGES);
export type SourceStage = z.infer<typeof SourceStageSchema>;

export const ApprovalStatusSchema = z.enum(APPROVAL_STATUSES);
export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;

/**
 * Map a stage string to its canonical spelling, case-insensitively.
 *
 * @example normalizeStage("production") → "Production"
 * @example normalizeStage("shadow") → undefined
 */
export function normalizeStage(raw: string | undefined): SourceStage | undefined {
  if (raw === undefined) return undefined;
  const lowered = raw.trim().toLowerCase();
  return SOURCE_STAGES.find((stage) => stage.toLowerCase() === lowered);
}

const StageStringSchema = z.string().transform((raw, ctx) => {
  const stage = normalizeStage(raw);
  if (!stage) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown stage '${raw}'. Expected one of: ${SOURCE_STAGES.join(", ")}`,
    });
    return z.NEVER;
  }
  return stage;
});

const VersionNumberSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(/^\d+$/, { message: "Version must be a positive integer" })
    .transform((value) => Number(value)),
]);

// Stage-change notification. Accepts both the engine's own shape and
// registry webhook payloads ({ event, model_name, version, to_stage }).
export const StageChangeNotificationSchema = z
  .object({
    model_name: z.string().trim().min(1),
    version: VersionNumberSchema.optional(),
    new_stage: StageStringSchema.optional(),
    to_stage: StageStringSchema.optional(),
    notification_id: z.string().min(1).optional(),
    event: z.string().optional(),
  })
  .transform((raw) => ({
    modelName: raw.model_name,
    version: raw.version,
    newStage: raw.new_stage ?? raw.to_stage,
    notificationId: raw.notification_id,
    event: raw.event,
  }));
export type StageChangeNotification = z.infer<typeof StageChangeNotificationSchema>;

// MLflow REST responses (only the fields the adapter reads)
export const MlflowModelVersionSchema = z.object({
  name: z.string(),
  version: z.string().regex(/^\d+$/),
  current_stage: z.string().default("None"),
  run_id: z.string().default(""),
  source: z.string().default(""),
  status: z.string().default("READY"),
  tags: z.array(z.object({ key: z.string(), value: z.string().default("") })).default([]),
});
export type MlflowModelVersion = z.infer<typeof MlflowModelVersionSchema>;

export const MlflowSearchVersionsResponseSchema = z.object({
  model_versions: z.array(MlflowModelVersionSchema).default([]),
  next_page_token: z.string().optional(),
});

export const MlflowListArtifactsResponseSchema = z.object({
  root_uri: z.string().optional(),
  files: z.array(z.object({ path: z.string(), is_dir: z.boolean().default(false) })).default([]),
  next_page_token: z.string().optional(),
});

// MLmodel manifest at the root of every MLflow model artifact.
// Flavor entries are free-form; YAML may read versions such as 1.7 as numbers.
export const MlmodelSchema = z
  .object({
    artifact_path: z.string().optional(),
    flavors: z.record(z.string(), z.record(z.string(), z.unknown()).nullable()),
    mlflow_version: z.string().optional(),
    run_id: z.string().optional(),
  })
  .passthrough();
export type Mlmodel = z.infer<typeof MlmodelSchema>;

// Sync configuration (registry-sync.yaml)
export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(10_000),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const ReconcileConfigSchema = z.object({
  deployableStages: z.array(SourceStageSchema).min(1).default([...DEFAULT_DEPLOYABLE_STAGES]),
  concurrency: z.number().int().positive().default(3),
  repackageTimeoutMs: z.number().int().positive().default(600_000),
  pruneArtifacts: z.boolean().default(true),
  retry: RetryConfigSchema.default({}),
});
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;

export const SourceConfigSchema = z.object({
  type: z.literal("mlflow").default("mlflow"),
  host: z.string().url(),
  apiPath: z.string().default(DEFAULT_MLFLOW_API_PATH),
  token: z.string().optional(), // Can also be set via env vars
  pageSize: z.number().int().positive().max(1000).default(200),
});
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export const TargetConfigSchema = z.object({
  type: z.literal("sagemaker").default("sagemaker"),
  region: z.string().optional(),
  groupTags: z
    .record(z.string(), z.string())
    .default({ [PACKAGE_GROUP_TAG.key]: PACKAGE_GROUP_TAG.value }),
});
export type TargetConfig = z.infer<typeof TargetConfigSchema>;

export const StorageConfigSchema = z.object({
  type: z.literal("s3").default("s3"),
  bucket: z.string().min(1),
  keyPrefix: z
    .string()
    .default("")
    .refine((prefix) => prefix === "" || prefix.endsWith("/"), {
      message: "keyPrefix must be empty or end with '/'",
    }),
  region: z.string().optional(),
});
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const ImagesConfigSchema = z.object({
  // flavor -> image URI
  flavors: z.record(z.string(), z.string()).default({}),
  // framework -> framework version -> image URI
  frameworks: z.record(z.string(), z.record(z.string(), z.string())).default({}),
  // Parameter Store prefix; "<prefix><flavor>_image_uri" is looked up when set
  parameterPrefix: z.string().optional(),
});
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;

export const WebhookConfigSchema = z.object({
  secret: z.string().optional(), // Can also be set via env vars
  signatureHeader: z.string().default("X-Databricks-Signature"),
});
export type WebhookConfig = z.infer<typeof WebhookConfigSchema>;

export const SyncConfigSchema = z.object({
  source: SourceConfigSchema,
  target: TargetConfigSchema.default({}),
  storage: StorageConfigSchema,
  images: ImagesConfigSchema.default({}),
  reconcile: ReconcileConfigSchema.default({}),
  webhook: WebhookConfigSchema.default({}),
  workDir: z.string().default("/tmp/registry-sync"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
