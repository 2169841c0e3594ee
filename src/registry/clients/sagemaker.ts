/**
 * SageMaker Model Registry client
 *
 * Target registry adapter. One model package group per source model; one
 * package per training run, carrying the run id and mirrored stage as
 * customer metadata.
 *
 * The SDK is reached through SageMakerApi so tests can hand in a plain object.
 *
 * @see https://docs.aws.amazon.com/sagemaker/latest/dg/model-registry.html
 */

import {
  CreateModelPackageCommand,
  CreateModelPackageGroupCommand,
  DeleteModelPackageCommand,
  DescribeModelPackageCommand,
  ListModelPackageGroupsCommand,
  ListModelPackagesCommand,
  SageMakerClient,
  UpdateModelPackageCommand,
  type CreateModelPackageGroupInput,
  type CreateModelPackageInput,
  type CreateModelPackageOutput,
  type DeleteModelPackageInput,
  type DescribeModelPackageInput,
  type DescribeModelPackageOutput,
  type ListModelPackageGroupsInput,
  type ListModelPackageGroupsOutput,
  type ListModelPackagesInput,
  type ListModelPackagesOutput,
  type ModelPackageSummary,
  type UpdateModelPackageInput,
} from "@aws-sdk/client-sagemaker";
import type { Logger } from "#/core";
import { SUPPORTED_CONTENT_TYPES } from "#/constants";
import { AdapterError } from "#/errors";
import { ApprovalStatusSchema, type ApprovalStatus, type TargetConfig } from "#/schemas";
import { readMirroredState } from "../metadata";
import type { CreatePackageInput, TargetModelPackage, TargetRegistryAdapter } from "../registry.types";
import { isAwsNotFound, toAdapterError } from "./aws-errors";

const PAGE_SIZE = 100;

// Only the response fields the client reads
export type PackagePage = Partial<Pick<ListModelPackagesOutput, "ModelPackageSummaryList" | "NextToken">>;
export type PackageDetails = Partial<
  Pick<
    DescribeModelPackageOutput,
    "ModelPackageArn" | "ModelApprovalStatus" | "CustomerMetadataProperties" | "InferenceSpecification" | "CreationTime"
  >
>;
export type GroupPage = Partial<Pick<ListModelPackageGroupsOutput, "ModelPackageGroupSummaryList" | "NextToken">>;
export type CreatedPackage = Partial<CreateModelPackageOutput>;

export interface SageMakerApi {
  listModelPackages(input: ListModelPackagesInput): Promise<PackagePage>;
  describeModelPackage(input: DescribeModelPackageInput): Promise<PackageDetails>;
  listModelPackageGroups(input: ListModelPackageGroupsInput): Promise<GroupPage>;
  createModelPackageGroup(input: CreateModelPackageGroupInput): Promise<unknown>;
  createModelPackage(input: CreateModelPackageInput): Promise<CreatedPackage>;
  updateModelPackage(input: UpdateModelPackageInput): Promise<unknown>;
  deleteModelPackage(input: DeleteModelPackageInput): Promise<unknown>;
}

/**
 * SageMakerApi over the SDK client
 */
export function createSageMakerApi(client: SageMakerClient): SageMakerApi {
  return {
    listModelPackages: (input) => client.send(new ListModelPackagesCommand(input)),
    describeModelPackage: (input) => client.send(new DescribeModelPackageCommand(input)),
    listModelPackageGroups: (input) => client.send(new ListModelPackageGroupsCommand(input)),
    createModelPackageGroup: (input) => client.send(new CreateModelPackageGroupCommand(input)),
    createModelPackage: (input) => client.send(new CreateModelPackageCommand(input)),
    updateModelPackage: (input) => client.send(new UpdateModelPackageCommand(input)),
    deleteModelPackage: (input) => client.send(new DeleteModelPackageCommand(input)),
  };
}

export class SageMakerRegistryClient implements TargetRegistryAdapter {
  readonly type = "sagemaker";
  private api: SageMakerApi;
  private groupTags: Record<string, string>;
  private logger?: Logger;
  private knownGroups = new Set<string>();

  constructor(api: SageMakerApi, config: Pick<TargetConfig, "groupTags">, logger?: Logger) {
    this.api = api;
    this.groupTags = config.groupTags;
    this.logger = logger;
  }

  async listPackages(groupName: string): Promise<TargetModelPackage[]> {
    const summaries: ModelPackageSummary[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const page = await this.api.listModelPackages({
          ModelPackageGroupName: groupName,
          MaxResults: PAGE_SIZE,
          NextToken: nextToken,
        });
        summaries.push(...(page.ModelPackageSummaryList ?? []));
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (err) {
      if (isAwsNotFound(err)) return [];
      throw toAdapterError("listPackages", err);
    }

    const packages: TargetModelPackage[] = [];
    for (const summary of summaries) {
      if (!summary.ModelPackageArn || summary.ModelPackageStatus === "Deleting") continue;
      const described = await this.describe(summary.ModelPackageArn);
      if (described) {
        packages.push(toTargetPackage(groupName, summary, described));
      }
    }
    return packages;
  }

  async createPackage(input: CreatePackageInput): Promise<TargetModelPackage> {
    await this.ensureGroup(input.groupName);

    let output: CreatedPackage;
    try {
      output = await this.submitPackage(input);
    } catch (err) {
      if (!isAwsNotFound(err)) throw toAdapterError("createPackage", err);

      // Group removed since it was last seen
      this.logger?.warn("Model package group missing, recreating", { groupName: input.groupName });
      this.knownGroups.delete(input.groupName);
      await this.ensureGroup(input.groupName);
      try {
        output = await this.submitPackage(input);
      } catch (retryErr) {
        throw toAdapterError("createPackage", retryErr);
      }
    }

    if (!output.ModelPackageArn) {
      throw new AdapterError("createPackage", "CreateModelPackage returned no package ARN", "retryable");
    }

    this.logger?.debug("Model package created", { handle: output.ModelPackageArn, groupName: input.groupName });
    return {
      handle: output.ModelPackageArn,
      groupName: input.groupName,
      ...readMirroredState(input.metadata),
      approvalStatus: input.approvalStatus,
      artifactLocation: input.artifactLocation,
      imageReference: input.imageReference,
      metadata: { ...input.metadata },
    };
  }

  async updateApproval(
    pkg: TargetModelPackage,
    status: ApprovalStatus,
    metadata: Record<string, string> = {}
  ): Promise<void> {
    try {
      await this.api.updateModelPackage({
        ModelPackageArn: pkg.handle,
        ModelApprovalStatus: status,
        CustomerMetadataProperties: Object.keys(metadata).length > 0 ? metadata : undefined,
      });
    } catch (err) {
      throw toAdapterError("updateApproval", err);
    }
  }

  async deletePackage(pkg: TargetModelPackage): Promise<void> {
    try {
      await this.api.deleteModelPackage({ ModelPackageName: pkg.handle });
    } catch (err) {
      // Already gone
      if (isAwsNotFound(err)) return;
      throw toAdapterError("deletePackage", err);
    }
  }

  private async describe(handle: string): Promise<PackageDetails | null> {
    try {
      return await this.api.describeModelPackage({ ModelPackageName: handle });
    } catch (err) {
      // Deleted between list and describe
      if (isAwsNotFound(err)) return null;
      throw toAdapterError("listPackages", err);
    }
  }

  private submitPackage(input: CreatePackageInput): Promise<CreatedPackage> {
    return this.api.createModelPackage({
      ModelPackageGroupName: input.groupName,
      ModelPackageDescription: input.description,
      ModelApprovalStatus: input.approvalStatus,
      CustomerMetadataProperties: input.metadata,
      InferenceSpecification: {
        Containers: [
          {
            Image: input.imageReference,
            ModelDataUrl: input.artifactLocation,
            Environment: input.environment,
          },
        ],
        SupportedContentTypes: SUPPORTED_CONTENT_TYPES,
        SupportedResponseMIMETypes: SUPPORTED_CONTENT_TYPES,
      },
    });
  }

  private async ensureGroup(groupName: string): Promise<void> {
    if (this.knownGroups.has(groupName)) return;

    try {
      if (!(await this.groupExists(groupName))) {
        await this.api.createModelPackageGroup({
          ModelPackageGroupName: groupName,
          ModelPackageGroupDescription: `Packages synchronized for ${groupName}`,
          Tags: Object.entries(this.groupTags).map(([Key, Value]) => ({ Key, Value })),
        });
        this.logger?.info("Model package group created", { groupName });
      }
    } catch (err) {
      // Created concurrently by another writer
      if (!(err instanceof Error && /already exists/i.test(err.message))) {
        throw toAdapterError("createPackage", err);
      }
    }

    this.knownGroups.add(groupName);
  }

  private async groupExists(groupName: string): Promise<boolean> {
    let nextToken: string | undefined;
    do {
      const page = await this.api.listModelPackageGroups({
        NameContains: groupName,
        MaxResults: PAGE_SIZE,
        NextToken: nextToken,
      });
      if ((page.ModelPackageGroupSummaryList ?? []).some((g) => g.ModelPackageGroupName === groupName)) {
        return true;
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return false;
  }
}

function toTargetPackage(
  groupName: string,
  summary: ModelPackageSummary,
  described: PackageDetails
): TargetModelPackage {
  const metadata = { ...(described.CustomerMetadataProperties ?? {}) };
  const container = described.InferenceSpecification?.Containers?.[0];
  const approval = ApprovalStatusSchema.safeParse(described.ModelApprovalStatus ?? summary.ModelApprovalStatus);

  return {
    handle: described.ModelPackageArn ?? summary.ModelPackageArn ?? "",
    groupName,
    ...readMirroredState(metadata),
    approvalStatus: approval.success ? approval.data : undefined,
    artifactLocation: container?.ModelDataUrl,
    imageReference: container?.Image,
    createdAt: described.CreationTime ?? summary.CreationTime,
    metadata,
  };
}
