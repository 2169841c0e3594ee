/**
 * S3 artifact store
 *
 * Archives live at s3://{bucket}/{key}. The content integrity is stored as
 * object metadata so an unchanged archive is never uploaded twice.
 */

import {
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type DeleteObjectCommandInput,
  type HeadObjectCommandInput,
  type HeadObjectOutput,
  type ListObjectsV2CommandInput,
  type ListObjectsV2Output,
  type PutObjectCommandInput,
} from "@aws-sdk/client-s3";
import { STORE_INTEGRITY_KEY } from "#/constants";
import type { StorageConfig } from "#/schemas";
import type { ArtifactStore, StoredObject } from "../registry.types";
import { isAwsNotFound, toAdapterError } from "./aws-errors";

export type ObjectHead = Partial<Pick<HeadObjectOutput, "Metadata" | "ContentLength">>;
export type ObjectPage = Partial<Pick<ListObjectsV2Output, "Contents" | "IsTruncated" | "NextContinuationToken">>;

export interface S3Api {
  headObject(input: HeadObjectCommandInput): Promise<ObjectHead>;
  putObject(input: PutObjectCommandInput): Promise<unknown>;
  deleteObject(input: DeleteObjectCommandInput): Promise<unknown>;
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ObjectPage>;
}

/**
 * S3Api over the SDK client
 */
export function createS3Api(client: S3Client): S3Api {
  return {
    headObject: (input) => client.send(new HeadObjectCommand(input)),
    putObject: (input) => client.send(new PutObjectCommand(input)),
    deleteObject: (input) => client.send(new DeleteObjectCommand(input)),
    listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
  };
}

export class S3ArtifactStore implements ArtifactStore {
  readonly type = "s3";
  private api: S3Api;
  private bucket: string;
  private root: string;

  constructor(api: S3Api, config: Pick<StorageConfig, "bucket">) {
    this.api = api;
    this.bucket = config.bucket;
    this.root = `s3://${config.bucket}/`;
  }

  locationFor(key: string): string {
    return `${this.root}${key}`;
  }

  owns(location: string): boolean {
    return location.startsWith(this.root) && location.length > this.root.length;
  }

  async stat(location: string): Promise<StoredObject | null> {
    if (!this.owns(location)) return null;

    try {
      const head = await this.api.headObject({ Bucket: this.bucket, Key: this.keyOf(location) });
      return {
        location,
        integrity: head.Metadata?.[STORE_INTEGRITY_KEY],
        size: head.ContentLength,
      };
    } catch (err) {
      if (isAwsNotFound(err)) return null;
      throw toAdapterError("stat", err);
    }
  }

  async put(key: string, body: Buffer, metadata: Record<string, string>): Promise<string> {
    try {
      await this.api.putObject({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: "application/gzip",
        Metadata: metadata,
      });
    } catch (err) {
      throw toAdapterError("put", err);
    }
    return this.locationFor(key);
  }

  async delete(location: string): Promise<void> {
    if (!this.owns(location)) return;

    try {
      await this.api.deleteObject({ Bucket: this.bucket, Key: this.keyOf(location) });
    } catch (err) {
      if (isAwsNotFound(err)) return;
      throw toAdapterError("delete", err);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const locations: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await this.api.listObjectsV2({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        });
        for (const object of page.Contents ?? []) {
          if (object.Key) locations.push(this.locationFor(object.Key));
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (err) {
      throw toAdapterError("list", err);
    }

    return locations;
  }

  private keyOf(location: string): string {
    return location.slice(this.root.length);
  }
}
