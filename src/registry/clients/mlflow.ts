/**
 * MLflow Model Registry client
 *
 * Source registry adapter over the MLflow REST API.
 *
 * List:     GET {host}{apiPath}/model-versions/search (paginated)
 * Download: GET {host}{apiPath}/artifacts/list, recursively, then
 *           GET {host}/get-artifact for every file
 *
 * @see https://mlflow.org/docs/latest/rest-api.html
 */

import { dirname, isAbsolute, join, posix } from "path";
import type { EngineContext, FileSystem, HttpClient } from "#/core";
import { USER_AGENT } from "#/constants";
import { AdapterError, classifyHttpStatus, errorMessage } from "#/errors";
import { safeParseJson } from "#/friendly-errors";
import {
  MlflowListArtifactsResponseSchema,
  MlflowSearchVersionsResponseSchema,
  normalizeStage,
  type MlflowModelVersion,
  type SourceConfig,
} from "#/schemas";
import type { ZodType, ZodTypeDef } from "zod";
import type { SourceModelVersion, SourceRegistryAdapter } from "../registry.types";

export class MlflowRegistryClient implements SourceRegistryAdapter {
  readonly type = "mlflow";
  private host: string;
  private apiBase: string;
  private pageSize: number;
  private token?: string;
  private http: HttpClient;
  private fs: FileSystem;

  constructor(config: SourceConfig, ctx: Pick<EngineContext, "http" | "fs" | "secrets">) {
    this.host = config.host.replace(/\/+$/, "");
    this.apiBase = `${this.host}${config.apiPath}`;
    this.pageSize = config.pageSize;
    this.token = config.token ?? ctx.secrets.getSourceToken();
    this.http = ctx.http;
    this.fs = ctx.fs;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
    };
    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }
    return headers;
  }

  async listVersions(modelName: string): Promise<SourceModelVersion[]> {
    const versions: SourceModelVersion[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({
        filter: `name='${modelName.replace(/'/g, "\\'")}'`,
        max_results: String(this.pageSize),
      });
      if (pageToken) params.set("page_token", pageToken);

      const page = await this.getJson(
        "listVersions",
        `${this.apiBase}/model-versions/search?${params.toString()}`,
        MlflowSearchVersionsResponseSchema
      );

      // Search matches with LIKE semantics on some servers; keep exact names only
      for (const raw of page.model_versions) {
        if (raw.name === modelName) {
          versions.push(toSourceVersion(raw));
        }
      }
      pageToken = page.next_page_token || undefined;
    } while (pageToken);

    return versions.sort((a, b) => a.version - b.version);
  }

  async downloadArtifacts(version: SourceModelVersion, targetDir: string, signal?: AbortSignal): Promise<void> {
    const rootPath = getRunRelativePath(version.artifactUri, version.runId);
    const files = await this.listArtifactFiles(version.runId, rootPath, signal);

    if (files.length === 0) {
      throw new AdapterError("downloadArtifacts", `No artifact files under '${rootPath}' for run ${version.runId}`, "fatal");
    }

    this.fs.mkdir(targetDir, { recursive: true });

    for (const filePath of files) {
      const relativePath = posix.relative(rootPath, filePath);
      if (!relativePath || relativePath.startsWith("..") || isAbsolute(relativePath)) {
        throw new AdapterError("downloadArtifacts", `Artifact path escapes the model directory: ${filePath}`, "fatal");
      }

      const params = new URLSearchParams({ path: filePath, run_uuid: version.runId });
      const response = await this.request("downloadArtifacts", `${this.host}/get-artifact?${params.toString()}`, signal);
      const content = Buffer.from(await response.arrayBuffer());

      const destination = join(targetDir, relativePath);
      this.fs.mkdir(dirname(destination), { recursive: true });
      this.fs.writeFileBinary(destination, content);
    }
  }

  /**
   * Every file path below rootPath, walking directories depth-first
   */
  private async listArtifactFiles(runId: string, rootPath: string, signal?: AbortSignal): Promise<string[]> {
    const files: string[] = [];
    const pending = [rootPath];

    while (pending.length > 0) {
      const path = pending.pop();
      if (path === undefined) break;

      let pageToken: string | undefined;
      do {
        const params = new URLSearchParams({ run_id: runId, path });
        if (pageToken) params.set("page_token", pageToken);

        const page = await this.getJson(
          "downloadArtifacts",
          `${this.apiBase}/artifacts/list?${params.toString()}`,
          MlflowListArtifactsResponseSchema,
          signal
        );

        for (const file of page.files) {
          if (file.is_dir) {
            pending.push(file.path);
          } else {
            files.push(file.path);
          }
        }
        pageToken = page.next_page_token || undefined;
      } while (pageToken);
    }

    return files.sort();
  }

  private async request(operation: string, url: string, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.http.fetch(url, { headers: this.getHeaders(), signal });
    } catch (err) {
      signal?.throwIfAborted();
      throw new AdapterError(operation, `Request failed: ${errorMessage(err)}`, "retryable", { cause: err });
    }

    if (!response.ok) {
      throw new AdapterError(
        operation,
        `MLflow API error: ${response.status} ${response.statusText}`,
        classifyHttpStatus(response.status),
        { status: response.status }
      );
    }
    return response;
  }

  private async getJson<Output, Input>(
    operation: string,
    url: string,
    schema: ZodType<Output, ZodTypeDef, Input>,
    signal?: AbortSignal
  ): Promise<Output> {
    const response = await this.request(operation, url, signal);
    const parsed = safeParseJson(await response.text(), schema, "MLflow response");
    if (!parsed.success) {
      const details = parsed.error.details?.join("; ");
      throw new AdapterError(operation, details ? `${parsed.error.message}: ${details}` : parsed.error.message, "fatal");
    }
    return parsed.data;
  }
}

function toSourceVersion(raw: MlflowModelVersion): SourceModelVersion {
  return {
    modelName: raw.name,
    version: Number(raw.version),
    runId: raw.run_id,
    stage: normalizeStage(raw.current_stage) ?? "None",
    artifactUri: raw.source,
    status: raw.status,
    tags: Object.fromEntries(raw.tags.map((tag) => [tag.key, tag.value])),
  };
}

/**
 * Path of a model artifact relative to its run's artifact root.
 *
 * @example getRunRelativePath("runs:/r1/model", "r1") → "model"
 * @example getRunRelativePath("s3://bucket/0/r1/artifacts/model", "r1") → "model"
 */
export function getRunRelativePath(artifactUri: string, runId: string): string {
  const runsPrefix = `runs:/${runId}/`;
  if (artifactUri.startsWith(runsPrefix)) {
    return trimSlashes(artifactUri.slice(runsPrefix.length));
  }

  const marker = "/artifacts/";
  const index = artifactUri.lastIndexOf(marker);
  if (index !== -1) {
    return trimSlashes(artifactUri.slice(index + marker.length));
  }

  throw new AdapterError("downloadArtifacts", `Cannot locate run artifacts for source '${artifactUri}'`, "fatal");
}

function trimSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, "");
}
