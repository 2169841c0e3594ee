/**
 * Serving image catalog in SSM Parameter Store
 *
 * Images are published as parameters named "{prefix}{flavor}_image_uri".
 * Lookups are cached for the life of the catalog.
 */

import { GetParameterCommand, SSMClient, type GetParameterCommandInput, type GetParameterResult } from "@aws-sdk/client-ssm";
import type { ImageCatalog } from "../registry.types";
import { isAwsNotFound, toAdapterError } from "./aws-errors";

export interface SsmApi {
  getParameter(input: GetParameterCommandInput): Promise<Partial<GetParameterResult>>;
}

/**
 * SsmApi over the SDK client
 */
export function createSsmApi(client: SSMClient): SsmApi {
  return {
    getParameter: (input) => client.send(new GetParameterCommand(input)),
  };
}

export class SsmImageCatalog implements ImageCatalog {
  private api: SsmApi;
  private prefix: string;
  private cache = new Map<string, string | undefined>();

  constructor(api: SsmApi, prefix: string) {
    this.api = api;
    this.prefix = prefix;
  }

  /**
   * @example parameterName("sklearn") with prefix "/ml/images/" → "/ml/images/sklearn_image_uri"
   */
  parameterName(flavor: string): string {
    return `${this.prefix}${flavor}_image_uri`;
  }

  async lookup(flavor: string): Promise<string | undefined> {
    if (this.cache.has(flavor)) {
      return this.cache.get(flavor);
    }

    let value: string | undefined;
    try {
      const result = await this.api.getParameter({ Name: this.parameterName(flavor) });
      value = result.Parameter?.Value?.trim() || undefined;
    } catch (err) {
      if (!isAwsNotFound(err)) {
        throw toAdapterError("lookupImage", err);
      }
    }

    this.cache.set(flavor, value);
    return value;
  }
}
