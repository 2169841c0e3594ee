/**
 * Serving image resolution
 *
 * Picks the container image a package is served with. Sources are tried in order;
 * the first that answers wins:
 *
 * 1. The deploy-image tag on the source version
 * 2. images.flavors[flavor] in the configuration
 * 3. The image catalog (parameter store) entry for the flavor
 * 4. images.frameworks[framework], matched on the framework's major version
 * 5. The python_function image, when the model also carries that flavor
 */

import type { Logger } from "#/core";
import { DEPLOY_IMAGE_TAG, PYTHON_FUNCTION_FLAVOR } from "#/constants";
import type { ImagesConfig, Mlmodel } from "#/schemas";
import type { ImageCatalog } from "#/registry/registry.types";
import { getFlavorVersion, getPinnedVersion, hasFlavor } from "#/artifact/mlmodel";
import { matchFrameworkVersion } from "#/version";

export type ImageSource = "tag" | "config" | "catalog" | "framework" | "python_function";

export interface ImageResolution {
  imageReference: string;
  source: ImageSource;
  /** Flavor the image serves; python_function when the fallback was used */
  servingFlavor: string;
  frameworkVersion?: string;
}

export interface ImageRequest {
  flavor: string;
  tags: Record<string, string>;
  manifest: Mlmodel;
  /** Contents of the artifact's requirements.txt, when it has one */
  requirements?: string;
}

// Flavors served by another framework's images
const FRAMEWORK_ALIASES: Record<string, string> = {
  keras: "tensorflow",
};

export class ImageResolver {
  private config: ImagesConfig;
  private catalog?: ImageCatalog;
  private logger?: Logger;

  constructor(config: ImagesConfig, catalog?: ImageCatalog, logger?: Logger) {
    this.config = config;
    this.catalog = catalog;
    this.logger = logger;
  }

  /**
   * Resolve the serving image, or null when no source knows the flavor.
   * Catalog failures propagate to the caller.
   */
  async resolve(request: ImageRequest): Promise<ImageResolution | null> {
    const { flavor, tags, manifest } = request;

    const tagged = tags[DEPLOY_IMAGE_TAG]?.trim();
    if (tagged) {
      this.logger?.debug("Using image from model tags", { flavor, imageReference: tagged });
      return { imageReference: tagged, source: "tag", servingFlavor: flavor };
    }

    const configured = await this.lookupFlavorImage(flavor);
    if (configured) {
      return { ...configured, servingFlavor: flavor };
    }

    const framework = FRAMEWORK_ALIASES[flavor] ?? flavor;
    const table = this.config.frameworks[framework];
    if (table) {
      const requested =
        getFlavorVersion(manifest, framework) ??
        (request.requirements ? getPinnedVersion(request.requirements, framework) : undefined);
      const matched = matchFrameworkVersion(requested, Object.keys(table));
      const imageReference = matched ? table[matched] : undefined;
      if (matched && imageReference) {
        this.logger?.debug("Matched framework image", { framework, frameworkVersion: matched });
        return { imageReference, source: "framework", servingFlavor: flavor, frameworkVersion: matched };
      }
    }

    if (flavor !== PYTHON_FUNCTION_FLAVOR && hasFlavor(manifest, PYTHON_FUNCTION_FLAVOR)) {
      const fallback = await this.lookupFlavorImage(PYTHON_FUNCTION_FLAVOR);
      if (fallback) {
        this.logger?.info("No image for flavor, using python_function", { flavor });
        return { imageReference: fallback.imageReference, source: "python_function", servingFlavor: PYTHON_FUNCTION_FLAVOR };
      }
    }

    return null;
  }

  private async lookupFlavorImage(
    flavor: string
  ): Promise<{ imageReference: string; source: "config" | "catalog" } | null> {
    const configured = this.config.flavors[flavor];
    if (configured) {
      return { imageReference: configured, source: "config" };
    }

    if (this.catalog) {
      const fromCatalog = await this.catalog.lookup(flavor);
      if (fromCatalog) {
        return { imageReference: fromCatalog, source: "catalog" };
      }
    }

    return null;
  }
}
