/**
 * Version module
 *
 * Loose semver utilities for matching model framework versions to serving images.
 */

export {
  parseLooseVersion,
  compareLooseVersions,
  sortVersionsDesc,
  getHighestVersion,
  matchFrameworkVersion,
} from "./version";
