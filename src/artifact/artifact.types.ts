export interface RepackageOptions {
  /** Aborts the pass between steps; nothing is registered for an aborted pass */
  signal?: AbortSignal;
}

export interface RepackageResult {
  /** Location of the archive in the artifact store */
  artifactLocation: string;
  /** Content integrity of the archived tree */
  integrity: string;
  flavor: string;
  imageReference: string;
  /** Container environment for the package */
  environment: Record<string, string>;
  /** True when the store already held an archive with the same integrity */
  reused: boolean;
  sizeBytes?: number;
}
