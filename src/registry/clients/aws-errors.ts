/**
 * AWS SDK error classification
 *
 * Service exceptions carry a name, an HTTP status and a fault side. Throttling,
 * server faults and transport failures are retryable; everything the service
 * rejected on the caller's side (validation, access, missing resources) is fatal.
 */

import { AdapterError, classifyHttpStatus, errorMessage, type FailureClass } from "#/errors";

const RETRYABLE_NAMES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ProvisionedThroughputExceededException",
  "SlowDown",
  "RequestTimeout",
  "RequestTimeoutException",
  "ServiceUnavailable",
  "InternalFailure",
  "InternalServerError",
  "InternalError",
  "TimeoutError",
]);

const NOT_FOUND_NAMES = new Set(["ResourceNotFound", "ResourceNotFoundException", "NotFound", "NoSuchKey", "ParameterNotFound"]);

/**
 * HTTP status of an SDK error, when the request reached the service
 */
export function awsHttpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

export function classifyAwsError(err: unknown): FailureClass {
  if (!(err instanceof Error)) return "retryable";
  if (RETRYABLE_NAMES.has(err.name)) return "retryable";

  const status = awsHttpStatus(err);
  // No response at all: the request never completed
  if (status === undefined) return "$fault" in err && err.$fault === "client" ? "fatal" : "retryable";
  return classifyHttpStatus(status);
}

export function isAwsNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return NOT_FOUND_NAMES.has(err.name) || awsHttpStatus(err) === 404;
}

/**
 * Wrap an SDK failure as AdapterError with its classification
 */
export function toAdapterError(operation: string, err: unknown): AdapterError {
  if (err instanceof AdapterError) return err;
  const name = err instanceof Error ? err.name : "Error";
  return new AdapterError(operation, `${name}: ${errorMessage(err)}`, classifyAwsError(err), {
    cause: err,
    status: awsHttpStatus(err),
  });
}
