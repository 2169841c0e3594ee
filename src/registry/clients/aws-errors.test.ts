import { describe, test, expect } from "vitest";
import { classifyAwsError, isAwsNotFound, toAdapterError } from "./aws-errors";
import { AdapterError } from "#/errors";

function awsError(name: string, fields: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(`${name} raised`), { name }, fields);
}

describe("aws-errors", () => {
  describe("classifyAwsError", () => {
    test("throttling is retryable whatever the status", () => {
      expect(classifyAwsError(awsError("ThrottlingException", { $metadata: { httpStatusCode: 400 } }))).toBe("retryable");
    });

    test("server faults are retryable", () => {
      expect(classifyAwsError(awsError("InternalFailure", { $metadata: { httpStatusCode: 500 } }))).toBe("retryable");
      expect(classifyAwsError(awsError("Unknown", { $metadata: { httpStatusCode: 503 } }))).toBe("retryable");
    });

    test("client rejections are fatal", () => {
      expect(classifyAwsError(awsError("ValidationException", { $metadata: { httpStatusCode: 400 } }))).toBe("fatal");
      expect(classifyAwsError(awsError("AccessDeniedException", { $metadata: { httpStatusCode: 403 } }))).toBe("fatal");
    });

    test("transport failures without a response are retryable", () => {
      expect(classifyAwsError(new Error("socket hang up"))).toBe("retryable");
    });

    test("client-side faults without a response are fatal", () => {
      expect(classifyAwsError(awsError("CredentialsProviderError", { $fault: "client" }))).toBe("fatal");
    });
  });

  test("isAwsNotFound matches names and 404", () => {
    expect(isAwsNotFound(awsError("ResourceNotFound"))).toBe(true);
    expect(isAwsNotFound(awsError("Unknown", { $metadata: { httpStatusCode: 404 } }))).toBe(true);
    expect(isAwsNotFound(awsError("ValidationException", { $metadata: { httpStatusCode: 400 } }))).toBe(false);
  });

  test("toAdapterError keeps the status and names the exception", () => {
    const error = toAdapterError("put", awsError("SlowDown", { $metadata: { httpStatusCode: 503 } }));

    expect(error).toBeInstanceOf(AdapterError);
    expect(error.message).toBe("SlowDown: SlowDown raised");
    expect(error.status).toBe(503);
    expect(error.retryable).toBe(true);
  });
});
