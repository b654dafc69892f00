import { describe, it, expect, vi, beforeEach } from "vitest";
import { isTransientSourceError, readWithRetry, type SourceReadOptions } from "./retry";
import { DocumentSourceError } from "../types/errors";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

// Mock the logger
vi.mock("./logger", () => ({
  createCorrelatedLogger: vi.fn(() => mockLogger),
}));

/**
 * Error shaped like an AWS SDK v3 service exception
 */
function serviceError(
  name: string,
  httpStatusCode: number,
  extra: Record<string, unknown> = {},
): Error {
  return Object.assign(new Error(`${name} (${httpStatusCode})`), {
    name,
    $metadata: { httpStatusCode },
    ...extra,
  });
}

const options: SourceReadOptions = {
  location: "s3://deploy-config/environments.json",
  operation: "GetObject",
  failureMessage: "failed to read object",
  correlationId: "test-correlation-id",
  retryConfig: { maxRetries: 2, baseDelay: 1, maxDelay: 1 },
};

describe("isTransientSourceError", () => {
  it.each([
    ["a 5xx response", serviceError("InternalError", 500), true],
    ["a 503 response", serviceError("ServiceUnavailable", 503), true],
    ["a 429 response", serviceError("TooManyRequests", 429), true],
    ["a throttling error", Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException" }), true],
    ["an error the SDK marked retryable", Object.assign(new Error("x"), { $retryable: { throttling: false } }), true],
    ["a dropped connection", Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }), true],
    ["access denied", serviceError("AccessDenied", 403), false],
    ["a missing key", serviceError("NoSuchKey", 404), false],
    ["a timeout mentioned only in the message", new Error("Request timeout"), false],
    ["a thrown string", "boom", false],
    ["null", null, false],
  ])("should judge %s as transient: %s", (_label, error, expected) => {
    expect(isTransientSourceError(error)).toBe(expected);
  });
});

describe("readWithRetry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return the first successful read", async () => {
    const read = vi.fn().mockResolvedValue('{"dev":{}}');

    await expect(readWithRetry(read, options)).resolves.toBe('{"dev":{}}');
    expect(read).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it("should retry transient failures and log the recovery", async () => {
    const read = vi
      .fn()
      .mockRejectedValueOnce(serviceError("ServiceUnavailable", 503))
      .mockRejectedValueOnce(Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException" }))
      .mockResolvedValue("[]");

    await expect(readWithRetry(read, options)).resolves.toBe("[]");
    expect(read).toHaveBeenCalledTimes(3);
    expect(mockLogger.warn).toHaveBeenCalledTimes(2);
    expect(mockLogger.info).toHaveBeenCalledWith("Source read succeeded after retry", { attempts: 3 });
  });

  it("should fail at once on a permanent failure", async () => {
    const read = vi.fn().mockRejectedValue(serviceError("AccessDenied", 403));

    const result = readWithRetry(read, options);

    await expect(result).rejects.toThrow(DocumentSourceError);
    await expect(result).rejects.toThrow(
      "s3://deploy-config/environments.json: failed to read object: AccessDenied (403)",
    );
    expect(read).toHaveBeenCalledTimes(1);
  });

  it("should give up after the configured retries", async () => {
    const read = vi.fn().mockRejectedValue(serviceError("SlowDown", 503));

    let caught: unknown;
    try {
      await readWithRetry(read, options);
    } catch (error) {
      caught = error;
    }

    expect(read).toHaveBeenCalledTimes(3);
    expect(caught).toBeInstanceOf(DocumentSourceError);
    if (caught instanceof DocumentSourceError) {
      expect(caught.context).toEqual({
        location: "s3://deploy-config/environments.json",
        operation: "GetObject",
        attempts: 3,
        transient: true,
      });
    }
    expect(mockLogger.error).toHaveBeenCalledTimes(1);
  });

  it("should pass a document source error through unchanged", async () => {
    const original = new DocumentSourceError("object has no body", options.location);
    const read = vi.fn().mockRejectedValue(original);

    await expect(readWithRetry(read, options)).rejects.toBe(original);
    expect(read).toHaveBeenCalledTimes(1);
  });

  it("should describe values that are not errors", async () => {
    const read = vi.fn().mockRejectedValue("boom");

    await expect(readWithRetry(read, options)).rejects.toThrow(
      "s3://deploy-config/environments.json: failed to read object: boom",
    );
  });
});
