import { describe, it, expect, vi, beforeEach } from "vitest";
import { S3DocumentSource } from "./s3-source";
import { DocumentSourceError } from "../types/errors";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("../config/environment", () => ({
  environmentConfig: {
    environment: "test",
    awsRegion: "us-east-1",
    logLevel: "ERROR",
    platformMaxTimeoutSeconds: 900,
  },
}));

// Mock the AWS SDK
vi.mock("@aws-sdk/client-s3", () => ({
  S3Client: class {
    send = mockSend;
  },
  GetObjectCommand: class {
    constructor(readonly input: unknown) {}
  },
}));

describe("S3DocumentSource", () => {
  beforeEach(() => {
    mockSend.mockReset();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  const createSource = () =>
    new S3DocumentSource({
      bucket: "deploy-config",
      key: "billing/environments.json",
      correlationId: "test-correlation-id",
      retryConfig: { maxRetries: 2, baseDelay: 1, maxDelay: 1 },
    });

  it("should describe its location as an s3 URI", () => {
    expect(createSource().location).toBe("s3://deploy-config/billing/environments.json");
  });

  it("should read the object body as text", async () => {
    mockSend.mockResolvedValue({
      Body: { transformToString: vi.fn().mockResolvedValue('{"dev":{}}') },
    });

    await expect(createSource().read()).resolves.toBe('{"dev":{}}');
    expect(mockSend).toHaveBeenCalledWith(
      expect.objectContaining({
        input: { Bucket: "deploy-config", Key: "billing/environments.json" },
      }),
    );
  });

  it("should retry transient failures", async () => {
    mockSend
      .mockRejectedValueOnce(
        Object.assign(new Error("Service Unavailable"), {
          name: "ServiceUnavailable",
          $metadata: { httpStatusCode: 503 },
        }),
      )
      .mockResolvedValue({
        Body: { transformToString: vi.fn().mockResolvedValue("[]") },
      });

    await expect(createSource().read()).resolves.toBe("[]");
    expect(mockSend).toHaveBeenCalledTimes(2);
  });

  it("should fail when the object has no body", async () => {
    mockSend.mockResolvedValue({});

    await expect(createSource().read()).rejects.toThrow(
      "s3://deploy-config/billing/environments.json: object has no body",
    );
    expect(mockSend).toHaveBeenCalledTimes(1);
  });

  it("should wrap SDK errors", async () => {
    mockSend.mockRejectedValue(
      Object.assign(new Error("Access Denied"), {
        name: "AccessDenied",
        $metadata: { httpStatusCode: 403 },
      }),
    );

    const read = createSource().read();

    await expect(read).rejects.toThrow(DocumentSourceError);
    await expect(read).rejects.toThrow(
      "s3://deploy-config/billing/environments.json: failed to read object: Access Denied",
    );
    expect(mockSend).toHaveBeenCalledTimes(1);
  });
});
