import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { environmentConfig } from "../config/environment";
import { DocumentSourceError, generateCorrelationId } from "../types/errors";
import { readWithRetry, type RetryConfig } from "../utils/retry";
import type { DocumentSource } from "./document-source";

export interface S3DocumentSourceOptions {
  bucket: string;
  key: string;
  /** Defaults to a client for the configured AWS_REGION */
  client?: S3Client;
  correlationId?: string;
  retryConfig?: Partial<RetryConfig>;
}

/**
 * Document stored as an S3 object
 */
export class S3DocumentSource implements DocumentSource {
  public readonly location: string;
  private readonly s3Client: S3Client;
  private readonly bucket: string;
  private readonly key: string;
  private readonly correlationId: string;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(options: S3DocumentSourceOptions) {
    this.bucket = options.bucket;
    this.key = options.key;
    this.location = `s3://${options.bucket}/${options.key}`;
    this.s3Client =
      options.client ?? new S3Client({ region: environmentConfig.awsRegion });
    this.correlationId = options.correlationId ?? generateCorrelationId();
    this.retryConfig = options.retryConfig ?? {};
  }

  async read(): Promise<string> {
    return readWithRetry(
      async () => {
        const response = await this.s3Client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: this.key }),
        );
        if (!response.Body) {
          throw new DocumentSourceError("object has no body", this.location);
        }
        return response.Body.transformToString("utf-8");
      },
      {
        location: this.location,
        operation: "GetObject",
        failureMessage: "failed to read object",
        correlationId: this.correlationId,
        retryConfig: this.retryConfig,
      },
    );
  }
}
