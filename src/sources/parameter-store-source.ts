import { SSMClient, GetParameterCommand } from "@aws-sdk/client-ssm";
import { environmentConfig } from "../config/environment";
import { DocumentSourceError, generateCorrelationId } from "../types/errors";
import { readWithRetry, type RetryConfig } from "../utils/retry";
import type { DocumentSource } from "./document-source";

export interface ParameterStoreDocumentSourceOptions {
  /** Full parameter name including path, e.g. /billing-app/deploy/environments */
  parameterName: string;
  /** Defaults to a client for the configured AWS_REGION */
  client?: SSMClient;
  correlationId?: string;
  retryConfig?: Partial<RetryConfig>;
}

/**
 * Document stored as a Parameter Store parameter
 *
 * The parameter is read without decryption: secrets belong in the bundle
 * that secretsLocationRef points at, not in the environments document.
 */
export class ParameterStoreDocumentSource implements DocumentSource {
  public readonly location: string;
  private readonly ssmClient: SSMClient;
  private readonly parameterName: string;
  private readonly correlationId: string;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(options: ParameterStoreDocumentSourceOptions) {
    this.parameterName = options.parameterName;
    this.location = `ssm:${options.parameterName}`;
    this.ssmClient =
      options.client ?? new SSMClient({ region: environmentConfig.awsRegion });
    this.correlationId = options.correlationId ?? generateCorrelationId();
    this.retryConfig = options.retryConfig ?? {};
  }

  async read(): Promise<string> {
    return readWithRetry(
      async () => {
        const response = await this.ssmClient.send(
          new GetParameterCommand({
            Name: this.parameterName,
            WithDecryption: false,
          }),
        );
        const value = response.Parameter?.Value;
        if (value === undefined) {
          throw new DocumentSourceError("parameter has no value", this.location);
        }
        return value;
      },
      {
        location: this.location,
        operation: "GetParameter",
        failureMessage: "failed to read parameter",
        correlationId: this.correlationId,
        retryConfig: this.retryConfig,
      },
    );
  }
}
