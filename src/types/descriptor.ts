/**
 * Environment descriptor types
 *
 * A descriptor moves through three shapes: a validated raw block (every
 * field optional), a merged {@link EnvironmentDescriptor}, and finally a
 * {@link ResolvedDescriptor} that also carries the parsed reference handles.
 */

/**
 * Log levels an environment can request from its deployed runtime
 */
export type ObservabilityLogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

/**
 * JSON value as it appears in an environment document
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Networking attachment for the deployed unit
 */
export interface NetworkConfig {
  /** Subnets to place the unit in, in order */
  subnetIds?: string[];
  /** Security groups to attach, in order */
  securityGroupIds?: string[];
}

/**
 * Compute limits for the deployed unit
 */
export interface ResourceLimits {
  /** Memory allocation in MB */
  memorySizeMB: number;
  /** Invocation timeout in seconds */
  timeoutSeconds: number;
}

/**
 * Runtime logging and tracing settings
 */
export interface ObservabilityConfig {
  logLevel?: ObservabilityLogLevel;
  tracingEnabled?: boolean;
}

/**
 * Fully merged deployment profile for one named environment
 */
export interface EnvironmentDescriptor {
  /** Environment name, unique within a registry (e.g. "dev") */
  name: string;
  /** Cloud region code (e.g. "us-east-1") */
  region: string;
  /** Logical application/project name */
  project: string;
  /** Language runtime tag (e.g. "python3.12") */
  runtimeVersion: string;
  /** Bucket that receives the packaged artifact */
  storageBucketRef: string;
  /** Location of the secrets bundle, `<scheme>://<bucket>/<key>` */
  secretsLocationRef: string;
  /** Custom hostname; requires {@link certificateRef} */
  domain?: string;
  /** Certificate ARN for {@link domain} */
  certificateRef?: string;
  /** Variables injected into the runtime */
  environmentVariables: Record<string, string>;
  /** Deploy-time metadata, kept apart from runtime variables */
  buildMetadata: Record<string, string>;
  network?: NetworkConfig;
  resourceLimits: ResourceLimits;
  observability?: ObservabilityConfig;
  keepWarm?: boolean;
  /** Glob patterns trimmed from the deployment payload */
  excludedPackages?: string[];
  /** Unrecognised top-level keys, passed through unvalidated */
  extensions: Record<string, JsonValue>;
}

/**
 * Validated environment block before defaults are applied
 *
 * Everything is optional here; presence is enforced by the merger.
 */
export interface ValidatedRaw {
  name?: string;
  region?: string;
  project?: string;
  runtimeVersion?: string;
  storageBucketRef?: string;
  secretsLocationRef?: string;
  domain?: string;
  certificateRef?: string;
  environmentVariables?: Record<string, string>;
  buildMetadata?: Record<string, string>;
  network?: NetworkConfig;
  resourceLimits?: Partial<ResourceLimits>;
  observability?: ObservabilityConfig;
  keepWarm?: boolean;
  excludedPackages?: string[];
  extensions: Record<string, JsonValue>;
}

/**
 * Parsed secrets bundle location; the content is fetched by someone else
 */
export interface SecretsLocation {
  uri: string;
  scheme: string;
  bucket: string;
  key: string;
}

/**
 * Parsed artifact bucket reference
 */
export interface StorageBucketHandle {
  bucketName: string;
}

/**
 * Parsed certificate ARN
 */
export interface CertificateHandle {
  arn: string;
  partition: string;
  service: "acm" | "iam";
  region: string;
  accountId: string;
  resourceType: "certificate" | "server-certificate";
  resourceId: string;
}

/**
 * Typed handles for every reference field on a descriptor
 */
export interface ResolvedReferences {
  secretsLocation: SecretsLocation;
  storageBucket: StorageBucketHandle;
  certificate?: CertificateHandle;
}

/**
 * Descriptor with every reference resolved
 */
export interface ResolvedDescriptor extends EnvironmentDescriptor {
  references: ResolvedReferences;
}

/**
 * Recursively readonly view of a value
 */
export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Frozen descriptor handed to the deployment engine
 */
export type ImmutableDescriptor = DeepReadonly<ResolvedDescriptor>;

/**
 * Key written more than once in the same object of a document
 *
 * JSON.parse keeps only the last value, so repeats are recorded before the
 * block reaches the validator.
 */
export interface RepeatedKey {
  /** Path of the object holding the key, relative to the block; "(root)" for the block itself */
  fieldPath: string;
  key: string;
}

/**
 * One environment block as read from a document, before validation
 */
export interface RawEnvironmentEntry {
  name: string;
  raw: Record<string, unknown>;
  /** Where the block came from (file path, s3:// URI, parameter name) */
  origin: string;
  repeatedKeys?: RepeatedKey[];
}
