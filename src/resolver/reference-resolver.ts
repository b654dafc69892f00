/**
 * @fileoverview Reference Resolver
 *
 * Turns location-style strings into typed handles. Only the shape is
 * checked: nothing is fetched, and a handle says where material lives,
 * never what it contains.
 */

import type {
  CertificateHandle,
  EnvironmentDescriptor,
  ResolvedDescriptor,
  SecretsLocation,
  StorageBucketHandle,
} from "../types/descriptor";
import { DescriptorReferenceError } from "../types/errors";
import { fail, ok, type Result } from "../types/result";
import { isValidBucketName } from "./patterns";

const SECRETS_URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/]+)\/(.+)$/;

const CERTIFICATE_ARN_PATTERN =
  /^arn:(aws|aws-cn|aws-us-gov):(acm|iam):([a-z0-9-]*):(\d{12}):(certificate|server-certificate)\/([A-Za-z0-9+=,.@_/-]+)$/;

/**
 * Failure reason for one reference field, without environment context
 */
export type ReferenceParseResult<T> =
  | { success: true; data: T }
  | { success: false; reason: string };

/**
 * Parses `<scheme>://<bucket>/<key>`
 */
export function parseSecretsLocation(uri: string): ReferenceParseResult<SecretsLocation> {
  const match = SECRETS_URI_PATTERN.exec(uri);
  if (!match) {
    return { success: false, reason: `"${uri}" is not of the form <scheme>://<bucket>/<key>` };
  }

  const [, scheme, bucket, key] = match;
  if (!isValidBucketName(bucket)) {
    return { success: false, reason: `"${bucket}" is not a valid bucket name` };
  }

  return { success: true, data: { uri, scheme, bucket, key } };
}

/**
 * Parses an ACM certificate ARN or an IAM server-certificate ARN
 */
export function parseCertificateRef(arn: string): ReferenceParseResult<CertificateHandle> {
  const match = CERTIFICATE_ARN_PATTERN.exec(arn);
  if (!match) {
    return { success: false, reason: `"${arn}" is not a certificate ARN` };
  }

  const [, partition, service, region, accountId, resourceType, resourceId] = match;

  if (service === "acm" && resourceType === "certificate" && region.length > 0) {
    return {
      success: true,
      data: { arn, partition, service, region, accountId, resourceType, resourceId },
    };
  }
  // IAM is a global service, so its ARNs carry no region
  if (service === "iam" && resourceType === "server-certificate" && region.length === 0) {
    return {
      success: true,
      data: { arn, partition, service, region, accountId, resourceType, resourceId },
    };
  }

  return {
    success: false,
    reason: `"${arn}" does not name an acm certificate or an iam server-certificate`,
  };
}

export function parseStorageBucketRef(
  bucketName: string,
): ReferenceParseResult<StorageBucketHandle> {
  if (!isValidBucketName(bucketName)) {
    return { success: false, reason: `"${bucketName}" is not a valid bucket name` };
  }
  return { success: true, data: { bucketName } };
}

/**
 * Resolves every reference field of a merged descriptor
 *
 * @returns The descriptor with a `references` block, or the first malformed reference
 */
export function resolveReferences(
  descriptor: EnvironmentDescriptor,
): Result<ResolvedDescriptor, DescriptorReferenceError> {
  const malformed = (fieldPath: string, reference: string, reason: string) =>
    fail(new DescriptorReferenceError(reason, descriptor.name, fieldPath, reference));

  const storageBucket = parseStorageBucketRef(descriptor.storageBucketRef);
  if (!storageBucket.success) {
    return malformed("storageBucketRef", descriptor.storageBucketRef, storageBucket.reason);
  }

  const secretsLocation = parseSecretsLocation(descriptor.secretsLocationRef);
  if (!secretsLocation.success) {
    return malformed("secretsLocationRef", descriptor.secretsLocationRef, secretsLocation.reason);
  }

  let certificate: CertificateHandle | undefined;
  if (descriptor.certificateRef !== undefined) {
    const parsed = parseCertificateRef(descriptor.certificateRef);
    if (!parsed.success) {
      return malformed("certificateRef", descriptor.certificateRef, parsed.reason);
    }
    certificate = parsed.data;
  }

  return ok({
    ...descriptor,
    references: {
      secretsLocation: secretsLocation.data,
      storageBucket: storageBucket.data,
      ...(certificate ? { certificate } : {}),
    },
  });
}
