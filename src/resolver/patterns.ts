/**
 * Syntactic checks shared by the validator and the reference resolver
 */

/** us-east-1, eu-central-1, us-gov-west-1, ap-southeast-2 */
const REGION_PATTERN = /^[a-z]{2}(-gov)?-[a-z]+-\d+$/;

/** subnet-0a1b2c3d, sg-12345678 */
const RESOURCE_ID_PATTERN = /^[a-z][a-z0-9]*-[0-9a-zA-Z]+$/;

const HOSTNAME_LABEL = /^[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;

export const isValidRegion = (region: string): boolean =>
  REGION_PATTERN.test(region);

export const isValidResourceId = (id: string): boolean =>
  RESOURCE_ID_PATTERN.test(id);

/**
 * Hostname syntax: dot-separated labels of 1-63 characters, at most 253 in total.
 * A single trailing dot (fully-qualified form) is accepted.
 */
export function isValidHostname(hostname: string): boolean {
  const name = hostname.endsWith(".") ? hostname.slice(0, -1) : hostname;
  if (name.length === 0 || name.length > 253) {
    return false;
  }
  return name.split(".").every((label) => HOSTNAME_LABEL.test(label));
}

/**
 * Bucket naming rules: 3-63 lowercase letters, digits, dots and hyphens,
 * alphanumeric at both ends, no empty label, not an IPv4 address
 */
export function isValidBucketName(name: string): boolean {
  return (
    BUCKET_NAME_PATTERN.test(name) &&
    !name.includes("..") &&
    !name.includes(".-") &&
    !name.includes("-.") &&
    !IPV4_PATTERN.test(name)
  );
}
