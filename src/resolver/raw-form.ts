/**
 * Conversion of a typed descriptor back into the block shape it is read from
 */

import type { DeepReadonly, EnvironmentDescriptor } from "../types/descriptor";

/**
 * Field names with a meaning of their own; every other top-level key is an extension
 */
export const DESCRIPTOR_FIELDS = [
  "name",
  "region",
  "project",
  "runtimeVersion",
  "storageBucketRef",
  "secretsLocationRef",
  "domain",
  "certificateRef",
  "environmentVariables",
  "buildMetadata",
  "network",
  "resourceLimits",
  "observability",
  "keepWarm",
  "excludedPackages",
] as const;

/**
 * Keys computed during resolution; ignored on input so that re-resolving
 * an emitted descriptor recomputes them
 */
export const DERIVED_FIELDS = ["references"] as const;

const RESERVED_FIELDS: ReadonlySet<string> = new Set<string>([
  ...DESCRIPTOR_FIELDS,
  ...DERIVED_FIELDS,
]);

export const isExtensionKey = (key: string): boolean => !RESERVED_FIELDS.has(key);

/**
 * Flattens extensions back to top-level keys, the shape a document block has
 */
export function toRawBlock(
  descriptor: DeepReadonly<EnvironmentDescriptor>,
): Record<string, unknown> {
  const { extensions, ...fields } = descriptor;
  return { ...extensions, ...fields };
}
