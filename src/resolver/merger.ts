/**
 * @fileoverview Default/Inheritance Merger
 *
 * Overlays one environment's validated block onto the shared defaults.
 * Scalars present in the overrides replace the defaults; structured values
 * (limits, observability, network, maps, extensions) merge key by key; lists
 * are replaced whole. There is exactly one level of inheritance.
 */

import type {
  EnvironmentDescriptor,
  NetworkConfig,
  ObservabilityConfig,
  ValidatedRaw,
} from "../types/descriptor";
import { MissingFieldError } from "../types/errors";
import { fail, ok, type Result } from "../types/result";
import type { RequiredField } from "./schema-validator";

/**
 * Key-wise union of two string maps; entries from `override` win
 */
function mergeMaps(
  base: Record<string, string> | undefined,
  override: Record<string, string> | undefined,
): Record<string, string> {
  return { ...base, ...override };
}

function mergeObservability(
  base: ObservabilityConfig | undefined,
  override: ObservabilityConfig | undefined,
): ObservabilityConfig | undefined {
  if (base === undefined && override === undefined) {
    return undefined;
  }
  const observability: ObservabilityConfig = {};
  const logLevel = override?.logLevel ?? base?.logLevel;
  if (logLevel !== undefined) {
    observability.logLevel = logLevel;
  }
  const tracingEnabled = override?.tracingEnabled ?? base?.tracingEnabled;
  if (tracingEnabled !== undefined) {
    observability.tracingEnabled = tracingEnabled;
  }
  return observability;
}

function mergeNetwork(
  base: NetworkConfig | undefined,
  override: NetworkConfig | undefined,
): NetworkConfig | undefined {
  if (base === undefined && override === undefined) {
    return undefined;
  }
  // Lists are atomic per environment: replaced, never concatenated
  const subnetIds = override?.subnetIds ?? base?.subnetIds;
  const securityGroupIds = override?.securityGroupIds ?? base?.securityGroupIds;
  const network: NetworkConfig = {};
  if (subnetIds !== undefined) {
    network.subnetIds = [...subnetIds];
  }
  if (securityGroupIds !== undefined) {
    network.securityGroupIds = [...securityGroupIds];
  }
  return network;
}

function requireField<T>(
  value: T | undefined,
  field: RequiredField,
  environmentName: string,
): T {
  if (value === undefined) {
    throw new MissingFieldError(environmentName, field);
  }
  return value;
}

function freezeDescriptor(descriptor: EnvironmentDescriptor): EnvironmentDescriptor {
  Object.freeze(descriptor.environmentVariables);
  Object.freeze(descriptor.buildMetadata);
  Object.freeze(descriptor.resourceLimits);
  Object.freeze(descriptor.extensions);
  if (descriptor.network) {
    if (descriptor.network.subnetIds) Object.freeze(descriptor.network.subnetIds);
    if (descriptor.network.securityGroupIds) Object.freeze(descriptor.network.securityGroupIds);
    Object.freeze(descriptor.network);
  }
  if (descriptor.observability) Object.freeze(descriptor.observability);
  if (descriptor.excludedPackages) Object.freeze(descriptor.excludedPackages);
  return Object.freeze(descriptor);
}

/**
 * Combines defaults with one environment's overrides
 *
 * @param defaults - Shared defaults block (validated in partial mode)
 * @param overrides - The environment's own block (validated in partial mode)
 * @param environmentName - Name the result is registered under
 * @returns A frozen descriptor with every required field set
 * @throws {MissingFieldError} When a required field is set by neither side
 */
export function merge(
  defaults: ValidatedRaw,
  overrides: ValidatedRaw,
  environmentName: string,
): EnvironmentDescriptor {
  const descriptor: EnvironmentDescriptor = {
    name: environmentName,
    region: requireField(overrides.region ?? defaults.region, "region", environmentName),
    project: requireField(overrides.project ?? defaults.project, "project", environmentName),
    runtimeVersion: requireField(
      overrides.runtimeVersion ?? defaults.runtimeVersion,
      "runtimeVersion",
      environmentName,
    ),
    storageBucketRef: requireField(
      overrides.storageBucketRef ?? defaults.storageBucketRef,
      "storageBucketRef",
      environmentName,
    ),
    secretsLocationRef: requireField(
      overrides.secretsLocationRef ?? defaults.secretsLocationRef,
      "secretsLocationRef",
      environmentName,
    ),
    resourceLimits: {
      memorySizeMB: requireField(
        overrides.resourceLimits?.memorySizeMB ?? defaults.resourceLimits?.memorySizeMB,
        "resourceLimits.memorySizeMB",
        environmentName,
      ),
      timeoutSeconds: requireField(
        overrides.resourceLimits?.timeoutSeconds ?? defaults.resourceLimits?.timeoutSeconds,
        "resourceLimits.timeoutSeconds",
        environmentName,
      ),
    },
    environmentVariables: mergeMaps(defaults.environmentVariables, overrides.environmentVariables),
    buildMetadata: mergeMaps(defaults.buildMetadata, overrides.buildMetadata),
    extensions: { ...defaults.extensions, ...overrides.extensions },
  };

  const domain = overrides.domain ?? defaults.domain;
  if (domain !== undefined) {
    descriptor.domain = domain;
  }
  const certificateRef = overrides.certificateRef ?? defaults.certificateRef;
  if (certificateRef !== undefined) {
    descriptor.certificateRef = certificateRef;
  }
  const network = mergeNetwork(defaults.network, overrides.network);
  if (network !== undefined) {
    descriptor.network = network;
  }
  const observability = mergeObservability(defaults.observability, overrides.observability);
  if (observability !== undefined) {
    descriptor.observability = observability;
  }
  const keepWarm = overrides.keepWarm ?? defaults.keepWarm;
  if (keepWarm !== undefined) {
    descriptor.keepWarm = keepWarm;
  }
  const excludedPackages = overrides.excludedPackages ?? defaults.excludedPackages;
  if (excludedPackages !== undefined) {
    descriptor.excludedPackages = [...excludedPackages];
  }

  return freezeDescriptor(descriptor);
}

/**
 * {@link merge} reporting a missing field as a value
 */
export function safeMerge(
  defaults: ValidatedRaw,
  overrides: ValidatedRaw,
  environmentName: string,
): Result<EnvironmentDescriptor, MissingFieldError> {
  try {
    return ok(merge(defaults, overrides, environmentName));
  } catch (error) {
    if (error instanceof MissingFieldError) {
      return fail(error);
    }
    throw error;
  }
}

/**
 * Defaults block that contributes nothing
 */
export const EMPTY_DEFAULTS: ValidatedRaw = Object.freeze({ extensions: {} });
