/**
 * @fileoverview Schema Validator
 *
 * Checks one raw environment block for structure and value correctness.
 * Checks run in a fixed order and stop at the first failure:
 *
 * 1. required fields present (complete mode only)
 * 2. field types
 * 3. value ranges and syntax
 * 4. cross-field dependencies (complete mode only)
 * 5. key uniqueness: keys the parser saw twice, then the list form of
 *    environmentVariables and buildMetadata
 *
 * Override and defaults blocks are checked in partial mode, where presence
 * and cross-field rules wait until the merged descriptor exists.
 */

import { z } from "zod";
import type {
  EnvironmentDescriptor,
  JsonValue,
  RepeatedKey,
  ValidatedRaw,
} from "../types/descriptor";
import { ValidationError, type ValidationRule } from "../types/errors";
import { fail, ok, type Result } from "../types/result";
import {
  formatFieldPath,
  isJsonValue,
  isPlainObject,
  readPath,
  setOwn,
} from "../utils/objects";
import { isValidHostname, isValidRegion, isValidResourceId } from "./patterns";
import { isExtensionKey, toRawBlock } from "./raw-form";

export type ValidationMode = "complete" | "partial";

export interface ValidationOptions {
  mode?: ValidationMode;
  /** Upper bound for resourceLimits.timeoutSeconds */
  platformMaxTimeoutSeconds?: number;
  /** Keys the document parser saw more than once in this block */
  repeatedKeys?: ReadonlyArray<RepeatedKey>;
}

export const DEFAULT_PLATFORM_MAX_TIMEOUT_SECONDS = 900;

export const REQUIRED_FIELDS = [
  "region",
  "project",
  "runtimeVersion",
  "storageBucketRef",
  "secretsLocationRef",
  "resourceLimits.memorySizeMB",
  "resourceLimits.timeoutSeconds",
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

const keyValuePairSchema = z
  .object({
    name: z.string(),
    value: z.string(),
  })
  .strict();

const stringMapSchema = z.union([z.record(z.string()), z.array(keyValuePairSchema)], {
  errorMap: () => ({
    message: "Expected an object of strings or a list of { name, value } pairs",
  }),
});

const identifierListSchema = z.array(z.string());

const rawEnvironmentSchema = z
  .object({
    name: z.string().optional(),
    region: z.string().optional(),
    project: z.string().optional(),
    runtimeVersion: z.string().optional(),
    storageBucketRef: z.string().optional(),
    secretsLocationRef: z.string().optional(),
    domain: z.string().optional(),
    certificateRef: z.string().optional(),
    environmentVariables: stringMapSchema.optional(),
    buildMetadata: stringMapSchema.optional(),
    network: z
      .object({
        subnetIds: identifierListSchema.optional(),
        securityGroupIds: identifierListSchema.optional(),
      })
      .strict()
      .optional(),
    resourceLimits: z
      .object({
        memorySizeMB: z.number().int().optional(),
        timeoutSeconds: z.number().int().optional(),
      })
      .strict()
      .optional(),
    observability: z
      .object({
        logLevel: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]).optional(),
        tracingEnabled: z.boolean().optional(),
      })
      .strict()
      .optional(),
    keepWarm: z.boolean().optional(),
    excludedPackages: z.array(z.string()).optional(),
  })
  .passthrough();

type ParsedRaw = z.infer<typeof rawEnvironmentSchema>;
type StringMapInput = z.infer<typeof stringMapSchema>;

/**
 * Thrown inside this module only; converted to a Result at the boundary
 */
class CheckFailure extends Error {
  constructor(
    readonly fieldPath: string,
    readonly rule: ValidationRule,
    message: string,
  ) {
    super(message);
  }
}

const check = (
  condition: boolean,
  fieldPath: string,
  rule: ValidationRule,
  message: string,
): void => {
  if (!condition) {
    throw new CheckFailure(fieldPath, rule, message);
  }
};

function checkRequired(raw: Record<string, unknown>): void {
  for (const field of REQUIRED_FIELDS) {
    check(readPath(raw, field) !== undefined, field, "required", "required field is missing");
  }
}

function checkTypes(raw: Record<string, unknown>): ParsedRaw {
  const parsed = rawEnvironmentSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new CheckFailure(formatFieldPath(issue.path), "type", issue.message);
  }

  for (const [key, value] of Object.entries(raw)) {
    if (isExtensionKey(key) && value !== undefined) {
      check(isJsonValue(value), key, "type", "extension values must be JSON data");
    }
  }

  return parsed.data;
}

function checkIdentifierList(ids: string[] | undefined, fieldPath: string): void {
  if (ids === undefined) {
    return;
  }
  check(ids.length > 0, fieldPath, "range", "must contain at least one identifier when present");
  ids.forEach((id, index) => {
    check(
      isValidResourceId(id),
      `${fieldPath}[${index}]`,
      "format",
      `"${id}" is not a well-formed identifier`,
    );
  });
}

function checkValues(
  parsed: ParsedRaw,
  environmentName: string,
  platformMaxTimeoutSeconds: number,
): void {
  if (parsed.name !== undefined) {
    check(
      parsed.name === environmentName,
      "name",
      "format",
      `must match the environment key "${environmentName}"`,
    );
  }

  const nonEmptyStrings = [
    ["project", parsed.project],
    ["runtimeVersion", parsed.runtimeVersion],
    ["storageBucketRef", parsed.storageBucketRef],
    ["secretsLocationRef", parsed.secretsLocationRef],
    ["certificateRef", parsed.certificateRef],
  ] as const;
  for (const [field, value] of nonEmptyStrings) {
    if (value !== undefined) {
      check(value.trim().length > 0, field, "format", "must not be empty");
    }
  }

  if (parsed.region !== undefined) {
    check(
      isValidRegion(parsed.region),
      "region",
      "format",
      `"${parsed.region}" is not a recognised region code`,
    );
  }

  if (parsed.domain !== undefined) {
    check(
      isValidHostname(parsed.domain),
      "domain",
      "format",
      `"${parsed.domain}" is not a valid hostname`,
    );
  }

  const memorySizeMB = parsed.resourceLimits?.memorySizeMB;
  if (memorySizeMB !== undefined) {
    check(memorySizeMB > 0, "resourceLimits.memorySizeMB", "range", "must be greater than 0");
  }

  const timeoutSeconds = parsed.resourceLimits?.timeoutSeconds;
  if (timeoutSeconds !== undefined) {
    check(
      timeoutSeconds > 0 && timeoutSeconds <= platformMaxTimeoutSeconds,
      "resourceLimits.timeoutSeconds",
      "range",
      `must be between 1 and ${platformMaxTimeoutSeconds}`,
    );
  }

  checkIdentifierList(parsed.network?.subnetIds, "network.subnetIds");
  checkIdentifierList(parsed.network?.securityGroupIds, "network.securityGroupIds");

  parsed.excludedPackages?.forEach((pattern, index) => {
    check(
      pattern.trim().length > 0,
      `excludedPackages[${index}]`,
      "format",
      "patterns must not be empty",
    );
  });
}

function checkCrossField(parsed: ParsedRaw): void {
  if (parsed.domain !== undefined) {
    check(
      parsed.certificateRef !== undefined,
      "certificateRef",
      "cross-field",
      "is required when domain is set",
    );
  }
}

/**
 * Normalises either map form to a record, rejecting empty and repeated keys
 *
 * The object form is read from the raw block: zod drops "__proto__" keys
 * when it rebuilds records.
 */
function toStringMap(
  input: StringMapInput | undefined,
  rawInput: unknown,
  fieldPath: string,
): Record<string, string> | undefined {
  if (input === undefined) {
    return undefined;
  }

  const map: Record<string, string> = {};
  if (Array.isArray(input)) {
    input.forEach(({ name, value }, index) => {
      const keyPath = `${fieldPath}[${index}].name`;
      check(name.length > 0, keyPath, "format", "keys must not be empty");
      check(!Object.hasOwn(map, name), keyPath, "unique", `duplicate key "${name}"`);
      setOwn(map, name, value);
    });
    return map;
  }

  const source = isPlainObject(rawInput) ? rawInput : input;
  for (const [name, value] of Object.entries(source)) {
    check(name.length > 0, fieldPath, "format", "keys must not be empty");
    check(typeof value === "string", fieldPath, "type", `value of "${name}" must be a string`);
    setOwn(map, name, String(value));
  }
  return map;
}

function checkRepeatedKeys(repeatedKeys: ReadonlyArray<RepeatedKey>): void {
  const [repeated] = repeatedKeys;
  if (repeated) {
    throw new CheckFailure(repeated.fieldPath, "unique", `duplicate key "${repeated.key}"`);
  }
}

function collectExtensions(raw: Record<string, unknown>): Record<string, JsonValue> {
  const extensions: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isExtensionKey(key) && isJsonValue(value)) {
      setOwn(extensions, key, value);
    }
  }
  return extensions;
}

function buildValidated(
  parsed: ParsedRaw,
  raw: Record<string, unknown>,
): ValidatedRaw {
  return {
    name: parsed.name,
    region: parsed.region,
    project: parsed.project,
    runtimeVersion: parsed.runtimeVersion,
    storageBucketRef: parsed.storageBucketRef,
    secretsLocationRef: parsed.secretsLocationRef,
    domain: parsed.domain,
    certificateRef: parsed.certificateRef,
    environmentVariables: toStringMap(
      parsed.environmentVariables,
      raw.environmentVariables,
      "environmentVariables",
    ),
    buildMetadata: toStringMap(parsed.buildMetadata, raw.buildMetadata, "buildMetadata"),
    network: parsed.network,
    resourceLimits: parsed.resourceLimits,
    observability: parsed.observability,
    keepWarm: parsed.keepWarm,
    excludedPackages: parsed.excludedPackages,
    extensions: collectExtensions(raw),
  };
}

/**
 * Validates one raw environment block
 *
 * @param raw - Untyped block as read from a document
 * @param environmentName - Name the block was declared under, used in errors
 * @returns The typed block, or the first rule it breaks
 */
export function validate(
  raw: unknown,
  environmentName: string,
  options: ValidationOptions = {},
): Result<ValidatedRaw, ValidationError> {
  const mode = options.mode ?? "complete";
  const platformMaxTimeoutSeconds =
    options.platformMaxTimeoutSeconds ?? DEFAULT_PLATFORM_MAX_TIMEOUT_SECONDS;

  if (!isPlainObject(raw)) {
    return fail(
      new ValidationError("environment block must be an object", environmentName, "(root)", "type"),
    );
  }

  try {
    if (mode === "complete") {
      checkRequired(raw);
    }
    const parsed = checkTypes(raw);
    checkValues(parsed, environmentName, platformMaxTimeoutSeconds);
    if (mode === "complete") {
      checkCrossField(parsed);
    }
    checkRepeatedKeys(options.repeatedKeys ?? []);
    return ok(buildValidated(parsed, raw));
  } catch (error) {
    if (error instanceof CheckFailure) {
      return fail(
        new ValidationError(error.message, environmentName, error.fieldPath, error.rule, { mode }),
      );
    }
    throw error;
  }
}

/**
 * Runs the complete-mode checks over an already merged descriptor
 */
export function validateDescriptor(
  descriptor: EnvironmentDescriptor,
  options: Omit<ValidationOptions, "mode"> = {},
): Result<EnvironmentDescriptor, ValidationError> {
  const result = validate(toRawBlock(descriptor), descriptor.name, {
    ...options,
    mode: "complete",
  });
  return result.success ? ok(descriptor) : result;
}
