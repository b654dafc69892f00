export {
  validate,
  validateDescriptor,
  REQUIRED_FIELDS,
  DEFAULT_PLATFORM_MAX_TIMEOUT_SECONDS,
  type RequiredField,
  type ValidationMode,
  type ValidationOptions,
} from "./schema-validator";
export { merge, safeMerge, EMPTY_DEFAULTS } from "./merger";
export {
  resolveReferences,
  parseSecretsLocation,
  parseCertificateRef,
  parseStorageBucketRef,
  type ReferenceParseResult,
} from "./reference-resolver";
export { EnvironmentRegistry, type Named } from "./registry";
export {
  emit,
  toCanonicalBlock,
  serializeDescriptor,
  serializeDocument,
  descriptorsEqual,
} from "./emitter";
export {
  EnvironmentResolver,
  resolveEnvironment,
  prepareDefaults,
  DEFAULTS_BLOCK_NAME,
  type ResolverOptions,
  type ResolutionOutcome,
} from "./environment-resolver";
