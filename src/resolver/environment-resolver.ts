/**
 * @fileoverview Environment Resolver
 *
 * Runs the resolution pipeline for named environments:
 *
 * registry lookup → validate (partial) → merge onto defaults →
 * validate merged descriptor → resolve references → emit
 *
 * Each environment is resolved independently; a failure in one never stops
 * the others when several are requested together.
 */

import { environmentConfig } from "../config/environment";
import { parseEnvironmentDocument } from "../parsers/document-parser";
import type { DocumentSource } from "../sources/document-source";
import type {
  ImmutableDescriptor,
  RawEnvironmentEntry,
  RepeatedKey,
  ValidatedRaw,
} from "../types/descriptor";
import {
  EnvironmentResolutionError,
  generateCorrelationId,
} from "../types/errors";
import { fail, ok, unwrap, type Result } from "../types/result";
import { createCorrelatedLogger, type Logger } from "../utils/logger";
import { emit } from "./emitter";
import { EMPTY_DEFAULTS, safeMerge } from "./merger";
import { resolveReferences } from "./reference-resolver";
import { EnvironmentRegistry } from "./registry";
import { validate, validateDescriptor } from "./schema-validator";

/** Label used for the defaults block in validation errors */
export const DEFAULTS_BLOCK_NAME = "defaults";

export interface ResolverOptions {
  /** Raw defaults block shared by every environment */
  defaults?: Record<string, unknown>;
  /** Upper bound for resourceLimits.timeoutSeconds; defaults to PLATFORM_MAX_TIMEOUT_SECONDS */
  platformMaxTimeoutSeconds?: number;
  correlationId?: string;
  logger?: Logger;
}

export type ResolutionOutcome =
  | { name: string; success: true; descriptor: ImmutableDescriptor }
  | { name: string; success: false; error: EnvironmentResolutionError };

/**
 * Validates a defaults block in partial mode
 *
 * @throws {ValidationError} When the block is malformed
 */
export function prepareDefaults(
  defaults: Record<string, unknown> | undefined,
  platformMaxTimeoutSeconds: number,
): ValidatedRaw {
  if (defaults === undefined) {
    return EMPTY_DEFAULTS;
  }
  return unwrap(
    validate(defaults, DEFAULTS_BLOCK_NAME, { mode: "partial", platformMaxTimeoutSeconds }),
  );
}

/**
 * Resolves one raw block against prepared defaults without touching any registry
 *
 * @param repeatedKeys - Keys the document parser saw twice in this block
 */
export function resolveEnvironment(
  name: string,
  raw: unknown,
  defaults: ValidatedRaw,
  platformMaxTimeoutSeconds: number,
  repeatedKeys: ReadonlyArray<RepeatedKey> = [],
): Result<ImmutableDescriptor, EnvironmentResolutionError> {
  const overrides = validate(raw, name, {
    mode: "partial",
    platformMaxTimeoutSeconds,
    repeatedKeys,
  });
  if (!overrides.success) {
    return overrides;
  }

  const merged = safeMerge(defaults, overrides.data, name);
  if (!merged.success) {
    return merged;
  }

  const complete = validateDescriptor(merged.data, { platformMaxTimeoutSeconds });
  if (!complete.success) {
    return complete;
  }

  const resolved = resolveReferences(complete.data);
  if (!resolved.success) {
    return resolved;
  }

  return ok(emit(resolved.data));
}

/**
 * Owns the registry for one resolution run
 */
export class EnvironmentResolver {
  private readonly registry = new EnvironmentRegistry<RawEnvironmentEntry>();
  private readonly defaults: ValidatedRaw;
  private readonly platformMaxTimeoutSeconds: number;
  private readonly logger: Logger;

  /**
   * @throws {ValidationError} When the defaults block is malformed
   */
  constructor(options: ResolverOptions = {}) {
    this.platformMaxTimeoutSeconds =
      options.platformMaxTimeoutSeconds ?? environmentConfig.platformMaxTimeoutSeconds;
    this.logger =
      options.logger ??
      createCorrelatedLogger(options.correlationId ?? generateCorrelationId());
    this.defaults = prepareDefaults(options.defaults, this.platformMaxTimeoutSeconds);
  }

  /**
   * Registers one raw environment block
   *
   * @throws {DuplicateNameError} If the name is already registered
   */
  register(entry: RawEnvironmentEntry): void {
    this.registry.register(entry);
  }

  /**
   * Parses a document and registers each of its environments in order
   *
   * Environments registered before a failure stay registered.
   *
   * @returns Names registered from this document
   * @throws {DocumentParseError} When the document cannot be parsed
   * @throws {DuplicateNameError} When a name is already registered or appears twice in the document
   */
  loadDocument(text: string, origin: string): string[] {
    const entries = parseEnvironmentDocument(text, origin);
    for (const entry of entries) {
      this.register(entry);
    }

    const names = entries.map((entry) => entry.name);
    this.logger.info("Environment document loaded", {
      operation: "load_document",
      origin,
      environments: names,
    });
    return names;
  }

  /**
   * Reads a document from a source and registers its environments
   */
  async loadFrom(source: DocumentSource): Promise<string[]> {
    const text = await source.read();
    return this.loadDocument(text, source.location);
  }

  environmentNames(): string[] {
    return this.registry.names();
  }

  /**
   * Resolves a single registered environment
   *
   * @throws {NotFoundError} If the environment was never registered
   * @throws {EnvironmentResolutionError} The first failing stage's error
   */
  resolve(name: string): ImmutableDescriptor {
    return unwrap(this.tryResolve(name));
  }

  /**
   * Resolves several environments independently
   *
   * @param names - Environments to resolve; all registered ones by default
   */
  resolveAll(names: string[] = this.registry.names()): ResolutionOutcome[] {
    return names.map((name): ResolutionOutcome => {
      const result = this.tryResolve(name);
      return result.success
        ? { name, success: true, descriptor: result.data }
        : { name, success: false, error: result.error };
    });
  }

  private tryResolve(name: string): Result<ImmutableDescriptor, EnvironmentResolutionError> {
    const log = this.logger.child({ environmentName: name });

    let result: Result<ImmutableDescriptor, EnvironmentResolutionError>;
    try {
      const entry = this.registry.lookup(name);
      log.debug("Resolving environment", { operation: "resolve", origin: entry.origin });
      result = resolveEnvironment(
        name,
        entry.raw,
        this.defaults,
        this.platformMaxTimeoutSeconds,
        entry.repeatedKeys,
      );
    } catch (error) {
      if (!(error instanceof EnvironmentResolutionError)) {
        throw error;
      }
      result = fail(error);
    }

    if (result.success) {
      log.info("Environment resolved", {
        operation: "resolve",
        region: result.data.region,
        project: result.data.project,
      });
    } else {
      log.error("Environment resolution failed", result.error, {
        operation: "resolve",
        code: result.error.code,
        details: result.error.context,
      });
    }
    return result;
  }
}
