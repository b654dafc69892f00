/**
 * @fileoverview Environment summary command
 *
 * Resolves the environments in a document and prints either a readable
 * summary per environment or the canonical JSON of the resolved set.
 */

import { parseArgs } from 'util';
import { parseDefaultsDocument } from '../parsers/document-parser';
import { EnvironmentResolver, type ResolutionOutcome } from '../resolver/environment-resolver';
import { serializeDocument } from '../resolver/emitter';
import { FileDocumentSource } from '../sources/file-source';
import type { ImmutableDescriptor } from '../types/descriptor';
import { EnvironmentResolutionError, generateCorrelationId } from '../types/errors';
import { Logger, LogLevel, logger } from '../utils/logger';

export const HELP = `Usage: show-config <environments.json> [options]

Resolve deployment environments and print the result.

Options:
  --defaults <file>     Defaults block applied under every environment
  --env <name>          Resolve only this environment (repeatable)
  --json                Print the canonical JSON document instead of a summary
  -h, --help            Show help`;

const RULE = '='.repeat(60);

export interface CommandOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CommandOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const listOrNone = (values: ReadonlyArray<string>): string =>
  values.length > 0 ? values.join(', ') : '(none)';

/**
 * Readable lines for one resolved environment
 */
export function describeEnvironment(descriptor: ImmutableDescriptor): string[] {
  const { references, resourceLimits } = descriptor;
  const lines = [
    RULE,
    `📋 ${descriptor.name.toUpperCase()} ENVIRONMENT`,
    RULE,
    `   Project: ${descriptor.project}`,
    `   Region: ${descriptor.region}`,
    `   Runtime: ${descriptor.runtimeVersion}`,
    `   Limits: ${resourceLimits.memorySizeMB}MB, ${resourceLimits.timeoutSeconds}s`,
    `   Artifact Bucket: ${references.storageBucket.bucketName}`,
    `   Secrets: ${references.secretsLocation.scheme} bucket=${references.secretsLocation.bucket} key=${references.secretsLocation.key}`,
  ];

  if (descriptor.domain !== undefined) {
    lines.push(`   Domain: ${descriptor.domain}`);
  }
  if (references.certificate) {
    lines.push(
      `   Certificate: ${references.certificate.service} ${references.certificate.resourceId} (${references.certificate.accountId})`,
    );
  }
  if (descriptor.network) {
    lines.push(`   Subnets: ${listOrNone(descriptor.network.subnetIds ?? [])}`);
    lines.push(`   Security Groups: ${listOrNone(descriptor.network.securityGroupIds ?? [])}`);
  }
  if (descriptor.keepWarm !== undefined) {
    lines.push(`   Keep Warm: ${descriptor.keepWarm ? 'Enabled' : 'Disabled'}`);
  }
  lines.push(`   Environment Variables: ${listOrNone(Object.keys(descriptor.environmentVariables))}`);
  lines.push(`   Build Metadata: ${listOrNone(Object.keys(descriptor.buildMetadata))}`);

  return lines;
}

function describeOutcome(outcome: ResolutionOutcome): string[] {
  if (outcome.success) {
    return describeEnvironment(outcome.descriptor);
  }
  return [RULE, `❌ ${outcome.name}: ${outcome.error.message}`, RULE];
}

const parseCommandLine = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      defaults: { type: 'string' },
      env: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

const isArgumentError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('ERR_PARSE_ARGS_');

/**
 * Resolver logger for --json runs: stdout carries only the document, so
 * entries below WARN are dropped (console.warn and console.error write to stderr)
 */
function documentModeLogger(): Logger {
  const minLevel = logger.isLevelEnabled(LogLevel.WARN) ? LogLevel.WARN : LogLevel.ERROR;
  return new Logger('EnvironmentResolver', { correlationId: generateCorrelationId() }, minLevel);
}

/**
 * Runs the command
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code: 0 when every requested environment resolved
 */
export async function runShowConfig(
  argv: string[],
  output: CommandOutput = consoleOutput,
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    if (isArgumentError(error)) {
      output.err(`❌ ${error.message}`);
      output.out(HELP);
      return 2;
    }
    throw error;
  }
  const { values, positionals } = parsed;

  if (values.help || positionals.length !== 1) {
    output.out(HELP);
    return values.help ? 0 : 2;
  }

  try {
    const defaults = values.defaults
      ? await readDefaults(values.defaults)
      : undefined;

    const resolver = new EnvironmentResolver({
      defaults,
      logger: values.json ? documentModeLogger() : undefined,
    });
    await resolver.loadFrom(new FileDocumentSource(positionals[0]));

    const outcomes = resolver.resolveAll(values.env);
    const failed = outcomes.filter((outcome) => !outcome.success);

    if (values.json) {
      const resolved = outcomes.flatMap((outcome) =>
        outcome.success ? [outcome.descriptor] : [],
      );
      output.out(serializeDocument(resolved).trimEnd());
      failed.forEach((outcome) => describeOutcome(outcome).forEach((line) => output.err(line)));
    } else {
      outcomes.forEach((outcome) => describeOutcome(outcome).forEach((line) => output.out(line)));
    }

    return failed.length > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof EnvironmentResolutionError) {
      output.err(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

async function readDefaults(filePath: string): Promise<Record<string, unknown>> {
  const source = new FileDocumentSource(filePath);
  return parseDefaultsDocument(await source.read(), source.location);
}
