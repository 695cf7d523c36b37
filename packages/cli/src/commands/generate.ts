import { existsSync } from 'node:fs';
import path from 'node:path';

import {
  ExternalAjvValidator,
  InProcessAjvValidator,
  formatFileSize,
  generateDocument,
  getSizeTier,
  writeDocument,
  type DocumentValidator,
  type SizeTier,
  type ValidationOutcome,
} from '@pubgen/core';
import {
  DEFAULT_SCHEMA_PATH,
  DEFAULT_SIZE,
  resolveOutputPath,
  type ValidatorKind,
} from '../flags';

export interface GenerateOptions {
  size: string;
  /** Defaults to `large-publication-{size}.json`. */
  output?: string;
  schema: string;
  validate: boolean;
  validator: ValidatorKind;
  ajvBin?: string;
  seed?: number;
  /** Directory relative paths are resolved against. */
  cwd: string;
  /** Reference instant for timestamps; the current time when omitted. */
  now?: Date;
}

export type ValidationReport =
  | ValidationOutcome
  | { status: 'skipped'; reason: string };

export interface GenerateSummary {
  outputPath: string;
  bytes: number;
  tier: SizeTier;
  /** Absent when validation was not requested. */
  validation?: ValidationReport;
}

const DEFAULT_GENERATE_OPTIONS: Omit<GenerateOptions, 'cwd'> = {
  size: DEFAULT_SIZE,
  schema: DEFAULT_SCHEMA_PATH,
  validate: false,
  validator: 'external',
};

/**
 * Fill in defaults. A key given as `undefined` falls back like a missing one.
 */
export function resolveGenerateOptions(
  options: Partial<GenerateOptions> = {}
): GenerateOptions {
  const defaults = DEFAULT_GENERATE_OPTIONS;
  return {
    ...options,
    size: options.size ?? defaults.size,
    schema: options.schema ?? defaults.schema,
    validate: options.validate ?? defaults.validate,
    validator: options.validator ?? defaults.validator,
    cwd: options.cwd ?? process.cwd(),
  };
}

export function createValidator(
  kind: ValidatorKind,
  ajvBin?: string
): DocumentValidator {
  return kind === 'builtin'
    ? new InProcessAjvValidator()
    : new ExternalAjvValidator(ajvBin);
}

function out(line: string): void {
  process.stdout.write(`${line}\n`);
}

function warn(line: string): void {
  process.stderr.write(`[pubgen] ${line}\n`);
}

/**
 * Generate one document, write it, optionally validate it and report the
 * file size.
 *
 * Sequential and single-pass: an unknown size fails before any I/O, write
 * failures propagate, and validation problems are reported without failing
 * the run.
 */
export async function runGenerate(
  input: Partial<GenerateOptions> = {},
  validatorOverride?: DocumentValidator
): Promise<GenerateSummary> {
  const options = resolveGenerateOptions(input);
  const tier = getSizeTier(options.size);
  const displayPath = resolveOutputPath(options.output, tier.label);
  const outputPath = path.resolve(options.cwd, displayPath);

  out(
    `Generating ${displayPath} (${tier.label}: ${tier.chapters} chapters x ${tier.blocksPerChapter} blocks, ~${tier.imageCount} images)...`
  );
  const document = generateDocument(tier.label, {
    seed: options.seed,
    now: options.now,
  });
  const written = await writeDocument(outputPath, document);
  out(`Generated ${displayPath}`);

  let validation: ValidationReport | undefined;
  if (options.validate) {
    validation = await validateOutput(
      written.path,
      displayPath,
      path.resolve(options.cwd, options.schema),
      options.schema,
      validatorOverride ??
        createValidator(options.validator, options.ajvBin)
    );
  }

  out(`File size: ${formatFileSize(written.bytes)}`);

  return {
    outputPath: written.path,
    bytes: written.bytes,
    tier,
    validation,
  };
}

async function validateOutput(
  dataPath: string,
  displayPath: string,
  schemaPath: string,
  displaySchema: string,
  validator: DocumentValidator
): Promise<ValidationReport> {
  if (!existsSync(schemaPath)) {
    warn(`⚠️  Schema file not found: ${displaySchema}`);
    return { status: 'skipped', reason: `Schema file not found: ${schemaPath}` };
  }

  const outcome = await validator.validate(dataPath, schemaPath);
  switch (outcome.status) {
    case 'passed':
      out(`✅ JSON validation passed for ${displayPath}`);
      break;
    case 'failed':
      warn(`❌ JSON validation failed for ${displayPath} (${validator.name})`);
      process.stderr.write(`${outcome.details}\n`);
      break;
    case 'unavailable':
      warn(`⚠️  ${outcome.reason}`);
      break;
  }
  return outcome;
}
