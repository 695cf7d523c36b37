import {
  ConfigError,
  DEFAULT_AJV_BIN,
  ErrorCode,
  getSizeTier,
  type SizeLabel,
} from '@pubgen/core';

export const DEFAULT_SIZE: SizeLabel = '1mb';
export const DEFAULT_SCHEMA_PATH = 'schemas/invest-publications.schema.json';

export const VALIDATOR_KINDS = ['external', 'builtin'] as const;
export type ValidatorKind = (typeof VALIDATOR_KINDS)[number];

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  size?: string;
  output?: string;
  schema?: string;
  validate?: boolean;
  validator?: string;
  ajvBin?: string;
  seed?: string | number;
}

/**
 * Resolve --size into a supported tier label, or throw ConfigError before
 * anything touches the filesystem.
 */
export function resolveSizeLabel(value: unknown): SizeLabel {
  if (value === undefined || value === null || value === '') {
    return DEFAULT_SIZE;
  }
  return getSizeTier(String(value)).label;
}

/**
 * Output file name: the explicit --output, otherwise
 * `large-publication-{size}.json` in the working directory.
 */
export function resolveOutputPath(
  output: string | undefined,
  size: SizeLabel
): string {
  return output && output.trim() !== ''
    ? output
    : `large-publication-${size}.json`;
}

/**
 * Parse --seed. Absent means an unseeded run.
 */
export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new ConfigError({
      message: `Invalid --seed value "${String(value)}". Expected a non-negative integer.`,
      errorCode: ErrorCode.INVALID_OPTION,
      context: { setting: 'seed', value },
    });
  }
  return num;
}

export function resolveValidatorKind(value: unknown): ValidatorKind {
  if (value === undefined || value === null || value === '') {
    return 'external';
  }
  const raw = String(value).toLowerCase();
  const kind = VALIDATOR_KINDS.find((candidate) => candidate === raw);
  if (!kind) {
    throw new ConfigError({
      message: `Invalid --validator value "${String(value)}". Expected "external" or "builtin".`,
      errorCode: ErrorCode.INVALID_OPTION,
      context: { setting: 'validator', value },
    });
  }
  return kind;
}

export function resolveAjvBin(value: unknown): string {
  return typeof value === 'string' && value.trim() !== ''
    ? value
    : DEFAULT_AJV_BIN;
}
