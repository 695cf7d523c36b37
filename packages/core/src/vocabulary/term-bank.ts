import { readFileSync } from 'node:fs';
import Ajv, { type JSONSchemaType } from 'ajv';

import { ConfigError } from '../types/errors';
import { ErrorCode } from '../errors/codes';

/**
 * Word lists the builders draw from. The default bank ships as
 * `data/term-bank.json` next to this package's sources.
 */
export interface TermBank {
  /** Investment vocabulary used for every synthesized text field. */
  terms: string[];
  /** Tag vocabulary; each Metadata record samples 1–100 of these. */
  tags: string[];
  assetClasses: string[];
  companies: string[];
  instruments: string[];
  sectors: string[];
  regions: string[];
  publicationAuthors: string[];
}

const stringList = (minItems: number) =>
  ({
    type: 'array',
    items: { type: 'string' },
    minItems,
  }) as const;

const TERM_BANK_SCHEMA: JSONSchemaType<TermBank> = {
  type: 'object',
  properties: {
    terms: stringList(1),
    tags: stringList(1),
    assetClasses: stringList(0),
    companies: stringList(0),
    instruments: stringList(0),
    sectors: stringList(0),
    regions: stringList(0),
    publicationAuthors: stringList(0),
  },
  required: [
    'terms',
    'tags',
    'assetClasses',
    'companies',
    'instruments',
    'sectors',
    'regions',
    'publicationAuthors',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateTermBank = ajv.compile(TERM_BANK_SCHEMA);

const DEFAULT_TERM_BANK_URL = new URL('../../data/term-bank.json', import.meta.url);

let cachedDefault: TermBank | undefined;

/**
 * Validate an arbitrary value as a TermBank.
 * Throws ConfigError listing every mismatch.
 */
export function createTermBank(raw: unknown): TermBank {
  if (!validateTermBank(raw)) {
    throw new ConfigError({
      message: `Invalid term bank: ${ajv.errorsText(validateTermBank.errors)}`,
      errorCode: ErrorCode.INVALID_TERM_BANK,
      context: { setting: 'termBank' },
    });
  }
  return raw;
}

/** Load (once) and validate the bundled term bank. */
export function loadTermBank(): TermBank {
  if (cachedDefault) return cachedDefault;
  const text = readFileSync(DEFAULT_TERM_BANK_URL, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError({
      message: 'Bundled term bank is not valid JSON',
      errorCode: ErrorCode.INVALID_TERM_BANK,
      context: { path: DEFAULT_TERM_BANK_URL.pathname },
      cause: error,
    });
  }
  cachedDefault = createTermBank(parsed);
  return cachedDefault;
}
