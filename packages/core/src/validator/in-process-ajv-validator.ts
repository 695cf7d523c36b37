import { readFile } from 'node:fs/promises';
import Ajv, { type Schema, type ValidateFunction } from 'ajv';
import Ajv2019 from 'ajv/dist/2019.js';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';

import type { DocumentValidator, ValidationOutcome } from './types';

function isSchema(value: unknown): value is Schema {
  return (
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null && !Array.isArray(value))
  );
}

function dialectOf(schema: Schema): string {
  if (typeof schema === 'boolean') return '';
  const declared: unknown = schema.$schema;
  return typeof declared === 'string' ? declared : '';
}

/**
 * Pick the Ajv class matching the schema's `$schema`; draft-07 otherwise.
 */
function createAjv(schema: Schema): Ajv {
  const dialect = dialectOf(schema);
  const flags = { allErrors: true, strict: false } as const;
  const ajv = dialect.includes('2020-12')
    ? new Ajv2020(flags)
    : dialect.includes('2019-09')
      ? new Ajv2019(flags)
      : new Ajv(flags);
  addFormats(ajv);
  return ajv;
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf8'));
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface CompiledSchema {
  ajv: Ajv;
  validateFn: ValidateFunction;
}

async function compileSchema(
  schemaPath: string
): Promise<CompiledSchema | ValidationOutcome> {
  try {
    const schema = await readJson(schemaPath);
    if (!isSchema(schema)) {
      return {
        status: 'unavailable',
        reason: `${schemaPath} does not contain a JSON Schema object`,
      };
    }
    const ajv = createAjv(schema);
    return { ajv, validateFn: ajv.compile(schema) };
  } catch (error) {
    return {
      status: 'unavailable',
      reason: `Could not compile ${schemaPath}: ${messageOf(error)}`,
    };
  }
}

/**
 * Validates the written file in-process with Ajv and ajv-formats; no
 * external binary needed.
 */
export class InProcessAjvValidator implements DocumentValidator {
  readonly name = 'ajv';

  async validate(
    dataPath: string,
    schemaPath: string
  ): Promise<ValidationOutcome> {
    const compiled = await compileSchema(schemaPath);
    if ('status' in compiled) return compiled;
    const { ajv, validateFn } = compiled;

    let data: unknown;
    try {
      data = await readJson(dataPath);
    } catch (error) {
      return {
        status: 'failed',
        details: `Could not parse ${dataPath}: ${messageOf(error)}`,
      };
    }

    if (validateFn(data)) {
      return { status: 'passed' };
    }
    return {
      status: 'failed',
      details: ajv.errorsText(validateFn.errors, { separator: '\n' }),
    };
  }
}
