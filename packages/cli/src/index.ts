#!/usr/bin/env node

// CLI entry point
// - Command name: `pubgen`, a single command.
// - Options: --size, --output, --schema, --validate, --validator, --ajv-bin, --seed.
// - Flag values are resolved in ./flags (ConfigError on bad input) and handed to
//   runGenerate, which prints progress to stdout and warnings to stderr.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  isPubgenError,
  SIZE_LABELS,
  type PubgenError,
} from '@pubgen/core';
import { renderCLIView } from './render';
import {
  DEFAULT_SCHEMA_PATH,
  DEFAULT_SIZE,
  resolveAjvBin,
  resolveSeed,
  resolveSizeLabel,
  resolveValidatorKind,
  type CliOptions,
} from './flags';
import { runGenerate } from './commands/generate';

const program = new Command();

program
  .name('pubgen')
  .description('Generate large investment publication JSON documents')
  .version('0.1.0')
  .option(
    '--size <size>',
    `Size tier: ${SIZE_LABELS.join('|')}`,
    DEFAULT_SIZE
  )
  .option(
    '-o, --output <file>',
    'Output file (default: large-publication-{size}.json)'
  )
  .option('--schema <file>', 'JSON Schema used by --validate', DEFAULT_SCHEMA_PATH)
  .option('--validate', 'Validate the generated file against --schema', false)
  .option(
    '--validator <kind>',
    'Validator: external (ajv-cli) | builtin (in-process Ajv)',
    'external'
  )
  .option('--ajv-bin <path>', 'Executable used by the external validator')
  .option('--seed <number>', 'Seed for reproducible output')
  .action(async (options: CliOptions) => {
    const size = resolveSizeLabel(options.size);
    await runGenerate({
      size,
      output: options.output,
      schema: options.schema ?? DEFAULT_SCHEMA_PATH,
      validate: options.validate === true,
      validator: resolveValidatorKind(options.validator),
      ajvBin: resolveAjvBin(options.ajvBin),
      seed: resolveSeed(options.seed),
      cwd: process.cwd(),
    });
  });

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PubgenError;
  if (isPubgenError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(message || 'Unexpected error', err);
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
