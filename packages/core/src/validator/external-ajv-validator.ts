import { spawn } from 'node:child_process';
import path from 'node:path';

import type { DocumentValidator, ValidationOutcome } from './types';

export const DEFAULT_AJV_BIN = 'ajv';

/**
 * Runs ajv-cli as a separate process:
 * `<bin> validate -s <schema> -d <data>`.
 *
 * Waits for the process without a timeout. Exit code 0 means valid; any other
 * exit code is a failure carrying the process's stderr. A binary that cannot
 * be started (ENOENT and friends) yields `unavailable`.
 */
export class ExternalAjvValidator implements DocumentValidator {
  readonly name = 'ajv-cli';

  constructor(private readonly bin: string = DEFAULT_AJV_BIN) {}

  validate(dataPath: string, schemaPath: string): Promise<ValidationOutcome> {
    const args = [
      'validate',
      '-s',
      path.resolve(schemaPath),
      '-d',
      path.resolve(dataPath),
    ];

    return new Promise<ValidationOutcome>((resolve) => {
      let settled = false;
      const settle = (outcome: ValidationOutcome): void => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      const stdout: string[] = [];
      const stderr: string[] = [];
      const child = spawn(this.bin, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => stdout.push(chunk));
      child.stderr.on('data', (chunk: string) => stderr.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        settle({
          status: 'unavailable',
          reason:
            error.code === 'ENOENT'
              ? `${this.bin} not found. Install with: npm install -g ajv-cli`
              : `${this.bin} could not be started: ${error.message}`,
        });
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          settle({ status: 'passed' });
          return;
        }
        const details = stderr.join('').trim() || stdout.join('').trim();
        settle({
          status: 'failed',
          details:
            details ||
            (signal
              ? `${this.bin} terminated by ${signal}`
              : `${this.bin} exited with code ${code}`),
        });
      });
    });
  }
}
