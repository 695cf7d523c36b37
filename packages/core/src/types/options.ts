/**
 * Generator options and their defaults.
 */

import { createRandomSource, type RandomSource } from '../random/random-source';
import { loadTermBank, type TermBank } from '../vocabulary/term-bank';

export interface GeneratorOptions {
  /** Seed for the default random source; ignored when `random` is given. */
  seed?: number;
  /** Explicit random source (tests inject scripted ones). */
  random?: RandomSource;
  /** Word lists; defaults to the bundled term bank. */
  termBank?: TermBank;
  /** Reference instant for every timestamp; defaults to the current time. */
  now?: Date;
}

export interface ResolvedGeneratorOptions {
  random: RandomSource;
  termBank: TermBank;
  now: Date;
}

/**
 * Fill in defaults. Lazy defaults (term bank file, clock, RNG) are only
 * created when the caller did not supply them.
 */
export function resolveGeneratorOptions(
  options: Partial<GeneratorOptions> = {}
): ResolvedGeneratorOptions {
  return {
    random: options.random ?? createRandomSource(options.seed),
    termBank: options.termBank ?? loadTermBank(),
    now: options.now ?? new Date(),
  };
}
