/**
 * Text, filler and timestamp synthesis shared by every builder.
 */

import { GenerationError } from '../types/errors';
import type { RandomSource } from '../random/random-source';

export const BASE64_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

/** Characters of base64 filler produced per unit of multiplier. */
export const FILLER_CHARS_PER_UNIT = 1024;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Join uniformly random terms with single spaces until the text reaches
 * `targetLength`, then cut it to exactly that length.
 */
export function randomText(
  terms: readonly string[],
  targetLength: number,
  random: RandomSource
): string {
  if (terms.length === 0) {
    throw new GenerationError({
      message: 'Cannot synthesize text from an empty vocabulary',
      context: { setting: 'terms', value: terms.length },
    });
  }
  if (!Number.isInteger(targetLength) || targetLength < 0) {
    throw new GenerationError({
      message: `Text length must be a non-negative integer, got ${targetLength}`,
      context: { setting: 'targetLength', value: targetLength },
    });
  }

  const words: string[] = [];
  let joinedLength = 0;
  while (joinedLength < targetLength) {
    const term = random.pick(terms);
    joinedLength += words.length === 0 ? term.length : term.length + 1;
    words.push(term);
  }
  return words.join(' ').slice(0, targetLength);
}

/**
 * Deterministic base64-alphabet filler of roughly `multiplier` KiB.
 *
 * The alphabet is tiled to ceil(multiplier * 1024) characters and padded with
 * `=` to a multiple of four. A body one character past a quantum cannot end a
 * base64 string, so it takes one extra character before padding.
 */
export function base64Filler(multiplier: number): string {
  if (!Number.isFinite(multiplier) || multiplier < 0) {
    throw new GenerationError({
      message: `Filler multiplier must be a non-negative number, got ${multiplier}`,
      context: { setting: 'base64Multiplier', value: multiplier },
    });
  }

  const requested = Math.ceil(multiplier * FILLER_CHARS_PER_UNIT);
  const length = requested % 4 === 1 ? requested + 1 : requested;
  const fullTiles = Math.floor(length / BASE64_ALPHABET.length);
  const body =
    BASE64_ALPHABET.repeat(fullTiles) +
    BASE64_ALPHABET.slice(0, length % BASE64_ALPHABET.length);

  return body.padEnd(Math.ceil(body.length / 4) * 4, '=');
}

/**
 * ISO-8601 UTC timestamp `dayOffset` days away from `now`.
 */
export function isoTimestamp(dayOffset: number, now: Date): string {
  return new Date(now.getTime() + dayOffset * MS_PER_DAY).toISOString();
}
