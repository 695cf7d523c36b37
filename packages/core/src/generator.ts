/**
 * Document generation entry points.
 *
 * generateDocument() is the library equivalent of `pubgen --size <label>`
 * without the file output: it resolves the tier, builds one publication and
 * wraps it in the `{ publications: [...] }` envelope.
 */

import { getSizeTier, type SizeTier } from './config/size-tiers';
import { buildPublication } from './builders/publication';
import type { BuildContext } from './builders/context';
import type { PublicationDocument } from './types/publication';
import {
  resolveGeneratorOptions,
  type GeneratorOptions,
} from './types/options';

export function publicationId(tier: SizeTier): string {
  return `large_test_pub_${tier.label}`;
}

export function createBuildContext(
  options: Partial<GeneratorOptions> = {}
): BuildContext {
  const resolved = resolveGeneratorOptions(options);
  return {
    random: resolved.random,
    termBank: resolved.termBank,
    now: resolved.now,
  };
}

/**
 * Build the envelope for a size label. Unknown labels throw ConfigError
 * before anything is generated.
 */
export function generateDocument(
  size: string,
  options: Partial<GeneratorOptions> = {}
): PublicationDocument {
  const tier = getSizeTier(size);
  const ctx = createBuildContext(options);
  const publication = buildPublication(
    publicationId(tier),
    {
      chapters: tier.chapters,
      blocksPerChapter: tier.blocksPerChapter,
      base64Multiplier: tier.base64Multiplier,
    },
    ctx
  );
  return { publications: [publication] };
}
