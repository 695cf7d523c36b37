import { ConfigError } from '../types/errors';
import { ErrorCode } from '../errors/codes';

export const SIZE_LABELS = ['1mb', '5mb', '10mb', '15mb'] as const;
export type SizeLabel = (typeof SIZE_LABELS)[number];

export interface SizeTier {
  readonly label: SizeLabel;
  readonly chapters: number;
  readonly blocksPerChapter: number;
  /** Filler per image, in units of 1024 base64 characters. */
  readonly base64Multiplier: number;
  /** Expected image count, for display only; the builders never enforce it. */
  readonly imageCount: number;
}

export const SIZE_TIERS: Readonly<Record<SizeLabel, SizeTier>> = {
  '1mb': {
    label: '1mb',
    chapters: 3,
    blocksPerChapter: 5,
    base64Multiplier: 15,
    imageCount: 6,
  },
  '5mb': {
    label: '5mb',
    chapters: 6,
    blocksPerChapter: 7,
    base64Multiplier: 40,
    imageCount: 12,
  },
  '10mb': {
    label: '10mb',
    chapters: 8,
    blocksPerChapter: 9,
    base64Multiplier: 80,
    imageCount: 20,
  },
  '15mb': {
    label: '15mb',
    chapters: 10,
    blocksPerChapter: 11,
    base64Multiplier: 120,
    imageCount: 25,
  },
};

export function isSizeLabel(value: string): value is SizeLabel {
  return SIZE_LABELS.some((label) => label === value);
}

/**
 * Look up a tier by label. Unknown labels are a configuration error, never a
 * silent fallback to the default tier.
 */
export function getSizeTier(label: string): SizeTier {
  if (!isSizeLabel(label)) {
    throw new ConfigError({
      message: `Unsupported size: ${label}. Supported sizes: ${SIZE_LABELS.join(', ')}`,
      errorCode: ErrorCode.UNKNOWN_SIZE_TIER,
      context: {
        setting: 'size',
        value: label,
        suggestion: `Use one of: ${SIZE_LABELS.join(', ')}`,
      },
    });
  }
  return SIZE_TIERS[label];
}
