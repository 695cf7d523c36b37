import { describe, it, expect } from 'vitest';

import {
  SIZE_LABELS,
  SIZE_TIERS,
  getSizeTier,
  isSizeLabel,
  type SizeLabel,
} from '../size-tiers';
import { ConfigError } from '../../types/errors';
import { ErrorCode } from '../../errors/codes';

describe('size tiers', () => {
  it('lists the supported labels in ascending order', () => {
    expect(SIZE_LABELS).toEqual(['1mb', '5mb', '10mb', '15mb']);
  });

  const expected: Array<[SizeLabel, number, number, number, number]> = [
    ['1mb', 3, 5, 15, 6],
    ['5mb', 6, 7, 40, 12],
    ['10mb', 8, 9, 80, 20],
    ['15mb', 10, 11, 120, 25],
  ];

  it.each(expected)(
    '%s has %i chapters of %i blocks, multiplier %i, ~%i images',
    (label, chapters, blocksPerChapter, base64Multiplier, imageCount) => {
      expect(getSizeTier(label)).toEqual({
        label,
        chapters,
        blocksPerChapter,
        base64Multiplier,
        imageCount,
      });
      expect(getSizeTier(label)).toBe(SIZE_TIERS[label]);
    }
  );

  it('matches labels case-sensitively', () => {
    expect(isSizeLabel('5mb')).toBe(true);
    expect(isSizeLabel('5MB')).toBe(false);
    expect(isSizeLabel('')).toBe(false);
  });

  it('rejects unknown labels with a ConfigError naming the supported sizes', () => {
    let caught: unknown;
    try {
      getSizeTier('2mb');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      message: 'Unsupported size: 2mb. Supported sizes: 1mb, 5mb, 10mb, 15mb',
      errorCode: ErrorCode.UNKNOWN_SIZE_TIER,
      context: { setting: 'size', value: '2mb' },
    });
  });
});
