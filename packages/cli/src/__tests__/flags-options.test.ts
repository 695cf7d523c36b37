import { describe, it, expect } from 'vitest';
import { ConfigError, ErrorCode } from '@pubgen/core';
import {
  resolveAjvBin,
  resolveOutputPath,
  resolveSeed,
  resolveSizeLabel,
  resolveValidatorKind,
} from '../flags';

describe('CLI flag helpers', () => {
  describe('resolveSizeLabel', () => {
    it('defaults to 1mb when no size is provided', () => {
      expect(resolveSizeLabel(undefined)).toBe('1mb');
      expect(resolveSizeLabel('')).toBe('1mb');
    });

    it('accepts every supported tier', () => {
      expect(resolveSizeLabel('5mb')).toBe('5mb');
      expect(resolveSizeLabel('15mb')).toBe('15mb');
    });

    it('throws ConfigError on unknown tiers', () => {
      expect(() => resolveSizeLabel('2mb')).toThrow(ConfigError);
      expect(() => resolveSizeLabel('5MB')).toThrow(
        /Unsupported size: 5MB\. Supported sizes: 1mb, 5mb, 10mb, 15mb/
      );
    });
  });

  describe('resolveOutputPath', () => {
    it('derives the default file name from the size', () => {
      expect(resolveOutputPath(undefined, '10mb')).toBe(
        'large-publication-10mb.json'
      );
      expect(resolveOutputPath('  ', '1mb')).toBe('large-publication-1mb.json');
    });

    it('keeps an explicit output path', () => {
      expect(resolveOutputPath('out/doc.json', '1mb')).toBe('out/doc.json');
    });
  });

  describe('resolveSeed', () => {
    it('is undefined when no seed is given', () => {
      expect(resolveSeed(undefined)).toBeUndefined();
    });

    it('parses integer strings and numbers', () => {
      expect(resolveSeed('424242')).toBe(424242);
      expect(resolveSeed(7)).toBe(7);
    });

    it('rejects non-integer seeds', () => {
      for (const bad of ['abc', '1.5', '-1']) {
        expect(() => resolveSeed(bad)).toThrow(/Invalid --seed value/);
      }
    });
  });

  describe('resolveValidatorKind', () => {
    it('defaults to the external validator', () => {
      expect(resolveValidatorKind(undefined)).toBe('external');
    });

    it('accepts builtin in any case', () => {
      expect(resolveValidatorKind('BuiltIn')).toBe('builtin');
    });

    it('rejects unknown validators with INVALID_OPTION', () => {
      let caught: unknown;
      try {
        resolveValidatorKind('jsonschema');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({
        errorCode: ErrorCode.INVALID_OPTION,
        context: { setting: 'validator', value: 'jsonschema' },
      });
    });
  });

  describe('resolveAjvBin', () => {
    it('falls back to ajv', () => {
      expect(resolveAjvBin(undefined)).toBe('ajv');
      expect(resolveAjvBin('/opt/bin/ajv')).toBe('/opt/bin/ajv');
    });
  });
});
