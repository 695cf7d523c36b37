import type { BuildContext } from '../builders/context';
import type { RandomSource } from '../random/random-source';
import type { TermBank } from '../vocabulary/term-bank';

export const FIXED_NOW = new Date('2024-06-15T12:00:00.000Z');

/**
 * RandomSource that always lands on one edge of every range: the lower bound
 * and first element for 'min', the upper bound and last element for 'max'.
 */
export function boundaryRandom(edge: 'min' | 'max'): RandomSource {
  const choose = <T>(items: readonly T[]): T => {
    const item = edge === 'min' ? items[0] : items[items.length - 1];
    if (item === undefined) throw new Error('cannot pick from an empty list');
    return item;
  };
  return {
    int: (min, max) => (edge === 'min' ? min : max),
    float: (min, max) => (edge === 'min' ? min : max),
    pick: choose,
    sample: (items, count) => items.slice(0, Math.min(count, items.length)),
  };
}

export function createTestTermBank(overrides: Partial<TermBank> = {}): TermBank {
  return {
    terms: ['alpha', 'beta'],
    tags: ['equity', 'credit', 'macro'],
    assetClasses: ['Equities', 'Bonds'],
    companies: ['Acme Corp'],
    instruments: ['Futures'],
    sectors: ['Technology'],
    regions: ['Europe'],
    publicationAuthors: ['Test Author One', 'Test Author Two'],
    ...overrides,
  };
}

export function createTestContext(
  edge: 'min' | 'max' = 'min',
  termBank: TermBank = createTestTermBank()
): BuildContext {
  return { random: boundaryRandom(edge), termBank, now: FIXED_NOW };
}
