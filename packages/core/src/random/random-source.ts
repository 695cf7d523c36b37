import { Faker, base } from '@faker-js/faker';

/**
 * Source of randomness used by every builder.
 *
 * Builders never call Math.random directly.
 */
export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** Uniform float between min and max. */
  float(min: number, max: number): number;
  /** Uniformly chosen element; throws on an empty list. */
  pick<T>(items: readonly T[]): T;
  /** `count` distinct elements in random order (sampling without replacement). */
  sample<T>(items: readonly T[], count: number): T[];
}

/**
 * Create a RandomSource backed by a private Faker instance.
 *
 * Each call gets its own instance; seeding never touches the global `faker`
 * export. Only the locale-free `number` and `helpers` modules are used, so the
 * instance carries the `base` definitions alone.
 */
export function createRandomSource(seed?: number): RandomSource {
  const instance = new Faker({ locale: base });
  if (seed !== undefined) {
    instance.seed(seed);
  }

  return {
    int: (min, max) => instance.number.int({ min, max }),
    float: (min, max) => instance.number.float({ min, max }),
    pick: (items) => instance.helpers.arrayElement(items),
    sample: (items, count) =>
      instance.helpers.arrayElements(items, Math.min(count, items.length)),
  };
}
