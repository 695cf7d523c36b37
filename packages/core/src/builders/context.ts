import type { RandomSource } from '../random/random-source';
import type { TermBank } from '../vocabulary/term-bank';

/** Everything a builder reads. */
export interface BuildContext {
  readonly random: RandomSource;
  readonly termBank: TermBank;
  /** Reference instant every timestamp offset is measured from. */
  readonly now: Date;
}

/** Zero-padded decimal index, e.g. `pad(7, 3) === '007'`. */
export function pad(index: number, width: number): string {
  return String(index).padStart(width, '0');
}
