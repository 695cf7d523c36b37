import { NOTE_ROLES, NOTE_STATUSES, type Note } from '../types/publication';
import { isoTimestamp, randomText } from '../synth/text';
import { pad, type BuildContext } from './context';

export const NOTE_TEXT_LENGTH = 200;

/** Notes attached at each level of the tree. */
export const NOTES_PER_LEVEL = {
  publication: 5,
  chapter: 3,
  block: 2,
} as const;

/**
 * `count` notes identified as `note_{level}_{001..}`, each stamped within the
 * last 30 days.
 */
export function buildNotes(
  level: string,
  count: number,
  ctx: BuildContext
): Note[] {
  const { random, termBank, now } = ctx;
  const notes: Note[] = [];
  for (let i = 1; i <= count; i++) {
    notes.push({
      id: `note_${level}_${pad(i, 3)}`,
      author: `Author ${random.int(1, 5)}`,
      role: random.pick(NOTE_ROLES),
      timestamp: isoTimestamp(random.int(-30, 0), now),
      status: random.pick(NOTE_STATUSES),
      text: randomText(termBank.terms, NOTE_TEXT_LENGTH, random),
    });
  }
  return notes;
}
