import {
  BLOCK_TYPES,
  VIEW_KINDS,
  type Block,
  type View,
  type ViewKind,
} from '../types/publication';
import { isoTimestamp, randomText } from '../synth/text';
import { buildMetadata } from './metadata';
import { buildNotes, NOTES_PER_LEVEL } from './notes';
import { buildView } from './view';
import type { BuildContext } from './context';

export const BLOCK_TEXT_LENGTHS = {
  title: 50,
  subtitle: 100,
  summary: 1500,
} as const;

export type ViewCounts = Readonly<Record<ViewKind, number>>;

/**
 * Views per type for one block: 1–2 of each kind, and no images at all when
 * the tier carries no filler.
 */
export function drawViewCounts(
  ctx: BuildContext,
  base64Multiplier?: number
): ViewCounts {
  const { random } = ctx;
  return {
    text: random.int(1, 2),
    image: base64Multiplier ? random.int(1, 2) : 0,
    chart: random.int(1, 2),
    table: random.int(1, 2),
  };
}

export function buildBlock(
  blockId: string,
  titlePrefix: string,
  viewCounts: ViewCounts,
  ctx: BuildContext,
  base64Multiplier?: number
): Block {
  const { random, termBank, now } = ctx;
  const { terms } = termBank;

  const title = `${titlePrefix} - ${randomText(terms, BLOCK_TEXT_LENGTHS.title, random)}`;
  const subtitle = randomText(terms, BLOCK_TEXT_LENGTHS.subtitle, random);
  const summary = randomText(terms, BLOCK_TEXT_LENGTHS.summary, random);
  const metadata = buildMetadata(ctx);
  const notes = buildNotes(`block_${blockId}`, NOTES_PER_LEVEL.block, ctx);
  const createdAt = isoTimestamp(random.int(-60, -30), now);
  const updatedAt = isoTimestamp(random.int(-7, 0), now);
  const authors = numberedAuthors(random.int(1, 3));
  const type = random.pick(BLOCK_TYPES);

  const views: View[] = [];
  let imageIndex = 1;
  for (const kind of VIEW_KINDS) {
    for (let i = 0; i < viewCounts[kind]; i++) {
      if (kind === 'image') {
        // A block asked for images without filler has nothing to embed
        if (!base64Multiplier) continue;
        views.push(buildView({ kind, imageIndex, base64Multiplier }, ctx));
        imageIndex += 1;
      } else {
        views.push(buildView({ kind }, ctx));
      }
    }
  }

  return {
    id: blockId,
    title,
    subtitle,
    summary,
    metadata,
    notes,
    createdAt,
    updatedAt,
    authors,
    language: 'en',
    type,
    views,
  };
}

export function numberedAuthors(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `Author ${i + 1}`);
}
