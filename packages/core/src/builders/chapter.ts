import type { Block, Chapter } from '../types/publication';
import { isoTimestamp, randomText } from '../synth/text';
import { buildBlock, drawViewCounts, numberedAuthors } from './block';
import { buildMetadata } from './metadata';
import { buildNotes, NOTES_PER_LEVEL } from './notes';
import { pad, type BuildContext } from './context';

export const CHAPTER_TEXT_LENGTHS = {
  title: 60,
  subtitle: 120,
  summary: 2000,
} as const;

export function chapterId(chapterNum: number): string {
  return `ch_${pad(chapterNum, 3)}`;
}

export function blockId(chapterNum: number, blockNum: number): string {
  return `block_${pad(chapterNum, 3)}_${pad(blockNum, 2)}`;
}

/**
 * Chapter `chapterNum` (1-based) holding `blockCount` blocks. The chapter's
 * `order` is its position, so ids and order always agree.
 */
export function buildChapter(
  chapterNum: number,
  blockCount: number,
  ctx: BuildContext,
  base64Multiplier?: number
): Chapter {
  const { random, termBank, now } = ctx;
  const { terms } = termBank;
  const id = chapterId(chapterNum);

  const title = `Chapter ${chapterNum}: ${randomText(terms, CHAPTER_TEXT_LENGTHS.title, random)}`;
  const subtitle = randomText(terms, CHAPTER_TEXT_LENGTHS.subtitle, random);
  const summary = randomText(terms, CHAPTER_TEXT_LENGTHS.summary, random);
  const metadata = buildMetadata(ctx);
  const notes = buildNotes(id, NOTES_PER_LEVEL.chapter, ctx);
  const createdAt = isoTimestamp(random.int(-90, -60), now);
  const updatedAt = isoTimestamp(random.int(-14, 0), now);
  const authors = numberedAuthors(random.int(2, 4));

  const blocks: Block[] = [];
  for (let blockNum = 1; blockNum <= blockCount; blockNum++) {
    const viewCounts = drawViewCounts(ctx, base64Multiplier);
    blocks.push(
      buildBlock(
        blockId(chapterNum, blockNum),
        `Block ${blockNum}`,
        viewCounts,
        ctx,
        base64Multiplier
      )
    );
  }

  return {
    id,
    title,
    subtitle,
    summary,
    metadata,
    notes,
    createdAt,
    updatedAt,
    authors,
    language: 'en',
    blocks,
    order: chapterNum,
  };
}
