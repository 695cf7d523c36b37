import {
  PUBLICATION_TYPES,
  TARGET_AUDIENCES,
  type Chapter,
  type Publication,
} from '../types/publication';
import { isoTimestamp, randomText } from '../synth/text';
import { buildChapter } from './chapter';
import { buildMetadata } from './metadata';
import { buildNotes, NOTES_PER_LEVEL } from './notes';
import type { BuildContext } from './context';

export const PUBLICATION_TITLE =
  'Comprehensive Investment Research Report - Large Scale Test Data';
export const PUBLICATION_SUBTITLE =
  'A comprehensive analysis of market trends and investment opportunities with extensive metadata and content blocks';
export const PUBLICATION_SUMMARY_LENGTH = 4000;
export const PUBLICATION_VERSION = '1.0.0';

export interface PublicationShape {
  chapters: number;
  blocksPerChapter: number;
  /** Omit to build blocks without image views. */
  base64Multiplier?: number;
}

export function buildPublication(
  pubId: string,
  shape: PublicationShape,
  ctx: BuildContext
): Publication {
  const { random, termBank, now } = ctx;

  const summary = randomText(
    termBank.terms,
    PUBLICATION_SUMMARY_LENGTH,
    random
  );
  const type = random.pick(PUBLICATION_TYPES);
  const targetAudience = random.pick(TARGET_AUDIENCES);
  const metadata = buildMetadata(ctx);
  const notes = buildNotes('pub', NOTES_PER_LEVEL.publication, ctx);

  const chapters: Chapter[] = [];
  for (let chapterNum = 1; chapterNum <= shape.chapters; chapterNum++) {
    chapters.push(
      buildChapter(
        chapterNum,
        shape.blocksPerChapter,
        ctx,
        shape.base64Multiplier
      )
    );
  }

  return {
    id: pubId,
    title: PUBLICATION_TITLE,
    subtitle: PUBLICATION_SUBTITLE,
    summary,
    type,
    targetAudience,
    status: 'published',
    version: PUBLICATION_VERSION,
    language: 'en',
    authors: [...termBank.publicationAuthors],
    createdAt: isoTimestamp(-120, now),
    updatedAt: isoTimestamp(-1, now),
    publishedAt: isoTimestamp(-1, now),
    metadata,
    notes,
    chapters,
  };
}
