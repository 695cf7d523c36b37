// @pubgen/core entry point
//
// Public API:
// - generateDocument(size, options) builds the `{ publications: [...] }` envelope for a size tier.
// - writeDocument / serializeDocument / formatFileSize handle output.
// - ExternalAjvValidator / InProcessAjvValidator check a written file against a schema.
// - The individual builders and synthesis helpers are exported for callers that need a
//   custom tree shape.

export {
  generateDocument,
  createBuildContext,
  publicationId,
} from './generator';

export * from './types/publication';
export {
  resolveGeneratorOptions,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from './types/options';

// Size tiers
export {
  SIZE_LABELS,
  SIZE_TIERS,
  getSizeTier,
  isSizeLabel,
  type SizeLabel,
  type SizeTier,
} from './config/size-tiers';

// Synthesis
export {
  randomText,
  base64Filler,
  isoTimestamp,
  BASE64_ALPHABET,
  FILLER_CHARS_PER_UNIT,
} from './synth/text';
export { createRandomSource, type RandomSource } from './random/random-source';
export {
  createTermBank,
  loadTermBank,
  type TermBank,
} from './vocabulary/term-bank';

// Builders
export { pad, type BuildContext } from './builders/context';
export { buildMetadata } from './builders/metadata';
export { buildNotes, NOTES_PER_LEVEL, NOTE_TEXT_LENGTH } from './builders/notes';
export {
  buildView,
  REPORT_YEAR,
  TABLE_METRICS,
  type TableMetric,
  type ViewRequest,
} from './builders/view';
export {
  buildBlock,
  drawViewCounts,
  BLOCK_TEXT_LENGTHS,
  type ViewCounts,
} from './builders/block';
export {
  buildChapter,
  chapterId,
  blockId,
  CHAPTER_TEXT_LENGTHS,
} from './builders/chapter';
export {
  buildPublication,
  PUBLICATION_SUMMARY_LENGTH,
  type PublicationShape,
} from './builders/publication';

// Output
export {
  writeDocument,
  serializeDocument,
  formatFileSize,
  type WrittenDocument,
} from './output/writer';

// Validation
export * from './validator/index';

// Errors
export { ErrorCode, EXIT_CODES, getExitCode } from './errors/codes';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter';
export {
  PubgenError,
  ConfigError,
  GenerationError,
  OutputError,
  InternalError,
  isPubgenError,
  type ErrorContext,
} from './types/errors';
