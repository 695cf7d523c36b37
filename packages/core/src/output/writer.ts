import { mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { OutputError } from '../types/errors';
import { ErrorCode } from '../errors/codes';
import type { PublicationDocument } from '../types/publication';

export interface WrittenDocument {
  /** Absolute path of the written file. */
  path: string;
  /** Size on disk in bytes. */
  bytes: number;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * 2-space indented JSON with a trailing newline. Non-ASCII characters are
 * written as-is (JSON.stringify never escapes them).
 */
export function serializeDocument(document: PublicationDocument): string {
  try {
    return `${JSON.stringify(document, null, 2)}\n`;
  } catch (error) {
    throw new OutputError({
      message: 'Failed to serialize document',
      errorCode: ErrorCode.SERIALIZATION_FAILED,
      cause: error,
    });
  }
}

/**
 * Serialize and write `document` to `outputPath`, creating parent
 * directories as needed. Any failure aborts with an OutputError; nothing is
 * retried.
 */
export async function writeDocument(
  outputPath: string,
  document: PublicationDocument
): Promise<WrittenDocument> {
  const absolute = path.resolve(outputPath);
  const content = serializeDocument(document);

  try {
    await mkdir(path.dirname(absolute), { recursive: true });
    await writeFile(absolute, content, 'utf8');
    const { size } = await stat(absolute);
    return { path: absolute, bytes: size };
  } catch (error) {
    throw new OutputError({
      message: `Failed to write ${outputPath}`,
      context: {
        path: absolute,
        suggestion: 'Check that the output directory is writable',
      },
      cause: error,
    });
  }
}

export function formatFileSize(bytes: number): string {
  return `${(bytes / BYTES_PER_MB).toFixed(2)} MB`;
}
