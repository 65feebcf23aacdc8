/**
 * Page chunking
 *
 * Splits page text into overlapping chunks for retrieval.
 * Split hierarchy: paragraph → sentence → word → hard split.
 */

import { CHUNK_MAX_CHARS, CHUNK_MIN_CHARS, CHUNK_OVERLAP_CHARS } from '../config/defaults.js';
import type { ContentType, DocumentChunk, SourcePage } from './types.js';

export interface ChunkOptions {
  maxChars?: number;
  overlapChars?: number;
  /** Break points closer than this to the chunk start are ignored */
  minChars?: number;
}

const TABLE_ROW = /^\s*\|.*\|\s*$/;

/**
 * A chunk is a table when most of its non-empty lines are pipe-table rows.
 */
export function detectContentType(text: string): ContentType {
  const lines = text.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) return 'text';
  const rows = lines.filter((line) => TABLE_ROW.test(line)).length;
  return rows * 2 > lines.length ? 'table' : 'text';
}

/**
 * Split text into chunks of at most `maxChars`, each overlapping the previous
 * one by about `overlapChars`.
 */
export function splitText(text: string, options: ChunkOptions = {}): string[] {
  const maxChars = options.maxChars ?? CHUNK_MAX_CHARS;
  const overlap = Math.min(options.overlapChars ?? CHUNK_OVERLAP_CHARS, Math.floor(maxChars / 2));
  const minChars = Math.min(options.minChars ?? CHUNK_MIN_CHARS, Math.floor(maxChars / 2));

  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  if (trimmed.length <= maxChars) return [trimmed];

  const chunks: string[] = [];
  let start = 0;
  while (start < trimmed.length) {
    let end = Math.min(start + maxChars, trimmed.length);

    if (end < trimmed.length) {
      end = findBreak(trimmed, start, end, minChars);
    }

    const chunk = trimmed.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= trimmed.length) break;

    let next = end - overlap;
    if (next <= start) next = end;
    // Start the overlap on a word boundary.
    const space = trimmed.indexOf(' ', next);
    if (next !== end && space !== -1 && space < end) next = space + 1;
    start = next;
  }
  return chunks;
}

function findBreak(text: string, start: number, end: number, minChars: number): number {
  const floor = start + minChars;

  const paragraph = text.lastIndexOf('\n\n', end);
  if (paragraph > floor) return paragraph;

  const sentence = Math.max(text.lastIndexOf('. ', end - 1), text.lastIndexOf('.\n', end - 1));
  if (sentence > floor) return sentence + 1;

  const word = text.lastIndexOf(' ', end);
  if (word > floor) return word;

  return end;
}

/**
 * Chunk every page, tagging chunks with source, page and content type.
 */
export function chunkPages(pages: readonly SourcePage[], options: ChunkOptions = {}): DocumentChunk[] {
  const chunks: DocumentChunk[] = [];
  for (const page of pages) {
    splitText(page.text, options).forEach((content, chunkIndex) => {
      chunks.push({
        id: `${page.source}#p${page.page}-${chunkIndex}`,
        content,
        metadata: {
          source: page.source,
          page: page.page,
          type: detectContentType(content),
          chunkIndex,
        },
      });
    });
  }
  return chunks;
}
