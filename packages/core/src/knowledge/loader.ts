/**
 * Document loading
 *
 * Reads PDF, plain-text and markdown files from a directory into pages.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join, relative, sep } from 'node:path';
import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ConfigurationError } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../services/utils.js';
import type { SourcePage } from './types.js';

const log = getLog('DocumentLoader');

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.markdown'] as const;

export interface LoadOptions {
  /** Descend into subdirectories (default false) */
  recursive?: boolean;
}

function isSupported(fileName: string): boolean {
  const ext = extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Split a text file into pages on form feeds. Blank pages are dropped but
 * keep their numbers.
 */
export function splitPages(source: string, text: string): SourcePage[] {
  return text
    .split('\f')
    .map((pageText, i) => ({ source, page: i + 1, text: pageText.trim() }))
    .filter((page) => page.text.length > 0);
}

/**
 * Extract one page of text per PDF page.
 */
export async function extractPdfPages(source: string, data: Uint8Array): Promise<SourcePage[]> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const pdf = await pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;

  const pages: SourcePage[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str + (item.hasEOL ? '\n' : ' ');
      }
      const trimmed = text.trim();
      if (trimmed) pages.push({ source, page: pageNum, text: trimmed });
    }
  } finally {
    await pdf.destroy();
  }
  return pages;
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) files.push(...(await listFiles(fullPath, true)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Load every supported file under `dir`. Sources are named by their path
 * relative to `dir`, with forward slashes.
 *
 * A missing directory yields no pages; any other directory error is returned.
 */
export async function loadDocuments(
  dir: string,
  options: LoadOptions = {}
): Promise<Result<SourcePage[], ConfigurationError>> {
  let files: string[];
  try {
    files = await listFiles(dir, options.recursive ?? false);
  } catch (error) {
    if (isMissing(error)) {
      log.warn(`Documents directory not found: ${dir}`);
      return ok([]);
    }
    return err(
      new ConfigurationError(`Cannot read documents directory ${dir}: ${getErrorMessage(error)}`, 'Set DOCUMENTS_DIR to a readable directory.', { cause: error })
    );
  }

  const pages: SourcePage[] = [];
  for (const file of files) {
    const source = relative(dir, file).split(sep).join('/');
    if (!isSupported(file)) {
      log.debug(`Skipping unsupported file ${source}`);
      continue;
    }

    try {
      const filePages =
        extname(file).toLowerCase() === '.pdf'
          ? await extractPdfPages(source, new Uint8Array(await readFile(file)))
          : splitPages(source, await readFile(file, 'utf-8'));
      if (filePages.length === 0) {
        log.warn(`No text extracted from ${source}`);
      }
      pages.push(...filePages);
    } catch (error) {
      log.error(`Failed to load ${source}`, { error: getErrorMessage(error) });
    }
  }

  log.info(`Loaded ${pages.length} pages from ${files.length} files`, { dir });
  return ok(pages);
}
