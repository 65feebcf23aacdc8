/**
 * Term extraction shared by keyword search and relevance scoring.
 */

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from',
  'has', 'have', 'how', 'in', 'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'their',
  'this', 'to', 'was', 'were', 'what', 'when', 'where', 'which', 'who', 'why', 'with',
]);

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Fold simple plurals so "fens" matches "fen". Words ending in "ss" or "us" are kept.
 */
function normalizeTerm(word: string): string {
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss') && !word.endsWith('us')) {
    return word.slice(0, -1);
  }
  return word;
}

/**
 * Lowercased content terms of a text, in order, stopwords removed.
 */
export function tokenize(text: string): string[] {
  const terms: string[] = [];
  for (const match of text.toLowerCase().matchAll(WORD_PATTERN)) {
    const word = match[0];
    if (STOPWORDS.has(word)) continue;
    terms.push(normalizeTerm(word));
  }
  return terms;
}

export function uniqueTerms(text: string): string[] {
  return [...new Set(tokenize(text))];
}
