export const WHITESPACE_RE = /\s/u;

export interface SourceCodepoint {
  ch: string;
  offset: number;
}

export function normalizeNfd(text: string): string {
  return text.normalize("NFD");
}

export function normalizeNfc(text: string): string {
  return text.normalize("NFC");
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE_RE.test(ch);
}

/**
 * Decomposed codepoints of `text`, each tagged with the UTF-16 offset of the
 * source character it came from, so precomposed input still reports offsets
 * into the caller's string.
 */
export function decomposeWithOffsets(text: string): SourceCodepoint[] {
  const out: SourceCodepoint[] = [];
  let offset = 0;
  for (const source of text) {
    for (const ch of normalizeNfd(source)) {
      out.push({ ch, offset });
    }
    offset += source.length;
  }
  return out;
}

export interface WordSpan {
  text: string;
  offset: number;
}

export function tokenizeWords(text: string): WordSpan[] {
  const words: WordSpan[] = [];
  const re = /\S+/gu;
  for (let match = re.exec(text); match !== null; match = re.exec(text)) {
    words.push({ text: match[0], offset: match.index });
  }
  return words;
}
