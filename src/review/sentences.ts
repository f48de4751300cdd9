export interface TextSegment {
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ParsedSentence extends TextSegment {
  wordCount: number;
}

export interface ParsedParagraph extends TextSegment {
  sentences: ParsedSentence[];
}

const PARAGRAPH_BREAK = /\n\s*\n/g;
const SENTENCE_BREAK = /(?<=[.!?])\s+/g;

/**
 * Splits transcript text into paragraphs (blank-line separated) and sentences
 * (terminated by `.`, `!` or `?` and whitespace). Segments are trimmed, empty
 * ones dropped, and offsets point into the original text.
 */
export function parseParagraphs(text: string): ParsedParagraph[] {
  return splitSegments(text, PARAGRAPH_BREAK, 0)
    .map((paragraph) => ({
      ...paragraph,
      sentences: splitSegments(paragraph.text, SENTENCE_BREAK, paragraph.startOffset).map((sentence) => ({
        ...sentence,
        wordCount: countWords(sentence.text),
      })),
    }))
    .filter((paragraph) => paragraph.sentences.length > 0);
}

export function splitSentences(text: string): ParsedSentence[] {
  return parseParagraphs(text).flatMap((paragraph) => paragraph.sentences);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function splitSegments(text: string, separator: RegExp, baseOffset: number): TextSegment[] {
  const segments: TextSegment[] = [];
  let cursor = 0;

  const push = (start: number, end: number) => {
    const raw = text.slice(start, end);
    const leading = raw.length - raw.trimStart().length;
    const trimmed = raw.trim();
    if (trimmed.length === 0) return;
    const startOffset = baseOffset + start + leading;
    segments.push({ text: trimmed, startOffset, endOffset: startOffset + trimmed.length });
  };

  for (const match of text.matchAll(separator)) {
    if (match.index === undefined) continue;
    push(cursor, match.index);
    cursor = match.index + match[0].length;
  }
  push(cursor, text.length);

  return segments;
}
