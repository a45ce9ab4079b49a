import { ChunkBoundary, ChunkRecord } from '../types.js';

const SENTENCE_PATTERN = /[^.!?。！？]*[.!?。！？]+|[^.!?。！？]+$/g;
const FULL_WIDTH_END = /[。！？]$/;

/** Sentences of a single line, each keeping its terminal punctuation. */
export function splitSentences(line: string): string[] {
  return (line.match(SENTENCE_PATTERN) ?? [])
    .map(sentence => sentence.trim())
    .filter(Boolean);
}

/** Joins two sentences with a space, or directly after full-width punctuation. */
export function joinSentences(left: string, right: string): string {
  if (!left) return right;
  return FULL_WIDTH_END.test(left) ? `${left}${right}` : `${left} ${right}`;
}

/** Attaches `right` to `left` the way the boundary between them was found in the source. */
export function joinAt(left: string, right: string, boundary: ChunkBoundary): string {
  if (!left) return right;
  switch (boundary) {
    case 'line':
      return `${left}\n${right}`;
    case 'sentence':
      return joinSentences(left, right);
    case 'word':
      return `${left} ${right}`;
    case 'split':
      return `${left}${right}`;
  }
}

interface Piece {
  text: string;
  boundary: ChunkBoundary;
}

/** Cuts an oversized sentence at the last whitespace within the budget, else hard at it. */
function cutSentence(sentence: string, maxChars: number, boundary: ChunkBoundary): Piece[] {
  const pieces: Piece[] = [];
  let rest = sentence;
  let next = boundary;

  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars + 1);
    const lastSpace = Math.max(window.lastIndexOf(' '), window.lastIndexOf('\t'));
    const cut = lastSpace > 0 ? lastSpace : maxChars;
    const part = rest.slice(0, cut).trim();
    if (part) {
      pieces.push({ text: part, boundary: next });
      next = lastSpace > 0 ? 'word' : 'split';
    }
    rest = rest.slice(cut).trim();
  }

  if (rest) pieces.push({ text: rest, boundary: next });
  return pieces;
}

export interface TextChunk {
  text: string;
  /** How the chunk attaches to the previous one when reassembled */
  boundary: ChunkBoundary;
}

/**
 * Splits text into chunks of at most `maxChars` characters along sentence
 * boundaries, joining pieces inside a chunk with `joinAt`. Each chunk keeps
 * the boundary it opened on, so a line split across chunks is put back on
 * one line by `reassembleChunks`. Blank lines are dropped.
 */
export function chunkText(text: string, maxChars: number): TextChunk[] {
  if (!text.trim()) return [];
  if (text.length <= maxChars) return [{ text, boundary: 'line' }];

  const pieces: Piece[] = [];
  for (const line of text.split('\n')) {
    splitSentences(line).forEach((sentence, i) => {
      const boundary: ChunkBoundary = i === 0 ? 'line' : 'sentence';
      pieces.push(...cutSentence(sentence, maxChars, boundary));
    });
  }

  const chunks: TextChunk[] = [];
  let current: TextChunk | undefined;

  for (const piece of pieces) {
    if (!current) {
      current = { text: piece.text, boundary: piece.boundary };
      continue;
    }

    const candidate = joinAt(current.text, piece.text, piece.boundary);
    if (candidate.length > maxChars) {
      chunks.push(current);
      current = { text: piece.text, boundary: piece.boundary };
    } else {
      current.text = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

export function splitIntoChunks(text: string, maxChars: number): string[] {
  return chunkText(text, maxChars).map(chunk => chunk.text);
}

type ReassemblyInput = Pick<ChunkRecord, 'index' | 'translatedText' | 'sourceText' | 'boundary'>;

/**
 * Translated chunk texts in index order, each attached at its recorded
 * boundary. Chunks without one start a new line.
 */
export function reassembleChunks(chunks: ReadonlyArray<ReassemblyInput>): string {
  return [...chunks]
    .sort((a, b) => a.index - b.index)
    .reduce((text, chunk) => joinAt(text, chunk.translatedText ?? chunk.sourceText, chunk.boundary ?? 'line'), '');
}
