import { PromptTooLargeError } from '../domain/errors';
import { estimateRequestTokens, estimateTokens, maxCharsForTokens } from './tokens';

export const DEFAULT_TURN_MARKER = 'Human:';

// Coarsest first: paragraphs, sentences, words.
const SPLIT_PATTERNS: RegExp[] = [/\r?\n[ \t\r]*\n\s*/g, /[.!?]+["')\]]*\s+/g, /\s+/g];

export interface Chunk {
  position: number;
  total: number;
  source: string;
  prompt: string;
  estimatedTokens: number;
}

export interface ChunkPlan {
  preamble: string;
  chunks: Chunk[];
}

export interface ChunkSplitterOptions {
  maxTokensPerCall: number;
  turnMarker?: string;
}

export class ChunkSplitter {
  private readonly maxTokensPerCall: number;
  private readonly turnMarker: string;

  constructor(options: ChunkSplitterOptions) {
    if (!Number.isInteger(options.maxTokensPerCall) || options.maxTokensPerCall <= 0) {
      throw new Error('maxTokensPerCall must be a positive integer');
    }
    this.maxTokensPerCall = options.maxTokensPerCall;
    this.turnMarker = options.turnMarker ?? DEFAULT_TURN_MARKER;
  }

  plan(prompt: string, maxOutputTokens: number): ChunkPlan {
    const estimated = estimateRequestTokens(prompt, maxOutputTokens);
    if (estimated <= this.maxTokensPerCall) {
      return {
        preamble: '',
        chunks: [{ position: 1, total: 1, source: prompt, prompt, estimatedTokens: estimated }]
      };
    }

    const markerIndex = this.turnMarker ? prompt.indexOf(this.turnMarker) : -1;
    const preamble = markerIndex >= 0 ? prompt.slice(0, markerIndex).trim() : '';
    const source = markerIndex >= 0 ? prompt.slice(markerIndex) : prompt;
    const maxPromptChars = maxCharsForTokens(this.maxTokensPerCall - maxOutputTokens);

    let digits = 1;
    for (;;) {
      const widest = 10 ** digits - 1;
      const overhead = buildChunkPrompt(preamble, annotation(widest, widest), '').length + 2;
      const budget = maxPromptChars - overhead;
      if (budget < 1) {
        throw new PromptTooLargeError(
          estimateTokens(preamble) + maxOutputTokens,
          this.maxTokensPerCall
        );
      }

      const sources = splitText(source, budget);
      if (String(sources.length).length > digits) {
        digits += 1;
        continue;
      }

      const total = sources.length;
      return {
        preamble,
        chunks: sources.map((text, idx) => {
          const chunkPrompt = buildChunkPrompt(
            preamble,
            total > 1 ? annotation(idx + 1, total) : '',
            text
          );
          return {
            position: idx + 1,
            total,
            source: text,
            prompt: chunkPrompt,
            estimatedTokens: estimateRequestTokens(chunkPrompt, maxOutputTokens)
          };
        })
      };
    }
  }
}

/**
 * Partitions `text` into ordered pieces of at most `maxChars` characters,
 * falling back from paragraph to sentence to word boundaries. Separators stay
 * with the piece they end, so the pieces concatenate back to `text`. A single
 * word longer than `maxChars` is kept whole and exceeds the budget.
 */
export function splitText(text: string, maxChars: number): string[] {
  if (!Number.isFinite(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be at least 1, got ${maxChars}`);
  }
  if (text.length <= maxChars) {
    return [text];
  }

  return pack(fragment(text, maxChars, 0), maxChars);
}

function annotation(position: number, total: number): string {
  return `This is part ${position} of ${total} of a larger document.`;
}

function buildChunkPrompt(preamble: string, note: string, source: string): string {
  return [preamble, note, source].filter(part => part.length > 0).join('\n\n');
}

function fragment(text: string, maxChars: number, level: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }
  const pattern = SPLIT_PATTERNS[level];
  if (!pattern) {
    return splitWord(text, maxChars);
  }
  return splitKeepingSeparators(text, pattern).flatMap(piece =>
    fragment(piece, maxChars, level + 1)
  );
}

function splitKeepingSeparators(text: string, pattern: RegExp): string[] {
  const pieces: string[] = [];
  let start = 0;

  for (const match of text.matchAll(pattern)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > start) {
      pieces.push(text.slice(start, end));
      start = end;
    }
  }
  if (start < text.length) {
    pieces.push(text.slice(start));
  }

  return pieces;
}

// A word with its trailing whitespace; only the whitespace may be cut.
function splitWord(text: string, maxChars: number): string[] {
  const word = /^\S*/.exec(text)?.[0] ?? '';
  const pieces = word ? [word] : [];
  for (let offset = word.length; offset < text.length; offset += maxChars) {
    pieces.push(text.slice(offset, offset + maxChars));
  }
  return pieces;
}

function pack(pieces: string[], maxChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const piece of pieces) {
    if (current && current.length + piece.length > maxChars) {
      chunks.push(current);
      current = '';
    }
    current += piece;
  }
  if (current) {
    chunks.push(current);
  }

  return chunks;
}
