import type { ChunkResult, ChunkingConfig } from "@docsage/types";
import { ValidationError } from "@docsage/errors";
import type { IChunker } from "./chunker.interface.js";

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Split text after `.`, `!` or `?` followed by whitespace. A trailing
 * fragment without terminal punctuation is kept as the last sentence.
 */
export function splitSentences(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(SENTENCE_BOUNDARY).filter((s) => s.length > 0);
}

/**
 * Sentence-window chunker.
 *
 * Sentences are packed greedily until the next one would push the chunk's
 * summed sentence length past `maxChars`. Each new chunk opens with the
 * trailing sentences of the one before it, up to `overlapChars`, and always
 * at least one of them. A sentence is never split.
 *
 * Lengths are sums of sentence lengths; the single spaces that join
 * sentences are not counted. The sentence appended right after the overlap
 * window is not re-checked, so a chunk can pass `maxChars` when the carried
 * window plus that sentence is larger, or when one sentence alone is.
 */
export class SentenceChunker implements IChunker {
  readonly strategy = "sentence";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateConfig(config);
    const { maxChars, overlapChars } = config;
    const sentences = splitSentences(content);
    const results: ChunkResult[] = [];

    // Chunks are tracked as sentence indices; text is only joined on close.
    let current: number[] = [];
    let currentLength = 0;
    let carried = 0;

    for (const [i, sentence] of sentences.entries()) {
      if (current.length > 0 && currentLength + sentence.length > maxChars) {
        results.push(this.buildChunk(sentences, current, carried, results.length));

        current = overlapWindow(sentences, current, overlapChars);
        carried = current.length;
        currentLength = summedLength(sentences, current);
      }

      current.push(i);
      currentLength += sentence.length;
    }

    if (current.length > 0) {
      results.push(this.buildChunk(sentences, current, carried, results.length));
    }

    return results;
  }

  private buildChunk(
    sentences: string[],
    indices: number[],
    carried: number,
    index: number,
  ): ChunkResult {
    const text = indices.map((i) => sentences[i]).join(" ");
    return {
      content: text,
      index,
      charCount: text.length,
      metadata: {
        firstSentence: indices[0] ?? 0,
        lastSentence: indices[indices.length - 1] ?? 0,
        overlapSentences: carried,
      },
    };
  }
}

/**
 * Trailing sentences of a closed chunk whose summed length fits the overlap
 * budget, in original order. Never empty for a non-empty chunk.
 */
function overlapWindow(sentences: string[], closed: number[], overlapChars: number): number[] {
  const window: number[] = [];
  let length = 0;

  for (const i of [...closed].reverse()) {
    const sentenceLength = sentences[i]?.length ?? 0;
    if (window.length > 0 && length + sentenceLength > overlapChars) break;
    window.unshift(i);
    length += sentenceLength;
  }

  return window;
}

function summedLength(sentences: string[], indices: number[]): number {
  let length = 0;
  for (const i of indices) {
    length += sentences[i]?.length ?? 0;
  }
  return length;
}

function validateConfig({ maxChars, overlapChars }: ChunkingConfig): void {
  const fields: Record<string, string> = {};
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    fields["maxChars"] = "must be a positive integer";
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0) {
    fields["overlapChars"] = "must be a non-negative integer";
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunking configuration", fields);
  }
}
