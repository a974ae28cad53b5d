import { InvalidConfigurationError } from "./errors";

export interface TextChunk {
  chunkNum: number;
  charStart: number;
  charEnd: number;
  text: string;
}

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 1000, overlap: 200 };

export function assertChunkingOptions(options: ChunkingOptions): void {
  const { chunkSize, overlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`Chunk size must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(`Chunk overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(`Overlap (${overlap}) must be less than chunk size (${chunkSize})`);
  }
}

/**
 * Split text into fixed-size windows where each window after the first starts
 * `overlap` characters before the previous one ended. Offsets index into the
 * text exactly as given; nothing is trimmed, so
 * `text.slice(charStart, charEnd) === chunk.text` always holds.
 *
 * Options are validated eagerly: a bad configuration throws here, not on the
 * first `next()`.
 */
export function chunkText(
  text: string,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): IterableIterator<TextChunk> {
  assertChunkingOptions(options);
  return generateChunks(text, options.chunkSize, options.overlap);
}

function* generateChunks(text: string, chunkSize: number, overlap: number): IterableIterator<TextChunk> {
  if (text.trim().length === 0) return;

  let position = 0;
  let chunkNum = 0;

  while (position < text.length) {
    const end = Math.min(position + chunkSize, text.length);

    yield {
      chunkNum,
      charStart: position,
      charEnd: end,
      text: text.slice(position, end),
    };

    if (end >= text.length) {
      break;
    }
    chunkNum++;
    position = end - overlap;
  }
}

export function estimateTokens(text: string): number {
  // Rough estimate: ~4 characters per token for English
  return Math.ceil(text.length / 4);
}
