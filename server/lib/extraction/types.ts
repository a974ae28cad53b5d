import type { Readable } from "stream";

export interface TextExtractor {
  /** Label used in logs and collision warnings. */
  readonly name: string;
  /** Extensions handled, case-insensitive, with or without the leading dot. */
  readonly supportedExtensions: readonly string[];
  extractText(stream: Readable, filename: string, signal?: AbortSignal): Promise<string>;
}
