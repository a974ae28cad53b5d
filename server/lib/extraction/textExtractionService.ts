import path from "path";
import type { Readable } from "stream";
import type { TextExtractor } from "./types";
import {
  ExtractionFailedError,
  IndexerError,
  UnsupportedFormatError,
  errorMessage,
  isAbortError,
} from "../errors";
import { createLogger } from "../log";

const logger = createLogger("extraction");

/** `PDF`, `.pdf` and ` .Pdf ` all become `.pdf`. */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/** Line endings folded to `\n`, NUL characters dropped. */
export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\u0000/g, "");
}

/**
 * Dispatches extraction by file extension. The extension map is built once;
 * when two extractors claim the same extension the one registered first keeps
 * it.
 */
export class TextExtractionService {
  private readonly byExtension: ReadonlyMap<string, TextExtractor>;

  constructor(extractors: readonly TextExtractor[]) {
    const map = new Map<string, TextExtractor>();
    for (const extractor of extractors) {
      for (const raw of extractor.supportedExtensions) {
        const extension = normalizeExtension(raw);
        const existing = map.get(extension);
        if (existing) {
          logger.warn(
            `Extension ${extension} already registered to ${existing.name}, ignoring ${extractor.name}`,
          );
          continue;
        }
        map.set(extension, extractor);
      }
    }
    this.byExtension = map;
    logger.debug(`Text extraction initialized with ${extractors.length} extractor(s) covering ${map.size} extensions`);
  }

  getExtractor(filename: string): TextExtractor | undefined {
    const extension = path.extname(filename);
    if (!extension) return undefined;
    return this.byExtension.get(normalizeExtension(extension));
  }

  isSupported(filename: string): boolean {
    return this.getExtractor(filename) !== undefined;
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.byExtension.keys()).sort();
  }

  async extract(stream: Readable, filename: string, signal?: AbortSignal): Promise<string> {
    const extractor = this.getExtractor(filename);
    if (!extractor) {
      stream.destroy();
      const extension = path.extname(filename);
      throw new UnsupportedFormatError(
        extension ? `Unsupported file type: ${extension} (${filename})` : `File has no extension: ${filename}`,
      );
    }

    try {
      const text = await extractor.extractText(stream, filename, signal);
      return normalizeText(text);
    } catch (error) {
      if (isAbortError(error, signal) || error instanceof IndexerError) throw error;
      throw new ExtractionFailedError(
        `Failed to extract text from ${filename} with ${extractor.name}: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      stream.destroy();
    }
  }
}
