import type { Readable } from "stream";
import mammoth from "mammoth";
import type { TextExtractor } from "./types";
import { readStreamToBuffer } from "./stream";

export const docxExtractor: TextExtractor = {
  name: "docx",
  supportedExtensions: [".docx"],

  async extractText(stream: Readable, _filename: string, signal?: AbortSignal): Promise<string> {
    const buffer = await readStreamToBuffer(stream, signal);
    if (buffer.length === 0) return "";

    const result = await mammoth.extractRawText({ buffer });
    // mammoth ends every paragraph with a blank line
    return result.value.replace(/\n{3,}/g, "\n\n").trim();
  },
};
