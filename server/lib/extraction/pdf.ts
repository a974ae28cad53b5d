import type { Readable } from "stream";
import { PDFParse } from "pdf-parse";
import type { TextExtractor } from "./types";
import { readStreamToBuffer } from "./stream";
import { throwIfAborted } from "../errors";

export const pdfExtractor: TextExtractor = {
  name: "pdf",
  supportedExtensions: [".pdf"],

  async extractText(stream: Readable, _filename: string, signal?: AbortSignal): Promise<string> {
    const data = await readStreamToBuffer(stream, signal);
    if (data.length === 0) return "";

    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      const pages: string[] = [];
      for (const page of result.pages) {
        throwIfAborted(signal);
        const text = page.text.trim();
        if (text) pages.push(text);
      }
      return pages.join("\n\n");
    } finally {
      await parser.destroy();
    }
  },
};
