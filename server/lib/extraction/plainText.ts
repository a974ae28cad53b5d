import type { Readable } from "stream";
import type { TextExtractor } from "./types";
import { readStreamToBuffer } from "./stream";

export const PLAIN_TEXT_EXTENSIONS = [
  ".txt", ".md", ".markdown", ".csv", ".log", ".json", ".xml", ".yaml", ".yml",
  ".html", ".htm", ".css", ".js", ".ts", ".sql", ".sh", ".bat", ".ps1",
] as const;

export const plainTextExtractor: TextExtractor = {
  name: "plain-text",
  supportedExtensions: PLAIN_TEXT_EXTENSIONS,

  async extractText(stream: Readable, _filename: string, signal?: AbortSignal): Promise<string> {
    const buffer = await readStreamToBuffer(stream, signal);
    const text = buffer.toString("utf8");
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  },
};
