import type { TextExtractor } from "./types";
import { plainTextExtractor } from "./plainText";
import { pdfExtractor } from "./pdf";
import { docxExtractor } from "./docx";
import { odtExtractor } from "./odt";
import { rtfExtractor } from "./rtf";
import { TextExtractionService } from "./textExtractionService";

export * from "./types";
export * from "./textExtractionService";

export const defaultExtractors: readonly TextExtractor[] = [
  docxExtractor,
  pdfExtractor,
  odtExtractor,
  rtfExtractor,
  plainTextExtractor,
];

export function createTextExtractionService(): TextExtractionService {
  return new TextExtractionService(defaultExtractors);
}
