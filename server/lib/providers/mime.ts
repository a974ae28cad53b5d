import { normalizeExtension } from "../extraction/textExtractionService";

const MIME_TYPES: Record<string, string> = {
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".doc": "application/msword",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".xls": "application/vnd.ms-excel",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".ppt": "application/vnd.ms-powerpoint",
  ".odt": "application/vnd.oasis.opendocument.text",
  ".rtf": "application/rtf",
  ".pdf": "application/pdf",
  ".txt": "text/plain",
  ".log": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".csv": "text/csv",
  ".json": "application/json",
  ".xml": "application/xml",
  ".yaml": "application/x-yaml",
  ".yml": "application/x-yaml",
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".sql": "application/sql",
  ".sh": "application/x-sh",
  ".bat": "application/x-bat",
  ".ps1": "application/x-powershell",
  ".js": "application/javascript",
  ".ts": "application/typescript",
};

export function getMimeType(extension: string): string {
  return MIME_TYPES[normalizeExtension(extension)] ?? "application/octet-stream";
}
