import type { Readable } from "stream";
import type { TextExtractor } from "./types";
import { readStreamToBuffer } from "./stream";
import { ExtractionFailedError, throwIfAborted } from "../errors";

// Destinations whose content is never body text
const IGNORED_DESTINATIONS = new Set([
  "fonttbl", "colortbl", "stylesheet", "info", "pict", "object", "header", "footer",
  "headerl", "headerr", "footerl", "footerr", "footnote", "listtable", "listoverridetable",
  "rsidtbl", "generator", "xmlnstbl", "themedata", "colorschememapping", "latentstyles",
  "datastore", "fldinst", "bkmkstart", "bkmkend", "field",
]);

const CONTROL_WORD = /^\\([a-z]{1,32})(-?\d{1,10})? ?/;

// Windows-1252 for 0x80-0x9F, where it departs from Latin-1. Unassigned bytes keep their value.
const CP1252_HIGH = [
  0x20ac, 0x81, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021,
  0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0x8d, 0x017d, 0x8f,
  0x90, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014,
  0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x9d, 0x017e, 0x0178,
];

function decodeWindows1252(byte: number): string {
  return String.fromCharCode(byte >= 0x80 && byte <= 0x9f ? CP1252_HIGH[byte - 0x80] : byte);
}

interface GroupState {
  ignore: boolean;
  unicodeSkip: number;
}

/**
 * Convert RTF markup to plain text. Paragraph and line marks become newlines,
 * `\'hh` escapes and raw 8-bit bytes are read as Windows-1252 and `\uN`
 * escapes as UTF-16 code units.
 */
export function rtfToText(rtf: string, signal?: AbortSignal): string {
  if (!rtf.trimStart().startsWith("{\\rtf")) {
    throw new ExtractionFailedError("Input is not an RTF document");
  }

  const stack: GroupState[] = [];
  let state: GroupState = { ignore: false, unicodeSkip: 1 };
  let pendingSkip = 0;
  let out = "";
  let i = 0;
  let steps = 0;

  const emit = (text: string) => {
    if (pendingSkip > 0) {
      pendingSkip--;
      return;
    }
    if (!state.ignore) out += text;
  };

  while (i < rtf.length) {
    if (++steps % 4096 === 0) throwIfAborted(signal);
    const ch = rtf[i];

    if (ch === "{") {
      stack.push(state);
      state = { ...state };
      pendingSkip = 0;
      i++;
      continue;
    }
    if (ch === "}") {
      state = stack.pop() ?? { ignore: false, unicodeSkip: 1 };
      pendingSkip = 0;
      i++;
      continue;
    }
    if (ch === "\r" || ch === "\n") {
      i++;
      continue;
    }
    if (ch !== "\\") {
      emit(decodeWindows1252(ch.charCodeAt(0)));
      i++;
      continue;
    }

    const next = rtf[i + 1];
    if (next === "\\" || next === "{" || next === "}") {
      emit(next);
      i += 2;
      continue;
    }
    if (next === "*") {
      state.ignore = true;
      i += 2;
      continue;
    }
    if (next === "'") {
      const code = parseInt(rtf.slice(i + 2, i + 4), 16);
      if (!Number.isNaN(code)) emit(decodeWindows1252(code));
      i += 4;
      continue;
    }
    if (next === "~") {
      emit(" ");
      i += 2;
      continue;
    }
    if (next === "\n" || next === "\r") {
      emit("\n");
      i += 2;
      continue;
    }

    const match = CONTROL_WORD.exec(rtf.slice(i, i + 48));
    if (!match) {
      // Unknown control symbol: drop it
      i += 2;
      continue;
    }
    i += match[0].length;
    const word = match[1];
    const param = match[2] === undefined ? undefined : Number(match[2]);

    if (IGNORED_DESTINATIONS.has(word)) {
      state.ignore = true;
      continue;
    }

    switch (word) {
      case "par":
      case "line":
      case "sect":
      case "page":
        emit("\n");
        break;
      case "tab":
        emit("\t");
        break;
      case "cell":
        emit("\t");
        break;
      case "row":
        emit("\n");
        break;
      case "uc":
        state.unicodeSkip = param ?? 1;
        break;
      case "u":
        if (param !== undefined) {
          emit(String.fromCharCode(param < 0 ? param + 65536 : param));
          pendingSkip = state.unicodeSkip;
        }
        break;
      default:
        break;
    }
  }

  return out
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export const rtfExtractor: TextExtractor = {
  name: "rtf",
  supportedExtensions: [".rtf"],

  async extractText(stream: Readable, _filename: string, signal?: AbortSignal): Promise<string> {
    const buffer = await readStreamToBuffer(stream, signal);
    if (buffer.length === 0) return "";
    return rtfToText(buffer.toString("latin1"), signal);
  },
};
