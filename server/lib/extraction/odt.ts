import type { Readable } from "stream";
import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import type { TextExtractor } from "./types";
import { readStreamToBuffer } from "./stream";
import { ExtractionFailedError, throwIfAborted } from "../errors";

type XmlNode = Record<string, unknown>;

const SKIPPED_SECTIONS = new Set([
  "office:font-face-decls",
  "office:automatic-styles",
  "office:scripts",
  "office:annotation",
  "text:tracked-changes",
]);

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  trimValues: false,
  parseTagValue: false,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ":@");
}

function childrenOf(node: XmlNode, tag: string): XmlNode[] {
  const value = node[tag];
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function attribute(node: XmlNode, name: string): string | undefined {
  const attrs = node[":@"];
  if (!isNode(attrs)) return undefined;
  const value = attrs[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function inlineText(nodes: XmlNode[]): string {
  let out = "";
  for (const node of nodes) {
    const tag = tagOf(node);
    if (!tag || SKIPPED_SECTIONS.has(tag)) continue;

    switch (tag) {
      case "#text":
        out += String(node["#text"]);
        break;
      case "text:s": {
        const count = Number(attribute(node, "text:c") ?? "1");
        out += " ".repeat(Number.isInteger(count) && count > 0 ? count : 1);
        break;
      }
      case "text:tab":
        out += "\t";
        break;
      case "text:line-break":
        out += "\n";
        break;
      default:
        out += inlineText(childrenOf(node, tag));
    }
  }
  return out;
}

function collectParagraphs(nodes: XmlNode[], out: string[], signal?: AbortSignal) {
  for (const node of nodes) {
    const tag = tagOf(node);
    if (!tag || tag === "#text" || SKIPPED_SECTIONS.has(tag)) continue;

    if (tag === "text:p" || tag === "text:h") {
      throwIfAborted(signal);
      const text = inlineText(childrenOf(node, tag));
      if (text.trim()) out.push(text);
    } else {
      collectParagraphs(childrenOf(node, tag), out, signal);
    }
  }
}

/** Paragraphs and headings from content.xml, one per line, document order. */
export function extractOdtContentXml(xml: string, signal?: AbortSignal): string {
  const parsed: unknown = parser.parse(xml);
  const roots = Array.isArray(parsed) ? parsed.filter(isNode) : [];
  const paragraphs: string[] = [];
  collectParagraphs(roots, paragraphs, signal);
  return paragraphs.join("\n");
}

export const odtExtractor: TextExtractor = {
  name: "odt",
  supportedExtensions: [".odt"],

  async extractText(stream: Readable, filename: string, signal?: AbortSignal): Promise<string> {
    const buffer = await readStreamToBuffer(stream, signal);
    if (buffer.length === 0) return "";

    const zip = await JSZip.loadAsync(buffer);
    const content = zip.file("content.xml");
    if (!content) {
      throw new ExtractionFailedError(`ODT package has no content.xml: ${filename}`);
    }
    return extractOdtContentXml(await content.async("string"), signal);
  },
};
