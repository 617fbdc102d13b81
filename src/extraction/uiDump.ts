import type { BoundingBox, TextElement } from "../types/domain.js";

const NODE_PATTERN = /<node\b([^>]*?)\/?>/g;
const ATTRIBUTE_PATTERN = /([\w:-]+)="([^"]*)"/g;
const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

export interface ParseUiDumpOptions {
  /** "document" keeps hierarchy order; "reading" sorts top-to-bottom, then left-to-right. */
  order?: "document" | "reading";
}

/**
 * Turns a uiautomator XML dump into the ordered, non-empty text elements the
 * extractor consumes.
 */
export function parseUiDump(xml: string, options: ParseUiDumpOptions = {}): TextElement[] {
  const nodes: Array<{ text: string; boundingBox?: BoundingBox }> = [];

  for (const match of xml.matchAll(NODE_PATTERN)) {
    const attributes = parseAttributes(match[1]);
    const text = normalizeText(attributes.get("text") || attributes.get("content-desc") || "");
    if (!text) continue;

    const boundingBox = parseBounds(attributes.get("bounds"));
    nodes.push(boundingBox ? { text, boundingBox } : { text });
  }

  if (options.order === "reading") {
    // Nodes without bounds go last, in document order.
    nodes.sort((a, b) => {
      if (a.boundingBox && b.boundingBox) {
        return a.boundingBox.top - b.boundingBox.top || a.boundingBox.left - b.boundingBox.left;
      }
      if (a.boundingBox) return -1;
      if (b.boundingBox) return 1;
      return 0;
    });
  }

  return nodes.map((node, screenIndex) => ({ ...node, screenIndex }));
}

export function parseBounds(raw: string | undefined): BoundingBox | undefined {
  if (!raw) return undefined;
  const match = BOUNDS_PATTERN.exec(raw.trim());
  if (!match) return undefined;

  const [left, top, right, bottom] = match.slice(1, 5).map(Number);
  return { left, top, right, bottom };
}

function parseAttributes(raw: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of raw.matchAll(ATTRIBUTE_PATTERN)) {
    attributes.set(match[1], decodeEntities(match[2]));
  }
  return attributes;
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|amp|lt|gt|quot|apos);/gi, (entity, code: string) => {
    const lower = code.toLowerCase();
    if (lower.startsWith("#x")) return codePointOr(entity, parseInt(lower.slice(2), 16));
    if (lower.startsWith("#")) return codePointOr(entity, parseInt(lower.slice(1), 10));
    switch (lower) {
      case "amp":
        return "&";
      case "lt":
        return "<";
      case "gt":
        return ">";
      case "quot":
        return '"';
      case "apos":
        return "'";
      default:
        return entity;
    }
  });
}

function codePointOr(entity: string, code: number): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
}
