import { parse } from "node:path";
import { normalizeSpacing } from "./ocr-lines.ts";

const DECK_FILE_EXTENSION = ".pptx";
const MAX_DECK_FILE_NAME_LENGTH = 120;
const FALLBACK_DECK_FILE_NAME = "presentation";
const ILLEGAL_FILE_NAME_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function resolveDeckTitle(title: string | undefined, sourceName: string): string {
  const normalized = title === undefined ? "" : normalizeSpacing(title);
  if (normalized.length > 0) return normalized;
  return parse(sourceName).name.trim();
}

export function sanitizeFileName(name: string): string {
  const sanitized = normalizeSpacing(name.replace(ILLEGAL_FILE_NAME_CHARACTERS, "_"))
    .slice(0, MAX_DECK_FILE_NAME_LENGTH)
    .replace(/[. ]+$/, "");
  return sanitized.length > 0 ? sanitized : FALLBACK_DECK_FILE_NAME;
}

/** Deck file names for a batch, numbering repeats as "Name (2).pptx". */
export function assignDeckFileNames(titles: readonly string[]): string[] {
  const used = new Set<string>();
  return titles.map((title) => {
    const base = sanitizeFileName(title);
    let candidate = base;
    for (let copy = 2; used.has(candidate.toLowerCase()); copy++) {
      candidate = `${base} (${copy})`;
    }
    used.add(candidate.toLowerCase());
    return `${candidate}${DECK_FILE_EXTENSION}`;
  });
}

export function formatDeckSubtitle(pageCount: number): string {
  const unit = pageCount === 1 ? "page" : "pages";
  return `Converted PDF Presentation (${pageCount} ${unit})`;
}
