import type {
  OcrLine,
  OcrToken,
  OcrTokenTable,
  TitleCandidateGroup,
  TitleDetectionConfig,
} from "./ocr-types.ts";
import { resolveTitleDetectionConfig } from "./ocr-types.ts";
import {
  filterBoilerplateLines,
  matchesPattern,
  normalizeSpacing,
  reconstructLines,
  sortLinesByTop,
} from "./ocr-lines.ts";
import { tokensFromTable } from "./ocr-tokens.ts";

/**
 * Infers the document title from the OCR tokens of a first page.
 *
 * Returns `undefined` when the page has no usable text, leaving the caller to
 * fall back to the file name. Never throws.
 */
export function extractTitle(
  tokens: readonly OcrToken[],
  config: Partial<TitleDetectionConfig> = {},
): string | undefined {
  try {
    return detectTitle(tokens, resolveTitleDetectionConfig(config));
  } catch (error: unknown) {
    console.error("Error extracting title:", error);
    return undefined;
  }
}

export function extractTitleFromTable(
  table: OcrTokenTable,
  config: Partial<TitleDetectionConfig> = {},
): string | undefined {
  let tokens: OcrToken[];
  try {
    tokens = tokensFromTable(table);
  } catch (error: unknown) {
    console.error("Error extracting title:", error);
    return undefined;
  }
  return extractTitle(tokens, config);
}

function detectTitle(
  tokens: readonly OcrToken[],
  config: TitleDetectionConfig,
): string | undefined {
  const rawLines = reconstructLines(tokens);
  if (rawLines.length === 0) return undefined;

  const lines = filterBoilerplateLines(rawLines, config.boilerplatePatterns);
  if (lines.length === 0) return finalizeTitle(rawLines[0]?.text);

  const groups = groupTitleCandidates(lines, config);
  const bestGroup = selectTitleGroup(groups);
  if (bestGroup) return finalizeTitle(assembleGroupTitle(bestGroup));

  return finalizeTitle(findFallbackTitleLine(lines, config)?.text);
}

export function findHeaderBandLines(
  lines: readonly OcrLine[],
  headerBandHeight: number,
): OcrLine[] {
  const sorted = sortLinesByTop(lines);
  const topmost = sorted[0];
  if (!topmost) return [];
  return sorted.filter((line) => line.top - topmost.top <= headerBandHeight);
}

export function groupTitleCandidates(
  lines: readonly OcrLine[],
  config: TitleDetectionConfig,
): TitleCandidateGroup[] {
  const bandLines = findHeaderBandLines(lines, config.headerBandHeight);
  if (bandLines.length === 0) return [];

  // Low-confidence lines still set the size bar; they just cannot be picked.
  const maxFontSize = Math.max(...bandLines.map((line) => line.fontSize));
  const minTitleFontSize = maxFontSize * config.titleSizeRatio;
  const candidates = bandLines.filter(
    (line) =>
      line.fontSize >= minTitleFontSize && line.confidence >= config.minCandidateConfidence,
  );

  const runs: OcrLine[][] = [];
  let run: OcrLine[] = [];
  for (const line of candidates) {
    const previous = run[run.length - 1];
    if (previous && !canMergeTitleLines(previous, line, config)) {
      runs.push(run);
      run = [];
    }
    run.push(line);
  }
  if (run.length > 0) runs.push(run);

  return runs.map(createCandidateGroup);
}

function canMergeTitleLines(
  previous: OcrLine,
  next: OcrLine,
  config: TitleDetectionConfig,
): boolean {
  const gap = next.top - (previous.top + previous.fontSize);
  if (gap >= config.maxLineGap) return false;
  return Math.abs(next.fontSize - previous.fontSize) < config.maxFontSizeDelta;
}

function createCandidateGroup(lines: OcrLine[]): TitleCandidateGroup {
  const totalFontSize = lines.reduce((sum, line) => sum + line.fontSize, 0);
  return {
    lines,
    fontSize: totalFontSize / lines.length,
    top: Math.min(...lines.map((line) => line.top)),
    bottom: Math.max(...lines.map((line) => line.top + line.fontSize)),
  };
}

/** Largest mean font size wins; ties keep the higher group. */
export function selectTitleGroup(
  groups: readonly TitleCandidateGroup[],
): TitleCandidateGroup | undefined {
  return [...groups].sort((left, right) => right.fontSize - left.fontSize || left.top - right.top)[0];
}

/**
 * Joins the group top to bottom. A marker-led title ("Workshop: ...") and a
 * colon-ended label line both keep every fragment.
 */
export function assembleGroupTitle(group: TitleCandidateGroup): string {
  return sortLinesByTop(group.lines)
    .map((line) => line.text)
    .join(" ");
}

function findFallbackTitleLine(
  lines: readonly OcrLine[],
  config: TitleDetectionConfig,
): OcrLine | undefined {
  const ranked = [...lines].sort(
    (left, right) => right.fontSize - left.fontSize || left.top - right.top,
  );
  const marked = ranked
    .slice(0, config.markerScanLimit)
    .find((line) => matchesPattern(config.presentationMarkerPattern, line.text));
  return marked ?? ranked[0];
}

function finalizeTitle(text: string | undefined): string | undefined {
  if (text === undefined) return undefined;
  const normalized = normalizeSpacing(text);
  return normalized.length > 0 ? normalized : undefined;
}
