import type { OcrLine, OcrToken } from "./ocr-types.ts";

export function normalizeSpacing(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Folds the token stream into lines at every `lineIndex` change. Blank tokens
 * are skipped without closing the current line, and lines keep stream order.
 */
export function reconstructLines(tokens: readonly OcrToken[]): OcrLine[] {
  const lines: OcrLine[] = [];
  let buffer: OcrToken[] = [];

  for (const token of tokens) {
    if (normalizeSpacing(token.text).length === 0) continue;
    const current = buffer[0];
    if (current && current.lineIndex !== token.lineIndex) {
      lines.push(buildLine(buffer));
      buffer = [];
    }
    buffer.push(token);
  }

  if (buffer.length > 0) lines.push(buildLine(buffer));
  return lines;
}

function buildLine(tokens: readonly OcrToken[]): OcrLine {
  const left = Math.min(...tokens.map((token) => token.left));
  const right = Math.max(...tokens.map((token) => token.left + token.width));
  const totalConfidence = tokens.reduce((sum, token) => sum + token.confidence, 0);
  return {
    lineIndex: tokens[0]?.lineIndex ?? 0,
    text: tokens.map((token) => normalizeSpacing(token.text)).join(" "),
    fontSize: Math.max(...tokens.map((token) => token.height)),
    top: Math.min(...tokens.map((token) => token.top)),
    left,
    width: right - left,
    confidence: totalConfidence / tokens.length,
  };
}

/** Tests from the start of `text` even when the pattern is global or sticky. */
export function matchesPattern(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(text);
}

export function isBoilerplateLine(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => matchesPattern(pattern, text));
}

export function filterBoilerplateLines(
  lines: readonly OcrLine[],
  patterns: readonly RegExp[],
): OcrLine[] {
  return lines.filter((line) => !isBoilerplateLine(line.text, patterns));
}

export function sortLinesByTop(lines: readonly OcrLine[]): OcrLine[] {
  return [...lines].sort((left, right) => left.top - right.top || left.left - right.left);
}
