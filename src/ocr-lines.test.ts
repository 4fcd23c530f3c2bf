import { describe, expect, it } from "vitest";

import {
  filterBoilerplateLines,
  isBoilerplateLine,
  reconstructLines,
  sortLinesByTop,
} from "./ocr-lines.ts";
import type { OcrLine, OcrToken } from "./ocr-types.ts";
import { DEFAULT_BOILERPLATE_PATTERNS } from "./ocr-types.ts";

describe("reconstructLines", () => {
  it("aggregates size, position and confidence over the tokens of a line", () => {
    const lines = reconstructLines([
      createToken({ text: "Quarterly", lineIndex: 3, top: 52, left: 100, width: 200, height: 28, confidence: 90 }),
      createToken({ text: "Results", lineIndex: 3, top: 50, left: 310, width: 150, height: 30, confidence: 80 }),
    ]);

    expect(lines).toEqual([
      {
        lineIndex: 3,
        text: "Quarterly Results",
        fontSize: 30,
        top: 50,
        left: 100,
        width: 360,
        confidence: 85,
      },
    ]);
  });

  it("starts a new line whenever the line index changes", () => {
    const lines = reconstructLines([
      createToken({ text: "Alpha", lineIndex: 0 }),
      createToken({ text: "Beta", lineIndex: 1 }),
      createToken({ text: "Gamma", lineIndex: 0 }),
    ]);

    expect(lines.map((line) => [line.lineIndex, line.text])).toEqual([
      [0, "Alpha"],
      [1, "Beta"],
      [0, "Gamma"],
    ]);
  });

  it("skips blank tokens without closing the current line", () => {
    const lines = reconstructLines([
      createToken({ text: "Digital", lineIndex: 0, confidence: 90 }),
      createToken({ text: " ", lineIndex: 1, confidence: 0, height: 300 }),
      createToken({ text: "Roadmap", lineIndex: 0, confidence: 70 }),
    ]);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ text: "Digital Roadmap", fontSize: 30, confidence: 80 });
  });

  it("returns no lines for an empty stream", () => {
    expect(reconstructLines([])).toEqual([]);
  });
});

describe("isBoilerplateLine", () => {
  it.each([
    "CONFIDENTIAL — Gartner Usage Policy",
    "Internal usage policy applies",
    "Copyright 2024 Example Corp",
    "© Example Corp",
    "Strictly Confidential",
    "Page 12 of 40",
    "2024",
  ])("matches %s", (text) => {
    expect(isBoilerplateLine(text, DEFAULT_BOILERPLATE_PATTERNS)).toBe(true);
  });

  it.each(["2024 Roadmap", "Pages and Layouts", "Quarterly Results Overview"])(
    "does not match %s",
    (text) => {
      expect(isBoilerplateLine(text, DEFAULT_BOILERPLATE_PATTERNS)).toBe(false);
    },
  );

  it("matches global and sticky patterns from the start on every call", () => {
    const globalPattern = /confidential/gi;
    expect(isBoilerplateLine("Confidential Draft", [globalPattern])).toBe(true);
    expect(isBoilerplateLine("Confidential", [globalPattern])).toBe(true);

    const stickyPattern = /page\s+\d+/iy;
    stickyPattern.lastIndex = 4;
    expect(isBoilerplateLine("Page 2", [stickyPattern])).toBe(true);
  });
});

describe("filterBoilerplateLines", () => {
  it("keeps only lines that match no pattern", () => {
    const lines = [createLine("Page 3"), createLine("Market Outlook"), createLine("7")];
    expect(filterBoilerplateLines(lines, DEFAULT_BOILERPLATE_PATTERNS).map((line) => line.text)).toEqual([
      "Market Outlook",
    ]);
  });
});

describe("sortLinesByTop", () => {
  it("orders lines top to bottom, then left to right, without mutating the input", () => {
    const lines = [
      createLine("Footer", { top: 900 }),
      createLine("Right", { top: 40, left: 600 }),
      createLine("Left", { top: 40, left: 100 }),
    ];

    expect(sortLinesByTop(lines).map((line) => line.text)).toEqual(["Left", "Right", "Footer"]);
    expect(lines.map((line) => line.text)).toEqual(["Footer", "Right", "Left"]);
  });
});

function createToken(overrides: Partial<OcrToken> = {}): OcrToken {
  return {
    text: "Token",
    confidence: 90,
    lineIndex: 0,
    top: 50,
    left: 100,
    width: 120,
    height: 30,
    ...overrides,
  };
}

function createLine(text: string, overrides: Partial<OcrLine> = {}): OcrLine {
  return {
    lineIndex: 0,
    text,
    fontSize: 20,
    top: 100,
    left: 100,
    width: 400,
    confidence: 90,
    ...overrides,
  };
}
