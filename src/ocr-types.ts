export interface OcrTokenTable {
  text: string[];
  confidence: number[];
  lineIndex: number[];
  top: number[];
  left: number[];
  width: number[];
  height: number[];
}

export interface OcrToken {
  readonly text: string;
  /** 0-100 certainty reported by the OCR engine. */
  readonly confidence: number;
  readonly lineIndex: number;
  readonly top: number;
  readonly left: number;
  readonly width: number;
  /** Used as the font size proxy. */
  readonly height: number;
}

export interface OcrLine {
  readonly lineIndex: number;
  readonly text: string;
  readonly fontSize: number;
  readonly top: number;
  readonly left: number;
  readonly width: number;
  readonly confidence: number;
}

export interface TitleCandidateGroup {
  readonly lines: readonly OcrLine[];
  readonly fontSize: number;
  readonly top: number;
  readonly bottom: number;
}

export interface TitleDetectionConfig {
  /** Vertical window, measured from the topmost surviving line, that may hold the title. */
  headerBandHeight: number;
  /** Fraction of the largest header-band font size a line needs to be a title line. */
  titleSizeRatio: number;
  maxLineGap: number;
  maxFontSizeDelta: number;
  markerScanLimit: number;
  minCandidateConfidence: number;
  boilerplatePatterns: readonly RegExp[];
  presentationMarkerPattern: RegExp;
}

export const TITLE_DETECTION_BASE_DPI = 300;
export const HEADER_BAND_HEIGHT = 400;
export const TITLE_SIZE_RATIO = 0.8;
export const TITLE_MAX_LINE_GAP = 20;
export const TITLE_MAX_FONT_SIZE_DELTA = 4;
export const PRESENTATION_MARKER_SCAN_LIMIT = 5;
export const MIN_TITLE_CANDIDATE_CONFIDENCE = 50;

export const DEFAULT_BOILERPLATE_PATTERNS: readonly RegExp[] = Object.freeze([
  /usage\s+policy/i,
  /copyright|©/i,
  /confidential/i,
  /\bpage\s+\d+\b/i,
  /^\d+$/,
]);

export const PRESENTATION_MARKER_PATTERN = /^(?:workshop|webinar|seminar|presentation)\s*:/i;

export const DEFAULT_TITLE_DETECTION_CONFIG: Readonly<TitleDetectionConfig> = Object.freeze({
  headerBandHeight: HEADER_BAND_HEIGHT,
  titleSizeRatio: TITLE_SIZE_RATIO,
  maxLineGap: TITLE_MAX_LINE_GAP,
  maxFontSizeDelta: TITLE_MAX_FONT_SIZE_DELTA,
  markerScanLimit: PRESENTATION_MARKER_SCAN_LIMIT,
  minCandidateConfidence: MIN_TITLE_CANDIDATE_CONFIDENCE,
  boilerplatePatterns: DEFAULT_BOILERPLATE_PATTERNS,
  presentationMarkerPattern: PRESENTATION_MARKER_PATTERN,
});

export function scaleTitleDetectionConfig(
  config: Readonly<TitleDetectionConfig>,
  dpi: number,
): TitleDetectionConfig {
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new Error("DPI must be a positive number.");
  }
  const scale = dpi / TITLE_DETECTION_BASE_DPI;
  return {
    ...config,
    headerBandHeight: config.headerBandHeight * scale,
    maxLineGap: config.maxLineGap * scale,
    maxFontSizeDelta: config.maxFontSizeDelta * scale,
  };
}

/** Fills every option left out, or passed as `undefined`, from the defaults. */
export function resolveTitleDetectionConfig(
  overrides: Partial<TitleDetectionConfig> = {},
): TitleDetectionConfig {
  const defaults = DEFAULT_TITLE_DETECTION_CONFIG;
  return {
    headerBandHeight: overrides.headerBandHeight ?? defaults.headerBandHeight,
    titleSizeRatio: overrides.titleSizeRatio ?? defaults.titleSizeRatio,
    maxLineGap: overrides.maxLineGap ?? defaults.maxLineGap,
    maxFontSizeDelta: overrides.maxFontSizeDelta ?? defaults.maxFontSizeDelta,
    markerScanLimit: overrides.markerScanLimit ?? defaults.markerScanLimit,
    minCandidateConfidence: overrides.minCandidateConfidence ?? defaults.minCandidateConfidence,
    boilerplatePatterns: overrides.boilerplatePatterns ?? defaults.boilerplatePatterns,
    presentationMarkerPattern:
      overrides.presentationMarkerPattern ?? defaults.presentationMarkerPattern,
  };
}
