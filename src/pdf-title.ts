import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assignDeckFileNames, formatDeckSubtitle, resolveDeckTitle } from "./deck-name.ts";
import type { OcrTokenTable, TitleDetectionConfig } from "./ocr-types.ts";
import { resolveTitleDetectionConfig, scaleTitleDetectionConfig } from "./ocr-types.ts";
import { countPdfPages } from "./pdf-extract.ts";
import type { PdfInput } from "./pdf-input.ts";
import { renderPdfPage } from "./pdf-to-png.ts";
import { recognizeImage } from "./tesseract-ocr.ts";
import { extractTitleFromTable } from "./title-detect.ts";

const WORK_DIR_PREFIX = "deck-titler-";

export interface InferPdfTitleOptions {
  dpi?: number;
  language?: string;
  config?: Partial<TitleDetectionConfig>;
}

interface InferPdfTitleDependencies {
  createWorkDir: () => Promise<string>;
  writeFile: (filePath: string, data: Uint8Array) => Promise<void>;
  removeWorkDir: (dirPath: string) => Promise<void>;
  renderFirstPage: (inputPdfPath: string, outputDirPath: string, dpi: number) => Promise<string>;
  recognizeImage: (imagePath: string, dpi: number, language: string) => Promise<OcrTokenTable>;
}

export interface DeckPlan {
  sourceName: string;
  title: string;
  titleSource: "ocr" | "file-name";
  deckFileName: string;
  pageCount: number;
  subtitle: string;
}

export interface DeckPlanFailure {
  sourceName: string;
  message: string;
}

export interface PlanDecksResult {
  decks: DeckPlan[];
  failures: DeckPlanFailure[];
}

interface PlanDecksDependencies {
  inferTitle: (pdf: PdfInput) => Promise<string | undefined>;
  countPages: (data: Uint8Array) => Promise<number>;
}

/**
 * OCRs the first page of `pdf` and infers its title. Rendering and OCR
 * failures are logged and yield `undefined`, like an unreadable page.
 */
export async function inferPdfTitle(
  pdf: PdfInput,
  { dpi = 300, language = "eng", config = {} }: InferPdfTitleOptions = {},
  dependencies?: InferPdfTitleDependencies,
): Promise<string | undefined> {
  const resolvedDependencies = dependencies ?? createDefaultDependencies();
  let workDirPath: string | undefined;

  try {
    const scaledConfig = scaleTitleDetectionConfig(resolveTitleDetectionConfig(config), dpi);
    workDirPath = await resolvedDependencies.createWorkDir();
    const pdfPath = join(workDirPath, "document.pdf");
    await resolvedDependencies.writeFile(pdfPath, pdf.data);
    const imagePath = await resolvedDependencies.renderFirstPage(
      pdfPath,
      join(workDirPath, "pages"),
      dpi,
    );
    const table = await resolvedDependencies.recognizeImage(imagePath, dpi, language);
    return extractTitleFromTable(table, scaledConfig);
  } catch (error: unknown) {
    console.error(`Error extracting title from ${pdf.name}:`, error);
    return undefined;
  } finally {
    if (workDirPath !== undefined) {
      const dirPath = workDirPath;
      await resolvedDependencies.removeWorkDir(dirPath).catch((error: unknown) => {
        console.error(`Failed to remove work directory ${dirPath}:`, error);
      });
    }
  }
}

export async function planDecks(
  pdfs: readonly PdfInput[],
  options: InferPdfTitleOptions = {},
  dependencies?: PlanDecksDependencies,
): Promise<PlanDecksResult> {
  const resolvedDependencies = dependencies ?? {
    inferTitle: (pdf: PdfInput) => inferPdfTitle(pdf, options),
    countPages: countPdfPages,
  };
  const planned: Omit<DeckPlan, "deckFileName">[] = [];
  const failures: DeckPlanFailure[] = [];

  for (const pdf of pdfs) {
    let pageCount: number;
    try {
      pageCount = await resolvedDependencies.countPages(pdf.data);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`Error processing ${pdf.name}: ${message}`);
      failures.push({ sourceName: pdf.name, message });
      continue;
    }

    const inferred = await resolvedDependencies.inferTitle(pdf);
    const title = resolveDeckTitle(inferred, pdf.name);
    planned.push({
      sourceName: pdf.name,
      title,
      titleSource: inferred === undefined ? "file-name" : "ocr",
      pageCount,
      subtitle: formatDeckSubtitle(pageCount),
    });
  }

  const deckFileNames = assignDeckFileNames(planned.map((deck) => deck.title));
  const decks = planned.map((deck, index) => ({
    ...deck,
    deckFileName: deckFileNames[index] ?? "",
  }));
  return { decks, failures };
}

function createDefaultDependencies(): InferPdfTitleDependencies {
  return {
    createWorkDir: () => mkdtemp(join(tmpdir(), WORK_DIR_PREFIX)),
    writeFile: (filePath: string, data: Uint8Array) => writeFile(filePath, data),
    removeWorkDir: (dirPath: string) => rm(dirPath, { recursive: true, force: true }),
    renderFirstPage: (inputPdfPath: string, outputDirPath: string, dpi: number) =>
      renderPdfPage({ inputPdfPath, outputDirPath, dpi, pageNumber: 1 }),
    recognizeImage: (imagePath: string, dpi: number, language: string) =>
      recognizeImage({ imagePath, dpi, language }),
  };
}
