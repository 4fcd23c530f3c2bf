#!/usr/bin/env tsx

import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { scaleTitleDetectionConfig, DEFAULT_TITLE_DETECTION_CONFIG } from "./ocr-types.ts";
import { parseTesseractTsv } from "./ocr-tokens.ts";
import { collectPdfInputs } from "./pdf-input.ts";
import { planDecks } from "./pdf-title.ts";
import { extractTitleFromTable } from "./title-detect.ts";

interface TitleCommandOptions {
  dpi: number;
  lang: string;
  json?: boolean;
}

interface TsvCommandOptions {
  dpi: number;
}

const program = new Command();

program
  .name("deck-titler")
  .description("Name slide decks after the titles OCR finds on their source PDFs")
  .showHelpAfterError();

program
  .command("title")
  .description("Infer deck titles and file names for PDF files or ZIP archives of PDFs")
  .argument("<inputs...>", "PDF files or ZIP archives")
  .option("--dpi <dpi>", "Rasterization resolution for OCR", parsePositiveInteger, 300)
  .option("--lang <code>", "Tesseract language code", "eng")
  .option("--json", "Print the deck plan as JSON")
  .action(async (inputs: string[], options: TitleCommandOptions) => {
    const pdfs = await collectPdfInputs(inputs);
    if (pdfs.length === 0) {
      console.error("No valid PDF files found to process");
      process.exitCode = 1;
      return;
    }

    const plan = await planDecks(pdfs, { dpi: options.dpi, language: options.lang });

    if (options.json) {
      console.log(JSON.stringify(plan, null, 2));
    } else {
      for (const deck of plan.decks) {
        console.log(`${deck.sourceName} -> ${deck.deckFileName} (${deck.subtitle})`);
      }
    }

    for (const failure of plan.failures) {
      console.error(`Failed: ${failure.sourceName}: ${failure.message}`);
    }
    if (plan.failures.length > 0) process.exitCode = 1;
  });

program
  .command("tsv")
  .description("Infer a title from saved tesseract TSV output")
  .argument("<tsvPath>", "Path to a tesseract TSV file")
  .option("--dpi <dpi>", "Resolution the page was rasterized at", parsePositiveInteger, 300)
  .action(async (tsvPath: string, options: TsvCommandOptions) => {
    const table = parseTesseractTsv(await readFile(tsvPath, "utf8"));
    const title = extractTitleFromTable(
      table,
      scaleTitleDetectionConfig(DEFAULT_TITLE_DETECTION_CONFIG, options.dpi),
    );

    if (title === undefined) {
      console.error("No title found.");
      process.exitCode = 1;
      return;
    }
    console.log(title);
  });

program.action(() => {
  program.outputHelp();
});

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || `${parsed}` !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
