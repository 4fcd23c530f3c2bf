import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { createCommandError } from "./command-error.ts";
import type { OcrTokenTable } from "./ocr-types.ts";
import { parseTesseractTsv } from "./ocr-tokens.ts";

const execFileAsync = promisify(execFile);

const TESSERACT_MAX_BUFFER_BYTES = 32 * 1024 * 1024;

interface RecognizeImageInput {
  imagePath: string;
  dpi?: number;
  language?: string;
}

interface RecognizeImageDependencies {
  runTesseract: (args: string[]) => Promise<string>;
}

export function buildTesseractArgs(imagePath: string, dpi = 300, language = "eng"): string[] {
  return [imagePath, "stdout", "--dpi", `${dpi}`, "-l", language, "tsv"];
}

export async function recognizeImage(
  { imagePath, dpi = 300, language = "eng" }: RecognizeImageInput,
  dependencies?: RecognizeImageDependencies,
): Promise<OcrTokenTable> {
  if (!Number.isInteger(dpi) || dpi <= 0) {
    throw new Error("DPI must be a positive integer.");
  }
  if (!/^[A-Za-z_]+(?:\+[A-Za-z_]+)*$/.test(language)) {
    throw new Error(`Invalid OCR language: ${language}`);
  }

  const resolvedDependencies = dependencies ?? createDefaultDependencies();

  let tsv: string;
  try {
    tsv = await resolvedDependencies.runTesseract(buildTesseractArgs(imagePath, dpi, language));
  } catch (error: unknown) {
    throw createCommandError(error, {
      notFound: "tesseract command not found. Install tesseract-ocr to enable OCR.",
      failurePrefix: "Failed to run OCR",
    });
  }

  return parseTesseractTsv(tsv);
}

function createDefaultDependencies(): RecognizeImageDependencies {
  return {
    runTesseract: async (args: string[]) => {
      const { stdout } = await execFileAsync("tesseract", args, {
        encoding: "utf8",
        maxBuffer: TESSERACT_MAX_BUFFER_BYTES,
      });
      return stdout;
    },
  };
}
