import { execFile } from "node:child_process";
import { mkdir, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { promisify } from "node:util";
import { createCommandError } from "./command-error.ts";
import { assertReadableFile } from "./file-access.ts";

const execFileAsync = promisify(execFile);

interface RenderPdfPageInput {
  inputPdfPath: string;
  outputDirPath: string;
  dpi?: number;
  pageNumber?: number;
}

interface RenderPdfPageDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  ensureOutputDir: (outputDirPath: string) => Promise<void>;
  runPdftoppm: (args: string[]) => Promise<void>;
  readOutputDir: (outputDirPath: string) => Promise<string[]>;
}

export function getPageImagePrefix(pageNumber: number): string {
  return `page-${pageNumber}`;
}

/** `-singlefile` makes pdftoppm write `<prefix>.png` with no page suffix. */
export function buildPdftoppmArgs(
  inputPdfPath: string,
  outputPrefixPath: string,
  dpi = 300,
  pageNumber = 1,
): string[] {
  return [
    "-r",
    `${dpi}`,
    "-f",
    `${pageNumber}`,
    "-l",
    `${pageNumber}`,
    "-singlefile",
    "-png",
    inputPdfPath,
    outputPrefixPath,
  ];
}

/** Rasterizes one page of a PDF and returns the path of the PNG. */
export async function renderPdfPage(
  { inputPdfPath, outputDirPath, dpi = 300, pageNumber = 1 }: RenderPdfPageInput,
  dependencies?: RenderPdfPageDependencies,
): Promise<string> {
  if (!Number.isInteger(dpi) || dpi <= 0) {
    throw new Error("DPI must be a positive integer.");
  }
  if (!Number.isInteger(pageNumber) || pageNumber <= 0) {
    throw new Error("Page number must be a positive integer.");
  }

  const resolvedDependencies = dependencies ?? createDefaultDependencies();

  const resolvedInputPdfPath = resolve(inputPdfPath);
  const resolvedOutputDirPath = resolve(outputDirPath);
  const outputPrefix = getPageImagePrefix(pageNumber);

  await resolvedDependencies.assertReadableFile(resolvedInputPdfPath);
  await resolvedDependencies.ensureOutputDir(resolvedOutputDirPath);

  try {
    await resolvedDependencies.runPdftoppm(
      buildPdftoppmArgs(
        resolvedInputPdfPath,
        join(resolvedOutputDirPath, outputPrefix),
        dpi,
        pageNumber,
      ),
    );
  } catch (error: unknown) {
    throw createCommandError(error, {
      notFound: "pdftoppm command not found. Install poppler to enable PDF to PNG conversion.",
      failurePrefix: "Failed to convert PDF to PNG",
    });
  }

  const imageFileName = `${outputPrefix}.png`;
  const fileNames = await resolvedDependencies.readOutputDir(resolvedOutputDirPath);
  if (!fileNames.includes(imageFileName)) {
    throw new Error(`pdftoppm did not render page ${pageNumber} of the PDF.`);
  }

  return join(resolvedOutputDirPath, imageFileName);
}

function createDefaultDependencies(): RenderPdfPageDependencies {
  return {
    assertReadableFile,
    ensureOutputDir: async (outputDirPath: string) => {
      await mkdir(outputDirPath, { recursive: true });
    },
    runPdftoppm: async (args: string[]) => {
      await execFileAsync("pdftoppm", args);
    },
    readOutputDir: (outputDirPath: string) => readdir(outputDirPath),
  };
}
