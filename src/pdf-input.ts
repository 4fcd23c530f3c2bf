import { basename, extname } from "node:path";
import JSZip from "jszip";
import { readInputFile } from "./file-access.ts";

export interface PdfInput {
  name: string;
  data: Uint8Array;
}

interface CollectPdfInputsDependencies {
  readFile: (filePath: string) => Promise<Uint8Array>;
}

const PDF_MAGIC_NUMBER = [0x25, 0x50, 0x44, 0x46]; // %PDF

export function hasPdfExtension(name: string): boolean {
  return extname(name).toLowerCase() === ".pdf";
}

export function isPdfFile(name: string, data: Uint8Array): boolean {
  if (!hasPdfExtension(name)) return false;
  return PDF_MAGIC_NUMBER.every((byte, index) => data[index] === byte);
}

export async function extractPdfsFromZip(data: Uint8Array): Promise<PdfInput[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch {
    throw new Error("Invalid ZIP file provided");
  }

  const entries = Object.values(zip.files).filter(
    (entry) => !entry.dir && hasPdfExtension(entry.name),
  );
  const pdfs: PdfInput[] = [];
  for (const entry of entries) {
    pdfs.push({
      name: basename(entry.name),
      data: await entry.async("uint8array"),
    });
  }
  return pdfs;
}

/**
 * Expands the given paths into PDF documents. ZIP archives contribute every
 * PDF entry; unsupported files are skipped with a warning.
 */
export async function collectPdfInputs(
  filePaths: string[],
  dependencies?: CollectPdfInputsDependencies,
): Promise<PdfInput[]> {
  const readFile = dependencies?.readFile ?? readInputFile;
  const pdfs: PdfInput[] = [];

  for (const filePath of filePaths) {
    const name = basename(filePath);
    const data = await readFile(filePath);

    if (extname(name).toLowerCase() === ".zip") {
      const extracted = await extractPdfsFromZip(data);
      if (extracted.length === 0) {
        console.warn(`No PDF files found in ZIP archive: ${name}`);
      }
      pdfs.push(...extracted);
      continue;
    }

    if (isPdfFile(name, data)) {
      pdfs.push({ name, data });
      continue;
    }

    console.warn(`Unsupported file type: ${name}`);
  }

  return pdfs;
}
