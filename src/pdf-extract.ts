import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

export async function countPdfPages(data: Uint8Array): Promise<number> {
  // pdf.js takes ownership of the buffer it is given.
  const copy = new Uint8Array(data);
  let pdf: Awaited<ReturnType<typeof getDocument>["promise"]>;
  try {
    pdf = await getDocument({ data: copy, useSystemFonts: true }).promise;
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Failed to count PDF pages: ${detail}`);
  }

  try {
    return pdf.numPages;
  } finally {
    await pdf.destroy();
  }
}
