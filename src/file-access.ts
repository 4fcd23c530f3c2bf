import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input PDF: ${filePath}`);
  }
}

export async function readInputFile(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch {
    throw new Error(`Cannot read input file: ${filePath}`);
  }
}
