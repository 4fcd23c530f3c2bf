import type { OcrToken, OcrTokenTable } from "./ocr-types.ts";

const TESSERACT_WORD_LEVEL = 5;
const TESSERACT_TSV_COLUMNS = [
  "level",
  "page_num",
  "block_num",
  "par_num",
  "line_num",
  "word_num",
  "left",
  "top",
  "width",
  "height",
  "conf",
  "text",
] as const;

type TesseractTsvColumn = (typeof TESSERACT_TSV_COLUMNS)[number];

export function createEmptyTokenTable(): OcrTokenTable {
  return { text: [], confidence: [], lineIndex: [], top: [], left: [], width: [], height: [] };
}

export function tokensFromTable(table: OcrTokenTable): OcrToken[] {
  const count = table.text.length;
  const numericColumns = {
    confidence: table.confidence,
    lineIndex: table.lineIndex,
    top: table.top,
    left: table.left,
    width: table.width,
    height: table.height,
  };

  for (const [name, values] of Object.entries(numericColumns)) {
    if (values.length !== count) {
      throw new Error(
        `Malformed OCR token table: "${name}" has ${values.length} entries, expected ${count}.`,
      );
    }
  }

  const tokens: OcrToken[] = [];
  for (let i = 0; i < count; i++) {
    tokens.push({
      text: table.text[i] ?? "",
      confidence: readFiniteNumber(table.confidence, i, "confidence"),
      lineIndex: readFiniteNumber(table.lineIndex, i, "lineIndex"),
      top: readFiniteNumber(table.top, i, "top"),
      left: readFiniteNumber(table.left, i, "left"),
      width: readFiniteNumber(table.width, i, "width"),
      height: readFiniteNumber(table.height, i, "height"),
    });
  }
  return tokens;
}

function readFiniteNumber(values: number[], index: number, name: string): number {
  const value = values[index];
  if (value === undefined || !Number.isFinite(value)) {
    throw new Error(`Malformed OCR token table: "${name}" at row ${index} is not a number.`);
  }
  return value;
}

/**
 * Reads `tesseract ... tsv` output into a token table.
 *
 * Tesseract numbers lines within each paragraph, so the table's line index is
 * a running counter over the (page, block, paragraph, line) key.
 */
export function parseTesseractTsv(tsv: string): OcrTokenTable {
  const table = createEmptyTokenTable();
  if (tsv.trim().length === 0) return table;
  const rows = tsv.split(/\r?\n/);
  const header = rows[0]?.split("\t") ?? [];
  const columnIndexes = resolveColumnIndexes(header);

  let lineIndex = -1;
  let previousLineKey: string | undefined;

  for (const row of rows.slice(1)) {
    if (row.trim().length === 0) continue;
    const cells = row.split("\t");
    const read = (column: TesseractTsvColumn): string =>
      cells[columnIndexes.get(column) ?? -1] ?? "";

    if (Number.parseInt(read("level"), 10) !== TESSERACT_WORD_LEVEL) continue;

    const lineKey = [read("page_num"), read("block_num"), read("par_num"), read("line_num")].join(":");
    if (lineKey !== previousLineKey) {
      lineIndex += 1;
      previousLineKey = lineKey;
    }

    table.text.push(read("text"));
    table.confidence.push(Math.max(0, parseNumberCell(read("conf"))));
    table.lineIndex.push(lineIndex);
    table.top.push(parseNumberCell(read("top")));
    table.left.push(parseNumberCell(read("left")));
    table.width.push(parseNumberCell(read("width")));
    table.height.push(parseNumberCell(read("height")));
  }

  return table;
}

function resolveColumnIndexes(header: string[]): Map<TesseractTsvColumn, number> {
  const trimmed = header.map((cell) => cell.trim());
  const indexes = new Map<TesseractTsvColumn, number>();
  for (const column of TESSERACT_TSV_COLUMNS) {
    const index = trimmed.indexOf(column);
    if (index === -1) {
      throw new Error(`Malformed tesseract TSV output: missing "${column}" column.`);
    }
    indexes.set(column, index);
  }
  return indexes;
}

function parseNumberCell(cell: string): number {
  const value = Number.parseFloat(cell);
  return Number.isFinite(value) ? value : 0;
}
