import { promises as fs } from "fs";
import { SampleSheetError, messageOf, sampleSheetError } from "../types/errors";
import { Result, err, ok } from "../utils/result";

export const SAMPLE_SHEET_FILE_NAME = "SampleSheet.csv";

export interface SheetRow {
  /** 1-based line number in the file. */
  line: number;
  text: string;
  cells: string[];
}

export interface SampleSheet {
  path: string;
  /** Keyed by section name without brackets, e.g. "Header", "Data". */
  sections: Map<string, SheetRow[]>;
}

export interface DataTable {
  header: SheetRow;
  /** Lower-cased column name to cell index. */
  columns: Map<string, number>;
  rows: SheetRow[];
}

function splitCells(text: string): string[] {
  const cells = text.split(",").map((cell) => cell.trim());
  while (cells.length > 0 && cells[cells.length - 1] === "") {
    cells.pop();
  }
  return cells;
}

export function parseSampleSheetText(text: string, sheetPath: string): SampleSheet {
  const sections = new Map<string, SheetRow[]>();
  let current: SheetRow[] | null = null;

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const cells = splitCells(lines[index]);
    if (cells.length === 0) continue;

    const sectionMatch = cells.length === 1 ? /^\[(.+)\]$/.exec(cells[0]) : null;
    if (sectionMatch) {
      current = [];
      sections.set(sectionMatch[1].trim(), current);
      continue;
    }
    if (current) {
      current.push({ line: index + 1, text: lines[index].trim(), cells });
    }
  }

  return { path: sheetPath, sections };
}

export async function readSampleSheet(
  sheetPath: string
): Promise<Result<SampleSheet, SampleSheetError>> {
  try {
    const text = await fs.readFile(sheetPath, "utf8");
    return ok(parseSampleSheetText(text, sheetPath));
  } catch (error) {
    return err(sampleSheetError(`Could not read sample sheet: ${messageOf(error)}`, sheetPath));
  }
}

export function dataTable(sheet: SampleSheet, section = "Data"): DataTable | null {
  const rows = sheet.sections.get(section);
  if (!rows || rows.length === 0) return null;
  const [header, ...body] = rows;
  const columns = new Map<string, number>();
  header.cells.forEach((cell, index) => columns.set(cell.toLowerCase(), index));
  return { header, columns, rows: body };
}

export function cellValue(table: DataTable, row: SheetRow, column: string): string {
  const index = table.columns.get(column.toLowerCase());
  if (index === undefined) return "";
  return row.cells[index] ?? "";
}
