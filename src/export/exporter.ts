import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import JSZip from 'jszip';
import { toCellText } from '../normalize/normalizer.js';
import { OUTPUT_COLUMNS } from '../types.js';
import type { DelimitedTable, NormalizedRecord, RawTable } from '../types.js';
import { UTF8_BOM, toCsv } from '../utils/csv.js';

// Fixed entry timestamp so identical tables produce identical archives.
const ARCHIVE_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));

export interface ExportFile {
  name: string;
  bytes: Uint8Array;
}

export interface WrittenExports {
  rawPath: string;
  normalizedPath: string;
  archivePath?: string;
  workbookPath?: string;
}

export interface ExportOptions {
  archive?: boolean;
  workbook?: boolean;
}

export function rawToTable(records: RawTable): DelimitedTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return {
    columns,
    rows: records.map((record) => columns.map((column) => toCellText(record[column]))),
  };
}

export function normalizedToTable(rows: NormalizedRecord[]): DelimitedTable {
  return {
    columns: [...OUTPUT_COLUMNS],
    rows: rows.map((row) => OUTPUT_COLUMNS.map((column) => row[column])),
  };
}

/** UTF-8 CSV with a leading byte-order mark so spreadsheet apps pick the right encoding. */
export function toDelimitedBytes(table: DelimitedTable): Uint8Array {
  return new TextEncoder().encode(`${UTF8_BOM}${toCsv(table)}`);
}

export async function buildExportArchive(files: ExportFile[]): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const file of files) {
    zip.file(file.name, file.bytes, { date: ARCHIVE_ENTRY_DATE, binary: true });
  }
  return zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

function addSheet(workbook: Workbook, name: string, table: DelimitedTable): void {
  const sheet = workbook.addWorksheet(name);
  sheet.addRow(table.columns);
  sheet.addRows(table.rows);
  sheet.getRow(1).font = { bold: true };
}

/** Spreadsheet with one sheet per table; every cell is written as text. */
export function buildWorkbook(raw: RawTable, normalized: NormalizedRecord[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = ARCHIVE_ENTRY_DATE;
  workbook.modified = ARCHIVE_ENTRY_DATE;
  addSheet(workbook, 'Raw', rawToTable(raw));
  addSheet(workbook, 'Normalized', normalizedToTable(normalized));
  return workbook;
}

export async function toWorkbookBytes(raw: RawTable, normalized: NormalizedRecord[]): Promise<Uint8Array> {
  return new Uint8Array(await buildWorkbook(raw, normalized).xlsx.writeBuffer());
}

export function exportFileNames(stem: string): { raw: string; normalized: string; archive: string; workbook: string } {
  return {
    raw: `${stem}_raw.csv`,
    normalized: `${stem}_normalized.csv`,
    archive: `${stem}.zip`,
    workbook: `${stem}.xlsx`,
  };
}

export async function writeExports(
  outputDir: string,
  stem: string,
  raw: RawTable,
  normalized: NormalizedRecord[],
  options: ExportOptions = {},
): Promise<WrittenExports> {
  const names = exportFileNames(stem);
  const rawBytes = toDelimitedBytes(rawToTable(raw));
  const normalizedBytes = toDelimitedBytes(normalizedToTable(normalized));

  await mkdir(outputDir, { recursive: true });
  const written: WrittenExports = {
    rawPath: join(outputDir, names.raw),
    normalizedPath: join(outputDir, names.normalized),
  };
  await writeFile(written.rawPath, rawBytes);
  await writeFile(written.normalizedPath, normalizedBytes);

  if (options.archive) {
    const archive = await buildExportArchive([
      { name: names.raw, bytes: rawBytes },
      { name: names.normalized, bytes: normalizedBytes },
    ]);
    written.archivePath = join(outputDir, names.archive);
    await writeFile(written.archivePath, archive);
  }

  if (options.workbook) {
    written.workbookPath = join(outputDir, names.workbook);
    await writeFile(written.workbookPath, await toWorkbookBytes(raw, normalized));
  }

  return written;
}
