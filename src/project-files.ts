// File boundary: dataset imports, project documents and CSV exports.
// Filesystem errors (missing file, permissions) propagate to the tool layer.

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { ExportTable, Lookup, OpResult, ProjectSnapshot, RawCell, RawTable } from './types.js';
import { failed, succeeded } from './types.js';
import { parseProjectJson, stringifyProject, type LoadResult } from './project-serializer.js';
import { uniqueNames } from './response-store.js';

const TABLE_EXTENSIONS = ['.csv', '.xlsx'];

function unsupported(path: string, expected: readonly string[]): { ok: false; code: 'UnsupportedFile'; message: string } {
  return {
    ok: false,
    code: 'UnsupportedFile',
    message: `Unsupported file "${path}". Expected ${expected.join(' or ')}`,
  };
}

/** Read a dataset: first row is the header, first column the respondent id.
 *  Repeated header names are suffixed (Q, Q_2) so every column stays addressable. */
export async function readTableFile(path: string): Promise<Lookup<RawTable>> {
  const extension = extname(path).toLowerCase();
  if (!TABLE_EXTENSIONS.includes(extension)) return unsupported(path, TABLE_EXTENSIONS);

  const grid = extension === '.csv'
    ? parseCsv(await readFile(path, 'utf-8'))
    : parseXlsx(await readFile(path));
  return { ok: true, value: toRawTable(grid) };
}

export function parseCsv(text: string): RawCell[][] {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), { skipEmptyLines: 'greedy' });
  return parsed.data.map(row => row.map(cell => (cell.trim() === '' ? null : cell)));
}

export function parseXlsx(buffer: Buffer): RawCell[][] {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) return [];
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
  return rows.map(row => row.map(toRawCell));
}

function toRawCell(cell: unknown): RawCell {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'string') return cell.trim() === '' ? null : cell;
  if (typeof cell === 'number' || typeof cell === 'boolean') return cell;
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
}

function toRawTable(grid: RawCell[][]): RawTable {
  const [header, ...rows] = grid;
  if (!header) return { columns: [], rows: [] };
  const columns = uniqueNames(header.map((cell, i) => (cell === null ? `Column_${i + 1}` : String(cell).trim())));
  return { columns, rows };
}

export async function writeProjectFile(path: string, snapshot: ProjectSnapshot): Promise<OpResult> {
  if (extname(path).toLowerCase() !== '.json') return unsupported(path, ['.json']);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, stringifyProject(snapshot) + '\n', 'utf-8');
  return succeeded(`Project saved to ${path}`);
}

/** Read and validate a saved project. An empty file is an empty document. */
export async function readProjectFile(path: string): Promise<LoadResult> {
  if (extname(path).toLowerCase() !== '.json') return unsupported(path, ['.json']);
  return parseProjectJson(await readFile(path, 'utf-8'));
}

export function exportToCsv(table: ExportTable): string {
  return Papa.unparse({
    fields: [...table.columns],
    data: table.rows.map(row => row.map(cell => cell ?? '')),
  });
}

export async function writeExportFile(path: string, table: ExportTable): Promise<OpResult> {
  if (extname(path).toLowerCase() !== '.csv') return unsupported(path, ['.csv']);
  if (table.rows.length === 0) {
    return failed('EmptyDataset', 'There is no categorized data to export');
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, exportToCsv(table) + '\n', 'utf-8');
  return succeeded(`Exported ${table.rows.length} rows to ${path}`);
}
