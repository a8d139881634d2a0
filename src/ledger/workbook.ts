import fs from 'node:fs';
import path from 'node:path';
import { Workbook, type Worksheet } from 'exceljs';
import { LedgerNotFoundError } from '../errors';
import type { SourceKey } from '../types';
import { readLedgerDate, toLedgerValue, writeLedgerDate, writeLedgerValue } from './cells';
import { CURRENT_LAYOUT, LEDGER_FIELDS, columnOf, type LedgerLayout } from './layout';
import { migrateLedgerSheet, type MigrationReport } from './migration';
import { diffSnapshots, emptyCells, readFilledSourcesFromSnapshot, type LedgerCells, type LedgerRow, type LedgerSnapshot } from './snapshot';
import { applyLedgerUpdate, type LedgerUpdateInput, type LedgerUpdateResult } from './update';

export const LEDGER_SHEET_NAME = 'Cotacoes';

interface OpenLedger {
  workbook: Workbook;
  sheet: Worksheet;
}

export function assertLedgerExists(filePath: string): void {
  if (!fs.existsSync(filePath)) throw new LedgerNotFoundError(filePath);
}

async function openLedger(filePath: string): Promise<OpenLedger> {
  assertLedgerExists(filePath);
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);
  const sheet = workbook.worksheets[0] ?? workbook.addWorksheet(LEDGER_SHEET_NAME);
  return { workbook, sheet };
}

export function readSnapshot(sheet: Worksheet, layout: LedgerLayout = CURRENT_LAYOUT): LedgerSnapshot {
  const rows: LedgerRow[] = [];
  for (let rowNumber = layout.firstDataRow; rowNumber <= sheet.rowCount; rowNumber++) {
    const cells: { -readonly [F in keyof LedgerCells]: LedgerCells[F] } = emptyCells();
    for (const field of LEDGER_FIELDS) {
      const col = columnOf(layout, field);
      if (col !== null) cells[field] = toLedgerValue(sheet.getCell(rowNumber, col).value);
    }
    const date = readLedgerDate(sheet.getCell(rowNumber, layout.dateColumn).value);
    rows.push({ row_index: rowNumber, date, cells });
  }
  return { rows, firstDataRow: layout.firstDataRow };
}

/** Grava apenas as linhas e celulas que mudaram entre os dois snapshots. */
export function writeSnapshotChanges(
  sheet: Worksheet,
  before: LedgerSnapshot,
  after: LedgerSnapshot,
  layout: LedgerLayout = CURRENT_LAYOUT
): number {
  let written = 0;
  for (const diff of diffSnapshots(before, after)) {
    if (diff.date) writeLedgerDate(sheet.getCell(diff.row_index, layout.dateColumn), diff.date);
    for (const change of diff.changes) {
      const col = columnOf(layout, change.field);
      if (col === null) continue;
      writeLedgerValue(sheet.getCell(change.row_index, col), change.field, change.value);
      written++;
    }
  }
  return written;
}

export async function readLedgerSnapshot(filePath: string, layout: LedgerLayout = CURRENT_LAYOUT): Promise<LedgerSnapshot> {
  const { sheet } = await openLedger(filePath);
  migrateLedgerSheet(sheet, layout);
  return readSnapshot(sheet, layout);
}

export async function readFilledSources(filePath: string, dateIso: string): Promise<Record<SourceKey, boolean>> {
  const snapshot = await readLedgerSnapshot(filePath);
  return readFilledSourcesFromSnapshot(snapshot, dateIso);
}

/** Carrega, migra, aplica a coleta e salva uma unica vez. */
export async function updateLedgerFile(
  filePath: string,
  input: LedgerUpdateInput,
  layout: LedgerLayout = CURRENT_LAYOUT
): Promise<LedgerUpdateResult & { migration: MigrationReport }> {
  const { workbook, sheet } = await openLedger(filePath);
  const migration = migrateLedgerSheet(sheet, layout);
  const before = readSnapshot(sheet, layout);
  const result = applyLedgerUpdate(before, input);
  writeSnapshotChanges(sheet, before, result.snapshot, layout);
  await workbook.xlsx.writeFile(filePath);
  return { ...result, migration };
}

export async function normalizeLedgerLayout(filePath: string, layout: LedgerLayout = CURRENT_LAYOUT): Promise<MigrationReport> {
  const { workbook, sheet } = await openLedger(filePath);
  const report = migrateLedgerSheet(sheet, layout);
  await workbook.xlsx.writeFile(filePath);
  return report;
}

/** Cria uma planilha vazia com o layout atual. Nao sobrescreve arquivo existente. */
export async function createLedgerFile(filePath: string, layout: LedgerLayout = CURRENT_LAYOUT): Promise<boolean> {
  if (fs.existsSync(filePath)) return false;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(LEDGER_SHEET_NAME);
  migrateLedgerSheet(sheet, layout);
  await workbook.xlsx.writeFile(filePath);
  return true;
}
