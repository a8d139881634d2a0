import type { Worksheet } from 'exceljs';
import { CURRENT_LAYOUT, DATE_NUM_FMT, FIELD_FORMATS, LEGACY_LAYOUT, QUOTE_FIELDS, columnCount, columnOf, type LedgerLayout } from './layout';
import { readLedgerDate } from './cells';

const LEGACY_STATUS_RE = /^(ok|erro)\s/i;
const HEADER_ROWS = [1, 2] as const;
const STATUS_TIMESTAMP_NUM_FMT = 'dd/mm/yyyy hh:mm:ss';

export interface MigrationReport {
  /** Linhas cuja situacao saiu da coluna de log antiga */
  movedRows: number[];
}

/** Limpa e regrava as duas linhas de cabecalho, congela o topo e liga o auto-filtro. */
export function applyHeaderLayout(sheet: Worksheet, layout: LedgerLayout = CURRENT_LAYOUT): void {
  const lastColumn = Math.max(columnCount(layout), sheet.columnCount);
  for (const rowNumber of HEADER_ROWS) {
    for (let col = 1; col <= lastColumn; col++) {
      sheet.getCell(rowNumber, col).value = null;
    }
  }

  for (const [col, title] of layout.superHeaders) {
    const cell = sheet.getCell(1, col);
    cell.value = title;
    cell.font = { bold: true };
  }
  layout.headers.forEach((title, index) => {
    const cell = sheet.getCell(2, index + 1);
    cell.value = title;
    cell.font = { bold: true };
  });

  sheet.getColumn(layout.dateColumn).numFmt = DATE_NUM_FMT;
  sheet.getColumn(layout.dateColumn).width = 12;
  for (const field of QUOTE_FIELDS) {
    const col = columnOf(layout, field);
    if (col !== null) sheet.getColumn(col).width = 10;
  }
  for (const field of ['tjlp', 'selic', 'cdi'] as const) {
    const col = columnOf(layout, field);
    if (col === null) continue;
    sheet.getColumn(col).numFmt = FIELD_FORMATS[field].numFmt;
    sheet.getColumn(col).width = field === 'cdi' ? 14 : 10;
  }
  const statusCol = columnOf(layout, 'status');
  if (statusCol !== null) sheet.getColumn(statusCol).width = 48;

  sheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 2 }];
  sheet.autoFilter = { from: { row: 2, column: 1 }, to: { row: 2, column: columnCount(layout) } };
}

function isLegacyStatus(value: unknown): boolean {
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  return typeof value === 'string' && LEGACY_STATUS_RE.test(value.trim());
}

function isBlankCell(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Move a situacao gravada na coluna de log antiga para a coluna atual,
 * apenas quando a coluna atual esta vazia.
 */
export function migrateLegacyStatus(
  sheet: Worksheet,
  current: LedgerLayout = CURRENT_LAYOUT,
  legacy: LedgerLayout = LEGACY_LAYOUT
): number[] {
  const fromCol = columnOf(legacy, 'status');
  const toCol = columnOf(current, 'status');
  if (fromCol === null || toCol === null || fromCol === toCol) return [];

  const moved: number[] = [];
  for (let rowNumber = current.firstDataRow; rowNumber <= sheet.rowCount; rowNumber++) {
    if (!readLedgerDate(sheet.getCell(rowNumber, current.dateColumn).value)) continue;
    const source = sheet.getCell(rowNumber, fromCol);
    const target = sheet.getCell(rowNumber, toCol);
    if (!isLegacyStatus(source.value) || !isBlankCell(target.value)) continue;
    target.value = source.value;
    if (source.value instanceof Date) target.numFmt = STATUS_TIMESTAMP_NUM_FMT;
    source.value = null;
    source.numFmt = FIELD_FORMATS.tjlp.numFmt;
    moved.push(rowNumber);
  }
  return moved;
}

export function migrateLedgerSheet(sheet: Worksheet, layout: LedgerLayout = CURRENT_LAYOUT): MigrationReport {
  applyHeaderLayout(sheet, layout);
  return { movedRows: migrateLegacyStatus(sheet, layout) };
}
