import Decimal from 'decimal.js';
import type { Cell, CellValue } from 'exceljs';
import type { LedgerField, LedgerValue } from '../types';
import { coerceIsoDate, dateFromIso } from '../utils/time';
import { DATE_NUM_FMT, FIELD_FORMATS } from './layout';

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;

/** Converte o valor bruto de uma celula do exceljs para o modelo da planilha. */
export function toLedgerValue(value: CellValue): LedgerValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? new Decimal(String(value)) : null;
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('result' in value && value.result !== undefined) return toLedgerValue(value.result);
  // Formula sem valor em cache conta como preenchida.
  if ('sharedFormula' in value) return `=${value.sharedFormula}`;
  if ('formula' in value) return `=${value.formula}`;
  if ('hyperlink' in value) return value.text;
  return null;
}

/** Data da coluna A como yyyy-mm-dd (Date, texto ou serial do Excel). */
export function readLedgerDate(value: CellValue): string | null {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return coerceIsoDate(new Date(EXCEL_EPOCH_MS + Math.floor(value) * DAY_MS));
  }
  const normalized = toLedgerValue(value);
  if (normalized === null || Decimal.isDecimal(normalized)) return null;
  return coerceIsoDate(normalized);
}

export function writeLedgerDate(cell: Cell, dateIso: string): void {
  cell.value = dateFromIso(dateIso);
  cell.numFmt = DATE_NUM_FMT;
}

export function writeLedgerValue(cell: Cell, field: LedgerField, value: LedgerValue): void {
  if (value === null) {
    cell.value = null;
    return;
  }
  if (Decimal.isDecimal(value)) {
    cell.value = value.toNumber();
    if (field !== 'status') cell.numFmt = FIELD_FORMATS[field].numFmt;
    return;
  }
  cell.value = value;
}
