import Decimal from 'decimal.js';
import { percentToFraction } from '../core/rates';
import { quantize, toDecimal } from '../parsers/decimal';
import type { BidAskQuote, LedgerField, LedgerValue, PtaxQuote, Quote, SourceKey } from '../types';
import { DEFAULT_TIME_ZONE, getLocalTimeInfo } from '../utils/time';
import { FIELD_FORMATS, type NumericField } from './layout';
import { emptyCells, findLastDatedRow, findRowByDate, isBlank, type LedgerCells, type LedgerRow, type LedgerSnapshot } from './snapshot';

export const DEFAULT_USD_SPREAD = new Decimal('0.0020');

export type StatusTag = 'OK' | 'ERRO';

export interface LedgerUpdateInput {
  /** yyyy-mm-dd */
  target_date: string;
  official?: Quote | null;
  tourism?: BidAskQuote | null;
  ptax_usd?: PtaxQuote | null;
  ptax_eur?: PtaxQuote | null;
  ptax_chf?: PtaxQuote | null;
  /** Percentual anual (8.96 = 8,96%) */
  tjlp?: Decimal | null;
  /** Percentual anual */
  selic?: Decimal | null;
  /** Percentual diario, gravado como esta */
  cdi?: Decimal | null;
  spread?: Decimal;
  overwrite_quotes?: boolean;
  logged_at: Date;
  time_zone?: string;
  status: StatusTag;
  detail?: string | null;
}

export interface FieldWrite {
  field: LedgerField;
  kind: 'fresh' | 'repeated';
}

export type WriteReport = Partial<Record<SourceKey, FieldWrite[]>>;

export interface LedgerUpdateResult {
  snapshot: LedgerSnapshot;
  row_index: number;
  written: WriteReport;
}

type MutableCells = { -readonly [F in LedgerField]: LedgerValue };

const BID_ASK_FIELDS: readonly (readonly [SourceKey, NumericField, NumericField])[] = [
  ['tourism', 'tourism_buy', 'tourism_sell'],
  ['ptax_usd', 'ptax_usd_buy', 'ptax_usd_sell'],
  ['ptax_eur', 'ptax_eur_buy', 'ptax_eur_sell'],
  ['ptax_chf', 'ptax_chf_buy', 'ptax_chf_sell'],
];

const RATE_OWNERS: readonly (readonly [NumericField, SourceKey])[] = [
  ['tjlp', 'tjlp'],
  ['selic', 'selic'],
  ['cdi', 'selic'],
];

function formatForField(field: NumericField, value: Decimal): Decimal {
  return quantize(value, FIELD_FORMATS[field].digits);
}

export function formatStatusCell(input: Pick<LedgerUpdateInput, 'status' | 'detail' | 'logged_at' | 'time_zone'>): string {
  const timestamp = getLocalTimeInfo(input.logged_at, input.time_zone ?? DEFAULT_TIME_ZONE).timestampBr;
  const status = (input.status || 'OK').trim();
  const detail = (input.detail ?? '').split(/\s+/).filter(Boolean).join(' ');
  return detail ? `${status} ${timestamp} - ${detail}` : `${status} ${timestamp}`;
}

function bidAskFor(input: LedgerUpdateInput, key: SourceKey): BidAskQuote | null {
  if (key === 'tourism') return input.tourism ?? null;
  if (key === 'ptax_usd') return input.ptax_usd ?? null;
  if (key === 'ptax_eur') return input.ptax_eur ?? null;
  if (key === 'ptax_chf') return input.ptax_chf ?? null;
  return null;
}

/** Celulas com texto nao numerico contam como ausentes. */
function toDecimalOrNull(value: LedgerValue): Decimal | null {
  if (value instanceof Date) return null;
  try {
    return toDecimal(value);
  } catch {
    return null;
  }
}

function existingBasis(value: LedgerValue, fallback: Decimal): Decimal {
  const parsed = toDecimalOrNull(value);
  return parsed ? quantize(parsed, 4) : fallback;
}

/** Valor nao vazio mais proximo em linhas com data estritamente anterior. */
function findPreviousValue(rows: readonly LedgerRow[], targetDate: string, field: LedgerField): LedgerValue {
  const earlier = rows
    .filter((row): row is LedgerRow & { date: string } => row.date !== null && row.date < targetDate)
    .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  for (const row of earlier) {
    const value = row.cells[field];
    if (!isBlank(value)) return value;
  }
  return null;
}

/**
 * Aplica uma coleta a linha da data alvo e devolve um novo snapshot. Celulas
 * preenchidas so mudam com overwrite_quotes; a situacao e sempre regravada.
 */
export function applyLedgerUpdate(snapshot: LedgerSnapshot, input: LedgerUpdateInput): LedgerUpdateResult {
  const overwrite = input.overwrite_quotes ?? false;
  const spread = input.spread ?? DEFAULT_USD_SPREAD;

  const existing = findRowByDate(snapshot, input.target_date);
  const rowIndex = existing?.row_index ?? (findLastDatedRow(snapshot)?.row_index ?? snapshot.firstDataRow - 1) + 1;
  const baseCells: LedgerCells = existing?.cells ?? emptyCells();
  const cells: MutableCells = { ...baseCells };
  const written: WriteReport = {};

  const record = (key: SourceKey, write: FieldWrite) => {
    const list = written[key] ?? [];
    list.push(write);
    written[key] = list;
  };

  const setCell = (field: NumericField, value: Decimal, force: boolean): boolean => {
    if (!force && !isBlank(cells[field])) return false;
    cells[field] = formatForField(field, value);
    return true;
  };

  if (input.official) {
    written.official = [];
    const buy = quantize(input.official.value, 4);
    const wroteBuy = setCell('official_buy', buy, overwrite);
    if (wroteBuy) record('official', { field: 'official_buy', kind: 'fresh' });
    const basis = wroteBuy ? buy : existingBasis(baseCells.official_buy, buy);
    if (setCell('official_sell', basis.plus(spread), overwrite)) {
      record('official', { field: 'official_sell', kind: 'fresh' });
    }
  }

  for (const [key, buyField, sellField] of BID_ASK_FIELDS) {
    const quote = bidAskFor(input, key);
    if (!quote) continue;
    written[key] = [];
    if (setCell(buyField, quote.buy, overwrite)) record(key, { field: buyField, kind: 'fresh' });
    if (setCell(sellField, quote.sell, overwrite)) record(key, { field: sellField, kind: 'fresh' });
  }

  if (input.tjlp) {
    written.tjlp = [];
    if (setCell('tjlp', percentToFraction(input.tjlp), overwrite)) record('tjlp', { field: 'tjlp', kind: 'fresh' });
  }
  if (input.selic) {
    written.selic = [];
    if (setCell('selic', percentToFraction(input.selic), overwrite)) record('selic', { field: 'selic', kind: 'fresh' });
  }
  if (input.cdi) {
    const list = written.selic ?? [];
    written.selic = list;
    if (setCell('cdi', input.cdi, overwrite)) record('selic', { field: 'cdi', kind: 'fresh' });
  }

  for (const [field, owner] of RATE_OWNERS) {
    if (!isBlank(cells[field])) continue;
    const previous = findPreviousValue(snapshot.rows, input.target_date, field);
    const decimal = toDecimalOrNull(previous);
    if (!decimal) continue;
    cells[field] = formatForField(field, decimal);
    record(owner, { field, kind: 'repeated' });
  }

  cells.status = formatStatusCell(input);

  const row: LedgerRow = { row_index: rowIndex, date: input.target_date, cells };
  const rows = existing
    ? snapshot.rows.map((r) => (r === existing ? row : r))
    : [...snapshot.rows.filter((r) => r.row_index !== rowIndex), row].sort((a, b) => a.row_index - b.row_index);

  return { snapshot: { ...snapshot, rows }, row_index: rowIndex, written };
}

