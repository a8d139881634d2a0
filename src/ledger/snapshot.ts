import Decimal from 'decimal.js';
import { SOURCES, SOURCE_KEYS } from '../core/sources';
import type { LedgerField, LedgerValue, SourceKey } from '../types';
import { LEDGER_FIELDS } from './layout';

export type LedgerCells = { readonly [F in LedgerField]: LedgerValue };

export interface LedgerRow {
  readonly row_index: number;
  /** yyyy-mm-dd */
  readonly date: string | null;
  readonly cells: LedgerCells;
}

export interface LedgerSnapshot {
  readonly rows: readonly LedgerRow[];
  readonly firstDataRow: number;
}

export function emptyCells(): LedgerCells {
  return {
    official_buy: null,
    official_sell: null,
    ptax_usd_buy: null,
    ptax_usd_sell: null,
    tourism_buy: null,
    tourism_sell: null,
    ptax_eur_buy: null,
    ptax_eur_sell: null,
    ptax_chf_buy: null,
    ptax_chf_sell: null,
    tjlp: null,
    selic: null,
    cdi: null,
    status: null,
  };
}

export function isBlank(value: LedgerValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

export function findRowByDate(snapshot: LedgerSnapshot, dateIso: string): LedgerRow | null {
  return snapshot.rows.find((row) => row.date === dateIso) ?? null;
}

export function findLastDatedRow(snapshot: LedgerSnapshot): LedgerRow | null {
  let last: LedgerRow | null = null;
  for (const row of snapshot.rows) {
    if (row.date) last = row;
  }
  return last;
}

/** Ultima linha com data e situacao preenchida; sem situacao, a ultima linha com data. */
export function findLastUpdatedRow(snapshot: LedgerSnapshot): LedgerRow | null {
  let lastLogged: LedgerRow | null = null;
  for (const row of snapshot.rows) {
    if (row.date && !isBlank(row.cells.status)) lastLogged = row;
  }
  return lastLogged ?? findLastDatedRow(snapshot);
}

export function isSourceFilled(row: LedgerRow, key: SourceKey): boolean {
  return SOURCES[key].required_fields.every((field) => !isBlank(row.cells[field]));
}

export function readFilledSourcesFromSnapshot(snapshot: LedgerSnapshot, dateIso: string): Record<SourceKey, boolean> {
  const row = findRowByDate(snapshot, dateIso);
  const filled: Record<SourceKey, boolean> = {
    official: false,
    tourism: false,
    ptax_usd: false,
    ptax_eur: false,
    ptax_chf: false,
    tjlp: false,
    selic: false,
  };
  if (!row) return filled;
  for (const key of SOURCE_KEYS) filled[key] = isSourceFilled(row, key);
  return filled;
}

function sameValue(a: LedgerValue, b: LedgerValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (Decimal.isDecimal(a) && Decimal.isDecimal(b)) return a.equals(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return false;
}

export interface CellChange {
  row_index: number;
  field: LedgerField;
  value: LedgerValue;
}

export interface RowDiff {
  row_index: number;
  date: string | null;
  dateChanged: boolean;
  changes: CellChange[];
}

/**
 * Compara dois snapshots. Linhas identicas por referencia sao ignoradas;
 * as demais geram apenas as celulas alteradas.
 */
export function diffSnapshots(before: LedgerSnapshot, after: LedgerSnapshot): RowDiff[] {
  const previous = new Map<number, LedgerRow>();
  for (const row of before.rows) previous.set(row.row_index, row);

  const diffs: RowDiff[] = [];
  for (const row of after.rows) {
    const old = previous.get(row.row_index);
    if (old === row) continue;
    const changes: CellChange[] = [];
    for (const field of LEDGER_FIELDS) {
      const value = row.cells[field];
      if (!old || !sameValue(old.cells[field], value)) {
        changes.push({ row_index: row.row_index, field, value });
      }
    }
    diffs.push({ row_index: row.row_index, date: row.date, dateChanged: !old || old.date !== row.date, changes });
  }
  return diffs;
}
