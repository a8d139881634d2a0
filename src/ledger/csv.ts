import fs from 'node:fs';
import path from 'node:path';
import Decimal from 'decimal.js';
import { ParseError } from '../errors';
import { formatPtBrDecimal, formatPtBrPercent, toDecimal } from '../parsers/decimal';
import type { LedgerValue } from '../types';
import { brFromIso, formatUtcTimestampBr } from '../utils/time';
import { CSV_HEADER, FIELD_FORMATS, LEDGER_FIELDS, type NumericField } from './layout';
import { findLastUpdatedRow, type LedgerRow } from './snapshot';
import { readLedgerSnapshot } from './workbook';

export const CSV_DELIMITER = ';';
const CSV_DATE_RE = /^\d{2}\/\d{2}\/\d{4}$/;

function formatNumericCell(field: NumericField, value: LedgerValue): string {
  if (value === null || value instanceof Date) return '';
  let number: Decimal | null;
  try {
    number = toDecimal(value);
  } catch (err) {
    if (err instanceof ParseError && typeof value === 'string') return value.trim();
    throw err;
  }
  if (!number) return '';
  const format = FIELD_FORMATS[field];
  if (format.kind === 'percent') return formatPtBrPercent(number, 4);
  return formatPtBrDecimal(number, format.digits);
}

function formatCsvStatus(value: LedgerValue): string {
  if (value === null) return '';
  if (value instanceof Date) return `OK ${formatUtcTimestampBr(value)}`;
  if (Decimal.isDecimal(value)) return value.toString();
  return value.trim();
}

/** Linha do CSV: data, cotacoes, juros e situacao. */
export function formatCsvRow(row: LedgerRow): string[] {
  if (!row.date) throw new Error(`LEDGER_ROW_WITHOUT_DATE:${row.row_index}`);
  const values = [brFromIso(row.date)];
  for (const field of LEDGER_FIELDS) {
    values.push(field === 'status' ? formatCsvStatus(row.cells.status) : formatNumericCell(field, row.cells[field]));
  }
  return values;
}

export function decodeCsv(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch (err) {
    if (err instanceof TypeError) return buffer.toString('latin1');
    throw err;
  }
}

export function parseCsv(text: string, delimiter: string = CSV_DELIMITER): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"' && field === '') quoted = true;
    else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else if (ch === '\n') endRow();
    else field += ch;
  }
  if (field !== '' || row.length > 0) endRow();
  return rows;
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(rows: readonly (readonly string[])[], delimiter: string = CSV_DELIMITER): string {
  return rows.map((row) => `${row.map((value) => quoteField(value, delimiter)).join(delimiter)}\r\n`).join('');
}

/**
 * Substitui a linha da mesma data ou acrescenta no fim. Cabecalhos
 * existentes sao mantidos; sem nenhum, entra o cabecalho padrao.
 */
export function mergeCsvRows(existing: readonly string[][], dataRow: string[]): string[][] {
  if (existing.length === 0 || existing.every((row) => row.length <= 1)) {
    return [[...CSV_HEADER], dataRow];
  }

  const headerRows: string[][] = [];
  const dataRows: string[][] = [];
  for (const row of existing) {
    if (CSV_DATE_RE.test(row[0] ?? '')) dataRows.push(row);
    else headerRows.push(row);
  }
  if (headerRows.length === 0) headerRows.push([...CSV_HEADER]);

  let replaced = false;
  const merged = dataRows.map((row) => {
    if (row[0] !== dataRow[0]) return row;
    replaced = true;
    return dataRow;
  });
  if (!replaced) merged.push(dataRow);
  return [...headerRows, ...merged];
}

export async function readCsvRows(csvPath: string): Promise<string[][]> {
  if (!fs.existsSync(csvPath)) return [];
  const buffer = await fs.promises.readFile(csvPath);
  return parseCsv(decodeCsv(buffer));
}

/** Regrava o CSV a partir da ultima linha atualizada da planilha. */
export async function regenerateCsvRow(ledgerPath: string, csvPath: string): Promise<{ date: string; row: string[] }> {
  const snapshot = await readLedgerSnapshot(ledgerPath);
  const ledgerRow = findLastUpdatedRow(snapshot);
  if (!ledgerRow) throw new Error(`LEDGER_WITHOUT_DATED_ROWS:${ledgerPath}`);

  const dataRow = formatCsvRow(ledgerRow);
  const rows = mergeCsvRows(await readCsvRows(csvPath), dataRow);
  await fs.promises.mkdir(path.dirname(csvPath), { recursive: true });
  await fs.promises.writeFile(csvPath, stringifyCsv(rows), 'utf8');
  return { date: dataRow[0] ?? '', row: dataRow };
}
