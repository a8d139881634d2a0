import type { LedgerField } from '../types';

export type NumericField = Exclude<LedgerField, 'status'>;

export interface FieldFormat {
  digits: number;
  numFmt: string;
  kind: 'quote' | 'percent' | 'daily_rate';
}

export interface LedgerLayout {
  readonly name: 'current' | 'legacy';
  readonly firstDataRow: number;
  readonly dateColumn: number;
  readonly fieldColumns: { readonly [F in LedgerField]?: number };
  /** Linha 1: [coluna, titulo do grupo] */
  readonly superHeaders: readonly (readonly [number, string])[];
  /** Linha 2, a partir da coluna A */
  readonly headers: readonly string[];
}

export const DATE_NUM_FMT = 'dd/mm/yyyy';

export const QUOTE_FIELDS: readonly NumericField[] = [
  'official_buy',
  'official_sell',
  'ptax_usd_buy',
  'ptax_usd_sell',
  'tourism_buy',
  'tourism_sell',
  'ptax_eur_buy',
  'ptax_eur_sell',
  'ptax_chf_buy',
  'ptax_chf_sell',
];

export const RATE_FIELDS: readonly NumericField[] = ['tjlp', 'selic', 'cdi'];

/** Ordem das colunas B..O do layout atual. */
export const LEDGER_FIELDS: readonly LedgerField[] = [...QUOTE_FIELDS, ...RATE_FIELDS, 'status'];

const QUOTE_FORMAT: FieldFormat = { digits: 4, numFmt: '0.0000', kind: 'quote' };
const PERCENT_FORMAT: FieldFormat = { digits: 6, numFmt: '0.0000%', kind: 'percent' };

export const FIELD_FORMATS: { readonly [F in NumericField]: FieldFormat } = {
  official_buy: QUOTE_FORMAT,
  official_sell: QUOTE_FORMAT,
  ptax_usd_buy: QUOTE_FORMAT,
  ptax_usd_sell: QUOTE_FORMAT,
  tourism_buy: QUOTE_FORMAT,
  tourism_sell: QUOTE_FORMAT,
  ptax_eur_buy: QUOTE_FORMAT,
  ptax_eur_sell: QUOTE_FORMAT,
  ptax_chf_buy: QUOTE_FORMAT,
  ptax_chf_sell: QUOTE_FORMAT,
  tjlp: PERCENT_FORMAT,
  selic: PERCENT_FORMAT,
  cdi: { digits: 10, numFmt: '0.0000000000', kind: 'daily_rate' },
};

function columnsInOrder(fields: readonly LedgerField[]): { [F in LedgerField]?: number } {
  const columns: { [F in LedgerField]?: number } = {};
  fields.forEach((field, index) => {
    columns[field] = index + 2;
  });
  return columns;
}

export const CURRENT_LAYOUT: LedgerLayout = {
  name: 'current',
  firstDataRow: 3,
  dateColumn: 1,
  fieldColumns: columnsInOrder(LEDGER_FIELDS),
  superHeaders: [
    [1, 'Data'],
    [2, 'Dolar Oficial'],
    [4, 'Dolar PTAX'],
    [6, 'Dolar Turismo'],
    [8, 'Euro PTAX'],
    [10, 'CHF PTAX'],
    [12, 'Juros'],
    [15, 'Situacao'],
  ],
  headers: [
    'Data',
    'Compra',
    'Venda',
    'Compra',
    'Venda',
    'Compra',
    'Venda',
    'Compra',
    'Venda',
    'Compra',
    'Venda',
    'TJLP',
    'SELIC',
    'CDI',
    'Situacao',
  ],
};

// Planilhas antigas: cotacoes em B..K e log combinado em L.
export const LEGACY_LAYOUT: LedgerLayout = {
  name: 'legacy',
  firstDataRow: 3,
  dateColumn: 1,
  fieldColumns: { ...columnsInOrder(QUOTE_FIELDS), status: 12 },
  superHeaders: CURRENT_LAYOUT.superHeaders.slice(0, 6),
  headers: [...CURRENT_LAYOUT.headers.slice(0, 11), 'Log'],
};

export function columnOf(layout: LedgerLayout, field: LedgerField): number | null {
  return layout.fieldColumns[field] ?? null;
}

export function columnCount(layout: LedgerLayout): number {
  return layout.headers.length;
}

export const CSV_HEADER: readonly string[] = [
  'Data',
  'Dolar Oficial Compra',
  'Dolar Oficial Venda',
  'Dolar PTAX Compra',
  'Dolar PTAX Venda',
  'Dolar Turismo Compra',
  'Dolar Turismo Venda',
  'Euro PTAX Compra',
  'Euro PTAX Venda',
  'CHF PTAX Compra',
  'CHF PTAX Venda',
  'TJLP',
  'SELIC',
  'CDI',
  'Situacao',
];
