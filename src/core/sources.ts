import type { LedgerField, SourceKey } from '../types';

export type WindowGroup = 'morning' | 'afternoon';

export interface SourceDescriptor {
  key: SourceKey;
  label: string;
  required_fields: readonly LedgerField[];
  window_group: WindowGroup;
}

// Ordem usada na selecao, nos logs e no resumo final.
export const SOURCE_KEYS: readonly SourceKey[] = ['official', 'tourism', 'ptax_usd', 'ptax_eur', 'ptax_chf', 'tjlp', 'selic'];

export const SOURCES: { readonly [K in SourceKey]: SourceDescriptor } = {
  official: {
    key: 'official',
    label: 'USD/BRL (Investing)',
    required_fields: ['official_buy', 'official_sell'],
    window_group: 'morning',
  },
  tourism: {
    key: 'tourism',
    label: 'Dolar Turismo (Valor)',
    required_fields: ['tourism_buy', 'tourism_sell'],
    window_group: 'morning',
  },
  ptax_usd: {
    key: 'ptax_usd',
    label: 'PTAX USD',
    required_fields: ['ptax_usd_buy', 'ptax_usd_sell'],
    window_group: 'afternoon',
  },
  ptax_eur: {
    key: 'ptax_eur',
    label: 'PTAX EUR',
    required_fields: ['ptax_eur_buy', 'ptax_eur_sell'],
    window_group: 'afternoon',
  },
  ptax_chf: {
    key: 'ptax_chf',
    label: 'PTAX CHF',
    required_fields: ['ptax_chf_buy', 'ptax_chf_sell'],
    window_group: 'afternoon',
  },
  tjlp: {
    key: 'tjlp',
    label: 'TJLP (BNDES)',
    required_fields: ['tjlp'],
    window_group: 'morning',
  },
  selic: {
    key: 'selic',
    label: 'SELIC (BCB)',
    required_fields: ['selic', 'cdi'],
    window_group: 'morning',
  },
};

export function emptyFilledSources(): Record<SourceKey, boolean> {
  return {
    official: false,
    tourism: false,
    ptax_usd: false,
    ptax_eur: false,
    ptax_chf: false,
    tjlp: false,
    selic: false,
  };
}
