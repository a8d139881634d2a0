import type Decimal from 'decimal.js';

export interface Quote {
  readonly symbol: string;
  readonly value: Decimal;
  readonly value_raw: string;
  readonly collected_at: Date;
}

export interface BidAskQuote {
  readonly symbol: string;
  readonly buy: Decimal;
  readonly sell: Decimal;
  readonly buy_raw: string;
  readonly sell_raw: string;
  readonly collected_at: Date;
}

export type PtaxQuote = BidAskQuote;

export interface InterestRateQuote {
  readonly name: string;
  /** Percentual anual, ex.: 15.00 para 15% */
  readonly value: Decimal;
  readonly value_raw: string;
  readonly reference_date: string | null;
  readonly collected_at: Date;
}

export type SourceKey = 'official' | 'tourism' | 'ptax_usd' | 'ptax_eur' | 'ptax_chf' | 'tjlp' | 'selic';

export interface SourceValueMap {
  official: Quote;
  tourism: BidAskQuote;
  ptax_usd: PtaxQuote;
  ptax_eur: PtaxQuote;
  ptax_chf: PtaxQuote;
  tjlp: InterestRateQuote;
  selic: InterestRateQuote;
}

export type SourceFetchers = { [K in SourceKey]: () => Promise<SourceValueMap[K]> };

export type LedgerField =
  | 'official_buy'
  | 'official_sell'
  | 'ptax_usd_buy'
  | 'ptax_usd_sell'
  | 'tourism_buy'
  | 'tourism_sell'
  | 'ptax_eur_buy'
  | 'ptax_eur_sell'
  | 'ptax_chf_buy'
  | 'ptax_chf_sell'
  | 'tjlp'
  | 'selic'
  | 'cdi'
  | 'status';

export type LedgerValue = Decimal | string | Date | null;

export interface FetchOutcome<K extends SourceKey = SourceKey> {
  label: string;
  value: SourceValueMap[K] | null;
  error: string | null;
  elapsed_ms: number;
  skipped: boolean;
  skip_reason: SkipReason | null;
}

export type SkipReason = 'outside window (after 08:30)' | 'outside window (before 13:10)' | 'already filled for today';

export type FetchOutcomes = { [K in SourceKey]?: FetchOutcome<K> };
