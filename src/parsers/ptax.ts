import Decimal from 'decimal.js';
import type { InterestRateQuote, PtaxQuote } from '../types';
import { ParseError } from '../errors';
import { brFromIso, coerceIsoDate } from '../utils/time';
import { parsePercentText } from '../core/rates';

export const OLINDA_PTAX_BASE = 'https://olinda.bcb.gov.br/olinda/servico/PTAX/versao/v1/odata';
export const SGS_SELIC_URL = 'https://api.bcb.gov.br/dados/serie/bcdata.sgs.432/dados/ultimos/1?formato=json';

export type PtaxCurrency = 'USD' | 'EUR' | 'CHF';

export const PTAX_SYMBOLS: { readonly [C in PtaxCurrency]: string } = {
  USD: 'USD/BRL PTAX',
  EUR: 'EUR/BRL PTAX',
  CHF: 'CHF/BRL PTAX',
};

interface PtaxBulletin {
  cotacaoCompra: number;
  cotacaoVenda: number;
  dataHoraCotacao: string;
  tipoBoletim: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Data no formato MM-DD-AAAA usado pela API Olinda. */
export function buildPtaxUrl(currency: PtaxCurrency, dateIso: string): string {
  const [year, month, day] = dateIso.split('-');
  const params = [
    `@moeda='${currency}'`,
    `@dataCotacao='${month}-${day}-${year}'`,
    '$format=json',
    '$select=cotacaoCompra,cotacaoVenda,dataHoraCotacao,tipoBoletim',
  ];
  return `${OLINDA_PTAX_BASE}/CotacaoMoedaDia(moeda=@moeda,dataCotacao=@dataCotacao)?${params.join('&')}`;
}

function toBulletin(item: unknown): PtaxBulletin | null {
  if (!isRecord(item)) return null;
  const { cotacaoCompra, cotacaoVenda, dataHoraCotacao, tipoBoletim } = item;
  if (typeof cotacaoCompra !== 'number' || typeof cotacaoVenda !== 'number') return null;
  if (typeof dataHoraCotacao !== 'string' || typeof tipoBoletim !== 'string') return null;
  return { cotacaoCompra, cotacaoVenda, dataHoraCotacao, tipoBoletim };
}

/**
 * Seleciona o boletim de fechamento da data pedida. Os boletins de abertura e
 * intermediarios nao valem como PTAX do dia.
 */
export function parsePtaxBulletins(
  payload: unknown,
  currency: PtaxCurrency,
  dateIso: string,
  collectedAt: Date
): PtaxQuote {
  const items = isRecord(payload) ? payload.value : undefined;
  if (!Array.isArray(items)) {
    throw new ParseError(`resposta PTAX sem lista de boletins (${currency})`);
  }

  const bulletins = items.map(toBulletin).filter((b): b is PtaxBulletin => b !== null);
  const closing = bulletins.filter((b) => /^fechamento/i.test(b.tipoBoletim.trim()));
  const chosen = closing[closing.length - 1];
  if (!chosen) {
    const last = bulletins[bulletins.length - 1];
    const suffix = last ? `; ultimo boletim: ${last.tipoBoletim} ${last.dataHoraCotacao}` : '';
    throw new ParseError(`cotacao PTAX nao disponivel para ${brFromIso(dateIso)} (${currency})${suffix}`);
  }

  const buyRaw = String(chosen.cotacaoCompra);
  const sellRaw = String(chosen.cotacaoVenda);
  return {
    symbol: PTAX_SYMBOLS[currency],
    buy: new Decimal(buyRaw),
    sell: new Decimal(sellRaw),
    buy_raw: buyRaw,
    sell_raw: sellRaw,
    collected_at: collectedAt,
  };
}

/** Serie SGS 432 (meta SELIC): `[{ "data": "dd/mm/aaaa", "valor": "15.00" }]`. */
export function parseSelicSeries(payload: unknown, collectedAt: Date): InterestRateQuote {
  const last: unknown = Array.isArray(payload) ? payload[payload.length - 1] : undefined;
  const valor = isRecord(last) ? last.valor : undefined;
  const data = isRecord(last) ? last.data : undefined;
  if (typeof valor !== 'string' || typeof data !== 'string') {
    throw new ParseError('nao encontrou valor atual da SELIC');
  }

  const referenceDate = coerceIsoDate(data);
  if (!referenceDate) throw new ParseError(`data da SELIC invalida: ${JSON.stringify(data)}`);

  return {
    name: 'SELIC',
    value: parsePercentText(`${valor}%`),
    value_raw: valor,
    reference_date: referenceDate,
    collected_at: collectedAt,
  };
}
