import type { SourceFetchers } from '../types';
import type { HttpClient } from '../http/client';
import { extractTjlp, extractTourism, extractUsdBrl } from '../parsers/html';
import { buildPtaxUrl, parsePtaxBulletins, parseSelicSeries, SGS_SELIC_URL, type PtaxCurrency } from '../parsers/ptax';
import { getLocalTimeInfo } from '../utils/time';

export const INVESTING_USD_BRL_URL = 'https://br.investing.com/currencies/usd-brl';
export const VALOR_GLOBO_URL = 'https://valor.globo.com/';
export const BNDES_TJLP_URL =
  'https://www.bndes.gov.br/wps/portal/site/home/financiamento/guia/custos-financeiros/taxa-juros-longo-prazo-tjlp';

export interface SourceFetcherOptions {
  http: HttpClient;
  timeZone: string;
  now?: () => Date;
}

export function createSourceFetchers(opts: SourceFetcherOptions): SourceFetchers {
  const { http, timeZone } = opts;
  const now = opts.now ?? (() => new Date());

  async function fetchPtax(currency: PtaxCurrency) {
    const collectedAt = now();
    const dateIso = getLocalTimeInfo(collectedAt, timeZone).dateIso;
    const payload = await http.fetchJson(buildPtaxUrl(currency, dateIso));
    return parsePtaxBulletins(payload, currency, dateIso, collectedAt);
  }

  return {
    official: async () => {
      const html = await http.fetchText(INVESTING_USD_BRL_URL);
      return extractUsdBrl(INVESTING_USD_BRL_URL, html, now());
    },
    tourism: async () => {
      const html = await http.fetchText(VALOR_GLOBO_URL);
      return extractTourism(VALOR_GLOBO_URL, html, now());
    },
    ptax_usd: () => fetchPtax('USD'),
    ptax_eur: () => fetchPtax('EUR'),
    ptax_chf: () => fetchPtax('CHF'),
    tjlp: async () => {
      const html = await http.fetchText(BNDES_TJLP_URL);
      return extractTjlp(BNDES_TJLP_URL, html, now());
    },
    selic: async () => parseSelicSeries(await http.fetchJson(SGS_SELIC_URL), now()),
  };
}
