import type { BidAskQuote, InterestRateQuote, Quote } from '../types';
import { ParseError } from '../errors';
import { parsePercentText } from '../core/rates';
import { parsePtBrDecimal } from './decimal';
import { ensurePageConsistency, loadPage, urlContains, type LoadedPage } from './page-consistency';

export const INVESTING_PRICE_SELECTOR = '[data-test="instrument-price-last"]';
const TOURISM_ROW_RE = /D.lar Turismo/i;
const HAS_DIGIT = /\d/;

function squashText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function extractUsdBrl(url: string, html: string, collectedAt: Date): Quote {
  const page = loadPage(url, html);
  const raw = page.$(INVESTING_PRICE_SELECTOR).first().text().trim();
  if (!raw) throw new ParseError('nao encontrou o valor em instrument-price-last');

  return {
    symbol: 'USD/BRL',
    value: parsePtBrDecimal(raw),
    value_raw: raw,
    collected_at: collectedAt,
  };
}

function findTourismRow(page: LoadedPage) {
  return page
    .$('tr')
    .filter((_, tr) => TOURISM_ROW_RE.test(page.$(tr).text()))
    .first();
}

export function extractTourism(url: string, html: string, collectedAt: Date): BidAskQuote {
  const page = loadPage(url, html);
  ensurePageConsistency(page, 'Valor Dolar Turismo', [
    urlContains('valor.globo.com'),
    {
      name: 'linha Dolar Turismo',
      validate: (p) => [findTourismRow(p).length > 0, 'linha de Dolar Turismo nao encontrada'],
    },
  ]);

  const cells = findTourismRow(page).find('td');
  if (cells.length < 3) throw new ParseError('linha de Dolar Turismo incompleta');
  const buyRaw = squashText(cells.eq(1).text());
  const sellRaw = squashText(cells.eq(2).text());
  if (!HAS_DIGIT.test(buyRaw) || !HAS_DIGIT.test(sellRaw)) {
    throw new ParseError('cotacao de Dolar Turismo nao atualizada no Valor');
  }

  return {
    symbol: 'USD/BRL Turismo',
    buy: parsePtBrDecimal(buyRaw),
    sell: parsePtBrDecimal(sellRaw),
    buy_raw: buyRaw,
    sell_raw: sellRaw,
    collected_at: collectedAt,
  };
}

function findTjlpBlock(page: LoadedPage) {
  return page
    .$('div.valor')
    .filter((_, div) => page.$(div).text().includes('%'))
    .first();
}

export function extractTjlp(url: string, html: string, collectedAt: Date): InterestRateQuote {
  const page = loadPage(url, html);
  ensurePageConsistency(page, 'BNDES TJLP', [
    urlContains('bndes.gov.br'),
    {
      name: 'seletor de valor',
      validate: (p) => [findTjlpBlock(p).length > 0, 'nao encontrou bloco com percentual da TJLP'],
    },
  ]);

  const raw = squashText(findTjlpBlock(page).text());
  return {
    name: 'TJLP',
    value: parsePercentText(raw),
    value_raw: raw,
    reference_date: null,
    collected_at: collectedAt,
  };
}
