import Decimal from 'decimal.js';
import { ParseError } from '../errors';
import { parsePtBrDecimal, quantize } from '../parsers/decimal';

const CDI_ANNUAL_SPREAD = new Decimal('0.10');
const CDI_BUSINESS_DAYS = 252;
export const CDI_DIGITS = 10;

const Precise = Decimal.clone({ precision: 34, rounding: Decimal.ROUND_HALF_UP });

const PERCENT_RE = /(-?\d[\d.,]*)\s*%/;

/**
 * SELIC anual (%) para CDI diario (%) em base de 252 dias uteis:
 * ((100 + selic - 0,10) / 100) ^ (1/252) - 1, em percentual.
 */
export function calculateCdiDailyPercent(selicAnnualPercent: Decimal, annualSpread: Decimal = CDI_ANNUAL_SPREAD): Decimal {
  const hundred = new Precise(100);
  const futureValue = hundred.plus(selicAnnualPercent.toString()).minus(annualSpread.toString());
  if (futureValue.lte(0)) {
    throw new RangeError('valor final invalido para calcular CDI');
  }
  const daily = futureValue.div(hundred).pow(new Precise(1).div(CDI_BUSINESS_DAYS)).minus(1).times(hundred);
  return quantize(new Decimal(daily.toString()), CDI_DIGITS);
}

/** Extrai o numero que antecede "%" ("TJLP: 8,96% a.a." -> 8.96). */
export function parsePercentText(rawText: string): Decimal {
  const text = rawText.split(/\s+/).filter(Boolean).join(' ');
  const match = text.match(PERCENT_RE);
  const candidate = match?.[1] ?? text;
  try {
    return parsePtBrDecimal(candidate);
  } catch (err) {
    throw new ParseError(`percentual invalido: ${JSON.stringify(text)}`, { cause: err });
  }
}

export function percentToFraction(percent: Decimal): Decimal {
  return percent.div(100);
}
