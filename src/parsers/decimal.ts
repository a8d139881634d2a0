import Decimal from 'decimal.js';
import { ParseError } from '../errors';

const NON_NUMERIC_RE = /[^\d,.-]/g;
const NUMBER_RE = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parseia numeros no formato brasileiro ("5,2849", "5.284,90", "R$ 5,2849").
 * Sem virgula, o texto e lido como decimal com ponto ("15.00").
 */
export function parsePtBrDecimal(text: string): Decimal {
  let cleaned = String(text ?? '').replace(NON_NUMERIC_RE, '').trim();
  if (cleaned.includes(',')) {
    cleaned = cleaned.replace(/\./g, '').replace(/,/g, '.');
  }
  if (!NUMBER_RE.test(cleaned)) {
    throw new ParseError(`valor invalido: ${JSON.stringify(text)}`);
  }
  const value = new Decimal(cleaned);
  if (!value.isFinite()) {
    throw new ParseError(`valor invalido: ${JSON.stringify(text)}`);
  }
  return value;
}

export function quantize(value: Decimal, digits: number): Decimal {
  return value.toDecimalPlaces(digits, Decimal.ROUND_HALF_UP);
}

export function formatPtBrDecimal(value: Decimal, digits: number): string {
  return value.toFixed(digits, Decimal.ROUND_HALF_UP).replace('.', ',');
}

export function formatPtBrPercent(fraction: Decimal, digits: number): string {
  return `${formatPtBrDecimal(fraction.times(100), digits)}%`;
}

/** Converte valores lidos de celulas (numero, texto pt-BR ou Decimal). */
export function toDecimal(value: unknown): Decimal | null {
  if (value === null || value === undefined) return null;
  if (Decimal.isDecimal(value)) return new Decimal(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ParseError(`valor numerico invalido: ${value}`);
    return new Decimal(String(value));
  }
  if (typeof value === 'string') {
    if (!value.trim()) return null;
    return parsePtBrDecimal(value);
  }
  throw new ParseError(`valor numerico invalido: ${String(value)}`);
}

export { Decimal };
