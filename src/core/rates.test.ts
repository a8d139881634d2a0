import test from 'node:test';
import assert from 'node:assert/strict';
import Decimal from 'decimal.js';
import { calculateCdiDailyPercent, parsePercentText, percentToFraction } from './rates';
import { ParseError } from '../errors';

test('calculateCdiDailyPercent converte SELIC anual em CDI diario com 10 casas', () => {
  assert.equal(calculateCdiDailyPercent(new Decimal('15.00')).toFixed(10), '0.0551310642');
  assert.equal(calculateCdiDailyPercent(new Decimal('10.50')).toFixed(10), '0.0392695926');
});

test('calculateCdiDailyPercent rejeita valor final nao positivo', () => {
  assert.throws(() => calculateCdiDailyPercent(new Decimal('-100')), RangeError);
});

test('parsePercentText extrai o numero antes do simbolo de percentual', () => {
  assert.equal(parsePercentText('TJLP\n 8,96% a.a.').toString(), '8.96');
  assert.equal(parsePercentText('15,00').toString(), '15');
  assert.throws(() => parsePercentText('sem valor'), ParseError);
});

test('percentToFraction divide por 100', () => {
  assert.equal(percentToFraction(new Decimal('8.96')).toString(), '0.0896');
});
