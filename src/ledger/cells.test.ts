import test from 'node:test';
import assert from 'node:assert/strict';
import Decimal from 'decimal.js';
import { readLedgerDate, toLedgerValue } from './cells';

test('toLedgerValue usa o resultado em cache de formulas', () => {
  const value = toLedgerValue({ formula: 'B2+0,002', result: 5.4321, date1904: false });
  assert.ok(Decimal.isDecimal(value));
  assert.equal(value.toString(), '5.4321');
});

test('toLedgerValue trata formula sem resultado como celula preenchida', () => {
  assert.equal(toLedgerValue({ formula: 'B2+C2', date1904: false }), '=B2+C2');
  assert.equal(toLedgerValue({ sharedFormula: 'D2', date1904: false }), '=D2');
});

test('toLedgerValue junta rich text e ignora vazios', () => {
  assert.equal(toLedgerValue({ richText: [{ text: 'OK ' }, { text: '09:00' }] }), 'OK 09:00');
  assert.equal(toLedgerValue(null), null);
});

test('readLedgerDate aceita serial do Excel', () => {
  assert.equal(readLedgerDate(46082), '2026-03-01');
});
