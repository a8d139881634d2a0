import test from 'node:test';
import assert from 'node:assert/strict';
import { Decimal, formatPtBrDecimal, formatPtBrPercent, parsePtBrDecimal, quantize, toDecimal } from './decimal';
import { ParseError } from '../errors';

test('parsePtBrDecimal aceita virgula decimal, milhar com ponto e prefixo de moeda', () => {
  assert.equal(parsePtBrDecimal('5,2849').toString(), '5.2849');
  assert.equal(parsePtBrDecimal('5.284,90').toString(), '5284.9');
  assert.equal(parsePtBrDecimal('R$ 5,2849').toString(), '5.2849');
  assert.equal(parsePtBrDecimal('15.00').toString(), '15');
  assert.equal(parsePtBrDecimal(' -0,5 %').toString(), '-0.5');
});

test('parsePtBrDecimal rejeita texto sem numero valido', () => {
  assert.throws(() => parsePtBrDecimal(''), ParseError);
  assert.throws(() => parsePtBrDecimal('R$ --'), ParseError);
  assert.throws(() => parsePtBrDecimal('1.2.3'), ParseError);
  assert.throws(() => parsePtBrDecimal('indisponivel'), ParseError);
});

test('formatPtBrDecimal arredonda half-up e usa virgula', () => {
  assert.equal(formatPtBrDecimal(new Decimal('5.28485'), 4), '5,2849');
  assert.equal(formatPtBrDecimal(new Decimal('5.28484'), 4), '5,2848');
  assert.equal(formatPtBrDecimal(new Decimal('5'), 4), '5,0000');
  assert.equal(formatPtBrPercent(new Decimal('0.15'), 4), '15,0000%');
  assert.equal(quantize(new Decimal('0.00005'), 4).toString(), '0.0001');
});

test('formatPtBrDecimal(parsePtBrDecimal(t)) preserva o valor na precisao configurada', () => {
  for (const text of ['5,2849', '1.234,5000', 'R$ 0,0001', '7,1']) {
    const parsed = parsePtBrDecimal(text);
    const rendered = formatPtBrDecimal(parsed, 4);
    assert.ok(parsePtBrDecimal(rendered).equals(quantize(parsed, 4)), text);
  }
});

test('toDecimal converte numeros de celula e ignora texto vazio', () => {
  assert.equal(toDecimal(5.002)?.toString(), '5.002');
  assert.equal(toDecimal('  '), null);
  assert.equal(toDecimal(null), null);
  assert.equal(toDecimal('4,0020')?.toString(), '4.002');
  assert.throws(() => toDecimal(new Date(0)), ParseError);
});
