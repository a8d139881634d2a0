import test from 'node:test';
import assert from 'node:assert/strict';
import { buildPtaxUrl, parsePtaxBulletins, parseSelicSeries } from './ptax';

const collectedAt = new Date('2026-03-02T17:00:00.000Z');

test('buildPtaxUrl monta a consulta do dia na API Olinda', () => {
  assert.equal(
    buildPtaxUrl('EUR', '2026-03-02'),
    "https://olinda.bcb.gov.br/olinda/servico/PTAX/versao/v1/odata/CotacaoMoedaDia(moeda=@moeda,dataCotacao=@dataCotacao)" +
      "?@moeda='EUR'&@dataCotacao='03-02-2026'&$format=json&$select=cotacaoCompra,cotacaoVenda,dataHoraCotacao,tipoBoletim"
  );
});

test('parsePtaxBulletins escolhe o boletim de fechamento', () => {
  const payload = {
    value: [
      { cotacaoCompra: 5.301, cotacaoVenda: 5.3016, dataHoraCotacao: '2026-03-02 10:08:21.105', tipoBoletim: 'Abertura' },
      { cotacaoCompra: 5.2901, cotacaoVenda: 5.2907, dataHoraCotacao: '2026-03-02 13:06:27.370', tipoBoletim: 'Fechamento PTAX' },
      { cotacaoCompra: 'x', tipoBoletim: 'Intermediario' },
    ],
  };
  const quote = parsePtaxBulletins(payload, 'USD', '2026-03-02', collectedAt);

  assert.equal(quote.symbol, 'USD/BRL PTAX');
  assert.equal(quote.buy.toString(), '5.2901');
  assert.equal(quote.sell.toString(), '5.2907');
  assert.equal(quote.buy_raw, '5.2901');
});

test('parsePtaxBulletins falha sem fechamento do dia', () => {
  const payload = {
    value: [{ cotacaoCompra: 6.1, cotacaoVenda: 6.2, dataHoraCotacao: '2026-03-02 11:04:00.000', tipoBoletim: 'Intermediario' }],
  };
  assert.throws(() => parsePtaxBulletins(payload, 'CHF', '2026-03-02', collectedAt), {
    name: 'ParseError',
    message: 'cotacao PTAX nao disponivel para 02/03/2026 (CHF); ultimo boletim: Intermediario 2026-03-02 11:04:00.000',
  });
  assert.throws(() => parsePtaxBulletins({ erro: true }, 'CHF', '2026-03-02', collectedAt), {
    message: 'resposta PTAX sem lista de boletins (CHF)',
  });
});

test('parseSelicSeries le o ultimo ponto da serie', () => {
  const quote = parseSelicSeries([{ data: '28/01/2026', valor: '15.00' }], collectedAt);

  assert.equal(quote.name, 'SELIC');
  assert.equal(quote.value.toString(), '15');
  assert.equal(quote.value_raw, '15.00');
  assert.equal(quote.reference_date, '2026-01-28');
  assert.throws(() => parseSelicSeries([], collectedAt), { message: 'nao encontrou valor atual da SELIC' });
});
