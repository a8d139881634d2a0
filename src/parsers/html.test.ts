import test from 'node:test';
import assert from 'node:assert/strict';
import { ParseError } from '../errors';
import { extractTjlp, extractTourism, extractUsdBrl } from './html';
import { ensurePageConsistency, loadPage, urlContains } from './page-consistency';

const collectedAt = new Date('2026-03-02T10:00:00.000Z');

test('extractUsdBrl le o preco em instrument-price-last', () => {
  const html = '<div><span data-test="instrument-price-last"> 5,2849 </span></div>';
  const quote = extractUsdBrl('https://br.investing.com/currencies/usd-brl', html, collectedAt);

  assert.equal(quote.symbol, 'USD/BRL');
  assert.equal(quote.value.toString(), '5.2849');
  assert.equal(quote.value_raw, '5,2849');
  assert.equal(quote.collected_at, collectedAt);
  assert.throws(() => extractUsdBrl('https://br.investing.com/', '<div></div>', collectedAt), ParseError);
});

test('extractTourism usa a linha Dolar Turismo da tabela', () => {
  const html = `
    <html><head><title>Valor Economico</title></head><body><table>
      <tr><td>Dolar Comercial</td><td>5,28</td><td>5,29</td></tr>
      <tr><td>D&oacute;lar Turismo</td><td>5,3900</td><td> 5,5700 </td></tr>
    </table></body></html>`;
  const quote = extractTourism('https://valor.globo.com/', html, collectedAt);

  assert.equal(quote.buy.toString(), '5.39');
  assert.equal(quote.sell.toString(), '5.57');
  assert.equal(quote.buy_raw, '5,3900');
  assert.equal(quote.sell_raw, '5,5700');
});

test('extractTourism rejeita linha sem valores atualizados', () => {
  const html = '<table><tr><td>Dolar Turismo</td><td>-</td><td>-</td></tr></table>';
  assert.throws(() => extractTourism('https://valor.globo.com/', html, collectedAt), {
    name: 'ParseError',
    message: 'cotacao de Dolar Turismo nao atualizada no Valor',
  });
});

test('extractTjlp le o bloco com percentual', () => {
  const html = '<div class="valor">Em revisao</div><div class="valor"> 8,96% a.a. </div>';
  const quote = extractTjlp('https://www.bndes.gov.br/tjlp', html, collectedAt);

  assert.equal(quote.name, 'TJLP');
  assert.equal(quote.value.toString(), '8.96');
  assert.equal(quote.value_raw, '8,96% a.a.');
  assert.equal(quote.reference_date, null);
});

test('ensurePageConsistency junta todas as falhas com url e titulo', () => {
  const page = loadPage('https://outro.site/pagina', '<html><head><title>  Pagina   nova </title></head></html>');

  assert.throws(
    () =>
      ensurePageConsistency(page, 'BNDES TJLP', [
        urlContains('bndes.gov.br'),
        { name: 'seletor de valor', validate: () => [false, 'nao encontrou bloco'] },
        {
          name: 'checagem quebrada',
          validate: () => {
            throw new TypeError('falhou');
          },
        },
      ]),
    {
      name: 'ParseError',
      message:
        'estrutura da pagina possivelmente alterada em BNDES TJLP; falhas: ' +
        'url esperada: url atual: https://outro.site/pagina | seletor de valor: nao encontrou bloco | ' +
        'checagem quebrada: excecao TypeError falhou; url="https://outro.site/pagina"; title="Pagina nova"',
    }
  );
});
