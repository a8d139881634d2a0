import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { loadConfig } from './index';

test('loadConfig aplica padroes relativos ao diretorio atual', () => {
  const config = loadConfig({}, '/srv/cotacoes');

  assert.equal(config.ledgerPath, path.join('/srv/cotacoes', 'planilhas', 'cotacoes.xlsx'));
  assert.equal(config.csvPath, path.join('/srv/cotacoes', 'planilhas', 'cotacoes.csv'));
  assert.deepEqual(config.networkDirs, []);
  assert.equal(config.networkDestFolder, 'cotacoes');
  assert.equal(config.timeZone, 'America/Sao_Paulo');
  assert.equal(config.usdSpread.toString(), '0.002');
  assert.equal(config.httpTimeoutMs, 45000);
  assert.equal(config.httpRetryMax, 3);
  assert.equal(config.proxyUrl, null);
});

test('loadConfig le variaveis COTACOES_* e proxy', () => {
  const config = loadConfig(
    {
      COTACOES_BASE_DIR: '/dados',
      COTACOES_NETWORK_DIR: 'X:\\TEMP;\\\\srv\\users',
      COTACOES_NETWORK_DEST_FOLDER: 'moedas',
      COTACOES_MAX_WORKERS: '2',
      COTACOES_USD_SPREAD: '0,0030',
      COTACOES_HTTP_TIMEOUT_MS: '500',
      HTTP_RETRY_MAX: '99',
      HTTP_PROXY: 'http://proxy.local:3128',
    },
    '/ignorado'
  );

  assert.equal(config.ledgerDir, path.join('/dados', 'planilhas'));
  assert.deepEqual(config.networkDirs, ['X:\\TEMP', '\\\\srv\\users']);
  assert.equal(config.networkDestFolder, 'moedas');
  assert.equal(config.maxWorkersRaw, '2');
  assert.equal(config.usdSpread.toString(), '0.003');
  assert.equal(config.httpTimeoutMs, 1000);
  assert.equal(config.httpRetryMax, 20);
  assert.equal(config.proxyUrl, 'http://proxy.local:3128');
});

test('loadConfig rejeita spread e fuso invalidos', () => {
  assert.throws(() => loadConfig({ COTACOES_USD_SPREAD: 'abc' }, '/'), { message: 'CONFIG_INVALID:COTACOES_USD_SPREAD=abc' });
  assert.throws(() => loadConfig({ COTACOES_USD_SPREAD: '-1' }, '/'), { message: 'CONFIG_INVALID:COTACOES_USD_SPREAD=-1' });
  assert.throws(() => loadConfig({ COTACOES_TIMEZONE: 'Lugar/Nenhum' }, '/'), { message: 'CONFIG_INVALID:COTACOES_TIMEZONE=Lugar/Nenhum' });
});
