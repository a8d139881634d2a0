import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Decimal from 'decimal.js';
import type { FetchOutcomes } from '../types';
import { validateRowConsistency } from './consistency';
import { createLedgerFile, updateLedgerFile } from './workbook';

const collectedAt = new Date('2026-03-02T10:00:00.000Z');

test('validateRowConsistency aponta colunas vazias de fontes coletadas ou ja preenchidas', async () => {
  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'cotacoes-consistency-')), 'cotacoes.xlsx');
  await createLedgerFile(file);
  await updateLedgerFile(file, {
    target_date: '2026-03-02',
    official: { symbol: 'USD/BRL', value: new Decimal('5.2849'), value_raw: '5,2849', collected_at: collectedAt },
    logged_at: collectedAt,
    status: 'OK',
  });

  const outcomes: FetchOutcomes = {
    official: {
      label: 'USD/BRL (Investing)',
      value: { symbol: 'USD/BRL', value: new Decimal('5.2849'), value_raw: '5,2849', collected_at: collectedAt },
      error: null,
      elapsed_ms: 10,
      skipped: false,
      skip_reason: null,
    },
    tourism: {
      label: 'Dolar Turismo (Valor)',
      value: null,
      error: 'Dolar Turismo (Valor): Error timeout',
      elapsed_ms: 10,
      skipped: false,
      skip_reason: null,
    },
    ptax_usd: {
      label: 'PTAX USD',
      value: null,
      error: null,
      elapsed_ms: 0,
      skipped: true,
      skip_reason: 'already filled for today',
    },
  };

  const issues = await validateRowConsistency(file, '2026-03-02', outcomes);
  assert.deepEqual(issues, ['PTAX USD: colunas esperadas D/E vazias na linha 3']);

  assert.deepEqual(await validateRowConsistency(file, '2026-03-03', outcomes), [
    `linha da data nao encontrada: 03/03/2026 em ${file}`,
  ]);
  assert.deepEqual(await validateRowConsistency(`${file}.x`, '2026-03-02', outcomes), [
    `planilha nao encontrada: ${file}.x`,
  ]);
});
