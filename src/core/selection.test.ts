import test from 'node:test';
import assert from 'node:assert/strict';
import { isBetweenWindows, resolveWorkerCount, selectSources } from './selection';
import { emptyFilledSources } from './sources';

test('selectSources de manha escolhe fontes matinais e pula PTAX', () => {
  const plan = selectSources({ nowMinutes: 7 * 60, filled: emptyFilledSources() });

  assert.deepEqual(plan.selected, ['official', 'tourism', 'tjlp', 'selic']);
  assert.equal(plan.skipped.ptax_usd, 'outside window (before 13:10)');
  assert.equal(plan.skipped.ptax_eur, 'outside window (before 13:10)');
  assert.equal(plan.skipped.ptax_chf, 'outside window (before 13:10)');
  assert.equal(plan.workers, 4);
  assert.equal(plan.workerWarning, null);
});

test('selectSources a tarde escolhe apenas PTAX', () => {
  const plan = selectSources({ nowMinutes: 14 * 60 + 31, filled: emptyFilledSources() });

  assert.deepEqual(plan.selected, ['ptax_usd', 'ptax_eur', 'ptax_chf']);
  assert.equal(plan.skipped.official, 'outside window (after 08:30)');
  assert.equal(plan.skipped.tourism, 'outside window (after 08:30)');
  assert.equal(plan.skipped.tjlp, 'outside window (after 08:30)');
  assert.equal(plan.skipped.selic, 'outside window (after 08:30)');
  assert.equal(plan.workers, 3);
});

test('selectSources entre as janelas nao escolhe nada', () => {
  const plan = selectSources({ nowMinutes: 9 * 60, filled: emptyFilledSources() });

  assert.deepEqual(plan.selected, []);
  assert.equal(Object.keys(plan.skipped).length, 7);
  assert.equal(plan.workers, 1);
  assert.equal(isBetweenWindows(9 * 60), true);
});

test('selectSources pula fontes ja preenchidas hoje', () => {
  const filled = { ...emptyFilledSources(), ptax_usd: true, ptax_eur: true };
  const plan = selectSources({ nowMinutes: 14 * 60 + 31, filled });

  assert.deepEqual(plan.selected, ['ptax_chf']);
  assert.equal(plan.skipped.ptax_usd, 'already filled for today');
  assert.equal(plan.skipped.ptax_eur, 'already filled for today');
  assert.equal(plan.workers, 1);
});

test('selectSources trata os limites das janelas como inclusivos', () => {
  const morning = selectSources({ nowMinutes: 8 * 60 + 30, filled: emptyFilledSources() });
  assert.deepEqual(morning.selected, ['official', 'tourism', 'tjlp', 'selic']);

  const afternoon = selectSources({ nowMinutes: 13 * 60 + 10, filled: emptyFilledSources() });
  assert.deepEqual(afternoon.selected, ['ptax_usd', 'ptax_eur', 'ptax_chf']);

  assert.equal(isBetweenWindows(8 * 60 + 31), true);
  assert.equal(isBetweenWindows(13 * 60 + 9), true);
  assert.equal(isBetweenWindows(13 * 60 + 10), false);
});

test('resolveWorkerCount limita o override e avisa quando invalido', () => {
  assert.deepEqual(resolveWorkerCount('2', 4), { workers: 2, warning: null });
  assert.deepEqual(resolveWorkerCount('10', 4), { workers: 4, warning: null });
  assert.deepEqual(resolveWorkerCount('0', 4), { workers: 1, warning: null });
  assert.deepEqual(resolveWorkerCount('  ', 3), { workers: 3, warning: null });

  const invalid = resolveWorkerCount('abc', 3);
  assert.equal(invalid.workers, 3);
  assert.equal(invalid.warning, 'COTACOES_MAX_WORKERS invalido ("abc"). Usando 3.');
});

test('selectSources aplica o override de workers', () => {
  const plan = selectSources({ nowMinutes: 7 * 60, filled: emptyFilledSources(), maxWorkersOverride: '1' });
  assert.equal(plan.workers, 1);
});
