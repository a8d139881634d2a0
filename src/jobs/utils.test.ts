import test from 'node:test';
import assert from 'node:assert/strict';
import { createJobLogger, forEachConcurrent, formatMs } from './utils';

test('formatMs usa ms, segundos e minutos', () => {
  assert.equal(formatMs(250), '250ms');
  assert.equal(formatMs(1500), '1.5s');
  assert.equal(formatMs(125000), '2m5s');
  assert.equal(formatMs(-1), '0ms');
});

test('createJobLogger escreve linhas com estagio e duracao', () => {
  const lines: string[] = [];
  let clock = 0;
  const job = createJobLogger('run-quotes', {
    write: (line) => lines.push(line),
    now: () => clock,
  });

  job.start({ workers: 2 });
  clock = 300;
  job.stage(1, 6, 'config');
  clock = 1300;
  job.stage(2, 6, 'coleta', { selected: 'official tourism' });
  job.line('fora da janela de coleta');
  clock = 2000;
  job.end({ status: 'ok' });

  assert.deepEqual(lines, [
    '[run-quotes] start workers=2\n',
    '[run-quotes] stage 1/6 config\n',
    '[run-quotes] stage 2/6 coleta prev_duration=1.0s selected="official tourism"\n',
    '[run-quotes] fora da janela de coleta\n',
    '[run-quotes] end duration=2.0s status=ok\n',
  ]);
});

test('forEachConcurrent processa todos os itens', async () => {
  const seen: number[] = [];
  await forEachConcurrent([1, 2, 3, 4, 5], 2, async (item) => {
    await new Promise((resolve) => setTimeout(resolve, 1));
    seen.push(item);
  });
  assert.deepEqual(seen.sort(), [1, 2, 3, 4, 5]);
});
