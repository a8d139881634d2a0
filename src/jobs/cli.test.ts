import test from 'node:test';
import assert from 'node:assert/strict';
import { parseJobName } from './cli';

test('parseJobName usa run por padrao e rejeita jobs desconhecidos', () => {
  assert.equal(parseJobName(['node', 'cli']), 'run');
  assert.equal(parseJobName(['node', 'cli', 'copy-network']), 'copy-network');
  assert.throws(() => parseJobName(['node', 'cli', 'sync-all']), { message: 'JOB_NOT_FOUND:sync-all' });
});
