#!/usr/bin/env node
import { loadConfig } from '../config';
import { describeError } from '../redaction';
import { copyDirectoryToNetwork } from '../network/sync';
import { createLedgerFile, normalizeLedgerLayout } from '../ledger/workbook';
import { runQuotes } from './run-quotes';

type JobName = 'run' | 'init' | 'normalize' | 'copy-network';

export function parseJobName(argv: readonly string[]): JobName {
  const raw = (argv[2] || 'run').trim();
  if (raw === 'run') return raw;
  if (raw === 'init') return raw;
  if (raw === 'normalize') return raw;
  if (raw === 'copy-network') return raw;
  throw new Error(`JOB_NOT_FOUND:${raw}`);
}

async function main(): Promise<number> {
  const job = parseJobName(process.argv);

  if (job === 'run') {
    return runQuotes();
  }

  const config = loadConfig();
  if (job === 'init') {
    const created = await createLedgerFile(config.ledgerPath);
    process.stdout.write(`[init] ${created ? 'created' : 'exists'} path=${config.ledgerPath}\n`);
    return 0;
  }
  if (job === 'normalize') {
    const report = await normalizeLedgerLayout(config.ledgerPath);
    process.stdout.write(`[normalize] ok path=${config.ledgerPath} moved_rows=${report.movedRows.length}\n`);
    return 0;
  }

  if (!config.networkDirs.length) {
    process.stderr.write('[copy-network] COTACOES_NETWORK_DIR vazio\n');
    return 1;
  }
  const result = await copyDirectoryToNetwork(config.ledgerDir, config.networkDirs, config.networkDestFolder);
  if (result.uncWarning) process.stdout.write(`[copy-network] unc_warning=${JSON.stringify(result.uncWarning)}\n`);
  if (!result.destination) {
    process.stderr.write(`[copy-network] ${describeError('Copia em rede', result.copyError)}\n`);
    return 1;
  }
  process.stdout.write(`[copy-network] ok destination=${result.destination}\n`);
  return 0;
}

if (require.main === module) {
  process.once('SIGINT', () => {
    process.stderr.write('Execucao interrompida pelo usuario (Ctrl+C).\n');
    process.exit(130);
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
