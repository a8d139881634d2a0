import fs from 'node:fs';
import path from 'node:path';
import type Decimal from 'decimal.js';
import { loadConfig, type AppConfig } from '../config';
import { collectErrors, countFailures, runFetches, withSkipped } from '../core/fetch';
import { calculateCdiDailyPercent } from '../core/rates';
import { isBetweenWindows, selectSources } from '../core/selection';
import { SOURCES, SOURCE_KEYS } from '../core/sources';
import { ConsistencyViolationError, isPermissionError } from '../errors';
import { createLoggerFromEnv, type Logger } from '../helpers';
import { createHttpClient } from '../http/client';
import { validateRowConsistency } from '../ledger/consistency';
import { regenerateCsvRow } from '../ledger/csv';
import type { FieldWrite, WriteReport } from '../ledger/update';
import { normalizeLedgerLayout, readFilledSources, updateLedgerFile } from '../ledger/workbook';
import {
  copyDirectoryToNetwork,
  LEDGER_FILE_NAME,
  samePath,
  selectReferenceLedgerPath,
  syncLocalFromReference,
  type UncConverter,
} from '../network/sync';
import { formatPtBrDecimal } from '../parsers/decimal';
import { describeError, redactSecrets } from '../redaction';
import { createSourceFetchers } from '../services/client';
import type { FetchOutcomes, SkipReason, SourceFetchers } from '../types';
import { brFromIso, getLocalTimeInfo } from '../utils/time';
import { createJobLogger, type JobLogger } from './utils';

const TOTAL_STAGES = 6;

export interface RunQuotesDeps {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  now?: () => Date;
  fetchers?: SourceFetchers;
  write?: (line: string) => void;
  logger?: Logger;
  toUnc?: UncConverter;
}

function describeField(write: FieldWrite): string {
  const repeated = write.kind === 'repeated';
  if (write.field.endsWith('_buy')) return 'compra';
  if (write.field.endsWith('_sell')) return 'venda';
  if (write.field === 'selic') return repeated ? 'SELIC (ultimo valor)' : 'SELIC';
  if (write.field === 'cdi') return repeated ? 'CDI (ultimo valor)' : 'CDI';
  return repeated ? 'ultimo valor' : 'valor';
}

/** Uma linha por fonte dizendo o que foi gravado na planilha. */
export function describeWrites(outcomes: FetchOutcomes, written: WriteReport): string[] {
  const lines: string[] = [];
  for (const key of SOURCE_KEYS) {
    const outcome = outcomes[key];
    if (!outcome) continue;
    const fields = written[key] ?? [];
    if (outcome.skipped) {
      lines.push(`${outcome.label} pulado: ${outcome.skip_reason ?? ''}`);
      continue;
    }
    if (outcome.value === null && fields.length === 0) {
      lines.push(`${outcome.label}: sem dados; planilha nao atualizada para esta fonte.`);
      continue;
    }
    const detail = fields.length ? `gravou ${fields.map(describeField).join(' e ')}` : 'nao gravou (ja preenchido na planilha)';
    lines.push(`${outcome.label}: ${detail}.`);
  }

  const hasQuotes = SOURCE_KEYS.some((key) => {
    const outcome = outcomes[key];
    return outcome !== undefined && !outcome.skipped && outcome.value !== null;
  });
  const wroteAny = Object.values(written).some((fields) => (fields ?? []).length > 0);
  if (hasQuotes && !wroteAny) {
    lines.push('Nenhuma cotacao foi gravada (valores ja estavam preenchidos). Apenas o log foi atualizado.');
  }
  return lines;
}

function quoteLine<V>(
  outcome: { value: V | null; skipped: boolean; skip_reason: SkipReason | null } | undefined,
  name: string,
  describe: (value: V) => string
): string {
  if (outcome && outcome.value !== null) return `${name}: ${describe(outcome.value)}`;
  if (outcome?.skipped) return `${name}: pulado (${outcome.skip_reason ?? ''})`;
  return `${name}: sem dados`;
}

const bidAsk = (value: { buy: Decimal; sell: Decimal }) =>
  `compra ${formatPtBrDecimal(value.buy, 4)} venda ${formatPtBrDecimal(value.sell, 4)}`;

/** Resumo legivel das cotacoes coletadas nesta execucao. */
export function describeQuoteSummary(outcomes: FetchOutcomes, spread: Decimal): string[] {
  const lines = [
    quoteLine(outcomes.official, 'USD/BRL', (q) => {
      const sell = q.value.plus(spread);
      return `compra ${formatPtBrDecimal(q.value, 4)} venda ${formatPtBrDecimal(sell, 4)} (spread ${formatPtBrDecimal(spread, 4)})`;
    }),
    quoteLine(outcomes.ptax_usd, 'PTAX USD', bidAsk),
    quoteLine(outcomes.ptax_eur, 'PTAX EUR', bidAsk),
    quoteLine(outcomes.ptax_chf, 'PTAX CHF', bidAsk),
    quoteLine(outcomes.tourism, 'Dolar Turismo', bidAsk),
    quoteLine(outcomes.tjlp, 'TJLP', (q) => `${formatPtBrDecimal(q.value, 4)}%`),
    quoteLine(outcomes.selic, 'SELIC', (q) => {
      const reference = q.reference_date ? ` (referencia ${brFromIso(q.reference_date)})` : '';
      return `${formatPtBrDecimal(q.value, 4)}%${reference}`;
    }),
  ];

  const selic = outcomes.selic?.value;
  if (selic) {
    try {
      lines.push(`CDI (calculado): ${formatPtBrDecimal(calculateCdiDailyPercent(selic.value), 10)}`);
    } catch (err) {
      lines.push(`CDI (calculado): erro (${describeError('CDI', err)})`);
    }
  }
  return lines;
}

async function copyLedgerFolder(config: AppConfig, job: JobLogger, toUnc?: UncConverter): Promise<string | null> {
  job.line('copiando pasta de planilhas para a rede');
  const result = await copyDirectoryToNetwork(config.ledgerDir, config.networkDirs, config.networkDestFolder, { toUnc });
  if (result.uncWarning) job.line('aviso: caminho UNC nao resolvido', { detail: result.uncWarning });
  if (!result.destination) {
    const detail = result.copyError ? redactSecrets(result.copyError.message) : 'destino indisponivel';
    job.line('falha na copia para a rede', { detail });
    return null;
  }
  job.line('pasta copiada', { destination: result.destination });
  return result.destination;
}

/**
 * Uma execucao completa em seis etapas. As fontes saem da janela de horario e
 * do que ja esta preenchido na planilha de referencia. Devolve o codigo de saida.
 */
export async function runQuotes(deps: RunQuotesDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((line: string) => process.stdout.write(line));
  const log = deps.logger ?? createLoggerFromEnv(env, write);
  const nowDate = deps.now ?? (() => new Date());
  const job = createJobLogger('run-quotes', { write });

  const abort = (reason: string, meta?: Record<string, string>): number => {
    job.line(`ERRO: ${reason}`, meta);
    job.end({ status: 'aborted' });
    return 1;
  };

  try {
    job.start();

    job.stage(1, TOTAL_STAGES, 'ambiente');
    const config = loadConfig(env, deps.cwd);
    job.line('configuracao', {
      base_dir: config.baseDir,
      ledger: config.ledgerPath,
      csv: config.csvPath,
      network: config.networkDirs.length ? config.networkDirs.join('; ') : 'nenhum',
      network_folder: config.networkDestFolder,
    });

    job.stage(2, TOTAL_STAGES, 'coleta');
    const now = nowDate();
    const local = getLocalTimeInfo(now, config.timeZone);
    job.line('horario local', { now: local.hhmm, date: local.dateBr });
    if (isBetweenWindows(local.minutes)) {
      job.line('fora da janela de coleta (apos 08:30 e antes de 13:10); validacao e copia em rede continuam');
    }

    let reference = selectReferenceLedgerPath(config.ledgerPath, config.networkDirs, config.networkDestFolder, {
      toUnc: deps.toUnc,
    });
    if (!reference) return abort('nao foi possivel resolver a planilha de referencia na rede');

    if (fs.existsSync(reference)) {
      job.line('planilha de referencia', {
        origin: samePath(reference, config.ledgerPath) ? 'local' : 'rede',
        path: reference,
      });
    } else if (samePath(reference, config.ledgerPath)) {
      return abort('planilha local nao encontrada; rode o job init', { path: reference });
    } else {
      job.line('planilha de referencia ausente na rede; inicializando a partir da pasta local', { path: reference });
      try {
        await normalizeLedgerLayout(config.ledgerPath);
      } catch (err) {
        return abort('falha ao preparar planilha local para bootstrap', { detail: describeError('Formatacao local', err) });
      }
      const destination = await copyLedgerFolder(config, job, deps.toUnc);
      if (!destination) return abort('falha ao inicializar planilha de referencia na rede');
      const bootstrapped = path.join(destination, LEDGER_FILE_NAME);
      if (!fs.existsSync(bootstrapped)) {
        return abort('planilha de referencia nao encontrada apos a inicializacao', { path: bootstrapped });
      }
      reference = bootstrapped;
    }

    const synced = await syncLocalFromReference(reference, config.ledgerPath, config.csvPath, log);
    if (synced === 'reference-missing') return abort('planilha de referencia indisponivel', { path: reference });

    const filled = await readFilledSources(reference, local.dateIso);
    const plan = selectSources({ nowMinutes: local.minutes, filled, maxWorkersOverride: config.maxWorkersRaw });
    if (plan.workerWarning) job.line(`aviso: ${plan.workerWarning}`);

    if (plan.selected.length) {
      job.line('fontes selecionadas', {
        count: plan.selected.length,
        sources: plan.selected.map((key) => SOURCES[key].label).join(', '),
        workers: plan.workers,
      });
    } else {
      job.line('nenhuma fonte selecionada para coleta agora');
    }
    for (const key of SOURCE_KEYS) {
      const reason = plan.skipped[key];
      if (reason) job.line(`${SOURCES[key].label}: pulado (${reason})`);
    }

    if (!plan.selected.length) {
      job.stage(3, TOTAL_STAGES, 'normalizacao');
      try {
        await normalizeLedgerLayout(config.ledgerPath);
      } catch (err) {
        return abort('falha ao normalizar planilha local', { detail: describeError('Formatacao local', err) });
      }
      job.stage(4, TOTAL_STAGES, 'csv', { updated: false });
      job.line('CSV nao atualizado porque nao houve coleta de novas fontes');
      job.stage(5, TOTAL_STAGES, 'resumo');
      job.line('coleta nao executada nesta janela');
      job.stage(6, TOTAL_STAGES, 'rede', { folder: config.networkDestFolder });
      if (!config.networkDirs.length) {
        job.line('copia em rede desabilitada');
      } else if (await copyLedgerFolder(config, job, deps.toUnc)) {
        job.line('sincronizacao final na rede concluida');
      }
      job.end({ status: 'ok', selected: 0 });
      return 0;
    }

    const fetchers =
      deps.fetchers ??
      createSourceFetchers({
        http: createHttpClient({
          timeoutMs: config.httpTimeoutMs,
          retryMax: config.httpRetryMax,
          proxyUrl: config.proxyUrl,
        }),
        timeZone: config.timeZone,
        now: nowDate,
      });
    const fetched = await runFetches(plan.selected, { fetchers, workers: plan.workers, logger: log });
    const outcomes = withSkipped(fetched, plan.skipped);
    const errors = collectErrors(outcomes);
    job.line('coleta concluida', { ok: plan.selected.length - countFailures(outcomes), failed: countFailures(outcomes) });

    job.stage(3, TOTAL_STAGES, 'planilha', { path: config.ledgerPath });
    const selicPercent = outcomes.selic?.value?.value ?? null;
    let cdi: Decimal | null = null;
    if (selicPercent) {
      try {
        cdi = calculateCdiDailyPercent(selicPercent);
      } catch (err) {
        errors.push(describeError('CDI', err));
      }
    }

    const result = await updateLedgerFile(config.ledgerPath, {
      target_date: local.dateIso,
      official: outcomes.official?.value ?? null,
      tourism: outcomes.tourism?.value ?? null,
      ptax_usd: outcomes.ptax_usd?.value ?? null,
      ptax_eur: outcomes.ptax_eur?.value ?? null,
      ptax_chf: outcomes.ptax_chf?.value ?? null,
      tjlp: outcomes.tjlp?.value?.value ?? null,
      selic: selicPercent,
      cdi,
      spread: config.usdSpread,
      overwrite_quotes: false,
      logged_at: now,
      time_zone: config.timeZone,
      status: errors.length ? 'ERRO' : 'OK',
      detail: errors.length ? errors.join(' | ') : null,
    });
    if (result.migration.movedRows.length) {
      job.line('layout legado migrado', { rows: result.migration.movedRows.length });
    }
    for (const line of describeWrites(outcomes, result.written)) job.line(line);

    const localIssues = await validateRowConsistency(config.ledgerPath, local.dateIso, outcomes);
    if (localIssues.length) throw new ConsistencyViolationError('validacao local apos atualizacao', localIssues);

    job.stage(4, TOTAL_STAGES, 'csv', { updated: true });
    const csv = await regenerateCsvRow(config.ledgerPath, config.csvPath);
    job.line('CSV atualizado', { date: csv.date, path: config.csvPath });

    job.stage(5, TOTAL_STAGES, 'resumo');
    for (const line of describeQuoteSummary(outcomes, config.usdSpread)) job.line(line);
    job.line(errors.length ? `falhas na coleta: ${errors.length}. Consulte o log da planilha.` : 'coleta sem falhas');

    job.stage(6, TOTAL_STAGES, 'rede', { folder: config.networkDestFolder });
    if (!config.networkDirs.length) {
      job.line('copia em rede desabilitada');
    } else {
      const destination = await copyLedgerFolder(config, job, deps.toUnc);
      if (destination) {
        const remoteIssues = await validateRowConsistency(path.join(destination, LEDGER_FILE_NAME), local.dateIso, outcomes);
        if (remoteIssues.length) throw new ConsistencyViolationError('validacao final na rede', remoteIssues);
        job.line('validacao final na rede: OK');
      }
    }

    job.end({ status: errors.length ? 'partial' : 'ok', selected: plan.selected.length, errors: errors.length });
    return 0;
  } catch (err) {
    if (err instanceof ConsistencyViolationError) {
      for (const issue of err.issues) job.line(`- ${issue}`);
      return abort(`${err.scope} encontrou inconsistencias`);
    }
    if (isPermissionError(err)) {
      job.line('ERRO ao gravar arquivos. Possivel causa: planilha/CSV abertos no Excel ou permissao insuficiente.');
      job.line(`detalhe: ${describeError('Gravacao', err)}`);
      job.end({ status: 'aborted' });
      return 1;
    }
    return abort(describeError('Erro inesperado', err));
  }
}
