import type { Logger } from '../helpers';
import { silentLogger } from '../helpers';
import { forEachConcurrent } from '../jobs/utils';
import { describeError } from '../redaction';
import type { FetchOutcome, FetchOutcomes, SkipReason, SourceFetchers, SourceKey } from '../types';
import { SOURCES, SOURCE_KEYS } from './sources';

export interface RunFetchesDeps {
  fetchers: SourceFetchers;
  workers: number;
  logger?: Logger;
  now?: () => number;
}

type Fold = (target: FetchOutcomes) => void;

async function runSource<K extends SourceKey>(key: K, deps: RunFetchesDeps): Promise<Fold> {
  const label = SOURCES[key].label;
  const log = deps.logger ?? silentLogger;
  const now = deps.now ?? Date.now;
  const startedAt = now();

  let outcome: FetchOutcome<K>;
  try {
    const fetcher: () => Promise<FetchOutcome<K>['value']> = deps.fetchers[key];
    const value = await fetcher();
    const elapsed_ms = now() - startedAt;
    outcome = { label, value, error: null, elapsed_ms, skipped: false, skip_reason: null };
    log.info('fonte coletada', { source: key, elapsed_ms });
  } catch (err) {
    const elapsed_ms = now() - startedAt;
    const error = describeError(label, err);
    outcome = { label, value: null, error, elapsed_ms, skipped: false, skip_reason: null };
    log.warn('fonte falhou', { source: key, elapsed_ms, error });
  }

  return (target: { [P in K]?: FetchOutcome<P> }) => {
    target[key] = outcome;
  };
}

/**
 * Executa as fontes selecionadas num pool limitado. Cada tarefa resolve sua
 * propria promise e o mapa so e montado depois que todas terminam.
 */
export async function runFetches(selected: readonly SourceKey[], deps: RunFetchesDeps): Promise<FetchOutcomes> {
  const folds: Fold[] = new Array(selected.length);
  const workers = selected.length > 1 ? Math.max(1, deps.workers) : 1;

  await forEachConcurrent(selected, workers, async (key, index) => {
    folds[index] = await runSource(key, deps);
  });

  const outcomes: FetchOutcomes = {};
  for (const fold of folds) fold(outcomes);
  return outcomes;
}

function skippedOutcome<K extends SourceKey>(key: K, reason: SkipReason): Fold {
  const outcome: FetchOutcome<K> = {
    label: SOURCES[key].label,
    value: null,
    error: null,
    elapsed_ms: 0,
    skipped: true,
    skip_reason: reason,
  };
  return (target: { [P in K]?: FetchOutcome<P> }) => {
    target[key] = outcome;
  };
}

/** Acrescenta ao resultado as fontes que a selecao pulou. */
export function withSkipped(outcomes: FetchOutcomes, skipped: Partial<Record<SourceKey, SkipReason>>): FetchOutcomes {
  const merged: FetchOutcomes = { ...outcomes };
  for (const key of SOURCE_KEYS) {
    const reason = skipped[key];
    if (reason && !merged[key]) skippedOutcome(key, reason)(merged);
  }
  return merged;
}

export function countFailures(outcomes: FetchOutcomes): number {
  let failures = 0;
  for (const key of SOURCE_KEYS) {
    if (outcomes[key]?.error) failures++;
  }
  return failures;
}

export function collectErrors(outcomes: FetchOutcomes): string[] {
  const errors: string[] = [];
  for (const key of SOURCE_KEYS) {
    const error = outcomes[key]?.error;
    if (error) errors.push(error);
  }
  return errors;
}
