import type { SkipReason, SourceKey } from '../types';
import { SOURCES, SOURCE_KEYS, type WindowGroup } from './sources';

export const MORNING_CUTOFF_MINUTES = 8 * 60 + 30;
export const AFTERNOON_FLOOR_MINUTES = 13 * 60 + 10;

export interface SelectionInput {
  /** Minutos desde 00:00 no fuso local */
  nowMinutes: number;
  filled: Readonly<Record<SourceKey, boolean>>;
  /** Valor bruto de COTACOES_MAX_WORKERS */
  maxWorkersOverride?: string | null;
}

export interface SelectionPlan {
  selected: SourceKey[];
  skipped: Partial<Record<SourceKey, SkipReason>>;
  workers: number;
  workerWarning: string | null;
}

export function isGroupOpen(group: WindowGroup, nowMinutes: number): boolean {
  if (group === 'morning') return nowMinutes <= MORNING_CUTOFF_MINUTES;
  return nowMinutes >= AFTERNOON_FLOOR_MINUTES;
}

function closedReason(group: WindowGroup): SkipReason {
  return group === 'morning' ? 'outside window (after 08:30)' : 'outside window (before 13:10)';
}

export function isBetweenWindows(nowMinutes: number): boolean {
  return nowMinutes > MORNING_CUTOFF_MINUTES && nowMinutes < AFTERNOON_FLOOR_MINUTES;
}

export function resolveWorkerCount(
  raw: string | null | undefined,
  selectedCount: number
): { workers: number; warning: string | null } {
  const fallback = Math.max(1, selectedCount);
  const text = (raw ?? '').trim();
  if (!text) return { workers: fallback, warning: null };
  if (!/^-?\d+$/.test(text)) {
    return { workers: fallback, warning: `COTACOES_MAX_WORKERS invalido (${JSON.stringify(text)}). Usando ${fallback}.` };
  }
  const parsed = Number.parseInt(text, 10);
  return { workers: Math.max(1, Math.min(fallback, parsed)), warning: null };
}

export function selectSources(input: SelectionInput): SelectionPlan {
  const selected: SourceKey[] = [];
  const skipped: Partial<Record<SourceKey, SkipReason>> = {};

  for (const key of SOURCE_KEYS) {
    const group = SOURCES[key].window_group;
    if (!isGroupOpen(group, input.nowMinutes)) {
      skipped[key] = closedReason(group);
    } else if (input.filled[key]) {
      skipped[key] = 'already filled for today';
    } else {
      selected.push(key);
    }
  }

  const { workers, warning } = resolveWorkerCount(input.maxWorkersOverride, selected.length);
  return { selected, skipped, workers, workerWarning: warning };
}
