import fs from 'node:fs';
import { SOURCES, SOURCE_KEYS } from '../core/sources';
import type { FetchOutcomes } from '../types';
import { brFromIso } from '../utils/time';
import { CURRENT_LAYOUT, columnOf } from './layout';
import { findRowByDate, isSourceFilled } from './snapshot';
import { readLedgerSnapshot } from './workbook';

function columnLetter(col: number): string {
  let n = col;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Confere se as colunas das fontes coletadas (ou ja preenchidas antes desta
 * execucao) estao preenchidas na linha da data. Devolve uma mensagem por falha.
 */
export async function validateRowConsistency(filePath: string, dateIso: string, outcomes: FetchOutcomes): Promise<string[]> {
  if (!fs.existsSync(filePath)) return [`planilha nao encontrada: ${filePath}`];

  const snapshot = await readLedgerSnapshot(filePath);
  const row = findRowByDate(snapshot, dateIso);
  if (!row) return [`linha da data nao encontrada: ${brFromIso(dateIso)} em ${filePath}`];

  const issues: string[] = [];
  for (const key of SOURCE_KEYS) {
    const outcome = outcomes[key];
    if (!outcome) continue;
    const shouldBeFilled = outcome.skip_reason === 'already filled for today' || outcome.value !== null;
    if (!shouldBeFilled || isSourceFilled(row, key)) continue;
    const columns = SOURCES[key].required_fields
      .map((field) => columnOf(CURRENT_LAYOUT, field))
      .filter((col): col is number => col !== null)
      .map(columnLetter)
      .join('/');
    issues.push(`${SOURCES[key].label}: colunas esperadas ${columns} vazias na linha ${row.row_index}`);
  }
  return issues;
}
