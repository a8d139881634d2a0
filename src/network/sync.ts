import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '../helpers';
import { silentLogger } from '../helpers';
import { redactSecrets } from '../redaction';
import { tryToUnc, type UncResult } from './unc';

export const LEDGER_FILE_NAME = 'cotacoes.xlsx';
export const CSV_FILE_NAME = 'cotacoes.csv';
export const LEDGER_DIR_NAME = 'planilhas';

export type UncConverter = (input: string) => UncResult;

export interface NetworkCopyResult {
  destination: string | null;
  uncWarning: string | null;
  copyError: Error | null;
}

export function parseNetworkDirs(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(';')
    .map((item) => item.trim())
    .filter(Boolean);
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Copia a pasta local para `<base>/<destSubfolder>/<nome da pasta>` no
 * primeiro destino que aceitar a copia.
 */
export async function copyDirectoryToNetwork(
  localDir: string,
  destinations: readonly string[],
  destSubfolder: string,
  opts?: { toUnc?: UncConverter }
): Promise<NetworkCopyResult> {
  const toUnc = opts?.toUnc ?? ((input: string) => tryToUnc(input));
  const stat = await fs.promises.stat(localDir).catch(() => null);
  if (!stat?.isDirectory()) {
    return { destination: null, uncWarning: null, copyError: new Error(`SOURCE_DIR_NOT_FOUND:${localDir}`) };
  }

  let lastError: Error | null = null;
  let lastUncWarning: string | null = null;
  let hasCandidate = false;

  for (const raw of destinations) {
    const base = raw.trim();
    if (!base) continue;
    hasCandidate = true;

    const unc = toUnc(base);
    const uncWarning = unc.error ? redactSecrets(unc.error.message) : null;
    const destination = path.join(unc.path, destSubfolder, path.basename(localDir));
    try {
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      await fs.promises.cp(localDir, destination, { recursive: true, force: true });
    } catch (err) {
      lastError = asError(err);
      lastUncWarning = uncWarning;
      continue;
    }
    return { destination, uncWarning, copyError: null };
  }

  if (!hasCandidate) {
    return { destination: null, uncWarning: null, copyError: new Error('no valid destination for network copy') };
  }
  return { destination: null, uncWarning: lastUncWarning, copyError: lastError };
}

/** Candidatos `<base>/<pasta>/planilhas/cotacoes.xlsx`, incluindo a forma UNC de cada base. */
export function networkLedgerCandidates(
  networkDirs: readonly string[],
  destFolder: string,
  opts?: { toUnc?: UncConverter }
): string[] {
  const toUnc = opts?.toUnc ?? ((input: string) => tryToUnc(input));
  const candidates: string[] = [];
  const seen = new Set<string>();

  for (const raw of networkDirs) {
    const base = raw.trim();
    if (!base) continue;
    const bases = [base];
    const unc = toUnc(base).path;
    if (unc && unc !== base) bases.push(unc);

    for (const item of bases) {
      const candidate = path.join(item, destFolder, LEDGER_DIR_NAME, LEDGER_FILE_NAME);
      const key = candidate.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      candidates.push(candidate);
    }
  }
  return candidates;
}

/**
 * Planilha usada para decidir o que ja foi preenchido: a copia da rede que
 * existir, senao o primeiro candidato. Sem rede configurada, a planilha local.
 */
export function selectReferenceLedgerPath(
  localLedgerPath: string,
  networkDirs: readonly string[],
  destFolder: string,
  opts?: { toUnc?: UncConverter; exists?: (file: string) => boolean }
): string | null {
  if (networkDirs.length === 0) return localLedgerPath;
  const exists = opts?.exists ?? fs.existsSync;
  const candidates = networkLedgerCandidates(networkDirs, destFolder, opts);
  return candidates.find((candidate) => exists(candidate)) ?? candidates[0] ?? null;
}

export function samePath(left: string, right: string): boolean {
  return left.trim().toLowerCase() === right.trim().toLowerCase();
}

export type LocalSyncResult = 'same-file' | 'copied' | 'kept-local' | 'reference-missing';

async function copyPreservingTimes(from: string, to: string): Promise<void> {
  await fs.promises.copyFile(from, to);
  const stat = await fs.promises.stat(from);
  await fs.promises.utimes(to, stat.atime, stat.mtime);
}

/** Copia a planilha (e o CSV) da rede sobre os arquivos locais quando a da rede e mais nova. */
export async function syncLocalFromReference(
  referenceLedgerPath: string,
  localLedgerPath: string,
  localCsvPath: string,
  log: Logger = silentLogger
): Promise<LocalSyncResult> {
  if (samePath(referenceLedgerPath, localLedgerPath)) return 'same-file';
  if (!fs.existsSync(referenceLedgerPath)) {
    log.error('planilha de referencia nao encontrada', { path: referenceLedgerPath });
    return 'reference-missing';
  }

  if (fs.existsSync(localLedgerPath)) {
    let referenceIsNewer: boolean;
    try {
      const [reference, local] = await Promise.all([
        fs.promises.stat(referenceLedgerPath),
        fs.promises.stat(localLedgerPath),
      ]);
      referenceIsNewer = reference.mtimeMs > local.mtimeMs;
    } catch (err) {
      log.warn('nao foi possivel comparar datas das planilhas; mantendo base local', {
        reference: referenceLedgerPath,
        error: err instanceof Error ? err.message : String(err),
      });
      return 'kept-local';
    }
    if (!referenceIsNewer) {
      log.info('referencia da rede nao e mais nova; mantendo base local', { reference: referenceLedgerPath });
      return 'kept-local';
    }
  }

  await fs.promises.mkdir(path.dirname(localLedgerPath), { recursive: true });
  await copyPreservingTimes(referenceLedgerPath, localLedgerPath);
  const referenceCsv = path.join(path.dirname(referenceLedgerPath), CSV_FILE_NAME);
  if (fs.existsSync(referenceCsv)) await copyPreservingTimes(referenceCsv, localCsvPath);
  log.info('base local sincronizada a partir da rede', { reference: referenceLedgerPath });
  return 'copied';
}
