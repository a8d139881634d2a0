import { spawnSync } from 'node:child_process';

export interface UncResult {
  path: string;
  error: Error | null;
}

/** Devolve a raiz UNC de uma unidade mapeada ("X:") ou lanca erro. */
export type DriveResolver = (drive: string) => string;

const DRIVE_RE = /^([a-zA-Z]:)(.*)$/;

export function resolveDriveWithNetUse(drive: string): string {
  const result = spawnSync('net', ['use', drive], { encoding: 'utf8', windowsHide: true });
  if (result.error) throw result.error;
  if (result.status !== 0) {
    const message = String(result.stderr || result.stdout || '').split(/\s+/).filter(Boolean).join(' ');
    throw new Error(`NET_USE_FAILED:${drive} ${message || `status ${String(result.status)}`}`.trim());
  }
  const remote = parseNetUseRemote(String(result.stdout || ''));
  if (!remote) throw new Error(`NET_USE_NO_REMOTE:${drive}`);
  return remote;
}

/** Le o caminho remoto na saida do "net use X:". */
export function parseNetUseRemote(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/(\\\\[^\s]+.*)$/);
    if (match?.[1]) return match[1].trim();
  }
  return null;
}

/**
 * Converte "X:\pasta" para "\\servidor\compartilhamento\pasta" no Windows.
 * Em outras plataformas, ou sem letra de unidade, devolve o caminho como veio.
 */
export function tryToUnc(
  input: string,
  opts?: { platform?: NodeJS.Platform; resolveDrive?: DriveResolver }
): UncResult {
  const platform = opts?.platform ?? process.platform;
  const match = input.match(DRIVE_RE);
  if (!input || platform !== 'win32' || !match) return { path: input, error: null };

  const drive = match[1] ?? '';
  const rest = match[2] ?? '';
  const resolveDrive = opts?.resolveDrive ?? resolveDriveWithNetUse;
  try {
    const remote = resolveDrive(drive).replace(/[\\/]+$/, '');
    return { path: `${remote}${rest}`, error: null };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return { path: input, error };
  }
}
