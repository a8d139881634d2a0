import path from 'node:path';
import Decimal from 'decimal.js';
import { clampInt, parsePositiveInt } from '../http/client';
import { CSV_FILE_NAME, LEDGER_DIR_NAME, LEDGER_FILE_NAME, parseNetworkDirs } from '../network/sync';
import { DEFAULT_USD_SPREAD } from '../ledger/update';
import { DEFAULT_TIME_ZONE } from '../utils/time';

export const DEFAULT_NETWORK_DEST_FOLDER = 'cotacoes';

export interface AppConfig {
  baseDir: string;
  ledgerDir: string;
  ledgerPath: string;
  csvPath: string;
  networkDirs: string[];
  networkDestFolder: string;
  maxWorkersRaw: string | undefined;
  timeZone: string;
  usdSpread: Decimal;
  httpTimeoutMs: number;
  httpRetryMax: number;
  proxyUrl: string | null;
}

function readSpread(raw: string | undefined): Decimal {
  const text = raw?.trim();
  if (!text) return DEFAULT_USD_SPREAD;
  try {
    const value = new Decimal(text.replace(',', '.'));
    if (value.isFinite() && value.gte(0)) return value;
  } catch (err) {
    throw new Error(`CONFIG_INVALID:COTACOES_USD_SPREAD=${text}`, { cause: err });
  }
  throw new Error(`CONFIG_INVALID:COTACOES_USD_SPREAD=${text}`);
}

function readTimeZone(raw: string | undefined): string {
  const timeZone = raw?.trim() || DEFAULT_TIME_ZONE;
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
  } catch (err) {
    throw new Error(`CONFIG_INVALID:COTACOES_TIMEZONE=${timeZone}`, { cause: err });
  }
  return timeZone;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const baseDir = path.resolve(cwd, env.COTACOES_BASE_DIR?.trim() || '.');
  const ledgerDir = path.join(baseDir, LEDGER_DIR_NAME);
  const proxyUrl = env.HTTPS_PROXY?.trim() || env.https_proxy?.trim() || env.HTTP_PROXY?.trim() || env.http_proxy?.trim() || null;

  return {
    baseDir,
    ledgerDir,
    ledgerPath: path.join(ledgerDir, LEDGER_FILE_NAME),
    csvPath: path.join(ledgerDir, CSV_FILE_NAME),
    networkDirs: parseNetworkDirs(env.COTACOES_NETWORK_DIR),
    networkDestFolder: env.COTACOES_NETWORK_DEST_FOLDER?.trim() || DEFAULT_NETWORK_DEST_FOLDER,
    maxWorkersRaw: env.COTACOES_MAX_WORKERS,
    timeZone: readTimeZone(env.COTACOES_TIMEZONE),
    usdSpread: readSpread(env.COTACOES_USD_SPREAD),
    httpTimeoutMs: clampInt(parsePositiveInt(env.COTACOES_HTTP_TIMEOUT_MS, 45000), 1000, 600000),
    httpRetryMax: clampInt(parsePositiveInt(env.HTTP_RETRY_MAX, 3), 1, 20),
    proxyUrl,
  };
}
