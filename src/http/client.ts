import { fetch as undiciFetch, ProxyAgent, type Dispatcher, type RequestInit, type Response } from 'undici';
import { SourceFetchError } from '../errors';
import { redactSecrets } from '../redaction';

const DEFAULT_TIMEOUT_MS = 45000;
const DEFAULT_RETRY_MAX = 3;
const DEFAULT_RETRY_BASE_MS = 600;

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs?: number;
  retryMax?: number;
  retryBaseMs?: number;
  proxyUrl?: string | null;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClient {
  fetchText(url: string, options?: RequestOptions): Promise<string>;
  fetchJson(url: string, options?: RequestOptions): Promise<unknown>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.floor(value)));
}

export function isRetryableStatus(status: number): boolean {
  return status === 403 || status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

function parseRetryAfterMs(headerValue: string | null): number | null {
  if (!headerValue) return null;
  const seconds = Number.parseInt(headerValue, 10);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const dateMs = Date.parse(headerValue);
  if (Number.isFinite(dateMs)) return Math.max(0, dateMs - Date.now());
  return null;
}

export function computeBackoffMs(attempt: number, baseMs: number, status?: number, retryAfterMs?: number | null): number {
  if (retryAfterMs !== null && retryAfterMs !== undefined) {
    return clampInt(retryAfterMs, 0, 60000);
  }
  const base = status === 429 || status === 403 ? baseMs * 2 : baseMs;
  const exp = Math.min(6, Math.max(0, attempt));
  const jitter = Math.floor(Math.random() * 250);
  return clampInt(base * Math.pow(2, exp) + jitter, 0, 60000);
}

async function readResponseSnippet(response: Response, maxChars: number): Promise<string> {
  const text = await response.text().catch(() => '');
  const trimmed = text.replace(/\s+/g, ' ').trim();
  return trimmed.length > maxChars ? `${trimmed.slice(0, maxChars)}...` : trimmed;
}

async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

async function throwHttpError(response: Response, url: string): Promise<never> {
  const statusText = response.statusText ? ` ${response.statusText}` : '';
  const snippet = await readResponseSnippet(response, 300);
  const bodyPart = snippet ? ` body="${snippet}"` : '';
  throw new SourceFetchError(`GET ${url} -> HTTP ${response.status}${statusText}${bodyPart}`);
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryMax = clampInt(options.retryMax ?? DEFAULT_RETRY_MAX, 1, 20);
  const retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => undiciFetch(url, init));
  const sleep = options.sleep ?? defaultSleep;
  const dispatcher: Dispatcher | undefined = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;

  // O timer continua armado ate o corpo ser lido por `read`.
  async function fetchWithRetry<T>(
    url: string,
    headers: Record<string, string>,
    timeout: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    let lastError: unknown = null;
    for (let attempt = 0; attempt < retryMax; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      try {
        const response = await fetchImpl(url, {
          method: 'GET',
          headers,
          signal: controller.signal,
          ...(dispatcher ? { dispatcher } : {}),
        });

        if (!response.ok && isRetryableStatus(response.status) && attempt + 1 < retryMax) {
          clearTimeout(timeoutId);
          const retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'));
          await discardBody(response);
          await sleep(computeBackoffMs(attempt, retryBaseMs, response.status, retryAfterMs));
          continue;
        }
        if (!response.ok) await throwHttpError(response, url);
        return await read(response);
      } catch (error) {
        if (controller.signal.aborted) {
          throw new SourceFetchError(`GET ${url} -> timeout_after_ms=${timeout}`, { cause: error });
        }
        if (error instanceof SourceFetchError) throw error;
        lastError = error;
        if (attempt + 1 < retryMax) {
          await sleep(computeBackoffMs(attempt, retryBaseMs));
          continue;
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }
    const detail = lastError instanceof Error ? redactSecrets(lastError.message) : 'request_failed';
    throw new SourceFetchError(`GET ${url} -> ${detail}`, { cause: lastError });
  }

  async function fetchText(url: string, requestOptions?: RequestOptions): Promise<string> {
    const headers = {
      'accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'accept-language': 'pt-BR,pt;q=0.9,en;q=0.8',
      'user-agent': BROWSER_USER_AGENT,
      ...requestOptions?.headers,
    };
    return fetchWithRetry(url, headers, requestOptions?.timeoutMs ?? timeoutMs, (response) => response.text());
  }

  async function fetchJson(url: string, requestOptions?: RequestOptions): Promise<unknown> {
    const headers = {
      'accept': 'application/json',
      'user-agent': BROWSER_USER_AGENT,
      ...requestOptions?.headers,
    };
    const read = async (response: Response): Promise<{ text: string; contentType: string }> => ({
      text: await response.text(),
      contentType: response.headers.get('content-type') || '',
    });
    const { text, contentType } = await fetchWithRetry(url, headers, requestOptions?.timeoutMs ?? timeoutMs, read);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      const snippet = text.replace(/\s+/g, ' ').trim().slice(0, 300);
      throw new SourceFetchError(`GET ${url} -> invalid_json content_type="${contentType}" body="${snippet}"`, { cause: err });
    }
  }

  return { fetchText, fetchJson };
}
