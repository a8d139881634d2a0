export const DEFAULT_TIME_ZONE = 'America/Sao_Paulo';

export interface LocalTimeInfo {
  dateIso: string;
  dateBr: string;
  minutes: number;
  hhmm: string;
  timestampBr: string;
}

export function getLocalTimeInfo(now: Date, timeZone: string = DEFAULT_TIME_ZONE): LocalTimeInfo {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value || '';
  const year = get('year');
  const month = get('month');
  const day = get('day');
  const hour = get('hour');
  const minute = get('minute');
  const second = get('second');

  const hourNum = Number.parseInt(hour, 10);
  const minuteNum = Number.parseInt(minute, 10);
  const minutes = Number.isFinite(hourNum) && Number.isFinite(minuteNum) ? hourNum * 60 + minuteNum : 0;
  const dateBr = `${day}/${month}/${year}`;

  return {
    dateIso: `${year}-${month}-${day}`,
    dateBr,
    minutes,
    hhmm: `${hour}:${minute}`,
    timestampBr: `${dateBr} ${hour}:${minute}:${second}`,
  };
}

export function isoFromBr(dateStr: string): string | null {
  const match = String(dateStr || '').trim().match(/^(\d{2})\/(\d{2})\/(\d{4})$/);
  if (!match) return null;
  return normalizeIso(Number(match[3]), Number(match[2]), Number(match[1]));
}

export function brFromIso(dateIso: string): string {
  const [year, month, day] = dateIso.split('-');
  return `${day}/${month}/${year}`;
}

export function coerceIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return normalizeIso(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }
  if (typeof value !== 'string') return null;
  const text = value.trim();
  const br = isoFromBr(text);
  if (br) return br;
  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!iso) return null;
  return normalizeIso(Number(iso[1]), Number(iso[2]), Number(iso[3]));
}

export function dateFromIso(dateIso: string): Date {
  const [year, month, day] = dateIso.split('-').map((p) => Number.parseInt(p, 10));
  return new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1));
}

export function formatUtcTimestampBr(value: Date): string {
  const pad = (n: number) => (n < 10 ? `0${n}` : String(n));
  return (
    `${pad(value.getUTCDate())}/${pad(value.getUTCMonth() + 1)}/${value.getUTCFullYear()} ` +
    `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`
  );
}

function normalizeIso(year: number, month: number, day: number): string | null {
  if (!year || !month || !day) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.toISOString().slice(0, 10);
}
