const URL_CREDENTIALS_RE = /([a-zA-Z][a-zA-Z0-9+.-]*:\/\/)([^@\s/]+)@/g;
const PASSWORD_PAIR_RE = /\b(password|passwd|pwd)\b\s*[:=]\s*\S+/gi;

export function redactSecrets(text: string): string {
  if (!text) return text;

  const redacted = text.replace(URL_CREDENTIALS_RE, (_match, scheme: string, credentials: string) => {
    const sep = credentials.indexOf(':');
    if (sep >= 0) return `${scheme}${credentials.slice(0, sep)}:***@`;
    return `${scheme}***@`;
  });
  return redacted.replace(PASSWORD_PAIR_RE, (_match, key: string) => `${key}=***`);
}

export function describeError(label: string, err: unknown): string {
  const name = err instanceof Error ? err.name : 'Error';
  const raw = err instanceof Error ? err.message : String(err);
  const message = redactSecrets(raw.split(/\s+/).filter(Boolean).join(' '));
  return message ? `${label}: ${name} ${message}` : `${label}: ${name}`;
}
