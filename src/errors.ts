export class ParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export class SourceFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceFetchError';
  }
}

export class LedgerNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`LEDGER_NOT_FOUND:${path}`);
    this.name = 'LedgerNotFoundError';
    this.path = path;
  }
}

export class ConsistencyViolationError extends Error {
  readonly scope: string;
  readonly issues: string[];

  constructor(scope: string, issues: string[]) {
    super(`CONSISTENCY_VIOLATION:${scope} ${issues.join(' | ')}`);
    this.name = 'ConsistencyViolationError';
    this.scope = scope;
    this.issues = issues;
  }
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EBUSY']);

export function errorCode(err: unknown): string | null {
  if (!(err instanceof Error)) return null;
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : null;
}

export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && PERMISSION_CODES.has(code);
}
