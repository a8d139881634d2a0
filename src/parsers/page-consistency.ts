import { load, type CheerioAPI } from 'cheerio';
import { ParseError } from '../errors';

export interface LoadedPage {
  url: string;
  $: CheerioAPI;
}

export interface PageCheck {
  name: string;
  validate: (page: LoadedPage) => [boolean, string];
}

export function loadPage(url: string, html: string): LoadedPage {
  return { url, $: load(html) };
}

function squash(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

export function describePage(page: LoadedPage): string {
  const url = squash(page.url);
  const title = squash(page.$('title').first().text());
  return title ? `url=${JSON.stringify(url)}; title=${JSON.stringify(title)}` : `url=${JSON.stringify(url)}`;
}

export function urlContains(fragment: string): PageCheck {
  return {
    name: 'url esperada',
    validate: (page) => [page.url.toLowerCase().includes(fragment), `url atual: ${page.url}`],
  };
}

/** Roda todas as verificacoes e lanca um unico erro listando as que falharam. */
export function ensurePageConsistency(page: LoadedPage, source: string, checks: readonly PageCheck[]): void {
  const failures: string[] = [];
  for (const check of checks) {
    try {
      const [ok, detail] = check.validate(page);
      if (!ok) failures.push(`${check.name}: ${detail}`);
    } catch (err) {
      const name = err instanceof Error ? err.name : 'Error';
      const message = err instanceof Error ? err.message : String(err);
      failures.push(`${check.name}: excecao ${name} ${message}`);
    }
  }

  if (failures.length) {
    throw new ParseError(
      `estrutura da pagina possivelmente alterada em ${source}; falhas: ${failures.join(' | ')}; ${describePage(page)}`
    );
  }
}
