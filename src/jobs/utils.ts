export function formatMs(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return '0ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const sec = ms / 1000;
  if (sec < 60) return `${sec.toFixed(1)}s`;
  const min = Math.floor(sec / 60);
  const rem = sec - min * 60;
  return `${min}m${rem.toFixed(0)}s`;
}

type Meta = Record<string, string | number | boolean | null | undefined>;

function metaToString(meta?: Meta): string {
  if (!meta) return '';
  const parts: string[] = [];
  for (const [k, v] of Object.entries(meta)) {
    if (v === undefined) continue;
    const text = String(v);
    parts.push(`${k}=${/\s/.test(text) ? JSON.stringify(text) : text}`);
  }
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export interface JobLogger {
  start(meta?: Meta): void;
  stage(index: number, total: number, name: string, meta?: Meta): void;
  line(message: string, meta?: Meta): void;
  end(meta?: Meta): void;
}

export function createJobLogger(
  jobName: string,
  opts?: { write?: (line: string) => void; now?: () => number }
): JobLogger {
  const write = opts?.write ?? ((line: string) => process.stdout.write(line));
  const now = opts?.now ?? Date.now;
  const startedAt = now();
  let stageStartedAt = startedAt;

  function log(line: string) {
    write(line.endsWith('\n') ? line : `${line}\n`);
  }

  return {
    start(meta) {
      log(`[${jobName}] start${metaToString(meta)}`);
    },
    stage(index, total, name, meta) {
      const at = now();
      const previous = index > 1 ? ` prev_duration=${formatMs(at - stageStartedAt)}` : '';
      stageStartedAt = at;
      log(`[${jobName}] stage ${index}/${total} ${name}${previous}${metaToString(meta)}`);
    },
    line(message, meta) {
      log(`[${jobName}] ${message}${metaToString(meta)}`);
    },
    end(meta) {
      log(`[${jobName}] end duration=${formatMs(now() - startedAt)}${metaToString(meta)}`);
    },
  };
}

export async function forEachConcurrent<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>
): Promise<void> {
  const safeConcurrency = Math.max(1, Math.floor(concurrency));
  const total = items.length;
  if (total === 0) return;

  let nextIndex = 0;
  const workerCount = Math.min(safeConcurrency, total);
  const workers: Promise<void>[] = [];

  for (let w = 0; w < workerCount; w++) {
    workers.push(
      (async () => {
        while (true) {
          const i = nextIndex++;
          if (i >= total) break;
          const item = items[i];
          if (item === undefined) continue;
          await fn(item, i);
        }
      })()
    );
  }

  await Promise.all(workers);
}
