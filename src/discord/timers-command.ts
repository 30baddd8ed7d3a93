import type { TimerJobSummary } from '../timers/scheduler.js';

export type TimersCommandMode = 'basic' | 'verbose';

export function parseTimersCommand(content: string): TimersCommandMode | null {
  const normalized = String(content ?? '').trim().toLowerCase().replace(/\s+/g, ' ');
  if (normalized === '!timers') return 'basic';
  if (normalized === '!timers verbose') return 'verbose';
  return null;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Local wall-clock time at minute resolution, e.g. `2024-01-01 09:00`. */
export function formatLocalMinute(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function renderTimersReport(opts: {
  jobs: readonly TimerJobSummary[];
  mode: TimersCommandMode;
  botDisplayName?: string;
}): string {
  const lines: string[] = [];
  lines.push(`${opts.botDisplayName ?? 'Bot'} Timers (${opts.jobs.length} active)`);
  if (opts.jobs.length === 0) {
    lines.push('No timers scheduled.');
    return lines.join('\n');
  }

  const sorted = [...opts.jobs].sort((a, b) => a.id - b.id);
  for (const job of sorted) {
    const next = job.nextRun ? formatLocalMinute(job.nextRun) : '-';
    const kind = job.repeat ? 'repeat' : 'once';
    lines.push(`#${job.id} ${job.state} next=${next} runs=${job.runCount} ${kind}`);
    if (opts.mode === 'verbose') lines.push(`  ${job.spec}`);
  }
  return lines.join('\n');
}
