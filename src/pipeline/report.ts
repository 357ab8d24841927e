import type { AttemptRecord, FetchOutcome, RunSummary } from './orchestrator.js';

function formatAttempt(a: AttemptRecord): string {
  if (a.ok) return `${a.strategy} #${a.attempt} ok`;
  const status = a.status !== undefined ? ` ${a.status}` : '';
  return `${a.strategy} #${a.attempt} ${a.kind ?? 'Error'}${status}: ${a.message ?? ''}`.trimEnd();
}

function formatOutcome(o: FetchOutcome): string[] {
  switch (o.status) {
    case 'succeeded': {
      const files = 1 + (o.archive?.derivedFiles.length ?? 0);
      const failures = o.archive?.derivedFailures.length ?? 0;
      const note = failures > 0 ? `, ${failures} derived view(s) failed` : '';
      return [`✓ r/${o.forum} via ${o.succeededVia} (${files} files${note})`];
    }
    case 'write_failed':
      return [`✗ r/${o.forum} fetched via ${o.succeededVia} but not archived: ${o.error}`];
    case 'exhausted':
      return [
        `✗ r/${o.forum} ExhaustedAllStrategies`,
        ...o.attempts.map((a) => `    ${formatAttempt(a)}`),
      ];
  }
}

/**
 * Plain-text run summary, one block per forum in processing order.
 */
export function formatSummary(summary: RunSummary): string {
  const total = summary.outcomes.length;
  const lines = [`Run ${summary.date}: ${summary.succeeded}/${total} forums archived`];
  for (const outcome of summary.outcomes) {
    lines.push(...formatOutcome(outcome).map((line) => `  ${line}`));
  }
  return lines.join('\n');
}
