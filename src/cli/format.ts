/**
 * Human-readable rendering of summaries and error payloads.
 */

import type { DbCheckSummary, ErrorPayload, IngestSummary } from '@/ingest/summary';
import { DOMAIN_ORDER } from '@/ingest/types';

type Cell = string | number | null | undefined;

export function formatTable(headers: string[], rows: Cell[][]): string {
  const widths = headers.map((header, i) =>
    rows.reduce((max, row) => Math.max(max, String(row[i] ?? '').length), header.length)
  );
  const line = (cells: Cell[]) =>
    cells
      .map((cell, i) => String(cell ?? '').padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(headers), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

export function formatKeyValue(data: Record<string, Cell>): string {
  const entries = Object.entries(data).filter(([, value]) => value !== null && value !== undefined);
  const keyWidth = entries.reduce((max, [key]) => Math.max(max, key.length), 0);
  return entries.map(([key, value]) => `${key.padEnd(keyWidth)}  ${String(value)}`).join('\n');
}

function isDbCheck(summary: IngestSummary): summary is DbCheckSummary {
  return 'checks' in summary;
}

export function formatSummary(summary: IngestSummary): string {
  const sections: string[] = [
    formatKeyValue({
      run_id: summary.run_id,
      status: summary.status,
      command: summary.command,
      run_types: summary.run_types.join(','),
      scope: summary.scope,
      source_profile: summary.source_profile,
      dry_run: summary.dry_run ? 'yes' : 'no',
      symbols: summary.symbols_count,
      started_at: summary.started_at,
      finished_at: summary.finished_at,
      error: summary.error ? `${summary.error.kind}: ${summary.error.message}` : null,
    }),
  ];

  const rows = DOMAIN_ORDER.flatMap((domain) => {
    const d = summary.domains[domain];
    return d
      ? [[domain, d.status, d.planned_items, d.processed_items, d.rows_read, d.rows_written, d.rows_skipped, d.errors.length]]
      : [];
  });
  if (rows.length > 0) {
    sections.push(formatTable(['domain', 'status', 'planned', 'processed', 'read', 'written', 'skipped', 'errors'], rows));
  }

  const errors = DOMAIN_ORDER.flatMap((domain) =>
    (summary.domains[domain]?.errors ?? []).map((e) => `  ${domain} ${e.symbol} [${e.provider}/${e.kind}] ${e.message}`)
  );
  if (errors.length > 0) {
    sections.push(['errors:', ...errors].join('\n'));
  }

  if (isDbCheck(summary)) {
    sections.push(
      formatTable(
        ['domain', 'table', 'expected', 'actual', 'ok'],
        summary.checks.map((c) => [c.domain, c.table, c.expected, c.actual, c.ok ? 'yes' : 'NO'])
      )
    );
    sections.push(`consistent  ${summary.consistent ? 'yes' : 'no'}`);
  }

  if (summary.notes.length > 0) {
    sections.push(['notes:', ...summary.notes.map((n) => `  - ${n}`)].join('\n'));
  }

  return sections.join('\n\n');
}

export function formatError(payload: ErrorPayload): string {
  const lines = [`error [${payload.error.kind}]: ${payload.error.message}`];
  if (payload.run_id) lines.push(`run_id: ${payload.run_id}`);
  return lines.join('\n');
}
