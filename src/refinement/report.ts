// Run summary formatting

import { formatDuration, intervalToDuration } from 'date-fns';
import { OUTCOME_MESSAGES, type RunSummary, type TreeSummary } from './types.js';

export function summaryToJSON(summary: RunSummary): string {
  return JSON.stringify(summary, null, 2);
}

/** `1 minute 5 seconds`; sub-second runs are shown in milliseconds. */
export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.round(ms))}ms`;
  const text = formatDuration(intervalToDuration({ start: 0, end: ms }));
  return text || `${Math.round(ms)}ms`;
}

function formatValue(value: number | undefined): string {
  if (value === undefined) return '-';
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

function treeLine(label: string, tree: TreeSummary | undefined): string {
  if (!tree) return `${label}-`;
  return `${label}${tree.nodes} decision nodes, ${tree.leaves} leaves, depth ${tree.depth}, value ${formatValue(tree.value)}`;
}

/**
 * Human-readable summary of one run.
 */
export function formatSummary(summary: RunSummary): string {
  const lines: string[] = [];
  const { candidates } = summary;

  lines.push('='.repeat(60));
  lines.push(`REFINEMENT ${summary.state.toUpperCase()}${summary.partial ? ' (partial result)' : ''}`);
  lines.push('='.repeat(60));
  lines.push(`Run:              ${summary.runId}`);
  if (summary.abortReason) {
    lines.push(`Abort reason:     ${summary.abortReason}`);
  }
  lines.push(`Elapsed:          ${formatElapsed(summary.elapsedMs)}`);
  lines.push('');
  lines.push(treeLine('Initial tree:     ', summary.initial));
  lines.push(treeLine('Final tree:       ', summary.final));
  lines.push('');
  lines.push(
    `Candidates:       ${candidates.generated} generated, ${candidates.accepted} accepted, ` +
      `${candidates.rejected} rejected, ${candidates.skipped} skipped, ${candidates.notAttempted} not attempted`
  );

  if (summary.records.length > 0) {
    lines.push('');
    for (const record of summary.records) {
      const outcome = record.reason !== undefined ? `${record.status}: ${OUTCOME_MESSAGES[record.reason]}` : record.status;
      lines.push(`  #${record.index} [${record.pathCondition}] ${outcome}`);
    }
  }

  lines.push('='.repeat(60));
  return lines.join('\n');
}
