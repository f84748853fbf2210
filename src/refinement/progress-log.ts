// Per-candidate CSV progress log

import { promises as fs } from 'fs';
import path from 'path';
import type { CandidateRecord } from './types.js';

export interface ProgressSink {
  append(record: CandidateRecord): Promise<void>;
}

export const PROGRESS_COLUMNS = [
  'index',
  'status',
  'reason',
  'path_condition',
  'depth',
  'node_count',
  'replacement_node_count',
  'value',
  'threshold',
  'optimal_value',
  'baseline_value',
  'elapsed_ms',
] as const;

function csvField(value: string | number | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(record: CandidateRecord): string {
  return [
    record.index,
    record.status,
    record.reason,
    record.pathCondition,
    record.depth,
    record.nodeCount,
    record.replacementNodeCount,
    record.value,
    record.threshold,
    record.optimalValue,
    record.baselineValue,
    record.elapsedMs,
  ]
    .map(csvField)
    .join(',');
}

/**
 * Append-only CSV file. The header is written once, when the file is
 * missing or empty, so several runs can share one log.
 */
export class ProgressLog implements ProgressSink {
  private headerChecked = false;

  constructor(readonly file: string) {}

  async append(record: CandidateRecord): Promise<void> {
    if (!this.headerChecked) {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      if (await isMissingOrEmpty(this.file)) {
        await fs.appendFile(this.file, PROGRESS_COLUMNS.join(',') + '\n', 'utf-8');
      }
      this.headerChecked = true;
    }
    await fs.appendFile(this.file, toCsvRow(record) + '\n', 'utf-8');
  }
}

async function isMissingOrEmpty(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).size === 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}
