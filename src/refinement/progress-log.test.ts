import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { PROGRESS_COLUMNS, ProgressLog, toCsvRow } from './progress-log.js';
import type { CandidateRecord } from './types.js';

const record: CandidateRecord = {
  index: 0,
  rootId: 4,
  treePath: [6, 4],
  pathCondition: 'x<=5',
  depth: 3,
  nodeCount: 2,
  status: 'rejected',
  reason: 'below_value_threshold',
  value: 8.5,
  threshold: 9,
  optimalValue: 10,
  baselineValue: 0,
  replacementNodeCount: 1,
  elapsedMs: 12,
};

describe('toCsvRow', () => {
  it('writes the columns in header order', () => {
    expect(toCsvRow(record)).toBe('0,rejected,below_value_threshold,x<=5,3,2,1,8.5,9,10,0,12');
  });

  it('leaves missing values empty and quotes special characters', () => {
    const skipped: CandidateRecord = {
      index: 2,
      rootId: 3,
      treePath: [8, 7, 5, 3],
      pathCondition: 'odd,"label"',
      depth: 2,
      nodeCount: 1,
      status: 'skipped',
      reason: 'invalidated',
      elapsedMs: 0,
    };
    expect(toCsvRow(skipped)).toBe('2,skipped,invalidated,"odd,""label""",2,1,,,,,,0');
  });
});

describe('ProgressLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tree-refiner-progress-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the header once per file', async () => {
    const file = path.join(dir, 'logs', 'progress.csv');
    await new ProgressLog(file).append(record);
    const second = new ProgressLog(file);
    await second.append({ ...record, index: 1 });
    await second.append({ ...record, index: 2 });

    const lines = (await fs.readFile(file, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(PROGRESS_COLUMNS.join(','));
    expect(lines.slice(1).map((line) => line.split(',')[0])).toEqual(['0', '1', '2']);
  });
});
