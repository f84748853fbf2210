import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { buildTree, scenarioTree } from '../test/helpers.js';
import { parseTreeGraph } from '../tree/dot-parser.js';
import { ARTIFACT_FILES, FileArtifactSink } from './artifacts.js';
import type { RunSummary } from './types.js';

const summary: RunSummary = {
  runId: 'run-1',
  state: 'done',
  partial: false,
  elapsedMs: 10,
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:00:00.010Z',
  candidates: { generated: 0, attempted: 0, accepted: 0, rejected: 0, skipped: 0, notAttempted: 0 },
  records: [],
};

describe('FileArtifactSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tree-refiner-artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the final tree in every format plus the summary', async () => {
    const out = path.join(dir, 'out');
    const tree = buildTree(scenarioTree());
    await new FileArtifactSink(out).export({ summary, tree, initialTree: tree.clone() });

    expect((await fs.readdir(out)).sort()).toEqual(
      [ARTIFACT_FILES.finalDot, ARTIFACT_FILES.finalJson, ARTIFACT_FILES.finalText, ARTIFACT_FILES.initialDot, ARTIFACT_FILES.summary].sort()
    );
    const dot = await fs.readFile(path.join(out, ARTIFACT_FILES.finalDot), 'utf-8');
    expect(dot.startsWith('digraph final_tree {')).toBe(true);
    expect(parseTreeGraph(dot).equals(tree)).toBe(true);
    expect(JSON.parse(await fs.readFile(path.join(out, ARTIFACT_FILES.finalJson), 'utf-8'))).toEqual(scenarioTree());
    expect(JSON.parse(await fs.readFile(path.join(out, ARTIFACT_FILES.summary), 'utf-8'))).toEqual(summary);
  });

  it('writes only the summary when there is no tree', async () => {
    await new FileArtifactSink(dir).export({ summary: { ...summary, state: 'aborted', partial: true } });
    expect(await fs.readdir(dir)).toEqual([ARTIFACT_FILES.summary]);
  });
});
