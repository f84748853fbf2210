// Export of the final tree and run summary

import { promises as fs } from 'fs';
import path from 'path';
import { toDot } from '../tree/dot-writer.js';
import { toJSON } from '../tree/tree-json.js';
import { renderTree } from '../tree/tree-render.js';
import { log } from '../utils/logger.js';
import type { RunResult } from './orchestrator.js';
import { summaryToJSON } from './report.js';

export interface ArtifactSink {
  export(result: RunResult): Promise<void>;
}

export const ARTIFACT_FILES = {
  finalDot: 'final_tree.dot',
  finalJson: 'final_tree.json',
  finalText: 'final_tree.txt',
  initialDot: 'initial_tree.dot',
  summary: 'summary.json',
} as const;

/**
 * Writes artifacts into one directory. The summary is always written; tree
 * files only when a tree exists.
 */
export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly outputDir: string) {}

  async export(result: RunResult): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const written: string[] = [];
    const write = async (name: string, content: string): Promise<void> => {
      await fs.writeFile(path.join(this.outputDir, name), content, 'utf-8');
      written.push(name);
    };

    if (result.tree) {
      await write(ARTIFACT_FILES.finalDot, toDot(result.tree, { graphName: 'final_tree' }));
      await write(ARTIFACT_FILES.finalJson, JSON.stringify(toJSON(result.tree), null, 2) + '\n');
      await write(ARTIFACT_FILES.finalText, renderTree(result.tree) + '\n');
    }
    if (result.initialTree) {
      await write(ARTIFACT_FILES.initialDot, toDot(result.initialTree, { graphName: 'initial_tree' }));
    }
    await write(ARTIFACT_FILES.summary, summaryToJSON(result.summary) + '\n');

    log.debug(`Wrote ${written.join(', ')} to ${this.outputDir}`);
  }
}
