// Inspect command: statistics, rendering and candidates of a tree graph

import chalk from 'chalk';
import { selectorOptions } from '../../refinement/orchestrator.js';
import { formatPathCondition, selectSubProblems } from '../../refinement/selector.js';
import type { SubProblem } from '../../refinement/types.js';
import type { DecisionTree } from '../../tree/decision-tree.js';
import { parseTreeGraph } from '../../tree/dot-parser.js';
import { toJSON } from '../../tree/tree-json.js';
import { renderTree } from '../../tree/tree-render.js';
import { loadConfig, type RefinerConfig } from '../../utils/config.js';
import { applyLoggingFlags, readInputFile, selectionOverrides, type LoggingFlags, type SelectionFlags } from '../options.js';

export interface InspectOptions extends SelectionFlags, LoggingFlags {
  render?: boolean;
  candidates?: boolean;
  json?: boolean;
  config?: string;
}

export interface InspectReport {
  file: string;
  stats: { decisionNodes: number; leaves: number; totalNodes: number; depth: number };
  candidates?: Array<{ treePath: number[]; pathCondition: string; depth: number; nodeCount: number; rootDepth: number }>;
  tree?: ReturnType<typeof toJSON>;
}

export function buildInspectReport(file: string, tree: DecisionTree, options: InspectOptions, config: RefinerConfig): InspectReport {
  const report: InspectReport = { file, stats: tree.stats() };
  if (options.candidates) {
    report.candidates = selectSubProblems(tree, selectorOptions(config)).map((c: SubProblem) => ({
      treePath: [...c.treePath],
      pathCondition: formatPathCondition(c.pathCondition),
      depth: c.depth,
      nodeCount: c.nodeCount,
      rootDepth: c.rootDepth,
    }));
  }
  if (options.render) {
    report.tree = toJSON(tree);
  }
  return report;
}

export function formatInspectReport(report: InspectReport, tree: DecisionTree): string {
  const lines: string[] = [];
  lines.push(chalk.bold(report.file));
  lines.push(`  Decision nodes: ${report.stats.decisionNodes}`);
  lines.push(`  Leaves:         ${report.stats.leaves}`);
  lines.push(`  Depth:          ${report.stats.depth}`);

  if (report.tree) {
    lines.push('');
    lines.push(renderTree(tree, { styleDecision: chalk.cyan, styleLeaf: chalk.green }));
  }

  if (report.candidates) {
    lines.push('');
    lines.push(chalk.bold(`Candidates (${report.candidates.length}):`));
    report.candidates.forEach((c, idx) => {
      lines.push(`  #${idx} depth ${c.depth}, ${c.nodeCount} decision nodes at [${c.pathCondition}]`);
    });
  }
  return lines.join('\n');
}

export async function inspectCommand(file: string, options: InspectOptions): Promise<void> {
  applyLoggingFlags(options);
  const config = await loadConfig({ configFile: options.config, overrides: selectionOverrides(options) });
  const tree = parseTreeGraph(await readInputFile(file), { actions: config.actions });
  const report = buildInspectReport(file, tree, options, config);

  if (options.json) {
    process.stdout.write(JSON.stringify(report, null, 2) + '\n');
    return;
  }
  process.stdout.write(formatInspectReport(report, tree) + '\n');
}
