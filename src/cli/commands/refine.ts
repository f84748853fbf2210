// Refine command: one full refinement run

import ora from 'ora';
import { ExecaCommandRunner } from '../../collaborators/command-runner.js';
import { createProcessCollaborators, verifyTools } from '../../collaborators/index.js';
import { FileArtifactSink } from '../../refinement/artifacts.js';
import { Orchestrator, type RunResult } from '../../refinement/orchestrator.js';
import { ProgressLog } from '../../refinement/progress-log.js';
import { formatSummary, summaryToJSON } from '../../refinement/report.js';
import type { OrchestratorState } from '../../refinement/types.js';
import { loadConfig } from '../../utils/config.js';
import { log, logger, parseLogLevel } from '../../utils/logger.js';
import { applyLoggingFlags, definedOnly, selectionOverrides, type LoggingFlags, type SelectionFlags } from '../options.js';

export interface RefineOptions extends SelectionFlags, LoggingFlags {
  model?: string;
  spec?: string;
  initialTree?: string;
  outputDir?: string;
  maxLoss?: number;
  objective?: string;
  timeout?: number;
  candidateTimeout?: number;
  maxIterations?: number;
  /** `--no-hybrid` sets this to false. */
  hybrid?: boolean;
  /** `--no-tool-check` sets this to false. */
  toolCheck?: boolean;
  progressLog?: string;
  json?: boolean;
  config?: string;
}

export const EXIT_CODES = {
  done: 0,
  fatal: 1,
  aborted: 2,
} as const;

const STATE_TEXT: Record<OrchestratorState, string> = {
  initializing: 'Initializing',
  generating_initial_tree: 'Generating initial tree',
  selecting_candidates: 'Selecting candidate sub-trees',
  refining: 'Refining',
  done: 'Done',
  aborted: 'Aborted',
};

export function refineOverrides(options: RefineOptions): Record<string, unknown> {
  return {
    ...selectionOverrides(options),
    ...definedOnly({
      model: options.model,
      specification: options.spec,
      initialTree: options.initialTree,
      outputDir: options.outputDir,
      maxLoss: options.maxLoss,
      objective: options.objective,
      timeoutTotal: options.timeout,
      candidateTimeout: options.candidateTimeout,
      maxIterations: options.maxIterations,
      progressLog: options.progressLog,
      // Only an explicit --no-hybrid overrides the config file.
      hybridizationEnabled: options.hybrid === false ? false : undefined,
    }),
  };
}

export async function refineCommand(options: RefineOptions): Promise<void> {
  const levelFromFlags = applyLoggingFlags(options);
  const config = await loadConfig({ configFile: options.config, overrides: refineOverrides(options) });
  if (!levelFromFlags) {
    logger.setLevel(parseLogLevel(config.logLevel));
  }

  const runner = new ExecaCommandRunner();
  if (options.toolCheck !== false) {
    await verifyTools(config, runner);
  }

  const orchestrator = new Orchestrator({
    config,
    collaborators: createProcessCollaborators(config, { runner }),
    artifacts: new FileArtifactSink(config.outputDir),
    progress: config.progressLog ? new ProgressLog(config.progressLog) : undefined,
  });

  const spinner = options.json ? null : ora({ text: 'Starting', stream: process.stderr }).start();
  if (spinner) {
    // Keep log lines from tearing through the spinner.
    logger.setWriter((line) => {
      spinner.clear();
      process.stderr.write(line);
      spinner.render();
    });
    orchestrator.on('state', (state) => {
      spinner.text = STATE_TEXT[state];
    });
    orchestrator.on('candidate:start', (candidate, index) => {
      spinner.text = `Refining candidate #${index} (depth ${candidate.depth}, ${candidate.nodeCount} decision nodes)`;
    });
  }

  let result: RunResult;
  try {
    result = await orchestrator.run();
  } finally {
    if (spinner) {
      spinner.stop();
      logger.setWriter((line) => {
        process.stderr.write(line);
      });
    }
  }

  const { summary } = result;
  if (options.json) {
    process.stdout.write(summaryToJSON(summary) + '\n');
  } else {
    process.stdout.write(formatSummary(summary) + '\n');
    if (summary.state === 'done') {
      log.success(`Artifacts written to ${config.outputDir}`);
    } else {
      log.warn(`Run aborted${summary.abortReason ? `: ${summary.abortReason}` : ''}; artifacts in ${config.outputDir}`);
    }
  }

  process.exitCode = summary.state === 'done' ? EXIT_CODES.done : EXIT_CODES.aborted;
}
