/**
 * Refinement orchestrator
 *
 * Drives one run: initial tree → candidate selection → per-candidate
 * re-synthesis, acceptance, splice and re-verification, all under one
 * wall-clock budget. Candidates are processed one at a time; the main tree
 * is only mutated between external calls.
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import type { Collaborators, ResynthesisResult, TreeEvaluation } from '../collaborators/types.js';
import type { DecisionTree } from '../tree/decision-tree.js';
import { parseTreeGraph } from '../tree/dot-parser.js';
import { parseConfig, type RefinerConfig, type RefinerConfigInput } from '../utils/config.js';
import {
  CandidateTimeoutError,
  GlobalTimeoutError,
  InfeasibleConstraintError,
  InitialGenerationError,
  ParseError,
  ReVerificationError,
  UnsupportedPredicateError,
} from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { log } from '../utils/logger.js';
import { decideAcceptance, valueThreshold } from './acceptance.js';
import type { ArtifactSink } from './artifacts.js';
import { translatePathCondition } from './constraint-translator.js';
import type { ProgressSink } from './progress-log.js';
import { formatPathCondition, isPathPrefix, selectSubProblems, type SelectorOptions } from './selector.js';
import { TimeBudget, withTimeout, type Clock } from './time-budget.js';
import {
  OUTCOME_MESSAGES,
  type CandidateRecord,
  type OrchestratorState,
  type RejectionReason,
  type RunSummary,
  type SkipReason,
  type StateRestriction,
  type SubProblem,
  type TreeSummary,
} from './types.js';

export interface OrchestratorEvents {
  state: [state: OrchestratorState, previous: OrchestratorState | undefined];
  'candidate:start': [candidate: SubProblem, index: number];
  'candidate:result': [record: CandidateRecord];
}

export interface OrchestratorOptions {
  config: RefinerConfigInput;
  collaborators: Collaborators;
  clock?: Clock;
  artifacts?: ArtifactSink;
  progress?: ProgressSink;
}

export interface RunResult {
  summary: RunSummary;
  /** Final tree; absent when no initial tree was ever obtained. */
  tree?: DecisionTree;
  initialTree?: DecisionTree;
}

type Measurements = Partial<Pick<CandidateRecord, 'value' | 'threshold' | 'optimalValue' | 'baselineValue' | 'replacementNodeCount'>>;

type Outcome =
  | { status: 'accepted'; details: Measurements }
  | { status: 'rejected'; reason: RejectionReason; detail?: string; details?: Measurements }
  | { status: 'skipped'; reason: SkipReason; detail?: string };

interface RunState {
  tree: DecisionTree;
  value: number;
  /** Tree paths of accepted splices, in order. */
  splicedPaths: (readonly number[])[];
}

export class Orchestrator {
  private readonly emitter = new EventEmitter();
  private readonly clock: Clock;
  private current: OrchestratorState | undefined;

  constructor(private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get state(): OrchestratorState | undefined {
    return this.current;
  }

  on<E extends keyof OrchestratorEvents>(event: E, listener: (...args: OrchestratorEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<E extends keyof OrchestratorEvents>(event: E, listener: (...args: OrchestratorEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  private emit<E extends keyof OrchestratorEvents>(event: E, ...args: OrchestratorEvents[E]): void {
    this.emitter.emit(event, ...args);
  }

  private transition(next: OrchestratorState): void {
    const previous = this.current;
    this.current = next;
    log.debug(`state: ${previous ?? '(start)'} -> ${next}`);
    this.emit('state', next, previous);
  }

  /**
   * Run the pipeline to `done` or `aborted`. Rejects only for invalid
   * configuration; every other failure ends up in the summary.
   */
  async run(): Promise<RunResult> {
    const runId = uuidv4();
    const startedAt = this.clock();
    const records: CandidateRecord[] = [];

    this.transition('initializing');
    const config = parseConfig(this.options.config);
    const budget = TimeBudget.fromSeconds(config.timeoutTotal, this.clock);

    const finish = async (
      state: 'done' | 'aborted',
      extra: {
        abortReason?: string;
        partial?: boolean;
        generated?: number;
        run?: RunState;
        /** A tree that was parsed but never evaluated. */
        tree?: DecisionTree;
        initial?: TreeSummary;
        initialTree?: DecisionTree;
      }
    ): Promise<RunResult> => {
      this.transition(state);
      const finishedAt = this.clock();
      const attempted = records.filter((r) => r.status !== 'skipped').length;
      const skipped = records.length - attempted;
      const generated = extra.generated ?? 0;
      const summary: RunSummary = {
        runId,
        state,
        partial: extra.partial ?? state === 'aborted',
        abortReason: extra.abortReason,
        elapsedMs: finishedAt - startedAt,
        startedAt: new Date(startedAt).toISOString(),
        finishedAt: new Date(finishedAt).toISOString(),
        initial: extra.initial,
        final: extra.run ? summarizeTree(extra.run.tree, extra.run.value) : extra.tree ? summarizeTree(extra.tree) : undefined,
        candidates: {
          generated,
          attempted,
          accepted: records.filter((r) => r.status === 'accepted').length,
          rejected: records.filter((r) => r.status === 'rejected').length,
          skipped,
          notAttempted: generated - records.length,
        },
        records,
      };
      const result: RunResult = { summary, tree: extra.run?.tree ?? extra.tree, initialTree: extra.initialTree };
      if (this.options.artifacts) {
        await this.options.artifacts.export(result);
      }
      return result;
    };

    if (budget.expired()) {
      return finish('aborted', { abortReason: new GlobalTimeoutError(budget.budgetMs).message });
    }

    this.transition('generating_initial_tree');
    let tree: DecisionTree;
    let initialValue: number;
    try {
      tree = parseTreeGraph(await this.obtainInitialGraph(config, budget), { actions: config.actions });
    } catch (error) {
      const fatal = error instanceof ParseError
        ? new ParseError(`initial tree is malformed: ${error.message}`)
        : new InitialGenerationError(`initial tree generation failed: ${getErrorMessage(error)}`, error);
      log.error(fatal.message);
      return finish('aborted', { abortReason: fatal.message });
    }
    try {
      initialValue = (await this.options.collaborators.evaluator.evaluateTree(tree)).value;
    } catch (error) {
      const fatal = new InitialGenerationError(`initial tree could not be evaluated: ${getErrorMessage(error)}`, error);
      log.error(fatal.message);
      return finish('aborted', { abortReason: fatal.message, tree, initial: summarizeTree(tree), initialTree: tree.clone() });
    }

    const initialTree = tree.clone();
    const initial = summarizeTree(initialTree, initialValue);
    const run: RunState = { tree, value: initialValue, splicedPaths: [] };
    log.info(`Initial tree: ${initial.nodes} decision nodes, ${initial.leaves} leaves, value ${initialValue}`);

    if (!config.hybridizationEnabled) {
      return finish('done', { run, initial, initialTree });
    }

    this.transition('selecting_candidates');
    const candidates = selectSubProblems(tree, selectorOptions(config));
    log.info(`${candidates.length} candidate sub-tree(s) selected`);
    if (candidates.length === 0) {
      return finish('done', { run, initial, initialTree });
    }

    this.transition('refining');
    let attempts = 0;
    for (let index = 0; index < candidates.length; index++) {
      if (budget.expired()) {
        const reason = new GlobalTimeoutError(budget.budgetMs).message;
        log.warn(`${reason}; ${candidates.length - index} candidate(s) not attempted`);
        return finish('aborted', { abortReason: reason, partial: true, generated: candidates.length, run, initial, initialTree });
      }
      if (config.maxIterations !== undefined && attempts >= config.maxIterations) {
        log.info(`Iteration cap of ${config.maxIterations} reached`);
        break;
      }

      const candidate = candidates[index];
      const started = this.clock();
      const outcome = await this.refineCandidate(candidate, index, run, config);
      const record = this.toRecord(candidate, index, outcome, this.clock() - started);
      if (record.status !== 'skipped') attempts++;
      records.push(record);
      this.report(record);
      if (this.options.progress) {
        await this.options.progress.append(record);
      }
    }

    return finish('done', { generated: candidates.length, run, initial, initialTree });
  }

  private async obtainInitialGraph(config: RefinerConfig, budget: TimeBudget): Promise<string> {
    if (config.initialTree !== undefined) {
      log.debug(`Reading initial tree from ${config.initialTree}`);
      return fs.readFile(config.initialTree, 'utf-8');
    }
    return this.options.collaborators.generator.generate({
      model: config.model,
      specification: config.specification,
      timeoutMs: budget.remainingMs(),
    });
  }

  /**
   * One candidate, start to finish. Never throws for candidate-level
   * failures; they come back as a rejected or skipped outcome.
   */
  private async refineCandidate(candidate: SubProblem, index: number, run: RunState, config: RefinerConfig): Promise<Outcome> {
    const { evaluator, resynthesizer } = this.options.collaborators;
    const tree = run.tree;

    // A splice at or above this candidate replaced its nodes.
    if (run.splicedPaths.some((p) => isPathPrefix(p, candidate.treePath)) || !tree.locate(candidate.treePath)) {
      return { status: 'skipped', reason: 'invalidated' };
    }
    const stats = tree.subtreeStats(candidate.rootId);
    if (stats.depth < config.minSubtreeDepth || stats.decisionNodes < config.minNodeCount) {
      return {
        status: 'skipped',
        reason: 'no_longer_meets_thresholds',
        detail: `now height ${stats.depth}, ${stats.decisionNodes} decision nodes`,
      };
    }
    const replacedNodeCount = stats.decisionNodes;

    this.emit('candidate:start', candidate, index);

    let restriction: StateRestriction;
    try {
      restriction = translatePathCondition(candidate.pathCondition, { variables: config.variables });
    } catch (error) {
      if (error instanceof UnsupportedPredicateError) {
        return { status: 'rejected', reason: 'unsupported_predicate', detail: error.message };
      }
      throw error;
    }

    let optimalValue: number;
    let baselineValue: number;
    try {
      optimalValue = await evaluator.optimalValue(restriction);
      baselineValue = await evaluator.baselineValue(restriction);
    } catch (error) {
      return { status: 'rejected', reason: 'evaluation_failed', detail: getErrorMessage(error) };
    }
    const threshold = valueThreshold(optimalValue, baselineValue, config.maxLoss);
    const values = { threshold, optimalValue, baselineValue };

    const timeoutMs = config.candidateTimeout * 1000;
    let synthesis: ResynthesisResult;
    try {
      synthesis = await withTimeout(
        resynthesizer.synthesize({
          model: config.model,
          specification: config.specification,
          restriction,
          subtree: tree.copySubtree(candidate.rootId),
          timeoutMs,
        }),
        timeoutMs,
        () => new CandidateTimeoutError(timeoutMs)
      );
    } catch (error) {
      if (error instanceof CandidateTimeoutError) {
        return { status: 'rejected', reason: 'candidate_timeout', detail: error.message, details: values };
      }
      if (error instanceof InfeasibleConstraintError) {
        return { status: 'rejected', reason: 'infeasible_constraint', detail: error.message, details: values };
      }
      return { status: 'rejected', reason: 'synthesis_failed', detail: getErrorMessage(error), details: values };
    }
    if (synthesis.status === 'infeasible') {
      return { status: 'rejected', reason: 'infeasible_constraint', detail: synthesis.message, details: values };
    }

    let replacement: DecisionTree;
    try {
      replacement = parseTreeGraph(synthesis.graph, { actions: config.actions });
    } catch (error) {
      return { status: 'rejected', reason: 'invalid_replacement', detail: getErrorMessage(error), details: values };
    }
    const replacementNodeCount = replacement.stats().decisionNodes;
    if (replacementNodeCount !== synthesis.nodeCount) {
      log.debug(`candidate ${index}: reported ${synthesis.nodeCount} decision nodes, graph has ${replacementNodeCount}`);
    }
    const measured = { ...values, value: synthesis.value, replacementNodeCount };

    const decision = decideAcceptance({
      value: synthesis.value,
      threshold,
      nodeCount: replacementNodeCount,
      replacedNodeCount,
      objective: config.objective,
    });
    if (!decision.accepted) {
      return { status: 'rejected', reason: decision.reason, details: measured };
    }

    const splice = tree.replaceSubtree(candidate.treePath, replacement);
    let verification: TreeEvaluation;
    try {
      verification = await evaluator.evaluateTree(tree);
      if (!verification.satisfied) {
        throw new ReVerificationError('spliced tree no longer satisfies the specification');
      }
    } catch (error) {
      tree.undoSplice(candidate.treePath, splice);
      return { status: 'rejected', reason: 're_verification_failed', detail: getErrorMessage(error), details: measured };
    }

    run.value = verification.value;
    run.splicedPaths.push(candidate.treePath);
    return { status: 'accepted', details: measured };
  }

  private toRecord(candidate: SubProblem, index: number, outcome: Outcome, elapsedMs: number): CandidateRecord {
    const record: CandidateRecord = {
      index,
      rootId: candidate.rootId,
      treePath: [...candidate.treePath],
      pathCondition: formatPathCondition(candidate.pathCondition),
      depth: candidate.depth,
      nodeCount: candidate.nodeCount,
      status: outcome.status,
      elapsedMs,
    };
    if (outcome.status !== 'accepted') {
      record.reason = outcome.reason;
      if (outcome.detail !== undefined) record.detail = outcome.detail;
    }
    const details = outcome.status === 'skipped' ? undefined : outcome.details;
    return { ...record, ...details };
  }

  private report(record: CandidateRecord): void {
    const where = `candidate ${record.index} [${record.pathCondition}]`;
    if (record.status === 'accepted') {
      log.success(`Accepted ${where}: ${record.nodeCount} -> ${record.replacementNodeCount ?? '?'} decision nodes, value ${record.value ?? '?'}`);
    } else if (record.reason !== undefined) {
      const detail = record.detail ? ` (${record.detail})` : '';
      log.info(`${record.status === 'skipped' ? 'Skipped' : 'Rejected'} ${where}: ${OUTCOME_MESSAGES[record.reason]}${detail}`);
    }
    this.emit('candidate:result', record);
  }
}

export function selectorOptions(config: RefinerConfig): SelectorOptions {
  return {
    maxRootDepth: config.maxSubtreeDepth,
    minSubtreeDepth: config.minSubtreeDepth,
    minNodeCount: config.minNodeCount,
    includeRoot: config.includeRoot,
    order: config.candidateOrder,
  };
}

export function summarizeTree(tree: DecisionTree, value?: number): TreeSummary {
  const stats = tree.stats();
  return { nodes: stats.decisionNodes, leaves: stats.leaves, depth: stats.depth, value };
}
