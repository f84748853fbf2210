// Library surface

export { DecisionTree, TreeBuilder, type SpliceResult, type TreeOptions } from './tree/decision-tree.js';
export { parseDotGraph, parseTreeGraph, type DotGraph } from './tree/dot-parser.js';
export { parseLabel, type LabelParseResult } from './tree/label-grammar.js';
export { toDot } from './tree/dot-writer.js';
export { fromJSON, toJSON } from './tree/tree-json.js';
export { renderTree } from './tree/tree-render.js';
export * from './tree/types.js';

export { selectSubProblems, formatPathCondition, type SelectorOptions } from './refinement/selector.js';
export { translatePathCondition } from './refinement/constraint-translator.js';
export { decideAcceptance, meetsThreshold, valueThreshold } from './refinement/acceptance.js';
export { TimeBudget } from './refinement/time-budget.js';
export { Orchestrator, type OrchestratorEvents, type OrchestratorOptions, type RunResult } from './refinement/orchestrator.js';
export { FileArtifactSink, type ArtifactSink } from './refinement/artifacts.js';
export { ProgressLog, type ProgressSink } from './refinement/progress-log.js';
export { formatSummary, summaryToJSON } from './refinement/report.js';
export * from './refinement/types.js';

export * from './collaborators/index.js';
export { ProcessTreeGenerator } from './collaborators/process-generator.js';
export { ProcessReSynthesizer } from './collaborators/process-resynthesizer.js';
export { ProcessValueEvaluator } from './collaborators/process-evaluator.js';

export { loadConfig, parseConfig, getDefaultConfig, type RefinerConfig, type RefinerConfigInput } from './utils/config.js';
export * from './utils/errors.js';
