// Error taxonomy of a refinement run

export type RefinementErrorCode =
  | 'configuration'
  | 'initial_generation'
  | 'parse'
  | 'tree_structure'
  | 'unsupported_predicate'
  | 'infeasible_constraint'
  | 'candidate_timeout'
  | 're_verification'
  | 'global_timeout'
  | 'external_tool';

/**
 * Base class for every error the engine raises on purpose.
 * `code` is stable and ends up in run summaries and progress logs.
 */
export class RefinementError extends Error {
  constructor(
    message: string,
    public readonly code: RefinementErrorCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'RefinementError';
  }
}

export class ConfigurationError extends RefinementError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

/** The fast generator failed, timed out, or produced nothing usable. Fatal. */
export class InitialGenerationError extends RefinementError {
  constructor(message: string, cause?: unknown) {
    super(message, 'initial_generation', cause);
    this.name = 'InitialGenerationError';
  }
}

export class ParseError extends RefinementError {
  constructor(message: string, public readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`, 'parse');
    this.name = 'ParseError';
  }
}

/** A structural operation was asked to do something the tree cannot satisfy. */
export class TreeStructureError extends RefinementError {
  constructor(message: string) {
    super(message, 'tree_structure');
    this.name = 'TreeStructureError';
  }
}

export class UnsupportedPredicateError extends RefinementError {
  constructor(message: string) {
    super(message, 'unsupported_predicate');
    this.name = 'UnsupportedPredicateError';
  }
}

export class InfeasibleConstraintError extends RefinementError {
  constructor(message: string) {
    super(message, 'infeasible_constraint');
    this.name = 'InfeasibleConstraintError';
  }
}

export class CandidateTimeoutError extends RefinementError {
  constructor(public readonly timeoutMs: number, what: string = 're-synthesis') {
    super(`${what} exceeded ${timeoutMs}ms`, 'candidate_timeout');
    this.name = 'CandidateTimeoutError';
  }
}

export class ReVerificationError extends RefinementError {
  constructor(message: string) {
    super(message, 're_verification');
    this.name = 'ReVerificationError';
  }
}

export class GlobalTimeoutError extends RefinementError {
  constructor(public readonly budgetMs: number) {
    super(`global time budget of ${budgetMs}ms exhausted`, 'global_timeout');
    this.name = 'GlobalTimeoutError';
  }
}

/** Non-zero exit, unreadable output or a spawn failure of an external tool. */
export class ExternalToolError extends RefinementError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly stderr?: string
  ) {
    super(message, 'external_tool');
    this.name = 'ExternalToolError';
  }
}

export function isRefinementError(error: unknown): error is RefinementError {
  return error instanceof RefinementError;
}
