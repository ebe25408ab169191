/**
 * Quality Gate
 *
 * Runs a fixed, ordered list of named checks against an artifact. A check
 * may declare itself not applicable; those count as passed. Checks are pure
 * functions of the artifact and the outcomes before them, so evaluating the
 * same artifact twice gives the same result.
 */

import type { CheckResult, GateResult } from '../types';

// ============================================================================
// Types
// ============================================================================

export type CheckVerdict = 'pass' | 'fail' | 'n/a';

export interface CheckOutcome {
  readonly verdict: CheckVerdict;
  readonly rationale: string;
}

export interface CheckSpec<A> {
  readonly name: string;
  evaluate(artifact: A, prior: readonly CheckResult[]): CheckOutcome;
}

// ============================================================================
// Outcome helpers
// ============================================================================

export function pass(rationale: string): CheckOutcome {
  return { verdict: 'pass', rationale };
}

export function fail(rationale: string): CheckOutcome {
  return { verdict: 'fail', rationale };
}

export function notApplicable(rationale: string): CheckOutcome {
  return { verdict: 'n/a', rationale };
}

/**
 * Fails with every issue listed, or passes with the given rationale.
 */
export function fromIssues(issues: readonly string[], passRationale: string): CheckOutcome {
  return issues.length > 0 ? fail(issues.join('; ')) : pass(passRationale);
}

function toCheckResult(name: string, outcome: CheckOutcome): CheckResult {
  return {
    name,
    passed: outcome.verdict !== 'fail',
    notApplicable: outcome.verdict === 'n/a',
    rationale: outcome.rationale,
  };
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluates every check in order. A check that throws is recorded as failed
 * with the error as its rationale; later checks still run.
 *
 * @example
 * const result = evaluateGate('editorial', artifact, EDITORIAL_CHECKS);
 * if (!result.overallPassed) quarantine(result);
 */
export function evaluateGate<A>(gateName: string, artifact: A, checks: readonly CheckSpec<A>[]): GateResult {
  const results: CheckResult[] = [];

  for (const check of checks) {
    let outcome: CheckOutcome;
    try {
      outcome = check.evaluate(artifact, results);
    } catch (error) {
      outcome = fail(`Check raised an error: ${error instanceof Error ? error.message : String(error)}`);
    }
    results.push(toCheckResult(check.name, outcome));
  }

  return {
    gateName,
    checks: results,
    overallPassed: results.every((result) => result.notApplicable || result.passed),
  };
}

/**
 * A named gate bound to its check list.
 */
export class QualityGate<A> {
  constructor(
    readonly name: string,
    private readonly checks: readonly CheckSpec<A>[]
  ) {}

  get checkNames(): string[] {
    return this.checks.map((check) => check.name);
  }

  evaluate(artifact: A): GateResult {
    return evaluateGate(this.name, artifact, this.checks);
  }
}

/**
 * Failed checks of a gate result, for logs and reports.
 */
export function getFailedChecks(result: GateResult): CheckResult[] {
  return result.checks.filter((check) => !check.notApplicable && !check.passed);
}
