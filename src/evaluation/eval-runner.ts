/**
 * Eval Runner
 *
 * Runs the comparator, scorer and rule engine for one task and merges the
 * results into a frozen findings record. Holds no per-task state, so tasks can
 * be evaluated in any order or in parallel.
 */

import { AgentOutput, AgentRunResult, CheckCategory, CheckResult, EvalSpec, Findings, Metrics } from './types';
import { Lexicon } from '../config/lexicon';
import { logger } from '../observability/logger';
import { compareOutput } from './comparator';
import { Scorer, effectiveScores } from './scorer';
import { validateThresholds } from './thresholds';
import { validateAssertions, defaultAssertionRegistry } from './assertions';
import { validateConstraints, defaultConstraintRegistry } from './constraints';
import { RuleContext, RuleRegistry } from './rule-registry';
import {
  readConstraints,
  readExpected,
  readLanguage,
  readOutput,
  readRequiredStates,
  readSection,
  sectionProblems,
} from './record-views';
import { check, deriveOverallStatus, flattenChecks } from './check-result';
import { assertEvalSpec, assertUniqueTaskIds } from './spec-contract';

export interface EvalRunnerOptions {
  constraints?: RuleRegistry<unknown>;
  assertions?: RuleRegistry<string>;
}

function passThrough(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export class EvalRunner {
  private readonly log = logger.child({ component: 'eval-runner' });
  private readonly scorer: Scorer;
  private readonly constraints: RuleRegistry<unknown>;
  private readonly assertions: RuleRegistry<string>;

  constructor(
    private readonly lexicon: Lexicon,
    options: EvalRunnerOptions = {},
  ) {
    this.scorer = new Scorer(lexicon);
    this.constraints = options.constraints ?? defaultConstraintRegistry;
    this.assertions = options.assertions ?? defaultAssertionRegistry;
  }

  /**
   * Evaluate one task. Throws EvalSpecError only when the spec is
   * structurally malformed; every other problem becomes a check.
   */
  runEval(spec: unknown, output?: AgentOutput | null, metrics?: Metrics | null): Findings {
    const evalSpec = assertEvalSpec(spec);
    const expected = readExpected(evalSpec);
    const actual = readOutput(output);

    const computed = this.scorer.score(evalSpec, expected, actual.message);
    const scores = effectiveScores(computed, metrics);

    const ctx: RuleContext = {
      spec: evalSpec,
      output: actual,
      scores,
      lexicon: this.lexicon,
      scorer: this.scorer,
      language: readLanguage(evalSpec, this.lexicon.defaultLanguage),
      consent: readSection(evalSpec, 'consent'),
    };

    const problems = sectionProblems(evalSpec);
    const malformed = (category: CheckCategory): CheckResult[] =>
      problems.filter((p) => p.category === category).map((p) => check(p.name, 'failed', p.message));

    const checks = Object.freeze({
      output_match: Object.freeze([
        ...compareOutput(expected, actual, this.lexicon),
        ...malformed('output_match'),
      ]),
      threshold: Object.freeze([
        ...validateThresholds(readSection(evalSpec, 'thresholds'), metrics, computed),
        ...malformed('threshold'),
      ]),
      assertion: Object.freeze([
        ...validateAssertions(ctx, readRequiredStates(evalSpec), this.assertions),
        ...malformed('assertion'),
      ]),
      constraint: Object.freeze([
        ...validateConstraints(ctx, readConstraints(evalSpec), this.constraints),
        ...malformed('constraint'),
      ]),
    });

    const findings: Findings = {
      task_id: evalSpec.task_id,
      persona: passThrough(evalSpec.persona),
      lifecycle_stage: passThrough(evalSpec.lifecycle_stage),
      overall_status: deriveOverallStatus(flattenChecks(checks)),
      checks,
      scores: Object.freeze({ ...scores }),
    };

    this.log.debug({ taskId: findings.task_id, status: findings.overall_status }, 'Task evaluated');
    return Object.freeze(findings);
  }

  /**
   * Evaluate a whole run, in spec order. Duplicate spec ids are fatal; for a
   * task id repeated in the results the last result wins, with a warning.
   * Results without a spec are skipped, specs without a result are evaluated
   * against an empty output, and an unexpected error fails only its own task.
   */
  evaluateRun(specs: readonly EvalSpec[], results: readonly AgentRunResult[]): Findings[] {
    specs.forEach((spec) => assertEvalSpec(spec));
    assertUniqueTaskIds(specs);

    const byTask = new Map<string, AgentRunResult>();
    for (const result of results) {
      if (byTask.has(result.task_id)) {
        this.log.warn({ taskId: result.task_id }, 'Duplicate agent result for task; using the last one');
      }
      byTask.set(result.task_id, result);
    }

    const known = new Set(specs.map((s) => s.task_id));
    for (const result of results) {
      if (!known.has(result.task_id)) {
        this.log.warn({ taskId: result.task_id }, 'No eval spec found for result; skipping');
      }
    }

    this.log.info({ specCount: specs.length, resultCount: results.length }, 'Starting evaluation run');

    const findings = specs.map((spec) => {
      const result = byTask.get(spec.task_id);
      if (!result) {
        this.log.warn({ taskId: spec.task_id }, 'No agent result for task; evaluating empty output');
      }
      try {
        return this.runEval(spec, result?.output, result?.metrics);
      } catch (err) {
        this.log.error({ err, taskId: spec.task_id }, 'Evaluation of task failed');
        return this.errorFindings(spec, err);
      }
    });

    const failed = findings.filter((f) => f.overall_status === 'failed').length;
    this.log.info({ total: findings.length, failed }, 'Evaluation run complete');
    return findings;
  }

  private errorFindings(spec: EvalSpec, err: unknown): Findings {
    const error: CheckResult = check(
      'evaluation_error',
      'failed',
      `Evaluation error: ${err instanceof Error ? err.message : String(err)}`,
    );
    const findings: Findings = {
      task_id: spec.task_id,
      persona: passThrough(spec.persona),
      lifecycle_stage: passThrough(spec.lifecycle_stage),
      overall_status: 'failed',
      checks: Object.freeze({
        output_match: Object.freeze([error]),
        threshold: Object.freeze([]),
        assertion: Object.freeze([]),
        constraint: Object.freeze([]),
      }),
      scores: Object.freeze({}),
    };
    return Object.freeze(findings);
  }
}
