/**
 * Evaluation Types
 *
 * Wire shapes for eval specifications, agent outputs and metrics (snake_case,
 * as persisted in the JSONL test set and the agent results file), plus the
 * findings record produced for every task.
 */

// ───── Inputs ─────────────────────────────────────────────────

export interface CtaRecord {
  type?: string | null;
  [key: string]: unknown;
}

export interface MessageRecord {
  /** Channel name; null, empty or "none" means no message */
  channel?: string | null;
  subject?: string | null;
  /** Null when the agent correctly withholds contact (e.g. opt-out) */
  body?: string | null;
  cta?: CtaRecord | null;
  /** Dedicated unsubscribe field some email renderers fill instead of the body */
  unsubscribe?: string | null;
  [key: string]: unknown;
}

export interface ActionRecord {
  type?: string | null;
  value?: unknown;
  [key: string]: unknown;
}

export interface EvalAssertions {
  required_states?: string[];
  constraints?: Record<string, unknown>;
  [key: string]: unknown;
}

/** One test case, one line of the JSONL test set */
export interface EvalSpec {
  task_id: string;
  persona?: string | null;
  lifecycle_stage?: string | null;
  /** channel → opt-in; `<channel>_opt_in` keys are accepted too */
  consent?: Record<string, unknown>;
  channel_preferences?: string[];
  input?: Record<string, unknown>;
  assertions?: EvalAssertions;
  thresholds?: Record<string, unknown>;
  expected?: {
    next_message?: MessageRecord | null;
    next_action?: ActionRecord | null;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

/** What the agent produced for one task */
export interface AgentOutput {
  next_message?: MessageRecord | null;
  next_action?: ActionRecord | null;
  /** States the upstream run claims to have satisfied */
  states?: string[];
  [key: string]: unknown;
}

/** Externally measured observations; omitted scores are computed */
export interface Metrics {
  latency_ms?: unknown;
  personalization_score?: unknown;
  locale_accuracy?: unknown;
  safety_violations?: unknown;
  [key: string]: unknown;
}

/** One entry of the agent results file */
export interface AgentRunResult {
  task_id: string;
  output?: AgentOutput | null;
  metrics?: Metrics | null;
  [key: string]: unknown;
}

// ───── Results ────────────────────────────────────────────────

export type CheckStatus = 'passed' | 'warning' | 'failed';

export type OverallStatus = 'passed' | 'passed_with_warnings' | 'failed';

export type CheckCategory = 'output_match' | 'threshold' | 'assertion' | 'constraint';

export const CHECK_CATEGORIES: readonly CheckCategory[] = ['output_match', 'threshold', 'assertion', 'constraint'];

export interface CheckResult {
  readonly name: string;
  readonly status: CheckStatus;
  readonly message: string;
  readonly expected?: unknown;
  readonly actual?: unknown;
  readonly similarity?: number;
  readonly threshold?: number;
}

export interface ScoreCard {
  body_similarity: number;
  personalization_score: number;
  locale_accuracy: number;
  safety_violations: number;
}

export type CheckGroups = Readonly<Record<CheckCategory, readonly CheckResult[]>>;

/** Complete evaluation result for one task */
export interface Findings {
  readonly task_id: string;
  readonly persona: string | null;
  readonly lifecycle_stage: string | null;
  readonly overall_status: OverallStatus;
  readonly checks: CheckGroups;
  readonly scores: Readonly<Record<string, number>>;
}
