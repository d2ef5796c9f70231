import { CheckResult, CheckStatus, Metrics, ScoreCard } from './types';
import { check } from './check-result';
import { SUPPLIABLE_SCORES, SuppliableScore } from './scorer';

type Direction = 'max' | 'min';

interface ThresholdRule {
  /** Check name in findings */
  name: string;
  /** Metric the threshold applies to */
  metric: 'latency_ms' | SuppliableScore;
  direction: Direction;
  /** Status of a value outside the bound */
  onViolation: CheckStatus;
  format: (actual: number, limit: number) => string;
}

const fixed2 = (n: number): string => n.toFixed(2);

/**
 * Directionality is fixed per key. Personalization below its minimum only
 * warns; every other violation fails.
 */
export const THRESHOLD_RULES: ReadonlyMap<string, ThresholdRule> = new Map<string, ThresholdRule>([
  ['p95_latency_ms', {
    name: 'latency_threshold',
    metric: 'latency_ms',
    direction: 'max',
    onViolation: 'failed',
    format: (actual, limit) => `Latency: ${actual}ms (threshold: ${limit}ms)`,
  }],
  ['personalization_score_min', {
    name: 'personalization_score_threshold',
    metric: 'personalization_score',
    direction: 'min',
    onViolation: 'warning',
    format: (actual, limit) => `Personalization: ${fixed2(actual)} (min: ${limit})`,
  }],
  ['locale_accuracy_min', {
    name: 'locale_accuracy_threshold',
    metric: 'locale_accuracy',
    direction: 'min',
    onViolation: 'failed',
    format: (actual, limit) => `Locale accuracy: ${fixed2(actual)} (min: ${limit})`,
  }],
  ['safety_violations_max', {
    name: 'safety_violations_threshold',
    metric: 'safety_violations',
    direction: 'max',
    onViolation: 'failed',
    format: (actual, limit) => `Safety violations: ${actual} (max: ${limit})`,
  }],
]);

function isSuppliable(metric: string): metric is SuppliableScore {
  return SUPPLIABLE_SCORES.some((score) => score === metric);
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * Resolve the observed value for a metric: a supplied value when present,
 * otherwise the computed score. Latency is never computed.
 */
function observe(
  metric: ThresholdRule['metric'],
  metrics: Metrics | null | undefined,
  computed: ScoreCard,
): { value: number } | { error: string } {
  const supplied = metrics?.[metric];
  if (supplied !== undefined && supplied !== null) {
    return typeof supplied === 'number' && Number.isFinite(supplied)
      ? { value: supplied }
      : { error: `Metric ${metric} is not numeric (got ${describe(supplied)})` };
  }
  if (isSuppliable(metric)) return { value: computed[metric] };
  return { error: `Metric ${metric} was not supplied` };
}

/** One check per declared threshold, in declaration order */
export function validateThresholds(
  thresholds: Record<string, unknown> | null,
  metrics: Metrics | null | undefined,
  computed: ScoreCard,
): CheckResult[] {
  if (!thresholds) return [];
  const checks: CheckResult[] = [];

  for (const [key, limitValue] of Object.entries(thresholds)) {
    const rule = THRESHOLD_RULES.get(key);
    if (!rule) {
      checks.push(check(`threshold_${key}`, 'warning', `Unrecognized threshold '${key}' ignored`));
      continue;
    }

    if (typeof limitValue !== 'number' || !Number.isFinite(limitValue)) {
      checks.push(check(rule.name, 'failed', `Threshold ${key} is not numeric (got ${describe(limitValue)})`));
      continue;
    }

    const observed = observe(rule.metric, metrics, computed);
    if ('error' in observed) {
      checks.push(check(rule.name, 'failed', observed.error, { threshold: limitValue, actual: null }));
      continue;
    }

    const passed = rule.direction === 'max' ? observed.value <= limitValue : observed.value >= limitValue;
    checks.push(
      check(rule.name, passed ? 'passed' : rule.onViolation, rule.format(observed.value, limitValue), {
        threshold: limitValue,
        actual: observed.value,
      }),
    );
  }

  return checks;
}
