import { validateThresholds } from '../../src/evaluation/thresholds';
import { ScoreCard } from '../../src/evaluation/types';

describe('validateThresholds', () => {
  const computed: ScoreCard = {
    body_similarity: 1,
    personalization_score: 0.5,
    locale_accuracy: 1,
    safety_violations: 1,
  };

  it('should fail latency above the maximum', () => {
    const [result] = validateThresholds({ p95_latency_ms: 2000 }, { latency_ms: 2500 }, computed);
    expect(result.name).toBe('latency_threshold');
    expect(result.status).toBe('failed');
    expect(result.message).toBe('Latency: 2500ms (threshold: 2000ms)');
  });

  it('should pass latency at or below the maximum', () => {
    expect(validateThresholds({ p95_latency_ms: 2000 }, { latency_ms: 2000 }, computed)[0].status).toBe('passed');
    expect(validateThresholds({ p95_latency_ms: 2000 }, { latency_ms: 1500 }, computed)[0].status).toBe('passed');
  });

  it('should fail a declared latency threshold with no latency metric', () => {
    const [result] = validateThresholds({ p95_latency_ms: 2000 }, {}, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe('Metric latency_ms was not supplied');
  });

  it('should fail when metrics are absent altogether', () => {
    expect(validateThresholds({ p95_latency_ms: 2000 }, null, computed)[0].status).toBe('failed');
  });

  it('should fall back to computed scores for lower bounds', () => {
    const [result] = validateThresholds({ personalization_score_min: 0.8 }, {}, computed);
    expect(result.name).toBe('personalization_score_threshold');
    expect(result.status).toBe('warning');
    expect(result.message).toBe('Personalization: 0.50 (min: 0.8)');
  });

  it('should fail locale accuracy below the minimum', () => {
    const [result] = validateThresholds({ locale_accuracy_min: 0.9 }, { locale_accuracy: 0.4 }, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe('Locale accuracy: 0.40 (min: 0.9)');
  });

  it('should fail a non-numeric personalization metric rather than warn', () => {
    const [result] = validateThresholds({ personalization_score_min: 0.5 }, { personalization_score: 'high' }, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe("Metric personalization_score is not numeric (got 'high')");
  });

  it('should prefer a supplied score over the computed one', () => {
    const [result] = validateThresholds({ personalization_score_min: 0.8 }, { personalization_score: 0.9 }, computed);
    expect(result.status).toBe('passed');
    expect(result.message).toBe('Personalization: 0.90 (min: 0.8)');
  });

  it('should pass locale accuracy at the minimum', () => {
    const [result] = validateThresholds({ locale_accuracy_min: 1 }, {}, computed);
    expect(result.status).toBe('passed');
    expect(result.message).toBe('Locale accuracy: 1.00 (min: 1)');
  });

  it('should treat safety violations as an upper bound', () => {
    const [result] = validateThresholds({ safety_violations_max: 0 }, {}, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe('Safety violations: 1 (max: 0)');
  });

  it('should fail a non-numeric threshold', () => {
    const [result] = validateThresholds({ p95_latency_ms: 'fast' }, { latency_ms: 100 }, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe("Threshold p95_latency_ms is not numeric (got 'fast')");
  });

  it('should fail a non-numeric metric', () => {
    const [result] = validateThresholds({ p95_latency_ms: 2000 }, { latency_ms: '2500' }, computed);
    expect(result.status).toBe('failed');
    expect(result.message).toBe("Metric latency_ms is not numeric (got '2500')");
  });

  it('should warn on unrecognized keys, including inherited property names', () => {
    const results = validateThresholds({ tone_min: 0.5, constructor: 1 }, {}, computed);
    expect(results.map((r) => [r.name, r.status])).toEqual([
      ['threshold_tone_min', 'warning'],
      ['threshold_constructor', 'warning'],
    ]);
    expect(results[0].message).toBe("Unrecognized threshold 'tone_min' ignored");
  });

  it('should emit nothing without thresholds', () => {
    expect(validateThresholds(null, { latency_ms: 10 }, computed)).toEqual([]);
  });

  it('should keep declaration order', () => {
    const results = validateThresholds(
      { safety_violations_max: 1, p95_latency_ms: 2000 },
      { latency_ms: 10 },
      computed,
    );
    expect(results.map((r) => r.name)).toEqual(['safety_violations_threshold', 'latency_threshold']);
  });
});
