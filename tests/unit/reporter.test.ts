import { buildFindingsDocument, renderReport, runStatus, summarize } from '../../src/reporting/reporter';
import { ASCII_SYMBOLS } from '../../src/reporting/status-symbols';
import { check } from '../../src/evaluation/check-result';
import { Findings } from '../../src/evaluation/types';

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

function findings(taskId: string, overall: Findings['overall_status'], checks: Partial<Findings['checks']> = {}): Findings {
  return {
    task_id: taskId,
    persona: null,
    lifecycle_stage: null,
    overall_status: overall,
    checks: { output_match: [], threshold: [], assertion: [], constraint: [], ...checks },
    scores: {},
  };
}

describe('Reporter', () => {
  const passed: Findings = {
    ...findings('t1', 'passed', {
      output_match: [
        check('channel_match', 'passed', "Channel: expected 'sms', got 'sms'"),
        check('body_similarity', 'passed', 'Body similarity: 100.00%'),
      ],
      constraint: [check('constraint_respect_consent', 'passed', "Consent respected: 'sms' opted in")],
    }),
    scores: { body_similarity: 1, safety_violations: 0 },
  };
  const failed = findings('t3', 'failed', {
    threshold: [check('latency_threshold', 'failed', 'Latency: 2500ms (threshold: 2000ms)')],
  });
  const warned = findings('t5', 'passed_with_warnings', {
    assertion: [check('assertion_x', 'warning', "Unknown assertion 'x' skipped")],
  });

  describe('summarize', () => {
    it('should count tasks per overall status', () => {
      expect(summarize([passed, failed, warned, passed])).toEqual({
        total: 4,
        passed: 2,
        passed_with_warnings: 1,
        failed: 1,
      });
    });

    it('should handle an empty run', () => {
      expect(summarize([])).toEqual({ total: 0, passed: 0, passed_with_warnings: 0, failed: 0 });
    });
  });

  describe('runStatus', () => {
    it('should take the worst task status', () => {
      expect(runStatus(summarize([passed, warned]))).toBe('passed_with_warnings');
      expect(runStatus(summarize([passed, warned, failed]))).toBe('failed');
      expect(runStatus(summarize([]))).toBe('passed');
    });
  });

  describe('buildFindingsDocument', () => {
    it('should pair the summary with the findings in input order', () => {
      const doc = buildFindingsDocument([failed, passed]);
      expect(doc.summary.total).toBe(2);
      expect(doc.findings.map((f) => f.task_id)).toEqual(['t3', 't1']);
    });
  });

  describe('renderReport', () => {
    it('should render the header, grouped checks and two-decimal scores', () => {
      expect(renderReport([passed]).split('\n')).toEqual([
        RULE,
        'EVALUATION REPORT',
        RULE,
        '',
        'Total Tasks: 1',
        '✅ Passed: 1',
        '⚠️ Passed with Warnings: 0',
        '❌ Failed: 0',
        '',
        DIVIDER,
        '✅ Task: t1 (PASSED)',
        DIVIDER,
        '',
        '📋 Output Match Checks:',
        "  ✓ Channel: expected 'sms', got 'sms'",
        '  ✓ Body similarity: 100.00%',
        '',
        '⚖️  Constraint Checks:',
        "  ✓ Consent respected: 'sms' opted in",
        '',
        '📊 Scores:',
        '  • body_similarity: 1.00',
        '  • safety_violations: 0.00',
        '',
        RULE,
      ]);
    });

    it('should keep input order without resorting', () => {
      const lines = renderReport([failed, passed, warned]).split('\n');
      const headers = lines.filter((l) => l.includes(' Task: '));
      expect(headers).toEqual(['❌ Task: t3 (FAILED)', '✅ Task: t1 (PASSED)', '⚠️ Task: t5 (PASSED_WITH_WARNINGS)']);
    });

    it('should use the given symbol table', () => {
      const lines = renderReport([failed], ASCII_SYMBOLS).split('\n');
      expect(lines).toContain('[FAIL] Task: t3 (FAILED)');
      expect(lines).toContain('Threshold Checks:');
      expect(lines).toContain('  [x] Latency: 2500ms (threshold: 2000ms)');
    });

    it('should be a pure function of its input', () => {
      expect(renderReport([passed, failed])).toBe(renderReport([passed, failed]));
    });
  });
});
