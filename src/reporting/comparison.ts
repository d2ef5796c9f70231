/**
 * Side-by-side comparison of expected and actual outputs, for reviewing a run
 * by eye. Unlike the findings, nothing here is graded by rules; it only shows
 * what differs.
 */

import { AgentOutput, AgentRunResult, EvalSpec } from '../evaluation/types';
import { ActionView, readExpected, readOutput, readSection } from '../evaluation/record-views';
import { SIMILARITY_PASS, SIMILARITY_WARN, formatPercent } from '../evaluation/check-result';
import { diffLines, nullableSimilarity, similarity } from '../evaluation/similarity';

export const MAX_DIFF_LINES = 20;

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

const DIFF_PREFIX = { equal: ' ', delete: '-', insert: '+' } as const;

function show(value: string | null): string {
  return value ?? 'none';
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

function describeAction(action: ActionView): string {
  return JSON.stringify({ type: action.type, value: action.value });
}

function mark(match: boolean): string {
  return match ? '✅' : '❌';
}

/** Changed lines with context, cut at MAX_DIFF_LINES */
export function renderDiff(expected: string, actual: string): string[] {
  const ops = diffLines(expected, actual);
  if (ops.every((op) => op.op === 'equal')) {
    return ['    (No line-level differences)'];
  }
  const lines = ops.slice(0, MAX_DIFF_LINES).map((op) => `    ${DIFF_PREFIX[op.op]} ${op.text}`.trimEnd());
  if (ops.length > MAX_DIFF_LINES) lines.push('    ... (diff truncated)');
  return lines;
}

export function compareTask(spec: EvalSpec, output: AgentOutput | null | undefined): string {
  const expected = readExpected(spec);
  const actual = readOutput(output);
  const exp = expected.message;
  const act = actual.message;

  const lines = [RULE, `TASK: ${spec.task_id}`, RULE, '', '📧 NEXT MESSAGE', DIVIDER];

  lines.push(
    '',
    '🔹 Channel:',
    `  Expected: ${show(exp.channel)}`,
    `  Actual:   ${show(act.channel)}`,
    `  Status:   ${exp.channel === act.channel ? '✅ MATCH' : '❌ MISMATCH'}`,
  );

  if (exp.subject !== null || act.subject !== null) {
    lines.push('', '🔹 Subject:', `  Expected: ${show(exp.subject)}`, `  Actual:   ${show(act.subject)}`);
    lines.push(`  Similarity: ${formatPercent(nullableSimilarity(exp.subject, act.subject))}`);
  }

  lines.push('', '🔹 Body:');
  if (exp.body === null && act.body === null) {
    lines.push('  Both: null (no message)');
  } else {
    lines.push('  Expected:', indent(exp.body ?? 'null', '    '), '  Actual:', indent(act.body ?? 'null', '    '));
    if (exp.body !== null && act.body !== null) {
      const ratio = similarity(exp.body, act.body);
      lines.push(`  Similarity: ${formatPercent(ratio)}`);
      if (ratio < 1) {
        lines.push('', '  📝 Differences:', ...renderDiff(exp.body, act.body));
      }
    }
  }

  if (exp.ctaType !== null || act.ctaType !== null) {
    lines.push(
      '',
      '🔹 CTA:',
      `  Expected: ${show(exp.ctaType)}`,
      `  Actual:   ${show(act.ctaType)}`,
      `  Type Match: ${mark(exp.ctaType === act.ctaType)}`,
    );
  }

  lines.push(
    '',
    '⚡ NEXT ACTION',
    DIVIDER,
    `  Expected: ${describeAction(expected.action)}`,
    `  Actual:   ${describeAction(actual.action)}`,
    `  Type Match: ${mark(expected.action.type === actual.action.type)}`,
  );

  const thresholds = readSection(spec, 'thresholds');
  if (thresholds && Object.keys(thresholds).length > 0) {
    lines.push('', '📊 THRESHOLDS', DIVIDER);
    for (const [key, value] of Object.entries(thresholds)) {
      lines.push(`  • ${key}: ${String(value)}`);
    }
  }

  lines.push('', RULE);
  return lines.join('\n');
}

/**
 * One line pair per spec, in spec order: ✅ when channel and next action match
 * and body similarity reaches the pass band, ⚠️ when it reaches the warning
 * band, else ❌.
 */
export function compareAll(specs: readonly EvalSpec[], results: readonly AgentRunResult[]): string {
  const byTask = new Map(results.map((r) => [r.task_id, r]));
  const lines = [RULE, 'ALL TASKS COMPARISON SUMMARY', RULE, ''];

  for (const spec of specs) {
    const result = byTask.get(spec.task_id);
    if (!result) {
      lines.push(`⚠️  ${spec.task_id}: No result found`, '');
      continue;
    }

    const expected = readExpected(spec);
    const actual = readOutput(result.output);
    const channelMatch = expected.message.channel === actual.message.channel;
    const actionMatch = expected.action.type === actual.action.type;
    const bodyRatio = nullableSimilarity(expected.message.body, actual.message.body);

    let glyph = '❌';
    if (channelMatch && actionMatch && bodyRatio >= SIMILARITY_PASS) glyph = '✅';
    else if (bodyRatio >= SIMILARITY_WARN) glyph = '⚠️';

    lines.push(
      `${glyph} ${spec.task_id}:`,
      `    Channel: ${channelMatch ? '✓' : '✗'} | Body: ${Math.round(bodyRatio * 100)}% | Action: ${actionMatch ? '✓' : '✗'}`,
      '',
    );
  }

  return lines.join('\n');
}
