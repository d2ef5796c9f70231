/**
 * Reporter
 *
 * Pure renderers over an ordered list of findings: a status summary, a
 * machine-readable document and a plain-text report. Task order always follows
 * the input.
 */

import { CHECK_CATEGORIES, Findings, OverallStatus } from '../evaluation/types';
import { StatusSymbols, UNICODE_SYMBOLS } from './status-symbols';

export interface RunSummary {
  total: number;
  passed: number;
  passed_with_warnings: number;
  failed: number;
}

export interface FindingsDocument {
  summary: RunSummary;
  findings: readonly Findings[];
}

const RULE_WIDTH = 80;

export function summarize(findings: readonly Findings[]): RunSummary {
  const count = (status: OverallStatus): number => findings.filter((f) => f.overall_status === status).length;
  return {
    total: findings.length,
    passed: count('passed'),
    passed_with_warnings: count('passed_with_warnings'),
    failed: count('failed'),
  };
}

export function buildFindingsDocument(findings: readonly Findings[]): FindingsDocument {
  return { summary: summarize(findings), findings };
}

/** Run-level verdict: the worst task status, `passed` for an empty run */
export function runStatus(summary: RunSummary): OverallStatus {
  if (summary.failed > 0) return 'failed';
  if (summary.passed_with_warnings > 0) return 'passed_with_warnings';
  return 'passed';
}

function renderTask(finding: Findings, symbols: StatusSymbols): string[] {
  const divider = '-'.repeat(RULE_WIDTH);
  const lines = [
    divider,
    `${symbols.overall[finding.overall_status]} Task: ${finding.task_id} (${finding.overall_status.toUpperCase()})`,
    divider,
  ];

  for (const category of CHECK_CATEGORIES) {
    const checks = finding.checks[category];
    if (checks.length === 0) continue;
    lines.push('', `${symbols.headings[category]}:`);
    for (const c of checks) {
      lines.push(`  ${symbols.check[c.status]} ${c.message}`);
    }
  }

  const scores = Object.entries(finding.scores);
  if (scores.length > 0) {
    lines.push('', `${symbols.headings.scores}:`);
    for (const [name, value] of scores) {
      lines.push(`  ${symbols.bullet} ${name}: ${value.toFixed(2)}`);
    }
  }

  lines.push('');
  return lines;
}

export function renderReport(findings: readonly Findings[], symbols: StatusSymbols = UNICODE_SYMBOLS): string {
  const rule = '='.repeat(RULE_WIDTH);
  const summary = summarize(findings);

  const lines = [
    rule,
    'EVALUATION REPORT',
    rule,
    '',
    `Total Tasks: ${summary.total}`,
    `${symbols.overall.passed} Passed: ${summary.passed}`,
    `${symbols.overall.passed_with_warnings} Passed with Warnings: ${summary.passed_with_warnings}`,
    `${symbols.overall.failed} Failed: ${summary.failed}`,
    '',
  ];

  for (const finding of findings) {
    lines.push(...renderTask(finding, symbols));
  }

  lines.push(rule);
  return lines.join('\n');
}
