import { CheckCategory, CheckStatus, OverallStatus } from '../evaluation/types';

export interface StatusSymbols {
  check: Record<CheckStatus, string>;
  overall: Record<OverallStatus, string>;
  headings: Record<CheckCategory | 'scores', string>;
  bullet: string;
}

export const UNICODE_SYMBOLS: StatusSymbols = Object.freeze({
  check: { passed: '✓', warning: '⚠', failed: '✗' },
  overall: { passed: '✅', passed_with_warnings: '⚠️', failed: '❌' },
  headings: {
    output_match: '📋 Output Match Checks',
    threshold: '⏱️  Threshold Checks',
    assertion: '🔒 Assertion Checks',
    constraint: '⚖️  Constraint Checks',
    scores: '📊 Scores',
  },
  bullet: '•',
});

/** For terminals and log sinks that mangle emoji */
export const ASCII_SYMBOLS: StatusSymbols = Object.freeze({
  check: { passed: '[+]', warning: '[!]', failed: '[x]' },
  overall: { passed: '[PASS]', passed_with_warnings: '[WARN]', failed: '[FAIL]' },
  headings: {
    output_match: 'Output Match Checks',
    threshold: 'Threshold Checks',
    assertion: 'Assertion Checks',
    constraint: 'Constraint Checks',
    scores: 'Scores',
  },
  bullet: '-',
});
