import { CheckGroups, CheckResult, CheckStatus, OverallStatus, CHECK_CATEGORIES } from './types';

type CheckDetails = Omit<CheckResult, 'name' | 'status' | 'message'>;

/** Create a frozen check result */
export function check(name: string, status: CheckStatus, message: string, details: CheckDetails = {}): CheckResult {
  return Object.freeze({ name, status, message, ...details });
}

/** Similarity bands shared by subject and body comparisons */
export const SIMILARITY_PASS = 0.85;
export const SIMILARITY_WARN = 0.7;

export function similarityStatus(similarity: number): CheckStatus {
  if (similarity >= SIMILARITY_PASS) return 'passed';
  if (similarity >= SIMILARITY_WARN) return 'warning';
  return 'failed';
}

/**
 * Strict conjunction: one failed check anywhere fails the task, otherwise
 * any warning downgrades it.
 */
export function deriveOverallStatus(checks: readonly CheckResult[]): OverallStatus {
  if (checks.some((c) => c.status === 'failed')) return 'failed';
  if (checks.some((c) => c.status === 'warning')) return 'passed_with_warnings';
  return 'passed';
}

export function flattenChecks(groups: CheckGroups): CheckResult[] {
  return CHECK_CATEGORIES.flatMap((category) => groups[category]);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}
