/**
 * Eval I/O
 *
 * Eval specs are JSONL, one spec per line. Agent results are a JSON array of
 * `{ task_id, output, metrics? }`. Any structural problem is an EvalSpecError;
 * nothing is skipped silently.
 */

import fs from 'fs';
import { AgentRunResult, EvalSpec } from '../evaluation/types';
import { EvalSpecError } from '../evaluation/errors';
import { assertAgentResult, assertEvalSpec, assertUniqueTaskIds } from '../evaluation/spec-contract';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'eval-loader' });

export function parseEvalSpecs(text: string): EvalSpec[] {
  const specs: EvalSpec[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, idx) => {
    const line = idx + 1;
    if (!raw.trim()) return;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new EvalSpecError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, line);
    }
    specs.push(assertEvalSpec(value, line));
  });

  assertUniqueTaskIds(specs);
  return specs;
}

export function parseAgentResults(text: string): AgentRunResult[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new EvalSpecError(`Invalid results JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(value)) {
    throw new EvalSpecError('Agent results must be a JSON array');
  }
  return value.map((entry: unknown, index) => assertAgentResult(entry, index));
}

function readFile(filepath: string, what: string): string {
  if (!fs.existsSync(filepath)) {
    throw new EvalSpecError(`${what} file not found: ${filepath}`);
  }
  return fs.readFileSync(filepath, 'utf-8');
}

export function readEvalSpecs(filepath: string): EvalSpec[] {
  const specs = parseEvalSpecs(readFile(filepath, 'Eval spec'));
  log.info({ filepath, count: specs.length }, 'Eval specs loaded');
  return specs;
}

export function readAgentResults(filepath: string): AgentRunResult[] {
  const results = parseAgentResults(readFile(filepath, 'Agent results'));
  log.info({ filepath, count: results.length }, 'Agent results loaded');
  return results;
}
