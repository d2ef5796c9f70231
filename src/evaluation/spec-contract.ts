import Ajv, { SchemaObject } from 'ajv';
import { AgentOutput, AgentRunResult, EvalSpec, Metrics } from './types';
import { EvalSpecError } from './errors';

/**
 * Structural contracts for eval records. Only identity is enforced here;
 * everything below it is optional and read defensively, and unknown fields
 * pass through untouched.
 */

const TASK_ID = { type: 'string', minLength: 1, pattern: '\\S' };

export const EVAL_SPEC_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['task_id'],
  properties: {
    task_id: TASK_ID,
  },
  additionalProperties: true,
};

export const AGENT_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['task_id'],
  properties: {
    task_id: TASK_ID,
  },
  additionalProperties: true,
};

const OBJECT_SCHEMA: SchemaObject = { type: 'object', additionalProperties: true };

const ajv = new Ajv({ allErrors: true });
const validateSpec = ajv.compile<EvalSpec>(EVAL_SPEC_SCHEMA);
const validateResult = ajv.compile<AgentRunResult>(AGENT_RESULT_SCHEMA);
const validateOutput = ajv.compile<AgentOutput>(OBJECT_SCHEMA);
const validateMetrics = ajv.compile<Metrics>(OBJECT_SCHEMA);

function taskIdOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'task_id' in value) {
    const id = value.task_id;
    return typeof id === 'string' ? id : undefined;
  }
  return undefined;
}

export function assertEvalSpec(value: unknown, line?: number): EvalSpec {
  if (!validateSpec(value)) {
    throw new EvalSpecError(`Invalid eval spec: ${ajv.errorsText(validateSpec.errors, { dataVar: 'spec' })}`, line, taskIdOf(value));
  }
  return value;
}

export function assertAgentResult(value: unknown, index?: number): AgentRunResult {
  if (!validateResult(value)) {
    const where = index !== undefined ? ` at index ${index}` : '';
    throw new EvalSpecError(`Invalid agent result${where}: ${ajv.errorsText(validateResult.errors, { dataVar: 'result' })}`);
  }
  return value;
}

/** Unique task_id across one run */
export function assertUniqueTaskIds(specs: readonly EvalSpec[]): void {
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.task_id)) {
      throw new EvalSpecError(`Duplicate task_id '${spec.task_id}'`, undefined, spec.task_id);
    }
    seen.add(spec.task_id);
  }
}

/** Optional agent output from an untyped payload; null or absent means none */
export function readAgentOutput(value: unknown): AgentOutput | null {
  if (value === null || value === undefined) return null;
  if (!validateOutput(value)) {
    throw new EvalSpecError(`Invalid agent output: ${ajv.errorsText(validateOutput.errors, { dataVar: 'output' })}`);
  }
  return value;
}

export function readMetrics(value: unknown): Metrics | null {
  if (value === null || value === undefined) return null;
  if (!validateMetrics(value)) {
    throw new EvalSpecError(`Invalid metrics: ${ajv.errorsText(validateMetrics.errors, { dataVar: 'metrics' })}`);
  }
  return value;
}
