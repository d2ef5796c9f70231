#!/usr/bin/env node
/**
 * Expected-versus-actual comparison of stored agent results.
 *
 * Usage:
 *   compare-outputs                       # one summary line per task
 *   compare-outputs --task welcome_day0   # detailed view of one task
 */

import { env } from '../config/env';
import { EvalSpecError } from '../evaluation/errors';
import { readAgentResults, readEvalSpecs } from '../io/eval-loader';
import { compareAll, compareTask } from '../reporting/comparison';
import { logger } from '../observability/logger';

export interface CompareOptions {
  evals: string;
  results: string;
  task?: string;
  help: boolean;
}

export function parseArgs(args: string[]): CompareOptions {
  const opts: CompareOptions = {
    evals: env.eval.specsPath,
    results: env.eval.resultsPath,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--evals':
        if (next) opts.evals = next;
        i++;
        break;
      case '--results':
        if (next) opts.results = next;
        i++;
        break;
      case '-t':
      case '--task':
        opts.task = next;
        i++;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
    }
  }

  return opts;
}

function printHelp(): void {
  console.log(`
Usage: compare-outputs [options]

Options:
  --evals <file>     Eval specs, JSONL (default: EVAL_SPECS_PATH)
  --results <file>   Agent results, JSON array (default: EVAL_RESULTS_PATH)
  -t, --task <id>    Detailed comparison of one task
  -h, --help         Show this help message
`);
}

/** Rendered comparison text and whether the requested task was found */
export function runCompare(opts: CompareOptions): { text: string; ok: boolean } {
  const specs = readEvalSpecs(opts.evals);
  const results = readAgentResults(opts.results);

  if (!opts.task) {
    return {
      text: `${compareAll(specs, results)}\n💡 Tip: Use --task <task_id> to see detailed comparison for a specific task`,
      ok: true,
    };
  }

  const spec = specs.find((s) => s.task_id === opts.task);
  if (!spec) return { text: `❌ Task '${opts.task}' not found in eval records.`, ok: false };
  const result = results.find((r) => r.task_id === opts.task);
  if (!result) return { text: `❌ Task '${opts.task}' not found in results.`, ok: false };

  return { text: compareTask(spec, result.output), ok: true };
}

// ── Main ────────────────────────────────────────────────────

if (require.main === module) {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printHelp();
    process.exit(0);
  }

  try {
    const { text, ok } = runCompare(options);
    console.log(text);
    process.exit(ok ? 0 : 1);
  } catch (err) {
    if (err instanceof EvalSpecError) {
      console.error(`Error: ${err.message}`);
      process.exit(2);
    }
    logger.fatal({ err }, 'Comparison failed');
    process.exit(1);
  }
}
