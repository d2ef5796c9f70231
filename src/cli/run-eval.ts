#!/usr/bin/env node
/**
 * Evaluate stored agent results without re-running the agent.
 *
 * Usage:
 *   run-eval                                   # paths from the environment
 *   run-eval --results output/results.json    # other results file
 *   run-eval --output-dir reports --ascii      # plain-ASCII report
 *
 * Exits 1 when any task failed, 2 on bad input.
 */

import { env } from '../config/env';
import { loadLexicon } from '../config/lexicon';
import { EvalRunner } from '../evaluation/eval-runner';
import { EvalSpecError } from '../evaluation/errors';
import { readAgentResults, readEvalSpecs } from '../io/eval-loader';
import { writeEvalArtifacts } from '../io/report-writer';
import { renderReport, summarize } from '../reporting/reporter';
import { ASCII_SYMBOLS, UNICODE_SYMBOLS } from '../reporting/status-symbols';
import { logger } from '../observability/logger';

export interface RunEvalOptions {
  evals: string;
  results: string;
  outputDir: string;
  ascii: boolean;
  help: boolean;
}

export function parseArgs(args: string[]): RunEvalOptions {
  const opts: RunEvalOptions = {
    evals: env.eval.specsPath,
    results: env.eval.resultsPath,
    outputDir: env.eval.outputDir,
    ascii: false,
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
      case '-o':
      case '--output-dir':
        if (next) opts.outputDir = next;
        i++;
        break;
      case '--ascii':
        opts.ascii = true;
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
Usage: run-eval [options]

Options:
  --evals <file>          Eval specs, JSONL (default: EVAL_SPECS_PATH)
  --results <file>        Agent results, JSON array (default: EVAL_RESULTS_PATH)
  -o, --output-dir <dir>  Where eval_report.txt and eval_findings.json go (default: EVAL_OUTPUT_DIR)
  --ascii                 ASCII status symbols instead of emoji
  -h, --help              Show this help message
`);
}

export async function runEvalCli(opts: RunEvalOptions): Promise<number> {
  const symbols = opts.ascii ? ASCII_SYMBOLS : UNICODE_SYMBOLS;
  const specs = readEvalSpecs(opts.evals);
  const results = readAgentResults(opts.results);

  const runner = new EvalRunner(loadLexicon(env.eval.lexiconPath));
  const findings = runner.evaluateRun(specs, results);

  console.log(renderReport(findings, symbols));
  const { reportPath, findingsPath } = await writeEvalArtifacts(opts.outputDir, findings, symbols);
  console.log(`\nReport:   ${reportPath}\nFindings: ${findingsPath}`);

  return summarize(findings).failed > 0 ? 1 : 0;
}

// ── Main ────────────────────────────────────────────────────

if (require.main === module) {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printHelp();
    process.exit(0);
  }

  runEvalCli(options)
    .then((code) => process.exit(code))
    .catch((err) => {
      if (err instanceof EvalSpecError) {
        console.error(`Error: ${err.message}`);
        process.exit(2);
      }
      logger.fatal({ err }, 'Evaluation run failed');
      process.exit(1);
    });
}
