import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

/** Paths in the environment are relative to the project root unless absolute */
function projectPath(key: string, fallback: string): string {
  return path.resolve(projectRoot, optional(key, fallback));
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  security: {
    // Empty disables the admin key check (local runs only)
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  http: {
    bodyLimitBytes: optionalInt('HTTP_BODY_LIMIT_BYTES', 1_048_576),
    trustProxy: optionalBool('HTTP_TRUST_PROXY', false),
  },

  // ───── Evaluation ─────
  eval: {
    lexiconPath: projectPath('EVAL_LEXICON_PATH', path.join('config', 'lexicon.yaml')),
    specsPath: projectPath('EVAL_SPECS_PATH', 'evals.jsonl'),
    resultsPath: projectPath('EVAL_RESULTS_PATH', path.join('output', 'results_orchestrator.json')),
    outputDir: projectPath('EVAL_OUTPUT_DIR', 'output'),
  },
};
