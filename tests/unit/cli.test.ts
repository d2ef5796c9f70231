import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseArgs as parseRunEvalArgs, runEvalCli } from '../../src/cli/run-eval';
import { parseArgs as parseCompareArgs, runCompare } from '../../src/cli/compare-outputs';
import { env } from '../../src/config/env';
import { FIXTURES_DIR } from '../helpers';

const EVALS = path.join(FIXTURES_DIR, 'evals.jsonl');
const RESULTS = path.join(FIXTURES_DIR, 'results.json');

describe('CLI', () => {
  describe('run-eval', () => {
    let tmpDir: string;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'outreach-evals-cli-'));
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
      logSpy.mockRestore();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should default paths from the environment', () => {
      const opts = parseRunEvalArgs([]);
      expect(opts.evals).toBe(env.eval.specsPath);
      expect(opts.outputDir).toBe(env.eval.outputDir);
      expect(opts.ascii).toBe(false);
    });

    it('should parse flags', () => {
      const opts = parseRunEvalArgs(['--evals', 'a.jsonl', '--results', 'r.json', '-o', 'out', '--ascii']);
      expect(opts).toEqual({ evals: 'a.jsonl', results: 'r.json', outputDir: 'out', ascii: true, help: false });
    });

    it('should write artifacts and exit 1 when a task failed', async () => {
      const code = await runEvalCli({ evals: EVALS, results: RESULTS, outputDir: tmpDir, ascii: true, help: false });
      expect(code).toBe(1);
      expect(fs.existsSync(path.join(tmpDir, 'eval_report.txt'))).toBe(true);
      expect(fs.readFileSync(path.join(tmpDir, 'eval_report.txt'), 'utf-8')).toContain('[FAIL] Task: t3 (FAILED)');
    });
  });

  describe('compare-outputs', () => {
    it('should parse the task flag', () => {
      expect(parseCompareArgs(['--task', 't1']).task).toBe('t1');
      expect(parseCompareArgs(['-t', 't2', '--evals', 'e.jsonl']).evals).toBe('e.jsonl');
    });

    it('should summarize every task when no task is given', () => {
      const { text, ok } = runCompare({ evals: EVALS, results: RESULTS, help: false });
      expect(ok).toBe(true);
      const lines = text.split('\n');
      expect(lines[1]).toBe('ALL TASKS COMPARISON SUMMARY');
      expect(lines).toContain('❌ t2:');
      expect(lines).toContain('    Channel: ✓ | Body: 58% | Action: ✓');
      expect(lines).toContain('✅ t4:');
    });

    it('should show one task in detail', () => {
      const { text, ok } = runCompare({ evals: EVALS, results: RESULTS, task: 't3', help: false });
      expect(ok).toBe(true);
      expect(text.split('\n')).toContain('  Type Match: ✅');
    });

    it('should report an unknown task', () => {
      const { text, ok } = runCompare({ evals: EVALS, results: RESULTS, task: 'nope', help: false });
      expect(ok).toBe(false);
      expect(text).toBe("❌ Task 'nope' not found in eval records.");
    });
  });
});
