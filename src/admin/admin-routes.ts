import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { logger, runLogger } from '../observability/logger';
import { LexiconService } from '../config/lexicon-service';
import { EvalRunner } from '../evaluation/eval-runner';
import { EvalSpecError } from '../evaluation/errors';
import { assertAgentResult, assertEvalSpec, readAgentOutput, readMetrics } from '../evaluation/spec-contract';
import { isRecord } from '../evaluation/text';
import { buildFindingsDocument, renderReport, runStatus } from '../reporting/reporter';
import { ASCII_SYMBOLS, UNICODE_SYMBOLS } from '../reporting/status-symbols';
import { compareTask } from '../reporting/comparison';

export interface AdminDeps {
  lexicons: LexiconService;
  /** Empty disables the key check */
  adminApiKey: string;
}

function verifyAdminKey(req: FastifyRequest, reply: FastifyReply, adminApiKey: string): boolean {
  if (!adminApiKey) return true;
  const key = req.headers['x-admin-api-key'];
  if (typeof key !== 'string' || key !== adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

function requestBody(req: FastifyRequest): Record<string, unknown> {
  if (!isRecord(req.body)) throw new EvalSpecError('Request body must be a JSON object');
  return req.body;
}

function requireArray(body: Record<string, unknown>, key: string): unknown[] {
  const value = body[key];
  if (!Array.isArray(value)) throw new EvalSpecError(`'${key}' must be an array`);
  return value;
}

function sendError(reply: FastifyReply, err: unknown, what: string): FastifyReply {
  if (err instanceof EvalSpecError) {
    return reply.status(400).send({ error: err.message });
  }
  logger.error({ err }, `${what} failed`);
  return reply.status(500).send({ error: `${what} failed` });
}

export function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): void {
  const { lexicons, adminApiKey } = deps;
  let runner = new EvalRunner(lexicons.get());

  /** Reload the lexicon file; the previous lexicon stays active on failure */
  app.post('/admin/reload-lexicon', async (req, reply) => {
    if (!verifyAdminKey(req, reply, adminApiKey)) return;

    try {
      runner = new EvalRunner(lexicons.reload());
      logger.info({ admin: true }, 'Lexicon reloaded');
      return reply.send({ status: 'ok', lexicon: lexicons.describe() });
    } catch (err) {
      return reply.status(500).send({ error: 'Reload failed', message: err instanceof Error ? err.message : String(err) });
    }
  });

  /** Evaluate one task: `{ spec, output, metrics? }` */
  app.post('/admin/eval/task', async (req, reply) => {
    if (!verifyAdminKey(req, reply, adminApiKey)) return;

    try {
      const body = requestBody(req);
      const findings = runner.runEval(body.spec, readAgentOutput(body.output), readMetrics(body.metrics));
      return reply.send({ status: findings.overall_status, findings });
    } catch (err) {
      return sendError(reply, err, 'Task evaluation');
    }
  });

  /** Evaluate a run: `{ specs, results, ascii? }` */
  app.post('/admin/eval/run', async (req, reply) => {
    if (!verifyAdminKey(req, reply, adminApiKey)) return;

    try {
      const body = requestBody(req);
      const specs = requireArray(body, 'specs').map((spec) => assertEvalSpec(spec));
      const results = requireArray(body, 'results').map((result, index) => assertAgentResult(result, index));

      const runId = uuidv4();
      const log = runLogger(runId, { component: 'admin-eval' });
      log.info({ specs: specs.length, results: results.length }, 'Eval run requested');

      const findings = runner.evaluateRun(specs, results);
      const { summary } = buildFindingsDocument(findings);
      const symbols = body.ascii === true ? ASCII_SYMBOLS : UNICODE_SYMBOLS;

      log.info({ summary }, 'Eval run finished');
      return reply.send({
        status: runStatus(summary),
        runId,
        summary,
        findings,
        report: renderReport(findings, symbols),
      });
    } catch (err) {
      return sendError(reply, err, 'Eval run');
    }
  });

  /** Side-by-side comparison of one task as plain text: `{ spec, output }` */
  app.post('/admin/eval/compare', async (req, reply) => {
    if (!verifyAdminKey(req, reply, adminApiKey)) return;

    try {
      const body = requestBody(req);
      const text = compareTask(assertEvalSpec(body.spec), readAgentOutput(body.output));
      return reply.type('text/plain; charset=utf-8').send(text);
    } catch (err) {
      return sendError(reply, err, 'Comparison');
    }
  });
}
