import { FastifyInstance } from 'fastify';
import { LexiconService } from '../config/lexicon-service';

export function registerHealthRoutes(app: FastifyInstance, lexicons: LexiconService): void {
  /** Liveness check: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness check: evaluation needs a lexicon with at least one channel family */
  app.get('/ready', async (_req, reply) => {
    const lexicon = lexicons.get();
    const channelCount = lexicon.channels.sms.length + lexicon.channels.email.length;
    const checks: Record<string, { status: string; detail?: unknown }> = {
      lexicon: channelCount > 0 ? { status: 'ok', detail: lexicons.describe() } : { status: 'error' },
    };

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
