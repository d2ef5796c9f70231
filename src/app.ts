import Fastify, { FastifyInstance } from 'fastify';
import { env } from './config/env';
import { logger } from './observability/logger';
import { LexiconService } from './config/lexicon-service';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppOptions {
  /** Defaults to ADMIN_API_KEY; empty disables the admin key check */
  adminApiKey?: string;
  /** Defaults to EVAL_LEXICON_PATH */
  lexiconPath?: string;
}

export interface AppContext {
  app: FastifyInstance;
  lexicons: LexiconService;
}

export async function buildApp(opts: AppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: env.http.trustProxy,
    bodyLimit: env.http.bodyLimitBytes,
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.debug(
      {
        method: req.method,
        route: req.routeOptions?.url ?? req.url,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'Request completed',
    );
    done();
  });

  const lexicons = new LexiconService(opts.lexiconPath ?? env.eval.lexiconPath);

  registerHealthRoutes(app, lexicons);
  registerAdminRoutes(app, {
    lexicons,
    adminApiKey: opts.adminApiKey ?? env.security.adminApiKey,
  });

  if (!(opts.adminApiKey ?? env.security.adminApiKey)) {
    logger.warn('ADMIN_API_KEY is not set; admin routes are unauthenticated');
  }

  logger.info('Routes registered');
  return { app, lexicons };
}
