import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { STATUS_CODES } from 'node:http';
import { pathToFileURL } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { analyze, severityCounts } from '../../core/engine.js';
import { isScanError } from '../../core/errors.js';
import { getChecks } from '../../core/registry.js';
import { fetchPage, type FetchPageOptions } from '../../scripts/lib/fetch-page.js';
import { reportFilename, toCsv, toRows } from '../../scripts/lib/report.js';
import type { AnalysisResult } from '../../core/types.js';

interface AnalyzeBody {
  url?: string;
  html?: string;
  checks?: string[];
}

const analyzeSchema = {
  body: {
    type: 'object',
    properties: {
      url: { type: 'string', minLength: 1 },
      html: { type: 'string' },
      checks: { type: 'array', items: { type: 'string' } },
    },
    anyOf: [{ required: ['url'] }, { required: ['html'] }],
    additionalProperties: false,
  },
} as const;

/** Posted pages are often well past Fastify's 1 MiB default. */
export const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024;

export interface ServerOptions {
  logger?: boolean | { level: string };
  fetch?: FetchPageOptions;
  bodyLimit?: number;
}

export async function buildServer(opts: ServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? { level: process.env.LOG_LEVEL || 'info' },
    bodyLimit: opts.bodyLimit ?? DEFAULT_BODY_LIMIT,
  });

  await app.register(cors, { origin: true });

  app.setErrorHandler((error, request, reply) => {
    if (isScanError(error)) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(error.statusCode).send({ error: error.name, code: error.code, message: error.message });
    }
    if (error.validation) {
      return reply.status(400).send({ error: 'Bad Request', code: 'BAD_REQUEST', message: error.message });
    }
    // Malformed JSON, oversized bodies and other client errors raised by Fastify itself.
    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      request.log.warn({ code: error.code }, error.message);
      return reply
        .status(status)
        .send({ error: STATUS_CODES[status] ?? 'Bad Request', code: error.code ?? 'BAD_REQUEST', message: error.message });
    }
    request.log.error(error);
    return reply.status(500).send({ error: 'Internal Server Error', code: 'INTERNAL_ERROR', message: error.message });
  });

  async function run(body: AnalyzeBody): Promise<AnalysisResult> {
    const checks = getChecks(body.checks ?? []);
    if (body.html !== undefined) {
      return analyze(body.url ?? 'about:blank', body.html, { checks });
    }
    const page = await fetchPage(body.url ?? '', opts.fetch);
    return analyze(page.url, page.markup, { checks });
  }

  app.get('/health', async () => ({ ok: true }));

  app.post<{ Body: AnalyzeBody }>('/analyze', { schema: analyzeSchema }, async (request) => {
    const result = await run(request.body);
    return {
      source: result.source,
      checks: result.checks,
      counts: severityCounts(result),
      findings: result.findings,
    };
  });

  app.post<{ Body: AnalyzeBody }>('/analyze/csv', { schema: analyzeSchema }, async (request, reply) => {
    const result = await run(request.body);
    return reply
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${reportFilename(result.source)}"`)
      .send(toCsv(toRows(result.findings)));
  });

  return app;
}

async function start() {
  const app = await buildServer();
  try {
    const port = Number(process.env.PORT || 8080);
    const host = '0.0.0.0';
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = async () => {
    try {
      await app.close();
      process.exit(0);
    } catch (e) {
      app.log.error(e);
      process.exit(1);
    }
  };
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  loadEnv();
  void start();
}
