/**
 * Express JSON API over the orchestrator and the individual specialists
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { pathToFileURL } from 'url';
import { config as loadEnv } from 'dotenv';
import { ZodError } from 'zod';
import { resolveConfig } from '../config/defaults.js';
import { loadDataset, type LoadedDataset } from '../catalog/loader.js';
import { AdvisorError, describeError, type ErrorCode } from '../domain/errors.js';
import { Orchestrator } from '../pipeline/orchestrator.js';
import { createRenderClient, renderResponse, type RenderClient } from '../llm/render.js';
import { closeCache } from '../llm/cache.js';
import { QueryLog } from '../store/queryLog.js';
import { createLogger } from '../utils/log.js';
import type { ProductCatalog } from '../catalog/catalog.js';
import type { SearchEngine } from '../pipeline/search.js';
import type { DosageCalculator } from '../pipeline/dosage.js';
import type { InteractionChecker } from '../pipeline/interactions.js';
import type { CoverageAdvisor } from '../pipeline/coverage.js';
import {
  AlternativesQuerySchema,
  CoverageParamsSchema,
  DoseCheckQuerySchema,
  DosageQuerySchema,
  InteractionsRequestSchema,
  ProductSearchQuerySchema,
  QueryRequestSchema,
  SafetyProfileRequestSchema,
} from './schemas.js';

const logger = createLogger('api-server');

export interface ServerDeps {
  orchestrator: Orchestrator;
  catalog: ProductCatalog;
  search: SearchEngine;
  dosage: DosageCalculator;
  interactions: InteractionChecker;
  coverage: CoverageAdvisor;
  render_client?: RenderClient | null;
  query_log?: QueryLog | null;
}

export function createServerDeps(
  data: LoadedDataset,
  extras: Pick<ServerDeps, 'render_client' | 'query_log'> = {}
): ServerDeps {
  const orchestrator = Orchestrator.fromDataset(data);
  return { orchestrator, ...orchestrator.components(), ...extras };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_INPUT: 400,
  NOT_FOUND: 404,
  AMBIGUOUS_RULE: 422,
  LOAD_ERROR: 500,
};

/**
 * Client-error status carried by errors from express middleware such as the
 * JSON body parser (`status` or `statusCode` in the 4xx range).
 */
export function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

export function statusForError(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof AdvisorError) return STATUS_BY_CODE[error.code];
  return clientErrorStatus(error) ?? 500;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApp(deps: ServerDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', products: deps.catalog.all().length, timestamp: new Date().toISOString() });
  });

  app.post(
    '/api/query',
    asyncRoute(async (req, res) => {
      const body = QueryRequestSchema.parse(req.body);
      let response = deps.orchestrator.handle(body.query, body.context);

      if (body.render) {
        const outcome = await renderResponse(response, deps.render_client ?? null);
        response = outcome.response;
      }

      deps.query_log?.record(response);
      res.json(response);
    })
  );

  app.get('/api/products', (req, res) => {
    const { q, limit, ...filters } = ProductSearchQuerySchema.parse(req.query);
    const hits = deps.search.search(q, filters, limit);
    res.json({ query: q, count: hits.length, hits });
  });

  app.get('/api/products/:id', (req, res) => {
    res.json(deps.catalog.resolve(req.params.id));
  });

  app.get('/api/products/:id/alternatives', (req, res) => {
    const filters = AlternativesQuerySchema.parse(req.query);
    const product = deps.catalog.resolve(req.params.id);
    const hits = deps.search.alternatives(product.id, filters);
    res.json({ product_id: product.id, count: hits.length, hits });
  });

  app.post('/api/interactions', (req, res) => {
    const { drugs } = InteractionsRequestSchema.parse(req.body);
    res.json({ findings: deps.interactions.check(drugs) });
  });

  app.get('/api/dosage', (req, res) => {
    const { drug, age, weight } = DosageQuerySchema.parse(req.query);
    res.json(deps.dosage.calculate(drug, age, weight));
  });

  app.get('/api/dosage/check', (req, res) => {
    const { drug, age, weight, proposed } = DoseCheckQuerySchema.parse(req.query);
    res.json(deps.dosage.checkDose(drug, age, weight, proposed));
  });

  app.post('/api/safety-profile', (req, res) => {
    const { drug, conditions, allergies } = SafetyProfileRequestSchema.parse(req.body);
    res.json(deps.interactions.profile(drug, { conditions, allergies }));
  });

  app.get('/api/coverage/:productId/:tier', (req, res) => {
    const { productId, tier } = CoverageParamsSchema.parse(req.params);
    res.json(deps.coverage.lookup(productId, tier));
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found', code: 'NOT_FOUND' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);
    if (status >= 500) {
      logger.error({ error: describeError(error), path: req.path }, 'Request failed');
    } else {
      logger.warn({ error: describeError(error), path: req.path, status }, 'Request rejected');
    }

    if (error instanceof ZodError) {
      res.status(status).json({
        error: 'Invalid request',
        code: 'INVALID_INPUT',
        issues: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
      return;
    }
    if (error instanceof AdvisorError) {
      res.status(status).json({ error: describeError(error), code: error.code });
      return;
    }
    if (status < 500) {
      res.status(status).json({
        error: isBodyParseError(error) ? 'Malformed JSON body' : describeError(error),
        code: 'INVALID_INPUT',
      });
      return;
    }
    res.status(status).json({ error: 'Internal server error', code: 'INTERNAL' });
  });

  return app;
}

export async function startServer(): Promise<void> {
  loadEnv();
  const config = resolveConfig();

  const data = await loadDataset(config.catalog_path);

  const query_log = new QueryLog(config.query_log_path);
  const app = createApp(
    createServerDeps(data, { render_client: createRenderClient(config), query_log })
  );

  const server = app.listen(config.port, () => {
    console.log(`\nAPI server running at http://localhost:${config.port}`);
    console.log(`   Health check: http://localhost:${config.port}/health`);
    console.log(`   Rendering: ${config.openai_api_key ? 'language model' : 'plain summary'}\n`);
  });

  server.on('error', (error) => {
    logger.error({ error: describeError(error) }, 'Server startup error');
    process.exit(1);
  });

  const shutdown = (): void => {
    server.close(() => {
      query_log.close();
      closeCache();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  startServer().catch((error: unknown) => {
    logger.fatal({ error: describeError(error) }, 'Server failed to start');
    console.error(`\nFailed to start server: ${describeError(error)}\n`);
    process.exit(1);
  });
}
