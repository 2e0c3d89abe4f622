import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import http from 'http';
import { z } from 'zod';

import { AppError, HttpErrorCode, NotFoundError } from './errors.js';
import { exportFileName, exportPromptsCsv } from './export.js';
import type { EntityStore } from './interfaces.js';
import type { Logger } from './logger.js';
import type { MutationGate } from './mutation-gate.js';
import type { QueryEngine } from './query-engine.js';

export const ADMIN_SECRET_HEADER = 'x-admin-secret';

export interface HttpServerConfig {
  port: number;
  host: string;
  corsOrigin?: string;
}

export interface ServerServices {
  queryEngine: QueryEngine;
  mutationGate: MutationGate;
  store: EntityStore;
  logger: Logger;
}

function errorDetails(error: AppError): unknown {
  return 'details' in error ? error.details : undefined;
}

/**
 * Maps errors to `{ error: { code, message, details } }` responses.
 */
export function createErrorHandler(logger: Logger): express.ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof z.ZodError) {
      res.status(400).json({
        error: {
          code: HttpErrorCode.VALIDATION_ERROR,
          details: err.errors,
          message: 'Invalid input data.',
        },
      });
      return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        error: {
          code: HttpErrorCode.VALIDATION_ERROR,
          message: 'Request body is not valid JSON.',
        },
      });
      return;
    }
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        logger.error({ err, method: req.method, path: req.path }, err.message);
      }
      res.status(err.statusCode).json({
        error: {
          code: err.code,
          details: errorDetails(err),
          message: err.message,
        },
      });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    res.status(500).json({
      error: {
        code: HttpErrorCode.INTERNAL_SERVER_ERROR,
        message: 'An unexpected error occurred',
      },
    });
  };
}

const catchAsync = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function queryNumber(value: unknown): number | undefined {
  const text = queryString(value);
  return text === undefined ? undefined : Number(text);
}

/** Accepts `?tags=a,b` as well as repeated `?tags=a&tags=b`. */
function queryList(value: unknown): string[] | undefined {
  const raw = Array.isArray(value) ? value : [value];
  const items = raw
    .filter((v): v is string => typeof v === 'string')
    .flatMap(v => v.split(','))
    .map(v => v.trim())
    .filter(v => v !== '');
  return items.length > 0 ? items : undefined;
}

function adminSecret(req: Request): string | undefined {
  return req.header(ADMIN_SECRET_HEADER);
}

/**
 * Builds the JSON API. Reads go to the query engine, writes through the mutation
 * gate with the admin secret taken from the `x-admin-secret` header.
 */
export function createHttpApp(config: Pick<HttpServerConfig, 'corsOrigin'>, services: ServerServices): express.Express {
  const { logger, mutationGate, queryEngine, store } = services;
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin || '*' }));
  app.use(express.json({ limit: '1mb' }));

  app.get(
    '/health',
    catchAsync(async (_req, res) => {
      const storage = await store.healthCheck();
      res.status(storage ? 200 : 503).json({ status: storage ? 'ok' : 'degraded', storage });
    }),
  );

  // --- Prompts ---

  app.get(
    '/api/v1/prompts',
    catchAsync(async (req, res) => {
      const result = await queryEngine.search({
        categoryId: queryString(req.query.categoryId),
        page: queryNumber(req.query.page),
        pageSize: queryNumber(req.query.pageSize),
        tags: queryList(req.query.tags),
        text: queryString(req.query.text),
      });
      res.json(result);
    }),
  );

  app.post(
    '/api/v1/prompts',
    catchAsync(async (req, res) => {
      const prompt = await mutationGate.createPrompt(adminSecret(req), req.body);
      res.status(201).json(prompt);
    }),
  );

  app.get(
    '/api/v1/prompts/:id',
    catchAsync(async (req, res) => {
      res.json(await queryEngine.getPrompt(req.params.id));
    }),
  );

  app.patch(
    '/api/v1/prompts/:id',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.updatePrompt(adminSecret(req), req.params.id, req.body));
    }),
  );

  app.delete(
    '/api/v1/prompts/:id',
    catchAsync(async (req, res) => {
      await mutationGate.deletePrompt(adminSecret(req), req.params.id);
      res.status(204).send();
    }),
  );

  app.post(
    '/api/v1/prompts/:id/use',
    catchAsync(async (req, res) => {
      const prompt = await mutationGate.usePrompt(req.params.id);
      res.json({ id: prompt.id, usageCount: prompt.usageCount });
    }),
  );

  app.post(
    '/api/v1/prompts/:id/rollback',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.rollbackPrompt(adminSecret(req), req.params.id, req.body));
    }),
  );

  app.get(
    '/api/v1/prompts/:id/versions',
    catchAsync(async (req, res) => {
      res.json(await queryEngine.listVersions(req.params.id));
    }),
  );

  app.get(
    '/api/v1/prompts/:id/versions/:version',
    catchAsync(async (req, res) => {
      res.json(await queryEngine.getVersion(req.params.id, req.params.version));
    }),
  );

  // --- Categories ---

  app.get(
    '/api/v1/categories',
    catchAsync(async (_req, res) => {
      res.json(await queryEngine.listCategories());
    }),
  );

  app.get(
    '/api/v1/categories/tree',
    catchAsync(async (_req, res) => {
      res.json(await queryEngine.getCategoryTree());
    }),
  );

  app.post(
    '/api/v1/categories',
    catchAsync(async (req, res) => {
      res.status(201).json(await mutationGate.createCategory(adminSecret(req), req.body));
    }),
  );

  app.patch(
    '/api/v1/categories/:id',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.updateCategory(adminSecret(req), req.params.id, req.body));
    }),
  );

  app.get(
    '/api/v1/categories/:id/deletion-impact',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.previewCategoryDeletion(adminSecret(req), req.params.id));
    }),
  );

  app.delete(
    '/api/v1/categories/:id',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.deleteCategory(adminSecret(req), req.params.id));
    }),
  );

  // --- Tags ---

  app.get(
    '/api/v1/tags',
    catchAsync(async (_req, res) => {
      res.json(await queryEngine.listTags());
    }),
  );

  app.post(
    '/api/v1/tags',
    catchAsync(async (req, res) => {
      res.status(201).json(await mutationGate.createTag(adminSecret(req), req.body));
    }),
  );

  app.patch(
    '/api/v1/tags/:id',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.updateTag(adminSecret(req), req.params.id, req.body));
    }),
  );

  app.delete(
    '/api/v1/tags/:id',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.deleteTag(adminSecret(req), req.params.id));
    }),
  );

  // --- Reporting ---

  app.get(
    '/api/v1/stats',
    catchAsync(async (_req, res) => {
      res.json(await queryEngine.getStats());
    }),
  );

  app.get(
    '/api/v1/export',
    catchAsync(async (req, res) => {
      const prompts = await queryEngine.searchAll({
        categoryId: queryString(req.query.categoryId),
        tags: queryList(req.query.tags),
        text: queryString(req.query.text),
      });
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${exportFileName(new Date())}"`);
      res.send(exportPromptsCsv(prompts));
    }),
  );

  // --- Admin ---

  app.get(
    '/api/v1/admin/backups',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.listBackups(adminSecret(req)));
    }),
  );

  app.post(
    '/api/v1/admin/reset',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.resetAll(adminSecret(req)));
    }),
  );

  app.post(
    '/api/v1/admin/import',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.importPrompts(adminSecret(req), req.body));
    }),
  );

  app.post(
    '/api/v1/admin/load-test-data',
    catchAsync(async (req, res) => {
      res.json(await mutationGate.loadTestData(adminSecret(req)));
    }),
  );

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Starts listening and resolves once the server is bound.
 */
export async function startHttpServer(config: HttpServerConfig, services: ServerServices): Promise<http.Server> {
  const app = createHttpApp(config, services);
  const server = http.createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  services.logger.info(`HTTP server listening on http://${config.host}:${config.port}`);
  return server;
}
