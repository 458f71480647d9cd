import express, { type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { Logger } from 'pino';
import { z } from 'zod';

import { streamPlanAndExecute, type AgentStreamEvent, type ModelClient } from './agent.js';
import type { CalculationEngine } from './engine.js';
import { CalculationError, messageOf, toErrorBody } from './errors.js';
import type { WorkbookStore } from './store/store.js';
import { XlsxWorkbookStore } from './store/xlsxStore.js';

export type AppDeps = {
  engine: CalculationEngine;
  store: WorkbookStore;
  logger: Logger;
  /** Re-reads calculator records for `POST /api/calculators/reload`. */
  loadRecords: () => Promise<{ records: unknown[]; errors: CalculationError[] }>;
  models?: Record<string, ModelClient>;
  /** Applied when a call does not give `timeoutSeconds`. */
  defaultTimeoutMs?: number;
};

const STATUS: Record<string, number> = {
  NOT_FOUND: 404,
  NOT_EXECUTABLE: 409,
  INPUT_CONTRACT: 400,
  UNKNOWN_INPUT: 400,
  MISSING_INPUT: 400,
  INVALID_INPUT: 400,
  CONFIG_ERROR: 400,
  ADDRESS_ERROR: 400,
  FORMULA_ERROR: 400,
  CIRCULAR_REFERENCE: 422,
  IMMUTABLE_CELL: 423,
  LOCK_TIMEOUT: 503,
  BACKEND_UNAVAILABLE: 503,
  CANCELLED: 499
};

export function httpStatusOf(e: unknown): number {
  return e instanceof CalculationError ? STATUS[e.code] ?? 500 : 500;
}

const ExecuteBody = z.object({
  inputs: z.record(z.unknown()).default({}),
  timeoutSeconds: z.number().positive().max(600).optional()
});

/** Aborts when the client goes away before the response is finished. */
function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function createApp(deps: AppDeps) {
  const { engine, store, logger } = deps;
  const models = deps.models ?? {};

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 32 * 1024 * 1024 } });

  const fail = (res: Response, e: unknown, what: string) => {
    const status = httpStatusOf(e);
    if (status >= 500 && status !== 503) logger.error({ err: e }, `${what} failed`);
    else logger.warn({ code: e instanceof CalculationError ? e.code : undefined, msg: messageOf(e) }, `${what} rejected`);
    res.status(status).json(toErrorBody(e));
  };

  /* ================= Calculator APIs ================= */

  app.get('/api/calculators', (_req, res) => {
    res.json({ ok: true, calculators: engine.list() });
  });

  app.post('/api/calculators/reload', async (_req, res) => {
    try {
      const { records, errors } = await deps.loadRecords();
      const report = engine.reload(records);
      const rejected = [...errors, ...report.errors].map(e => toErrorBody(e).error);
      res.json({ ok: true, loaded: report.loaded, templates: report.templates, rejected });
    } catch (e) {
      fail(res, e, 'reload');
    }
  });

  app.get('/api/calculators/:name', (req, res) => {
    try {
      res.json({ ok: true, calculator: engine.describe(req.params.name) });
    } catch (e) {
      fail(res, e, 'describe');
    }
  });

  app.post('/api/calculators/:name/execute', async (req: Request, res: Response) => {
    const body = ExecuteBody.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ ok: false, error: { code: 'BAD_REQUEST', message: body.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') } });
      return;
    }
    const { inputs, timeoutSeconds } = body.data;
    try {
      const result = await engine.execute(req.params.name, inputs, {
        timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : deps.defaultTimeoutMs,
        signal: abortOnClose(res)
      });
      res.json({ ok: true, result });
    } catch (e) {
      if (res.writableEnded || res.destroyed) return;
      fail(res, e, 'execute');
    }
  });

  /* ================= Workbook files ================= */

  app.get('/api/workbooks', async (_req, res) => {
    if (!(store instanceof XlsxWorkbookStore)) {
      res.status(405).json({ ok: false, error: { code: 'NOT_SUPPORTED', message: `Listing needs the file backend; this server uses '${store.kind}'` } });
      return;
    }
    try {
      res.json({ ok: true, workbooks: await store.listWorkbooks() });
    } catch (e) {
      fail(res, e, 'list workbooks');
    }
  });

  app.post('/api/workbooks/:workbookId/upload', upload.single('file'), async (req, res) => {
    if (!(store instanceof XlsxWorkbookStore)) {
      res.status(405).json({ ok: false, error: { code: 'NOT_SUPPORTED', message: `Uploads need the file backend; this server uses '${store.kind}'` } });
      return;
    }
    const file = req.file;
    if (!file) {
      res.status(400).json({ ok: false, error: { code: 'BAD_REQUEST', message: 'No workbook uploaded' } });
      return;
    }
    const workbookId = req.params.workbookId;
    try {
      await engine.withWorkbookLock(workbookId, () => store.replaceFile(workbookId, file.buffer), { timeoutMs: deps.defaultTimeoutMs });
      res.json({ ok: true, workbookId, bytes: file.size });
    } catch (e) {
      fail(res, e, 'upload');
    }
  });

  /* ================= Agent ================= */

  app.get('/api/agent/stream', async (req, res) => {
    const modelChoice = String(req.query.model || 'ollama');
    const goal = String(req.query.goal || '');
    if (!goal) {
      res.writeHead(400).end('Missing goal');
      return;
    }
    const client = models[modelChoice];
    if (!client) {
      res.writeHead(400).end(`Model not available: ${modelChoice}`);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');

    const send = (e: AgentStreamEvent) => {
      res.write(`event: ${e.type}\n`);
      res.write(`data: ${JSON.stringify(e.data)}\n\n`);
    };

    try {
      await streamPlanAndExecute(goal, engine, client, send, abortOnClose(res));
      send({ type: 'done', data: 'ok' });
    } catch (e) {
      logger.warn({ model: modelChoice, msg: messageOf(e) }, 'agent run failed');
      send({ type: 'error', data: messageOf(e) });
    }
    res.end();
  });

  return app;
}
