/**
 * Express Submission Server
 *
 * HTTP layer for sales-notes submissions. Routes:
 * - POST /submissions — Parse the notes and run every backend step
 * - POST /submissions/preview — Parse and assemble only; nothing is sent
 * - GET /health — Server status, kill switch and step switches
 *
 * No note contents are logged; bodies go through sanitizeForLog first.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { appConfig } from '../config.js';
import type { NormalizerTables } from '../parsing/index.js';
import type { CrmGateway } from '../crm/index.js';
import { IdentifierUnresolved, processSalesNotes, previewSalesNotes, sanitizeForLog } from '../submission/index.js';
import { healthHandler } from './health.js';

export const SubmissionRequestSchema = z.object({
  text: z.string().min(1, 'text must not be empty'),
  priorRecord: z.record(z.string(), z.string()).optional(),
});

export type SubmissionRequest = z.infer<typeof SubmissionRequestSchema>;

export interface AppDeps {
  tables: NormalizerTables;
  gateway: CrmGateway;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory so tests can pass their own tables and a fake
 * gateway without shared state between test cases.
 */
export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  // Health check
  app.get('/health', healthHandler);

  app.post('/submissions', async (req: Request, res: Response, next: NextFunction) => {
    // Kill switch check — 503 so the caller retries later
    if (appConfig.killSwitch) {
      console.log('[server] Kill switch active — rejecting submission');
      res.status(503).json({ message: 'Automation disabled' });
      return;
    }

    const parsed = SubmissionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn('[server] Invalid submission body', sanitizeForLog(req.body));
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues.map((issue) => issue.message) });
      return;
    }

    try {
      const outcome = await processSalesNotes(parsed.data.text, deps, {
        priorRecord: parsed.data.priorRecord,
        timeoutMs: appConfig.submission.callTimeoutMs,
        steps: appConfig.submission.steps,
      });
      console.log('[server] Submission processed', {
        steps: outcome.steps.map((step) => `${step.stepName}:${step.skipped ? 'skipped' : step.success ? 'ok' : 'failed'}`),
        warnings: outcome.warnings.length,
      });
      res.json(outcome);
    } catch (error) {
      if (error instanceof IdentifierUnresolved) {
        console.warn(`[server] ${error.message}`);
        res.status(422).json({
          error: error.message,
          identifier: error.identifier,
          observed: error.observed,
          partialResult: error.partialResult,
        });
        return;
      }
      next(error);
    }
  });

  app.post('/submissions/preview', (req: Request, res: Response) => {
    const parsed = SubmissionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues.map((issue) => issue.message) });
      return;
    }

    res.json(previewSalesNotes(parsed.data.text, deps.tables, { priorRecord: parsed.data.priorRecord }));
  });

  // Global error handler; body-parser marks malformed JSON with status 400
  app.use((err: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction) => {
    if (err.status === 400) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
