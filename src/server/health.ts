/**
 * GET /health
 *
 * Liveness for the submission service. Reports the kill switch and which
 * backend steps are switched on, so an operator can tell why a submission
 * skipped a step without reading the logs.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    steps: appConfig.submission.steps,
    version: process.env.npm_package_version ?? 'dev',
  });
}
