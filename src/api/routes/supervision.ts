import { Router, type Request, type Response } from 'express';
import type { ZodError } from 'zod';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { alertIndexParam, runStateInput, superviseStageInput } from '../../domain/schemas.js';
import type { Supervisor } from '../../services/supervision/index.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';

function paramString(val: string | string[]): string {
  return Array.isArray(val) ? val[0] : val;
}

function sendInvalidBody(res: Response, error: ZodError): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid request body', details));
}

export function createSupervisionRouter(supervisor: Supervisor): Router {
  const router = Router();

  router.post('/supervision/stages/:stageName', (req: Request, res: Response) => {
    const stageName = paramString(req.params.stageName);

    const parsed = superviseStageInput.safeParse(req.body);
    if (!parsed.success) return sendInvalidBody(res, parsed.error);

    const { output, context } = parsed.data;
    const result = supervisor.superviseStage(stageName, output, context);

    if (!result.supervised && result.error?.code === ErrorCode.STAGE_NOT_REGISTERED) {
      return sendAppError(res, result.error);
    }

    res.json(successResponse(result));
  });

  router.post('/supervision/runs', (req: Request, res: Response) => {
    const parsed = runStateInput.safeParse(req.body);
    if (!parsed.success) return sendInvalidBody(res, parsed.error);

    res.status(201).json(successResponse(supervisor.superviseRun(parsed.data)));
  });

  router.get('/supervision/should-continue', (_req: Request, res: Response) => {
    res.json(successResponse({ shouldContinue: supervisor.shouldContinue() }));
  });

  router.get('/supervision/alerts', (_req: Request, res: Response) => {
    res.json(successResponse(supervisor.getIndexedActiveAlerts()));
  });

  router.post('/supervision/alerts/:index/resolve', (req: Request, res: Response) => {
    const parsed = alertIndexParam.safeParse(paramString(req.params.index));
    const resolved = parsed.success && supervisor.resolveAlert(parsed.data);

    if (!resolved) {
      return sendAppError(
        res,
        createAppError(ErrorCode.ALERT_NOT_FOUND, `Alert '${paramString(req.params.index)}' not found`, false),
      );
    }

    res.json(successResponse({ resolved: true }));
  });

  router.get('/supervision/trend', (_req: Request, res: Response) => {
    res.json(successResponse(supervisor.getTrend()));
  });

  router.get('/supervision/health', (_req: Request, res: Response) => {
    res.json(successResponse(supervisor.getHealthReport()));
  });

  router.get('/supervision/status', (_req: Request, res: Response) => {
    res.json(successResponse(supervisor.getStatus()));
  });

  router.get('/supervision/stages', (_req: Request, res: Response) => {
    res.json(successResponse(supervisor.listStages()));
  });

  router.get('/supervision/stages/:stageName/performance', (req: Request, res: Response) => {
    const result = supervisor.getStagePerformance(paramString(req.params.stageName));
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  return router;
}
