import pino from 'pino';

export const logger = pino({
  name: 'neo-supervision',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createRunLogger(runId: string, stageName?: string) {
  return logger.child({
    runId,
    ...(stageName !== undefined && { stageName }),
  });
}
