import express, { type Express } from 'express';
import { createHealthRouter, errorHandler, requestLogger, type HealthChecker } from '@healthmesh/platform-core';

export function createApp(checker: HealthChecker, serviceName: string): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(serviceName));
  app.use('/health', createHealthRouter(checker));
  app.use(errorHandler());

  return app;
}
