import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createApiKeyGate } from './middleware/apiKey';
import { requestId } from './middleware/requestId';
import { setupDatasetRoutes } from './routes/dataset';
import { setupHealthRoutes } from './routes/health';
import { setupMLRoutes } from './routes/ml';
import { sendError, sendFailure } from './routes/respond';
import type { HuggingService } from './services/huggingService';
import type { WorkerPool } from './services/workerPool';

export interface AppOptions {
  service: HuggingService | null;
  pool: WorkerPool;
  apiKey?: string;
  clientOrigin?: string;
  uploadLimitBytes?: number;
}

const DEFAULT_UPLOAD_LIMIT = 50 * 1024 * 1024;

const statusOfFrameworkError = (error: unknown): number | undefined => {
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  // body-parser errors carry their HTTP status
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

export const createApp = ({ service, pool, apiKey, clientOrigin, uploadLimitBytes }: AppOptions): Express => {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: uploadLimitBytes ?? DEFAULT_UPLOAD_LIMIT,
      files: 1
    }
  });

  app.use(requestId);
  app.use(cors({
    origin: clientOrigin || '*',
    methods: ['GET', 'POST']
  }));
  app.use(createApiKeyGate(apiKey));

  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  setupHealthRoutes(app, { service });
  setupDatasetRoutes(app, { service, pool, upload });
  setupMLRoutes(app, { service, pool, upload });

  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'Not Found');
  });

  // Four arguments mark this as Express's error handler
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    const status = statusOfFrameworkError(error);
    if (status !== undefined && status < 500) {
      return sendError(res, status, error instanceof Error ? error.message : 'Bad Request');
    }
    sendFailure(res, `handling ${req.method} ${req.path}`, error);
  });

  return app;
};
