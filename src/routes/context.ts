import type { Multer } from 'multer';
import type { HuggingService } from '../services/huggingService';
import type { WorkerPool } from '../services/workerPool';

export interface RouteContext {
  /** null in degraded mode (no HF_TOKEN) */
  service: HuggingService | null;
  pool: WorkerPool;
  upload: Multer;
}
