import { TimeoutError } from '../errors';

export interface WorkerPoolConfig {
  size: number;
  /** 0 waits forever */
  taskTimeoutMs: number;
}

const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
  size: 4,
  taskTimeoutMs: 0
};

interface QueuedTask {
  start: () => void;
}

/**
 * Bounded pool for slow upstream calls. At most `size` tasks run at once; the
 * rest wait in FIFO order. A timed-out task rejects its caller but keeps its
 * slot until the underlying call settles, since calls cannot be cancelled.
 */
export class WorkerPool {
  private readonly config: WorkerPoolConfig;
  private readonly queue: QueuedTask[] = [];
  private active = 0;

  constructor(config?: Partial<WorkerPoolConfig>) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    if (!Number.isInteger(this.config.size) || this.config.size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${this.config.size}`);
    }
  }

  public get activeCount(): number {
    return this.active;
  }

  public get pendingCount(): number {
    return this.queue.length;
  }

  public run<R>(task: () => Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const start = () => {
        this.active++;
        let timer: ReturnType<typeof setTimeout> | undefined;

        if (this.config.taskTimeoutMs > 0) {
          timer = setTimeout(() => reject(new TimeoutError(this.config.taskTimeoutMs)), this.config.taskTimeoutMs);
        }

        let running: Promise<R>;
        try {
          running = task();
        } catch (error) {
          running = Promise.reject(error);
        }

        void running
          .then(resolve, reject)
          .finally(() => {
            if (timer) clearTimeout(timer);
            this.active--;
            this.next();
          });
      };

      if (this.active < this.config.size) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  private next(): void {
    const queued = this.queue.shift();
    if (queued) {
      queued.start();
    }
  }
}
