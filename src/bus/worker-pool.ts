import { AsyncQueue } from './async-queue.js';
import * as log from '../utils/logger.js';

export interface BackgroundTask {
  /** Short label for logs, e.g. "reply:chat-1". */
  name: string;
  run(): Promise<void>;
}

export interface TaskScheduler {
  /** Queue a task. Returns false when the queue is full and the task was not accepted. */
  schedule(task: BackgroundTask): boolean;
}

/**
 * WorkerPool — bounded task queue consumed by a fixed number of workers.
 *
 * Workers run until the signal passed to start() aborts. A failing task is
 * logged and never stops its worker. Tasks still queued at shutdown are dropped.
 */
export class WorkerPool implements TaskScheduler {
  private queue: AsyncQueue<BackgroundTask>;
  private workers: Promise<void>[] = [];
  private running = 0;
  private unfinished = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly opts: { workers: number; queueSize: number }) {
    this.queue = new AsyncQueue<BackgroundTask>(opts.queueSize);
  }

  schedule(task: BackgroundTask): boolean {
    const accepted = this.queue.offer(task);
    if (accepted) {
      this.unfinished++;
    } else {
      log.warn(`WorkerPool: queue full (${this.queue.capacity}), task "${task.name}" rejected`);
    }
    return accepted;
  }

  start(signal: AbortSignal): void {
    if (this.workers.length > 0) return;
    for (let i = 0; i < this.opts.workers; i++) {
      this.workers.push(this.workerLoop(i, signal));
    }
    log.info(`WorkerPool: ${this.opts.workers} workers started (queue size ${this.opts.queueSize})`);
  }

  /** Resolves once every worker loop has exited (after the start signal aborts). */
  async stopped(): Promise<void> {
    await Promise.all(this.workers);
    this.workers = [];
  }

  /** Resolves when the queue is empty and no task is running. */
  drain(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  get queued(): number {
    return this.queue.size;
  }

  get active(): number {
    return this.running;
  }

  private get isIdle(): boolean {
    return this.unfinished === 0;
  }

  private async workerLoop(id: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let task: BackgroundTask;
      try {
        task = await this.queue.consume(signal);
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }

      this.running++;
      try {
        log.debug(`Worker ${id}: running "${task.name}"`);
        await task.run();
      } catch (err) {
        log.error(`Worker ${id}: task "${task.name}" failed: ${log.errorMessage(err)}`);
      } finally {
        this.running--;
        this.unfinished--;
        this.notifyIdle();
      }
    }
    log.debug(`Worker ${id}: stopped`);
  }

  private notifyIdle(): void {
    if (!this.isIdle) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
