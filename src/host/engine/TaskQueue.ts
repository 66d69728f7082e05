/**
 * Owner-loop task queue
 *
 * Work arriving from the page (or any other thread of control) is posted
 * here and runs strictly one task at a time, in FIFO order, on the loop
 * that owns the window state.
 */

import { consoleLogger, type Logger } from '../../shared/types';

export type Task = () => void;

export interface TaskQueueOptions {
  /**
   * Arranges for `drain` to run later. Default: queueMicrotask.
   */
  schedule?: (drain: () => void) => void;

  /**
   * Called with anything a task throws. Default: logs it.
   */
  onError?: (error: unknown) => void;

  logger?: Logger;

  logPrefix?: string;
}

export class TaskQueue {
  private queue: Task[] = [];
  private scheduled = false;
  private draining = false;
  private closed = false;
  private readonly schedule: (drain: () => void) => void;
  private readonly onError: (error: unknown) => void;

  constructor(options: TaskQueueOptions = {}) {
    const logger = options.logger ?? consoleLogger;
    const prefix = options.logPrefix ?? '[trellis]';
    this.schedule = options.schedule ?? ((drain) => queueMicrotask(drain));
    this.onError = options.onError ?? ((error) => logger.error(`${prefix} Task failed:`, error));
  }

  /**
   * Enqueue a task; it runs on the next drain
   */
  post(task: Task): void {
    if (this.closed) return;
    this.queue.push(task);
    if (this.scheduled || this.draining) return;
    this.scheduled = true;
    this.schedule(() => {
      this.scheduled = false;
      this.drain();
    });
  }

  /**
   * Run every queued task, including tasks posted while draining.
   * Re-entrant calls return immediately.
   */
  drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let task = this.queue.shift();
      while (task) {
        try {
          task();
        } catch (error) {
          this.onError(error);
        }
        task = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /** True while a task from this queue is running */
  get isDraining(): boolean {
    return this.draining;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Discard queued tasks and refuse new ones
   */
  close(): void {
    this.closed = true;
    this.queue = [];
  }
}
