/**
 * Background consumer that drains the export queue one item at a time.
 * @module queue/worker
 */

import { InfluxError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { AsyncQueue } from './async-queue.js';

/**
 * Worker lifecycle states. Transitions only move forward.
 */
export type WorkerState = 'created' | 'running' | 'stopped';

/**
 * Handles one queued item. Rejections are logged and do not stop the loop.
 */
export type ItemProcessor<T> = (item: T) => Promise<void>;

/**
 * Single-consumer loop over an {@link AsyncQueue}.
 *
 * Items are processed strictly in queue order with at most one in flight.
 * Once stopped the worker cannot be started again.
 */
export class QueueWorker<T> {
  private currentState: WorkerState = 'created';
  private busy = false;
  private loop?: Promise<void>;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly queue: AsyncQueue<T>,
    private readonly processor: ItemProcessor<T>,
    private readonly logger: Logger
  ) {}

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Starts the loop.
   * @throws {InfluxError} If the worker was already started.
   */
  start(): void {
    if (this.currentState !== 'created') {
      throw InfluxError.invalidState(`worker cannot start from state '${this.currentState}'`);
    }
    this.currentState = 'running';
    this.loop = this.run();
  }

  /**
   * Stops the loop. An item already in flight finishes; nothing further is
   * taken. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    if (this.currentState === 'running') {
      this.currentState = 'stopped';
      this.queue.close();
    } else if (this.currentState === 'created') {
      this.currentState = 'stopped';
    }
    await this.loop;
  }

  /**
   * Resolves once the queue is empty and no item is in flight, or the
   * worker has stopped.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isRunning(): boolean {
    return this.currentState === 'running';
  }

  private isIdle(): boolean {
    if (this.currentState === 'stopped') {
      return !this.busy;
    }
    return !this.busy && this.queue.unfinished === 0;
  }

  private async run(): Promise<void> {
    this.logger.debug('export worker started');

    while (this.isRunning()) {
      const next = await this.queue.take();
      if (next.done || !this.isRunning()) {
        break;
      }

      this.busy = true;
      try {
        await this.processor(next.value);
      } catch (error) {
        this.logger.error('export failed', { error: InfluxError.fromUnknown(error).toString() });
      } finally {
        this.busy = false;
        this.queue.acknowledge();
        this.notifyIfIdle();
      }
    }

    this.logger.debug('export worker stopped', { pending: this.queue.size });
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
