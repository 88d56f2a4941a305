/**
 * Periodic Task
 *
 * Runs an async job on a fixed interval until stopped. Stopping aborts the
 * pending wait and resolves once the loop, including any job already
 * running, has exited. A failing run is logged and the loop carries on.
 */

import type { Logger } from 'pino';
import { sleep } from './timeout.js';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
  logger: Logger;
}

export class PeriodicTask {
  private readonly log: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: PeriodicTaskOptions) {
    this.log = options.logger.child({ component: 'PeriodicTask', task: options.name });
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal);
    this.log.debug({ intervalMs: this.options.intervalMs }, 'Periodic task started');
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }

    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    this.log.debug('Periodic task stopped');
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.intervalMs, signal);
      if (signal.aborted) {
        break;
      }

      try {
        await this.options.run(signal);
      } catch (error) {
        this.log.error({ error }, 'Periodic task run failed');
      }
    }
  }
}
