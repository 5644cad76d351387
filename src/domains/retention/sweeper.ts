import fs from 'fs/promises';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

export interface SweepResult {
  scanned: number;
  deleted: number;
  failed: number;
}

export interface RetentionSweeperOptions {
  directory: string;
  retentionSeconds: number;
  intervalSeconds: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Deletes stored images older than the retention window, once on start and
 * then every interval until stopped.
 */
export class RetentionSweeper {
  readonly directory: string;
  readonly retentionMs: number;
  readonly intervalMs: number;

  private readonly logger: Logger;
  private readonly now: () => number;
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(options: RetentionSweeperOptions) {
    this.directory = options.directory;
    this.retentionMs = options.retentionSeconds * 1000;
    this.intervalMs = options.intervalSeconds * 1000;
    this.logger = (options.logger ?? rootLogger).child({ component: 'Retention' });
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.loop !== undefined;
  }

  async start(): Promise<void> {
    if (this.loop) return;
    await fs.mkdir(this.directory, { recursive: true });

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info('Retention sweeper started', {
      directory: this.directory,
      retentionSeconds: this.retentionMs / 1000,
      intervalSeconds: this.intervalMs / 1000,
    });
  }

  /** Interrupts the wait between passes and resolves once the current pass is done. */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.controller?.abort();
    this.controller = undefined;
    this.loop = undefined;
    if (loop) {
      await loop;
      this.logger.info('Retention sweeper stopped');
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.sweepOnce();
      } catch (error) {
        this.logger.error('Retention sweep failed', error, { directory: this.directory });
      }

      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          this.logger.error('Retention sweeper wait failed; stopping', error);
        }
        return;
      }
    }
  }

  /** One pass over the top level of the directory. Per-file errors do not abort the pass. */
  async sweepOnce(): Promise<SweepResult> {
    const cutoff = this.now() - this.retentionMs;
    const entries = await fs.readdir(this.directory, { withFileTypes: true });
    const result: SweepResult = { scanned: 0, deleted: 0, failed: 0 };

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      result.scanned++;

      const filePath = path.join(this.directory, entry.name);
      try {
        const { mtimeMs } = await fs.stat(filePath);
        if (mtimeMs < cutoff) {
          await fs.unlink(filePath);
          result.deleted++;
        }
      } catch (error) {
        result.failed++;
        this.logger.warn('Failed to delete expired image', {
          path: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (result.deleted > 0) {
      this.logger.info('Removed expired images', { ...result });
    } else {
      this.logger.debug('Retention sweep finished', { ...result });
    }
    return result;
  }
}
