/**
 * Worker-thread executor for Monte Carlo batches.
 *
 * Each run spawns up to `size` workers, hands them the trial plan once, then
 * feeds batches from a shared queue. Workers rebuild the engine from the
 * catalog directory, so results match the in-process executor for a seed.
 */

import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';
import { errorMessage } from '../../../common/errors.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import { env } from '../../../config/env.js';
import { DEFAULT_DATA_DIR } from '../catalog/catalog.loader.js';
import type { BatchExecutor, BatchOutcome, TrialBatch, TrialPlan } from './montecarlo.simulator.js';
import { BatchReplySchema, type WorkerSetup } from './montecarlo.protocol.js';

const FROM_SOURCE = import.meta.url.endsWith('.ts');
const WORKER_URL = new URL(FROM_SOURCE ? './montecarlo.worker.ts' : './montecarlo.worker.js', import.meta.url);
// TypeScript sources need the tsx loader inside the worker
const WORKER_EXEC_ARGV = FROM_SOURCE ? ['--import', 'tsx'] : [];

export interface WorkerPoolOptions {
  size?: number;
  /** Catalog directory the workers load; must match the caller's catalog. */
  dataDir?: string;
  logger?: Logger;
}

function request(worker: Worker, batch: TrialBatch): Promise<BatchOutcome> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      worker.off('message', onMessage);
      worker.off('error', onError);
      worker.off('exit', onExit);
    };
    const onMessage = (raw: unknown) => {
      cleanup();
      const reply = BatchReplySchema.safeParse(raw);
      if (!reply.success) {
        reject(new Error(`Malformed reply for batch ${batch.index}`));
      } else if ('error' in reply.data) {
        reject(new Error(`Batch ${batch.index} failed: ${reply.data.error}`));
      } else {
        resolve({ scores: reply.data.scores, failed: reply.data.failed });
      }
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const onExit = (code: number) => {
      cleanup();
      reject(new Error(`Monte Carlo worker exited with code ${code}`));
    };
    worker.on('message', onMessage);
    worker.on('error', onError);
    worker.on('exit', onExit);
    worker.postMessage(batch);
  });
}

export class WorkerPoolExecutor implements BatchExecutor {
  readonly size: number;
  private readonly dataDir: string;
  private readonly logger: Logger;

  constructor(options: WorkerPoolOptions = {}) {
    this.size = Math.max(1, Math.floor(options.size ?? availableParallelism()));
    this.dataDir = options.dataDir ?? env.SITE_DATA_DIR ?? DEFAULT_DATA_DIR;
    this.logger = options.logger ?? createLogger('monte-carlo-pool');
  }

  async run(plan: TrialPlan, batches: readonly TrialBatch[]): Promise<BatchOutcome[]> {
    if (batches.length === 0) return [];

    const setup: WorkerSetup = { dataDir: this.dataDir, plan };
    const queue = [...batches];
    const outcomes = new Map<number, BatchOutcome>();
    const workers = Array.from(
      { length: Math.min(this.size, batches.length) },
      () => new Worker(WORKER_URL, { workerData: setup, execArgv: WORKER_EXEC_ARGV }),
    );

    try {
      await Promise.all(
        workers.map(async (worker) => {
          for (let batch = queue.shift(); batch; batch = queue.shift()) {
            outcomes.set(batch.index, await request(worker, batch));
          }
        }),
      );
    } catch (err) {
      this.logger.error({ businessId: plan.businessId, err: errorMessage(err) }, 'worker pool run failed');
      throw err;
    } finally {
      await Promise.all(workers.map((w) => w.terminate()));
    }

    return batches.map((b) => {
      const outcome = outcomes.get(b.index);
      if (!outcome) throw new Error(`No outcome for batch ${b.index}`);
      return outcome;
    });
  }
}
