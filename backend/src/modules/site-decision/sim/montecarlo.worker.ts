/**
 * Monte Carlo worker
 *
 * Rebuilds the scoring engine from the catalog directory once, then answers
 * each TrialBatch message with its BatchOutcome.
 */

import { parentPort, workerData, type MessagePort } from 'node:worker_threads';
import { errorMessage } from '../../../common/errors.js';
import { createLogger } from '../../../common/logger.js';
import { loadSiteCatalog } from '../catalog/catalog.loader.js';
import { SiteScoringEngine } from '../engine/site-scoring.engine.js';
import { runTrialBatch } from './montecarlo.simulator.js';
import { TrialBatchSchema, WorkerSetupSchema, type BatchReply, type WorkerSetup } from './montecarlo.protocol.js';

function serve(port: MessagePort, setup: WorkerSetup): void {
  const logger = createLogger('monte-carlo-worker');
  const engine = new SiteScoringEngine({ catalog: loadSiteCatalog(setup.dataDir), logger });

  port.on('message', (raw: unknown) => {
    const batch = TrialBatchSchema.safeParse(raw);
    let reply: BatchReply;
    if (!batch.success) {
      reply = { index: -1, error: `Invalid batch: ${batch.error.issues[0]?.message ?? 'unknown'}` };
    } else {
      try {
        reply = { index: batch.data.index, ...runTrialBatch(engine, setup.plan, batch.data, logger) };
      } catch (err) {
        reply = { index: batch.data.index, error: errorMessage(err) };
      }
    }
    port.postMessage(reply);
  });
}

if (!parentPort) throw new Error('montecarlo.worker must run in a worker thread');
serve(parentPort, WorkerSetupSchema.parse(workerData));
