#!/usr/bin/env node
/**
 * Queue Worker - CLI Entry Point
 *
 * Consumes validation jobs queued by a server running with
 * DOCQA_LAUNCH_MODE=queue and runs each with the same JobRunner.
 *
 * Usage:
 *   docqa-worker                        # after npm install -g
 *   node dist/bin-worker.js             # direct invocation
 *
 * Environment: same variables as the server. DOCQA_WORKER_CONCURRENCY sets
 * how many jobs one worker runs at a time (default: 1).
 *
 * @module bin-worker
 */

import Bull from 'bull';
import { loadConfig, loadEnvFile } from './server/config.js';
import { createAppContext } from './server/context.js';
import { validateStartupDependencies } from './server/startup.js';
import type { QueuedJob } from './services/jobs/launcher.js';
import { QueuedJobSchema, validateInput } from './utils/validation.js';

function parseConcurrency(): number {
  const raw = process.env.DOCQA_WORKER_CONCURRENCY ?? '1';
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`Invalid numeric env var DOCQA_WORKER_CONCURRENCY: "${raw}"`);
  }
  return parsed;
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const concurrency = parseConcurrency();

  // Jobs run here, so the worker itself never re-queues them
  const ctx = createAppContext({ ...config, launchMode: 'sync' });
  await validateStartupDependencies(ctx.config);

  const queue = new Bull<QueuedJob>(config.queueName, config.redisUrl);
  queue.on('error', (error: Error) => {
    console.error(`[Worker] Queue error: ${error.message}`);
  });

  // Settles only when the queue closes
  queue
    .process(concurrency, async (job: Bull.Job<QueuedJob>) => {
      const { jobKey, source } = validateInput(QueuedJobSchema, job.data);
      const outcome = await ctx.runner.runJob(jobKey, source);
      console.error(`[Worker] Job ${jobKey} ${outcome.status}`);
      return outcome.status;
    })
    .catch((error: unknown) => {
      console.error('[Worker] Queue processing stopped:', error);
      process.exit(1);
    });
  console.error(`[Worker] Consuming ${config.queueName} with concurrency ${concurrency}`);

  function handleShutdown(signal: string): void {
    console.error(`[Shutdown] Received ${signal}, shutting down worker...`);
    queue
      .close()
      .then(() => ctx.close())
      .then(() => {
        console.error('[Shutdown] Worker stopped');
        process.exit(0);
      })
      .catch((err) => {
        console.error(`[Shutdown] Error stopping worker: ${err}`);
        process.exit(1);
      });
    setTimeout(() => {
      console.error('[Shutdown] Forced exit after timeout');
      process.exit(1);
    }, 30_000).unref();
  }

  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Fatal error starting worker:', error);
  process.exit(1);
});
