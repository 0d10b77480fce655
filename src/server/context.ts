/**
 * Application Context
 *
 * Builds the blob sink, ledger, pipeline driver, job runner, launcher and
 * job service once per process from the resolved configuration. Backend
 * and launcher variants are chosen here and nowhere else.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/context
 */

import Bull from 'bull';
import { Redis } from 'ioredis';
import { FileSystemBlobSink } from '../services/storage/blob-sink.js';
import { FileProgressBackend } from '../services/progress/file-backend.js';
import { RedisProgressBackend, ioredisHashStore } from '../services/progress/redis-backend.js';
import { ProgressLedger } from '../services/progress/ledger.js';
import type { ProgressBackend } from '../services/progress/types.js';
import { SegmentedPipelineDriver } from '../services/pipeline/driver.js';
import { JobRunner, type PageSourceFactory } from '../services/jobs/runner.js';
import {
  BackgroundJobLauncher,
  QueueJobLauncher,
  SyncJobLauncher,
  bullJobQueue,
  type JobLauncher,
  type JobQueue,
  type QueuedJob,
} from '../services/jobs/launcher.js';
import { JobService } from '../services/jobs/service.js';
import { openPageSource } from '../services/text/page-source.js';
import type { ServerConfig } from './types.js';

export interface AppContext {
  config: ServerConfig;
  sink: FileSystemBlobSink;
  ledger: ProgressLedger;
  driver: SegmentedPipelineDriver;
  runner: JobRunner;
  launcher: JobLauncher;
  service: JobService;
  /** Release connections and wait for in-process jobs */
  close(): Promise<void>;
}

/**
 * Collaborators that talk to Redis. Tests pass in-process stand-ins; the
 * defaults connect to config.redisUrl.
 */
export interface ContextOverrides {
  progressBackend?: ProgressBackend;
  jobQueue?: JobQueue;
  openSource?: PageSourceFactory;
}

export function createAppContext(config: ServerConfig, overrides: ContextOverrides = {}): AppContext {
  const closers: Array<() => Promise<unknown>> = [];

  const sink = new FileSystemBlobSink(config.exportsPath);
  const backend = overrides.progressBackend ?? createProgressBackend(config, sink, closers);
  const ledger = new ProgressLedger(backend);
  const driver = new SegmentedPipelineDriver(sink, ledger, { segmentSize: config.segmentSize });

  const openSource: PageSourceFactory =
    overrides.openSource ??
    ((spec) =>
      openPageSource(spec, {
        pdftotextPath: config.pdftotextPath,
        pdfinfoPath: config.pdfinfoPath,
        timeoutMs: config.pageTimeoutMs,
      }));
  const runner = new JobRunner(driver, ledger, sink, openSource);

  const launcher = createLauncher(config, runner, overrides.jobQueue);
  // Launcher first: in-process jobs still write to the ledger while draining
  closers.unshift(() => launcher.close());

  const service = new JobService(ledger, launcher);

  return {
    config,
    sink,
    ledger,
    driver,
    runner,
    launcher,
    service,
    async close(): Promise<void> {
      for (const closer of closers) {
        try {
          await closer();
        } catch (error) {
          console.error(
            `[Shutdown] Error releasing resource: ${error instanceof Error ? error.message : String(error)}`
          );
        }
      }
    },
  };
}

function createProgressBackend(
  config: ServerConfig,
  sink: FileSystemBlobSink,
  closers: Array<() => Promise<unknown>>
): ProgressBackend {
  if (config.progressBackend === 'redis') {
    const client = new Redis(config.redisUrl, { maxRetriesPerRequest: 3 });
    client.on('error', (error: Error) => {
      console.error(`[RedisBackend] Connection error: ${error.message}`);
    });
    closers.push(() => client.quit());
    console.error(`[Config] Progress backend: redis (${redactUrl(config.redisUrl)})`);
    return new RedisProgressBackend(ioredisHashStore(client));
  }

  console.error(`[Config] Progress backend: file (${config.progressPath})`);
  return new FileProgressBackend(config.progressPath, {
    expectedLocator: (jobKey) => sink.locatorFor(jobKey, 'result'),
    exists: (locator) => sink.exists(locator),
  });
}

function createLauncher(
  config: ServerConfig,
  runner: JobRunner,
  jobQueue: JobQueue | undefined
): JobLauncher {
  switch (config.launchMode) {
    case 'sync':
      console.error('[Config] Launch mode: sync (submissions block until the job finishes)');
      return new SyncJobLauncher(runner);
    case 'background':
      console.error('[Config] Launch mode: background');
      return new BackgroundJobLauncher(runner);
    case 'queue': {
      console.error(`[Config] Launch mode: queue (${config.queueName})`);
      const queue = jobQueue ?? bullJobQueue(new Bull<QueuedJob>(config.queueName, config.redisUrl));
      return new QueueJobLauncher(queue);
    }
  }
}

/**
 * Hide the password part of a Redis URL for logging
 */
export function redactUrl(url: string): string {
  return url.replace(/\/\/([^:@/]*):([^@/]*)@/, '//$1:***@');
}
