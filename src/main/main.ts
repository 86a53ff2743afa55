import cluster from 'node:cluster';

import * as fs from 'fs-extra';

import { DashboardAPIServer } from './api-server';
import { TempProbeChartGenerator } from './artifacts/temp-probe-charts';
import { ConfigManager } from './config/config-manager';
import { Logger } from './logging/logger';
import { StateCoordinator } from './state/state-coordinator';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** One dashboard process: cache, refresh worker and HTTP server. */
async function runServer(config: ConfigManager, logger: Logger): Promise<void> {
  const settings = config.getAll().StateCache;
  const storeDir = config.getStoreDirectory();
  const artifactDir = config.getArtifactDirectory();
  await fs.ensureDir(storeDir);
  await fs.ensureDir(artifactDir);

  const coordinator = new StateCoordinator({
    storeDir,
    generators: [new TempProbeChartGenerator(artifactDir, { logger })],
    logger,
    pollIntervalMs: settings.PollIntervalSeconds * 1000,
    graceWindowMs: settings.GraceWindowSeconds * 1000,
    lockStaleMs: settings.LockStaleSeconds * 1000,
  });
  coordinator.startWorker();

  const server = new DashboardAPIServer({ coordinator, config, logger }, { artifactDir });
  await server.start();

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.log(`Received ${signal}, shutting down`, 'summary');
    await server.close();
    await coordinator.shutdownWorker();
    logger.log('Shutdown complete', 'detailed');
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.reportFatalError('Error during shutdown', error);
          process.exit(1);
        }
      );
    });
  }
}

/** Fork the worker processes and keep them running until a shutdown signal arrives. */
function runPrimary(workers: number, logger: Logger): void {
  let stopping = false;

  cluster.on('exit', (worker, code, signal) => {
    if (stopping) return;
    logger.log(`Worker ${worker.process.pid} exited (${signal ?? code}), starting a replacement`, 'warning');
    cluster.fork();
  });

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      stopping = true;
      logger.log(`Received ${signal}, stopping ${workers} workers`, 'summary');
      for (const worker of Object.values(cluster.workers ?? {})) {
        worker?.process.kill(signal);
      }
    });
  }

  logger.log(`Starting ${workers} dashboard workers`, 'summary');
  for (let i = 0; i < workers; i++) {
    cluster.fork();
  }
}

export async function main(): Promise<void> {
  const config = new ConfigManager();
  const logger = new Logger(config.getLoggerSettings());
  const workers = config.get('Website', 'Workers');

  if (cluster.isPrimary && workers > 1) {
    runPrimary(workers, logger);
    return;
  }
  await runServer(config, logger);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const text = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(`FATAL ERROR: unable to start devicewatch\n${text}`);
    process.exit(1);
  });
}
