import type { Request, Response } from 'express';
import { formatISO } from 'date-fns';

import { ok } from '../error-normalizer';

import type { HandlerDeps } from './deps';

function isoOrNull(value: Date | null): string | null {
  return value ? formatISO(value) : null;
}

export async function handleHealth(_deps: HandlerDeps, _req: Request, res: Response) {
  return res.json(ok({ status: 'ok' as const }));
}

export async function handleStatus(deps: HandlerDeps, _req: Request, res: Response) {
  const { coordinator, config } = deps;
  return res.json(ok({
    status: 'running' as const,
    pid: process.pid,
    deviceCount: coordinator.getStateCollection().length,
    lastReloadTime: isoOrNull(coordinator.getLastReloadTime()),
    latestSaveTime: isoOrNull(coordinator.getLatestStoreModificationTime()),
    phase: coordinator.getPhase(),
    workerRunning: coordinator.isWorkerRunning(),
    pageAutoRefresh: config.get('Website', 'PageAutoRefresh'),
    stats: coordinator.getStats(),
  }));
}
