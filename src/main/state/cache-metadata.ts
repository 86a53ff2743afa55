import { z } from 'zod';
import { differenceInMilliseconds, fromUnixTime } from 'date-fns';

import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';
import { errorCode } from '../utils/retry';

import { readJsonSafe, writeJsonAtomic } from './safe-json-io';

const ArtifactRecordSchema = z.object({
  signature: z.string(),
  files: z.array(z.string()),
});

export const ReloadCacheMetadataSchema = z.object({
  last_load_time: z.number(),
  last_load_pid: z.number().int(),
  last_load_datetime: z.string(),
  artifacts: z.record(z.string(), ArtifactRecordSchema).optional(),
});

export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;
export type ReloadCacheMetadata = z.infer<typeof ReloadCacheMetadataSchema>;

/**
 * Advisory record of the last completed full reload, shared by every process through the store.
 * Times are epoch seconds.
 */
export class CacheMetadataStore {
  constructor(private readonly metadataPath: string, private readonly logger: Log = silentLogger) {}

  /** Returns null when the file is absent, empty or unreadable. */
  async read(): Promise<ReloadCacheMetadata | null> {
    let value: unknown;
    try {
      value = await readJsonSafe(this.metadataPath, { logger: this.logger });
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.log(`Unable to read cache metadata: ${String(error)}`, 'warning');
      }
      return null;
    }
    if (value === undefined) return null;
    const parsed = ReloadCacheMetadataSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.log('Ignoring malformed cache metadata', 'warning');
      return null;
    }
    return parsed.data;
  }

  async write(pid: number, loadedAt: Date, artifacts: Record<string, ArtifactRecord>): Promise<ReloadCacheMetadata> {
    const metadata: ReloadCacheMetadata = {
      last_load_time: loadedAt.getTime() / 1000,
      last_load_pid: pid,
      last_load_datetime: loadedAt.toISOString(),
      artifacts,
    };
    await writeJsonAtomic(this.metadataPath, metadata, { logger: this.logger });
    return metadata;
  }
}

export function metadataLoadedAt(metadata: ReloadCacheMetadata): Date {
  return fromUnixTime(metadata.last_load_time);
}

/** True when a process other than `pid` completed a reload less than `graceMs` ago. */
export function isRecentSiblingReload(
  metadata: ReloadCacheMetadata | null,
  pid: number,
  graceMs: number,
  now: Date = new Date()
): boolean {
  if (!metadata || metadata.last_load_pid === pid) return false;
  const ageMs = differenceInMilliseconds(now, metadataLoadedAt(metadata));
  return Math.abs(ageMs) < graceMs;
}
