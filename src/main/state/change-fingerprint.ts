import * as path from 'node:path';

import * as fs from 'fs-extra';

import { errorCode } from '../utils/retry';

export interface StoreScan {
  /** Visible `*.json` file names in lexicographic order */
  files: string[];
  /** Newest modification time among them, in milliseconds; 0 for an empty store */
  maxMtimeMs: number;
  fingerprint: string;
}

export function isStoreFileName(name: string): boolean {
  return name.endsWith('.json') && !name.startsWith('.');
}

export function fingerprintOf(files: readonly string[], maxMtimeMs: number): string {
  return `${files.join('\u0000')}|${maxMtimeMs}`;
}

/**
 * Scan the store for device files. Hidden files, including the lock, the metadata
 * and in-flight temp files, are ignored. A file that vanishes mid-scan is skipped.
 */
export async function scanStore(storeDir: string): Promise<StoreScan> {
  const entries = await fs.readdir(storeDir);
  const names = entries.filter(isStoreFileName).sort();

  const files: string[] = [];
  let maxMtimeMs = 0;
  for (const name of names) {
    try {
      const stats = await fs.stat(path.join(storeDir, name));
      if (!stats.isFile()) continue;
      files.push(name);
      maxMtimeMs = Math.max(maxMtimeMs, stats.mtimeMs);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
  return { files, maxMtimeMs, fingerprint: fingerprintOf(files, maxMtimeMs) };
}
