import * as path from 'node:path';

import * as fs from 'fs-extra';

import { FILE_IO } from '../../constants';
import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';
import { errorCode, withRetries } from '../utils/retry';

export interface SafeIoOptions {
  logger?: Log;
  attempts?: number;
  delayMs?: number;
}

export interface JsonReadResult {
  /** File content as read; used to fingerprint the document */
  text: string;
  value: unknown;
}

let tempCounter = 0;

/**
 * Hidden sibling used for atomic replacement. The name is unique per process and per call,
 * and starts with a dot so store scans never pick it up.
 */
export function tempPathFor(filePath: string): string {
  tempCounter += 1;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`);
}

function retryOptions(filePath: string, verb: string, opts: SafeIoOptions) {
  const logger = opts.logger ?? silentLogger;
  return {
    attempts: opts.attempts ?? FILE_IO.MAX_ATTEMPTS,
    delayMs: opts.delayMs ?? FILE_IO.RETRY_DELAY_MS,
    onRetry: (err: unknown, attempt: number) => {
      const reason = err instanceof Error ? err.message : String(err);
      logger.log(`Retrying ${verb} of ${filePath} after attempt ${attempt}: ${reason}`, 'debug');
    },
  };
}

/**
 * Read and parse a JSON file. A zero-length file yields `undefined` and a warning.
 * Parse errors and transient OS errors are retried; a missing file is not.
 */
export async function readJsonFile(filePath: string, opts: SafeIoOptions = {}): Promise<JsonReadResult | undefined> {
  const logger = opts.logger ?? silentLogger;
  return withRetries(async () => {
    const text = await fs.readFile(filePath, 'utf8');
    if (text.length === 0) {
      logger.log(`File ${filePath} is empty`, 'warning');
      return undefined;
    }
    const value: unknown = JSON.parse(text);
    return { text, value };
  }, retryOptions(filePath, 'read', opts));
}

export async function readJsonSafe(filePath: string, opts: SafeIoOptions = {}): Promise<unknown> {
  const result = await readJsonFile(filePath, opts);
  return result?.value;
}

/**
 * Replace `filePath` with `text` so that readers see either the old or the new content.
 * The temp file is opened exclusively, flushed to disk, then renamed over the destination.
 */
export async function writeTextAtomic(filePath: string, text: string, opts: SafeIoOptions = {}): Promise<void> {
  const logger = opts.logger ?? silentLogger;
  await withRetries(async () => {
    const tmp = tempPathFor(filePath);
    let fd: number | null = null;
    try {
      fd = await fs.open(tmp, 'wx');
      await fs.writeFile(fd, text, 'utf8');
      await fs.fsync(fd);
      await fs.close(fd);
      fd = null;
      await fs.rename(tmp, filePath);
    } catch (err) {
      if (fd !== null) {
        await fs.close(fd).catch((closeErr: unknown) => {
          logger.log(`Unable to close ${tmp}: ${errorCode(closeErr) ?? String(closeErr)}`, 'debug');
        });
      }
      await fs.remove(tmp);
      throw err;
    }
  }, retryOptions(filePath, 'write', opts));
}

export async function writeJsonAtomic(filePath: string, document: unknown, opts: SafeIoOptions = {}): Promise<void> {
  await writeTextAtomic(filePath, JSON.stringify(document, null, FILE_IO.JSON_INDENT), opts);
}
