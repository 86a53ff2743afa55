import crypto from 'node:crypto';

import type { Request } from 'express';

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

/**
 * Shared-secret check for the dashboard API. The key comes from the `key` query parameter
 * or an `Authorization: Bearer` header. No configured key means every request passes.
 */
export class AccessKeyGuard {
  constructor(private readonly currentKey: () => string | null) {}

  validate(provided: string | undefined): boolean {
    const expected = this.currentKey();
    if (expected === null) return true;
    if (!provided) return false;
    return crypto.timingSafeEqual(digest(provided), digest(expected));
  }

  validateRequest(req: Request): boolean {
    return this.validate(AccessKeyGuard.extractKey(req));
  }

  static extractKey(req: Request): string | undefined {
    const query = req.query.key;
    if (typeof query === 'string' && query.length > 0) return query;
    const authorization = req.headers.authorization;
    if (authorization?.startsWith('Bearer ')) return authorization.slice('Bearer '.length);
    return undefined;
  }
}
