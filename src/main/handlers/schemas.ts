import { z } from 'zod';

// Device selection, as used by the dashboard pages
export const deviceQuery = z.object({
  state_idx: z.coerce.number().int().optional(),
  state_name: z.string().min(1).optional(),
});

// Document value lookup
export const deviceIndexParam = z.object({ index: z.coerce.number().int().min(0) });
export const valueQuery = z.object({ path: z.string().optional() });

/** Split a dotted document path; numeric segments address array elements */
export function parseValuePath(value: string | undefined): string[] {
  if (!value) return [];
  return value.split('.').filter((segment) => segment.length > 0);
}
