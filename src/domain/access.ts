/**
 * Access control domain model.
 *
 * API keys carry a set of scopes; an operation is allowed when the key holds
 * the wildcard scope or the operation's required scope.
 */

import { z } from 'zod';

/** Scopes an API key may hold. */
export enum Scope {
  ApiIndex = 'api:index',
  PasteCreate = 'paste:create',
  PasteRead = 'paste:read',
  RecentRead = 'recent:read',
}

export const WILDCARD_SCOPE = '*';

export const ApiKeyEntrySchema = z.object({
  name: z.string().min(1).optional(),
  key: z.string().refine((k) => k.trim().length > 0, 'api key entry has empty key'),
  scopes: z.array(z.string().min(1)).min(1, 'api key must include at least one scope'),
  max_requests_per_minute: z.number().int().min(1).optional(),
});

export type ApiKeyEntry = z.infer<typeof ApiKeyEntrySchema>;

export const ApiKeysFileSchema = z.object({
  keys: z.array(ApiKeyEntrySchema),
});

export type ApiKeysFile = z.infer<typeof ApiKeysFileSchema>;

/** Check whether a key's scope set grants `scope`. */
export function hasScope(entry: ApiKeyEntry, scope: Scope): boolean {
  return entry.scopes.some((s) => s === WILDCARD_SCOPE || s === scope);
}
