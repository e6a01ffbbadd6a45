/**
 * Paste domain model.
 *
 * `PasteMetadata` and `CreatePasteResponse` use snake_case field names: they
 * are persisted to disk and returned verbatim by the API, so their shape is
 * a wire contract.
 */

import { z } from 'zod';

/** Policy for publishing a commit to the configured remote. */
export enum PushMode {
  Off = 'off',
  BestEffort = 'best_effort',
  Strict = 'strict',
}

export const PasteMetadataSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().datetime({ offset: true }),
  path: z.string().min(1),
  size: z.number().int().nonnegative(),
  content_type: z.string(),
  /** Empty until hydrated from history on read. */
  commit: z.string(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  tag: z.string().optional(),
  client_ip: z.string().optional(),
  user_agent: z.string().optional(),
});

/** The permanent record of one paste, stored as `meta/<id>.json`. */
export type PasteMetadata = z.infer<typeof PasteMetadataSchema>;

export const CreatePasteResponseSchema = z.object({
  id: z.string(),
  path: z.string(),
  commit: z.string(),
  raw_url: z.string(),
  view_url: z.string(),
  meta_url: z.string(),
});

export type CreatePasteResponse = z.infer<typeof CreatePasteResponseSchema>;

/** An inbound paste request after transport parsing. */
export interface CreatePasteInput {
  name?: string;
  /** Explicit commit subject; replaces the generated one. */
  message?: string;
  tag?: string;
  contentType?: string;
  bytes: Buffer;
  clientIp?: string;
  userAgent?: string;
}

/** Files written for a paste that has not been committed yet. */
export interface PasteDraft {
  id: string;
  relPath: string;
  absPath: string;
  metaRelPath: string;
  metaPath: string;
  contentType: string;
  size: number;
  sha256: string;
  subject: string;
  meta: PasteMetadata;
}

export interface CommitResult {
  commit: string;
  pushed: boolean;
  pushError?: string;
}

/** Listing entry returned by the recent endpoint and the dashboard. */
export interface RecentItem {
  id: string;
  created_at: string;
  path: string;
  commit: string;
  tag?: string;
  size: number;
  content_type: string;
}

export function toRecentItem(meta: PasteMetadata): RecentItem {
  return {
    id: meta.id,
    created_at: meta.created_at,
    path: meta.path,
    commit: meta.commit,
    tag: meta.tag,
    size: meta.size,
    content_type: meta.content_type,
  };
}

export function createResponseFor(id: string, path: string, commit: string): CreatePasteResponse {
  return {
    id,
    path,
    commit,
    raw_url: `/api/v1/p/${id}/raw`,
    view_url: `/p/${id}`,
    meta_url: `/api/v1/p/${id}`,
  };
}
