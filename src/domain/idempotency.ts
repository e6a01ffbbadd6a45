import { z } from 'zod';
import { CreatePasteResponseSchema } from './paste';

export const IdempotencyRecordSchema = z.object({
  request_fingerprint: z.string().min(1),
  response: CreatePasteResponseSchema,
  created_at: z.string(),
});

/**
 * Maps an idempotency key to the request that first used it and the response
 * that was returned. Written once, never updated.
 */
export type IdempotencyRecord = z.infer<typeof IdempotencyRecordSchema>;

/** Outcome of a create call as seen by the HTTP layer. */
export type CreateOutcome =
  | { status: 'created'; response: IdempotencyRecord['response']; pushError?: string }
  | { status: 'replayed'; response: IdempotencyRecord['response'] };
