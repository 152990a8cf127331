import { z } from "zod";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const JobIdSchema = z.union([z.string().min(1), z.number()]);

/** Deferral fields any API response may carry next to its own payload */
const DeferralSchema = z
  .object({
    jobid: JobIdSchema,
    pending: z.boolean().optional().catch(undefined),
    interval: z.number().optional().catch(undefined),
  })
  .passthrough();

const JobErrorSchema = z
  .union([z.record(z.unknown()), z.string()])
  .nullable()
  .optional()
  .transform((error) => (typeof error === "string" ? { message: error } : error ?? undefined));

const CompletedJobSchema = z.object({
  id: JobIdSchema,
  result: z.unknown().optional(),
  error: JobErrorSchema,
});

export const NotificationSchema = z
  .object({
    _ntype: z.string(),
    _nid: JobIdSchema.optional(),
  })
  .passthrough();

/** Body of the polling endpoint; also piggybacked on deferred responses */
export const PollBatchSchema = z.object({
  jobs: z.array(CompletedJobSchema).default([]),
  notifications: z.array(NotificationSchema).default([]),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JobId = z.infer<typeof JobIdSchema>;
export type Deferral = z.infer<typeof DeferralSchema>;
export type CompletedJob = z.infer<typeof CompletedJobSchema>;
export type PollBatch = z.infer<typeof PollBatchSchema>;

/**
 * A server-pushed event, tagged by `_ntype`. The payload is open: producers
 * may add fields freely.
 */
export interface NotificationRecord {
  _ntype: string;
  _nid?: JobId;
  [field: string]: unknown;
}

// ---------------------------------------------------------------------------
// Decoders
// ---------------------------------------------------------------------------

/** Registry key for a job id; `7` and `"7"` name the same job */
export function jobKey(id: JobId): string {
  return String(id);
}

/**
 * Read the deferral fields of a response body.
 * Returns undefined when the body is final (no usable `jobid`).
 */
export function parseDeferral(body: unknown): Deferral | undefined {
  const result = DeferralSchema.safeParse(body);
  return result.success ? result.data : undefined;
}

/**
 * Decode a poll batch, failing with a readable message when the body does
 * not match.
 */
export function parsePollBatch(
  body: unknown
): { ok: true; batch: PollBatch } | { ok: false; error: string } {
  const result = PollBatchSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return { ok: false, error: issues };
  }
  return { ok: true, batch: result.data };
}
