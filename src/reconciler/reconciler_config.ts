import { z } from "zod";
import { InvalidConfigError } from "../errors.ts";
import type { Logger } from "../logger.ts";
import { DEFAULT_ID_SIZE, MAX_ID_SIZE, MIN_ID_SIZE } from "../storage/storage.ts";

/** Frame limits below this leave too little room for a useful message. */
export const MIN_FRAME_SIZE_LIMIT = 4096;

/** Bytes held back from the frame limit for the closing ranges. */
export const FRAME_SIZE_RESERVE = 200;

export const reconcilerConfigSchema = z.object({
  /** Length of every id, in bytes. */
  idSize: z.number().int().min(MIN_ID_SIZE).max(MAX_ID_SIZE).default(
    DEFAULT_ID_SIZE,
  ),
  /** How many fingerprint ranges a mismatched range is split into. */
  buckets: z.number().int().min(2).default(16),
  /** Ranges with fewer local items than this are sent as id lists. */
  idListThreshold: z.number().int().min(1).default(32),
  /** Upper bound on outgoing message size. 0 means unlimited. */
  frameSizeLimit: z.number().int().refine(
    (n) => n === 0 || n >= MIN_FRAME_SIZE_LIMIT,
    { message: `Must be 0 or at least ${MIN_FRAME_SIZE_LIMIT}` },
  ).default(0),
});

export type ReconcilerConfig = z.infer<typeof reconcilerConfigSchema>;
export type ReconcilerConfigInput = z.input<typeof reconcilerConfigSchema>;

export type ReconcilerOptions = ReconcilerConfigInput & {
  logger?: Logger;
};

export function parseReconcilerConfig(
  input: ReconcilerConfigInput = {},
): ReconcilerConfig {
  const result = reconcilerConfigSchema.safeParse(input);

  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) =>
        `${issue.path.join(".") || "config"}: ${issue.message}`
      ),
    );
  }

  return result.data;
}
