import { z } from "zod";

/**
 * Record body as published in a user's repository under the status collection.
 * Unknown fields are ignored; `expires` is kept raw and parsed leniently.
 */
export const statusRecordBodySchema = z.object({
  emoji: z.string().trim().min(1, "emoji must not be empty"),
  text: z.string().nullish(),
  createdAt: z.string().datetime({ offset: true }),
  expires: z.string().nullish(),
});

export type StatusRecordBody = z.infer<typeof statusRecordBodySchema>;

export class RecordDecodeError extends Error {
  constructor(
    readonly uri: string,
    message: string
  ) {
    super(`Cannot decode record ${uri}: ${message}`);
    this.name = "RecordDecodeError";
  }
}

export function decodeStatusRecordBody(uri: string, record: unknown): StatusRecordBody {
  const parsed = statusRecordBodySchema.safeParse(record);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw new RecordDecodeError(uri, detail);
  }
  return parsed.data;
}

/**
 * An `expires` that is present but unparsable is treated as already expired
 * (the ingestion instant) rather than as "never expires".
 */
export function resolveExpiry(expires: string | null | undefined, now: Date): Date | null {
  if (expires === undefined || expires === null) {
    return null;
  }
  const parsed = new Date(expires);
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}
