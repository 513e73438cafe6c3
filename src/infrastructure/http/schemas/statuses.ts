import { z } from "zod";

export const SetStatusRequestSchema = z.object({
  emoji: z.string().trim().min(1, "emoji is required").max(64),
  text: z.string().max(256).nullish(),
  expiresAt: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .nullish(),
});

export const DeleteStatusRequestSchema = z.object({
  uri: z.string().min(1, "uri is required"),
});

export type SetStatusRequest = z.infer<typeof SetStatusRequestSchema>;
