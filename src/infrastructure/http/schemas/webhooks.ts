import { z } from "zod";

// URL and filter rules (and their reason codes) live in the domain validators;
// these schemas only pin down shapes.
const eventsField = z
  .union([z.string(), z.array(z.string()).min(1, "Select at least one event")])
  .transform((value) => (Array.isArray(value) ? value.join(",") : value));

export const CreateWebhookRequestSchema = z
  .object({
    url: z.string().min(1, "url is required").max(2048),
    secret: z.string().max(256).optional(),
    events: eventsField.optional(),
  })
  .strict();

export const UpdateWebhookRequestSchema = z
  .object({
    url: z.string().min(1).max(2048).optional(),
    events: eventsField.optional(),
    active: z.boolean().optional(),
  })
  .strict();

export const ListDeliveriesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type CreateWebhookRequest = z.infer<typeof CreateWebhookRequestSchema>;
export type UpdateWebhookRequest = z.infer<typeof UpdateWebhookRequestSchema>;
