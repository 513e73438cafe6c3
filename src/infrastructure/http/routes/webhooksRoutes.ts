import { Request, Response, Router } from "express";
import { CreateWebhook } from "../../../application/useCases/CreateWebhook";
import { DeleteWebhook } from "../../../application/useCases/DeleteWebhook";
import { ListWebhookDeliveries } from "../../../application/useCases/ListWebhookDeliveries";
import { ListWebhooks } from "../../../application/useCases/ListWebhooks";
import { RotateWebhookSecret } from "../../../application/useCases/RotateWebhookSecret";
import { TestWebhook } from "../../../application/useCases/TestWebhook";
import { UpdateWebhook } from "../../../application/useCases/UpdateWebhook";
import { DeliveryAttempt } from "../../../domain/entities/DeliveryAttempt";
import { WebhookSubscriptionView } from "../../../domain/entities/WebhookSubscription";
import { WEBHOOK_EVENT_TYPES, WebhookEventType } from "../../../domain/events/WebhookEvent";
import { WILDCARD_FILTER } from "../../../domain/validators/EventFilter";
import { sendRouteError, sendUnauthorized } from "../errors";
import { OwnerResolver } from "../middlewares/ownerResolver";
import {
  CreateWebhookRequestSchema,
  ListDeliveriesQuerySchema,
  UpdateWebhookRequestSchema,
} from "../schemas/webhooks";

export interface WebhooksRouterDeps {
  resolveOwner: OwnerResolver;
  createWebhook: CreateWebhook;
  updateWebhook: UpdateWebhook;
  rotateWebhookSecret: RotateWebhookSecret;
  deleteWebhook: DeleteWebhook;
  listWebhooks: ListWebhooks;
  listWebhookDeliveries: ListWebhookDeliveries;
  testWebhook: TestWebhook;
}

const EVENT_DESCRIPTIONS: Record<WebhookEventType, string> = {
  "status.created": "A status was set",
  "status.deleted": "A status was removed",
};

export function presentWebhook(webhook: WebhookSubscriptionView) {
  return {
    id: webhook.id,
    url: webhook.url,
    secret: webhook.maskedSecret,
    events: webhook.events,
    active: webhook.active,
    lastDeliveryAt: webhook.lastDeliveryAt?.toISOString() ?? null,
    createdAt: webhook.createdAt.toISOString(),
    updatedAt: webhook.updatedAt.toISOString(),
  };
}

export function presentDelivery(delivery: DeliveryAttempt) {
  return {
    id: delivery.id,
    eventId: delivery.eventId,
    eventType: delivery.eventType,
    status: delivery.status,
    success: delivery.success,
    responseStatus: delivery.responseStatus,
    responseBody: delivery.responseBody,
    errorMessage: delivery.errorMessage,
    attemptedAt: delivery.attemptedAt.toISOString(),
  };
}

export function createWebhooksRouter(deps: WebhooksRouterDeps): Router {
  const router = Router();

  router.get("/events", (_req: Request, res: Response) => {
    res.json({
      events: WEBHOOK_EVENT_TYPES,
      wildcard: WILDCARD_FILTER,
      descriptions: EVENT_DESCRIPTIONS,
    });
  });

  router.get("/", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const result = await deps.listWebhooks.execute({ ownerDid });
      res.json({ webhooks: result.webhooks.map(presentWebhook), total: result.total });
    } catch (err) {
      sendRouteError(res, err, "Failed to list webhooks");
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const parsed = CreateWebhookRequestSchema.parse(req.body);
      const result = await deps.createWebhook.execute({ ownerDid, ...parsed });

      res.status(201).json({
        webhook: presentWebhook(result.webhook),
        secret: result.secret, // shown once
      });
    } catch (err) {
      sendRouteError(res, err, "Failed to create webhook");
    }
  });

  router.patch("/:id", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const parsed = UpdateWebhookRequestSchema.parse(req.body);
      const webhook = await deps.updateWebhook.execute({ ownerDid, webhookId: req.params.id, ...parsed });
      res.json({ webhook: presentWebhook(webhook) });
    } catch (err) {
      sendRouteError(res, err, "Failed to update webhook");
    }
  });

  router.post("/:id/rotate", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const result = await deps.rotateWebhookSecret.execute({ ownerDid, webhookId: req.params.id });
      res.json({ id: result.webhookId, secret: result.secret, rotatedAt: result.rotatedAt });
    } catch (err) {
      sendRouteError(res, err, "Failed to rotate webhook secret");
    }
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      await deps.deleteWebhook.execute({ ownerDid, webhookId: req.params.id });
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete webhook");
    }
  });

  router.get("/:id/deliveries", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const { limit } = ListDeliveriesQuerySchema.parse(req.query);
      const deliveries = await deps.listWebhookDeliveries.execute({ ownerDid, webhookId: req.params.id, limit });
      res.json({ deliveries: deliveries.map(presentDelivery) });
    } catch (err) {
      sendRouteError(res, err, "Failed to list webhook deliveries");
    }
  });

  router.post("/:id/test", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const delivery = await deps.testWebhook.execute({ ownerDid, webhookId: req.params.id });
      res.json({ delivery: presentDelivery(delivery) });
    } catch (err) {
      sendRouteError(res, err, "Failed to send test webhook");
    }
  });

  return router;
}
