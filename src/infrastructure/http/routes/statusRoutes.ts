import { Request, Response, Router } from "express";
import { DeleteStatus } from "../../../application/useCases/DeleteStatus";
import { SetStatus } from "../../../application/useCases/SetStatus";
import { sendRouteError, sendUnauthorized } from "../errors";
import { OwnerResolver } from "../middlewares/ownerResolver";
import { DeleteStatusRequestSchema, SetStatusRequestSchema } from "../schemas/statuses";

export interface StatusRouterDeps {
  resolveOwner: OwnerResolver;
  setStatus: SetStatus;
  deleteStatus: DeleteStatus;
}

export function createStatusRouter(deps: StatusRouterDeps): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const parsed = SetStatusRequestSchema.parse(req.body);
      const status = await deps.setStatus.execute({
        ownerDid,
        emoji: parsed.emoji,
        text: parsed.text,
        expiresAt: parsed.expiresAt,
      });

      res.status(201).json({
        status: {
          uri: status.uri,
          emoji: status.emoji,
          text: status.text,
          startedAt: status.startedAt.toISOString(),
          expiresAt: status.expiresAt?.toISOString() ?? null,
        },
      });
    } catch (err) {
      sendRouteError(res, err, "Failed to set status");
    }
  });

  router.delete("/", async (req: Request, res: Response) => {
    const ownerDid = deps.resolveOwner(req);
    if (!ownerDid) return sendUnauthorized(res);

    try {
      const { uri } = DeleteStatusRequestSchema.parse(req.body);
      await deps.deleteStatus.execute({ ownerDid, uri });
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete status");
    }
  });

  return router;
}
