import { StatusNotFoundError } from "../../domain/entities/StatusRecord";
import { subjectFromStatus } from "../../domain/events/WebhookEvent";
import { StatusRepository } from "../../ports/repositories/StatusRepository";
import { DispatchWebhooks } from "./DispatchWebhooks";
import { dispatchQuietly } from "./SetStatus";

interface DeleteStatusRequest {
  ownerDid: string;
  uri: string;
}

export class DeleteStatus {
  constructor(
    private readonly statusRepository: StatusRepository,
    private readonly dispatchWebhooks: DispatchWebhooks
  ) {}

  async execute(request: DeleteStatusRequest): Promise<void> {
    const status = await this.statusRepository.findByUri(request.uri);

    // Someone else's status reads as missing
    if (!status || status.authorDid !== request.ownerDid) {
      throw new StatusNotFoundError(request.uri);
    }

    await this.statusRepository.deleteByUri(status.uri);

    await dispatchQuietly(this.dispatchWebhooks, {
      ownerDid: request.ownerDid,
      type: "status.deleted",
      status: subjectFromStatus(status),
    });
  }
}

export { StatusNotFoundError };
