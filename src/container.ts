import { WebhookDeliveryService } from "./application/services/WebhookDeliveryService";
import { CreateWebhook } from "./application/useCases/CreateWebhook";
import { DeleteStatus } from "./application/useCases/DeleteStatus";
import { DeleteWebhook } from "./application/useCases/DeleteWebhook";
import { DispatchWebhooks, WEBHOOK_DISPATCH_EVENT } from "./application/useCases/DispatchWebhooks";
import { FanOutWebhookEvent } from "./application/useCases/FanOutWebhookEvent";
import { IngestFirehoseEvent } from "./application/useCases/IngestFirehoseEvent";
import { ListWebhookDeliveries } from "./application/useCases/ListWebhookDeliveries";
import { ListWebhooks } from "./application/useCases/ListWebhooks";
import { RotateWebhookSecret } from "./application/useCases/RotateWebhookSecret";
import { SetStatus } from "./application/useCases/SetStatus";
import { TestWebhook } from "./application/useCases/TestWebhook";
import { UpdateWebhook } from "./application/useCases/UpdateWebhook";
import { Env } from "./config/env";
import { MessagingFactory } from "./infrastructure/adapters/messaging/MessagingFactory";
import { InMemoryStatusRepository } from "./infrastructure/adapters/repositories/InMemoryStatusRepository";
import { InMemoryWebhookDeliveryRepository } from "./infrastructure/adapters/repositories/InMemoryWebhookDeliveryRepository";
import { InMemoryWebhookSubscriptionRepository } from "./infrastructure/adapters/repositories/InMemoryWebhookSubscriptionRepository";
import { FetchWebhookDeliveryAdapter } from "./infrastructure/adapters/webhooks/FetchWebhookDeliveryAdapter";
import { FirehoseConsumer } from "./infrastructure/consumers/FirehoseConsumer";
import { WebhookDispatcherConsumer } from "./infrastructure/consumers/WebhookDispatcherConsumer";
import { DbClient, closeDb, createDb, runMigrations } from "./infrastructure/database/knexClient";
import { KnexStatusRepository } from "./infrastructure/database/repositories/KnexStatusRepository";
import { KnexWebhookDeliveryRepository } from "./infrastructure/database/repositories/KnexWebhookDeliveryRepository";
import { KnexWebhookSubscriptionRepository } from "./infrastructure/database/repositories/KnexWebhookSubscriptionRepository";
import { JetstreamConnection } from "./infrastructure/firehose/JetstreamConnection";
import { AppDeps } from "./infrastructure/http/app";
import { OwnerResolver, headerOwnerResolver } from "./infrastructure/http/middlewares/ownerResolver";
import { MessagingPort } from "./ports/MessagingPort";
import { WebhookDeliveryPort } from "./ports/WebhookDeliveryPort";
import { StatusRepository } from "./ports/repositories/StatusRepository";
import { WebhookDeliveryRepository } from "./ports/repositories/WebhookDeliveryRepository";
import { WebhookSubscriptionRepository } from "./ports/repositories/WebhookSubscriptionRepository";

export type ContainerConfig = Pick<
  Env,
  | "STORE_DRIVER"
  | "DATABASE_URL"
  | "FIREHOSE_URL"
  | "FIREHOSE_COLLECTIONS"
  | "FIREHOSE_MAX_RETRIES"
  | "FIREHOSE_RETRY_BASE_MS"
  | "WEBHOOK_DEV_MODE"
  | "WEBHOOK_TIMEOUT_MS"
  | "WEBHOOK_DISPATCH_CONCURRENCY"
  | "WEBHOOK_DISPATCH_QUEUE_SIZE"
  | "MESSAGING_DRIVER"
  | "RABBITMQ_URI"
  | "OWNER_HEADER"
>;

export interface ContainerOverrides {
  deliveryPort?: WebhookDeliveryPort;
  resolveOwner?: OwnerResolver;
}

export interface Container {
  app: AppDeps;
  messaging: MessagingPort;
  firehose: FirehoseConsumer;
  repositories: {
    statuses: StatusRepository;
    subscriptions: WebhookSubscriptionRepository;
    deliveries: WebhookDeliveryRepository;
  };
  close(): Promise<void>;
}

interface Repositories {
  statuses: StatusRepository;
  subscriptions: WebhookSubscriptionRepository;
  deliveries: WebhookDeliveryRepository;
  db: DbClient | null;
}

async function buildRepositories(config: ContainerConfig): Promise<Repositories> {
  if (config.STORE_DRIVER === "postgres") {
    if (!config.DATABASE_URL) {
      throw new Error("DATABASE_URL is required when STORE_DRIVER=postgres");
    }
    const db = createDb(config.DATABASE_URL);
    await runMigrations(db);
    return {
      statuses: new KnexStatusRepository(db),
      subscriptions: new KnexWebhookSubscriptionRepository(db),
      deliveries: new KnexWebhookDeliveryRepository(db),
      db,
    };
  }

  const deliveries = new InMemoryWebhookDeliveryRepository();
  return {
    statuses: new InMemoryStatusRepository(),
    subscriptions: new InMemoryWebhookSubscriptionRepository(deliveries),
    deliveries,
    db: null,
  };
}

/**
 * Wires every use case to its adapters for the given configuration.
 */
export async function buildContainer(
  config: ContainerConfig,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const { statuses, subscriptions, deliveries, db } = await buildRepositories(config);

  const deliveryService = new WebhookDeliveryService(
    overrides.deliveryPort ?? new FetchWebhookDeliveryAdapter(),
    deliveries,
    subscriptions,
    { timeoutMs: config.WEBHOOK_TIMEOUT_MS }
  );
  const fanOut = new FanOutWebhookEvent(subscriptions, deliveryService);

  const messaging = await MessagingFactory.create(
    {
      driver: config.MESSAGING_DRIVER,
      rabbitmqUri: config.RABBITMQ_URI,
      concurrency: config.WEBHOOK_DISPATCH_CONCURRENCY,
      maxQueueSize: config.WEBHOOK_DISPATCH_QUEUE_SIZE,
    },
    { [WEBHOOK_DISPATCH_EVENT]: new WebhookDispatcherConsumer(fanOut) }
  );
  const dispatchWebhooks = new DispatchWebhooks(messaging);

  const firehose = new FirehoseConsumer(
    new JetstreamConnection({
      url: config.FIREHOSE_URL,
      wantedCollections: config.FIREHOSE_COLLECTIONS,
      maxRetries: config.FIREHOSE_MAX_RETRIES,
      retryBaseMs: config.FIREHOSE_RETRY_BASE_MS,
    }),
    new IngestFirehoseEvent(statuses),
    { wantedCollections: config.FIREHOSE_COLLECTIONS }
  );

  const devMode = config.WEBHOOK_DEV_MODE;

  return {
    app: {
      resolveOwner: overrides.resolveOwner ?? headerOwnerResolver(config.OWNER_HEADER),
      createWebhook: new CreateWebhook(subscriptions, devMode),
      updateWebhook: new UpdateWebhook(subscriptions, devMode),
      rotateWebhookSecret: new RotateWebhookSecret(subscriptions),
      deleteWebhook: new DeleteWebhook(subscriptions),
      listWebhooks: new ListWebhooks(subscriptions),
      listWebhookDeliveries: new ListWebhookDeliveries(subscriptions, deliveries),
      testWebhook: new TestWebhook(subscriptions, deliveryService),
      setStatus: new SetStatus(statuses, dispatchWebhooks),
      deleteStatus: new DeleteStatus(statuses, dispatchWebhooks),
    },
    messaging,
    firehose,
    repositories: { statuses, subscriptions, deliveries },
    async close() {
      if (db) {
        await closeDb(db);
      }
    },
  };
}
