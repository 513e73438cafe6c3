import { Counter, register } from "prom-client";

export const firehoseMessagesCounter = new Counter({
  name: "firehose_messages_total",
  help: "Firehose messages processed, by outcome",
  labelNames: ["outcome"] as const,
});

export const webhookDeliveriesCounter = new Counter({
  name: "webhook_deliveries_total",
  help: "Webhook delivery attempts, by final status",
  labelNames: ["status"] as const,
});

export const webhookDispatchDroppedCounter = new Counter({
  name: "webhook_dispatch_dropped_total",
  help: "Webhook events dropped before reaching the dispatch queue",
});

export { register as metricsRegistry };
