/**
 * @security Fails fast on malformed configuration instead of running half-configured
 * @maintainability Single typed source of truth for every tunable in the pipeline
 * @testability Fixed defaults under NODE_ENV=test, no .env file required
 */

import "dotenv/config";
import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z.string().default(fallback).transform((v) => v === "true");

const integer = (fallback: string) =>
  z.string().regex(/^\d+$/).default(fallback).transform(Number);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: integer("8080"),
  LOG_LEVEL: z.enum(["silent", "debug", "info", "warn", "error"]).optional(),

  // Local store
  STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: z.string().url().optional(),

  // Firehose (Jetstream)
  FIREHOSE_ENABLED: booleanFlag("false"),
  FIREHOSE_URL: z.string().url().default("wss://jetstream2.us-east.bsky.network/subscribe"),
  FIREHOSE_COLLECTIONS: z
    .string()
    .default("io.zzstoatzz.status.record")
    .transform((v) => v.split(",").map((c) => c.trim()).filter((c) => c.length > 0)),
  FIREHOSE_MAX_RETRIES: integer("10"),
  FIREHOSE_RETRY_BASE_MS: integer("1000"),

  // Webhooks
  WEBHOOK_DEV_MODE: booleanFlag("false"),
  WEBHOOK_TIMEOUT_MS: integer("5000").refine(
    (v) => v >= 5_000 && v <= 30_000,
    "WEBHOOK_TIMEOUT_MS must be between 5000 and 30000"
  ),
  WEBHOOK_DISPATCH_CONCURRENCY: integer("4"),
  WEBHOOK_DISPATCH_QUEUE_SIZE: integer("1000"),

  // Messaging
  MESSAGING_DRIVER: z.enum(["memory", "rabbitmq"]).default("memory"),
  RABBITMQ_URI: z.string().optional(),

  // Session layer hand-off
  OWNER_HEADER: z.string().default("x-owner-did").transform((v) => v.toLowerCase()),

  SHUTDOWN_GRACE_MS: integer("10000"),
});

export type Env = z.infer<typeof envSchema>;

function testDefaults(): Env {
  return {
    NODE_ENV: "test",
    PORT: 0,
    LOG_LEVEL: "silent",
    STORE_DRIVER: "memory",
    DATABASE_URL: undefined,
    FIREHOSE_ENABLED: false,
    FIREHOSE_URL: "wss://jetstream.test/subscribe",
    FIREHOSE_COLLECTIONS: ["io.zzstoatzz.status.record"],
    FIREHOSE_MAX_RETRIES: 3,
    FIREHOSE_RETRY_BASE_MS: 10,
    WEBHOOK_DEV_MODE: false,
    WEBHOOK_TIMEOUT_MS: 5_000,
    WEBHOOK_DISPATCH_CONCURRENCY: 2,
    WEBHOOK_DISPATCH_QUEUE_SIZE: 100,
    MESSAGING_DRIVER: "memory",
    RABBITMQ_URI: undefined,
    OWNER_HEADER: "x-owner-did",
    SHUTDOWN_GRACE_MS: 1_000,
  };
}

const loadEnv = (): Env => {
  if (process.env.NODE_ENV === "test") {
    return testDefaults();
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error("Invalid environment variables:", parsed.error.format());
    process.exit(1);
  }

  if (parsed.data.STORE_DRIVER === "postgres" && !parsed.data.DATABASE_URL) {
    console.error("DATABASE_URL is required when STORE_DRIVER=postgres");
    process.exit(1);
  }

  if (parsed.data.MESSAGING_DRIVER === "rabbitmq" && !parsed.data.RABBITMQ_URI) {
    console.error("RABBITMQ_URI is required when MESSAGING_DRIVER=rabbitmq");
    process.exit(1);
  }

  return parsed.data;
};

export const env = loadEnv();
