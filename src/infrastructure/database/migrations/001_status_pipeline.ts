import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("status", (table) => {
    table.text("uri").primary();
    table.text("author_did").notNullable();
    table.text("emoji").notNullable();
    table.text("text");
    table.timestamp("started_at", { useTz: true }).notNullable();
    table.timestamp("expires_at", { useTz: true });
    table.timestamp("indexed_at", { useTz: true }).notNullable();
    table.boolean("hidden").notNullable().defaultTo(false);
    table.index(["author_did", "started_at"]);
  });

  await knex.schema.createTable("webhook_subscription", (table) => {
    table.text("id").primary();
    table.text("owner_did").notNullable().index();
    table.text("url").notNullable();
    table.text("secret").notNullable();
    table.text("events").notNullable().defaultTo("*");
    table.boolean("active").notNullable().defaultTo(true);
    table.timestamp("last_delivery_at", { useTz: true });
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable();
  });

  await knex.schema.createTable("webhook_delivery", (table) => {
    table.text("id").primary();
    table
      .text("subscription_id")
      .notNullable()
      .references("id")
      .inTable("webhook_subscription")
      .onDelete("CASCADE");
    table.text("event_id").notNullable();
    table.text("event_type").notNullable();
    table.text("payload").notNullable();
    table.timestamp("attempted_at", { useTz: true }).notNullable();
    table.text("status").notNullable().defaultTo("PENDING");
    table.integer("response_status");
    table.text("response_body");
    table.text("error_message");
    table.boolean("success").notNullable().defaultTo(false);
    table.integer("retry_count").notNullable().defaultTo(0);
    table.timestamp("next_retry_at", { useTz: true });
    table.index(["subscription_id", "attempted_at"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("webhook_delivery");
  await knex.schema.dropTableIfExists("webhook_subscription");
  await knex.schema.dropTableIfExists("status");
}
