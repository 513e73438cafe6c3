/**
 * HTTP tests: /statuses
 */

import request from "supertest";
import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { OTHER, OWNER, OWNER_HEADER, TestApp, buildTestApp } from "../../__tests__/support/testApp";

describe("status routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it("should create a status and notify subscribers", async () => {
    // Arrange
    await request(t.app)
      .post("/webhooks")
      .set(OWNER_HEADER, OWNER)
      .send({ url: "https://example.com/hook", events: "status.created" });

    // Act
    const res = await request(t.app)
      .post("/statuses")
      .set(OWNER_HEADER, OWNER)
      .send({ emoji: "🚀", text: "shipping", expiresAt: "2030-01-01T00:00:00.000Z" });
    await t.idle();

    // Assert
    expect(res.status).toBe(201);
    expect(res.body.status.emoji).toBe("🚀");
    expect(res.body.status.text).toBe("shipping");
    expect(res.body.status.expiresAt).toBe("2030-01-01T00:00:00.000Z");
    expect(res.body.status.uri.startsWith(`at://${OWNER}/io.zzstoatzz.status.record/`)).toBe(true);

    expect(t.port.requests).toHaveLength(1);
    const event = JSON.parse(t.port.requests[0].body);
    expect(event.type).toBe("status.created");
    expect(event.status_uri).toBe(res.body.status.uri);
    expect(event.expires_at).toBe("2030-01-01T00:00:00.000Z");
  });

  it("should reject an empty emoji", async () => {
    const res = await request(t.app).post("/statuses").set(OWNER_HEADER, OWNER).send({ emoji: "  " });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
  });

  it("should require an owner", async () => {
    const res = await request(t.app).post("/statuses").send({ emoji: "🚀" });

    expect(res.status).toBe(401);
  });

  it("should let only the author delete a status", async () => {
    // Arrange
    const created = await request(t.app).post("/statuses").set(OWNER_HEADER, OWNER).send({ emoji: "🚀" });
    const uri = created.body.status.uri;

    // Act
    const foreign = await request(t.app).delete("/statuses").set(OWNER_HEADER, OTHER).send({ uri });
    const own = await request(t.app).delete("/statuses").set(OWNER_HEADER, OWNER).send({ uri });
    const again = await request(t.app).delete("/statuses").set(OWNER_HEADER, OWNER).send({ uri });

    // Assert
    expect(foreign.status).toBe(404);
    expect(own.status).toBe(204);
    expect(again.status).toBe(404);
    expect(await t.container.repositories.statuses.findByUri(uri)).toBeNull();
  });
});
