/**
 * Tests for createTestDb helper.
 */

import { describe, it, expect } from "vitest";
import { createTestConfig, createTestDb, seedUser } from "./create-test-db";

describe("createTestDb", () => {
  it("returns a DbAdapter with migrations applied", async () => {
    const db = createTestDb();
    expect(await db.ping()).toBe(true);
    expect(await db.listViewableUsers("nobody")).toEqual([]);
  });

  it("each call returns a fresh isolated database", async () => {
    const config = createTestConfig();
    const db1 = createTestDb();
    const db2 = createTestDb();
    const { user } = await seedUser(db1, config);

    expect(await db1.getUserById(user.id)).not.toBeNull();
    expect(await db2.getUserById(user.id)).toBeNull();
  });
});
