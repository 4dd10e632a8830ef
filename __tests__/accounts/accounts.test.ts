/**
 * Account operations against an in-memory database.
 */

import { beforeEach, describe, it, expect } from "vitest";
import {
  changePassword,
  getOwnProfile,
  getUser,
  listSkills,
  listUsers,
  loginUser,
  registerUser,
  updateProfile,
} from "@/lib/accounts";
import { verifyToken } from "@/lib/auth";
import type { DbAdapter } from "@/lib/db/adapter";
import { registerSchema } from "@/lib/validation/request-schema";
import { createTestConfig, createTestDb, seedUser, TEST_PASSWORD } from "../lib/create-test-db";

const config = createTestConfig();

describe("account operations", () => {
  let db: DbAdapter;

  beforeEach(() => {
    db = createTestDb();
  });

  describe("registerUser", () => {
    const input = registerSchema.parse({
      name: "Alice",
      email: "Alice@Example.com",
      password: "secret1",
      location: "Berlin",
      skills_offered: ["Python"],
      skills_wanted: ["Guitar"],
    });

    it("creates a public user and returns a token for it", async () => {
      const result = await registerUser(db, config, input);
      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.user).toMatchObject({
        email: "alice@example.com",
        name: "Alice",
        location: "Berlin",
        availability: null,
        skills_offered: ["Python"],
        skills_wanted: ["Guitar"],
        is_public: true,
      });
      expect(result.user).not.toHaveProperty("password_hash");
      expect(verifyToken(result.token, config.auth)).toEqual({ userId: result.user.id });
    });

    it("keeps a profile photo given at registration", async () => {
      const result = await registerUser(db, config, {
        ...input,
        profile_photo: "https://example.com/alice.png",
      });
      expect(result.success && result.user.profile_photo).toBe("https://example.com/alice.png");
    });

    it("never stores the plain password", async () => {
      const result = await registerUser(db, config, input);
      if (!result.success) throw new Error(result.message);
      const row = await db.getUserById(result.user.id);
      expect(row?.password_hash).not.toBe("secret1");
      expect(String(row?.password_hash).startsWith("scrypt$1024$")).toBe(true);
    });

    it("refuses a second account with the same email", async () => {
      await registerUser(db, config, input);
      const again = await registerUser(db, config, { ...input, name: "Other Alice" });
      expect(again).toEqual({
        success: false,
        error: "duplicate_email",
        message: "A user already exists with this email",
      });
    });
  });

  describe("loginUser", () => {
    it("issues a token for valid credentials", async () => {
      const { user } = await seedUser(db, config, { email: "bob@example.com" });
      const result = await loginUser(db, config, { email: "bob@example.com", password: TEST_PASSWORD });
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.user.id).toBe(user.id);
      expect(verifyToken(result.token, config.auth)).toEqual({ userId: user.id });
    });

    it("gives the same answer for a wrong password and an unknown email", async () => {
      await seedUser(db, config, { email: "bob@example.com" });
      const failed = {
        success: false,
        error: "invalid_credentials",
        message: "Invalid email or password",
      };
      expect(await loginUser(db, config, { email: "bob@example.com", password: "wrong-one" })).toEqual(failed);
      expect(await loginUser(db, config, { email: "nobody@example.com", password: TEST_PASSWORD })).toEqual(
        failed
      );
    });
  });

  describe("profile", () => {
    it("returns the actor's own profile with email", async () => {
      const alice = await seedUser(db, config, { email: "alice@example.com" });
      const result = await getOwnProfile(db, alice.actor);
      expect(result).toEqual({ success: true, user: alice.user });
    });

    it("reports a token whose user no longer exists", async () => {
      const result = await getOwnProfile(db, { userId: crypto.randomUUID() });
      expect(result).toEqual({ success: false, error: "not_found", message: "User not found" });
    });

    it("applies only the supplied fields", async () => {
      const alice = await seedUser(db, config, { location: "Berlin" });
      const result = await updateProfile(db, alice.actor, alice.user.id, {
        name: "Alice B",
        skills_offered: ["Chess", "SQL"],
        is_public: false,
      });
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.user).toMatchObject({
        name: "Alice B",
        location: "Berlin",
        skills_offered: ["Chess", "SQL"],
        skills_wanted: ["Guitar"],
        is_public: false,
      });

      const reread = await getOwnProfile(db, alice.actor);
      expect(reread).toEqual({ success: true, user: result.user });
    });

    it("clears optional text with an empty string", async () => {
      const alice = await seedUser(db, config, { location: "Berlin" });
      const result = await updateProfile(db, alice.actor, alice.user.id, { location: "" });
      expect(result.success && result.user.location).toBeNull();
    });

    it("sets and clears the profile photo", async () => {
      const alice = await seedUser(db, config);
      expect(alice.user.profile_photo).toBeNull();

      const set = await updateProfile(db, alice.actor, alice.user.id, {
        profile_photo: "https://example.com/alice.png",
      });
      expect(set.success && set.user.profile_photo).toBe("https://example.com/alice.png");

      const cleared = await updateProfile(db, alice.actor, alice.user.id, { profile_photo: "" });
      expect(cleared.success && cleared.user.profile_photo).toBeNull();
    });

    it("leaves the record untouched for an empty patch", async () => {
      const alice = await seedUser(db, config);
      const result = await updateProfile(db, alice.actor, alice.user.id, {});
      expect(result).toEqual({ success: true, user: alice.user });
    });

    it("refuses to edit another user's profile", async () => {
      const alice = await seedUser(db, config);
      const bob = await seedUser(db, config);
      const result = await updateProfile(db, bob.actor, alice.user.id, { name: "Hacked" });
      expect(result).toEqual({
        success: false,
        error: "forbidden",
        message: "You can only update your own profile",
      });
    });

    it("refuses an email that belongs to someone else", async () => {
      await seedUser(db, config, { email: "taken@example.com" });
      const bob = await seedUser(db, config);
      const result = await updateProfile(db, bob.actor, bob.user.id, { email: "taken@example.com" });
      expect(result).toEqual({
        success: false,
        error: "duplicate_email",
        message: "Email is already taken",
      });
    });
  });

  describe("changePassword", () => {
    it("replaces the password after verifying the current one", async () => {
      const alice = await seedUser(db, config, { email: "alice@example.com" });
      const result = await changePassword(db, config, alice.actor, {
        current_password: TEST_PASSWORD,
        new_password: "brand-new-password",
      });
      expect(result.success).toBe(true);

      const oldLogin = await loginUser(db, config, { email: "alice@example.com", password: TEST_PASSWORD });
      expect(oldLogin.success).toBe(false);
      const newLogin = await loginUser(db, config, {
        email: "alice@example.com",
        password: "brand-new-password",
      });
      expect(newLogin.success).toBe(true);
    });

    it("refuses a wrong current password", async () => {
      const alice = await seedUser(db, config);
      const result = await changePassword(db, config, alice.actor, {
        current_password: "not-my-password",
        new_password: "brand-new-password",
      });
      expect(result).toEqual({
        success: false,
        error: "invalid_credentials",
        message: "Current password is incorrect",
      });
    });
  });

  describe("directory", () => {
    it("lists public users and the actor, without emails", async () => {
      const alice = await seedUser(db, config, { name: "Alice", is_public: false });
      const bob = await seedUser(db, config, { name: "Bob" });
      await seedUser(db, config, { name: "Hidden", is_public: false });

      const users = await listUsers(db, alice.actor);
      expect(users.map((u) => u.name)).toEqual(["Alice", "Bob"]);
      expect(users.every((u) => !("email" in u))).toBe(true);

      const fromBob = await listUsers(db, bob.actor);
      expect(fromBob.map((u) => u.name)).toEqual(["Bob"]);
    });

    it("filters by skill and by name", async () => {
      const alice = await seedUser(db, config, { name: "Alice" });
      await seedUser(db, config, { name: "Bob", skills_offered: ["Cooking"] });
      await seedUser(db, config, { name: "Bobby", skills_wanted: ["cooking"] });

      const cooks = await listUsers(db, alice.actor, { skill: "Cooking" });
      expect(cooks.map((u) => u.name)).toEqual(["Bob", "Bobby"]);

      const named = await listUsers(db, alice.actor, { search: "bobb" });
      expect(named.map((u) => u.name)).toEqual(["Bobby"]);
    });

    it("shows a single profile according to visibility", async () => {
      const alice = await seedUser(db, config, { is_public: false });
      const bob = await seedUser(db, config);

      expect(await getUser(db, bob.actor, alice.user.id)).toEqual({
        success: false,
        error: "forbidden",
        message: "This profile is private",
      });

      const own = await getUser(db, alice.actor, alice.user.id);
      expect(own).toEqual({ success: true, user: alice.user });

      const other = await getUser(db, alice.actor, bob.user.id);
      expect(other.success).toBe(true);
      if (other.success) expect(other.user).not.toHaveProperty("email");

      expect(await getUser(db, alice.actor, crypto.randomUUID())).toEqual({
        success: false,
        error: "not_found",
        message: "User not found",
      });
    });

    it("collects distinct skills from visible profiles", async () => {
      const alice = await seedUser(db, config, { skills_offered: ["Python"], skills_wanted: ["Guitar"] });
      await seedUser(db, config, { skills_offered: ["Cooking"], skills_wanted: ["Python"] });
      await seedUser(db, config, { skills_offered: ["Secret"], is_public: false });

      expect(await listSkills(db, alice.actor)).toEqual(["Cooking", "Guitar", "Python"]);
    });
  });
});
