import { describe, it, expect } from "vitest";
import { hashPassword, verifyPassword } from "@/lib/auth";

const COST = 1024;

describe("password hashing", () => {
  it("stores the parameters with a salted hash", async () => {
    const stored = await hashPassword("secret1", COST);
    const parts = stored.split("$");
    expect(parts.slice(0, 4)).toEqual(["scrypt", "1024", "8", "1"]);
    expect(parts[4]).toHaveLength(32);
    expect(parts[5]).toHaveLength(128);
  });

  it("salts each hash", async () => {
    expect(await hashPassword("secret1", COST)).not.toBe(await hashPassword("secret1", COST));
  });

  it("verifies the right password only", async () => {
    const stored = await hashPassword("secret1", COST);
    expect(await verifyPassword("secret1", stored)).toBe(true);
    expect(await verifyPassword("secret2", stored)).toBe(false);
  });

  it("rejects strings it did not produce", async () => {
    expect(await verifyPassword("secret1", "secret1")).toBe(false);
    expect(await verifyPassword("secret1", "scrypt$0$8$1$aa$bb")).toBe(false);
    expect(await verifyPassword("secret1", "scrypt$1024$8$1$aa$bb")).toBe(false);
  });
});
