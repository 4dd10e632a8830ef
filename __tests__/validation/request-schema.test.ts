import { describe, it, expect } from "vitest";
import {
  changePasswordSchema,
  createSwapRequestSchema,
  listSwapRequestsQuerySchema,
  normalizeSkills,
  registerSchema,
  updateProfileSchema,
  updateSwapRequestSchema,
} from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

const validRegistration = {
  name: "Alice",
  email: "alice@example.com",
  password: "secret1",
  skills_offered: ["Python"],
  skills_wanted: ["Guitar"],
};

describe("normalizeSkills", () => {
  it("trims, drops empties and keeps the first spelling of a duplicate", () => {
    expect(normalizeSkills([" Python ", "", "python", "SQL", "  "])).toEqual(["Python", "SQL"]);
  });
});

describe("registerSchema", () => {
  it("normalises email and skills", () => {
    const parsed = registerSchema.parse({
      ...validRegistration,
      email: "  Alice@Example.COM ",
      skills_offered: ["Python", " python ", "SQL"],
    });
    expect(parsed.email).toBe("alice@example.com");
    expect(parsed.skills_offered).toEqual(["Python", "SQL"]);
  });

  it("reports each invalid field", () => {
    const result = registerSchema.safeParse({
      ...validRegistration,
      email: "not-an-email",
      password: "12345",
      skills_wanted: [" "],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({
      email: ["Please enter a valid email address"],
      password: ["Password must be at least 6 characters long"],
      skills_wanted: ["At least one skill wanted is required"],
    });
  });

  it("requires a name", () => {
    const result = registerSchema.safeParse({ ...validRegistration, name: "   " });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({ name: ["Name is required"] });
  });
});

describe("updateProfileSchema", () => {
  it("accepts an empty patch", () => {
    expect(updateProfileSchema.parse({})).toEqual({});
  });

  it("allows clearing optional text fields", () => {
    expect(updateProfileSchema.parse({ location: null })).toEqual({ location: null });
  });

  it("takes a profile photo URL and lets an empty string clear it", () => {
    expect(updateProfileSchema.parse({ profile_photo: " https://example.com/me.png " })).toEqual({
      profile_photo: "https://example.com/me.png",
    });
    expect(updateProfileSchema.parse({ profile_photo: "" })).toEqual({ profile_photo: "" });
  });

  it("rejects a profile photo that is not a URL", () => {
    const result = updateProfileSchema.safeParse({ profile_photo: "not-a-url" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({ profile_photo: ["profile_photo must be a URL"] });
  });

  it("rejects a non-boolean visibility flag", () => {
    expect(updateProfileSchema.safeParse({ is_public: "yes" }).success).toBe(false);
  });
});

describe("changePasswordSchema", () => {
  it("applies the password length rule to the new password only", () => {
    const result = changePasswordSchema.safeParse({ current_password: "x", new_password: "abc" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({
      new_password: ["Password must be at least 6 characters long"],
    });
  });
});

describe("createSwapRequestSchema", () => {
  const recipient = "22222222-2222-4222-8222-222222222222";

  it("trims skills", () => {
    const parsed = createSwapRequestSchema.parse({
      recipient_id: recipient,
      offered_skill: "  Python ",
      wanted_skill: "Guitar",
    });
    expect(parsed).toEqual({ recipient_id: recipient, offered_skill: "Python", wanted_skill: "Guitar" });
  });

  it("rejects blank skills and a malformed recipient", () => {
    const result = createSwapRequestSchema.safeParse({
      recipient_id: "bob",
      offered_skill: " ",
      wanted_skill: "Guitar",
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({
      recipient_id: ["recipient_id must be a user id"],
      offered_skill: ["offered_skill is required"],
    });
  });

  it("limits the message to 500 characters", () => {
    const result = createSwapRequestSchema.safeParse({
      recipient_id: recipient,
      offered_skill: "Python",
      wanted_skill: "Guitar",
      message: "x".repeat(501),
    });
    expect(result.success).toBe(false);
  });
});

describe("status schemas", () => {
  it("accepts known statuses only", () => {
    expect(updateSwapRequestSchema.parse({ status: "accepted" })).toEqual({ status: "accepted" });
    expect(updateSwapRequestSchema.safeParse({ status: "done" }).success).toBe(false);
    expect(listSwapRequestsQuerySchema.parse({})).toEqual({});
  });

  it("takes an optional reply of up to 500 characters", () => {
    expect(
      updateSwapRequestSchema.parse({ status: "accepted", acceptance_message: " Deal " })
    ).toEqual({ status: "accepted", acceptance_message: "Deal" });
    expect(
      updateSwapRequestSchema.safeParse({ status: "rejected", acceptance_message: "x".repeat(501) })
        .success
    ).toBe(false);
  });
});

describe("zodErrorDetails", () => {
  it("keys root-level issues as body", () => {
    const result = updateSwapRequestSchema.safeParse("accepted");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(Object.keys(zodErrorDetails(result.error))).toEqual(["body"]);
  });

  it("groups several messages for one field and joins nested paths", () => {
    const result = registerSchema.safeParse({
      ...validRegistration,
      profile_photo: "x".repeat(300),
      skills_offered: [" ", "y".repeat(101)],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(zodErrorDetails(result.error)).toEqual({
      profile_photo: ["String must contain at most 255 character(s)", "profile_photo must be a URL"],
      "skills_offered.1": ["Skill names are limited to 100 characters"],
    });
  });
});
