/**
 * Zod schemas for API request payload validation.
 * Reuses domain schemas where applicable; adds request-specific shapes.
 */

import * as z from "zod";
import { swapStatusSchema } from "@/lib/schemas";

export const MIN_PASSWORD_LENGTH = 6;

/** Trimmed, empty entries dropped, first occurrence kept. */
export function normalizeSkills(skills: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of skills) {
    const skill = raw.trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) continue;
    seen.add(key);
    out.push(skill);
  }
  return out;
}

const skillListSchema = z
  .array(z.string().trim().max(100, "Skill names are limited to 100 characters"))
  .transform(normalizeSkills);

const emailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email("Please enter a valid email address");

const passwordSchema = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();

/** Absolute URL of a profile picture; "" or null clears it. */
const profilePhotoSchema = z
  .string()
  .trim()
  .max(255)
  .url("profile_photo must be a URL")
  .or(z.literal(""))
  .nullable()
  .optional();

export const idParamSchema = z.string().uuid("Invalid id");

// Accounts
export const registerSchema = z.object({
  name: z.string().trim().min(1, "Name is required").max(100),
  email: emailSchema,
  password: passwordSchema,
  location: optionalText(100),
  availability: optionalText(50),
  profile_photo: profilePhotoSchema,
  skills_offered: skillListSchema.refine((l) => l.length > 0, {
    message: "At least one skill offered is required",
  }),
  skills_wanted: skillListSchema.refine((l) => l.length > 0, {
    message: "At least one skill wanted is required",
  }),
  is_public: z.boolean().optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1, "Email is required"),
  password: z.string().min(1, "Password is required"),
});

export const updateProfileSchema = z.object({
  name: z.string().trim().min(1, "Name cannot be empty").max(100).optional(),
  email: emailSchema.optional(),
  location: optionalText(100),
  availability: optionalText(50),
  profile_photo: profilePhotoSchema,
  skills_offered: skillListSchema.optional(),
  skills_wanted: skillListSchema.optional(),
  is_public: z.boolean().optional(),
});

export const changePasswordSchema = z.object({
  current_password: z.string().min(1, "Current password is required"),
  new_password: passwordSchema,
});

export const listUsersQuerySchema = z.object({
  skill: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
});

// Swap requests
export const createSwapRequestSchema = z.object({
  recipient_id: z.string().uuid("recipient_id must be a user id"),
  offered_skill: z.string().trim().min(1, "offered_skill is required").max(100),
  wanted_skill: z.string().trim().min(1, "wanted_skill is required").max(100),
  message: optionalText(500),
});

export const updateSwapRequestSchema = z.object({
  status: swapStatusSchema,
  acceptance_message: optionalText(500),
});

export const listSwapRequestsQuerySchema = z.object({
  status: swapStatusSchema.optional(),
});

export type RegisterInput = z.output<typeof registerSchema>;
export type LoginInput = z.output<typeof loginSchema>;
export type UpdateProfileInput = z.output<typeof updateProfileSchema>;
export type ChangePasswordInput = z.output<typeof changePasswordSchema>;
export type ListUsersQuery = z.output<typeof listUsersQuerySchema>;
export type CreateSwapRequestInput = z.output<typeof createSwapRequestSchema>;
export type UpdateSwapRequestInput = z.output<typeof updateSwapRequestSchema>;
