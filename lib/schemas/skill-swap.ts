import * as z from "zod";

export const swapStatusSchema = z.enum([
  "pending",
  "accepted",
  "rejected",
  "cancelled",
]);

export const swapResendPolicySchema = z.enum([
  "block_pending",
  "block_after_rejection",
  "allow",
]);

/** SQLite stores booleans as 0/1 */
const sqliteBoolean = z.union([z.boolean(), z.number().int()]).transform((v) => Boolean(v));

/** JSON text column holding a string array */
const skillListColumn = z
  .union([z.string(), z.array(z.string())])
  .transform((v, ctx) => {
    if (Array.isArray(v)) return v;
    try {
      const parsed: unknown = JSON.parse(v);
      const list = z.array(z.string()).safeParse(parsed);
      if (list.success) return list.data;
    } catch {
      // fall through to the issue below
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a JSON array of skills" });
    return z.NEVER;
  });

export const userRecordSchema = z.object({
  id: z.string().uuid(),
  email: z.string().email(),
  password_hash: z.string().min(1),
  name: z.string().min(1),
  location: z.string().nullable(),
  availability: z.string().nullable(),
  skills_offered: skillListColumn,
  skills_wanted: skillListColumn,
  is_public: sqliteBoolean,
  profile_photo: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const swapRequestRecordSchema = z
  .object({
    id: z.string().uuid(),
    requester_id: z.string().uuid(),
    recipient_id: z.string().uuid(),
    offered_skill: z.string().min(1),
    wanted_skill: z.string().min(1),
    message: z.string().nullable(),
    /** Recipient's reply, set when the request is accepted or rejected. */
    acceptance_message: z.string().nullable(),
    status: swapStatusSchema,
    created_at: z.string(),
    updated_at: z.string(),
  })
  .refine((r) => r.requester_id !== r.recipient_id, {
    message: "requester and recipient must differ",
  });

export type SwapStatus = z.infer<typeof swapStatusSchema>;
export type SwapResendPolicy = z.infer<typeof swapResendPolicySchema>;
export type UserRecord = z.output<typeof userRecordSchema>;
export type SwapRequestRecord = z.output<typeof swapRequestRecordSchema>;

/** Profile as seen by its owner. Never carries the password hash. */
export interface OwnProfile {
  id: string;
  email: string;
  name: string;
  location: string | null;
  availability: string | null;
  skills_offered: string[];
  skills_wanted: string[];
  is_public: boolean;
  profile_photo: string | null;
  created_at: string;
  updated_at: string;
}

/** Profile as seen by other users: no email. */
export type PublicProfile = Omit<OwnProfile, "email">;

export interface SwapRequestView extends SwapRequestRecord {
  requester: PublicProfile | null;
  recipient: PublicProfile | null;
}
