/**
 * SQLite implementation of DbAdapter.
 * Uses better-sqlite3. JSON columns stored as TEXT, booleans as 0/1; both converted on read.
 */

import Database from "better-sqlite3";
import type { DbAdapter, DbRow, TransactionFn, UserListFilters } from "./adapter";
import type { SwapStatus } from "@/lib/schemas";
import { runMigrations } from "./migrate";

const JSON_COLUMNS: Record<string, string[]> = {
  user_account: ["skills_offered", "skills_wanted"],
};

const BOOLEAN_COLUMNS: Record<string, string[]> = {
  user_account: ["is_public"],
};

/** Columns updateUser may write. Anything else in the update is ignored. */
const USER_UPDATABLE_COLUMNS = new Set([
  "email",
  "password_hash",
  "name",
  "location",
  "availability",
  "skills_offered",
  "skills_wanted",
  "is_public",
  "profile_photo",
  "updated_at",
]);

function parseRow(table: string, row: DbRow): DbRow {
  const out = { ...row };
  for (const col of JSON_COLUMNS[table] ?? []) {
    const v = out[col];
    if (typeof v === "string") {
      try {
        out[col] = JSON.parse(v);
      } catch {
        // keep as string if invalid JSON; schema parsing reports it
      }
    }
  }
  for (const col of BOOLEAN_COLUMNS[table] ?? []) {
    const v = out[col];
    if (typeof v === "number") out[col] = v !== 0;
  }
  return out;
}

function stringifyRow(table: string, row: DbRow): DbRow {
  const out = { ...row };
  for (const col of JSON_COLUMNS[table] ?? []) {
    const v = out[col];
    if (v !== undefined && v !== null && typeof v === "object") {
      out[col] = JSON.stringify(v);
    }
  }
  for (const col of BOOLEAN_COLUMNS[table] ?? []) {
    const v = out[col];
    if (typeof v === "boolean") out[col] = v ? 1 : 0;
  }
  return out;
}

/** Escape LIKE wildcards so user search text matches literally. */
function likePattern(text: string): string {
  return `%${text.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export function createSqliteAdapter(dbPath: string | ":memory:"): DbAdapter {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
  runMigrations(db);

  const ops: Omit<DbAdapter, "transaction"> = {
    async ping() {
      return db.prepare<[], { ok: number }>("SELECT 1 AS ok").get()?.ok === 1;
    },

    // --- Users ---
    async getUserById(userId: string) {
      const row = db.prepare<[string], DbRow>("SELECT * FROM user_account WHERE id = ?").get(userId);
      return row ? parseRow("user_account", row) : null;
    },
    async getUserByEmail(email: string) {
      const row = db
        .prepare<[string], DbRow>("SELECT * FROM user_account WHERE email = ?")
        .get(email.trim().toLowerCase());
      return row ? parseRow("user_account", row) : null;
    },
    async listViewableUsers(viewerId: string, filters?: UserListFilters) {
      const where: string[] = ["(u.is_public = 1 OR u.id = ?)"];
      const vals: string[] = [viewerId];
      if (filters?.skill) {
        where.push(
          `(EXISTS (SELECT 1 FROM json_each(u.skills_offered) WHERE lower(value) = lower(?))
            OR EXISTS (SELECT 1 FROM json_each(u.skills_wanted) WHERE lower(value) = lower(?)))`
        );
        vals.push(filters.skill, filters.skill);
      }
      if (filters?.search) {
        where.push("lower(u.name) LIKE ? ESCAPE '\\'");
        vals.push(likePattern(filters.search));
      }
      const rows = db
        .prepare<string[], DbRow>(
          `SELECT u.* FROM user_account u WHERE ${where.join(" AND ")} ORDER BY u.created_at ASC, u.rowid ASC`
        )
        .all(...vals);
      return rows.map((r) => parseRow("user_account", r));
    },
    async getUsersByIds(userIds: string[]) {
      if (userIds.length === 0) return [];
      const placeholders = userIds.map(() => "?").join(", ");
      const rows = db
        .prepare<string[], DbRow>(`SELECT * FROM user_account WHERE id IN (${placeholders})`)
        .all(...userIds);
      return rows.map((r) => parseRow("user_account", r));
    },
    async insertUser(row: DbRow) {
      const r = stringifyRow("user_account", row);
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO user_account (id, email, password_hash, name, location, availability, skills_offered, skills_wanted, is_public, profile_photo, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        r.id,
        r.email,
        r.password_hash,
        r.name,
        r.location ?? null,
        r.availability ?? null,
        r.skills_offered ?? "[]",
        r.skills_wanted ?? "[]",
        r.is_public ?? 1,
        r.profile_photo ?? null,
        r.created_at ?? now,
        r.updated_at ?? now
      );
    },
    async updateUser(userId: string, updates: DbRow) {
      const r = stringifyRow("user_account", updates);
      const set: string[] = [];
      const vals: unknown[] = [];
      for (const [k, v] of Object.entries(r)) {
        if (USER_UPDATABLE_COLUMNS.has(k) && v !== undefined) {
          set.push(`${k} = ?`);
          vals.push(v);
        }
      }
      if (set.length === 0) return;
      vals.push(userId);
      db.prepare(`UPDATE user_account SET ${set.join(", ")} WHERE id = ?`).run(...vals);
    },

    // --- Swap requests ---
    async getSwapRequest(requestId: string) {
      const row = db.prepare<[string], DbRow>("SELECT * FROM swap_request WHERE id = ?").get(requestId);
      return row ? parseRow("swap_request", row) : null;
    },
    async listSwapRequestsByRequester(userId: string, status?: SwapStatus) {
      const rows = status
        ? db
            .prepare<[string, string], DbRow>(
              "SELECT * FROM swap_request WHERE requester_id = ? AND status = ? ORDER BY created_at DESC, rowid DESC"
            )
            .all(userId, status)
        : db
            .prepare<[string], DbRow>(
              "SELECT * FROM swap_request WHERE requester_id = ? ORDER BY created_at DESC, rowid DESC"
            )
            .all(userId);
      return rows.map((r) => parseRow("swap_request", r));
    },
    async listSwapRequestsByRecipient(userId: string, status?: SwapStatus) {
      const rows = status
        ? db
            .prepare<[string, string], DbRow>(
              "SELECT * FROM swap_request WHERE recipient_id = ? AND status = ? ORDER BY created_at DESC, rowid DESC"
            )
            .all(userId, status)
        : db
            .prepare<[string], DbRow>(
              "SELECT * FROM swap_request WHERE recipient_id = ? ORDER BY created_at DESC, rowid DESC"
            )
            .all(userId);
      return rows.map((r) => parseRow("swap_request", r));
    },
    async findSwapRequestsBetween(
      requesterId: string,
      recipientId: string,
      offeredSkill: string,
      wantedSkill: string
    ) {
      const rows = db
        .prepare<[string, string, string, string], DbRow>(
          `SELECT * FROM swap_request
           WHERE requester_id = ? AND recipient_id = ?
             AND lower(offered_skill) = lower(?) AND lower(wanted_skill) = lower(?)
           ORDER BY created_at DESC, rowid DESC`
        )
        .all(requesterId, recipientId, offeredSkill, wantedSkill);
      return rows.map((r) => parseRow("swap_request", r));
    },
    async insertSwapRequest(row: DbRow) {
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO swap_request (id, requester_id, recipient_id, offered_skill, wanted_skill, message, acceptance_message, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        row.id,
        row.requester_id,
        row.recipient_id,
        row.offered_skill,
        row.wanted_skill,
        row.message ?? null,
        row.acceptance_message ?? null,
        row.status ?? "pending",
        row.created_at ?? now,
        row.updated_at ?? now
      );
    },
    async updateSwapRequestStatus(
      requestId: string,
      expectedStatus: SwapStatus,
      nextStatus: SwapStatus,
      updatedAt: string,
      acceptanceMessage: string | null
    ) {
      const r = db
        .prepare(
          `UPDATE swap_request SET status = ?, acceptance_message = ?, updated_at = ?
           WHERE id = ? AND status = ?`
        )
        .run(nextStatus, acceptanceMessage, updatedAt, requestId, expectedStatus);
      return r.changes > 0;
    },
    async deleteSwapRequest(requestId: string) {
      const r = db.prepare("DELETE FROM swap_request WHERE id = ?").run(requestId);
      return r.changes > 0;
    },
  };

  // Nested transaction() calls join the outer one.
  const txAdapter: DbAdapter = {
    ...ops,
    transaction<T>(fn: TransactionFn<T>): Promise<T> {
      return fn(txAdapter);
    },
  };

  // A single connection: transactions are queued so two requests never interleave
  // statements inside one BEGIN ... COMMIT across awaits.
  let queue: Promise<unknown> = Promise.resolve();

  const adapter: DbAdapter = {
    ...ops,
    transaction<T>(fn: TransactionFn<T>): Promise<T> {
      const run = async (): Promise<T> => {
        db.exec("BEGIN IMMEDIATE");
        try {
          const result = await fn(txAdapter);
          db.exec("COMMIT");
          return result;
        } catch (e) {
          db.exec("ROLLBACK");
          throw e;
        }
      };
      const result = queue.then(run, run);
      // The caller receives the rejection; the queue only needs to settle.
      queue = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },
  };

  return adapter;
}
