/**
 * SQLite implementation of DbAdapter.
 * Uses better-sqlite3. Booleans are stored as 0/1, locations as a
 * longitude/latitude column pair; both are mapped on read.
 */

import Database from "better-sqlite3";
import type {
  ActivityLogListOptions,
  DbAdapter,
  TransactionFn,
  NewActivityLog,
  NewProfile,
  NewUser,
  ProfileListOptions,
  ProfileUpdate,
  UserListOptions,
  UserUpdate,
} from "./adapter";
import { UniqueConstraintError } from "./adapter";
import type {
  ActivityLog,
  GeoPoint,
  Group,
  ProfileRecord,
  Session,
  User,
} from "@/lib/schemas";
import { activityActionSchema } from "@/lib/schemas";
import { runMigrations } from "./migrate";

interface UserRow {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  is_active: number;
  is_staff: number;
  is_superuser: number;
  date_joined: string;
  last_login: string | null;
}

interface ProfileRow {
  id: string;
  user_id: string;
  home_address: string | null;
  phone_number: string | null;
  longitude: number | null;
  latitude: number | null;
  created_at: string;
  updated_at: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
}

interface ActivityLogRow {
  id: string;
  user_id: string | null;
  username: string;
  action: string;
  ip_address: string | null;
  user_agent: string;
  session_key: string | null;
  timestamp: string;
}

const USER_UPDATE_COLUMNS = [
  "email",
  "first_name",
  "last_name",
  "password_hash",
  "is_active",
  "is_staff",
  "is_superuser",
  "last_login",
] as const;

const PROFILE_SELECT = `
  SELECT p.*, u.username, u.email, u.first_name, u.last_name
  FROM user_profile p
  INNER JOIN auth_user u ON u.id = p.user_id`;

function toUser(row: UserRow): User {
  return {
    ...row,
    is_active: row.is_active === 1,
    is_staff: row.is_staff === 1,
    is_superuser: row.is_superuser === 1,
  };
}

function toPoint(longitude: number | null, latitude: number | null): GeoPoint | null {
  if (longitude === null || latitude === null) return null;
  return { type: "Point", coordinates: [longitude, latitude] };
}

function toProfile(row: ProfileRow): ProfileRecord {
  const { longitude, latitude, ...rest } = row;
  return { ...rest, location: toPoint(longitude, latitude) };
}

function toActivityLog(row: ActivityLogRow): ActivityLog {
  return { ...row, action: activityActionSchema.parse(row.action) };
}

function bit(value: boolean | undefined, fallback: boolean): number {
  return (value ?? fallback) ? 1 : 0;
}

/** Case folding for search; SQLite's own LIKE and lower() only fold ASCII. */
function foldCase(value: string): string {
  return value.normalize("NFC").toLowerCase();
}

/** Runs a write, turning SQLite UNIQUE failures into UniqueConstraintError. */
function runUnique(run: () => void): void {
  try {
    run();
  } catch (err) {
    if (err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
      throw new UniqueConstraintError(err.message.replace(/^UNIQUE constraint failed:\s*/, ""), {
        cause: err,
      });
    }
    throw err;
  }
}

function now(): string {
  return new Date().toISOString();
}

export function createSqliteAdapter(dbPath: string | ":memory:"): DbAdapter {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  db.function("fold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? foldCase(value) : null
  );
  runMigrations(db);

  let savepointDepth = 0;

  const getProfileWhere = (where: string, value: string): ProfileRecord | null => {
    const row = db
      .prepare<[string], ProfileRow>(`${PROFILE_SELECT} WHERE ${where} = ?`)
      .get(value);
    return row ? toProfile(row) : null;
  };

  // One connection: top-level transactions run one at a time, and only the
  // adapter handed to a transaction body opens savepoints.
  let pending: Promise<void> = Promise.resolve();

  const savepoint = async <T>(fn: TransactionFn<T>): Promise<T> => {
    const name = `sp_${++savepointDepth}`;
    db.exec(`SAVEPOINT ${name}`);
    try {
      const result = await fn(txAdapter);
      db.exec(`RELEASE ${name}`);
      return result;
    } catch (e) {
      db.exec(`ROLLBACK TO ${name}`);
      db.exec(`RELEASE ${name}`);
      throw e;
    } finally {
      savepointDepth--;
    }
  };

  const topLevel = <T>(fn: TransactionFn<T>): Promise<T> => {
    const run = pending.then(async () => {
      db.exec("BEGIN");
      try {
        const result = await fn(txAdapter);
        db.exec("COMMIT");
        return result;
      } catch (e) {
        db.exec("ROLLBACK");
        throw e;
      }
    });
    // The queue only waits for settlement; the outcome reaches the caller through run.
    pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  const adapter: DbAdapter = {
    transaction: topLevel,

    // --- Users ---
    async getUser(userId: string) {
      const row = db.prepare<[string], UserRow>("SELECT * FROM auth_user WHERE id = ?").get(userId);
      return row ? toUser(row) : null;
    },
    async getUserByUsername(username: string) {
      const row = db
        .prepare<[string], UserRow>("SELECT * FROM auth_user WHERE username = ?")
        .get(username);
      return row ? toUser(row) : null;
    },
    async listUsers(options: UserListOptions = {}) {
      const where: string[] = [];
      const vals: unknown[] = [];
      if (options.userId !== undefined) {
        where.push("id = ?");
        vals.push(options.userId);
      }
      if (options.is_staff !== undefined) {
        where.push("is_staff = ?");
        vals.push(options.is_staff ? 1 : 0);
      }
      if (options.is_superuser !== undefined) {
        where.push("is_superuser = ?");
        vals.push(options.is_superuser ? 1 : 0);
      }
      if (options.notInGroupId !== undefined) {
        where.push("id NOT IN (SELECT user_id FROM auth_user_group WHERE group_id = ?)");
        vals.push(options.notInGroupId);
      }
      const clause = where.length ? ` WHERE ${where.join(" AND ")}` : "";
      const rows = db
        .prepare<unknown[], UserRow>(`SELECT * FROM auth_user${clause} ORDER BY username ASC`)
        .all(...vals);
      return rows.map(toUser);
    },
    async countUsers() {
      const row = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM auth_user").get();
      return row?.n ?? 0;
    },
    async insertUser(row: NewUser) {
      const id = row.id ?? crypto.randomUUID();
      const insert = db.prepare(
        `INSERT INTO auth_user (id, username, email, first_name, last_name, password_hash, is_active, is_staff, is_superuser, date_joined)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      );
      runUnique(() =>
        insert.run(
          id,
          row.username,
          row.email ?? "",
          row.first_name ?? "",
          row.last_name ?? "",
          row.password_hash ?? "",
          bit(row.is_active, true),
          bit(row.is_staff, false),
          bit(row.is_superuser, false),
          row.date_joined ?? now()
        )
      );
      const created = await adapter.getUser(id);
      if (!created) throw new Error(`User ${id} missing after insert`);
      return created;
    },
    async updateUser(userId: string, updates: UserUpdate) {
      const set: string[] = [];
      const vals: unknown[] = [];
      for (const col of USER_UPDATE_COLUMNS) {
        const v = updates[col];
        if (v === undefined) continue;
        set.push(`${col} = ?`);
        vals.push(typeof v === "boolean" ? (v ? 1 : 0) : v);
      }
      if (set.length === 0) return;
      vals.push(userId);
      db.prepare(`UPDATE auth_user SET ${set.join(", ")} WHERE id = ?`).run(...vals);
    },
    async deleteUser(userId: string) {
      db.prepare("DELETE FROM auth_user WHERE id = ?").run(userId);
    },

    // --- Profiles ---
    async getProfile(profileId: string) {
      return getProfileWhere("p.id", profileId);
    },
    async getProfileByUserId(userId: string) {
      return getProfileWhere("p.user_id", userId);
    },
    async listProfiles(options: ProfileListOptions = {}) {
      const where: string[] = [];
      const vals: unknown[] = [];
      if (options.userId !== undefined) {
        where.push("p.user_id = ?");
        vals.push(options.userId);
      }
      if (options.search?.trim()) {
        const term = foldCase(options.search.trim());
        where.push(
          `(instr(fold(u.username), ?) > 0 OR instr(fold(u.email), ?) > 0
            OR instr(fold(p.phone_number), ?) > 0 OR instr(fold(p.home_address), ?) > 0)`
        );
        vals.push(term, term, term, term);
      }
      if (options.withLocation) {
        where.push("p.longitude IS NOT NULL AND p.latitude IS NOT NULL");
      }
      if (options.createdSince !== undefined) {
        where.push("p.created_at >= ?");
        vals.push(options.createdSince);
      }
      if (options.updatedSince !== undefined) {
        where.push("p.updated_at >= ?");
        vals.push(options.updatedSince);
      }
      const clause = where.length ? ` WHERE ${where.join(" AND ")}` : "";
      const rows = db
        .prepare<unknown[], ProfileRow>(`${PROFILE_SELECT}${clause} ORDER BY u.username ASC`)
        .all(...vals);
      return rows.map(toProfile);
    },
    async insertProfile(row: NewProfile) {
      const id = row.id ?? crypto.randomUUID();
      const ts = now();
      const [longitude, latitude] = row.location?.coordinates ?? [null, null];
      const insert = db.prepare(
        `INSERT INTO user_profile (id, user_id, home_address, phone_number, longitude, latitude, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      );
      runUnique(() =>
        insert.run(id, row.user_id, row.home_address ?? null, row.phone_number ?? null, longitude, latitude, ts, ts)
      );
      const created = await adapter.getProfile(id);
      if (!created) throw new Error(`Profile ${id} missing after insert`);
      return created;
    },
    async updateProfile(profileId: string, updates: ProfileUpdate) {
      const set: string[] = ["updated_at = ?"];
      const vals: unknown[] = [now()];
      if (updates.home_address !== undefined) {
        set.push("home_address = ?");
        vals.push(updates.home_address);
      }
      if (updates.phone_number !== undefined) {
        set.push("phone_number = ?");
        vals.push(updates.phone_number);
      }
      if (updates.location !== undefined) {
        const [longitude, latitude] = updates.location?.coordinates ?? [null, null];
        set.push("longitude = ?", "latitude = ?");
        vals.push(longitude, latitude);
      }
      vals.push(profileId);
      db.prepare(`UPDATE user_profile SET ${set.join(", ")} WHERE id = ?`).run(...vals);
    },
    async deleteProfile(profileId: string) {
      db.prepare("DELETE FROM user_profile WHERE id = ?").run(profileId);
    },

    // --- Activity log ---
    async insertActivityLog(row: NewActivityLog) {
      const log: ActivityLog = {
        id: crypto.randomUUID(),
        user_id: row.user_id,
        username: row.username,
        action: row.action,
        ip_address: row.ip_address,
        user_agent: row.user_agent,
        session_key: row.session_key,
        timestamp: row.timestamp ?? now(),
      };
      db.prepare(
        `INSERT INTO user_activity_log (id, user_id, username, action, ip_address, user_agent, session_key, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        log.id,
        log.user_id,
        log.username,
        log.action,
        log.ip_address,
        log.user_agent,
        log.session_key,
        log.timestamp
      );
      return log;
    },
    async listActivityLogs(options: ActivityLogListOptions = {}) {
      const where: string[] = [];
      const vals: unknown[] = [];
      if (options.action !== undefined) {
        where.push("action = ?");
        vals.push(options.action);
      }
      if (options.username !== undefined) {
        where.push("username = ?");
        vals.push(options.username);
      }
      const clause = where.length ? ` WHERE ${where.join(" AND ")}` : "";
      vals.push(options.limit ?? 100);
      const rows = db
        .prepare<unknown[], ActivityLogRow>(
          `SELECT * FROM user_activity_log${clause} ORDER BY timestamp DESC, rowid DESC LIMIT ?`
        )
        .all(...vals);
      return rows.map(toActivityLog);
    },

    // --- Groups & permissions ---
    async getGroupByName(name: string) {
      const row = db.prepare<[string], Group>("SELECT id, name FROM auth_group WHERE name = ?").get(name);
      return row ?? null;
    },
    async insertGroup(name: string) {
      const group: Group = { id: crypto.randomUUID(), name };
      db.prepare("INSERT INTO auth_group (id, name) VALUES (?, ?)").run(group.id, group.name);
      return group;
    },
    async getGroupPermissions(groupId: string) {
      const rows = db
        .prepare<[string], { codename: string }>(
          "SELECT codename FROM auth_group_permission WHERE group_id = ? ORDER BY codename ASC"
        )
        .all(groupId);
      return rows.map((r) => r.codename);
    },
    async setGroupPermissions(groupId: string, codenames: string[]) {
      const remove = db.prepare("DELETE FROM auth_group_permission WHERE group_id = ?");
      const insert = db.prepare("INSERT OR IGNORE INTO auth_group_permission (group_id, codename) VALUES (?, ?)");
      // Synchronous, so it nests inside an open transaction as a savepoint.
      db.transaction(() => {
        remove.run(groupId);
        for (const codename of codenames) insert.run(groupId, codename);
      })();
    },
    async addUserToGroup(userId: string, groupId: string) {
      db.prepare("INSERT OR IGNORE INTO auth_user_group (user_id, group_id) VALUES (?, ?)").run(userId, groupId);
    },
    async getUserPermissions(userId: string) {
      const rows = db
        .prepare<[string], { codename: string }>(
          `SELECT DISTINCT gp.codename FROM auth_group_permission gp
           INNER JOIN auth_user_group ug ON ug.group_id = gp.group_id
           WHERE ug.user_id = ? ORDER BY gp.codename ASC`
        )
        .all(userId);
      return rows.map((r) => r.codename);
    },

    // --- Sessions ---
    async insertSession(row: Session) {
      db.prepare(
        "INSERT INTO session (session_key, user_id, created_at, expires_at) VALUES (?, ?, ?, ?)"
      ).run(row.session_key, row.user_id, row.created_at, row.expires_at);
    },
    async getSession(sessionKey: string) {
      const row = db
        .prepare<[string], Session>("SELECT * FROM session WHERE session_key = ?")
        .get(sessionKey);
      return row ?? null;
    },
    async deleteSession(sessionKey: string) {
      db.prepare("DELETE FROM session WHERE session_key = ?").run(sessionKey);
    },
    async deleteExpiredSessions(cutoff: string) {
      return db.prepare("DELETE FROM session WHERE expires_at <= ?").run(cutoff).changes;
    },
  };

  const txAdapter: DbAdapter = { ...adapter, transaction: savepoint };

  return adapter;
}
