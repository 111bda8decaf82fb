import crypto from "node:crypto";
import type {
  PasswordResetRequest,
  Role,
  User,
  UserCreateRequest,
} from "@shared/api";
import { formatLocalTimestamp } from "@shared/interest";
import bcrypt from "bcryptjs";
import type { RowDataPacket } from "mysql2/promise";
import { getInitializedPool } from "../lib/mysql";
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../utils/http-error";

const BCRYPT_ROUNDS = 10;
const RESET_TOKEN_TTL_MS = 60 * 60 * 1000;

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  name: string;
  email: string;
  role: Role;
  active: number | boolean;
}

interface UserWithPasswordRow extends UserRow {
  password_hash: string;
}

interface ResetRow extends RowDataPacket {
  user_id: string;
  expires_at: string | Date;
}

const USER_COLUMNS = `id, username, name, email, role, active`;

function asBoolean(value: number | boolean) {
  return typeof value === "number" ? value === 1 : Boolean(value);
}

function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    name: row.name,
    email: row.email,
    role: row.role,
    active: asBoolean(row.active),
  };
}

function isDuplicateKey(error: unknown) {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  const { code } = error;
  return code === "ER_DUP_ENTRY" || code === "SQLITE_CONSTRAINT_UNIQUE";
}

export async function authenticate(username: string, password: string) {
  const db = await getInitializedPool();
  const rows = await db.select<UserWithPasswordRow>(
    `SELECT ${USER_COLUMNS}, password_hash FROM users WHERE username = ? LIMIT 1`,
    [username],
  );
  const row = rows[0];
  if (!row || !asBoolean(row.active)) return null;
  const valid = await bcrypt.compare(password, row.password_hash);
  if (!valid) return null;

  const token = crypto.randomUUID();
  await db.execute(`INSERT INTO sessions (token, user_id, created_at) VALUES (?, ?, ?)`, [
    token,
    row.id,
    formatLocalTimestamp(new Date()),
  ]);
  return { token, user: mapUser(row) };
}

export async function getUserByTokenAsync(
  token?: string | null,
): Promise<User | null> {
  if (!token) return null;
  const db = await getInitializedPool();
  const rows = await db.select<UserRow>(
    `SELECT u.id, u.username, u.name, u.email, u.role, u.active
     FROM sessions s
     INNER JOIN users u ON u.id = s.user_id
     WHERE s.token = ?
     LIMIT 1`,
    [token],
  );
  const row = rows[0];
  if (!row) return null;
  const user = mapUser(row);
  return user.active ? user : null;
}

export async function invalidateTokenAsync(token: string) {
  if (!token) return;
  const db = await getInitializedPool();
  await db.execute(`DELETE FROM sessions WHERE token = ?`, [token]);
}

/** Re-checks the caller's own password before a destructive action. */
export async function verifyPassword(userId: string, password: string): Promise<boolean> {
  if (!password) return false;
  const db = await getInitializedPool();
  const rows = await db.select<UserWithPasswordRow>(
    `SELECT ${USER_COLUMNS}, password_hash FROM users WHERE id = ? LIMIT 1`,
    [userId],
  );
  const row = rows[0];
  if (!row) return false;
  return bcrypt.compare(password, row.password_hash);
}

export async function listUsers(): Promise<User[]> {
  const db = await getInitializedPool();
  const rows = await db.select<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at DESC, username ASC`,
  );
  return rows.map(mapUser);
}

export async function createUser(input: UserCreateRequest): Promise<User> {
  const username = input.username.trim();
  const name = input.name.trim();
  if (!username || !name || !input.password) {
    throw new ValidationError("Name, username and password are required");
  }

  const db = await getInitializedPool();
  const user: User = {
    id: crypto.randomUUID(),
    username,
    name,
    email: input.email?.trim() ?? "",
    role: input.role ?? "staff",
    active: true,
  };
  const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
  try {
    await db.execute(
      `INSERT INTO users (id, username, name, email, role, active, password_hash, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        user.id,
        user.username,
        user.name,
        user.email,
        user.role,
        1,
        passwordHash,
        formatLocalTimestamp(new Date()),
      ],
    );
  } catch (error) {
    if (isDuplicateKey(error)) {
      throw new ConflictError("Username already exists", "DUPLICATE_USERNAME");
    }
    // eslint-disable-next-line no-console
    console.error("[db] createUser failed", error);
    throw error;
  }
  return user;
}

export async function deleteUser(id: string, actingUserId: string): Promise<void> {
  if (id === actingUserId) {
    throw new ForbiddenError("You cannot delete your own account", "SELF_DELETE");
  }
  const db = await getInitializedPool();
  const header = await db.execute(`DELETE FROM users WHERE id = ?`, [id]);
  if (header.affectedRows === 0) throw new NotFoundError("User not found");
}

export interface ResetGrant {
  user: User;
  token: string;
  expiresAt: string;
}

/** One single-use reset token per active user, valid for an hour. */
export async function createPasswordResets(now = new Date()): Promise<ResetGrant[]> {
  const db = await getInitializedPool();
  const rows = await db.select<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users WHERE active = 1 ORDER BY username ASC`,
  );
  const createdAt = formatLocalTimestamp(now);
  const expiresAt = formatLocalTimestamp(new Date(now.getTime() + RESET_TOKEN_TTL_MS));

  const grants: ResetGrant[] = [];
  for (const row of rows) {
    const token = crypto.randomBytes(24).toString("hex");
    await db.execute(
      `INSERT INTO password_resets (token, user_id, expires_at, created_at) VALUES (?, ?, ?, ?)`,
      [token, row.id, expiresAt, createdAt],
    );
    grants.push({ user: mapUser(row), token, expiresAt });
  }
  return grants;
}

export async function resetPassword(
  input: PasswordResetRequest,
  now = new Date(),
): Promise<void> {
  const username = input.username.trim();
  if (!input.token || !username || !input.password || input.password !== input.password2) {
    throw new ValidationError("Invalid data or passwords do not match");
  }

  const db = await getInitializedPool();
  const rows = await db.select<ResetRow>(
    `SELECT r.user_id, r.expires_at
     FROM password_resets r
     INNER JOIN users u ON u.id = r.user_id
     WHERE r.token = ? AND u.username = ?
     LIMIT 1`,
    [input.token, username],
  );
  const reset = rows[0];
  if (!reset) throw new ValidationError("Invalid reset token", "INVALID_TOKEN");

  const expiresAt =
    typeof reset.expires_at === "string"
      ? reset.expires_at
      : formatLocalTimestamp(reset.expires_at);
  if (expiresAt < formatLocalTimestamp(now)) {
    await db.execute(`DELETE FROM password_resets WHERE token = ?`, [input.token]);
    throw new ValidationError("Reset token expired", "TOKEN_EXPIRED");
  }

  const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
  await db.execute(`UPDATE users SET password_hash = ? WHERE id = ?`, [
    passwordHash,
    reset.user_id,
  ]);
  await db.execute(`DELETE FROM password_resets WHERE user_id = ?`, [reset.user_id]);
  await db.execute(`DELETE FROM sessions WHERE user_id = ?`, [reset.user_id]);
}
