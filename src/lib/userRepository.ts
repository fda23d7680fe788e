import { LibsqlError, type Client, type Row } from "@libsql/client";
import { isUserRole, type User } from "@/types/user";
import { DuplicateUserError } from "./errors";
import { readNumber, readOptionalString, readString } from "./rows";

export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof LibsqlError)) return false;
  return (
    error.code === "SQLITE_CONSTRAINT_UNIQUE" ||
    error.message.includes("UNIQUE constraint failed")
  );
}

export class UserRepository {
  constructor(private client: Client) {}

  private rowToUser(row: Row): User {
    const role = row.role;
    if (!isUserRole(role)) {
      throw new Error(`Unknown role for user ${String(row.username)}`);
    }
    return {
      username: readString(row, "username"),
      passwordHash: readString(row, "password_hash"),
      role,
      parentUsername: readOptionalString(row, "parent_username"),
      createdAt: readNumber(row, "created_at"),
    };
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.client.execute({
      sql: `
        SELECT username, password_hash, role, parent_username, created_at
        FROM users
        WHERE username = ?
        LIMIT 1
      `,
      args: [normalizeUsername(username)],
    });
    const row = result.rows[0];
    return row ? this.rowToUser(row) : null;
  }

  /**
   * Inserts a user. The unique index on `username` is what rejects a duplicate
   * that slipped past the caller's existence check.
   */
  async insert(user: Omit<User, "createdAt">): Promise<User> {
    const createdAt = Date.now();
    try {
      await this.client.execute({
        sql: `
          INSERT INTO users (username, password_hash, role, parent_username, created_at)
          VALUES (?, ?, ?, ?, ?)
        `,
        args: [
          user.username,
          user.passwordHash,
          user.role,
          user.parentUsername,
          createdAt,
        ],
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateUserError();
      }
      throw error;
    }
    return { ...user, createdAt };
  }

  /** Usernames of the direct children linked to a parent, in signup order. */
  async listChildUsernames(parentUsername: string): Promise<string[]> {
    const result = await this.client.execute({
      sql: `
        SELECT username
        FROM users
        WHERE parent_username = ?
        ORDER BY created_at ASC, rowid ASC
      `,
      args: [parentUsername],
    });
    return result.rows.map((row) => readString(row, "username"));
  }
}
