import { createClient, type Client } from "@libsql/client";

const SCHEMA_SQL = `
  -- Users table
  CREATE TABLE IF NOT EXISTS users (
    username TEXT NOT NULL,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('child', 'parent')),
    parent_username TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username ON users(username);
  CREATE INDEX IF NOT EXISTS idx_users_parent_username ON users(parent_username);

  -- Folders table
  CREATE TABLE IF NOT EXISTS folders (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    owner_username TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_folders_owner_username ON folders(owner_username);

  -- Notes table
  CREATE TABLE IF NOT EXISTS notes (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    content TEXT NOT NULL DEFAULT '',
    tags TEXT NOT NULL DEFAULT '[]',
    checkbox_items TEXT NOT NULL DEFAULT '[]',
    folder_id TEXT,
    owner_username TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_notes_owner_username ON notes(owner_username);
`;

export interface DatabaseOptions {
  url: string;
  authToken?: string;
}

export function createDatabaseClient(options: DatabaseOptions): Client {
  return createClient({
    url: options.url,
    authToken: options.authToken,
  });
}

/** Creates tables and indexes. Safe to run on every start. */
export async function initializeSchema(client: Client): Promise<void> {
  const statements = SCHEMA_SQL.split(";").filter((s) => s.trim());
  for (const stmt of statements) {
    await client.execute(stmt);
  }
}
