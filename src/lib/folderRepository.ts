import type { Client, Row } from "@libsql/client";
import { nanoid } from "nanoid";
import type { Folder, FolderInput } from "@/types/folder";
import type { ChildAccount } from "@/types/user";
import { readString } from "./rows";

export class FolderRepository {
  constructor(private client: Client) {}

  private rowToFolder(row: Row): Folder {
    return {
      id: readString(row, "id"),
      name: readString(row, "name"),
      ownerUsername: readString(row, "owner_username"),
    };
  }

  async createFolder(owner: ChildAccount, input: FolderInput): Promise<Folder> {
    const id = nanoid();
    await this.client.execute({
      sql: `
        INSERT INTO folders (id, name, owner_username, created_at)
        VALUES (?, ?, ?, ?)
      `,
      args: [id, input.name, owner.username, Date.now()],
    });
    return { id, name: input.name, ownerUsername: owner.username };
  }

  async listByOwners(ownerUsernames: string[]): Promise<Folder[]> {
    if (ownerUsernames.length === 0) return [];
    const placeholders = ownerUsernames.map(() => "?").join(", ");
    const result = await this.client.execute({
      sql: `
        SELECT id, name, owner_username
        FROM folders
        WHERE owner_username IN (${placeholders})
        ORDER BY created_at ASC, rowid ASC
      `,
      args: ownerUsernames,
    });
    return result.rows.map((row) => this.rowToFolder(row));
  }
}
