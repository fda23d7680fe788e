import type { Client, Row } from "@libsql/client";
import { nanoid } from "nanoid";
import type { CheckboxItem, Note, NoteInput } from "@/types/note";
import type { ChildAccount } from "@/types/user";
import { checkboxItemsSchema, tagsSchema } from "./schemas";
import { readJson, readOptionalString, readString } from "./rows";

const NOTE_COLUMNS = `
  id, title, content, tags, checkbox_items, folder_id, owner_username
`;

export class NoteRepository {
  constructor(private client: Client) {}

  private rowToNote(row: Row): Note {
    const tags = tagsSchema.safeParse(readJson(row, "tags", []));
    const checkboxItems = checkboxItemsSchema.safeParse(
      readJson(row, "checkbox_items", [])
    );
    return {
      id: readString(row, "id"),
      title: readString(row, "title"),
      content: readOptionalString(row, "content") ?? "",
      tags: tags.success ? tags.data : [],
      checkboxItems: checkboxItems.success ? checkboxItems.data : [],
      folderId: readOptionalString(row, "folder_id"),
      ownerUsername: readString(row, "owner_username"),
    };
  }

  private serializeItems(items: CheckboxItem[]): string {
    return JSON.stringify(
      items.map((item) => ({ text: item.text, checked: item.checked }))
    );
  }

  async createNote(owner: ChildAccount, input: NoteInput): Promise<Note> {
    const id = nanoid();
    const now = Date.now();
    await this.client.execute({
      sql: `
        INSERT INTO notes
        (id, title, content, tags, checkbox_items, folder_id, owner_username, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      args: [
        id,
        input.title,
        input.content,
        JSON.stringify(input.tags),
        this.serializeItems(input.checkboxItems),
        input.folderId,
        owner.username,
        now,
        now,
      ],
    });
    return { id, ownerUsername: owner.username, ...input };
  }

  async getNote(noteId: string): Promise<Note | null> {
    const result = await this.client.execute({
      sql: `SELECT ${NOTE_COLUMNS} FROM notes WHERE id = ? LIMIT 1`,
      args: [noteId],
    });
    const row = result.rows[0];
    return row ? this.rowToNote(row) : null;
  }

  async listByOwners(ownerUsernames: string[]): Promise<Note[]> {
    if (ownerUsernames.length === 0) return [];
    const placeholders = ownerUsernames.map(() => "?").join(", ");
    const result = await this.client.execute({
      sql: `
        SELECT ${NOTE_COLUMNS}
        FROM notes
        WHERE owner_username IN (${placeholders})
        ORDER BY created_at ASC, rowid ASC
      `,
      args: ownerUsernames,
    });
    return result.rows.map((row) => this.rowToNote(row));
  }

  /**
   * Overwrites every mutable field of a note owned by `owner`.
   * Returns the stored note, or null when no such note belongs to the owner.
   */
  async replaceNote(
    owner: ChildAccount,
    noteId: string,
    input: NoteInput
  ): Promise<Note | null> {
    const result = await this.client.execute({
      sql: `
        UPDATE notes
        SET title = ?, content = ?, tags = ?, checkbox_items = ?, folder_id = ?, updated_at = ?
        WHERE id = ? AND owner_username = ?
      `,
      args: [
        input.title,
        input.content,
        JSON.stringify(input.tags),
        this.serializeItems(input.checkboxItems),
        input.folderId,
        Date.now(),
        noteId,
        owner.username,
      ],
    });
    if (result.rowsAffected === 0) return null;
    return this.getNote(noteId);
  }

  async deleteNote(owner: ChildAccount, noteId: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: `DELETE FROM notes WHERE id = ? AND owner_username = ?`,
      args: [noteId, owner.username],
    });
    return result.rowsAffected > 0;
  }
}
