import { Hono } from "hono";
import { requireAuth, type AccessGuardContext } from "@/middleware/auth";
import { noteSchema } from "@/lib/schemas";
import {
  createNote,
  deleteNote,
  getNote,
  listNotes,
  updateNote,
} from "@/services/noteService";
import type { NoteResponse } from "@/types/api";
import type { AppEnv } from "@/types/app";
import type { Note } from "@/types/note";
import { parseJsonBody } from "@/utils/body";

export function toNoteResponse(note: Note): NoteResponse {
  return {
    id: note.id,
    owner_username: note.ownerUsername,
    title: note.title,
    content: note.content,
    tags: note.tags,
    checkbox_items: note.checkboxItems,
    folder_id: note.folderId,
  };
}

export function createNotesRoute(ctx: AccessGuardContext) {
  const route = new Hono<AppEnv>();
  const auth = requireAuth(ctx);

  route.post("/", auth, async (c) => {
    const input = await parseJsonBody(c, noteSchema);
    const note = await createNote(ctx.db, c.get("account"), input);
    return c.json(toNoteResponse(note), 201);
  });

  route.get("/", auth, async (c) => {
    const notes = await listNotes(ctx.db, c.get("account"));
    return c.json(notes.map(toNoteResponse));
  });

  route.get("/:id", auth, async (c) => {
    const note = await getNote(ctx.db, c.get("account"), c.req.param("id"));
    return c.json(toNoteResponse(note));
  });

  route.put("/:id", auth, async (c) => {
    const input = await parseJsonBody(c, noteSchema);
    const note = await updateNote(
      ctx.db,
      c.get("account"),
      c.req.param("id"),
      input
    );
    return c.json(toNoteResponse(note));
  });

  route.delete("/:id", auth, async (c) => {
    await deleteNote(ctx.db, c.get("account"), c.req.param("id"));
    return c.body(null, 204);
  });

  return route;
}
