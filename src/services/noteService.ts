import { ForbiddenError, NotFoundError } from "@/lib/errors";
import { canModify, canView, visibleOwners } from "@/lib/ownership";
import type { Persistence } from "@/lib/persistence";
import type { Note, NoteInput } from "@/types/note";
import type { Account, ChildAccount } from "@/types/user";

async function findNote(db: Persistence, noteId: string): Promise<Note> {
  const note = await db.notes.getNote(noteId);
  if (!note) {
    throw new NotFoundError("Note not found");
  }
  return note;
}

/** Narrows to the owning child, or fails with `message`. */
function requireOwner(
  account: Account,
  note: Note,
  message: string
): ChildAccount {
  if (account.kind !== "child" || !canModify(account, note.ownerUsername)) {
    throw new ForbiddenError(message);
  }
  return account;
}

export async function createNote(
  db: Persistence,
  account: Account,
  input: NoteInput
): Promise<Note> {
  if (account.kind !== "child") {
    throw new ForbiddenError("Only children can create notes");
  }
  return db.notes.createNote(account, input);
}

export async function listNotes(
  db: Persistence,
  account: Account
): Promise<Note[]> {
  return db.notes.listByOwners(await visibleOwners(db, account));
}

export async function getNote(
  db: Persistence,
  account: Account,
  noteId: string
): Promise<Note> {
  const note = await findNote(db, noteId);
  if (!(await canView(db, account, note.ownerUsername))) {
    throw new ForbiddenError("Not allowed");
  }
  return note;
}

export async function updateNote(
  db: Persistence,
  account: Account,
  noteId: string,
  input: NoteInput
): Promise<Note> {
  const note = await findNote(db, noteId);
  const owner = requireOwner(
    account,
    note,
    "Only owning child can modify this note"
  );
  const updated = await db.notes.replaceNote(owner, noteId, input);
  // Removed between the lookup and the write.
  if (!updated) {
    throw new NotFoundError("Note not found");
  }
  return updated;
}

export async function deleteNote(
  db: Persistence,
  account: Account,
  noteId: string
): Promise<void> {
  const note = await findNote(db, noteId);
  const owner = requireOwner(
    account,
    note,
    "Only owning child can delete this note"
  );
  if (!(await db.notes.deleteNote(owner, noteId))) {
    throw new NotFoundError("Note not found");
  }
}
