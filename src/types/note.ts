export interface CheckboxItem {
  text: string;
  checked: boolean;
}

export interface Note {
  id: string;
  title: string;
  content: string;
  tags: string[];
  checkboxItems: CheckboxItem[];
  folderId: string | null;
  ownerUsername: string;
}

/** Every mutable field of a note. Updates replace all of them at once. */
export type NoteInput = Omit<Note, "id" | "ownerUsername">;
