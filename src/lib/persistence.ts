import type { Client } from "@libsql/client";
import { FolderRepository } from "./folderRepository";
import { NoteRepository } from "./noteRepository";
import { UserRepository } from "./userRepository";

/**
 * The three collections every operation works against. Built once per
 * database client and handed to services explicitly.
 */
export interface Persistence {
  users: UserRepository;
  folders: FolderRepository;
  notes: NoteRepository;
}

export function createPersistence(client: Client): Persistence {
  return {
    users: new UserRepository(client),
    folders: new FolderRepository(client),
    notes: new NoteRepository(client),
  };
}
