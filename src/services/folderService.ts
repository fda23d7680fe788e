import { ForbiddenError } from "@/lib/errors";
import { visibleOwners } from "@/lib/ownership";
import type { Persistence } from "@/lib/persistence";
import type { Folder, FolderInput } from "@/types/folder";
import type { Account } from "@/types/user";

export async function createFolder(
  db: Persistence,
  account: Account,
  input: FolderInput
): Promise<Folder> {
  if (account.kind !== "child") {
    throw new ForbiddenError("Only children can create folders");
  }
  return db.folders.createFolder(account, input);
}

export async function listFolders(
  db: Persistence,
  account: Account
): Promise<Folder[]> {
  return db.folders.listByOwners(await visibleOwners(db, account));
}
