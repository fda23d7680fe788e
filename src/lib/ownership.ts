import type { Account } from "@/types/user";
import type { Persistence } from "./persistence";

/**
 * Usernames whose folders and notes `account` may read: the child itself, or a
 * parent's direct children. Read from the store on every call.
 */
export async function visibleOwners(
  db: Persistence,
  account: Account
): Promise<string[]> {
  switch (account.kind) {
    case "child":
      return [account.username];
    case "parent":
      return db.users.listChildUsernames(account.username);
  }
}

export async function canView(
  db: Persistence,
  account: Account,
  ownerUsername: string
): Promise<boolean> {
  switch (account.kind) {
    case "child":
      return account.username === ownerUsername;
    case "parent": {
      const owner = await db.users.findByUsername(ownerUsername);
      return owner?.parentUsername === account.username;
    }
  }
}

export function canModify(account: Account, ownerUsername: string): boolean {
  return account.kind === "child" && account.username === ownerUsername;
}
