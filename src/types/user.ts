export type UserRole = "child" | "parent";

export interface User {
  username: string;
  passwordHash: string;
  role: UserRole;
  parentUsername: string | null;
  createdAt: number;
}

export interface ChildAccount {
  kind: "child";
  username: string;
  parentUsername: string | null;
}

export interface ParentAccount {
  kind: "parent";
  username: string;
}

/**
 * Authorization view of a user. Operations that write folders or notes accept
 * only `ChildAccount`, so a parent has to be narrowed away before reaching them.
 */
export type Account = ChildAccount | ParentAccount;

export function isUserRole(value: unknown): value is UserRole {
  return value === "child" || value === "parent";
}

export function toAccount(user: User): Account {
  if (user.role === "child") {
    return {
      kind: "child",
      username: user.username,
      parentUsername: user.parentUsername,
    };
  }
  return { kind: "parent", username: user.username };
}
