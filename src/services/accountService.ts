import {
  InvalidCredentialsError,
  DuplicateUserError,
  InvalidParentError,
} from "@/lib/errors";
import type { PasswordHasher } from "@/lib/password";
import type { Persistence } from "@/lib/persistence";
import { normalizeUsername } from "@/lib/userRepository";
import type { User, UserRole } from "@/types/user";

export interface AccountServiceContext {
  db: Persistence;
  passwords: PasswordHasher;
}

export interface RegisterInput {
  username: string;
  password: string;
  role: UserRole;
  parentUsername?: string | null;
}

async function resolveParentLink(
  ctx: AccountServiceContext,
  parentUsername: string | null | undefined
): Promise<string> {
  const normalized = parentUsername ? normalizeUsername(parentUsername) : "";
  if (!normalized) {
    throw new InvalidParentError("child must include parent_username");
  }
  const parent = await ctx.db.users.findByUsername(normalized);
  if (!parent || parent.role !== "parent") {
    throw new InvalidParentError();
  }
  return parent.username;
}

export async function register(
  ctx: AccountServiceContext,
  input: RegisterInput
): Promise<User> {
  const username = normalizeUsername(input.username);
  if (await ctx.db.users.findByUsername(username)) {
    throw new DuplicateUserError();
  }

  const parentUsername =
    input.role === "child"
      ? await resolveParentLink(ctx, input.parentUsername)
      : null;

  return ctx.db.users.insert({
    username,
    passwordHash: await ctx.passwords.hash(input.password),
    role: input.role,
    parentUsername,
  });
}

// Hash checked against when the username is unknown, so both failures cost one
// PBKDF2 run. Made once per hasher, with that hasher's iteration count.
const dummyHashes = new WeakMap<PasswordHasher, Promise<string>>();

function dummyHashFor(passwords: PasswordHasher): Promise<string> {
  let hash = dummyHashes.get(passwords);
  if (!hash) {
    hash = passwords.hash("unknown-user-placeholder");
    dummyHashes.set(passwords, hash);
  }
  return hash;
}

export async function authenticate(
  ctx: AccountServiceContext,
  username: string,
  password: string
): Promise<User> {
  const user = await ctx.db.users.findByUsername(username);
  if (!user) {
    await ctx.passwords.verify(password, await dummyHashFor(ctx.passwords));
    throw new InvalidCredentialsError();
  }
  if (!(await ctx.passwords.verify(password, user.passwordHash))) {
    throw new InvalidCredentialsError();
  }
  return user;
}
