import type { Account } from "./user";

export interface AuthContext {
  account: Account;
}

export interface AppEnv {
  Variables: AuthContext;
}
