export interface Env {
  PORT?: string;
  DATABASE_URL?: string;
  DATABASE_AUTH_TOKEN?: string;
  SECRET_KEY?: string;
  ACCESS_TOKEN_EXPIRE_MINUTES?: string;
  PASSWORD_HASH_ITERATIONS?: string;
  ALLOWED_ORIGINS?: string;
  REQUEST_LOGGING?: string;
  NODE_ENV?: string;
}

export interface AppConfig {
  port: number;
  databaseUrl: string;
  databaseAuthToken?: string;
  secretKey: string;
  accessTokenExpireMinutes: number;
  passwordHashIterations: number;
  allowedOrigins: string[];
  requestLogging: boolean;
}
