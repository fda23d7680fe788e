import { SignJWT, jwtVerify } from "jose";

const ALGORITHM = "HS256";

export const DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES = 60 * 24 * 7;

export interface SessionIssuerOptions {
  secretKey: string;
  expireMinutes?: number;
  now?: () => number;
}

/**
 * Signs and verifies bearer tokens. A token carries the username in `sub` and
 * stays valid until `exp`; there is no revocation list.
 */
export class SessionIssuer {
  private readonly key: Uint8Array;
  private readonly expireMinutes: number;
  private readonly now: () => number;

  constructor(options: SessionIssuerOptions) {
    this.key = new TextEncoder().encode(options.secretKey);
    this.expireMinutes =
      options.expireMinutes ?? DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES;
    this.now = options.now ?? Date.now;
  }

  async issue(username: string): Promise<string> {
    const issuedAt = Math.floor(this.now() / 1000);
    return new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(username)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.expireMinutes * 60)
      .sign(this.key);
  }

  /** Returns the username of a valid token, or null for anything else. */
  async resolve(token: string): Promise<string | null> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: new Date(this.now()),
      });
      return typeof payload.sub === "string" && payload.sub ? payload.sub : null;
    } catch {
      return null;
    }
  }
}
