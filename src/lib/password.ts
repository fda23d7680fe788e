// Salted password hashing on the Web Crypto API (PBKDF2-SHA256).
// Stored format: pbkdf2$sha256$<iterations>$<salt base64>$<hash base64>

import { timingSafeEqual, webcrypto } from "crypto";

const SCHEME = "pbkdf2";
const DIGEST = "sha256";
const SALT_LENGTH = 16;
const KEY_LENGTH_BITS = 256;

export const DEFAULT_PASSWORD_HASH_ITERATIONS = 210_000;

const encoder = new TextEncoder();

async function deriveBits(
  password: string,
  salt: Uint8Array,
  iterations: number
): Promise<Uint8Array> {
  const keyMaterial = await webcrypto.subtle.importKey(
    "raw",
    encoder.encode(password),
    "PBKDF2",
    false,
    ["deriveBits"]
  );
  const bits = await webcrypto.subtle.deriveBits(
    { name: "PBKDF2", hash: "SHA-256", salt, iterations },
    keyMaterial,
    KEY_LENGTH_BITS
  );
  return new Uint8Array(bits);
}

export class PasswordHasher {
  constructor(
    private readonly iterations: number = DEFAULT_PASSWORD_HASH_ITERATIONS
  ) {}

  async hash(password: string): Promise<string> {
    const salt = webcrypto.getRandomValues(new Uint8Array(SALT_LENGTH));
    const derived = await deriveBits(password, salt, this.iterations);
    return [
      SCHEME,
      DIGEST,
      String(this.iterations),
      Buffer.from(salt).toString("base64"),
      Buffer.from(derived).toString("base64"),
    ].join("$");
  }

  /**
   * Checks a password against a stored hash. Iterations come from the stored
   * value, so hashes written under an older setting still verify.
   */
  async verify(password: string, stored: string): Promise<boolean> {
    const parts = stored.split("$");
    if (parts.length !== 5) return false;
    const [scheme, digest, iterationsText, saltText, hashText] = parts;
    if (scheme !== SCHEME || digest !== DIGEST) return false;

    const iterations = Number(iterationsText);
    if (!Number.isInteger(iterations) || iterations <= 0) return false;

    const expected = Buffer.from(hashText, "base64");
    const actual = await deriveBits(
      password,
      Buffer.from(saltText, "base64"),
      iterations
    );
    if (expected.length !== actual.length) return false;
    return timingSafeEqual(expected, actual);
  }
}
