import crypto from "crypto";

/**
 * One-way password hashing with scrypt.
 *
 * Hashes are `<salt>:<key>` in hex, a fresh 16 byte salt per call and a 64
 * byte derived key, so every hash is exactly 161 characters long.
 */
export namespace PasswordUtil {
  const SALT_LENGTH = 16;
  const KEY_LENGTH = 64;
  const FORMAT = /^([0-9a-f]{32}):([0-9a-f]{128})$/;

  export async function hash(password: string): Promise<string> {
    const salt: string = crypto.randomBytes(SALT_LENGTH).toString("hex");
    const key: Buffer = await derive(password, salt);
    return `${salt}:${key.toString("hex")}`;
  }

  /**
   * Resolves `false` for a mismatch and for a hash not produced by
   * {@link hash}; never rejects on bad input.
   */
  export async function verify(
    password: string,
    hashed: string,
  ): Promise<boolean> {
    const matched: RegExpExecArray | null = FORMAT.exec(hashed);
    if (matched === null) return false;

    const [, salt, expected] = matched;
    const key: Buffer = await derive(password, salt);
    return crypto.timingSafeEqual(key, Buffer.from(expected, "hex"));
  }

  const derive = (password: string, salt: string): Promise<Buffer> =>
    new Promise((resolve, reject) => {
      crypto.scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
        if (error) reject(error);
        else resolve(derivedKey);
      });
    });
}
