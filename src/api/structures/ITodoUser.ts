/**
 * Registered member of the to-do service.
 *
 * The password hash stored alongside the account never leaves the server, so
 * it has no place in this structure.
 */
export type ITodoUser = {
  /** Primary key assigned by storage. */
  id: number;

  /** Display name chosen at registration. */
  name: string;

  /** Login email, normalized to lower case. */
  email: string;
};
export namespace ITodoUser {
  /** Registration payload. */
  export type ICreate = {
    name: string;

    /** Unique across all members, compared case-insensitively. */
    email: string;

    /** Plain-text password. Only its scrypt hash is persisted. */
    password: string;
  };
}
