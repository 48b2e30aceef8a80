/**
 * Bearer credential returned by a successful login.
 *
 * Send it back as `Authorization: Bearer <token>` until it expires.
 */
export type IAuthorizationToken = {
  token: string;
};
