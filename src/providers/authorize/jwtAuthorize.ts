import { JwtTokenService } from "../../utils/JwtTokenService";
import { IProviderFailure, ProviderResult } from "../ProviderResult";

const SCHEME = "Bearer ";

/**
 * Extract the bearer token of an `Authorization` header and verify it.
 *
 * The header must be exactly `Bearer <token>`: case-sensitive scheme, one
 * space, non-empty token. Resolves to the member id carried by the token.
 */
export function jwtAuthorize(
  tokens: JwtTokenService,
  authorization: string | undefined,
): ProviderResult<number> {
  if (authorization === undefined || authorization.length === 0)
    return unauthorized("missing_header");
  if (!authorization.startsWith(SCHEME)) return unauthorized("malformed_header");

  const token: string = authorization.slice(SCHEME.length);
  if (token.length === 0) return unauthorized("malformed_header");

  const verification: JwtTokenService.IVerification = tokens.verify(token);
  if (verification.valid === false) return unauthorized(verification.reason);
  return ProviderResult.ok(verification.subject);
}

const unauthorized = (
  reason: IProviderFailure.IUnauthorizedReason,
): ProviderResult.IFailure =>
  ProviderResult.fail({
    kind: "unauthorized",
    reason,
  });
