import jwt from "jsonwebtoken";

/**
 * Issues and verifies the bearer tokens of authenticated members.
 *
 * A token binds a single claim, the member id in `sub`, and expires
 * `ttlSeconds` after issuance. Nothing is stored: verification only
 * recomputes the HS256 signature and checks the expiration against the
 * injected clock.
 */
export class JwtTokenService {
  private readonly secret_: string;
  private readonly ttl_: number;
  private readonly clock_: () => number;

  public constructor(props: JwtTokenService.IProps) {
    this.secret_ = props.secret;
    this.ttl_ = props.ttlSeconds;
    this.clock_ = props.clock ?? Date.now;
  }

  public issue(subject: number): string {
    return jwt.sign(
      {
        sub: String(subject),
        iat: this.now(),
      },
      this.secret_,
      {
        algorithm: "HS256",
        expiresIn: this.ttl_,
      },
    );
  }

  public verify(token: string): JwtTokenService.IVerification {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret_, {
        algorithms: ["HS256"],
        clockTimestamp: this.now(),
      });
    } catch (error) {
      return {
        valid: false,
        reason: JwtTokenService.classify(error),
      };
    }
    if (typeof payload === "string") return { valid: false, reason: "malformed" };
    if (typeof payload.sub !== "string" || !/^[1-9][0-9]*$/.test(payload.sub))
      return { valid: false, reason: "missing_subject" };
    return { valid: true, subject: Number(payload.sub) };
  }

  private now(): number {
    return Math.floor(this.clock_() / 1000);
  }
}
export namespace JwtTokenService {
  export interface IProps {
    secret: string;
    ttlSeconds: number;

    /** Current time in epoch milliseconds. */
    clock?: () => number;
  }

  export type IVerification =
    | { valid: true; subject: number }
    | { valid: false; reason: IFailureReason };

  export type IFailureReason =
    | "malformed"
    | "bad_signature"
    | "expired"
    | "missing_subject";

  /** @internal */
  export const classify = (error: unknown): IFailureReason => {
    if (error instanceof jwt.TokenExpiredError) return "expired";
    if (
      error instanceof jwt.JsonWebTokenError &&
      error.message === "invalid signature"
    )
      return "bad_signature";
    return "malformed";
  };
}
