import { Logger } from "@nestjs/common";
import { Singleton } from "tstl";

import { MyContext } from "../MyContext";
import { IAuthorizationToken } from "../api/structures/IAuthorizationToken";
import { ITodoUserLogin } from "../api/structures/ITodoUserLogin";
import { TodoUserEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { TodoUserTransformer } from "./transformers/TodoUserTransformer";

const logger = new Logger("postLogin");

/**
 * Exchange email and password for a bearer token.
 *
 * An unknown email and a wrong password produce the very same failure.
 * Unknown emails are still checked against a placeholder hash so both paths
 * spend one scrypt derivation.
 */
export async function postLogin(
  context: MyContext,
  props: {
    body: ITodoUserLogin.IRequest;
  },
): Promise<ProviderResult<IAuthorizationToken>> {
  const email: string = TodoUserTransformer.normalizeEmail(props.body.email);
  const user: TodoUserEntity | null = await context.users.findOne({
    where: { email },
  });

  const hashed: string =
    user !== null ? user.password_hash : await placeholder.get(context);
  const passwordOk: boolean = await context.password.verify(
    props.body.password,
    hashed,
  );
  if (user === null || passwordOk === false) {
    logger.warn("rejected login attempt");
    return ProviderResult.fail({
      kind: "unauthorized",
      reason: "bad_credentials",
    });
  }
  return ProviderResult.ok({
    token: context.tokens.issue(user.id),
  });
}

const placeholder = new Singleton((context: MyContext) =>
  context.password.hash("placeholder-password"),
);
