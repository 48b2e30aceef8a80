import { MyContext } from "../../MyContext";
import { ITodoUser } from "../../api/structures/ITodoUser";
import { TodoUserEntity } from "../../models";
import { ProviderResult } from "../ProviderResult";
import { TodoUserTransformer } from "../transformers/TodoUserTransformer";
import { jwtAuthorize } from "./jwtAuthorize";

/**
 * Resolve the member calling an authenticated route.
 *
 * - Verifies the bearer token with the shared jwtAuthorize function
 * - Loads the member named by the token subject with a single read
 * - Rejects tokens whose member no longer exists
 */
export async function userAuthorize(
  context: MyContext,
  authorization: string | undefined,
): Promise<ProviderResult<ITodoUser>> {
  const subject: ProviderResult<number> = jwtAuthorize(
    context.tokens,
    authorization,
  );
  if (subject.success === false) return subject;

  const user: TodoUserEntity | null = await context.users.findOne({
    where: { id: subject.data },
  });
  if (user === null)
    return ProviderResult.fail({
      kind: "unauthorized",
      reason: "unknown_user",
    });
  return ProviderResult.ok(TodoUserTransformer.toPublic(user));
}
