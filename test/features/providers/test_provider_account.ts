import { ITodoUser } from "../../../src/api/structures/ITodoUser";
import { postLogin } from "../../../src/providers/postLogin";
import { postRegister } from "../../../src/providers/postRegister";
import { ITestConnection } from "../../helpers/ITestConnection";
import { TestApi } from "../../helpers/TestApi";

export async function test_provider_register_conflict(
  connection: ITestConnection,
): Promise<void> {
  const body: ITodoUser.ICreate = TestApi.randomMember();
  const first = await postRegister(connection.context, { body });
  expect(first.success).toBe(true);

  const before: number = await connection.context.users.count();
  expect(await postRegister(connection.context, { body })).toEqual({
    success: false,
    failure: { kind: "conflict", message: "Email already registered" },
  });
  expect(await connection.context.users.count()).toBe(before);
}

export async function test_provider_login_uniform_failure(
  connection: ITestConnection,
): Promise<void> {
  const body: ITodoUser.ICreate = TestApi.randomMember();
  await postRegister(connection.context, { body });

  const wrongPassword = await postLogin(connection.context, {
    body: { email: body.email, password: "wrong" },
  });
  const unknownEmail = await postLogin(connection.context, {
    body: { email: `unknown-${body.email}`, password: body.password },
  });
  expect(wrongPassword).toEqual({
    success: false,
    failure: { kind: "unauthorized", reason: "bad_credentials" },
  });
  expect(unknownEmail).toEqual(wrongPassword);
}

export async function test_provider_login_token_names_member(
  connection: ITestConnection,
): Promise<void> {
  const body: ITodoUser.ICreate = TestApi.randomMember();
  const registered = await postRegister(connection.context, { body });
  const logged = await postLogin(connection.context, { body });
  if (registered.success === false || logged.success === false)
    throw new Error("registration or login failed");

  expect(connection.context.tokens.verify(logged.data.token)).toEqual({
    valid: true,
    subject: registered.data.id,
  });
}
