import { randomUUID } from "crypto";

import { ITodoUser } from "../../../../src/api/structures/ITodoUser";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestApi } from "../../../helpers/TestApi";
import { TestSchemas } from "../../../helpers/TestSchemas";

/**
 * Register a member whose email has mixed case and surrounding blanks.
 *
 * The response carries exactly id, name and the normalized email; neither
 * the password nor its hash leaks.
 */
export async function test_api_user_registration_success(
  connection: ITestConnection,
): Promise<void> {
  const local: string = randomUUID();
  const response: TestApi.IResponse = await TestApi.register(connection, {
    name: "Ada",
    email: `  ${local.toUpperCase()}@Example.COM `,
    password: "correct horse battery staple",
  });
  expect(response.status).toBe(201);

  const user: ITodoUser = TestSchemas.user.parse(response.body);
  expect(user).toEqual({
    id: user.id,
    name: "Ada",
    email: `${local}@example.com`,
  });
}
