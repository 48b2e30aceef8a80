import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestApi } from "../../../helpers/TestApi";

export async function test_api_todo_nonexistent_not_found(
  connection: ITestConnection,
): Promise<void> {
  const auth: TestApi.IAuthenticated = await TestApi.authenticate(connection);
  const missing: number = 2_000_000_000;

  const updated: TestApi.IResponse = await TestApi.update(
    auth.connection,
    missing,
    {
      title: "ghost",
      description: "ghost",
    },
  );
  expect(updated.status).toBe(404);
  expect(updated.body).toEqual({
    statusCode: 404,
    message: "Not Found: Todo not found",
  });

  const erased: TestApi.IResponse = await TestApi.erase(
    auth.connection,
    missing,
  );
  expect(erased.status).toBe(404);
  expect(erased.body).toEqual(updated.body);
}
