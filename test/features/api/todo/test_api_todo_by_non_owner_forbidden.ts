import { ITodo } from "../../../../src/api/structures/ITodo";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestApi } from "../../../helpers/TestApi";

/**
 * A non-owner gets 403 on update and delete, and neither attempt changes
 * the todo.
 *
 * 1. Alice creates a todo.
 * 2. Bob tries to update it, then to delete it.
 * 3. Alice still lists the untouched todo and can delete it herself.
 */
export async function test_api_todo_by_non_owner_forbidden(
  connection: ITestConnection,
): Promise<void> {
  const alice: TestApi.IAuthenticated = await TestApi.authenticate(connection);
  const bob: TestApi.IAuthenticated = await TestApi.authenticate(connection);
  const todo: ITodo = await TestApi.assertCreate(alice.connection, {
    title: "alice's",
    description: "private",
  });

  const updated: TestApi.IResponse = await TestApi.update(
    bob.connection,
    todo.id,
    {
      title: "hijacked",
      description: "by bob",
    },
  );
  expect(updated.status).toBe(403);
  expect(updated.body).toEqual({
    statusCode: 403,
    message: "Forbidden: Todo belongs to another member",
  });

  const erased: TestApi.IResponse = await TestApi.erase(bob.connection, todo.id);
  expect(erased.status).toBe(403);

  const page = await TestApi.assertIndex(alice.connection);
  expect(page.data).toEqual([todo]);

  const own: TestApi.IResponse = await TestApi.erase(alice.connection, todo.id);
  expect(own.status).toBe(204);
}
