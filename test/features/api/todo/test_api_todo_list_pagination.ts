import { IPageITodo } from "../../../../src/api/structures/IPageITodo";
import { ITodo } from "../../../../src/api/structures/ITodo";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestApi } from "../../../helpers/TestApi";

/**
 * 25 todos split by 10: pages of 10, 10, 5 and 0 items, in ascending id
 * order, with the same total on every page.
 */
export async function test_api_todo_list_pagination(
  connection: ITestConnection,
): Promise<void> {
  const auth: TestApi.IAuthenticated = await TestApi.authenticate(connection);
  const created: ITodo[] = [];
  for (let i: number = 0; i < 25; ++i)
    created.push(
      await TestApi.assertCreate(auth.connection, {
        title: `todo #${i}`,
        description: `description #${i}`,
      }),
    );

  const pages: IPageITodo[] = [];
  for (let page: number = 1; page <= 4; ++page)
    pages.push(await TestApi.assertIndex(auth.connection, { page, limit: 10 }));
  expect(pages.map((p) => p.data.length)).toEqual([10, 10, 5, 0]);
  expect(pages.map((p) => p.total)).toEqual([25, 25, 25, 25]);
  expect(pages.map((p) => p.page)).toEqual([1, 2, 3, 4]);
  expect(pages.map((p) => p.limit)).toEqual([10, 10, 10, 10]);

  expect(pages.flatMap((p) => p.data)).toEqual(created);
  expect(pages[2].data).toEqual(created.slice(20));
}
