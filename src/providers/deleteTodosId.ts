import { MyContext } from "../MyContext";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { findOwnedTodo } from "./findOwnedTodo";

/**
 * Hard delete a todo. Same existence and ownership checks as
 * {@link putTodosId}; there is no soft-delete.
 */
export async function deleteTodosId(
  context: MyContext,
  props: {
    user: ITodoUser;
    id: number;
  },
): Promise<ProviderResult<void>> {
  const owned: ProviderResult<TodoEntity> = await findOwnedTodo(context, props);
  if (owned.success === false) return owned;

  await context.todos.delete({ id: props.id });
  return ProviderResult.ok(undefined);
}
