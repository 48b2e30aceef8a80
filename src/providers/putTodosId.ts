import { MyContext } from "../MyContext";
import { ITodo } from "../api/structures/ITodo";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { findOwnedTodo } from "./findOwnedTodo";

/**
 * Overwrite the title and description of a todo.
 *
 * A todo owned by someone else answers `forbidden` rather than `not_found`,
 * which reveals that the id exists.
 */
export async function putTodosId(
  context: MyContext,
  props: {
    user: ITodoUser;
    id: number;
    body: ITodo.IUpdate;
  },
): Promise<ProviderResult<ITodo>> {
  const owned: ProviderResult<TodoEntity> = await findOwnedTodo(context, props);
  if (owned.success === false) return owned;

  await context.todos.update(
    { id: props.id },
    {
      title: props.body.title,
      description: props.body.description,
    },
  );
  return ProviderResult.ok({
    id: owned.data.id,
    title: props.body.title,
    description: props.body.description,
  });
}
