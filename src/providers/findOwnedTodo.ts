import { MyContext } from "../MyContext";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoEntity } from "../models";
import { ProviderResult } from "./ProviderResult";

export async function findOwnedTodo(
  context: MyContext,
  props: {
    user: ITodoUser;
    id: number;
  },
): Promise<ProviderResult<TodoEntity>> {
  const todo: TodoEntity | null = await context.todos.findOne({
    where: { id: props.id },
  });
  if (todo === null)
    return ProviderResult.fail({
      kind: "not_found",
      message: "Todo not found",
    });
  if (todo.user_id !== props.user.id)
    return ProviderResult.fail({
      kind: "forbidden",
      message: "Todo belongs to another member",
    });
  return ProviderResult.ok(todo);
}
