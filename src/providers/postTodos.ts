import { MyContext } from "../MyContext";
import { ITodo } from "../api/structures/ITodo";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { TodoTransformer } from "./transformers/TodoTransformer";

export async function postTodos(
  context: MyContext,
  props: {
    user: ITodoUser;
    body: ITodo.ICreate;
  },
): Promise<ProviderResult<ITodo>> {
  const created: TodoEntity = await context.todos.save(
    context.todos.create({
      user_id: props.user.id,
      title: props.body.title,
      description: props.body.description,
    }),
  );
  return ProviderResult.ok(TodoTransformer.toPublic(created));
}
