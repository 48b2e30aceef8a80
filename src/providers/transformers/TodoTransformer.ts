import { ITodo } from "../../api/structures/ITodo";
import { TodoEntity } from "../../models";

export namespace TodoTransformer {
  export const toPublic = (todo: TodoEntity): ITodo => ({
    id: todo.id,
    title: todo.title,
    description: todo.description,
  });
}
