import { MyContext } from "../MyContext";
import { IPageITodo } from "../api/structures/IPageITodo";
import { ITodo } from "../api/structures/ITodo";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { TodoTransformer } from "./transformers/TodoTransformer";

export const DEFAULT_LIMIT = 10;

/**
 * List the authenticated member's todos, one page at a time.
 *
 * Security: only rows owned by the member are counted or returned. Rows are
 * ordered by ascending id so consecutive pages never overlap.
 *
 * Pagination: a missing page means 1 and a page below 1 is clamped to 1. A
 * missing limit means {@link DEFAULT_LIMIT} and a limit below 1 is rejected.
 * A page starting beyond the last representable offset is empty.
 */
export async function getTodos(
  context: MyContext,
  props: {
    user: ITodoUser;
    query: ITodo.IRequest;
  },
): Promise<ProviderResult<IPageITodo>> {
  const page: number = Math.max(props.query.page ?? 1, 1);
  const limit: number = props.query.limit ?? DEFAULT_LIMIT;
  if (limit < 1)
    return ProviderResult.fail({
      kind: "validation",
      field: "limit",
      message: "limit must be a positive integer",
    });

  const where = { user_id: props.user.id };
  const skip: number = (page - 1) * limit;
  const [rows, total] = await Promise.all([
    Number.isSafeInteger(skip)
      ? context.todos.find({
          where,
          order: { id: "ASC" },
          skip,
          take: limit,
        })
      : Promise.resolve<TodoEntity[]>([]),
    context.todos.count({ where }),
  ]);

  const data: ITodo[] = rows.map((row: TodoEntity) =>
    TodoTransformer.toPublic(row),
  );
  return ProviderResult.ok({
    data,
    page,
    limit,
    total,
  });
}
